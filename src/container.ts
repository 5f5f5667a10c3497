/**
 * Composition root: builds every pipeline component from one configuration.
 * Nothing here is module-level state; each call returns fresh instances.
 */

import { HistoryStore } from './services/HistoryStore.js';
import {
    ContentStore,
    GenerationClient,
    RemoteAppTransport,
    type GenerationTransport
} from './generation/index.js';
import { OllamaClient } from './llm/OllamaClient.js';
import type { TextGenerator } from './llm/types.js';
import { PipelineOrchestrator, PromptEnhancer, TagExtractor } from './pipeline/index.js';
import type { ServiceTarget } from './utils/ServiceStatus.js';
import type { PipelineConfig } from './types/index.js';

export interface PipelineServices {
    config: PipelineConfig;
    historyStore: HistoryStore;
    contentStore: ContentStore;
    textGenerator: TextGenerator;
    transport: GenerationTransport;
    generationClient: GenerationClient;
    orchestrator: PipelineOrchestrator;
    close(): void;
}

/**
 * Replacements for the network-facing components
 */
export interface ServiceOverrides {
    textGenerator?: TextGenerator;
    transport?: GenerationTransport;
}

export function createServices(config: PipelineConfig, overrides: ServiceOverrides = {}): PipelineServices {
    const historyStore = new HistoryStore(config.storage.historyDbPath);
    historyStore.init();

    const contentStore = new ContentStore({ basePath: config.storage.outputDir });

    const textGenerator = overrides.textGenerator ?? new OllamaClient({
        baseUrl: config.llm.baseUrl,
        model: config.llm.model,
        timeoutMs: config.llm.timeoutMs
    });

    const transport = overrides.transport ?? new RemoteAppTransport({
        domain: config.remoteApps.domain,
        timeoutMs: config.remoteApps.timeoutMs,
        apiKey: config.remoteApps.apiKey
    });

    const generationClient = new GenerationClient({
        transport,
        contentStore,
        textToImageAppId: config.remoteApps.textToImageAppId,
        imageTo3dAppId: config.remoteApps.imageTo3dAppId
    });

    const orchestrator = new PipelineOrchestrator(
        {
            history: historyStore,
            enhancer: new PromptEnhancer(textGenerator, { promptsPath: config.llm.promptsPath }),
            generator: generationClient,
            tagExtractor: new TagExtractor()
        },
        config.pipeline
    );

    return {
        config,
        historyStore,
        contentStore,
        textGenerator,
        transport,
        generationClient,
        orchestrator,
        close: () => historyStore.close()
    };
}

/**
 * Endpoints probed by the status command
 */
export function serviceTargets(config: PipelineConfig): ServiceTarget[] {
    const appUrl = (appId: string) => `https://${appId}.${config.remoteApps.domain}/health`;

    return [
        { name: 'Local LLM (Ollama)', url: `${config.llm.baseUrl}/api/tags`, critical: false },
        { name: 'Text to Image app', url: appUrl(config.remoteApps.textToImageAppId) },
        { name: 'Image to 3D app', url: appUrl(config.remoteApps.imageTo3dAppId) }
    ];
}
