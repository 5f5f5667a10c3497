import type { PipelineConfig, PipelineEnvironment } from '../types/config.js';
import { ConfigurationError } from './ErrorHandler.js';

/**
 * Default remote app identifiers
 */
export const DEFAULT_TEXT_TO_IMAGE_APP_ID = 'f0997a01-d6d3-a5fe-53d8-561300318557';
export const DEFAULT_IMAGE_TO_3D_APP_ID = '69543f29-4d41-4afc-7f29-3d51591f11eb';

const DEFAULTS = {
    OLLAMA_URL: 'http://localhost:11434',
    OLLAMA_MODEL: 'deepseek-r1:1.5b',
    ENHANCE_TIMEOUT_MS: 30000,
    GENERATION_TIMEOUT_MS: 120000,
    REMOTE_APP_DOMAIN: 'node3.openfabric.network',
    OUTPUT_DIR: 'outputs',
    HISTORY_DB_PATH: 'data/ai_memory.db',
    PROMPTS_PATH: './prompts',
    DEFAULT_USER_ID: 'super-user',
    HISTORY_SEARCH_LIMIT: 3,
    HISTORY_CONTEXT_SIZE: 2
} as const;

/**
 * Parse a positive integer variable, falling back to its default when unset
 */
function parsePositiveInt(key: string, raw: string | undefined, fallback: number): number {
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }

    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
        throw new ConfigurationError(`Invalid ${key}: must be a positive integer. Got: ${raw}`);
    }
    return value;
}

function pick(raw: string | undefined, fallback: string): string {
    return raw && raw.trim() !== '' ? raw.trim() : fallback;
}

/**
 * Build the pipeline configuration from environment variables.
 * The returned object is frozen; every run receives it explicitly.
 */
export function loadConfig(env: PipelineEnvironment = process.env): PipelineConfig {
    const config: PipelineConfig = {
        llm: {
            baseUrl: pick(env.OLLAMA_URL, DEFAULTS.OLLAMA_URL).replace(/\/$/, ''),
            model: pick(env.OLLAMA_MODEL, DEFAULTS.OLLAMA_MODEL),
            timeoutMs: parsePositiveInt('ENHANCE_TIMEOUT_MS', env.ENHANCE_TIMEOUT_MS, DEFAULTS.ENHANCE_TIMEOUT_MS),
            promptsPath: pick(env.PROMPTS_PATH, DEFAULTS.PROMPTS_PATH)
        },
        remoteApps: {
            textToImageAppId: pick(env.TEXT_TO_IMAGE_APP_ID, DEFAULT_TEXT_TO_IMAGE_APP_ID),
            imageTo3dAppId: pick(env.IMAGE_TO_3D_APP_ID, DEFAULT_IMAGE_TO_3D_APP_ID),
            domain: pick(env.REMOTE_APP_DOMAIN, DEFAULTS.REMOTE_APP_DOMAIN),
            timeoutMs: parsePositiveInt('GENERATION_TIMEOUT_MS', env.GENERATION_TIMEOUT_MS, DEFAULTS.GENERATION_TIMEOUT_MS),
            apiKey: env.OPENFABRIC_API_KEY || undefined
        },
        storage: {
            outputDir: pick(env.OUTPUT_DIR, DEFAULTS.OUTPUT_DIR),
            historyDbPath: pick(env.HISTORY_DB_PATH, DEFAULTS.HISTORY_DB_PATH)
        },
        pipeline: {
            defaultUserId: pick(env.DEFAULT_USER_ID, DEFAULTS.DEFAULT_USER_ID),
            historySearchLimit: DEFAULTS.HISTORY_SEARCH_LIMIT,
            historyContextSize: DEFAULTS.HISTORY_CONTEXT_SIZE
        }
    };

    return Object.freeze(config);
}

/**
 * Configuration without secrets, for logging
 */
export function describeConfig(config: PipelineConfig): Record<string, unknown> {
    return {
        ...config,
        remoteApps: {
            ...config.remoteApps,
            apiKey: config.remoteApps.apiKey ? '[REDACTED]' : undefined
        }
    };
}
