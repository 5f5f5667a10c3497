/**
 * PipelineOrchestrator - prompt → image → 3D model, recorded in history
 *
 * Stage policy:
 * - history lookup and enhancement fail open (empty context, original prompt)
 * - a failed image skips the model stage
 * - a failed model keeps the image
 * - every run is recorded, whatever the stages produced or threw
 * - run() always resolves with a PipelineResult
 */

import { createLogger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/ErrorHandler.js';
import type { PipelineContext } from '../types/config.js';
import type {
  GenerationAttemptResult,
  GenerationRecord,
  NewGenerationRecord,
  PipelineResult
} from '../types/generation.js';

const logger = createLogger('Pipeline');

/** Remote stages slower than this are logged as slow */
const SLOW_STAGE_MS = 60000;

// ═══════════════════════════════════════════════════════════════════════════════
// COLLABORATORS
// ═══════════════════════════════════════════════════════════════════════════════

export interface GenerationHistory {
  search(query: string, limit: number): GenerationRecord[];
  insert(record: NewGenerationRecord): number;
}

export interface Enhancer {
  enhance(prompt: string, context: string): Promise<string>;
}

export interface ArtifactGenerator {
  generateImage(prompt: string, userId: string): Promise<GenerationAttemptResult>;
  generateModel(imageBytes: Buffer, userId: string): Promise<GenerationAttemptResult>;
}

export interface KeywordExtractor {
  extract(text: string): string[];
}

export interface PipelineDependencies {
  history: GenerationHistory;
  enhancer: Enhancer;
  generator: ArtifactGenerator;
  tagExtractor: KeywordExtractor;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATOR
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Context string quoting the user prompts of past matches
 */
export function buildHistoryContext(matches: GenerationRecord[], size: number): string {
  const quoted = matches.slice(0, size).map(match => JSON.stringify(match.userPrompt));
  return quoted.length > 0 ? `Similar past requests: ${quoted.join(', ')}` : '';
}

export class PipelineOrchestrator {
  private deps: PipelineDependencies;
  private context: PipelineContext;

  constructor(deps: PipelineDependencies, context: PipelineContext) {
    this.deps = deps;
    this.context = context;
  }

  /**
   * Run the whole pipeline for one request
   */
  async run(userPrompt: string, userId: string = this.context.defaultUserId): Promise<PipelineResult> {
    return logger.withCorrelationId(() => this.execute(userPrompt, userId));
  }

  private async execute(userPrompt: string, userId: string): Promise<PipelineResult> {
    const result: PipelineResult = {
      userPrompt,
      enhancedPrompt: userPrompt,
      imageGenerated: false,
      modelGenerated: false,
      imagePath: null,
      modelPath: null,
      tags: [],
      recordId: null,
      error: null
    };

    try {
      // Step 1: Past requests as context
      const historyContext = this.lookupContext(userPrompt);

      // Step 2: Enhance prompt with LLM
      logger.info('Enhancing prompt', { promptLength: userPrompt.length, hasContext: historyContext !== '' });
      const enhancedPrompt = await this.deps.enhancer.enhance(userPrompt, historyContext);
      result.enhancedPrompt = enhancedPrompt;

      // Step 3: Generate image
      logger.info('Generating image', { userId });
      const image = await logger.measureAsync(
        () => this.deps.generator.generateImage(enhancedPrompt, userId),
        'image generation',
        SLOW_STAGE_MS
      );

      if (image.success) {
        result.imageGenerated = true;
        result.imagePath = image.path;
        const imageBytes = image.payload;

        // Step 4: Generate 3D model from the image bytes
        logger.info('Converting image to 3D model', { imagePath: image.path });
        const model = await logger.measureAsync(
          () => this.deps.generator.generateModel(imageBytes, userId),
          '3D model generation',
          SLOW_STAGE_MS
        );

        if (model.success) {
          result.modelGenerated = true;
          result.modelPath = model.path;
        } else {
          this.appendError(result, `3D model generation failed: ${model.error}`);
        }
      } else {
        this.appendError(result, `Image generation failed: ${image.error}`);
      }
    } catch (error) {
      logger.error('Pipeline error', { error: getErrorMessage(error) });
      this.appendError(result, `Pipeline error: ${getErrorMessage(error)}`);
    }

    // Steps 5 and 6 run whatever happened above
    this.persist(result);

    logger.info('Pipeline run completed', {
      imageGenerated: result.imageGenerated,
      modelGenerated: result.modelGenerated,
      recordId: result.recordId,
      error: result.error
    });

    return result;
  }

  private lookupContext(userPrompt: string): string {
    try {
      const matches = this.deps.history.search(userPrompt, this.context.historySearchLimit);
      return buildHistoryContext(matches, this.context.historyContextSize);
    } catch (error) {
      logger.warn('History lookup failed, continuing without context', { error: getErrorMessage(error) });
      return '';
    }
  }

  /**
   * Tag and insert the run's record. A storage failure is reported on the
   * result and leaves the stage outcomes untouched.
   */
  private persist(result: PipelineResult): void {
    try {
      result.tags = this.deps.tagExtractor.extract(result.enhancedPrompt);
      result.recordId = this.deps.history.insert({
        userPrompt: result.userPrompt,
        enhancedPrompt: result.enhancedPrompt,
        imagePath: result.imagePath,
        modelPath: result.imagePath === null ? null : result.modelPath,
        tags: result.tags
      });
    } catch (error) {
      logger.error('Failed to save generation history', { error: getErrorMessage(error) });
      this.appendError(result, `Failed to save generation history: ${getErrorMessage(error)}`);
    }
  }

  private appendError(result: PipelineResult, message: string): void {
    result.error = result.error ? `${result.error}; ${message}` : message;
  }
}

export default PipelineOrchestrator;
