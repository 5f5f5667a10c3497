/**
 * GenerationClient - Remote image and 3D model synthesis
 *
 * Features:
 * - Calls the text-to-image and image-to-3D apps through a transport
 * - Decodes base64, text or binary payloads
 * - Persists artifacts through ContentStore
 * - Reports failures as results, never as thrown errors
 */

import { ContentStore, STAGE_EXTENSIONS } from './ContentStore.js';
import type { GenerationTransport } from './RemoteAppTransport.js';
import { decodeResultPayload, isEmptyResult } from './payload.js';
import { createLogger } from '../utils/logger.js';
import { ExternalServiceError, getErrorMessage } from '../utils/ErrorHandler.js';
import type {
  GenerationAttemptResult,
  GenerationFailureReason,
  GenerationStage
} from '../types/generation.js';

const logger = createLogger('GenerationClient');

export const NO_DATA_RECEIVED = 'no data received';

/**
 * GenerationClient configuration
 */
export interface GenerationClientConfig {
  transport: GenerationTransport;
  contentStore: ContentStore;
  textToImageAppId: string;
  imageTo3dAppId: string;
}

export class GenerationClient {
  private transport: GenerationTransport;
  private contentStore: ContentStore;
  private appIds: Record<GenerationStage, string>;

  constructor(config: GenerationClientConfig) {
    this.transport = config.transport;
    this.contentStore = config.contentStore;
    this.appIds = {
      image: config.textToImageAppId,
      model: config.imageTo3dAppId
    };
  }

  /**
   * Generate an image from a prompt
   */
  async generateImage(prompt: string, userId: string): Promise<GenerationAttemptResult> {
    return this.generate('image', this.appIds.image, { prompt }, userId);
  }

  /**
   * Generate a 3D model from image bytes
   */
  async generateModel(imageBytes: Buffer, userId: string): Promise<GenerationAttemptResult> {
    return this.generate('model', this.appIds.model, { image: imageBytes.toString('base64') }, userId);
  }

  /**
   * Execute one remote generation and store its artifact
   *
   * @param stage - Which artifact is produced (decides the file extension)
   * @param serviceId - Remote app identifier
   * @param requestPayload - Request body
   * @param userId - Caller identity forwarded to the app
   */
  async generate(
    stage: GenerationStage,
    serviceId: string,
    requestPayload: Record<string, unknown>,
    userId: string
  ): Promise<GenerationAttemptResult> {
    try {
      const response = await this.transport.call(serviceId, requestPayload, userId);
      const result = response['result'];

      if (isEmptyResult(result)) {
        logger.warn('Remote app returned no data', { stage, serviceId });
        return this.failure('empty-result', NO_DATA_RECEIVED);
      }

      const payload = decodeResultPayload(result);
      const saved = await this.contentStore.save(stage, STAGE_EXTENSIONS[stage], payload);

      logger.info('Artifact generated', { stage, path: saved.relativePath, sizeBytes: saved.sizeBytes });

      return { success: true, path: saved.relativePath, payload };
    } catch (error) {
      const reason: GenerationFailureReason = error instanceof ExternalServiceError
        ? 'upstream-unavailable'
        : 'unexpected';
      const message = getErrorMessage(error);

      logger.error('Generation failed', { stage, serviceId, reason, error: message });
      return this.failure(reason, message);
    }
  }

  private failure(reason: GenerationFailureReason, error: string): GenerationAttemptResult {
    return { success: false, reason, error };
  }
}

export default GenerationClient;
