/**
 * HTTP client for the Ollama API
 */

import { createLogger } from '../utils/logger.js';
import { ExternalServiceError, getErrorMessage, isAbortError } from '../utils/ErrorHandler.js';
import {
  OllamaClientConfig,
  OllamaGenerateRequest,
  OllamaGenerateResponse,
  OllamaTagsResponse,
  TextGenerator,
} from './types.js';

const logger = createLogger('OllamaClient');

const SERVICE_NAME = 'Local LLM';

export class OllamaClient implements TextGenerator {
  private baseUrl: string;
  private model: string;
  private timeout: number;

  constructor(config: OllamaClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, ''); // Remove trailing slash
    this.model = config.model;
    this.timeout = config.timeoutMs;
  }

  /**
   * List installed models; doubles as the health probe
   */
  async listModels(): Promise<OllamaTagsResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), 5000);

    try {
      const response = await fetch(`${this.baseUrl}/api/tags`, {
        method: 'GET',
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new ExternalServiceError(SERVICE_NAME, `health check failed: ${response.status}`);
      }

      return await response.json() as OllamaTagsResponse;
    } catch (error) {
      if (error instanceof ExternalServiceError) throw error;
      if (isAbortError(error)) {
        throw new ExternalServiceError(SERVICE_NAME, 'health check timed out', { timedOut: true, originalError: error });
      }
      throw new ExternalServiceError(SERVICE_NAME, getErrorMessage(error), { originalError: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Generate a completion for a single prompt (non-streaming)
   */
  async generate(prompt: string): Promise<OllamaGenerateResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);
    const request: OllamaGenerateRequest = {
      model: this.model,
      prompt,
      stream: false,
    };

    try {
      logger.debug('Sending generate request to Ollama', {
        model: this.model,
        promptLength: prompt.length,
      });

      const response = await fetch(`${this.baseUrl}/api/generate`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(request),
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorBody = await response.text();
        throw new ExternalServiceError(SERVICE_NAME, `HTTP ${response.status}: ${errorBody.slice(0, 200)}`);
      }

      const result = await response.json() as OllamaGenerateResponse;

      logger.debug('Received response from Ollama', {
        evalCount: result.eval_count,
        totalDurationNs: result.total_duration,
      });

      return result;
    } catch (error) {
      if (error instanceof ExternalServiceError) throw error;
      if (isAbortError(error)) {
        throw new ExternalServiceError(SERVICE_NAME, `request timed out after ${this.timeout}ms`, {
          timedOut: true,
          originalError: error,
        });
      }
      throw new ExternalServiceError(SERVICE_NAME, getErrorMessage(error), { originalError: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Test connection and check the configured model is installed
   */
  async testConnection(): Promise<boolean> {
    try {
      const tags = await this.listModels();
      return tags.models.some((entry) => entry.name === this.model);
    } catch (error) {
      logger.error('Ollama connection test failed', { error: getErrorMessage(error) });
      return false;
    }
  }
}

export default OllamaClient;
