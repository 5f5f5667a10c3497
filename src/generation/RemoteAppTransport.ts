/**
 * HTTP transport for remote generation apps
 */

import fetch, { Response } from 'node-fetch';
import { createLogger } from '../utils/logger.js';
import { ExternalServiceError, getErrorMessage, isAbortError } from '../utils/ErrorHandler.js';

const logger = createLogger('RemoteAppTransport');

/**
 * Decoded body of a remote app response. Binary bodies arrive as
 * `{ result: Buffer }`.
 */
export type RemoteAppResponse = Record<string, unknown>;

/**
 * Anything able to execute a request against a remote app.
 * Throws ExternalServiceError when the app cannot be reached or refuses.
 */
export interface GenerationTransport {
  call(appId: string, request: Record<string, unknown>, userId: string): Promise<RemoteAppResponse>;
}

export interface RemoteAppTransportConfig {
  /** Apps live at https://{appId}.{domain} */
  domain: string;
  timeoutMs: number;
  apiKey?: string;
  /** Overrides the URL scheme above */
  appUrl?: (appId: string) => string;
}

function isRecord(value: unknown): value is RemoteAppResponse {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class RemoteAppTransport implements GenerationTransport {
  private domain: string;
  private timeout: number;
  private apiKey?: string;
  private appUrl?: (appId: string) => string;

  constructor(config: RemoteAppTransportConfig) {
    this.domain = config.domain;
    this.timeout = config.timeoutMs;
    this.apiKey = config.apiKey;
    this.appUrl = config.appUrl;
  }

  /**
   * Base URL of an app, without trailing slash
   */
  appBaseUrl(appId: string): string {
    const url = this.appUrl ? this.appUrl(appId) : `https://${appId}.${this.domain}`;
    return url.replace(/\/$/, '');
  }

  async call(appId: string, request: Record<string, unknown>, userId: string): Promise<RemoteAppResponse> {
    const url = `${this.appBaseUrl(appId)}/execution`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'Accept': 'application/json, application/octet-stream',
      'X-User-Id': userId
    };
    if (this.apiKey) {
      headers['Authorization'] = `Bearer ${this.apiKey}`;
    }

    logger.debug('Calling remote app', { appId, fields: Object.keys(request) });

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers,
        body: JSON.stringify(request),
        signal: controller.signal
      });
    } catch (error) {
      clearTimeout(timeoutId);
      if (isAbortError(error)) {
        throw new ExternalServiceError(appId, `request timed out after ${this.timeout}ms`, {
          timedOut: true,
          originalError: error
        });
      }
      throw new ExternalServiceError(appId, getErrorMessage(error), { originalError: error });
    }

    try {
      if (!response.ok) {
        const errorBody = await response.text();
        throw new ExternalServiceError(appId, `HTTP ${response.status}: ${errorBody.slice(0, 200)}`);
      }

      const contentType = response.headers.get('content-type') ?? '';
      if (contentType.includes('json')) {
        const body: unknown = await response.json();
        return isRecord(body) ? body : { result: body };
      }

      const bytes = Buffer.from(await response.arrayBuffer());
      logger.debug('Remote app returned binary body', { appId, sizeBytes: bytes.length, contentType });
      return { result: bytes };
    } catch (error) {
      if (error instanceof ExternalServiceError) throw error;
      if (isAbortError(error)) {
        throw new ExternalServiceError(appId, `response timed out after ${this.timeout}ms`, {
          timedOut: true,
          originalError: error
        });
      }
      throw new ExternalServiceError(appId, `unreadable response: ${getErrorMessage(error)}`, { originalError: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

export default RemoteAppTransport;
