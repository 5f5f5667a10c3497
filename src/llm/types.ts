/**
 * Local text-generation service type definitions
 */

export interface OllamaClientConfig {
  /** Base URL of the Ollama API server */
  baseUrl: string;

  /** Model used for generation */
  model: string;

  /** Timeout for generate requests in ms */
  timeoutMs: number;
}

export interface OllamaGenerateRequest {
  model: string;
  prompt: string;
  stream: false;
}

export interface OllamaGenerateResponse {
  model?: string;
  response?: string;
  done?: boolean;
  total_duration?: number;
  eval_count?: number;
}

export interface OllamaModelTag {
  name: string;
  size?: number;
  modified_at?: string;
}

export interface OllamaTagsResponse {
  models: OllamaModelTag[];
}

/**
 * Text generation as seen by the prompt enhancer
 */
export interface TextGenerator {
  generate(prompt: string): Promise<OllamaGenerateResponse>;
}
