/**
 * Configuration Type Definitions
 *
 * Types for environment variables and pipeline configuration
 */

/**
 * Environment variables
 */
export interface PipelineEnvironment {
    // Local text-generation service
    OLLAMA_URL?: string;
    OLLAMA_MODEL?: string;
    ENHANCE_TIMEOUT_MS?: string;

    // Remote generation apps
    TEXT_TO_IMAGE_APP_ID?: string;
    IMAGE_TO_3D_APP_ID?: string;
    REMOTE_APP_DOMAIN?: string;
    GENERATION_TIMEOUT_MS?: string;
    OPENFABRIC_API_KEY?: string;

    // Storage
    OUTPUT_DIR?: string;
    HISTORY_DB_PATH?: string;
    PROMPTS_PATH?: string;

    // Pipeline
    DEFAULT_USER_ID?: string;

    // Logging configuration
    LOG_MODE?: string;
    LOG_LEVEL?: string;
    LOG_FILE?: string;
    ERROR_LOG_FILE?: string;
    NODE_ENV?: string;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Local LLM settings
 */
export interface LLMConfig {
    baseUrl: string;
    model: string;
    timeoutMs: number;
    promptsPath: string;
}

/**
 * Remote generation app settings
 */
export interface RemoteAppsConfig {
    textToImageAppId: string;
    imageTo3dAppId: string;
    domain: string;
    timeoutMs: number;
    apiKey?: string;
}

/**
 * Local persistence settings
 */
export interface StorageConfig {
    outputDir: string;
    historyDbPath: string;
}

/**
 * Request-scoped pipeline settings handed to the orchestrator
 */
export interface PipelineContext {
    defaultUserId: string;
    /** Number of history matches fetched for prompt context */
    historySearchLimit: number;
    /** Number of matches actually quoted in the context string */
    historyContextSize: number;
}

/**
 * Complete pipeline configuration with defaults applied
 */
export interface PipelineConfig {
    llm: LLMConfig;
    remoteApps: RemoteAppsConfig;
    storage: StorageConfig;
    pipeline: PipelineContext;
}
