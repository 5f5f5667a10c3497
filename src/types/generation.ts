/**
 * Generation Type Definitions
 *
 * Records, stage results and pipeline outcomes
 */

/**
 * Remote generation stages, each backed by its own remote app
 */
export type GenerationStage = 'image' | 'model';

/**
 * Why a remote generation call produced no artifact
 */
export type GenerationFailureReason =
    | 'upstream-unavailable'
    | 'empty-result'
    | 'unexpected';

export interface GenerationSuccess {
    success: true;
    /** Content-store location of the written artifact */
    path: string;
    payload: Buffer;
}

export interface GenerationFailure {
    success: false;
    reason: GenerationFailureReason;
    error: string;
}

/**
 * Outcome of a single remote generation call. Never persisted.
 */
export type GenerationAttemptResult = GenerationSuccess | GenerationFailure;

/**
 * One row of generation history
 */
export interface GenerationRecord {
    id: number;
    createdAt: string;
    userPrompt: string;
    enhancedPrompt: string;
    imagePath: string | null;
    modelPath: string | null;
    tags: string[];
}

/**
 * Fields supplied by the caller when appending a record
 */
export type NewGenerationRecord = Omit<GenerationRecord, 'id' | 'createdAt'>;

/**
 * Options narrowing history queries
 */
export interface HistoryQueryOptions {
    /** Only records created at or after this instant */
    since?: Date;
}

/**
 * Structured outcome of one pipeline run
 */
export interface PipelineResult {
    userPrompt: string;
    enhancedPrompt: string;
    imageGenerated: boolean;
    modelGenerated: boolean;
    imagePath: string | null;
    modelPath: string | null;
    tags: string[];
    /** Id of the history record, null when persistence failed */
    recordId: number | null;
    error: string | null;
}
