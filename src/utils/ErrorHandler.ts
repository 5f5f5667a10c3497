import logger from './logger.js';

/**
 * Standardized error types for the pipeline
 */
export class AppError extends Error {
    statusCode: number;
    isOperational: boolean;
    timestamp: string;

    constructor(message: string, statusCode: number = 500, isOperational: boolean = true) {
        super(message);
        this.name = 'AppError';
        this.statusCode = statusCode;
        this.isOperational = isOperational;
        this.timestamp = new Date().toISOString();
        Error.captureStackTrace(this, this.constructor);
    }
}

export class ValidationError extends AppError {
    details: unknown;

    constructor(message: string, details: unknown = null) {
        super(message, 400);
        this.name = 'ValidationError';
        this.details = details;
    }
}

export class ConfigurationError extends AppError {
    constructor(message: string) {
        super(message, 500, false);
        this.name = 'ConfigurationError';
    }
}

export class DatabaseError extends AppError {
    originalError: unknown;

    constructor(message: string, originalError: unknown = null) {
        super(message, 500);
        this.name = 'DatabaseError';
        this.originalError = originalError;
    }
}

/**
 * A remote or local service could not be reached, answered with a
 * non-success status, or did not answer within its time bound
 */
export class ExternalServiceError extends AppError {
    service: string;
    timedOut: boolean;
    originalError: unknown;

    constructor(service: string, message: string, options: { timedOut?: boolean; originalError?: unknown } = {}) {
        super(`${service} error: ${message}`, 503);
        this.name = 'ExternalServiceError';
        this.service = service;
        this.timedOut = options.timedOut ?? false;
        this.originalError = options.originalError ?? null;
    }
}

/**
 * Extract a human-readable message from anything thrown
 */
export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    if (typeof error === 'string') {
        return error;
    }
    try {
        return JSON.stringify(error) ?? String(error);
    } catch {
        return String(error);
    }
}

/**
 * True when an error came from an aborted fetch (our own timeout)
 */
export function isAbortError(error: unknown): boolean {
    return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

/**
 * Standardized error handler
 */
class ErrorHandler {
    /**
     * Central error handling logic
     * @param error - Error to handle
     * @param context - Additional context
     */
    handleError(error: unknown, context: Record<string, unknown> = {}): void {
        if (error instanceof AppError) {
            if (error.isOperational) {
                logger.warn('Operational error:', {
                    name: error.name,
                    message: error.message,
                    statusCode: error.statusCode,
                    ...context
                });
            } else {
                logger.error('Programming error:', {
                    name: error.name,
                    message: error.message,
                    stack: error.stack,
                    ...context
                });
            }
        } else {
            logger.error('Unexpected error:', {
                message: getErrorMessage(error),
                stack: error instanceof Error ? error.stack : undefined,
                ...context
            });
        }
    }

    /**
     * Handle database errors
     * @param error - Database error
     * @param operation - Operation being performed
     */
    handleDatabaseError(error: unknown, operation: string): never {
        const dbError = error instanceof DatabaseError
            ? error
            : new DatabaseError(`Database ${operation} failed: ${getErrorMessage(error)}`, error);
        this.handleError(dbError, { operation });
        throw dbError;
    }

    /**
     * Validate and throw if invalid
     * @param condition - Validation condition
     * @param message - Error message
     * @param details - Validation details
     */
    validate(condition: boolean, message: string, details: unknown = null): void {
        if (!condition) {
            throw new ValidationError(message, details);
        }
    }
}

export default new ErrorHandler();
