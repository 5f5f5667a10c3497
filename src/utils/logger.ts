import winston from 'winston';
import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';
import LogSanitizer from './LogSanitizer.js';
import { LOG_LEVELS, type LogLevel } from '../types/config.js';

const { combine, timestamp, printf, colorize, json } = winston.format;

// Environment-based configuration, read once when the first module logs
const LOG_MODE: 'text' | 'json' = process.env.LOG_MODE === 'json' ? 'json' : 'text';
const LOG_LEVEL: LogLevel = LOG_LEVELS.find(level => level === process.env.LOG_LEVEL) ?? 'info';
const NODE_ENV = process.env.NODE_ENV || 'development';
const LOG_SILENT = NODE_ENV === 'test' && !process.env.LOG_LEVEL;

const MAX_LOG_FILE_BYTES = 10 * 1024 * 1024;

/**
 * Logger metadata type
 */
export type LogMetadata = Record<string, unknown> | Error;

/** Keys written by the logger itself, never sanitized */
const INTERNAL_KEYS = new Set(['level', 'message', 'timestamp', 'service', 'context', 'correlationId']);

/**
 * Correlation id of the pipeline run the current async call chain belongs to
 */
const correlationStorage = new AsyncLocalStorage<string>();

const attachCorrelationId = winston.format((info) => {
    const correlationId = correlationStorage.getStore();
    if (correlationId) {
        info.correlationId = correlationId;
    }
    return info;
});

const sanitize = winston.format((info) => {
    info.message = LogSanitizer.sanitize(info.message);
    for (const key of Object.keys(info)) {
        if (!INTERNAL_KEYS.has(key)) {
            info[key] = LogSanitizer.sanitize(info[key]);
        }
    }
    return info;
});

/**
 * `time level [context][correlation]: message` plus pretty-printed metadata
 */
const textLine = printf(({ level, message, timestamp: time, context, correlationId, service: _service, ...meta }) => {
    const scope = context ? `[${String(context)}]` : '';
    const run = correlationId ? `[${String(correlationId).substring(0, 8)}]` : '';
    const details = Object.keys(meta).length > 0 ? `\n${JSON.stringify(meta, null, 2)}` : '';

    return `${String(time)} ${level} ${scope}${run}: ${String(message)}${details}`;
});

const fileFormat = LOG_MODE === 'json' ? json() : textLine;

/**
 * Shared winston logger; every Logger is a child of it
 */
const root = winston.createLogger({
    level: LOG_LEVEL,
    silent: LOG_SILENT,
    defaultMeta: { service: 'creative-pipeline' },
    format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
        winston.format.errors({ stack: true }),
        attachCorrelationId(),
        sanitize()
    ),
    transports: [
        new winston.transports.Console({
            format: LOG_MODE === 'json' ? json() : combine(colorize({ all: true }), textLine)
        }),
        ...(NODE_ENV === 'production'
            ? [
                new winston.transports.File({
                    filename: process.env.ERROR_LOG_FILE || 'logs/error.log',
                    level: 'error',
                    maxsize: MAX_LOG_FILE_BYTES,
                    maxFiles: 5,
                    tailable: true,
                    format: fileFormat
                }),
                new winston.transports.File({
                    filename: process.env.LOG_FILE || 'logs/pipeline.log',
                    maxsize: MAX_LOG_FILE_BYTES,
                    maxFiles: 5,
                    tailable: true,
                    format: fileFormat
                })
            ]
            : [])
    ]
});

/**
 * Logger bound to one component name
 */
export class Logger {
    public readonly context: string;
    private readonly target: winston.Logger;

    constructor(context: string = 'pipeline') {
        this.context = context;
        this.target = root.child({ context });
    }

    /**
     * Correlation id of the run in progress, if any
     */
    getCorrelationId(): string | undefined {
        return correlationStorage.getStore();
    }

    /**
     * Run `operation` with its own correlation id. Overlapping runs each
     * keep theirs; the id ends with the operation.
     */
    async withCorrelationId<T>(
        operation: () => Promise<T>,
        correlationId: string | null = null
    ): Promise<T> {
        return correlationStorage.run(correlationId || randomUUID(), operation);
    }

    error(message: string, metadata: LogMetadata = {}): void {
        this.target.error(message, this.toMeta(metadata));
    }

    warn(message: string, metadata: LogMetadata = {}): void {
        this.target.warn(message, this.toMeta(metadata));
    }

    info(message: string, metadata: LogMetadata = {}): void {
        this.target.info(message, this.toMeta(metadata));
    }

    debug(message: string, metadata: LogMetadata = {}): void {
        this.target.debug(message, this.toMeta(metadata));
    }

    /**
     * Time an async operation; slower than `slowThresholdMs` logs a warning
     */
    async measureAsync<T>(
        operation: () => Promise<T>,
        operationName: string,
        slowThresholdMs: number = 1000
    ): Promise<T> {
        const start = Date.now();

        try {
            const result = await operation();
            const elapsed = Date.now() - start;

            if (elapsed > slowThresholdMs) {
                this.warn(`Slow operation: ${operationName}`, { duration: `${elapsed}ms` });
            } else {
                this.debug(`Operation completed: ${operationName}`, { duration: `${elapsed}ms` });
            }

            return result;
        } catch (error) {
            this.error(`Operation failed: ${operationName}`, {
                duration: `${Date.now() - start}ms`,
                error: error instanceof Error ? error.message : String(error)
            });
            throw error;
        }
    }

    private toMeta(metadata: LogMetadata): Record<string, unknown> {
        if (metadata instanceof Error) {
            return { error: metadata.message, name: metadata.name, stack: metadata.stack };
        }
        return metadata;
    }
}

/**
 * Create a namespaced logger
 */
export function createLogger(context: string): Logger {
    return new Logger(context);
}

const defaultLogger = new Logger('pipeline');

export default defaultLogger;
