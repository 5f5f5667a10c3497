/**
 * Log Sanitizer - Keeps credentials and generated payloads out of logs
 * Masks API keys and tokens, and collapses long base64 blobs to a placeholder
 */

interface SanitizationPattern {
    regex: RegExp;
    replacement: string | ((match: string) => string);
}

/** Shortest run of base64 characters treated as an embedded payload */
const MIN_BLOB_LENGTH = 256;

class LogSanitizer {
    private readonly patterns: SanitizationPattern[];

    constructor() {
        this.patterns = [
            // API Keys and Tokens
            { regex: /(apikey|api_key|api-key)["']?\s*[:=]\s*["']?([a-zA-Z0-9_\-]{16,})["']?/gi, replacement: '$1=[REDACTED]' },
            { regex: /(token|access_token|refresh_token)["']?\s*[:=]\s*["']?([a-zA-Z0-9_\-.]{16,})["']?/gi, replacement: '$1=[REDACTED]' },
            { regex: /(bearer\s+)([a-zA-Z0-9_\-.]{16,})/gi, replacement: '$1[REDACTED]' },

            // URLs with embedded credentials
            { regex: /(https?):\/\/([^:/\s]+):([^@\s]+)@/gi, replacement: '$1://$2:[REDACTED]@' },

            // Data URLs and bare base64 payloads
            { regex: /data:[\w.+-]+\/[\w.+-]+;base64,[A-Za-z0-9+/=]+/g, replacement: (match: string) => `[data-url ${match.length} chars]` },
            { regex: new RegExp(`[A-Za-z0-9+/]{${MIN_BLOB_LENGTH},}={0,2}`, 'g'), replacement: (match: string) => `[base64 ${match.length} chars]` }
        ];
    }

    /**
     * Sanitize a string by removing/masking sensitive data
     */
    sanitize(text: unknown): unknown {
        if (typeof text !== 'string') {
            return this._sanitizeObject(text);
        }

        let sanitized = text;
        for (const { regex, replacement } of this.patterns) {
            if (typeof replacement === 'function') {
                sanitized = sanitized.replace(regex, replacement);
            } else {
                sanitized = sanitized.replace(regex, replacement);
            }
        }
        return sanitized;
    }

    /**
     * Sanitize an object by recursively sanitizing all string values
     */
    private _sanitizeObject(obj: unknown): unknown {
        if (obj === null || obj === undefined) {
            return obj;
        }

        if (Buffer.isBuffer(obj) || obj instanceof Uint8Array) {
            return `[binary ${obj.byteLength} bytes]`;
        }

        if (Array.isArray(obj)) {
            return obj.map(item => this._sanitizeObject(item));
        }

        if (obj instanceof Error) {
            return this.sanitizeError(obj);
        }

        if (obj instanceof Date) {
            return obj.toISOString();
        }

        if (typeof obj === 'object') {
            const sanitized: Record<string, unknown> = {};
            for (const [key, value] of Object.entries(obj)) {
                if (this._isSensitiveKey(key)) {
                    sanitized[key] = '[REDACTED]';
                } else if (typeof value === 'string') {
                    sanitized[key] = this.sanitize(value);
                } else if (typeof value === 'object') {
                    sanitized[key] = this._sanitizeObject(value);
                } else {
                    sanitized[key] = value;
                }
            }
            return sanitized;
        }

        return obj;
    }

    /**
     * Check if a key name suggests sensitive data
     */
    private _isSensitiveKey(key: string): boolean {
        const lowerKey = key.toLowerCase();
        const sensitiveKeys = [
            'password', 'secret', 'apikey', 'api_key', 'token',
            'private_key', 'cookie', 'authorization'
        ];

        return sensitiveKeys.some(sensitiveKey => lowerKey.includes(sensitiveKey));
    }

    /**
     * Sanitize environment variables for logging
     */
    sanitizeEnv(env: NodeJS.ProcessEnv = process.env): Record<string, string | undefined> {
        const sanitized: Record<string, string | undefined> = {};

        for (const [key, value] of Object.entries(env)) {
            sanitized[key] = this._isSensitiveKey(key) ? '[REDACTED]' : value;
        }

        return sanitized;
    }

    /**
     * Sanitize error objects for logging
     */
    sanitizeError(error: Error): Record<string, unknown> {
        const code = 'code' in error ? error.code : undefined;

        return {
            name: error.name,
            message: this.sanitize(error.message),
            stack: error.stack ? this.sanitize(error.stack) : undefined,
            code
        };
    }
}

export default new LogSanitizer();
