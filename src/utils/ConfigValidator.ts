import logger from './logger.js';
import type { PipelineEnvironment } from '../types/config.js';

/**
 * Configuration validation result
 */
export interface ValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
}

/**
 * Configuration validator for environment variables
 * Checks the pipeline settings before a command runs
 */
export class ConfigValidator {
    private env: PipelineEnvironment;
    private errors: string[];
    private warnings: string[];

    constructor(env: PipelineEnvironment = process.env) {
        this.env = env;
        this.errors = [];
        this.warnings = [];
    }

    /**
     * Validate all pipeline environment variables
     */
    validate(): ValidationResult {
        this.errors = [];
        this.warnings = [];

        // Local text-generation service
        this._validateUrl('OLLAMA_URL', 'Local LLM base URL', 'http://localhost:11434');
        this._validateNumeric('ENHANCE_TIMEOUT_MS', 'Prompt enhancement timeout (ms)');

        // Remote generation apps
        this._validateOptional('OPENFABRIC_API_KEY', 'API key for the remote generation apps');
        this._validateNumeric('GENERATION_TIMEOUT_MS', 'Remote generation timeout (ms)');

        // Logging
        this._validateChoice('LOG_MODE', ['text', 'json']);
        this._validateChoice('LOG_LEVEL', ['debug', 'info', 'warn', 'error']);

        return {
            valid: this.errors.length === 0,
            errors: this.errors,
            warnings: this.warnings
        };
    }

    /**
     * Warn when an optional environment variable is missing
     */
    private _validateOptional(key: keyof PipelineEnvironment, description: string, defaultValue: string | null = null): boolean {
        if (!this.env[key]) {
            const message = defaultValue
                ? `Optional ${key} not set (${description}). Using default: ${defaultValue}`
                : `Optional ${key} not set (${description})`;
            this.warnings.push(message);
            return false;
        }
        return true;
    }

    /**
     * Validate numeric environment variable (unset is fine)
     */
    private _validateNumeric(key: keyof PipelineEnvironment, description: string): boolean {
        const raw = this.env[key];
        if (!raw) {
            return true;
        }

        const value = Number(raw);
        if (!Number.isInteger(value) || value <= 0) {
            this.errors.push(`Invalid ${key}: must be a positive integer (${description}). Got: ${raw}`);
            return false;
        }

        return true;
    }

    /**
     * Validate URL format (unset falls back to the default)
     */
    private _validateUrl(key: keyof PipelineEnvironment, description: string, defaultValue: string): boolean {
        const raw = this.env[key];
        if (!raw) {
            return true;
        }

        try {
            new URL(raw);
            return true;
        } catch {
            this.errors.push(`Invalid ${key}: must be a valid URL (${description}). Got: ${raw}. Default: ${defaultValue}`);
            return false;
        }
    }

    private _validateChoice(key: keyof PipelineEnvironment, choices: string[]): boolean {
        const raw = this.env[key];
        if (!raw || choices.includes(raw)) {
            return true;
        }

        this.warnings.push(`Unknown ${key} "${raw}", expected one of: ${choices.join(', ')}`);
        return false;
    }

    /**
     * Print validation results
     */
    printResults(result: ValidationResult): boolean {
        if (result.warnings.length > 0) {
            logger.warn('Configuration warnings:');
            result.warnings.forEach(warning => logger.warn(`  ⚠️  ${warning}`));
        }

        if (result.errors.length > 0) {
            logger.error('Configuration validation failed:');
            result.errors.forEach(error => logger.error(`  ❌ ${error}`));
            return false;
        }

        logger.debug('✅ Configuration validation passed');
        return true;
    }
}

export default ConfigValidator;
