import test, { describe } from 'node:test';
import assert from 'node:assert/strict';

import {
    DEFAULT_IMAGE_TO_3D_APP_ID,
    DEFAULT_TEXT_TO_IMAGE_APP_ID,
    describeConfig,
    loadConfig
} from '../src/utils/config.js';
import { ConfigValidator } from '../src/utils/ConfigValidator.js';
import { ConfigurationError } from '../src/utils/ErrorHandler.js';

describe('loadConfig', () => {
    test('applies defaults to an empty environment', () => {
        const config = loadConfig({});

        assert.deepEqual(config.llm, {
            baseUrl: 'http://localhost:11434',
            model: 'deepseek-r1:1.5b',
            timeoutMs: 30000,
            promptsPath: './prompts'
        });
        assert.deepEqual(config.remoteApps, {
            textToImageAppId: DEFAULT_TEXT_TO_IMAGE_APP_ID,
            imageTo3dAppId: DEFAULT_IMAGE_TO_3D_APP_ID,
            domain: 'node3.openfabric.network',
            timeoutMs: 120000,
            apiKey: undefined
        });
        assert.deepEqual(config.storage, { outputDir: 'outputs', historyDbPath: 'data/ai_memory.db' });
        assert.deepEqual(config.pipeline, { defaultUserId: 'super-user', historySearchLimit: 3, historyContextSize: 2 });
    });

    test('reads overrides from the environment', () => {
        const config = loadConfig({
            OLLAMA_URL: 'http://llm.internal:8080/',
            OLLAMA_MODEL: ' llama3 ',
            GENERATION_TIMEOUT_MS: '5000',
            TEXT_TO_IMAGE_APP_ID: 'image-app',
            OPENFABRIC_API_KEY: 'test-secret',
            OUTPUT_DIR: '/tmp/out',
            DEFAULT_USER_ID: 'alice'
        });

        assert.equal(config.llm.baseUrl, 'http://llm.internal:8080');
        assert.equal(config.llm.model, 'llama3');
        assert.equal(config.remoteApps.timeoutMs, 5000);
        assert.equal(config.remoteApps.textToImageAppId, 'image-app');
        assert.equal(config.remoteApps.apiKey, 'test-secret');
        assert.equal(config.storage.outputDir, '/tmp/out');
        assert.equal(config.pipeline.defaultUserId, 'alice');
    });

    test('rejects timeouts that are not positive integers', () => {
        for (const raw of ['0', '-5', '1.5', 'soon']) {
            assert.throws(
                () => loadConfig({ GENERATION_TIMEOUT_MS: raw }),
                (error: unknown) => error instanceof ConfigurationError
                    && error.message === `Invalid GENERATION_TIMEOUT_MS: must be a positive integer. Got: ${raw}`
            );
        }
    });

    test('returns a frozen object', () => {
        assert.ok(Object.isFrozen(loadConfig({})));
    });

    test('describeConfig hides the API key', () => {
        const described = describeConfig(loadConfig({ OPENFABRIC_API_KEY: 'test-secret' }));

        assert.deepEqual(described['remoteApps'], {
            textToImageAppId: DEFAULT_TEXT_TO_IMAGE_APP_ID,
            imageTo3dAppId: DEFAULT_IMAGE_TO_3D_APP_ID,
            domain: 'node3.openfabric.network',
            timeoutMs: 120000,
            apiKey: '[REDACTED]'
        });
    });
});

describe('ConfigValidator', () => {
    test('an empty environment is valid with a warning about the API key', () => {
        const result = new ConfigValidator({}).validate();

        assert.equal(result.valid, true);
        assert.deepEqual(result.errors, []);
        assert.deepEqual(result.warnings, ['Optional OPENFABRIC_API_KEY not set (API key for the remote generation apps)']);
    });

    test('reports malformed values as errors', () => {
        const result = new ConfigValidator({
            OLLAMA_URL: 'not a url',
            ENHANCE_TIMEOUT_MS: 'fast',
            OPENFABRIC_API_KEY: 'test-secret'
        }).validate();

        assert.equal(result.valid, false);
        assert.deepEqual(result.errors, [
            'Invalid OLLAMA_URL: must be a valid URL (Local LLM base URL). Got: not a url. Default: http://localhost:11434',
            'Invalid ENHANCE_TIMEOUT_MS: must be a positive integer (Prompt enhancement timeout (ms)). Got: fast'
        ]);
    });

    test('warns about unknown logging choices', () => {
        const result = new ConfigValidator({ OPENFABRIC_API_KEY: 'test-secret', LOG_MODE: 'xml' }).validate();

        assert.equal(result.valid, true);
        assert.deepEqual(result.warnings, ['Unknown LOG_MODE "xml", expected one of: text, json']);
    });
});
