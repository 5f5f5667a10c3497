import test, { describe, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';

import { ContentStore } from '../src/generation/ContentStore.js';
import { GenerationClient } from '../src/generation/GenerationClient.js';
import { HistoryStore } from '../src/services/HistoryStore.js';
import {
  PipelineOrchestrator,
  buildHistoryContext,
  type Enhancer,
  type GenerationHistory
} from '../src/pipeline/PipelineOrchestrator.js';
import { PromptEnhancer } from '../src/pipeline/PromptEnhancer.js';
import { TagExtractor } from '../src/pipeline/TagExtractor.js';
import { ExternalServiceError } from '../src/utils/ErrorHandler.js';
import type { PipelineContext } from '../src/types/config.js';
import type { GenerationRecord } from '../src/types/generation.js';
import type { OllamaGenerateResponse } from '../src/llm/types.js';
import { FakeTextGenerator, FakeTransport, makeTempDir, removeDir } from './helpers/fakes.js';

const CONTEXT: PipelineContext = {
  defaultUserId: 'super-user',
  historySearchLimit: 3,
  historyContextSize: 2
};

const IMAGE_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a]);
const MESH = '# obj file\nv 0.0 1.0 2.0';

class RecordingEnhancer implements Enhancer {
  readonly calls: Array<{ prompt: string; context: string }> = [];

  async enhance(prompt: string, context: string): Promise<string> {
    this.calls.push({ prompt, context });
    return `${prompt} in watercolor`;
  }
}

class BrokenHistory implements GenerationHistory {
  search(): GenerationRecord[] {
    throw new Error('disk I/O error');
  }

  insert(): number {
    throw new Error('disk I/O error');
  }
}

describe('PipelineOrchestrator', () => {
  let dir: string;
  let transport: FakeTransport;
  let history: HistoryStore;
  let generator: GenerationClient;

  beforeEach(() => {
    dir = makeTempDir('pipeline');
    transport = new FakeTransport();
    history = new HistoryStore(':memory:');
    generator = new GenerationClient({
      transport,
      contentStore: new ContentStore({ basePath: path.join(dir, 'outputs') }),
      textToImageAppId: 'image-app',
      imageTo3dAppId: 'model-app'
    });
  });

  afterEach(() => {
    history.close();
    removeDir(dir);
  });

  const pipelineWith = (llm: OllamaGenerateResponse | Error) => new PipelineOrchestrator(
    {
      history,
      enhancer: new PromptEnhancer(new FakeTextGenerator(llm), { promptsPath: path.join(dir, 'no-prompts') }),
      generator,
      tagExtractor: new TagExtractor()
    },
    CONTEXT
  );

  const queueSuccess = () => {
    transport.reply('image-app', { result: IMAGE_BYTES.toString('base64') });
    transport.reply('model-app', { result: MESH });
  };

  test('a full run produces both artifacts and records them', async () => {
    queueSuccess();

    const result = await pipelineWith({ response: 'A detailed red dragon at sunset' }).run('a dragon');

    assert.equal(result.userPrompt, 'a dragon');
    assert.equal(result.enhancedPrompt, 'A detailed red dragon at sunset');
    assert.equal(result.imageGenerated, true);
    assert.equal(result.modelGenerated, true);
    assert.equal(result.error, null);
    assert.deepEqual(result.tags, ['detailed', 'dragon', 'sunset']);
    assert.ok(result.imagePath && fs.existsSync(result.imagePath));
    assert.ok(result.modelPath && fs.existsSync(result.modelPath));
    assert.equal(fs.readFileSync(result.modelPath, 'utf8'), MESH);

    assert.ok(result.recordId !== null);
    const stored = history.getById(result.recordId);
    assert.ok(stored);
    assert.equal(stored.userPrompt, 'a dragon');
    assert.equal(stored.enhancedPrompt, 'A detailed red dragon at sunset');
    assert.equal(stored.imagePath, result.imagePath);
    assert.equal(stored.modelPath, result.modelPath);
    assert.deepEqual(stored.tags, ['detailed', 'dragon', 'sunset']);
  });

  test('the model stage receives the image bytes', async () => {
    queueSuccess();

    await pipelineWith({ response: 'enhanced' }).run('prompt');

    assert.deepEqual(transport.calls.map(call => call.appId), ['image-app', 'model-app']);
    assert.deepEqual(transport.calls[1].request, { image: IMAGE_BYTES.toString('base64') });
  });

  test('an unreachable LLM leaves the prompt as given', async () => {
    queueSuccess();

    const result = await pipelineWith(new ExternalServiceError('Local LLM', 'connect ECONNREFUSED')).run('a cat');

    assert.equal(result.enhancedPrompt, 'a cat');
    assert.deepEqual(transport.calls[0].request, { prompt: 'a cat' });
    assert.equal(result.imageGenerated, true);
    assert.equal(result.error, null);
    assert.equal(history.getById(result.recordId ?? -1)?.enhancedPrompt, 'a cat');
  });

  test('an image without data skips the model stage and is still recorded', async () => {
    transport.reply('image-app', {});

    const result = await pipelineWith({ response: 'A castle on a hill' }).run('a castle');

    assert.equal(result.imageGenerated, false);
    assert.equal(result.modelGenerated, false);
    assert.equal(result.imagePath, null);
    assert.equal(result.modelPath, null);
    assert.equal(result.error, 'Image generation failed: no data received');
    assert.equal(transport.calls.length, 1);

    const stored = history.getById(result.recordId ?? -1);
    assert.ok(stored);
    assert.equal(stored.imagePath, null);
    assert.equal(stored.modelPath, null);
    assert.deepEqual(stored.tags, ['castle', 'hill']);
  });

  test('a failed model keeps the image', async () => {
    transport.reply('image-app', { result: IMAGE_BYTES.toString('base64') });
    transport.reply('model-app', new ExternalServiceError('model-app', 'connection reset'));

    const result = await pipelineWith({ response: 'enhanced' }).run('a tree');

    assert.equal(result.imageGenerated, true);
    assert.ok(result.imagePath && fs.existsSync(result.imagePath));
    assert.equal(result.modelGenerated, false);
    assert.equal(result.modelPath, null);
    assert.equal(result.error, '3D model generation failed: model-app error: connection reset');

    const stored = history.getById(result.recordId ?? -1);
    assert.equal(stored?.imagePath, result.imagePath);
    assert.equal(stored?.modelPath, null);
  });

  test('past matches are quoted as context for the enhancer', async () => {
    for (const prompt of ['a cat on a mat', 'black cat', 'cat nap']) {
      history.insert({ userPrompt: prompt, enhancedPrompt: 'x', imagePath: null, modelPath: null, tags: [] });
    }
    transport.reply('image-app', {});
    const enhancer = new RecordingEnhancer();

    const pipeline = new PipelineOrchestrator(
      { history, enhancer, generator, tagExtractor: new TagExtractor() },
      CONTEXT
    );
    const result = await pipeline.run('cat');

    assert.deepEqual(enhancer.calls, [{ prompt: 'cat', context: 'Similar past requests: "cat nap", "black cat"' }]);
    assert.equal(result.enhancedPrompt, 'cat in watercolor');
  });

  test('past matches in any letter case feed the context', async () => {
    history.insert({ userPrompt: 'Ñandú running', enhancedPrompt: 'x', imagePath: null, modelPath: null, tags: [] });
    transport.reply('image-app', {});
    const enhancer = new RecordingEnhancer();

    const pipeline = new PipelineOrchestrator(
      { history, enhancer, generator, tagExtractor: new TagExtractor() },
      CONTEXT
    );
    await pipeline.run('ñandú');

    assert.equal(enhancer.calls[0].context, 'Similar past requests: "Ñandú running"');
  });

  test('a history failure is reported without losing the artifacts', async () => {
    queueSuccess();
    const enhancer = new RecordingEnhancer();

    const pipeline = new PipelineOrchestrator(
      { history: new BrokenHistory(), enhancer, generator, tagExtractor: new TagExtractor() },
      CONTEXT
    );
    const result = await pipeline.run('a boat');

    assert.equal(enhancer.calls[0].context, '');
    assert.equal(result.imageGenerated, true);
    assert.equal(result.modelGenerated, true);
    assert.equal(result.recordId, null);
    assert.equal(result.error, 'Failed to save generation history: disk I/O error');
  });

  test('an enhancer that throws still yields a recorded result', async () => {
    const pipeline = new PipelineOrchestrator(
      {
        history,
        enhancer: { enhance: async () => { throw new Error('kaboom'); } },
        generator,
        tagExtractor: new TagExtractor()
      },
      CONTEXT
    );

    const result = await pipeline.run('a lighthouse');

    assert.equal(result.error, 'Pipeline error: kaboom');
    assert.equal(result.enhancedPrompt, 'a lighthouse');
    assert.equal(transport.calls.length, 0);
    assert.equal(history.getById(result.recordId ?? -1)?.userPrompt, 'a lighthouse');
  });

  test('the user id defaults to the configured one', async () => {
    transport.reply('image-app', {}, {});
    const pipeline = pipelineWith({ response: 'enhanced' });

    await pipeline.run('first');
    await pipeline.run('second', 'alice');

    assert.deepEqual(transport.calls.map(call => call.userId), ['super-user', 'alice']);
  });

  test('recorded model paths always come with an image path', async () => {
    queueSuccess();
    transport.reply('image-app', {});
    transport.reply('image-app', { result: IMAGE_BYTES.toString('base64') });
    transport.reply('model-app', {});
    const pipeline = pipelineWith({ response: 'enhanced' });

    await pipeline.run('one');
    await pipeline.run('two');
    await pipeline.run('three');

    const records = history.listRecent();
    assert.equal(records.length, 3);
    for (const record of records) {
      assert.ok(record.modelPath === null || record.imagePath !== null);
    }
  });
});

test('buildHistoryContext quotes the first matches', () => {
  const match = (id: number, userPrompt: string): GenerationRecord => ({
    id,
    createdAt: '2024-01-01T00:00:00.000Z',
    userPrompt,
    enhancedPrompt: '',
    imagePath: null,
    modelPath: null,
    tags: []
  });

  assert.equal(buildHistoryContext([], 2), '');
  assert.equal(
    buildHistoryContext([match(3, 'say "hi"'), match(2, 'b'), match(1, 'c')], 2),
    'Similar past requests: "say \\"hi\\"", "b"'
  );
});
