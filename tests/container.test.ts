import test, { describe, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';

import { createServices, serviceTargets, type PipelineServices } from '../src/container.js';
import { DEFAULT_IMAGE_TO_3D_APP_ID, DEFAULT_TEXT_TO_IMAGE_APP_ID, loadConfig } from '../src/utils/config.js';
import { FakeTextGenerator, FakeTransport, makeTempDir, removeDir } from './helpers/fakes.js';

describe('createServices', () => {
  let dir: string;
  let transport: FakeTransport;
  let services: PipelineServices;

  beforeEach(() => {
    dir = makeTempDir('container');
    transport = new FakeTransport();
    const config = loadConfig({
      HISTORY_DB_PATH: ':memory:',
      OUTPUT_DIR: path.join(dir, 'outputs'),
      PROMPTS_PATH: path.join(dir, 'prompts'),
      TEXT_TO_IMAGE_APP_ID: 'image-app',
      IMAGE_TO_3D_APP_ID: 'model-app',
      DEFAULT_USER_ID: 'tester'
    });
    services = createServices(config, {
      textGenerator: new FakeTextGenerator({ response: 'A glowing lantern at dusk' }),
      transport
    });
  });

  afterEach(() => {
    services.close();
    removeDir(dir);
  });

  test('wires a working pipeline from configuration', async () => {
    transport.reply('image-app', { result: Buffer.from('png bytes').toString('base64') });
    transport.reply('model-app', { result: '# obj file\nv 0.0 1.0 2.0' });

    const result = await services.orchestrator.run('a lantern');

    assert.equal(result.enhancedPrompt, 'A glowing lantern at dusk');
    assert.equal(result.imageGenerated, true);
    assert.equal(result.modelGenerated, true);
    assert.deepEqual(transport.calls.map(call => call.userId), ['tester', 'tester']);
    assert.ok(result.imagePath?.startsWith(path.join(dir, 'outputs')));

    assert.equal(services.historyStore.count(), 1);
    assert.deepEqual(services.historyStore.search('lantern').map(record => record.id), [result.recordId]);
    assert.deepEqual((await services.contentStore.getStats()).filesPerExtension, { png: 1, obj: 1 });
  });
});

test('serviceTargets probes the LLM and both remote apps', () => {
  const targets = serviceTargets(loadConfig({}));

  assert.deepEqual(targets, [
    { name: 'Local LLM (Ollama)', url: 'http://localhost:11434/api/tags', critical: false },
    { name: 'Text to Image app', url: `https://${DEFAULT_TEXT_TO_IMAGE_APP_ID}.node3.openfabric.network/health` },
    { name: 'Image to 3D app', url: `https://${DEFAULT_IMAGE_TO_3D_APP_ID}.node3.openfabric.network/health` }
  ]);
});
