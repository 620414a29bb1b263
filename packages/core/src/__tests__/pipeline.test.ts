import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { loadConfig } from '../config.js';
import { OpenAIProvider } from '../llm/openai.js';
import { createPipeline } from '../pipeline.js';

describe('createPipeline without an OpenAI key', () => {
  let savedKey: string | undefined;

  beforeEach(() => {
    savedKey = process.env.OPENAI_API_KEY;
    delete process.env.OPENAI_API_KEY;
  });

  afterEach(() => {
    if (savedKey !== undefined) process.env.OPENAI_API_KEY = savedKey;
  });

  it('builds every component with keyword search', async () => {
    const pipeline = createPipeline(loadConfig({ LOG_LEVEL: 'silent' }));
    assert.equal(pipeline.registry.size(), 0);
    await pipeline.registry.closeAll();
  });

  it('builds with embedding search', () => {
    assert.doesNotThrow(() => createPipeline(loadConfig({ LOG_LEVEL: 'silent', TABLE_SEARCH: 'embedding' })));
  });

  it('reports the missing key on the first completion', async () => {
    const provider = new OpenAIProvider();
    await assert.rejects(provider.complete('How many customers?', { stage: 'generation' }), {
      code: 'CONFIG_ERROR',
      message: 'OpenAI API key is not configured. Set OPENAI_API_KEY in your environment.',
    });
  });
});
