// pattern: Imperative Shell

import { describe, it, expect, afterEach } from 'vitest';
import { createOpenAIEmbeddingAdapter, splitBatches } from './openai.ts';
import type { EmbeddingConfig } from '../config/schema.ts';

const config: EmbeddingConfig = {
  provider: 'openai',
  model: 'text-embedding-3-small',
  dimensions: 768,
};

describe('OpenAI embedding adapter', () => {
  const savedKey = process.env['OPENAI_API_KEY'];

  afterEach(() => {
    if (savedKey === undefined) {
      delete process.env['OPENAI_API_KEY'];
    } else {
      process.env['OPENAI_API_KEY'] = savedKey;
    }
  });

  it('should require an API key', () => {
    delete process.env['OPENAI_API_KEY'];

    expect(() => createOpenAIEmbeddingAdapter(config)).toThrow(
      'OpenAI embedding adapter requires api_key in config or OPENAI_API_KEY environment variable',
    );
  });

  it('should take the key from the environment', () => {
    process.env['OPENAI_API_KEY'] = 'test-key';

    const adapter = createOpenAIEmbeddingAdapter(config);

    expect(adapter.dimensions).toBe(768);
  });

  it('should resolve an empty batch without a request', async () => {
    const adapter = createOpenAIEmbeddingAdapter({ ...config, api_key: 'test-key' });

    expect(await adapter.embedBatch([])).toEqual([]);
  });
});

describe('splitBatches', () => {
  it('should split into consecutive batches of at most the given size', () => {
    expect(splitBatches(['a', 'b', 'c', 'd', 'e'], 2)).toEqual([['a', 'b'], ['c', 'd'], ['e']]);
  });

  it('should return no batches for no items', () => {
    expect(splitBatches([], 3)).toEqual([]);
  });
});
