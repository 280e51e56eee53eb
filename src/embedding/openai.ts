// pattern: Imperative Shell

import OpenAI from 'openai';
import type { EmbeddingConfig } from '../config/schema.ts';
import { EmbeddingError } from './types.ts';
import type { EmbeddingProvider } from './types.ts';

// the embeddings endpoint caps inputs per request
const MAX_BATCH_SIZE = 512;

export function splitBatches<T>(items: ReadonlyArray<T>, size: number): Array<Array<T>> {
  const batches: Array<Array<T>> = [];
  for (let start = 0; start < items.length; start += size) {
    batches.push(items.slice(start, start + size));
  }
  return batches;
}

function toEmbeddingError(error: unknown): unknown {
  if (error instanceof OpenAI.AuthenticationError) {
    return new EmbeddingError('openai', `Authentication failed: ${error.message}`);
  }
  if (error instanceof OpenAI.APIError) {
    return new EmbeddingError('openai', `OpenAI API error: ${error.message}`);
  }
  return error;
}

export function createOpenAIEmbeddingAdapter(config: EmbeddingConfig): EmbeddingProvider {
  const apiKey = config.api_key || process.env['OPENAI_API_KEY'];

  if (!apiKey) {
    throw new Error(
      'OpenAI embedding adapter requires api_key in config or OPENAI_API_KEY environment variable',
    );
  }

  const client = new OpenAI({ apiKey });

  async function request(input: Array<string>): Promise<Array<Array<number>>> {
    let response: OpenAI.CreateEmbeddingResponse;
    try {
      response = await client.embeddings.create({
        model: config.model,
        input,
        dimensions: config.dimensions,
      });
    } catch (error) {
      throw toEmbeddingError(error);
    }

    if (response.data.length !== input.length) {
      throw new EmbeddingError(
        'openai',
        `expected ${input.length} embeddings, got ${response.data.length}`,
      );
    }
    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }

  return {
    async embed(text: string): Promise<Array<number>> {
      const [embedding] = await request([text]);
      if (!embedding) {
        throw new EmbeddingError('openai', 'No embedding returned from OpenAI');
      }
      return embedding;
    },

    async embedBatch(texts: ReadonlyArray<string>): Promise<Array<Array<number>>> {
      const embeddings: Array<Array<number>> = [];
      for (const batch of splitBatches(texts, MAX_BATCH_SIZE)) {
        embeddings.push(...(await request(batch)));
      }
      return embeddings;
    },

    dimensions: config.dimensions,
  };
}
