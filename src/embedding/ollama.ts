// pattern: Imperative Shell

import { z } from 'zod';
import type { EmbeddingConfig } from '../config/schema.ts';
import { EmbeddingError } from './types.ts';
import type { EmbeddingProvider } from './types.ts';

const DEFAULT_OLLAMA_ENDPOINT = 'http://localhost:11434';

const OllamaEmbedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

export function createOllamaEmbeddingAdapter(config: EmbeddingConfig): EmbeddingProvider {
  const endpoint = (config.endpoint || DEFAULT_OLLAMA_ENDPOINT).replace(/\/+$/, '');

  async function request(input: string | Array<string>): Promise<Array<Array<number>>> {
    let response: Response;
    try {
      response = await fetch(`${endpoint}/api/embed`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model: config.model, input }),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new EmbeddingError('ollama', `Failed to connect to Ollama at ${endpoint}: ${message}`);
    }

    if (!response.ok) {
      throw new EmbeddingError('ollama', `Ollama API error: ${response.status} ${response.statusText}`);
    }

    const parsed = OllamaEmbedResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new EmbeddingError('ollama', 'No embeddings returned from Ollama');
    }
    return parsed.data.embeddings;
  }

  return {
    async embed(text: string): Promise<Array<number>> {
      const [embedding] = await request(text);
      if (!embedding) {
        throw new EmbeddingError('ollama', 'No embedding returned from Ollama');
      }
      return embedding;
    },

    async embedBatch(texts: ReadonlyArray<string>): Promise<Array<Array<number>>> {
      if (texts.length === 0) {
        return [];
      }
      const embeddings = await request(Array.from(texts));
      if (embeddings.length !== texts.length) {
        throw new EmbeddingError(
          'ollama',
          `expected ${texts.length} embeddings, got ${embeddings.length}`,
        );
      }
      return embeddings;
    },

    dimensions: config.dimensions,
  };
}
