// pattern: Functional Core

/**
 * Port for text embedding. The content store and the ingestion pipeline
 * depend on this; the OpenAI and Ollama adapters implement it.
 */

export interface EmbeddingProvider {
  embed(text: string): Promise<Array<number>>;
  embedBatch(texts: ReadonlyArray<string>): Promise<Array<Array<number>>>;
  dimensions: number;
}

export class EmbeddingError extends Error {
  constructor(
    public provider: 'openai' | 'ollama',
    message: string,
  ) {
    super(message);
    this.name = 'EmbeddingError';
  }
}
