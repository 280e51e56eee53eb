// pattern: Imperative Shell

import type { EmbeddingConfig } from '../config/schema.ts';
import type { EmbeddingProvider } from './types.ts';
import { createOpenAIEmbeddingAdapter } from './openai.ts';
import { createOllamaEmbeddingAdapter } from './ollama.ts';

export function createEmbeddingProvider(config: EmbeddingConfig): EmbeddingProvider {
  switch (config.provider) {
    case 'openai':
      return createOpenAIEmbeddingAdapter(config);
    case 'ollama':
      return createOllamaEmbeddingAdapter(config);
  }
}
