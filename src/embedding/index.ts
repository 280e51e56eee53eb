// pattern: Functional Core

export type { EmbeddingProvider } from './types.ts';
export { EmbeddingError } from './types.ts';
export { createOpenAIEmbeddingAdapter } from './openai.ts';
export { createOllamaEmbeddingAdapter } from './ollama.ts';
export { createEmbeddingProvider } from './factory.ts';
