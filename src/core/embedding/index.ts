export type {
	Embedder,
	EmbeddingConfig,
	OpenAIEmbeddingConfig,
	OllamaEmbeddingConfig,
	BackendConfig,
} from './backend/types.js';
export {
	EmbeddingError,
	EmbeddingConnectionError,
	EmbeddingValidationError,
} from './backend/types.js';
export { OpenAIEmbedder } from './backend/openai.js';
export { OllamaEmbedder } from './backend/ollama.js';
export type { FetchLike } from './backend/ollama.js';
export { createEmbedder, createEmbedderFromEnv, resolveEmbeddingConfig } from './factory.js';
export { PROVIDER_TYPES, DEFAULTS as EMBEDDING_DEFAULTS, MODEL_DIMENSIONS } from './constants.js';
