/**
 * Embedding System Constants
 *
 * @module embedding/constants
 */

export const PROVIDER_TYPES = {
	OPENAI: 'openai',
	OLLAMA: 'ollama',
} as const;

export const DEFAULTS = {
	OPENAI_MODEL: 'text-embedding-3-small',
	OLLAMA_MODEL: 'nomic-embed-text',
	OLLAMA_BASE_URL: 'http://localhost:11434',
	TIMEOUT: 30000,
	MAX_RETRIES: 3,
} as const;

export const MODEL_DIMENSIONS: Record<string, number> = {
	'text-embedding-3-small': 1536,
	'text-embedding-3-large': 3072,
	'text-embedding-ada-002': 1536,
	'nomic-embed-text': 768,
	'all-minilm': 384,
	'mxbai-embed-large': 1024,
};

export const VALIDATION_LIMITS = {
	/** Maximum text length for single embedding */
	MAX_TEXT_LENGTH: 32768, // characters
	/** Maximum number of texts in batch operation */
	MAX_BATCH_SIZE: 2048,
} as const;

export const LOG_PREFIXES = {
	EMBEDDING: '[EMBEDDING]',
	OPENAI: '[EMBEDDING:OPENAI]',
	OLLAMA: '[EMBEDDING:OLLAMA]',
	FACTORY: '[EMBEDDING:FACTORY]',
} as const;
