/**
 * Embedding Backend Types and Interfaces
 *
 * @module embedding/backend/types
 */

/**
 * Core interface for embedding providers
 */
export interface Embedder {
	/**
	 * Generate embedding for a single text input
	 */
	embed(text: string): Promise<number[]>;

	/**
	 * Generate embeddings for multiple text inputs, in input order
	 */
	embedBatch(texts: string[]): Promise<number[][]>;

	/**
	 * Dimension of the vectors this embedder produces
	 */
	getDimension(): number;

	/**
	 * Clean up resources and close connections
	 */
	disconnect(): Promise<void>;
}

/**
 * Base configuration interface for all embedding providers
 */
export interface EmbeddingConfig {
	type: string;
	apiKey?: string;
	model?: string;
	baseUrl?: string;
	/** Request timeout in milliseconds */
	timeout?: number;
	maxRetries?: number;
}

export interface OpenAIEmbeddingConfig extends EmbeddingConfig {
	type: 'openai';
	apiKey: string;
	/** Custom dimensions for embedding-3 models */
	dimensions?: number;
}

export interface OllamaEmbeddingConfig extends EmbeddingConfig {
	type: 'ollama';
	dimensions?: number;
}

export type BackendConfig = OpenAIEmbeddingConfig | OllamaEmbeddingConfig;

/**
 * Base error class for embedding operations
 */
export class EmbeddingError extends Error {
	constructor(
		message: string,
		public readonly provider?: string,
		public override readonly cause?: Error
	) {
		super(message);
		this.name = 'EmbeddingError';
	}
}

/**
 * Error thrown when connection to embedding provider fails
 */
export class EmbeddingConnectionError extends EmbeddingError {
	constructor(message: string, provider?: string, cause?: Error) {
		super(message, provider, cause);
		this.name = 'EmbeddingConnectionError';
	}
}

/**
 * Error thrown when input validation fails
 */
export class EmbeddingValidationError extends EmbeddingError {
	constructor(message: string, provider?: string, cause?: Error) {
		super(message, provider, cause);
		this.name = 'EmbeddingValidationError';
	}
}

export function validateEmbeddingInput(
	texts: string[],
	maxTextLength: number,
	provider: string
): void {
	texts.forEach((text, index) => {
		if (text.trim().length === 0) {
			throw new EmbeddingValidationError(`Text at index ${index} cannot be empty`, provider);
		}
		if (text.length > maxTextLength) {
			throw new EmbeddingValidationError(
				`Text at index ${index} length ${text.length} exceeds maximum of ${maxTextLength} characters`,
				provider
			);
		}
	});
}
