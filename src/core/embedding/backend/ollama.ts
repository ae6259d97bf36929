/**
 * Ollama Embedding Backend
 *
 * Embeds texts with a local Ollama model over its HTTP API.
 *
 * @module embedding/backend/ollama
 */

import { z } from 'zod';
import { logger } from '../../logger/index.js';
import {
	type Embedder,
	type OllamaEmbeddingConfig,
	EmbeddingConnectionError,
	EmbeddingError,
	validateEmbeddingInput,
} from './types.js';
import { DEFAULTS, LOG_PREFIXES, MODEL_DIMENSIONS, VALIDATION_LIMITS } from '../constants.js';

const embeddingResponseSchema = z.object({
	embedding: z.array(z.number()).min(1),
});

const errorResponseSchema = z.object({ error: z.string() });

export type FetchLike = typeof fetch;

export class OllamaEmbedder implements Embedder {
	private readonly baseUrl: string;
	private readonly model: string;
	private readonly timeout: number;
	private dimension: number;

	constructor(
		config: OllamaEmbeddingConfig,
		private readonly fetchImpl: FetchLike = fetch
	) {
		this.model = config.model || DEFAULTS.OLLAMA_MODEL;
		this.timeout = config.timeout || DEFAULTS.TIMEOUT;
		this.baseUrl = (config.baseUrl || DEFAULTS.OLLAMA_BASE_URL).replace(/\/+$/, '');
		this.dimension = config.dimensions || MODEL_DIMENSIONS[this.model] || 768;

		logger.debug(`${LOG_PREFIXES.OLLAMA} Ollama embedder initialized`, {
			model: this.model,
			dimension: this.dimension,
			baseUrl: this.baseUrl,
		});
	}

	async embed(text: string): Promise<number[]> {
		validateEmbeddingInput([text], VALIDATION_LIMITS.MAX_TEXT_LENGTH, 'ollama');

		const body = await this.post('/api/embeddings', { model: this.model, prompt: text });
		const parsed = embeddingResponseSchema.safeParse(body);
		if (!parsed.success) {
			throw new EmbeddingError('Invalid embedding response from Ollama API', 'ollama');
		}

		const embedding = parsed.data.embedding;
		if (embedding.length !== this.dimension) {
			logger.debug(
				`${LOG_PREFIXES.OLLAMA} Updating dimension from ${this.dimension} to ${embedding.length}`
			);
			this.dimension = embedding.length;
		}
		return embedding;
	}

	async embedBatch(texts: string[]): Promise<number[][]> {
		validateEmbeddingInput(texts, VALIDATION_LIMITS.MAX_TEXT_LENGTH, 'ollama');

		// No batch endpoint; one request per text
		const embeddings: number[][] = [];
		for (const text of texts) {
			embeddings.push(await this.embed(text));
		}
		return embeddings;
	}

	getDimension(): number {
		return this.dimension;
	}

	async disconnect(): Promise<void> {
		logger.debug(`${LOG_PREFIXES.OLLAMA} Disconnecting Ollama embedder`);
	}

	private async post(endpoint: string, payload: Record<string, unknown>): Promise<unknown> {
		let response: Response;
		try {
			response = await this.fetchImpl(`${this.baseUrl}${endpoint}`, {
				method: 'POST',
				headers: { 'Content-Type': 'application/json' },
				body: JSON.stringify(payload),
				signal: AbortSignal.timeout(this.timeout),
			});
		} catch (error) {
			throw new EmbeddingConnectionError(
				`Failed to reach Ollama at ${this.baseUrl}: ${error instanceof Error ? error.message : String(error)}`,
				'ollama',
				error instanceof Error ? error : undefined
			);
		}

		if (!response.ok) {
			const text = await response.text();
			const parsed = errorResponseSchema.safeParse(tryParseJson(text));
			const message = parsed.success ? parsed.data.error : text || response.statusText;
			throw new EmbeddingError(`Ollama API error ${response.status}: ${message}`, 'ollama');
		}

		return response.json();
	}
}

function tryParseJson(text: string): unknown {
	try {
		return JSON.parse(text);
	} catch {
		return undefined;
	}
}
