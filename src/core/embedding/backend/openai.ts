/**
 * OpenAI Embedding Backend
 *
 * Embeds server descriptions and task texts through OpenAI's embedding API.
 * Retries are delegated to the SDK client.
 *
 * @module embedding/backend/openai
 */

import OpenAI, { type ClientOptions } from 'openai';
import { logger } from '../../logger/index.js';
import {
	type Embedder,
	type OpenAIEmbeddingConfig,
	EmbeddingConnectionError,
	EmbeddingError,
	EmbeddingValidationError,
	validateEmbeddingInput,
} from './types.js';
import { DEFAULTS, LOG_PREFIXES, MODEL_DIMENSIONS, VALIDATION_LIMITS } from '../constants.js';

interface EmbeddingParams {
	model: string;
	input: string | string[];
	dimensions?: number;
}

export class OpenAIEmbedder implements Embedder {
	private readonly openai: OpenAI;
	private readonly config: OpenAIEmbeddingConfig;
	private readonly model: string;
	private readonly dimension: number;

	constructor(config: OpenAIEmbeddingConfig, client?: OpenAI) {
		if (!config.apiKey || config.apiKey.trim() === '') {
			throw new EmbeddingError('OpenAI API key is required', 'openai');
		}

		this.config = config;
		this.model = config.model || DEFAULTS.OPENAI_MODEL;
		this.dimension = config.dimensions || MODEL_DIMENSIONS[this.model] || 1536;

		const clientOptions: ClientOptions = {
			apiKey: config.apiKey,
			timeout: config.timeout || DEFAULTS.TIMEOUT,
			maxRetries: config.maxRetries ?? DEFAULTS.MAX_RETRIES,
		};
		if (config.baseUrl && config.baseUrl.trim() !== '') {
			clientOptions.baseURL = config.baseUrl;
		}
		this.openai = client ?? new OpenAI(clientOptions);

		logger.debug(`${LOG_PREFIXES.OPENAI} Initialized OpenAI embedder`, {
			model: this.model,
			dimension: this.dimension,
			baseUrl: config.baseUrl,
		});
	}

	async embed(text: string): Promise<number[]> {
		validateEmbeddingInput([text], VALIDATION_LIMITS.MAX_TEXT_LENGTH, 'openai');

		const response = await this.create({ model: this.model, input: text });
		const embedding = response.data[0]?.embedding;
		if (!embedding) {
			throw new EmbeddingError('OpenAI API did not return a valid embedding', 'openai');
		}
		return embedding;
	}

	async embedBatch(texts: string[]): Promise<number[][]> {
		if (texts.length === 0) {
			return [];
		}
		if (texts.length > VALIDATION_LIMITS.MAX_BATCH_SIZE) {
			throw new EmbeddingValidationError(
				`Batch size ${texts.length} exceeds maximum of ${VALIDATION_LIMITS.MAX_BATCH_SIZE}`,
				'openai'
			);
		}
		validateEmbeddingInput(texts, VALIDATION_LIMITS.MAX_TEXT_LENGTH, 'openai');

		logger.debug(`${LOG_PREFIXES.OPENAI} Embedding batch of texts`, {
			count: texts.length,
			model: this.model,
		});

		const response = await this.create({ model: this.model, input: texts });
		// The API may return items out of order; index carries the input position
		return [...response.data].sort((a, b) => a.index - b.index).map(item => item.embedding);
	}

	getDimension(): number {
		return this.dimension;
	}

	async disconnect(): Promise<void> {
		logger.debug(`${LOG_PREFIXES.OPENAI} Disconnecting OpenAI embedder`);
	}

	private async create(
		params: EmbeddingParams
	): Promise<OpenAI.Embeddings.CreateEmbeddingResponse> {
		if (this.config.dimensions !== undefined) {
			params.dimensions = this.config.dimensions;
		}

		const startTime = Date.now();
		try {
			return await this.openai.embeddings.create(params);
		} catch (error) {
			logger.error(`${LOG_PREFIXES.OPENAI} Failed to create embedding`, {
				error: error instanceof Error ? error.message : String(error),
				model: this.model,
				processingTime: Date.now() - startTime,
			});
			if (error instanceof OpenAI.APIConnectionError) {
				throw new EmbeddingConnectionError(error.message, 'openai', error);
			}
			throw new EmbeddingError(
				`OpenAI embedding failed: ${error instanceof Error ? error.message : String(error)}`,
				'openai',
				error instanceof Error ? error : undefined
			);
		}
	}
}
