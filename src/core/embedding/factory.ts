/**
 * Embedding Factory
 *
 * Builds an embedder from explicit configuration or from the environment.
 * A missing or disabled configuration yields `null`; the matcher then runs
 * keyword-only.
 *
 * @module embedding/factory
 */

import { logger } from '../logger/index.js';
import type { Env } from '../env.js';
import { OpenAIEmbedder } from './backend/openai.js';
import { OllamaEmbedder } from './backend/ollama.js';
import { type BackendConfig, type Embedder, EmbeddingError } from './backend/types.js';
import { LOG_PREFIXES, PROVIDER_TYPES } from './constants.js';

export function createEmbedder(config: BackendConfig): Embedder {
	logger.debug(`${LOG_PREFIXES.FACTORY} Creating embedder`, {
		type: config.type,
		model: config.model,
	});

	switch (config.type) {
		case PROVIDER_TYPES.OPENAI:
			return new OpenAIEmbedder(config);
		case PROVIDER_TYPES.OLLAMA:
			return new OllamaEmbedder(config);
	}
}

/**
 * Resolve the embedding backend from environment variables.
 *
 * Precedence: DISABLE_EMBEDDINGS, then an explicit EMBEDDING_PROVIDER, then
 * OPENAI_API_KEY, then OLLAMA_BASE_URL.
 */
export function resolveEmbeddingConfig(env: Env): BackendConfig | null {
	if (env.DISABLE_EMBEDDINGS) {
		return null;
	}

	const provider =
		env.EMBEDDING_PROVIDER ??
		(env.OPENAI_API_KEY ? PROVIDER_TYPES.OPENAI : env.OLLAMA_BASE_URL ? PROVIDER_TYPES.OLLAMA : undefined);

	if (provider === PROVIDER_TYPES.OPENAI) {
		if (!env.OPENAI_API_KEY) {
			logger.warn(`${LOG_PREFIXES.FACTORY} EMBEDDING_PROVIDER=openai but OPENAI_API_KEY is not set`);
			return null;
		}
		return {
			type: 'openai',
			apiKey: env.OPENAI_API_KEY,
			model: env.EMBEDDING_MODEL,
			baseUrl: env.OPENAI_BASE_URL,
			timeout: env.EMBEDDING_TIMEOUT,
		};
	}

	if (provider === PROVIDER_TYPES.OLLAMA) {
		return {
			type: 'ollama',
			model: env.EMBEDDING_MODEL,
			baseUrl: env.OLLAMA_BASE_URL,
			timeout: env.EMBEDDING_TIMEOUT,
		};
	}

	return null;
}

export function createEmbedderFromEnv(env: Env): Embedder | null {
	const config = resolveEmbeddingConfig(env);
	if (!config) {
		logger.info(`${LOG_PREFIXES.FACTORY} No embedding provider configured, semantic matching disabled`);
		return null;
	}

	try {
		return createEmbedder(config);
	} catch (error) {
		if (!(error instanceof EmbeddingError)) {
			throw error;
		}
		logger.warn(`${LOG_PREFIXES.FACTORY} Embedder unavailable: ${error.message}`);
		return null;
	}
}
