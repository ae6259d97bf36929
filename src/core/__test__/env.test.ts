import { describe, it, expect } from 'vitest';
import { getEnv } from '../env.js';

describe('getEnv', () => {
	it('should apply defaults to an empty environment', () => {
		const env = getEnv({});

		expect(env).toMatchObject({
			TOOLSWITCH_LOG_LEVEL: 'info',
			REDACT_SECRETS: true,
			TOOLSWITCH_IDLE_TIMEOUT_MS: 600_000,
			TOOLSWITCH_REAPER_INTERVAL_MS: 60_000,
			TOOLSWITCH_BOUNDARY_TIMEOUT_MS: 60_000,
			TOOLSWITCH_GATEWAY_COMMAND: 'docker',
			TOOLSWITCH_DISCOVERY: false,
			TOOLSWITCH_DISCOVERY_TTL_MS: 300_000,
			DISABLE_EMBEDDINGS: false,
		});
		expect(env.TOOLSWITCH_CONFIG).toBeUndefined();
		expect(env.OPENAI_API_KEY).toBeUndefined();
	});

	it('should coerce numeric values', () => {
		expect(getEnv({ TOOLSWITCH_IDLE_TIMEOUT_MS: '1500' }).TOOLSWITCH_IDLE_TIMEOUT_MS).toBe(1500);
	});

	it('should fall back to defaults for invalid values', () => {
		const env = getEnv({
			TOOLSWITCH_IDLE_TIMEOUT_MS: 'soon',
			TOOLSWITCH_REAPER_INTERVAL_MS: '-5',
			TOOLSWITCH_LOG_LEVEL: 'chatty',
			EMBEDDING_PROVIDER: 'carrier-pigeon',
		});

		expect(env.TOOLSWITCH_IDLE_TIMEOUT_MS).toBe(600_000);
		expect(env.TOOLSWITCH_REAPER_INTERVAL_MS).toBe(60_000);
		expect(env.TOOLSWITCH_LOG_LEVEL).toBe('info');
		expect(env.EMBEDDING_PROVIDER).toBeUndefined();
	});

	it('should parse boolean flags', () => {
		expect(getEnv({ DISABLE_EMBEDDINGS: '1', REDACT_SECRETS: 'false' })).toMatchObject({
			DISABLE_EMBEDDINGS: true,
			REDACT_SECRETS: false,
		});
		expect(getEnv({ DISABLE_EMBEDDINGS: 'maybe' }).DISABLE_EMBEDDINGS).toBe(false);
	});
});
