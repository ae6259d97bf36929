import { config } from 'dotenv';
import { z } from 'zod';

// Variables already present in the environment (for example those an MCP host
// passes through its server definition) win over the .env file.
config();

const booleanFlag = (fallback: boolean) =>
	z
		.enum(['true', 'false', '1', '0'])
		.optional()
		.transform(value => (value === undefined ? fallback : value === 'true' || value === '1'))
		.catch(fallback);

const positiveMs = (fallback: number) => z.coerce.number().int().positive().catch(fallback);

const envSchema = z.object({
	NODE_ENV: z.enum(['development', 'production', 'test']).catch('development'),
	TOOLSWITCH_LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug', 'silly']).catch('info'),
	TOOLSWITCH_LOG_FILE: z.string().min(1).optional().catch(undefined),
	REDACT_SECRETS: booleanFlag(true),
	// Orchestrator
	TOOLSWITCH_CONFIG: z.string().min(1).optional().catch(undefined),
	TOOLSWITCH_IDLE_TIMEOUT_MS: positiveMs(10 * 60 * 1000),
	TOOLSWITCH_REAPER_INTERVAL_MS: positiveMs(60 * 1000),
	TOOLSWITCH_BOUNDARY_TIMEOUT_MS: positiveMs(60 * 1000),
	TOOLSWITCH_GATEWAY_COMMAND: z.string().min(1).catch('docker'),
	TOOLSWITCH_TELEMETRY_FILE: z.string().min(1).optional().catch(undefined),
	TOOLSWITCH_DISCOVERY: booleanFlag(false),
	TOOLSWITCH_DISCOVERY_TTL_MS: positiveMs(5 * 60 * 1000),
	// Embedding Configuration
	EMBEDDING_PROVIDER: z.enum(['openai', 'ollama']).optional().catch(undefined),
	EMBEDDING_MODEL: z.string().min(1).optional().catch(undefined),
	EMBEDDING_TIMEOUT: z.coerce.number().int().positive().optional().catch(undefined),
	DISABLE_EMBEDDINGS: booleanFlag(false),
	OPENAI_API_KEY: z.string().min(1).optional().catch(undefined),
	OPENAI_BASE_URL: z.string().min(1).optional().catch(undefined),
	OLLAMA_BASE_URL: z.string().min(1).optional().catch(undefined),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse the current process environment. Values are read on every call so a
 * change to process.env (tests, CLI flags) is picked up without a restart.
 */
export function getEnv(source: NodeJS.ProcessEnv = process.env): Env {
	return envSchema.parse(source);
}
