/** Rough prompt cost of one tool definition */
export const TOKENS_PER_TOOL = 150;

export const DEFAULT_BOUNDARY_TIMEOUT_MS = 60_000;
export const DEFAULT_IDLE_TIMEOUT_MS = 10 * 60 * 1000;
export const DEFAULT_REAPER_INTERVAL_MS = 60 * 1000;

export const IDLE_REASON = 'idle';

export const LOG_PREFIXES = {
	LIFECYCLE: '[Lifecycle]',
	REAPER: '[Reaper]',
	GATEWAY: '[Gateway]',
} as const;

export function estimateTokens(toolCount: number): number {
	return toolCount * TOKENS_PER_TOOL;
}
