/**
 * Telemetry Sink
 *
 * Append-only log of activation and deactivation attempts. Events are kept in
 * memory for the lifetime of the process and optionally mirrored to a store.
 * Store failures are logged and never reach the caller.
 */

import { logger } from '../logger/index.js';
import type {
	TelemetryEvent,
	TelemetryInput,
	TelemetryStats,
	TelemetryStore,
} from './types.js';

const LOG_PREFIX = '[Telemetry]';

export interface TelemetrySinkOptions {
	store?: TelemetryStore;
	clock?: () => number;
}

export class TelemetrySink {
	private readonly log: TelemetryEvent[] = [];
	private readonly pending = new Set<Promise<void>>();
	private readonly store?: TelemetryStore;
	private readonly clock: () => number;

	constructor(options: TelemetrySinkOptions = {}) {
		this.store = options.store;
		this.clock = options.clock ?? Date.now;
	}

	record(input: TelemetryInput): TelemetryEvent {
		const event: TelemetryEvent = Object.freeze({
			server: input.server,
			action: input.action,
			reason: input.reason,
			success: input.success,
			latencyMs: input.latencyMs,
			timestamp: input.timestamp ?? this.clock(),
			...(input.error !== undefined ? { error: input.error } : {}),
		});
		this.log.push(event);
		this.persist(event);
		return event;
	}

	events(): readonly TelemetryEvent[] {
		return [...this.log];
	}

	get size(): number {
		return this.log.length;
	}

	stats(): TelemetryStats {
		const activations = this.log.filter(event => event.action === 'activate');
		const deactivations = this.log.filter(event => event.action === 'deactivate');

		const perServerCount: Record<string, number> = {};
		let successful = 0;
		let totalLatency = 0;
		for (const event of activations) {
			perServerCount[event.server] = (perServerCount[event.server] ?? 0) + 1;
			totalLatency += event.latencyMs;
			if (event.success) successful++;
		}

		return {
			totalActivations: activations.length,
			successful,
			failed: activations.length - successful,
			avgLatencyMs: activations.length > 0 ? totalLatency / activations.length : 0,
			perServerCount,
			totalDeactivations: deactivations.length,
			failedDeactivations: deactivations.filter(event => !event.success).length,
		};
	}

	/**
	 * Wait for every store write issued so far.
	 */
	async flush(): Promise<void> {
		while (this.pending.size > 0) {
			await Promise.all(this.pending);
		}
	}

	private persist(event: TelemetryEvent): void {
		if (!this.store) {
			return;
		}

		const write = this.store
			.append(event)
			.catch((error: unknown) => {
				logger.error(`${LOG_PREFIX} Failed to persist telemetry event`, {
					server: event.server,
					action: event.action,
					error: error instanceof Error ? error.message : String(error),
				});
			})
			.finally(() => {
				this.pending.delete(write);
			});
		this.pending.add(write);
	}
}
