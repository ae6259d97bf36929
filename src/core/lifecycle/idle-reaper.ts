/**
 * Idle Reaper
 *
 * Periodically force-deactivates servers that have not been used for longer
 * than the idle timeout. Runs on a self-rescheduling, unref'd timer so it never
 * keeps the process alive.
 */

import { logger } from '../logger/index.js';
import type { LifecycleEventBus } from '../events/index.js';
import type { ServerFailure } from '../errors/index.js';
import type { LifecycleController } from './controller.js';
import {
	DEFAULT_IDLE_TIMEOUT_MS,
	DEFAULT_REAPER_INTERVAL_MS,
	IDLE_REASON,
	LOG_PREFIXES,
} from './constants.js';

const LOG_PREFIX = LOG_PREFIXES.REAPER;

export type ReapableController = Pick<LifecycleController, 'idleCandidates' | 'deactivate'>;

export interface IdleReaperOptions {
	intervalMs?: number;
	idleTimeoutMs?: number;
	/** Servers never reclaimed */
	keep?: string[];
	events?: LifecycleEventBus;
	clock?: () => number;
}

export interface SweepOptions {
	thresholdMs?: number;
	keep?: string[];
}

export interface ReapReport {
	deactivated: string[];
	failed: ServerFailure[];
	/** Idle servers left alone because they are on the keep list */
	skipped: string[];
	thresholdMs: number;
}

export class IdleReaper {
	private readonly intervalMs: number;
	private readonly idleTimeoutMs: number;
	private readonly keep: ReadonlySet<string>;
	private readonly events?: LifecycleEventBus;
	private readonly clock: () => number;

	private timer?: NodeJS.Timeout;
	private running = false;
	private readonly sweeps = new Set<Promise<ReapReport>>();

	constructor(
		private readonly controller: ReapableController,
		options: IdleReaperOptions = {}
	) {
		this.intervalMs = options.intervalMs ?? DEFAULT_REAPER_INTERVAL_MS;
		this.idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
		this.keep = new Set(options.keep ?? []);
		this.events = options.events;
		this.clock = options.clock ?? Date.now;
	}

	get isRunning(): boolean {
		return this.running;
	}

	get idleTimeout(): number {
		return this.idleTimeoutMs;
	}

	start(): void {
		if (this.running) {
			logger.debug(`${LOG_PREFIX} Already running`);
			return;
		}
		this.running = true;
		logger.info(
			`${LOG_PREFIX} Started (interval ${this.intervalMs}ms, idle timeout ${this.idleTimeoutMs}ms)`
		);
		this.scheduleNext();
	}

	/**
	 * Cancel the next tick and wait for a sweep already in progress.
	 */
	async stop(): Promise<void> {
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = undefined;
		}
		if (this.running) {
			this.running = false;
			logger.info(`${LOG_PREFIX} Stopped`);
		}
		await Promise.allSettled([...this.sweeps]);
	}

	/**
	 * Deactivate every idle server not on the keep list, one at a time.
	 * A failure is recorded and the sweep moves on.
	 */
	sweep(options: SweepOptions = {}): Promise<ReapReport> {
		const run = this.runSweep(options);
		this.sweeps.add(run);
		const forget = () => {
			this.sweeps.delete(run);
		};
		run.then(forget, forget);
		return run;
	}

	private async runSweep(options: SweepOptions): Promise<ReapReport> {
		const thresholdMs = options.thresholdMs ?? this.idleTimeoutMs;
		const keep = new Set([...this.keep, ...(options.keep ?? [])]);
		const report: ReapReport = { deactivated: [], failed: [], skipped: [], thresholdMs };

		const candidates = this.controller.idleCandidates(thresholdMs, this.clock());
		for (const id of candidates) {
			if (keep.has(id)) {
				report.skipped.push(id);
				continue;
			}

			const result = await this.controller.deactivate([id], { force: true, reason: IDLE_REASON });
			report.deactivated.push(...result.deactivated);
			report.failed.push(...result.failed);
		}

		if (report.deactivated.length > 0 || report.failed.length > 0) {
			logger.info(
				`${LOG_PREFIX} Reclaimed ${report.deactivated.length} idle server(s)` +
					(report.failed.length > 0 ? `, ${report.failed.length} failed` : ''),
				{ deactivated: report.deactivated, failed: report.failed.map(failure => failure.id) }
			);
		}
		this.events?.emit('reaper:swept', {
			deactivated: report.deactivated,
			failed: report.failed.map(failure => failure.id),
			thresholdMs,
			timestamp: this.clock(),
		});
		return report;
	}

	private scheduleNext(): void {
		if (!this.running) {
			return;
		}
		this.timer = setTimeout(() => {
			this.timer = undefined;
			void this.tick().then(() => this.scheduleNext());
		}, this.intervalMs);
		this.timer.unref();
	}

	private async tick(): Promise<void> {
		try {
			await this.sweep();
		} catch (error) {
			logger.error(`${LOG_PREFIX} Sweep failed`, {
				error: error instanceof Error ? error.message : String(error),
			});
		}
	}
}
