/**
 * Lifecycle Controller
 *
 * Drives servers between Inactive and Active through the process-control
 * boundary and keeps the activation ledger in step with the gateway.
 *
 * Per-id in-flight markers stop two enable (or two disable) calls for the same
 * server from racing: a request of the same kind joins the running operation,
 * a request of the other kind waits for it and then re-evaluates. Claims and
 * ledger commits are synchronous; no lock is held across a gateway call.
 */

import { logger } from '../logger/index.js';
import type { LifecycleEventBus } from '../events/index.js';
import type { CapabilityRegistry } from '../registry/index.js';
import { TelemetrySink } from '../telemetry/index.js';
import {
	ActivationFailedError,
	DeactivationFailedError,
	SyncFailedError,
	UnknownServerError,
	describeError,
} from '../errors/index.js';
import type { ServerFailure } from '../errors/index.js';
import { withTimeout } from './boundary.js';
import type { BoundaryResult, ProcessControlBoundary, ToolInfo } from './boundary.js';
import { InFlightOperations } from './in-flight.js';
import type { ActivateOutcome, DeactivateOutcome } from './in-flight.js';
import { ActivationLedger } from './ledger.js';
import type { ActivationOrigin, ActivationRecord } from './ledger.js';
import { DEFAULT_BOUNDARY_TIMEOUT_MS, LOG_PREFIXES, estimateTokens } from './constants.js';

const LOG_PREFIX = LOG_PREFIXES.LIFECYCLE;

export interface LifecycleControllerOptions {
	telemetry?: TelemetrySink;
	events?: LifecycleEventBus;
	clock?: () => number;
	/** Upper bound for every boundary call */
	boundaryTimeoutMs?: number;
}

export interface ActivateOptions {
	reason?: string;
	/** Also activate each server's declared related servers */
	autoResolveDeps?: boolean;
}

export interface DeactivateOptions {
	reason?: string;
	/** Drop the record even when the gateway refuses to disable the server */
	force?: boolean;
}

export interface ServerTools {
	server: string;
	status: 'activated' | 'already_active';
	tools: ToolInfo[];
}

export interface ActivationReport {
	activated: string[];
	alreadyActive: string[];
	failed: ServerFailure[];
	/** Tool counts of every server active after the call among those requested */
	perServerToolCounts: Record<string, number>;
	totalTools: number;
	estimatedTokens: number;
	tools: ServerTools[];
}

export interface DeactivationReport {
	deactivated: string[];
	notActive: string[];
	failed: ServerFailure[];
}

export interface StatusReport {
	activeIds: string[];
	toolCounts: Record<string, number>;
	/** Milliseconds since activation */
	ages: Record<string, number>;
	/** Milliseconds since last use */
	idleFor: Record<string, number>;
	totalTools: number;
	estimatedTokens: number;
}

export interface UsageEntry {
	id: string;
	accessCount: number;
	lastUsed: number;
	activatedAt: number;
	toolUsage: Record<string, number>;
}

export interface SyncReport {
	added: string[];
	removed: string[];
	active: string[];
}

export class LifecycleController {
	private readonly ledger = new ActivationLedger();
	private readonly inFlight = new InFlightOperations();
	private readonly telemetry: TelemetrySink;
	private readonly events?: LifecycleEventBus;
	private readonly clock: () => number;
	private readonly boundaryTimeoutMs: number;

	constructor(
		private readonly registry: CapabilityRegistry,
		private readonly boundary: ProcessControlBoundary,
		options: LifecycleControllerOptions = {}
	) {
		this.clock = options.clock ?? Date.now;
		this.telemetry = options.telemetry ?? new TelemetrySink({ clock: this.clock });
		this.events = options.events;
		this.boundaryTimeoutMs = options.boundaryTimeoutMs ?? DEFAULT_BOUNDARY_TIMEOUT_MS;
	}

	// ===== Activation =====

	async activate(ids: string[], options: ActivateOptions = {}): Promise<ActivationReport> {
		const reason = options.reason ?? 'requested';
		const requested = [...new Set(ids)];
		const visited = new Set(requested);
		const report: ActivationReport = {
			activated: [],
			alreadyActive: [],
			failed: [],
			perServerToolCounts: {},
			totalTools: 0,
			estimatedTokens: 0,
			tools: [],
		};

		for (const id of requested) {
			const outcome = await this.activateOne(id, reason, 'request');
			this.addToReport(report, id, outcome);

			if (!options.autoResolveDeps || outcome.status === 'failed') {
				continue;
			}

			for (const dependency of this.registry.relatedOf(id)) {
				if (visited.has(dependency)) continue;
				visited.add(dependency);

				const dependencyOutcome = await this.activateOne(
					dependency,
					`dependency of ${id}: ${reason}`,
					'dependency'
				);
				this.addToReport(report, dependency, dependencyOutcome, id);
			}
		}

		report.totalTools = Object.values(report.perServerToolCounts).reduce((sum, n) => sum + n, 0);
		report.estimatedTokens = estimateTokens(report.totalTools);
		return report;
	}

	private addToReport(
		report: ActivationReport,
		id: string,
		outcome: ActivateOutcome,
		dependencyOf?: string
	): void {
		switch (outcome.status) {
			case 'activated':
				report.activated.push(id);
				report.perServerToolCounts[id] = outcome.tools.length;
				report.tools.push({ server: id, status: 'activated', tools: outcome.tools });
				break;
			case 'alreadyActive':
				report.alreadyActive.push(id);
				report.perServerToolCounts[id] = outcome.tools.length;
				report.tools.push({ server: id, status: 'already_active', tools: outcome.tools });
				break;
			case 'failed':
				report.failed.push(dependencyOf ? { ...outcome.failure, dependencyOf } : outcome.failure);
				break;
		}
	}

	private async activateOne(
		id: string,
		reason: string,
		origin: ActivationOrigin
	): Promise<ActivateOutcome> {
		if (!this.registry.has(id)) {
			logger.warn(`${LOG_PREFIX} Refusing to activate unknown server '${id}'`);
			return { status: 'failed', failure: new UnknownServerError(id).toFailure() };
		}

		for (;;) {
			const pending = this.inFlight.get(id);
			if (pending?.kind === 'activate') {
				return pending.outcome;
			}
			if (pending) {
				await pending.outcome;
				continue;
			}

			const record = this.ledger.get(id);
			if (record) {
				return { status: 'alreadyActive', tools: [...record.tools] };
			}
			return this.inFlight.activation(id, () => this.runActivation(id, reason, origin));
		}
	}

	private async runActivation(
		id: string,
		reason: string,
		origin: ActivationOrigin
	): Promise<ActivateOutcome> {
		const started = this.clock();
		const result = await this.callBoundary(`enable ${id}`, signal =>
			this.boundary.enable(id, signal)
		);
		if (!result.success) {
			return this.activationFailed(id, reason, result.diagnostic, started);
		}

		const tools = await this.fetchTools(id);
		this.ledger.add({ id, activatedAt: this.clock(), tools, reason, origin });

		const latencyMs = this.clock() - started;
		this.telemetry.record({ server: id, action: 'activate', reason, success: true, latencyMs });
		this.events?.emit('server:activated', {
			serverId: id,
			reason,
			toolCount: tools.length,
			latencyMs,
			timestamp: this.clock(),
		});
		logger.info(`${LOG_PREFIX} Activated ${id} (${tools.length} tools, ${latencyMs}ms)`, {
			reason,
			origin,
		});
		return { status: 'activated', tools };
	}

	private activationFailed(
		id: string,
		reason: string,
		diagnostic: string,
		started: number
	): ActivateOutcome {
		const latencyMs = this.clock() - started;
		this.telemetry.record({
			server: id,
			action: 'activate',
			reason,
			success: false,
			latencyMs,
			error: diagnostic,
		});
		this.events?.emit('server:activationFailed', {
			serverId: id,
			reason,
			error: diagnostic,
			latencyMs,
			timestamp: this.clock(),
		});
		const error = new ActivationFailedError(id, diagnostic);
		logger.warn(`${LOG_PREFIX} ${error.message}`);
		return { status: 'failed', failure: error.toFailure() };
	}

	// ===== Deactivation =====

	/**
	 * Deactivate the given servers, or every active server when `ids` is omitted.
	 */
	async deactivate(
		ids?: string[],
		options: DeactivateOptions = {}
	): Promise<DeactivationReport> {
		const reason = options.reason ?? 'requested';
		const force = options.force ?? false;
		const targets = ids ? [...new Set(ids)] : this.ledger.ids();
		const report: DeactivationReport = { deactivated: [], notActive: [], failed: [] };

		for (const id of targets) {
			const outcome = await this.deactivateOne(id, reason, force);
			switch (outcome.status) {
				case 'deactivated':
					report.deactivated.push(id);
					break;
				case 'notActive':
					report.notActive.push(id);
					break;
				case 'failed':
					report.failed.push(outcome.failure);
					break;
			}
		}
		return report;
	}

	private async deactivateOne(
		id: string,
		reason: string,
		force: boolean
	): Promise<DeactivateOutcome> {
		for (;;) {
			const pending = this.inFlight.get(id);
			if (pending?.kind === 'deactivate') {
				return pending.outcome;
			}
			if (pending) {
				await pending.outcome;
				continue;
			}

			if (!this.ledger.has(id)) {
				return { status: 'notActive' };
			}
			return this.inFlight.deactivation(id, () => this.runDeactivation(id, reason, force));
		}
	}

	private async runDeactivation(
		id: string,
		reason: string,
		force: boolean
	): Promise<DeactivateOutcome> {
		const started = this.clock();
		const result = await this.callBoundary(`disable ${id}`, signal =>
			this.boundary.disable(id, signal)
		);
		const latencyMs = this.clock() - started;

		if (result.success) {
			this.ledger.remove(id);
			this.telemetry.record({ server: id, action: 'deactivate', reason, success: true, latencyMs });
			this.events?.emit('server:deactivated', {
				serverId: id,
				reason,
				forced: force,
				timestamp: this.clock(),
			});
			logger.info(`${LOG_PREFIX} Deactivated ${id}`, { reason });
			return { status: 'deactivated' };
		}

		if (force) {
			this.ledger.remove(id);
		}
		this.telemetry.record({
			server: id,
			action: 'deactivate',
			reason,
			success: false,
			latencyMs,
			error: result.diagnostic,
		});
		this.events?.emit('server:deactivationFailed', {
			serverId: id,
			reason,
			error: result.diagnostic,
			recordRemoved: force,
			timestamp: this.clock(),
		});
		const error = new DeactivationFailedError(id, result.diagnostic, force);
		logger.warn(`${LOG_PREFIX} ${error.message}`);
		return { status: 'failed', failure: error.toFailure() };
	}

	// ===== Usage & State =====

	/**
	 * Record a tool call against an active server.
	 *
	 * @returns false when the server is not active or is being deactivated
	 */
	recordUse(id: string, toolName?: string): boolean {
		if (this.inFlight.get(id)?.kind === 'deactivate') {
			return false;
		}
		return this.ledger.touch(id, this.clock(), toolName);
	}

	isActive(id: string): boolean {
		return this.ledger.has(id);
	}

	activeIds(): string[] {
		return this.ledger.ids();
	}

	record(id: string): ActivationRecord | undefined {
		return this.ledger.get(id);
	}

	status(now: number = this.clock()): StatusReport {
		const report: StatusReport = {
			activeIds: [],
			toolCounts: {},
			ages: {},
			idleFor: {},
			totalTools: 0,
			estimatedTokens: 0,
		};
		for (const record of this.ledger.list()) {
			report.activeIds.push(record.id);
			report.toolCounts[record.id] = record.tools.length;
			report.ages[record.id] = now - record.activatedAt;
			report.idleFor[record.id] = now - record.lastUsed;
			report.totalTools += record.tools.length;
		}
		report.estimatedTokens = estimateTokens(report.totalTools);
		return report;
	}

	usage(): UsageEntry[] {
		return this.ledger.list().map(record => ({
			id: record.id,
			accessCount: record.accessCount,
			lastUsed: record.lastUsed,
			activatedAt: record.activatedAt,
			toolUsage: { ...record.toolUsage },
		}));
	}

	/**
	 * Active servers unused for strictly longer than the threshold.
	 */
	idleCandidates(thresholdMs: number, now: number = this.clock()): string[] {
		return this.ledger
			.list()
			.filter(record => now - record.lastUsed > thresholdMs)
			.map(record => record.id);
	}

	/**
	 * Reconcile the ledger with the gateway's list of enabled servers.
	 *
	 * Records the gateway no longer reports are dropped; known servers it reports
	 * that have no record are adopted. Ids with an operation in flight, or whose
	 * record changed while the gateway was being read, are left alone.
	 *
	 * @throws SyncFailedError when the gateway cannot be read; the ledger is unchanged
	 */
	async sync(): Promise<SyncReport> {
		const revision = this.ledger.revision;
		let enabled: string[];
		try {
			enabled = await withTimeout('listEnabled', this.boundaryTimeoutMs, signal =>
				this.boundary.listEnabled(signal)
			);
		} catch (error) {
			logger.error(`${LOG_PREFIX} Sync failed: ${describeError(error)}`);
			throw new SyncFailedError(describeError(error));
		}

		const enabledSet = new Set(enabled);
		const settled = (id: string) =>
			!this.inFlight.has(id) && !this.ledger.changedSince(id, revision);

		const removed: string[] = [];
		for (const id of this.ledger.ids()) {
			if (!enabledSet.has(id) && settled(id)) {
				this.ledger.remove(id);
				removed.push(id);
			}
		}

		const added: string[] = [];
		const adoptions: Promise<ActivateOutcome>[] = [];
		for (const id of [...enabledSet].sort()) {
			if (!this.registry.has(id) || this.ledger.has(id) || !settled(id)) {
				continue;
			}
			adoptions.push(this.inFlight.activation(id, () => this.adopt(id, added)));
		}
		await Promise.all(adoptions);
		added.sort();

		if (added.length > 0 || removed.length > 0) {
			logger.info(`${LOG_PREFIX} Synced with gateway`, { added, removed });
		}
		return { added, removed, active: this.ledger.ids() };
	}

	/**
	 * Record a server the gateway already has enabled.
	 */
	private async adopt(id: string, added: string[]): Promise<ActivateOutcome> {
		const tools = await this.fetchTools(id);
		if (this.ledger.add({ id, activatedAt: this.clock(), tools, reason: 'sync', origin: 'sync' })) {
			added.push(id);
		}
		return { status: 'alreadyActive', tools };
	}

	// ===== Boundary Helpers =====

	private async callBoundary(
		operation: string,
		call: (signal: AbortSignal) => Promise<BoundaryResult>
	): Promise<BoundaryResult> {
		try {
			return await withTimeout(operation, this.boundaryTimeoutMs, call);
		} catch (error) {
			return { success: false, diagnostic: describeError(error) };
		}
	}

	private async fetchTools(id: string): Promise<ToolInfo[]> {
		try {
			return await withTimeout(`listTools ${id}`, this.boundaryTimeoutMs, signal =>
				this.boundary.listTools(id, signal)
			);
		} catch (error) {
			logger.warn(`${LOG_PREFIX} Could not list tools for ${id}: ${describeError(error)}`);
			return [];
		}
	}
}
