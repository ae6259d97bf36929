/**
 * Activation Ledger
 *
 * One record per server currently believed enabled in the gateway. Owned by
 * the lifecycle controller; everything handed out is a copy.
 */

import type { ToolInfo } from './boundary.js';

export type ActivationOrigin = 'request' | 'dependency' | 'sync';

export interface ActivationRecord {
	readonly id: string;
	readonly activatedAt: number;
	readonly lastUsed: number;
	readonly accessCount: number;
	readonly toolUsage: Readonly<Record<string, number>>;
	readonly tools: readonly ToolInfo[];
	readonly reason: string;
	readonly origin: ActivationOrigin;
}

export interface NewActivation {
	id: string;
	activatedAt: number;
	tools: ToolInfo[];
	reason: string;
	origin: ActivationOrigin;
}

interface MutableRecord {
	id: string;
	activatedAt: number;
	lastUsed: number;
	accessCount: number;
	toolUsage: Map<string, number>;
	tools: ToolInfo[];
	reason: string;
	origin: ActivationOrigin;
}

export class ActivationLedger {
	private readonly records = new Map<string, MutableRecord>();
	private revisionCounter = 0;
	private readonly changedAt = new Map<string, number>();

	/** Incremented by every add and remove */
	get revision(): number {
		return this.revisionCounter;
	}

	/**
	 * Whether the record of `id` was added or removed after `revision` was read.
	 */
	changedSince(id: string, revision: number): boolean {
		return (this.changedAt.get(id) ?? 0) > revision;
	}

	has(id: string): boolean {
		return this.records.has(id);
	}

	get(id: string): ActivationRecord | undefined {
		const record = this.records.get(id);
		return record ? toView(record) : undefined;
	}

	get size(): number {
		return this.records.size;
	}

	ids(): string[] {
		return [...this.records.keys()].sort();
	}

	list(): ActivationRecord[] {
		return this.ids().flatMap(id => {
			const record = this.records.get(id);
			return record ? [toView(record)] : [];
		});
	}

	/**
	 * Create a record. `lastUsed` starts at the activation time.
	 *
	 * @returns false when the id already has a record
	 */
	add(activation: NewActivation): boolean {
		if (this.records.has(activation.id)) {
			return false;
		}
		this.records.set(activation.id, {
			id: activation.id,
			activatedAt: activation.activatedAt,
			lastUsed: activation.activatedAt,
			accessCount: 0,
			toolUsage: new Map(),
			tools: [...activation.tools],
			reason: activation.reason,
			origin: activation.origin,
		});
		this.changed(activation.id);
		return true;
	}

	remove(id: string): boolean {
		if (!this.records.delete(id)) {
			return false;
		}
		this.changed(id);
		return true;
	}

	/**
	 * Mark a server as used.
	 *
	 * @returns false when the server has no record
	 */
	touch(id: string, at: number, toolName?: string): boolean {
		const record = this.records.get(id);
		if (!record) {
			return false;
		}
		record.lastUsed = Math.max(record.lastUsed, at);
		record.accessCount++;
		if (toolName) {
			record.toolUsage.set(toolName, (record.toolUsage.get(toolName) ?? 0) + 1);
		}
		return true;
	}

	private changed(id: string): void {
		this.changedAt.set(id, ++this.revisionCounter);
	}
}

function toView(record: MutableRecord): ActivationRecord {
	return {
		id: record.id,
		activatedAt: record.activatedAt,
		lastUsed: record.lastUsed,
		accessCount: record.accessCount,
		toolUsage: Object.fromEntries(record.toolUsage),
		tools: record.tools.map(tool => ({ ...tool })),
		reason: record.reason,
		origin: record.origin,
	};
}
