/**
 * In-flight operations
 *
 * At most one boundary operation runs per server id. Claiming a slot is a
 * synchronous check-and-set, so it cannot interleave with another claim or
 * with a ledger commit; nothing is held while the gateway is being called.
 */

import type { ServerFailure } from '../errors/index.js';
import type { ToolInfo } from './boundary.js';

export type ActivateOutcome =
	| { status: 'activated'; tools: ToolInfo[] }
	| { status: 'alreadyActive'; tools: ToolInfo[] }
	| { status: 'failed'; failure: ServerFailure };

export type DeactivateOutcome =
	| { status: 'deactivated' }
	| { status: 'notActive' }
	| { status: 'failed'; failure: ServerFailure };

export type InFlightOperation =
	| { kind: 'activate'; outcome: Promise<ActivateOutcome> }
	| { kind: 'deactivate'; outcome: Promise<DeactivateOutcome> };

export class InFlightOperations {
	private readonly operations = new Map<string, InFlightOperation>();

	get(id: string): InFlightOperation | undefined {
		return this.operations.get(id);
	}

	has(id: string): boolean {
		return this.operations.has(id);
	}

	get size(): number {
		return this.operations.size;
	}

	/**
	 * Start `run` as the activation of `id`. The slot is released once it settles.
	 *
	 * @throws Error when another operation already holds the slot
	 */
	activation(id: string, run: () => Promise<ActivateOutcome>): Promise<ActivateOutcome> {
		this.assertFree(id);
		const outcome = this.release(id, run());
		this.operations.set(id, { kind: 'activate', outcome });
		return outcome;
	}

	/**
	 * Start `run` as the deactivation of `id`. The slot is released once it settles.
	 *
	 * @throws Error when another operation already holds the slot
	 */
	deactivation(id: string, run: () => Promise<DeactivateOutcome>): Promise<DeactivateOutcome> {
		this.assertFree(id);
		const outcome = this.release(id, run());
		this.operations.set(id, { kind: 'deactivate', outcome });
		return outcome;
	}

	private assertFree(id: string): void {
		if (this.operations.has(id)) {
			throw new Error(`An operation for '${id}' is already in flight`);
		}
	}

	private release<T>(id: string, running: Promise<T>): Promise<T> {
		const tracked: Promise<T> = running.finally(() => {
			if (this.operations.get(id)?.outcome === tracked) {
				this.operations.delete(id);
			}
		});
		return tracked;
	}
}
