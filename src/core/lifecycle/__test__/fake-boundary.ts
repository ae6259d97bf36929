import { vi } from 'vitest';
import type { BoundaryResult, ProcessControlBoundary, ToolInfo } from '../boundary.js';

type HeldOperation = 'enable' | 'disable' | 'listTools' | 'listEnabled';

/**
 * In-process gateway stand-in. Servers listed in `refuse` fail to enable or
 * disable with the given diagnostic; `hold` keeps an operation waiting until
 * released. `listEnabled` answers with the state from when it was called.
 */
export class FakeBoundary implements ProcessControlBoundary {
	readonly enabled = new Set<string>();
	readonly tools = new Map<string, ToolInfo[]>();
	readonly refuseEnable = new Map<string, string>();
	readonly refuseDisable = new Map<string, string>();
	readonly gates = new Map<string, Promise<void>>();
	listToolsError?: Error;
	listEnabledError?: Error;

	readonly enable = vi.fn(async (id: string): Promise<BoundaryResult> => {
		await this.gates.get(`enable:${id}`);
		const refusal = this.refuseEnable.get(id);
		if (refusal !== undefined) {
			return { success: false, diagnostic: refusal };
		}
		this.enabled.add(id);
		return { success: true, diagnostic: `enabled ${id}` };
	});

	readonly disable = vi.fn(async (id: string): Promise<BoundaryResult> => {
		await this.gates.get(`disable:${id}`);
		const refusal = this.refuseDisable.get(id);
		if (refusal !== undefined) {
			return { success: false, diagnostic: refusal };
		}
		this.enabled.delete(id);
		return { success: true, diagnostic: `disabled ${id}` };
	});

	readonly listTools = vi.fn(async (id: string): Promise<ToolInfo[]> => {
		await this.gates.get(`listTools:${id}`);
		if (this.listToolsError) {
			throw this.listToolsError;
		}
		return this.tools.get(id) ?? [];
	});

	readonly listEnabled = vi.fn(async (): Promise<string[]> => {
		const snapshot = [...this.enabled];
		await this.gates.get('listEnabled:');
		if (this.listEnabledError) {
			throw this.listEnabledError;
		}
		return snapshot;
	});

	/**
	 * Hold an operation on an id until the returned function is called.
	 */
	hold(operation: HeldOperation, id = ''): () => void {
		let release: () => void = () => undefined;
		this.gates.set(
			`${operation}:${id}`,
			new Promise<void>(resolve => {
				release = () => {
					this.gates.delete(`${operation}:${id}`);
					resolve();
				};
			})
		);
		return () => release();
	}
}

export const tool = (name: string): ToolInfo => ({ name, description: `${name} tool` });
