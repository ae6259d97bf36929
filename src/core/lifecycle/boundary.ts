/**
 * Process-control boundary
 *
 * The only way the orchestrator talks to the gateway that actually starts and
 * stops backend servers.
 */

export interface ToolInfo {
	name: string;
	description: string;
}

export interface BoundaryResult {
	success: boolean;
	/** Command output on success, error text on failure */
	diagnostic: string;
}

/**
 * Every call takes an optional abort signal; the controller aborts it when the
 * call runs past its timeout.
 */
export interface ProcessControlBoundary {
	enable(id: string, signal?: AbortSignal): Promise<BoundaryResult>;
	disable(id: string, signal?: AbortSignal): Promise<BoundaryResult>;
	listTools(id: string, signal?: AbortSignal): Promise<ToolInfo[]>;
	listEnabled(signal?: AbortSignal): Promise<string[]>;
}

export class BoundaryTimeoutError extends Error {
	constructor(
		public readonly operation: string,
		public readonly timeoutMs: number
	) {
		super(`${operation} timed out after ${timeoutMs}ms`);
		this.name = 'BoundaryTimeoutError';
	}
}

/**
 * Race a boundary call against a timer. On timeout the signal handed to the
 * call is aborted so it can stop its work. The timer is always cleared.
 *
 * @throws BoundaryTimeoutError when the call does not settle in time
 */
export async function withTimeout<T>(
	operation: string,
	timeoutMs: number,
	call: (signal: AbortSignal) => Promise<T>
): Promise<T> {
	const controller = new AbortController();
	let timer: NodeJS.Timeout | undefined;
	const timeout = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			const error = new BoundaryTimeoutError(operation, timeoutMs);
			reject(error);
			controller.abort(error);
		}, timeoutMs);
	});

	try {
		return await Promise.race([call(controller.signal), timeout]);
	} finally {
		clearTimeout(timer);
	}
}
