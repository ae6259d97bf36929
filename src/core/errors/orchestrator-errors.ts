/**
 * Orchestrator Errors
 *
 * Error taxonomy shared by the registry, the lifecycle controller and the
 * control surface. Per-server failures of mutating calls are reported as
 * {@link ServerFailure} entries rather than thrown.
 */

export type OrchestratorErrorCode =
	| 'UNKNOWN_SERVER'
	| 'ACTIVATION_FAILED'
	| 'DEACTIVATION_FAILED'
	| 'CONFIG_ERROR'
	| 'SYNC_FAILED'
	| 'UNKNOWN_PROFILE';

/**
 * Base class for all orchestrator errors
 */
export abstract class OrchestratorError extends Error {
	public readonly code: OrchestratorErrorCode;
	public readonly serverId?: string;
	public readonly timestamp: Date;

	constructor(message: string, code: OrchestratorErrorCode, serverId?: string) {
		super(message);
		this.name = this.constructor.name;
		this.code = code;
		this.serverId = serverId;
		this.timestamp = new Date();

		Object.setPrototypeOf(this, new.target.prototype);
	}

	/**
	 * Convert error to a serializable object
	 */
	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			code: this.code,
			message: this.message,
			serverId: this.serverId,
			timestamp: this.timestamp.toISOString(),
		};
	}
}

/**
 * The server id is not present in the capability registry
 */
export class UnknownServerError extends OrchestratorError {
	public override readonly serverId: string;

	constructor(serverId: string) {
		super(`Unknown server '${serverId}'`, 'UNKNOWN_SERVER', serverId);
		this.serverId = serverId;
	}

	toFailure(): ServerFailure {
		return { id: this.serverId, code: this.code, diagnostic: this.message };
	}
}

/**
 * The gateway refused (or timed out) enabling a server
 */
export class ActivationFailedError extends OrchestratorError {
	public override readonly serverId: string;
	public readonly diagnostic: string;

	constructor(serverId: string, diagnostic: string) {
		super(`Failed to activate '${serverId}': ${diagnostic}`, 'ACTIVATION_FAILED', serverId);
		this.serverId = serverId;
		this.diagnostic = diagnostic;
	}

	toFailure(): ServerFailure {
		return { id: this.serverId, code: this.code, diagnostic: this.diagnostic };
	}
}

/**
 * The gateway refused (or timed out) disabling a server
 */
export class DeactivationFailedError extends OrchestratorError {
	public override readonly serverId: string;
	public readonly diagnostic: string;
	/** Whether the local record was dropped regardless */
	public readonly recordRemoved: boolean;

	constructor(serverId: string, diagnostic: string, recordRemoved = false) {
		super(
			`Failed to deactivate '${serverId}': ${diagnostic}${recordRemoved ? ' (record removed)' : ''}`,
			'DEACTIVATION_FAILED',
			serverId
		);
		this.serverId = serverId;
		this.diagnostic = diagnostic;
		this.recordRemoved = recordRemoved;
	}

	toFailure(): ServerFailure {
		return {
			id: this.serverId,
			code: this.code,
			diagnostic: this.diagnostic,
			recordRemoved: this.recordRemoved,
		};
	}
}

/**
 * The descriptor source is missing or malformed
 */
export class ConfigError extends OrchestratorError {
	public readonly source?: string;
	public readonly issues: string[];

	constructor(message: string, source?: string, issues: string[] = []) {
		super(message, 'CONFIG_ERROR');
		this.source = source;
		this.issues = issues;
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), source: this.source, issues: this.issues };
	}
}

/**
 * The gateway's list of enabled servers could not be read
 */
export class SyncFailedError extends OrchestratorError {
	constructor(diagnostic: string) {
		super(`Failed to read enabled servers from the gateway: ${diagnostic}`, 'SYNC_FAILED');
	}
}

export class UnknownProfileError extends OrchestratorError {
	public readonly available: string[];

	constructor(profile: string, available: string[]) {
		super(
			`Unknown profile '${profile}'. Available: ${available.join(', ') || 'none'}`,
			'UNKNOWN_PROFILE'
		);
		this.available = available;
	}
}

/**
 * Per-server failure entry returned by mutating calls
 */
export interface ServerFailure {
	id: string;
	code: OrchestratorErrorCode;
	diagnostic: string;
	/** Set when the failure happened while resolving a declared dependency */
	dependencyOf?: string;
	/** Deactivation only: whether the local record was dropped regardless */
	recordRemoved?: boolean;
}

export function isOrchestratorError(error: unknown): error is OrchestratorError {
	return error instanceof OrchestratorError;
}

export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
