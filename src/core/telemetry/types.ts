export type TelemetryAction = 'activate' | 'deactivate';

/**
 * One lifecycle transition attempt. Frozen once recorded.
 */
export interface TelemetryEvent {
	readonly server: string;
	readonly action: TelemetryAction;
	readonly reason: string;
	readonly success: boolean;
	readonly latencyMs: number;
	/** Epoch milliseconds */
	readonly timestamp: number;
	readonly error?: string;
}

export type TelemetryInput = Omit<TelemetryEvent, 'timestamp'> & { timestamp?: number };

export interface TelemetryStats {
	totalActivations: number;
	successful: number;
	failed: number;
	avgLatencyMs: number;
	/** Activation attempts per server */
	perServerCount: Record<string, number>;
	totalDeactivations: number;
	failedDeactivations: number;
}

/**
 * Durable destination for telemetry events
 */
export interface TelemetryStore {
	append(event: TelemetryEvent): Promise<void>;
}
