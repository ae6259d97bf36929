// Lifecycle events emitted by an orchestrator instance
export interface LifecycleEventMap {
	'server:activated': {
		serverId: string;
		reason: string;
		toolCount: number;
		latencyMs: number;
		timestamp: number;
	};
	'server:activationFailed': {
		serverId: string;
		reason: string;
		error: string;
		latencyMs: number;
		timestamp: number;
	};
	'server:deactivated': {
		serverId: string;
		reason: string;
		forced: boolean;
		timestamp: number;
	};
	'server:deactivationFailed': {
		serverId: string;
		reason: string;
		error: string;
		recordRemoved: boolean;
		timestamp: number;
	};
	'registry:reloaded': {
		version: number;
		serverCount: number;
		source: 'file' | 'inline' | 'defaults';
		timestamp: number;
	};
	'reaper:swept': {
		deactivated: string[];
		failed: string[];
		thresholdMs: number;
		timestamp: number;
	};
}

export type LifecycleEventName = keyof LifecycleEventMap;
