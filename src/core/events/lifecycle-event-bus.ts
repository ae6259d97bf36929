import { TypedEventEmitter } from './typed-event-emitter.js';
import type { LifecycleEventMap } from './event-types.js';

export interface LifecycleEventBusOptions {
	enableLogging?: boolean;
	maxListeners?: number;
}

/**
 * Per-orchestrator event bus. Each orchestrator owns its own bus, so separate
 * instances in one process never see each other's events.
 */
export class LifecycleEventBus extends TypedEventEmitter<LifecycleEventMap> {
	constructor(options: LifecycleEventBusOptions = {}) {
		super({
			maxListeners: options.maxListeners ?? 50,
			enableLogging: options.enableLogging ?? false,
		});
	}
}
