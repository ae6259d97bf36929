import { logger } from '../logger/index.js';

export type EventListener<T> = (event: T) => void | Promise<void>;
export type EventListenerOptions = {
	signal?: AbortSignal;
	once?: boolean;
};

interface ListenerEntry<T> {
	listener: EventListener<T>;
	once: boolean;
}

type ListenerTable<EventMap> = { [K in keyof EventMap]?: ListenerEntry<EventMap[K]>[] };

type EventKey<EventMap> = Extract<keyof EventMap, string>;

/**
 * Minimal typed pub/sub. Listeners run synchronously in registration order;
 * a throwing (or rejecting) listener is logged and never reaches the emitter.
 */
export class TypedEventEmitter<EventMap extends object> {
	private readonly listeners: ListenerTable<EventMap> = {};
	private readonly maxListeners: number;
	private readonly enableLogging: boolean;

	constructor(options: { maxListeners?: number; enableLogging?: boolean } = {}) {
		this.maxListeners = options.maxListeners ?? 100;
		this.enableLogging = options.enableLogging ?? false;
	}

	/**
	 * Emit an event with type safety
	 */
	emit<K extends EventKey<EventMap>>(event: K, data: EventMap[K]): void {
		if (this.enableLogging) {
			logger.debug('Event emitted', { event });
		}

		const entries = this.listeners[event];
		if (!entries || entries.length === 0) {
			return;
		}

		// Copy so once-listeners can unregister while we iterate
		for (const entry of [...entries]) {
			if (entry.once) {
				this.off(event, entry.listener);
			}
			this.invoke(event, entry.listener, data);
		}
	}

	/**
	 * Add a typed event listener with AbortController support
	 */
	on<K extends EventKey<EventMap>>(
		event: K,
		listener: EventListener<EventMap[K]>,
		options: EventListenerOptions = {}
	): void {
		const entries = this.listeners[event] ?? [];
		if (entries.length >= this.maxListeners) {
			logger.warn(`Listener limit (${this.maxListeners}) reached for event '${event}'`);
		}
		entries.push({ listener, once: options.once ?? false });
		this.listeners[event] = entries;

		if (options.signal) {
			options.signal.addEventListener('abort', () => this.off(event, listener), { once: true });
		}
	}

	/**
	 * Add a one-time event listener
	 */
	once<K extends EventKey<EventMap>>(
		event: K,
		listener: EventListener<EventMap[K]>,
		options: Omit<EventListenerOptions, 'once'> = {}
	): void {
		this.on(event, listener, { ...options, once: true });
	}

	/**
	 * Remove an event listener
	 */
	off<K extends EventKey<EventMap>>(event: K, listener: EventListener<EventMap[K]>): void {
		const entries = this.listeners[event];
		if (!entries) {
			return;
		}
		const index = entries.findIndex(entry => entry.listener === listener);
		if (index !== -1) {
			entries.splice(index, 1);
		}
	}

	/**
	 * Get the number of listeners for an event
	 */
	listenerCountFor<K extends EventKey<EventMap>>(event: K): number {
		return this.listeners[event]?.length ?? 0;
	}

	/**
	 * Wait for a specific event to be emitted
	 */
	waitFor<K extends EventKey<EventMap>>(
		event: K,
		options: { timeout?: number } = {}
	): Promise<EventMap[K]> {
		return new Promise((resolve, reject) => {
			const timeoutMs = options.timeout ?? 30000;
			let timeoutId: NodeJS.Timeout | undefined;

			const listener = (data: EventMap[K]) => {
				if (timeoutId) {
					clearTimeout(timeoutId);
				}
				resolve(data);
			};

			if (timeoutMs > 0) {
				timeoutId = setTimeout(() => {
					this.off(event, listener);
					reject(new Error(`Event '${event}' timeout after ${timeoutMs}ms`));
				}, timeoutMs);
			}

			this.once(event, listener);
		});
	}

	private invoke<K extends EventKey<EventMap>>(
		event: K,
		listener: EventListener<EventMap[K]>,
		data: EventMap[K]
	): void {
		try {
			const result = listener(data);
			if (result instanceof Promise) {
				result.catch((error: unknown) => {
					logger.error(`Async event listener error for ${event}`, {
						error: error instanceof Error ? error.message : String(error),
					});
				});
			}
		} catch (error) {
			logger.error(`Event listener error for ${event}`, {
				error: error instanceof Error ? error.message : String(error),
			});
		}
	}
}
