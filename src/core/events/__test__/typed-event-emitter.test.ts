import { describe, it, expect, vi, beforeEach } from 'vitest';
import { LifecycleEventBus } from '../index.js';
import type { LifecycleEventMap } from '../index.js';
import { logger } from '../../logger/index.js';

vi.mock('../../logger/index.js', () => ({
	logger: {
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	},
}));

const swept: LifecycleEventMap['reaper:swept'] = {
	deactivated: ['redis'],
	failed: [],
	thresholdMs: 1000,
	timestamp: 42,
};

describe('LifecycleEventBus', () => {
	let bus: LifecycleEventBus;

	beforeEach(() => {
		vi.clearAllMocks();
		bus = new LifecycleEventBus();
	});

	it('should deliver events to listeners in registration order', () => {
		const calls: string[] = [];
		bus.on('reaper:swept', () => {
			calls.push('first');
		});
		bus.on('reaper:swept', event => {
			calls.push(`second:${event.deactivated.join(',')}`);
		});

		bus.emit('reaper:swept', swept);

		expect(calls).toEqual(['first', 'second:redis']);
	});

	it('should call once-listeners a single time', () => {
		const listener = vi.fn();
		bus.once('reaper:swept', listener);

		bus.emit('reaper:swept', swept);
		bus.emit('reaper:swept', swept);

		expect(listener).toHaveBeenCalledTimes(1);
		expect(bus.listenerCountFor('reaper:swept')).toBe(0);
	});

	it('should remove listeners with off and on abort', () => {
		const removed = vi.fn();
		const aborted = vi.fn();
		const controller = new AbortController();
		bus.on('reaper:swept', removed);
		bus.on('reaper:swept', aborted, { signal: controller.signal });

		bus.off('reaper:swept', removed);
		controller.abort();
		bus.emit('reaper:swept', swept);

		expect(removed).not.toHaveBeenCalled();
		expect(aborted).not.toHaveBeenCalled();
	});

	it('should log a throwing listener and keep delivering', () => {
		const after = vi.fn();
		bus.on('reaper:swept', () => {
			throw new Error('listener broke');
		});
		bus.on('reaper:swept', after);

		expect(() => bus.emit('reaper:swept', swept)).not.toThrow();
		expect(after).toHaveBeenCalledWith(swept);
		expect(logger.error).toHaveBeenCalledWith('Event listener error for reaper:swept', {
			error: 'listener broke',
		});
	});

	it('should log a rejecting async listener', async () => {
		bus.on('reaper:swept', async () => {
			throw new Error('async broke');
		});

		bus.emit('reaper:swept', swept);
		await Promise.resolve();
		await Promise.resolve();

		expect(logger.error).toHaveBeenCalledWith('Async event listener error for reaper:swept', {
			error: 'async broke',
		});
	});

	it('should resolve waitFor with the next event', async () => {
		const next = bus.waitFor('reaper:swept', { timeout: 1000 });

		bus.emit('reaper:swept', swept);

		await expect(next).resolves.toEqual(swept);
	});

	it('should reject waitFor after the timeout', async () => {
		vi.useFakeTimers();
		try {
			const next = bus.waitFor('registry:reloaded', { timeout: 50 });
			const assertion = expect(next).rejects.toThrow("Event 'registry:reloaded' timeout after 50ms");
			await vi.advanceTimersByTimeAsync(50);
			await assertion;
			expect(bus.listenerCountFor('registry:reloaded')).toBe(0);
		} finally {
			vi.useRealTimers();
		}
	});

	it('should keep separate buses isolated', () => {
		const other = new LifecycleEventBus();
		const listener = vi.fn();
		other.on('reaper:swept', listener);

		bus.emit('reaper:swept', swept);

		expect(listener).not.toHaveBeenCalled();
	});
});
