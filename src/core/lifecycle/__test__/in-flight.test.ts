import { describe, it, expect } from 'vitest';
import { InFlightOperations } from '../in-flight.js';
import type { ActivateOutcome } from '../in-flight.js';

const deferred = <T>() => {
	let resolve: (value: T) => void = () => undefined;
	const promise = new Promise<T>(res => {
		resolve = res;
	});
	return { promise, resolve };
};

describe('InFlightOperations', () => {
	it('should hold the slot until the operation settles', async () => {
		const operations = new InFlightOperations();
		const pending = deferred<ActivateOutcome>();

		const outcome = operations.activation('redis', () => pending.promise);

		expect(operations.get('redis')?.kind).toBe('activate');
		expect(operations.size).toBe(1);
		pending.resolve({ status: 'activated', tools: [] });
		await expect(outcome).resolves.toEqual({ status: 'activated', tools: [] });
		expect(operations.has('redis')).toBe(false);
	});

	it('should release the slot when the operation rejects', async () => {
		const operations = new InFlightOperations();

		const outcome = operations.deactivation('redis', async () => {
			throw new Error('boom');
		});

		await expect(outcome).rejects.toThrow('boom');
		expect(operations.has('redis')).toBe(false);
	});

	it('should refuse a second claim on a busy id', () => {
		const operations = new InFlightOperations();
		operations.activation('redis', () => new Promise<ActivateOutcome>(() => undefined));

		expect(() =>
			operations.deactivation('redis', async () => ({ status: 'deactivated' }))
		).toThrow("An operation for 'redis' is already in flight");
	});

	it('should keep ids independent', async () => {
		const operations = new InFlightOperations();
		const slow = deferred<ActivateOutcome>();

		operations.activation('redis', () => slow.promise);
		await operations.activation('docs', async () => ({ status: 'alreadyActive', tools: [] }));

		expect(operations.has('redis')).toBe(true);
		expect(operations.has('docs')).toBe(false);
	});
});
