import { describe, it, expect } from 'vitest';
import {
	ActivationFailedError,
	ConfigError,
	DeactivationFailedError,
	OrchestratorError,
	SyncFailedError,
	UnknownProfileError,
	UnknownServerError,
	describeError,
	isOrchestratorError,
} from '../index.js';

describe('Orchestrator errors', () => {
	it('should carry code, server id and name', () => {
		const error = new UnknownServerError('ghost');

		expect(error).toBeInstanceOf(OrchestratorError);
		expect(error).toBeInstanceOf(Error);
		expect(error.name).toBe('UnknownServerError');
		expect(error.code).toBe('UNKNOWN_SERVER');
		expect(error.serverId).toBe('ghost');
		expect(error.message).toBe("Unknown server 'ghost'");
	});

	it('should keep the boundary diagnostic', () => {
		const error = new ActivationFailedError('redis', 'auth required');

		expect(error.diagnostic).toBe('auth required');
		expect(error.message).toBe("Failed to activate 'redis': auth required");
	});

	it('should build per-server failure entries', () => {
		expect(new UnknownServerError('ghost').toFailure()).toEqual({
			id: 'ghost',
			code: 'UNKNOWN_SERVER',
			diagnostic: "Unknown server 'ghost'",
		});
		expect(new ActivationFailedError('redis', 'auth required').toFailure()).toEqual({
			id: 'redis',
			code: 'ACTIVATION_FAILED',
			diagnostic: 'auth required',
		});
		expect(new DeactivationFailedError('redis', 'busy', true).toFailure()).toEqual({
			id: 'redis',
			code: 'DEACTIVATION_FAILED',
			diagnostic: 'busy',
			recordRemoved: true,
		});
	});

	it('should note a dropped record in the deactivation message', () => {
		expect(new DeactivationFailedError('redis', 'busy', true).message).toBe(
			"Failed to deactivate 'redis': busy (record removed)"
		);
		expect(new DeactivationFailedError('redis', 'busy').message).toBe(
			"Failed to deactivate 'redis': busy"
		);
	});

	it('should serialize config issues', () => {
		const error = new ConfigError('Invalid descriptor source', 'servers.yaml', ['servers: Required']);

		expect(error.toJSON()).toMatchObject({
			name: 'ConfigError',
			code: 'CONFIG_ERROR',
			message: 'Invalid descriptor source',
			source: 'servers.yaml',
			issues: ['servers: Required'],
		});
	});

	it('should list available profiles', () => {
		expect(new UnknownProfileError('nope', ['database', 'documentation']).message).toBe(
			"Unknown profile 'nope'. Available: database, documentation"
		);
		expect(new UnknownProfileError('nope', []).message).toBe("Unknown profile 'nope'. Available: none");
	});

	it('should recognise orchestrator errors', () => {
		expect(isOrchestratorError(new SyncFailedError('docker not found'))).toBe(true);
		expect(isOrchestratorError(new Error('plain'))).toBe(false);
	});

	it('should describe any thrown value', () => {
		expect(describeError(new Error('boom'))).toBe('boom');
		expect(describeError('text')).toBe('text');
		expect(describeError(42)).toBe('42');
	});
});
