import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

import { isPlainObject, readConfigFile } from '../index.js';
import { ConfigError } from '../../errors/index.js';

vi.mock('../../logger/index.js', () => ({
	logger: {
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	},
}));

describe('readConfigFile', () => {
	let dir: string;

	beforeEach(async () => {
		dir = await fs.mkdtemp(path.join(os.tmpdir(), 'toolswitch-config-'));
	});

	afterEach(async () => {
		await fs.rm(dir, { recursive: true, force: true });
	});

	it('should parse YAML by extension', async () => {
		const file = path.join(dir, 'servers.yml');
		await fs.writeFile(file, 'servers:\n  docs:\n    toolCount: 2\n', 'utf-8');

		await expect(readConfigFile(file)).resolves.toEqual({ servers: { docs: { toolCount: 2 } } });
	});

	it('should parse anything else as JSON', async () => {
		const file = path.join(dir, 'servers.conf');
		await fs.writeFile(file, '{"servers":{}}', 'utf-8');

		await expect(readConfigFile(file)).resolves.toEqual({ servers: {} });
	});

	it('should raise a config error naming a missing file', async () => {
		const file = path.join(dir, 'absent.yaml');

		const attempt = readConfigFile(file);

		await expect(attempt).rejects.toBeInstanceOf(ConfigError);
		await expect(attempt).rejects.toMatchObject({ source: file });
	});
});

describe('isPlainObject', () => {
	it('should accept only non-array objects', () => {
		expect(isPlainObject({})).toBe(true);
		expect(isPlainObject([])).toBe(false);
		expect(isPlainObject(null)).toBe(false);
		expect(isPlainObject('servers')).toBe(false);
	});
});
