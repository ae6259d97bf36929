import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';

import { CapabilityRegistry, GatewayDiscovery, loadDescriptorFile } from '../index.js';
import type { GatewayCatalog } from '../index.js';
import { ConfigError } from '../../errors/index.js';
import { LifecycleEventBus } from '../../events/index.js';
import { logger } from '../../logger/index.js';

vi.mock('../../logger/index.js', () => ({
	logger: {
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	},
}));

const yamlSource = `servers:
  redis:
    purpose: In-memory data store
    coveredTechnologies: [Redis, caching]
    relatedServers: [docs, redis, docs]
    category: database
  docs:
    purpose: Library documentation
    coveredTechnologies: [documentation]
    category: documentation
  pg:
    purpose: Relational database
    coveredTechnologies: [SQL, postgres]
    relatedServers: [docs]
    category: database
`;

describe('CapabilityRegistry', () => {
	let dir: string;

	beforeEach(async () => {
		vi.clearAllMocks();
		dir = await fs.mkdtemp(path.join(os.tmpdir(), 'toolswitch-registry-'));
	});

	afterEach(async () => {
		await fs.rm(dir, { recursive: true, force: true });
	});

	async function writeSource(name: string, content: string): Promise<string> {
		const file = path.join(dir, name);
		await fs.writeFile(file, content, 'utf-8');
		return file;
	}

	describe('loading', () => {
		it('should load descriptors from a YAML file', async () => {
			const file = await writeSource('capabilities.yaml', yamlSource);

			const registry = await CapabilityRegistry.load(file);
			const snapshot = registry.snapshot();

			expect(snapshot).toMatchObject({ version: 1, source: 'file', origin: file });
			expect(registry.ids()).toEqual(['docs', 'pg', 'redis']);
			expect(registry.get('docs')).toEqual({
				id: 'docs',
				purpose: 'Library documentation',
				coveredTechnologies: ['documentation'],
				whenToUse: '',
				relatedServers: [],
				toolCount: 0,
				toolsPreview: [],
				category: 'documentation',
			});
		});

		it('should drop duplicate and self dependencies', async () => {
			const registry = await CapabilityRegistry.load(await writeSource('c.yaml', yamlSource));

			expect(registry.relatedOf('redis')).toEqual(['docs']);
		});

		it('should use built-in defaults without a source', async () => {
			const registry = await CapabilityRegistry.load();

			expect(registry.snapshot().source).toBe('defaults');
			expect(registry.snapshot().servers.size).toBe(8);
			expect(registry.has('context7')).toBe(true);
		});

		it('should fall back to defaults when the file is missing', async () => {
			const registry = await CapabilityRegistry.load(path.join(dir, 'missing.yaml'));

			expect(registry.snapshot().source).toBe('defaults');
			expect(logger.warn).toHaveBeenCalledTimes(1);
		});

		it('should fall back to defaults when the source is malformed', async () => {
			const registry = await CapabilityRegistry.load({
				servers: { redis: { purpose: 'cache', toolCount: -1 } },
			});

			expect(registry.snapshot().source).toBe('defaults');
			expect(logger.warn).toHaveBeenCalledWith(
				expect.stringContaining('servers.redis.toolCount'),
				expect.objectContaining({ issues: [expect.stringContaining('servers.redis.toolCount')] })
			);
		});

		it('should load the shipped example config', async () => {
			const example = fileURLToPath(
				new URL('../../../../config/toolswitch.example.yaml', import.meta.url)
			);

			const descriptors = await loadDescriptorFile(example);

			expect(descriptors.map(descriptor => descriptor.id)).toEqual([
				'context7',
				'redis',
				'postgres',
				'playwright',
			]);
		});

		it('should reject unknown descriptor fields', async () => {
			const file = await writeSource('bad.json', JSON.stringify({ servers: { a: { colour: 'red' } } }));

			await expect(loadDescriptorFile(file)).rejects.toBeInstanceOf(ConfigError);
		});

		it('should report unparsable files as config errors', async () => {
			const file = await writeSource('broken.json', '{ "servers": ');

			await expect(loadDescriptorFile(file)).rejects.toThrow(/^Malformed configuration file/);
		});
	});

	describe('queries', () => {
		let registry: CapabilityRegistry;

		beforeEach(async () => {
			registry = await CapabilityRegistry.load(await writeSource('c.yaml', yamlSource));
		});

		it('should find servers by technology ignoring case', () => {
			expect(registry.findByTechnology('redis')).toEqual(['redis']);
			expect(registry.findByTechnology(' sql ')).toEqual(['pg']);
			expect(registry.findByTechnology('')).toEqual([]);
		});

		it('should list by category then id', () => {
			expect(registry.list().map(descriptor => descriptor.id)).toEqual(['pg', 'redis', 'docs']);
			expect(registry.list('database').map(descriptor => descriptor.id)).toEqual(['pg', 'redis']);
			expect(registry.categories()).toEqual(['database', 'documentation']);
		});

		it('should return an empty dependency list for unknown servers', () => {
			expect(registry.relatedOf('ghost')).toEqual([]);
		});
	});

	describe('reload', () => {
		it('should swap the whole snapshot and leave old snapshots intact', async () => {
			const file = await writeSource('c.yaml', yamlSource);
			const events = new LifecycleEventBus();
			const reloaded = vi.fn();
			events.on('registry:reloaded', reloaded);
			const registry = await CapabilityRegistry.load(file, { events, clock: () => 7 });
			const before = registry.snapshot();

			const after = await registry.reload({
				servers: { fetch: { purpose: 'HTTP fetching', coveredTechnologies: ['http'] } },
			});

			expect(before.servers.size).toBe(3);
			expect(after).toMatchObject({ version: 2, source: 'inline' });
			expect(registry.ids()).toEqual(['fetch']);
			expect(reloaded).toHaveBeenLastCalledWith({
				version: 2,
				serverCount: 1,
				source: 'inline',
				timestamp: 7,
			});
			expect(reloaded).toHaveBeenCalledTimes(2);
		});

		it('should re-read the last source when none is given', async () => {
			const file = await writeSource('c.yaml', yamlSource);
			const registry = await CapabilityRegistry.load(file);
			await fs.writeFile(file, 'servers:\n  solo:\n    purpose: Only one\n', 'utf-8');

			await registry.reload();

			expect(registry.ids()).toEqual(['solo']);
			expect(registry.get('solo')?.category).toBe('other');
		});
	});

	describe('discovery', () => {
		const catalogOf = (ids: string[]): GatewayCatalog => ({
			listServers: vi.fn(async () => ids),
			inspect: vi.fn(async (id: string) => ({ description: `${id} from the gateway` })),
			listTools: vi.fn(async () => []),
		});

		it('should add discovered servers and keep configured descriptors', async () => {
			const file = await writeSource('c.yaml', yamlSource);
			const discovery = new GatewayDiscovery(catalogOf(['redis', 'github']));

			const registry = await CapabilityRegistry.load(file, { discovery });

			expect(registry.ids()).toEqual(['docs', 'github', 'pg', 'redis']);
			expect(registry.get('redis')?.purpose).toBe('In-memory data store');
			expect(registry.get('github')).toMatchObject({
				purpose: 'github from the gateway',
				category: 'version_control',
			});
			expect(registry.snapshot().discovered).toBe(1);
		});

		it('should reuse cached results on reload unless asked to refresh', async () => {
			const catalog = catalogOf(['weather']);
			const registry = await CapabilityRegistry.load(undefined, {
				discovery: new GatewayDiscovery(catalog),
			});

			await registry.reload();
			expect(catalog.listServers).toHaveBeenCalledTimes(1);

			await registry.reload(undefined, { refreshDiscovery: true });
			expect(catalog.listServers).toHaveBeenCalledTimes(2);
			expect(registry.has('weather')).toBe(true);
			expect(registry.snapshot().discovered).toBe(1);
		});
	});
});
