import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { ProfileCatalog } from '../profile-catalog.js';
import { ConfigError } from '../../errors/index.js';
import { logger } from '../../logger/index.js';

vi.mock('../../logger/index.js', () => ({
	logger: {
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	},
}));

describe('ProfileCatalog', () => {
	describe('defaults', () => {
		const catalog = ProfileCatalog.defaults();

		it('should ship the built-in profiles in declaration order', () => {
			expect(catalog.names()).toEqual([
				'web-development',
				'data-science',
				'documentation',
				'full-stack',
				'database',
				'browser-automation',
			]);
		});

		it('should require confirmation for full-stack', () => {
			expect(catalog.get('full-stack')?.autoActivate).toBe(false);
			expect(catalog.get('documentation')).toEqual({
				name: 'documentation',
				description: 'Library documentation lookup',
				servers: ['context7'],
				autoActivate: true,
				estimatedTokens: 500,
				keywords: ['documentation', 'docs', 'api', 'reference', 'library'],
			});
		});

		it('should pick the first profile whose keyword appears in the task', () => {
			expect(catalog.findForTask('Scrape product pages with a headless browser')?.name).toBe(
				'web-development'
			);
			expect(catalog.findForTask('Write a SQL migration')?.name).toBe('data-science');
			expect(catalog.findForTask('Take a screenshot')?.name).toBe('browser-automation');
		});

		it('should find nothing for an unrelated or empty task', () => {
			expect(catalog.findForTask('bake bread')).toBeUndefined();
			expect(catalog.findForTask('  ')).toBeUndefined();
		});
	});

	describe('overrides', () => {
		it('should replace built-in profiles by name and append new ones', () => {
			const catalog = ProfileCatalog.withOverrides({
				documentation: { servers: ['docs-server'], keywords: ['Manual'] },
				ops: { description: 'Operations', servers: ['desktop-commander'], autoActivate: false },
			});

			expect(catalog.size).toBe(7);
			expect(catalog.get('documentation')).toMatchObject({
				servers: ['docs-server'],
				keywords: ['manual'],
				autoActivate: true,
			});
			expect(catalog.names().at(-1)).toBe('ops');
		});

		it('should reject a profile without servers', () => {
			expect(() => ProfileCatalog.withOverrides({ empty: { servers: [] } })).toThrow(ConfigError);
		});
	});

	describe('load', () => {
		let dir: string;

		beforeEach(async () => {
			vi.clearAllMocks();
			dir = await fs.mkdtemp(path.join(os.tmpdir(), 'toolswitch-profiles-'));
		});

		afterEach(async () => {
			await fs.rm(dir, { recursive: true, force: true });
		});

		it('should read the profiles section of a YAML config', async () => {
			const file = path.join(dir, 'config.yaml');
			await fs.writeFile(
				file,
				['servers: {}', 'profiles:', '  caching:', '    servers: [redis]', '    keywords: [cache]', ''].join(
					'\n'
				)
			);

			const catalog = await ProfileCatalog.load(file);

			expect(catalog.findForTask('warm the cache')?.servers).toEqual(['redis']);
		});

		it('should use the defaults when the file has no profiles section', async () => {
			const file = path.join(dir, 'config.json');
			await fs.writeFile(file, JSON.stringify({ servers: {} }));

			const catalog = await ProfileCatalog.load(file);

			expect(catalog.size).toBe(6);
		});

		it('should read the profiles section of an inline config object', async () => {
			const catalog = await ProfileCatalog.load({
				servers: {},
				profiles: { caching: { servers: ['redis'], keywords: ['cache'] } },
			});

			expect(catalog.findForTask('warm the cache')?.servers).toEqual(['redis']);
		});

		it('should degrade to the defaults when the file is missing', async () => {
			const catalog = await ProfileCatalog.load(path.join(dir, 'missing.yaml'));

			expect(catalog.size).toBe(6);
			expect(logger.warn).toHaveBeenCalledTimes(1);
		});
	});
});
