/**
 * Gateway discovery
 *
 * Builds descriptors for the servers a gateway catalog reports, so servers that
 * no config file mentions can still be matched and activated. Results are
 * cached for {@link DEFAULT_DISCOVERY_TTL_MS}.
 */

import { describeError } from '../errors/index.js';
import { logger } from '../logger/index.js';
import { buildDescriptor, descriptorEntrySchema } from './schema.js';
import type { ServerDescriptor } from './types.js';

const LOG_PREFIX = '[Discovery]';

export const DEFAULT_DISCOVERY_TTL_MS = 5 * 60 * 1000;
const PREVIEW_SIZE = 5;

/**
 * First category whose keywords appear in a server's name or description.
 */
export const CATEGORY_KEYWORDS: ReadonlyArray<readonly [string, readonly string[]]> = [
	['database', ['redis', 'postgres', 'mysql', 'mongodb', 'sqlite', 'db']],
	['browser', ['playwright', 'puppeteer', 'selenium', 'browser']],
	['documentation', ['context7', 'docs', 'readme', 'documentation']],
	['version_control', ['github', 'gitlab', 'bitbucket', 'git']],
	['networking', ['fetch', 'http', 'curl', 'requests', 'api']],
	['system', ['desktop', 'commander', 'file', 'shell', 'command']],
	['reasoning', ['thinking', 'sequential', 'planning', 'reason']],
];

export interface ServerInspection {
	description?: string;
}

/**
 * Read side of the gateway used for discovery.
 */
export interface GatewayCatalog {
	listServers(): Promise<string[]>;
	inspect(id: string): Promise<ServerInspection>;
	listTools(id: string): Promise<ReadonlyArray<{ name: string }>>;
}

export interface GatewayDiscoveryOptions {
	ttlMs?: number;
	clock?: () => number;
}

export function detectCategory(id: string, description = ''): string {
	const text = `${id} ${description}`.toLowerCase();
	for (const [category, keywords] of CATEGORY_KEYWORDS) {
		if (keywords.some(keyword => text.includes(keyword))) {
			return category;
		}
	}
	return 'other';
}

export class GatewayDiscovery {
	private readonly ttlMs: number;
	private readonly clock: () => number;
	private cached?: { at: number; descriptors: ServerDescriptor[] };
	private running?: Promise<ServerDescriptor[]>;

	constructor(
		private readonly catalog: GatewayCatalog,
		options: GatewayDiscoveryOptions = {}
	) {
		this.ttlMs = options.ttlMs ?? DEFAULT_DISCOVERY_TTL_MS;
		this.clock = options.clock ?? Date.now;
	}

	/**
	 * Descriptors for every server in the catalog. A failed listing yields no
	 * servers and is not cached.
	 */
	async discover(force = false): Promise<ServerDescriptor[]> {
		if (!force && this.cached && this.clock() - this.cached.at < this.ttlMs) {
			logger.debug(`${LOG_PREFIX} Using cached discovery results`);
			return this.cached.descriptors;
		}
		if (!this.running) {
			this.running = this.scan().finally(() => {
				this.running = undefined;
			});
		}
		return this.running;
	}

	private async scan(): Promise<ServerDescriptor[]> {
		let ids: string[];
		try {
			ids = await this.catalog.listServers();
		} catch (error) {
			logger.error(`${LOG_PREFIX} Failed to list gateway servers: ${describeError(error)}`);
			return [];
		}

		const descriptors = await Promise.all(ids.map(id => this.describe(id)));
		this.cached = { at: this.clock(), descriptors };
		logger.info(`${LOG_PREFIX} Discovered ${descriptors.length} gateway servers`);
		return descriptors;
	}

	private async describe(id: string): Promise<ServerDescriptor> {
		const [inspection, tools] = await Promise.all([
			this.catalog.inspect(id).catch((error: unknown): ServerInspection => {
				logger.warn(`${LOG_PREFIX} Could not inspect ${id}: ${describeError(error)}`);
				return {};
			}),
			this.catalog.listTools(id).catch((error: unknown): ReadonlyArray<{ name: string }> => {
				logger.warn(`${LOG_PREFIX} Could not list tools for ${id}: ${describeError(error)}`);
				return [];
			}),
		]);

		const description = inspection.description ?? '';
		return buildDescriptor(
			id,
			descriptorEntrySchema.parse({
				purpose: description,
				category: detectCategory(id, description),
				toolCount: tools.length,
				toolsPreview: tools.slice(0, PREVIEW_SIZE).map(tool => tool.name),
			})
		);
	}
}
