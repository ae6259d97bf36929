/**
 * Capability Registry
 *
 * Maps server identifiers to descriptive metadata (purpose, covered
 * technologies, declared dependencies). The registry is held as an immutable
 * snapshot; reload builds a complete replacement and swaps the reference in a
 * single assignment, so readers never observe a half-updated registry.
 */

import defaultCapabilities from './default-capabilities.json' with { type: 'json' };

import { ConfigError } from '../errors/index.js';
import { readConfigFile } from '../config/index.js';
import { logger } from '../logger/index.js';
import type { LifecycleEventBus } from '../events/index.js';
import { parseDescriptorSource } from './schema.js';
import type { GatewayDiscovery } from './discovery.js';
import type {
	DescriptorSource,
	RegistrySnapshot,
	RegistrySource,
	ServerDescriptor,
} from './types.js';

const LOG_PREFIX = '[Registry]';

export interface CapabilityRegistryOptions {
	/** Event bus notified with `registry:reloaded` after every (re)load */
	events?: LifecycleEventBus;
	clock?: () => number;
	/** Adds gateway servers the descriptor source does not mention */
	discovery?: GatewayDiscovery;
}

export interface ReloadOptions {
	/** Ignore cached discovery results */
	refreshDiscovery?: boolean;
}

interface ResolvedDescriptors {
	descriptors: ServerDescriptor[];
	source: RegistrySource;
	origin?: string;
	discovered?: number;
}

/**
 * Built-in descriptors used when no source is given or the source is unusable.
 */
export function defaultDescriptors(): ServerDescriptor[] {
	return parseDescriptorSource(defaultCapabilities, 'built-in defaults');
}

/**
 * Read descriptors from a YAML or JSON file.
 *
 * @throws ConfigError when the file is missing, unparsable or fails validation
 */
export async function loadDescriptorFile(path: string): Promise<ServerDescriptor[]> {
	const raw = await readConfigFile(path);
	return parseDescriptorSource(raw, path);
}

/**
 * Resolve a descriptor source into descriptors.
 *
 * @throws ConfigError when the source is missing or malformed
 */
export async function loadDescriptors(source: DescriptorSource): Promise<ResolvedDescriptors> {
	if (typeof source === 'string') {
		return { descriptors: await loadDescriptorFile(source), source: 'file', origin: source };
	}
	return { descriptors: parseDescriptorSource(source), source: 'inline' };
}

export class CapabilityRegistry {
	private current: RegistrySnapshot;
	private lastSource?: DescriptorSource;
	private readonly events?: LifecycleEventBus;
	private readonly clock: () => number;
	private readonly discovery?: GatewayDiscovery;

	private constructor(resolved: ResolvedDescriptors, options: CapabilityRegistryOptions) {
		this.events = options.events;
		this.clock = options.clock ?? Date.now;
		this.discovery = options.discovery;
		this.current = this.buildSnapshot(resolved, 1);
	}

	/**
	 * Load a registry. A missing or malformed source degrades to the built-in
	 * defaults with a warning; loading never fails startup. With discovery,
	 * gateway servers without a configured descriptor are added.
	 */
	static async load(
		source?: DescriptorSource,
		options: CapabilityRegistryOptions = {}
	): Promise<CapabilityRegistry> {
		const resolved = await CapabilityRegistry.withDiscovered(
			await CapabilityRegistry.resolve(source),
			options.discovery,
			false
		);
		const registry = new CapabilityRegistry(resolved, options);
		registry.lastSource = source;
		registry.announce();
		return registry;
	}

	/**
	 * Build a registry from descriptors already in memory (tests, embedding hosts).
	 */
	static fromDescriptors(
		descriptors: ServerDescriptor[],
		options: CapabilityRegistryOptions = {}
	): CapabilityRegistry {
		return new CapabilityRegistry({ descriptors, source: 'inline' }, options);
	}

	private static async resolve(source?: DescriptorSource): Promise<ResolvedDescriptors> {
		if (source === undefined) {
			logger.info(`${LOG_PREFIX} No descriptor source configured, using built-in defaults`);
			return { descriptors: defaultDescriptors(), source: 'defaults' };
		}

		try {
			return await loadDescriptors(source);
		} catch (error) {
			if (!(error instanceof ConfigError)) {
				throw error;
			}
			logger.warn(`${LOG_PREFIX} ${error.message}; falling back to built-in defaults`, {
				source: error.source,
				issues: error.issues,
			});
			return { descriptors: defaultDescriptors(), source: 'defaults' };
		}
	}

	/**
	 * Configured descriptors win over discovered ones with the same id.
	 */
	private static async withDiscovered(
		resolved: ResolvedDescriptors,
		discovery: GatewayDiscovery | undefined,
		force: boolean
	): Promise<ResolvedDescriptors> {
		if (!discovery) {
			return resolved;
		}
		const configured = new Set(resolved.descriptors.map(descriptor => descriptor.id));
		const discovered = (await discovery.discover(force)).filter(
			descriptor => !configured.has(descriptor.id)
		);
		return {
			...resolved,
			descriptors: [...resolved.descriptors, ...discovered],
			discovered: discovered.length,
		};
	}

	/**
	 * The source the current snapshot was loaded from; undefined means built-in defaults.
	 */
	get descriptorSource(): DescriptorSource | undefined {
		return this.lastSource;
	}

	/**
	 * Replace the registry contents. Without a source the last source is re-read.
	 */
	async reload(source?: DescriptorSource, options: ReloadOptions = {}): Promise<RegistrySnapshot> {
		const effective = source ?? this.lastSource;
		const resolved = await CapabilityRegistry.withDiscovered(
			await CapabilityRegistry.resolve(effective),
			this.discovery,
			options.refreshDiscovery ?? false
		);
		const next = this.buildSnapshot(resolved, this.current.version + 1);

		// Single reference swap
		this.current = next;
		this.lastSource = effective;
		this.announce();
		return next;
	}

	snapshot(): RegistrySnapshot {
		return this.current;
	}

	get(id: string): ServerDescriptor | undefined {
		return this.current.servers.get(id);
	}

	has(id: string): boolean {
		return this.current.servers.has(id);
	}

	ids(): string[] {
		return [...this.current.servers.keys()].sort();
	}

	/**
	 * All descriptors ordered by category, then id.
	 */
	list(category?: string): ServerDescriptor[] {
		const all = [...this.current.servers.values()];
		const filtered = category ? all.filter(descriptor => descriptor.category === category) : all;
		return filtered.sort(
			(a, b) => a.category.localeCompare(b.category) || compareIds(a.id, b.id)
		);
	}

	categories(): string[] {
		return [...new Set([...this.current.servers.values()].map(d => d.category))].sort();
	}

	/**
	 * Ids of servers covering a technology tag (case-insensitive exact match).
	 */
	findByTechnology(tag: string): string[] {
		const wanted = tag.trim().toLowerCase();
		if (!wanted) {
			return [];
		}
		const matching: string[] = [];
		for (const descriptor of this.current.servers.values()) {
			if (descriptor.coveredTechnologies.some(tech => tech.toLowerCase() === wanted)) {
				matching.push(descriptor.id);
			}
		}
		return matching.sort(compareIds);
	}

	/**
	 * Declared dependencies of a server; empty when the server is unknown.
	 */
	relatedOf(id: string): string[] {
		return [...(this.current.servers.get(id)?.relatedServers ?? [])];
	}

	private buildSnapshot(resolved: ResolvedDescriptors, version: number): RegistrySnapshot {
		const servers = new Map<string, ServerDescriptor>();
		for (const descriptor of resolved.descriptors) {
			servers.set(descriptor.id, descriptor);
		}

		return Object.freeze({
			version,
			loadedAt: this.clock(),
			source: resolved.source,
			origin: resolved.origin,
			discovered: resolved.discovered ?? 0,
			servers,
		});
	}

	private announce(): void {
		const snapshot = this.current;
		logger.info(
			`${LOG_PREFIX} Loaded ${snapshot.servers.size} server descriptors (${snapshot.source}, v${snapshot.version})`,
			snapshot.discovered > 0 ? { discovered: snapshot.discovered } : undefined
		);
		this.events?.emit('registry:reloaded', {
			version: snapshot.version,
			serverCount: snapshot.servers.size,
			source: snapshot.source,
			timestamp: snapshot.loadedAt,
		});
	}
}

export function compareIds(a: string, b: string): number {
	if (a < b) return -1;
	if (a > b) return 1;
	return 0;
}
