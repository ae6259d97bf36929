/**
 * Capability Registry Types
 *
 * @module registry/types
 */

/**
 * Registry entry describing what a backend server is for. Frozen once built.
 */
export interface ServerDescriptor {
	/** Unique, stable server identifier (the gateway's server name) */
	readonly id: string;
	/** Human-readable purpose */
	readonly purpose: string;
	/** Covered-technology tags, matched case-insensitively */
	readonly coveredTechnologies: readonly string[];
	/** Free-text usage hint */
	readonly whenToUse: string;
	/** Declared dependencies, de-duplicated, without self references */
	readonly relatedServers: readonly string[];
	/** Estimated number of tools the server exposes */
	readonly toolCount: number;
	readonly toolsPreview: readonly string[];
	readonly category: string;
}

export type RegistrySource = 'file' | 'inline' | 'defaults';

/**
 * Immutable view of the registry. A reload builds a new snapshot and swaps the
 * reference; readers holding an older snapshot keep a consistent view.
 */
export interface RegistrySnapshot {
	readonly version: number;
	readonly loadedAt: number;
	readonly source: RegistrySource;
	/** File path for file sources */
	readonly origin?: string;
	/** Servers added by gateway discovery */
	readonly discovered: number;
	readonly servers: ReadonlyMap<string, ServerDescriptor>;
}

/**
 * Where descriptors come from: a YAML/JSON file path, or an already parsed
 * object shaped like the file (`{ servers: { ... } }`).
 */
export type DescriptorSource = string | Record<string, unknown>;
