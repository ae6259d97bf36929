export {
	CapabilityRegistry,
	defaultDescriptors,
	loadDescriptors,
	loadDescriptorFile,
	compareIds,
} from './capability-registry.js';
export type { CapabilityRegistryOptions, ReloadOptions } from './capability-registry.js';
export {
	GatewayDiscovery,
	detectCategory,
	CATEGORY_KEYWORDS,
	DEFAULT_DISCOVERY_TTL_MS,
} from './discovery.js';
export type { GatewayCatalog, GatewayDiscoveryOptions, ServerInspection } from './discovery.js';
export { parseDescriptorSource, buildDescriptor, descriptorEntrySchema } from './schema.js';
export type { DescriptorEntry } from './schema.js';
export type {
	ServerDescriptor,
	RegistrySnapshot,
	RegistrySource,
	DescriptorSource,
} from './types.js';
