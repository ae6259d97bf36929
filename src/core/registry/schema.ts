import { z } from 'zod';

import { ConfigError } from '../errors/index.js';
import { isPlainObject } from '../config/index.js';
import type { ServerDescriptor } from './types.js';

const tagList = z.array(z.string().trim().min(1)).default([]);

export const descriptorEntrySchema = z
	.object({
		purpose: z.string().default(''),
		coveredTechnologies: tagList,
		whenToUse: z.string().default(''),
		relatedServers: tagList,
		toolCount: z.number().int().nonnegative().default(0),
		toolsPreview: tagList,
		category: z.string().trim().min(1).default('other'),
	})
	.strict();

export const descriptorSourceSchema = z
	.object({
		servers: z.record(z.string().trim().min(1), descriptorEntrySchema),
	})
	.passthrough();

export type DescriptorEntry = z.infer<typeof descriptorEntrySchema>;

function formatIssues(error: z.ZodError): string[] {
	return error.issues.map(issue => {
		const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
		return `${where}: ${issue.message}`;
	});
}

export function buildDescriptor(id: string, entry: DescriptorEntry): ServerDescriptor {
	const related = [...new Set(entry.relatedServers)].filter(related => related !== id);
	return Object.freeze({
		id,
		purpose: entry.purpose,
		coveredTechnologies: Object.freeze([...new Set(entry.coveredTechnologies)]),
		whenToUse: entry.whenToUse,
		relatedServers: Object.freeze(related),
		toolCount: entry.toolCount,
		toolsPreview: Object.freeze([...entry.toolsPreview]),
		category: entry.category,
	});
}

/**
 * Validate a descriptor source object and build frozen descriptors from it.
 *
 * @throws ConfigError when the object does not match the descriptor schema
 */
export function parseDescriptorSource(raw: unknown, origin?: string): ServerDescriptor[] {
	if (!isPlainObject(raw)) {
		throw new ConfigError('Descriptor source must be an object with a "servers" map', origin);
	}

	const result = descriptorSourceSchema.safeParse(raw);
	if (!result.success) {
		const issues = formatIssues(result.error);
		throw new ConfigError(`Invalid descriptor source: ${issues.join('; ')}`, origin, issues);
	}

	return Object.entries(result.data.servers).map(([id, entry]) => buildDescriptor(id, entry));
}
