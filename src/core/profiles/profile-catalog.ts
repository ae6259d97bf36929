/**
 * Server Profiles
 *
 * Named server combinations for common kinds of work. The built-in set can be
 * overridden or extended by the `profiles:` section of the config file.
 */

import { z } from 'zod';
import defaultProfiles from './default-profiles.json' with { type: 'json' };

import { ConfigError } from '../errors/index.js';
import { readConfigFile, isPlainObject } from '../config/index.js';
import { logger } from '../logger/index.js';

const LOG_PREFIX = '[Profiles]';

const stringList = z.array(z.string().trim().min(1)).default([]);

export const profileEntrySchema = z
	.object({
		description: z.string().default(''),
		servers: z.array(z.string().trim().min(1)).min(1),
		autoActivate: z.boolean().default(true),
		estimatedTokens: z.number().int().nonnegative().default(0),
		keywords: stringList,
	})
	.strict();

const profileSectionSchema = z.record(z.string().trim().min(1), profileEntrySchema);

export interface ServerProfile {
	readonly name: string;
	readonly description: string;
	readonly servers: readonly string[];
	/** Whether a task match may activate the profile without confirmation */
	readonly autoActivate: boolean;
	readonly estimatedTokens: number;
	/** Lowercase substrings that select this profile for a task */
	readonly keywords: readonly string[];
}

function parseProfiles(raw: unknown, origin?: string): ServerProfile[] {
	const result = profileSectionSchema.safeParse(raw);
	if (!result.success) {
		const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
		throw new ConfigError(`Invalid profiles section: ${issues.join('; ')}`, origin, issues);
	}

	return Object.entries(result.data).map(([name, entry]) =>
		Object.freeze({
			name,
			description: entry.description,
			servers: Object.freeze([...new Set(entry.servers)]),
			autoActivate: entry.autoActivate,
			estimatedTokens: entry.estimatedTokens,
			keywords: Object.freeze(entry.keywords.map(keyword => keyword.toLowerCase())),
		})
	);
}

export class ProfileCatalog {
	private readonly profiles: ReadonlyMap<string, ServerProfile>;

	constructor(profiles: ServerProfile[]) {
		this.profiles = new Map(profiles.map(profile => [profile.name, profile]));
	}

	static defaults(): ProfileCatalog {
		return new ProfileCatalog(parseProfiles(defaultProfiles.profiles, 'built-in profiles'));
	}

	/**
	 * Built-in profiles with entries from a `profiles` section laid over them.
	 * A profile with a built-in name replaces it; new names are appended.
	 *
	 * @throws ConfigError when the section is malformed
	 */
	static withOverrides(section: unknown, origin?: string): ProfileCatalog {
		const merged = new Map(ProfileCatalog.defaults().profiles);
		for (const profile of parseProfiles(section, origin)) {
			merged.set(profile.name, profile);
		}
		return new ProfileCatalog([...merged.values()]);
	}

	/**
	 * Read the `profiles:` section of a config file, or of an already parsed
	 * config object. A missing section gives the built-in set; an unreadable
	 * file or bad section degrades to it with a warning.
	 */
	static async load(source?: string | Record<string, unknown>): Promise<ProfileCatalog> {
		if (!source) {
			return ProfileCatalog.defaults();
		}

		const origin = typeof source === 'string' ? source : 'inline config';
		try {
			const raw = typeof source === 'string' ? await readConfigFile(source) : source;
			const section = isPlainObject(raw) ? raw['profiles'] : undefined;
			if (section === undefined) {
				return ProfileCatalog.defaults();
			}
			const catalog = ProfileCatalog.withOverrides(section, origin);
			logger.info(`${LOG_PREFIX} Loaded ${catalog.size} profiles from ${origin}`);
			return catalog;
		} catch (error) {
			if (!(error instanceof ConfigError)) {
				throw error;
			}
			logger.warn(`${LOG_PREFIX} ${error.message}; using built-in profiles`);
			return ProfileCatalog.defaults();
		}
	}

	get size(): number {
		return this.profiles.size;
	}

	get(name: string): ServerProfile | undefined {
		return this.profiles.get(name);
	}

	names(): string[] {
		return [...this.profiles.keys()];
	}

	/**
	 * Profiles in declaration order
	 */
	list(): ServerProfile[] {
		return [...this.profiles.values()];
	}

	/**
	 * First profile, in declaration order, with a keyword contained in the task.
	 */
	findForTask(taskText: string): ServerProfile | undefined {
		const lowered = taskText.toLowerCase();
		if (!lowered.trim()) {
			return undefined;
		}
		return this.list().find(profile => profile.keywords.some(keyword => lowered.includes(keyword)));
	}
}
