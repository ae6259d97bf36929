/**
 * Configuration file loading (YAML or JSON).
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'js-yaml';

import { ConfigError, describeError } from '../errors/index.js';
import { logger } from '../logger/index.js';

const YAML_EXTENSIONS = new Set(['.yaml', '.yml']);

/**
 * Read and parse a configuration file. Files ending in .yaml/.yml are parsed as
 * YAML, everything else as JSON.
 *
 * @throws ConfigError when the file is missing, unreadable or not parseable
 */
export async function readConfigFile(configPath: string): Promise<unknown> {
	const resolvedPath = path.resolve(configPath);

	let content: string;
	try {
		content = await fs.readFile(resolvedPath, 'utf-8');
	} catch (error) {
		throw new ConfigError(
			`Cannot read configuration file '${resolvedPath}': ${describeError(error)}`,
			resolvedPath
		);
	}

	try {
		const parsed: unknown = YAML_EXTENSIONS.has(path.extname(resolvedPath).toLowerCase())
			? yaml.load(content)
			: JSON.parse(content);
		logger.debug(`[Config] Loaded configuration from: ${resolvedPath}`);
		return parsed;
	} catch (error) {
		throw new ConfigError(
			`Malformed configuration file '${resolvedPath}': ${describeError(error)}`,
			resolvedPath
		);
	}
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}
