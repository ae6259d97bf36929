/**
 * Docker MCP gateway boundary
 *
 * Enables and disables servers through the `docker mcp` CLI.
 */

import { spawn } from 'child_process';
import { z } from 'zod';
import { logger } from '../logger/index.js';
import type { GatewayCatalog, ServerInspection } from '../registry/index.js';
import type { BoundaryResult, ProcessControlBoundary, ToolInfo } from './boundary.js';
import { LOG_PREFIXES } from './constants.js';

const LOG_PREFIX = LOG_PREFIXES.GATEWAY;

export interface CommandResult {
	exitCode: number;
	stdout: string;
	stderr: string;
}

export interface RunOptions {
	/** Kills the child process when aborted */
	signal?: AbortSignal;
}

export type CommandRunner = (
	command: string,
	args: string[],
	options?: RunOptions
) => Promise<CommandResult>;

export interface DockerGatewayBoundaryOptions {
	/** Executable providing the `mcp` subcommand */
	command?: string;
	runner?: CommandRunner;
}

const toolEntrySchema = z
	.object({
		name: z.string().min(1),
		description: z.string().nullish(),
	})
	.passthrough();

const toolListSchema = z.union([
	z.array(toolEntrySchema),
	z.object({ tools: z.array(toolEntrySchema) }).passthrough(),
]);

/**
 * Run a command to completion and collect its output.
 */
export const spawnCommand: CommandRunner = (command, args, options = {}) =>
	new Promise<CommandResult>((resolve, reject) => {
		let stdout = '';
		let stderr = '';

		const child = spawn(command, args, {
			stdio: ['ignore', 'pipe', 'pipe'],
			signal: options.signal,
		});

		child.stdout.on('data', (data: Buffer) => {
			stdout += data.toString();
		});
		child.stderr.on('data', (data: Buffer) => {
			stderr += data.toString();
		});
		child.on('error', reject);
		child.on('close', (code: number | null) => {
			resolve({ exitCode: code ?? 1, stdout, stderr });
		});
	});

export class DockerGatewayBoundary implements ProcessControlBoundary, GatewayCatalog {
	private readonly command: string;
	private readonly runner: CommandRunner;

	constructor(options: DockerGatewayBoundaryOptions = {}) {
		this.command = options.command ?? 'docker';
		this.runner = options.runner ?? spawnCommand;
	}

	enable(id: string, signal?: AbortSignal): Promise<BoundaryResult> {
		return this.run(['server', 'enable', id], signal);
	}

	disable(id: string, signal?: AbortSignal): Promise<BoundaryResult> {
		return this.run(['server', 'disable', id], signal);
	}

	async listEnabled(signal?: AbortSignal): Promise<string[]> {
		return parseServerList(await this.output(['server', 'ls'], signal));
	}

	async listTools(id: string, signal?: AbortSignal): Promise<ToolInfo[]> {
		return parseToolList(await this.output(['tools', 'list', '--server', id], signal));
	}

	// ===== Catalog =====

	listServers(): Promise<string[]> {
		return this.listEnabled();
	}

	async inspect(id: string): Promise<ServerInspection> {
		return parseInspection(await this.output(['server', 'inspect', id]));
	}

	private async output(args: string[], signal?: AbortSignal): Promise<string> {
		const result = await this.run(args, signal);
		if (!result.success) {
			throw new Error(result.diagnostic);
		}
		return result.diagnostic;
	}

	private async run(args: string[], signal?: AbortSignal): Promise<BoundaryResult> {
		const fullArgs = ['mcp', ...args];
		logger.debug(`${LOG_PREFIX} Executing: ${this.command} ${fullArgs.join(' ')}`);

		try {
			const { exitCode, stdout, stderr } = await this.runner(this.command, fullArgs, { signal });
			if (exitCode === 0) {
				return { success: true, diagnostic: stdout.trim() };
			}
			const diagnostic = stderr.trim() || stdout.trim() || `exited with code ${exitCode}`;
			logger.debug(`${LOG_PREFIX} Command failed: ${diagnostic}`);
			return { success: false, diagnostic };
		} catch (error) {
			if (isMissingExecutable(error)) {
				return {
					success: false,
					diagnostic: `'${this.command}' not found. Ensure Docker Desktop is installed with the MCP Toolkit enabled.`,
				};
			}
			return {
				success: false,
				diagnostic: `Error: ${error instanceof Error ? error.message : String(error)}`,
			};
		}
	}
}

/**
 * Server ids from `mcp server ls` output: first column, header and rule lines skipped.
 */
export function parseServerList(output: string): string[] {
	const ids: string[] = [];
	for (const raw of output.split('\n')) {
		const line = raw.trim();
		if (!line || line.startsWith('NAME') || line.startsWith('-')) continue;
		const [id] = line.split(/\s+/);
		if (id) ids.push(id);
	}
	return ids;
}

/**
 * Tools from `mcp tools list` output: a JSON array, a `{ tools }` object, or a table.
 */
export function parseToolList(output: string): ToolInfo[] {
	const parsed = toolListSchema.safeParse(tryParseJson(output));
	if (parsed.success) {
		const entries = Array.isArray(parsed.data) ? parsed.data : parsed.data.tools;
		return entries.map(entry => ({ name: entry.name, description: entry.description ?? '' }));
	}

	const tools: ToolInfo[] = [];
	for (const raw of output.split('\n')) {
		const line = raw.trim();
		if (!line || line.startsWith('TOOL') || line.startsWith('-')) continue;
		const match = /^(\S+)\s*(.*)$/.exec(line);
		if (match?.[1]) {
			tools.push({ name: match[1], description: match[2] ?? '' });
		}
	}
	return tools;
}

const inspectionSchema = z
	.object({
		description: z.string().optional().catch(undefined),
	})
	.passthrough();

/**
 * Description from `mcp server inspect` output: a JSON object, or the first
 * 200 characters of plain text.
 */
export function parseInspection(output: string): ServerInspection {
	const json = tryParseJson(output);
	if (json !== undefined) {
		const parsed = inspectionSchema.safeParse(json);
		return parsed.success && parsed.data.description
			? { description: parsed.data.description }
			: {};
	}
	const text = output.trim().slice(0, 200);
	return text ? { description: text } : {};
}

function tryParseJson(text: string): unknown {
	try {
		return JSON.parse(text);
	} catch {
		return undefined;
	}
}

function isMissingExecutable(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
