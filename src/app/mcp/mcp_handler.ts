import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { describeError, isOrchestratorError, logger } from '../../core/index.js';
import type { Orchestrator } from '../../core/index.js';

const LOG_PREFIX = '[MCP Handler]';

export interface McpServerInfo {
	name: string;
	version: string;
}

interface RegisteredTool {
	tool: Tool;
	call(orchestrator: Orchestrator, rawArgs: unknown): Promise<CallToolResult>;
}

interface ToolDefinition<T> {
	name: string;
	description: string;
	inputSchema: Tool['inputSchema'];
	args: z.ZodType<T, z.ZodTypeDef, unknown>;
	run(orchestrator: Orchestrator, args: T): unknown;
}

function textResult(payload: unknown): CallToolResult {
	return { content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }] };
}

function errorResult(code: string, message: string): CallToolResult {
	return {
		content: [{ type: 'text', text: JSON.stringify({ error: { code, message } }, null, 2) }],
		isError: true,
	};
}

function defineTool<T>(definition: ToolDefinition<T>): RegisteredTool {
	return {
		tool: {
			name: definition.name,
			description: definition.description,
			inputSchema: definition.inputSchema,
		},
		async call(orchestrator, rawArgs) {
			const parsed = definition.args.safeParse(rawArgs ?? {});
			if (!parsed.success) {
				const issues = parsed.error.issues.map(
					issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`
				);
				return errorResult(
					'INVALID_ARGUMENTS',
					`Invalid arguments for ${definition.name}: ${issues.join('; ')}`
				);
			}
			return textResult(await definition.run(orchestrator, parsed.data));
		},
	};
}

const serverId = z.string().trim().min(1);
const serverList = z.array(serverId);
const confidence = z.number().min(0).max(1);
const topK = z.number().int().positive().max(50);
const noArgs = z.object({});

const taskProperties = {
	task: { type: 'string', description: 'Natural-language description of the task' },
	top_k: { type: 'integer', description: 'Maximum number of servers to return (default 5)' },
	min_confidence: {
		type: 'number',
		description: 'Drop suggestions below this confidence (0-1)',
	},
};

export const MCP_TOOLS: readonly RegisteredTool[] = [
	defineTool({
		name: 'get_capabilities',
		description: 'List every known server with its purpose, technologies and activation state.',
		inputSchema: {
			type: 'object',
			properties: {
				category: { type: 'string', description: 'Only list servers in this category' },
			},
		},
		args: z.object({ category: z.string().trim().min(1).optional() }),
		run: (orchestrator, args) => ({
			servers: orchestrator.catalog(args.category),
			categories: orchestrator.registry.categories(),
		}),
	}),
	defineTool({
		name: 'suggest_servers',
		description:
			'Suggest servers for a task, ranked by confidence. Declared dependencies are included.',
		inputSchema: { type: 'object', properties: taskProperties, required: ['task'] },
		args: z.object({
			task: z.string().trim().min(1),
			top_k: topK.optional(),
			min_confidence: confidence.optional(),
		}),
		run: async (orchestrator, args) => ({
			suggestions: await orchestrator.suggest(args.task, {
				topK: args.top_k,
				minConfidence: args.min_confidence,
			}),
		}),
	}),
	defineTool({
		name: 'activate_servers',
		description: 'Enable servers in the gateway and report the tools they expose.',
		inputSchema: {
			type: 'object',
			properties: {
				servers: { type: 'array', items: { type: 'string' }, description: 'Server ids' },
				reason: { type: 'string', description: 'Why the servers are needed' },
				auto_resolve_deps: {
					type: 'boolean',
					description: 'Also activate declared dependencies',
					default: false,
				},
			},
			required: ['servers'],
		},
		args: z.object({
			servers: serverList.min(1),
			reason: z.string().trim().min(1).optional(),
			auto_resolve_deps: z.boolean().optional(),
		}),
		run: (orchestrator, args) =>
			orchestrator.activate(args.servers, {
				reason: args.reason,
				autoResolveDeps: args.auto_resolve_deps,
			}),
	}),
	defineTool({
		name: 'deactivate_servers',
		description: 'Disable servers in the gateway. Without a list every active server is disabled.',
		inputSchema: {
			type: 'object',
			properties: {
				servers: { type: 'array', items: { type: 'string' }, description: 'Server ids' },
				reason: { type: 'string' },
				force: {
					type: 'boolean',
					description: 'Forget the server locally even when the gateway refuses',
					default: false,
				},
			},
		},
		args: z.object({
			servers: serverList.optional(),
			reason: z.string().trim().min(1).optional(),
			force: z.boolean().optional(),
		}),
		run: (orchestrator, args) =>
			orchestrator.deactivate(args.servers, { reason: args.reason, force: args.force }),
	}),
	defineTool({
		name: 'get_status',
		description: 'Active servers with tool counts, ages, idle times and the estimated token cost.',
		inputSchema: { type: 'object', properties: {} },
		args: noArgs,
		run: orchestrator => orchestrator.status(),
	}),
	defineTool({
		name: 'usage_stats',
		description: 'Per-server usage counters, activation telemetry and current idle candidates.',
		inputSchema: { type: 'object', properties: {} },
		args: noArgs,
		run: orchestrator => orchestrator.usageStats(),
	}),
	defineTool({
		name: 'reclaim_idle',
		description: 'Deactivate servers that have not been used within the idle threshold.',
		inputSchema: {
			type: 'object',
			properties: {
				threshold_ms: { type: 'integer', description: 'Idle threshold (default: configured)' },
				keep: { type: 'array', items: { type: 'string' }, description: 'Servers to leave active' },
			},
		},
		args: z.object({
			threshold_ms: z.number().int().nonnegative().optional(),
			keep: serverList.optional(),
		}),
		run: (orchestrator, args) =>
			orchestrator.reclaimIdle({ thresholdMs: args.threshold_ms, keep: args.keep }),
	}),
	defineTool({
		name: 'sync_state',
		description: 'Reconcile local state with the servers the gateway reports as enabled.',
		inputSchema: { type: 'object', properties: {} },
		args: noArgs,
		run: orchestrator => orchestrator.sync(),
	}),
	defineTool({
		name: 'record_usage',
		description: 'Mark a server as used so it is not reclaimed while in use.',
		inputSchema: {
			type: 'object',
			properties: {
				server: { type: 'string' },
				tool: { type: 'string', description: 'Name of the tool that was called' },
			},
			required: ['server'],
		},
		args: z.object({ server: serverId, tool: z.string().trim().min(1).optional() }),
		run: (orchestrator, args) => ({
			server: args.server,
			recorded: orchestrator.recordUse(args.server, args.tool),
		}),
	}),
	defineTool({
		name: 'server_info',
		description: 'Descriptor and activation record of a single server.',
		inputSchema: {
			type: 'object',
			properties: { server: { type: 'string' } },
			required: ['server'],
		},
		args: z.object({ server: serverId }),
		run: (orchestrator, args) => orchestrator.serverInfo(args.server),
	}),
	defineTool({
		name: 'list_profiles',
		description: 'Named server bundles and the keywords that select them.',
		inputSchema: { type: 'object', properties: {} },
		args: noArgs,
		run: orchestrator => ({ profiles: orchestrator.listProfiles() }),
	}),
	defineTool({
		name: 'activate_profile',
		description: 'Activate every server of a named profile, with dependencies.',
		inputSchema: {
			type: 'object',
			properties: { profile: { type: 'string' } },
			required: ['profile'],
		},
		args: z.object({ profile: z.string().trim().min(1) }),
		run: (orchestrator, args) => orchestrator.activateProfile(args.profile),
	}),
	defineTool({
		name: 'activate_for_task',
		description:
			'Activate what a task needs: a matching profile, or else the suggested servers.',
		inputSchema: {
			type: 'object',
			properties: {
				...taskProperties,
				use_profiles: { type: 'boolean', default: true },
				auto_resolve_deps: { type: 'boolean', default: true },
			},
			required: ['task'],
		},
		args: z.object({
			task: z.string().trim().min(1),
			use_profiles: z.boolean().optional(),
			auto_resolve_deps: z.boolean().optional(),
			min_confidence: confidence.optional(),
			top_k: topK.optional(),
		}),
		run: (orchestrator, args) =>
			orchestrator.activateForTask(args.task, {
				useProfiles: args.use_profiles,
				autoResolveDeps: args.auto_resolve_deps,
				minConfidence: args.min_confidence,
				topK: args.top_k,
			}),
	}),
	defineTool({
		name: 'reload_capabilities',
		description:
			'Re-read server descriptors and profiles from the config file, plus discovered gateway servers.',
		inputSchema: {
			type: 'object',
			properties: {
				path: { type: 'string', description: 'Descriptor file; defaults to the last one loaded' },
				refresh_discovery: {
					type: 'boolean',
					description: 'Ask the gateway again instead of using cached discovery results',
					default: false,
				},
			},
		},
		args: z.object({
			path: z.string().trim().min(1).optional(),
			refresh_discovery: z.boolean().optional(),
		}),
		run: (orchestrator, args) =>
			orchestrator.reloadCapabilities(args.path, { refreshDiscovery: args.refresh_discovery }),
	}),
];

const TOOLS_BY_NAME = new Map(MCP_TOOLS.map(registered => [registered.tool.name, registered]));

/**
 * Run one tool call. Unknown tools, invalid arguments and orchestrator errors
 * come back as `isError` results.
 */
export async function handleToolCall(
	orchestrator: Orchestrator,
	name: string,
	args: unknown
): Promise<CallToolResult> {
	const registered = TOOLS_BY_NAME.get(name);
	if (!registered) {
		return errorResult('UNKNOWN_TOOL', `Unknown tool '${name}'`);
	}

	try {
		return await registered.call(orchestrator, args);
	} catch (error) {
		if (isOrchestratorError(error)) {
			logger.warn(`${LOG_PREFIX} ${name} failed: ${error.message}`, { code: error.code });
			return errorResult(error.code, error.message);
		}
		logger.error(`${LOG_PREFIX} Error in tool '${name}'`, { error: describeError(error) });
		return errorResult('INTERNAL_ERROR', describeError(error));
	}
}

/**
 * Build an MCP server exposing the orchestrator's control surface as tools.
 */
export function initializeMcpServer(orchestrator: Orchestrator, info: McpServerInfo): Server {
	const server = new Server(
		{ name: info.name, version: info.version },
		{ capabilities: { tools: {} } }
	);

	server.setRequestHandler(ListToolsRequestSchema, async () => ({
		tools: MCP_TOOLS.map(registered => registered.tool),
	}));

	server.setRequestHandler(CallToolRequestSchema, async request => {
		const { name, arguments: args } = request.params;
		logger.info(`${LOG_PREFIX} Tool called: ${name}`, { toolName: name });
		return handleToolCall(orchestrator, name, args);
	});

	logger.info(
		`${LOG_PREFIX} Registered ${MCP_TOOLS.length} MCP tools: ${MCP_TOOLS.map(t => t.tool.name).join(', ')}`
	);
	return server;
}

/**
 * Serve the orchestrator over stdio until the client disconnects.
 */
export async function startStdioServer(
	orchestrator: Orchestrator,
	info: McpServerInfo
): Promise<Server> {
	const server = initializeMcpServer(orchestrator, info);
	logger.info(`${LOG_PREFIX} Creating stdio transport`);
	await server.connect(new StdioServerTransport());
	return server;
}
