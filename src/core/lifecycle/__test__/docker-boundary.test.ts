import { describe, it, expect, vi } from 'vitest';
import {
	DockerGatewayBoundary,
	parseInspection,
	parseServerList,
	parseToolList,
	spawnCommand,
	type CommandResult,
	type CommandRunner,
} from '../docker-boundary.js';
import { withTimeout } from '../boundary.js';

vi.mock('../../logger/index.js', () => ({
	logger: {
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	},
}));

const runnerReturning = (result: Partial<CommandResult>) =>
	vi.fn<CommandRunner>(async () => ({ exitCode: 0, stdout: '', stderr: '', ...result }));

describe('DockerGatewayBoundary', () => {
	it('should enable a server through the mcp subcommand', async () => {
		const runner = runnerReturning({ stdout: 'Enabled redis\n' });
		const boundary = new DockerGatewayBoundary({ runner });

		await expect(boundary.enable('redis')).resolves.toEqual({
			success: true,
			diagnostic: 'Enabled redis',
		});
		expect(runner).toHaveBeenCalledWith('docker', ['mcp', 'server', 'enable', 'redis'], {
			signal: undefined,
		});
	});

	it('should use the configured command to disable', async () => {
		const runner = runnerReturning({});
		const boundary = new DockerGatewayBoundary({ command: 'podman', runner });

		await boundary.disable('redis');

		expect(runner).toHaveBeenCalledWith('podman', ['mcp', 'server', 'disable', 'redis'], {
			signal: undefined,
		});
	});

	it('should report stderr on a non-zero exit', async () => {
		const boundary = new DockerGatewayBoundary({
			runner: runnerReturning({ exitCode: 1, stdout: 'ignored', stderr: 'auth required\n' }),
		});

		await expect(boundary.enable('redis')).resolves.toEqual({
			success: false,
			diagnostic: 'auth required',
		});
	});

	it('should fall back to stdout, then the exit code, for the diagnostic', async () => {
		const withStdout = new DockerGatewayBoundary({
			runner: runnerReturning({ exitCode: 2, stdout: 'no such server' }),
		});
		const silent = new DockerGatewayBoundary({ runner: runnerReturning({ exitCode: 3 }) });

		await expect(withStdout.enable('x')).resolves.toEqual({
			success: false,
			diagnostic: 'no such server',
		});
		await expect(silent.enable('x')).resolves.toEqual({
			success: false,
			diagnostic: 'exited with code 3',
		});
	});

	it('should describe a missing executable', async () => {
		const runner = vi.fn<CommandRunner>(async () => {
			throw Object.assign(new Error('spawn docker ENOENT'), { code: 'ENOENT' });
		});
		const boundary = new DockerGatewayBoundary({ runner });

		const result = await boundary.enable('redis');

		expect(result.success).toBe(false);
		expect(result.diagnostic).toBe(
			"'docker' not found. Ensure Docker Desktop is installed with the MCP Toolkit enabled."
		);
	});

	it('should list enabled servers', async () => {
		const boundary = new DockerGatewayBoundary({
			runner: runnerReturning({
				stdout: 'NAME        DESCRIPTION\n----------  -----\nredis       cache\n\ncontext7    docs\n',
			}),
		});

		await expect(boundary.listEnabled()).resolves.toEqual(['redis', 'context7']);
	});

	it('should throw when listing enabled servers fails', async () => {
		const boundary = new DockerGatewayBoundary({
			runner: runnerReturning({ exitCode: 1, stderr: 'daemon not running' }),
		});

		await expect(boundary.listEnabled()).rejects.toThrow('daemon not running');
	});

	it('should list tools of a server', async () => {
		const runner = runnerReturning({
			stdout: JSON.stringify([{ name: 'get', description: 'Read a key' }]),
		});
		const boundary = new DockerGatewayBoundary({ runner });

		await expect(boundary.listTools('redis')).resolves.toEqual([
			{ name: 'get', description: 'Read a key' },
		]);
		expect(runner).toHaveBeenCalledWith('docker', ['mcp', 'tools', 'list', '--server', 'redis'], {
			signal: undefined,
		});
	});

	it('should hand the abort signal to the runner', async () => {
		const runner = runnerReturning({});
		const boundary = new DockerGatewayBoundary({ runner });
		const controller = new AbortController();

		await boundary.disable('redis', controller.signal);

		expect(runner).toHaveBeenCalledWith('docker', ['mcp', 'server', 'disable', 'redis'], {
			signal: controller.signal,
		});
	});

	it('should abort a command that outlives its timeout', async () => {
		let received: AbortSignal | undefined;
		const runner = vi.fn<CommandRunner>(
			(_command, _args, options) =>
				new Promise<CommandResult>((_resolve, reject) => {
					received = options?.signal;
					options?.signal?.addEventListener('abort', () => reject(new Error('killed')));
				})
		);
		const boundary = new DockerGatewayBoundary({ runner });

		await expect(
			withTimeout('enable redis', 20, signal => boundary.enable('redis', signal))
		).rejects.toThrow('enable redis timed out after 20ms');
		expect(received?.aborted).toBe(true);
	});

	it('should describe a server from inspect output', async () => {
		const runner = runnerReturning({
			stdout: JSON.stringify({ name: 'redis', description: 'Key-value store' }),
		});
		const boundary = new DockerGatewayBoundary({ runner });

		await expect(boundary.inspect('redis')).resolves.toEqual({ description: 'Key-value store' });
		expect(runner).toHaveBeenCalledWith('docker', ['mcp', 'server', 'inspect', 'redis'], {
			signal: undefined,
		});
	});

	it('should list catalog servers from the server list', async () => {
		const boundary = new DockerGatewayBoundary({
			runner: runnerReturning({ stdout: 'NAME  DESCRIPTION\nredis  cache\n' }),
		});

		await expect(boundary.listServers()).resolves.toEqual(['redis']);
	});
});

describe('spawnCommand', () => {
	it('should collect output and the exit code', async () => {
		await expect(
			spawnCommand(process.execPath, ['-e', 'process.stdout.write("ok"); process.exit(3)'])
		).resolves.toEqual({ exitCode: 3, stdout: 'ok', stderr: '' });
	});

	it('should kill a child that never exits when the signal aborts', async () => {
		const controller = new AbortController();
		const running = spawnCommand(process.execPath, ['-e', 'setInterval(() => {}, 1000)'], {
			signal: controller.signal,
		});

		setTimeout(() => controller.abort(), 20);

		await expect(running).rejects.toMatchObject({ name: 'AbortError' });
	});
});

describe('parseServerList', () => {
	it('should return nothing for empty output', () => {
		expect(parseServerList('')).toEqual([]);
	});
});

describe('parseInspection', () => {
	it('should keep the first 200 characters of plain text', () => {
		expect(parseInspection(`  ${'a'.repeat(250)}\n`)).toEqual({ description: 'a'.repeat(200) });
	});

	it('should return nothing for JSON without a description', () => {
		expect(parseInspection(JSON.stringify({ name: 'redis', description: 42 }))).toEqual({});
	});
});

describe('parseToolList', () => {
	it('should accept a tools object', () => {
		expect(parseToolList(JSON.stringify({ tools: [{ name: 'search' }] }))).toEqual([
			{ name: 'search', description: '' },
		]);
	});

	it('should parse table output', () => {
		const output = ['TOOL      DESCRIPTION', '--------  ----', 'get       Read a key', 'flush', ''].join(
			'\n'
		);

		expect(parseToolList(output)).toEqual([
			{ name: 'get', description: 'Read a key' },
			{ name: 'flush', description: '' },
		]);
	});
});
