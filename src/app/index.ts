#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import pkg from '../../package.json' with { type: 'json' };

import { describeError, getEnv, logger, Orchestrator } from '../core/index.js';
import type { CatalogEntry, MatchResult } from '../core/index.js';
import { startStdioServer } from './mcp/mcp_handler.js';

interface GlobalOptions {
	config?: string;
	logLevel?: string;
}

function parseInteger(value: string): number {
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed <= 0) {
		throw new InvalidArgumentError('Expected a positive integer.');
	}
	return parsed;
}

function parseConfidence(value: string): number {
	const parsed = Number(value);
	if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
		throw new InvalidArgumentError('Expected a number between 0 and 1.');
	}
	return parsed;
}

function formatSuggestions(suggestions: MatchResult[]): string {
	if (suggestions.length === 0) {
		return chalk.gray('No matching servers');
	}
	const width = Math.max(...suggestions.map(s => s.id.length));
	return suggestions
		.map(
			s =>
				`${chalk.cyan(s.id.padEnd(width))}  ${s.confidence.toFixed(2)}  ${chalk.gray(s.reason)}`
		)
		.join('\n');
}

function formatCatalog(entries: CatalogEntry[]): string {
	if (entries.length === 0) {
		return chalk.gray('No servers');
	}
	const width = Math.max(...entries.map(entry => entry.id.length));
	return entries
		.map(entry => {
			const marker = entry.active ? chalk.green('●') : chalk.gray('○');
			return `${marker} ${chalk.cyan(entry.id.padEnd(width))}  [${entry.category}] ${entry.purpose}`;
		})
		.join('\n');
}

const program = new Command();

program
	.name('toolswitch')
	.description('Activate MCP gateway servers on demand and reclaim idle ones')
	.version(pkg.version, '-v, --version', 'output the current version')
	.option('-c, --config <path>', 'Server descriptor and profile file (YAML or JSON)')
	.option('--log-level <level>', 'error | warn | info | debug | silly')
	.hook('preAction', () => {
		const { logLevel } = program.opts<GlobalOptions>();
		if (logLevel) {
			logger.setLevel(logLevel);
		}
	});

program
	.command('serve')
	.description('Run the orchestrator as an MCP server over stdio')
	.action(async () => {
		const env = getEnv();
		// stdout carries MCP traffic; the console transport already writes to stderr
		if (env.TOOLSWITCH_LOG_FILE) {
			logger.redirectToFile(env.TOOLSWITCH_LOG_FILE);
		}

		const orchestrator = await Orchestrator.create({
			env,
			configPath: program.opts<GlobalOptions>().config,
		});
		await orchestrator.reconcile();
		orchestrator.start();
		const server = await startStdioServer(orchestrator, { name: 'toolswitch', version: pkg.version });

		let stopping = false;
		const handleShutdown = async (signal: string) => {
			if (stopping) return;
			stopping = true;
			logger.info(`Received ${signal}, shutting down`);
			try {
				await server.close();
				await orchestrator.shutdown();
				process.exit(0);
			} catch (error) {
				logger.error(`Shutdown failed: ${describeError(error)}`);
				process.exit(1);
			}
		};
		process.on('SIGINT', signal => void handleShutdown(signal));
		process.on('SIGTERM', signal => void handleShutdown(signal));
		process.stdin.on('end', () => void handleShutdown('stdin end'));
	});

program
	.command('suggest')
	.description('Suggest servers for a task')
	.argument('<task...>', 'Task description')
	.option('-k, --top-k <n>', 'Maximum number of servers', parseInteger, 5)
	.option('--min-confidence <n>', 'Drop suggestions below this confidence', parseConfidence)
	.action(async (task: string[], options: { topK: number; minConfidence?: number }) => {
		const orchestrator = await Orchestrator.create({
			configPath: program.opts<GlobalOptions>().config,
		});
		try {
			const taskText = task.join(' ');
			const suggestions = await orchestrator.suggest(taskText, {
				topK: options.topK,
				minConfidence: options.minConfidence,
			});
			logger.displayBox(`Servers for: ${taskText}`, formatSuggestions(suggestions), 'cyan');
		} finally {
			await orchestrator.shutdown();
		}
	});

program
	.command('catalog')
	.description('List known servers')
	.option('--category <name>', 'Only list servers in this category')
	.action(async (options: { category?: string }) => {
		const orchestrator = await Orchestrator.create({
			configPath: program.opts<GlobalOptions>().config,
			embedder: null,
		});
		try {
			const entries = orchestrator.catalog(options.category);
			logger.displayBox(
				options.category ? `Servers in ${options.category}` : 'Servers',
				formatCatalog(entries),
				'blue'
			);
		} finally {
			await orchestrator.shutdown();
		}
	});

program.parseAsync(process.argv).catch((error: unknown) => {
	logger.error(`toolswitch failed: ${describeError(error)}`);
	process.exit(1);
});
