import winston from 'winston';
import chalk from 'chalk';
import boxen from 'boxen';
import fs from 'fs';
import path from 'path';
import { getEnv } from '../env.js';

// ===== 1. Foundation Layer: Winston Configuration =====

const logLevels = {
	error: 0, // Highest priority
	warn: 1,
	info: 2,
	http: 3,
	verbose: 4,
	debug: 5,
	silly: 6, // Lowest priority
};

export type LogLevel = keyof typeof logLevels;

const isLogLevel = (value: string): value is LogLevel => Object.hasOwn(logLevels, value);

// ===== 2. Security Layer: Data Redaction =====

const SENSITIVE_KEYS = ['apiKey', 'password', 'secret', 'token', 'auth', 'key', 'credential'];
const MASK_REGEX = new RegExp(
	`(${SENSITIVE_KEYS.join('|')})(["']?\\s*[:=]\\s*)(?:(["']).*?\\3|[^\\s,;&"']+)`,
	'gi'
);

export const redactSensitiveData = (message: string): string => {
	if (!getEnv().REDACT_SECRETS) return message;

	return message.replace(
		MASK_REGEX,
		(_match: string, key: string, separator: string, quote: string | undefined) => {
			const quoteMark = quote || '';
			return `${key}${separator}${quoteMark}***REDACTED***${quoteMark}`;
		}
	);
};

// ===== 3. Visual Formatting Layer =====

type ChalkColor = 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan' | 'white' | 'gray';

const colorizers: Record<ChalkColor, (text: string) => string> = {
	red: chalk.red,
	green: chalk.green,
	yellow: chalk.yellow,
	blue: chalk.blue,
	magenta: chalk.magenta,
	cyan: chalk.cyan,
	white: chalk.white,
	gray: chalk.gray,
};

const levelColorMap: Record<string, (text: string) => string> = {
	error: chalk.red,
	warn: chalk.yellow,
	info: chalk.blue,
	http: chalk.cyan,
	verbose: chalk.magenta,
	debug: chalk.gray,
	silly: chalk.gray.dim,
};

const isChalkColor = (value: unknown): value is ChalkColor =>
	typeof value === 'string' && Object.hasOwn(colorizers, value);

const maskFormat = winston.format(info => {
	if (typeof info.message === 'string') {
		info.message = redactSensitiveData(info.message);
	}
	return info;
});

const consoleFormat = winston.format.printf(({ level, message, timestamp, color }) => {
	const colorize = levelColorMap[level] || chalk.white;
	const text = String(message);
	const formattedMessage = isChalkColor(color) ? colorizers[color](text) : text;

	return `${chalk.dim(String(timestamp))} ${colorize(level.toUpperCase())}: ${formattedMessage}`;
});

const fileFormat = winston.format.printf(({ level, message, timestamp, color: _color, ...meta }) => {
	const details = Object.keys(meta).length > 0 ? ` ${redactSensitiveData(JSON.stringify(meta))}` : '';
	return `${String(timestamp)} [${level.toUpperCase()}]: ${String(message)}${details}`;
});

// ===== 4. Configuration Layer =====

const getDefaultLogLevel = (): LogLevel => getEnv().TOOLSWITCH_LOG_LEVEL;

// ===== 5. Logger Options Interface =====

export interface LoggerOptions {
	level?: string;
	silent?: boolean;
	file?: string;
}

export type LogMeta = Record<string, unknown>;

// ===== 6. Core Logger Class =====

export class Logger {
	private logger: winston.Logger;
	private isSilent: boolean = false;

	constructor(options: LoggerOptions = {}) {
		const requested = options.level?.toLowerCase();
		const level = requested && isLogLevel(requested) ? requested : getDefaultLogLevel();
		this.isSilent = options.silent || false;

		this.logger = winston.createLogger({
			levels: logLevels,
			level,
			format: winston.format.combine(
				winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
				maskFormat()
			),
			transports: this.createTransports(options.file),
			silent: this.isSilent,
		});
	}

	private createTransports(filePath?: string): winston.transport[] {
		if (filePath) {
			return [this.createFileTransport(filePath)];
		}
		return [this.createConsoleTransport()];
	}

	private createFileTransport(filePath: string): winston.transport {
		fs.mkdirSync(path.dirname(filePath), { recursive: true });
		return new winston.transports.File({
			filename: filePath,
			format: winston.format.combine(
				winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
				maskFormat(),
				fileFormat
			),
		});
	}

	private createConsoleTransport(): winston.transport {
		return new winston.transports.Console({
			format: winston.format.combine(
				winston.format.timestamp({ format: 'HH:mm:ss' }),
				maskFormat(),
				consoleFormat
			),
			// stdout belongs to the MCP stdio transport
			stderrLevels: Object.keys(logLevels),
		});
	}

	// ===== Core Logging Methods =====

	error(message: string, meta?: LogMeta, color?: ChalkColor): void {
		this.logger.error(message, { ...meta, color });
	}

	warn(message: string, meta?: LogMeta, color?: ChalkColor): void {
		this.logger.warn(message, { ...meta, color });
	}

	info(message: string, meta?: LogMeta, color?: ChalkColor): void {
		this.logger.info(message, { ...meta, color });
	}

	http(message: string, meta?: LogMeta, color?: ChalkColor): void {
		this.logger.http(message, { ...meta, color });
	}

	verbose(message: string, meta?: LogMeta, color?: ChalkColor): void {
		this.logger.verbose(message, { ...meta, color });
	}

	debug(message: string, meta?: LogMeta, color?: ChalkColor): void {
		this.logger.debug(message, { ...meta, color });
	}

	silly(message: string, meta?: LogMeta, color?: ChalkColor): void {
		this.logger.silly(message, { ...meta, color });
	}

	// ===== Specialized Display Features =====

	displayBox(title: string, content: string, borderColor: ChalkColor = 'white'): void {
		if (this.isSilent) return;

		console.log(
			boxen(content, {
				padding: 1,
				borderColor,
				title,
				titleAlignment: 'center',
			})
		);
	}

	// ===== Runtime Configuration Management =====

	setLevel(level: string): void {
		const normalized = level.toLowerCase();
		if (isLogLevel(normalized)) {
			this.logger.level = normalized;
		} else {
			this.error(`Invalid log level: ${level}. Valid levels: ${Object.keys(logLevels).join(', ')}`);
		}
	}

	getLevel(): string {
		return this.logger.level;
	}

	setSilent(silent: boolean): void {
		this.isSilent = silent;
		this.logger.silent = silent;
	}

	redirectToFile(filePath: string): void {
		try {
			const transport = this.createFileTransport(filePath);
			this.logger.clear();
			this.logger.add(transport);
		} catch (error) {
			this.error(`Failed to redirect logger to file: ${String(error)}`);
		}
	}

	redirectToConsole(): void {
		this.logger.clear();
		this.logger.add(this.createConsoleTransport());
		this.isSilent = false;
		this.logger.silent = false;
	}

	// ===== Utility Methods =====

	createChild(options: LoggerOptions = {}): Logger {
		const childOptions: LoggerOptions = {
			level: options.level || this.getLevel(),
			silent: options.silent !== undefined ? options.silent : this.isSilent,
		};

		if (options.file !== undefined) {
			childOptions.file = options.file;
		}

		return new Logger(childOptions);
	}

	getWinstonLogger(): winston.Logger {
		return this.logger;
	}
}

// ===== 7. Shared Instance =====

export const logger = new Logger();

export type { ChalkColor };

export const createLogger = (options: LoggerOptions = {}): Logger => {
	return new Logger(options);
};

export const setGlobalLogLevel = (level: string): void => {
	logger.setLevel(level);
};

export const getGlobalLogLevel = (): string => {
	return logger.getLevel();
};
