export {
	Logger,
	logger,
	createLogger,
	setGlobalLogLevel,
	getGlobalLogLevel,
	redactSensitiveData,
} from './logger.js';
export type { LoggerOptions, LogLevel, LogMeta, ChalkColor } from './logger.js';
