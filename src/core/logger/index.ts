export {
	Logger,
	logger,
	createLogger,
	setGlobalLogLevel,
	getGlobalLogLevel,
	redactSensitiveData,
} from './logger.js';

export type { LoggerOptions, ChildLoggerOptions, ChalkColor, LogLevel, LogMeta } from './logger.js';
