import winston from 'winston';
import chalk from 'chalk';
import boxen from 'boxen';
import fs from 'fs';
import path from 'path';

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
export type LogMeta = Record<string, unknown>;

const isLogLevel = (value: string): value is LogLevel => Object.keys(logLevels).includes(value);

// ===== 2. Security Layer: Data Redaction =====

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'auth', 'apiKey', 'credential'];
const MASK_REGEX = new RegExp(
	`(${SENSITIVE_KEYS.join('|')})(["']?\\s*[:=]\\s*)(["'])?.*?\\3(?=[\\s,}]|$)`,
	'gi'
);

export const redactSensitiveData = (message: string): string => {
	if (process.env.REDACT_SECRETS === 'false') return message;

	return message.replace(MASK_REGEX, (_match, key: string, separator: string, quote?: string) => {
		const quoteMark = quote ?? '';
		return `${key}${separator}${quoteMark}***REDACTED***${quoteMark}`;
	});
};

// ===== 3. Visual Formatting Layer =====

const chalkColors = {
	red: chalk.red,
	green: chalk.green,
	yellow: chalk.yellow,
	blue: chalk.blue,
	magenta: chalk.magenta,
	cyan: chalk.cyan,
	white: chalk.white,
	gray: chalk.gray,
	redBright: chalk.redBright,
	greenBright: chalk.greenBright,
	yellowBright: chalk.yellowBright,
	blueBright: chalk.blueBright,
	magentaBright: chalk.magentaBright,
	cyanBright: chalk.cyanBright,
	whiteBright: chalk.whiteBright,
};

export type ChalkColor = keyof typeof chalkColors;

const isChalkColor = (value: unknown): value is ChalkColor =>
	typeof value === 'string' && value in chalkColors;

const levelColorMap: Record<string, (text: string) => string> = {
	error: chalk.red,
	warn: chalk.yellow,
	info: chalk.blue,
	http: chalk.cyan,
	verbose: chalk.magenta,
	debug: chalk.gray,
	silly: chalk.gray.dim,
};

const RESERVED_KEYS = new Set(['level', 'message', 'timestamp', 'color', 'component']);

const formatMeta = (info: winston.Logform.TransformableInfo): string => {
	const extra = Object.keys(info).filter(key => !RESERVED_KEYS.has(key));
	if (extra.length === 0) return '';
	const meta = Object.fromEntries(extra.map(key => [key, info[key]]));
	try {
		return ` ${redactSensitiveData(JSON.stringify(meta))}`;
	} catch {
		return ' [unserializable meta]';
	}
};

const formatComponent = (component: unknown): string =>
	typeof component === 'string' && component.length > 0 ? `[${component}] ` : '';

const maskFormat = winston.format(info => {
	if (typeof info.message === 'string') {
		info.message = redactSensitiveData(info.message);
	}
	return info;
});

// Console formatting
const consoleFormat = winston.format.printf(info => {
	const colorize = levelColorMap[info.level] ?? chalk.white;
	const message = `${formatComponent(info.component)}${String(info.message)}`;
	const formattedMessage = isChalkColor(info.color) ? chalkColors[info.color](message) : message;

	return `${chalk.dim(String(info.timestamp))} ${colorize(info.level.toUpperCase())}: ${formattedMessage}${chalk.dim(formatMeta(info))}`;
});

// File formatting (no colors)
const fileFormat = winston.format.printf(info => {
	return `${String(info.timestamp)} [${info.level.toUpperCase()}]: ${formatComponent(info.component)}${String(info.message)}${formatMeta(info)}`;
});

// ===== 4. Configuration Layer =====

const getDefaultLogLevel = (): LogLevel => {
	const envLevel = process.env.SCENEWATCH_LOG_LEVEL?.toLowerCase();
	if (envLevel && isLogLevel(envLevel)) {
		return envLevel;
	}
	return 'info';
};

// ===== 5. Logger Options Interface =====

export interface LoggerOptions {
	level?: string;
	silent?: boolean;
	file?: string;
}

export interface ChildLoggerOptions {
	/** Prefixes every message, e.g. `[capture-worker]` */
	component: string;
}

// ===== 6. Core Logger Class =====

export class Logger {
	private logger: winston.Logger;
	private isSilent: boolean;

	constructor(options: LoggerOptions = {}, parent?: { logger: winston.Logger; meta: LogMeta }) {
		this.isSilent = options.silent ?? false;

		if (parent) {
			this.logger = parent.logger.child(parent.meta);
			return;
		}

		const level = options.level && isLogLevel(options.level) ? options.level : getDefaultLogLevel();

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
			fs.mkdirSync(path.dirname(filePath), { recursive: true });
			return [this.createFileTransport(filePath)];
		}
		return [this.createConsoleTransport()];
	}

	private createFileTransport(filePath: string): winston.transport {
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

	/**
	 * Draw a framed block on stderr. Used for the startup banner.
	 */
	displayBox(title: string, content: string, borderColor: ChalkColor = 'white'): void {
		if (this.isSilent) return;

		process.stderr.write(
			boxen(content, {
				padding: 1,
				borderColor,
				title,
				titleAlignment: 'center',
			}) + '\n'
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

	/**
	 * Send everything to `filePath` instead of the console. Child loggers share
	 * the transports and follow the redirect.
	 */
	redirectToFile(filePath: string): void {
		try {
			fs.mkdirSync(path.dirname(filePath), { recursive: true });
			this.logger.clear();
			this.logger.add(this.createFileTransport(filePath));
		} catch (error) {
			this.error(`Failed to redirect logger to file: ${String(error)}`);
		}
	}

	redirectToConsole(): void {
		this.logger.clear();
		this.logger.add(this.createConsoleTransport());
	}

	// ===== Utility Methods =====

	/**
	 * Create a logger that shares this logger's transports and level and tags
	 * every entry with `component`
	 */
	createChild(options: ChildLoggerOptions): Logger {
		return new Logger({ silent: this.isSilent }, { logger: this.logger, meta: { component: options.component } });
	}

	// Get logger instance for advanced usage
	getWinstonLogger(): winston.Logger {
		return this.logger;
	}
}

// ===== 7. Singleton Pattern =====

export const logger = new Logger();

// ===== Utility Functions =====

export const createLogger = (options: LoggerOptions = {}): Logger => {
	return new Logger(options);
};

export const setGlobalLogLevel = (level: string): void => {
	logger.setLevel(level);
};

export const getGlobalLogLevel = (): string => {
	return logger.getLevel();
};
