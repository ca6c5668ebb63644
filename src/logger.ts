/**
 * @file Leveled logger shared by the statement builders and the executor.
 */

/**
 * Log levels, lowest to highest.
 */
export enum LogLevel
{
	/** Emit everything */
	ALL = 0,
	/** Debug and above */
	DEBUG = 10,
	/** Info and above */
	INFO = 20,
	/** Warnings and errors */
	WARN = 30,
	/** Errors only */
	ERROR = 40,
	/** Silence */
	OFF = 50
}

/**
 * A single log record handed to the formatter and handler.
 */
export interface LogEntry
{
	timestamp: Date;
	level: LogLevel;
	message: string;
	context?: string;
	data?: Record<string, unknown>;
}

/**
 * Logger configuration options.
 */
export interface LoggerConfig
{
	/** Minimum level written (default: INFO) */
	level?: LogLevel;
	/** Write to the console when no handler is given (default: true) */
	console?: boolean;
	/** Turns an entry into a line of text */
	formatter?: (entry: LogEntry) => string;
	/** Receives every entry that passes the level filter */
	handler?: (entry: LogEntry) => void;
}

/**
 * Context-bound logging facade returned by {@link getLogger}.
 */
export interface ContextLogger
{
	debug(message: string, data?: Record<string, unknown>): void;
	info(message: string, data?: Record<string, unknown>): void;
	warn(message: string, data?: Record<string, unknown>): void;
	error(message: string, data?: Record<string, unknown>): void;
}

const formatEntry = (entry: LogEntry): string =>
{
	const level = LogLevel[entry.level].padEnd(5);
	const context = entry.context ? `[${entry.context}] ` : '';
	const data = entry.data ? ` ${JSON.stringify(entry.data, (_key, value: unknown) => typeof value === 'bigint' ? value.toString() : value)}` : '';
	return `${entry.timestamp.toISOString()} ${level} ${context}${entry.message}${data}`;
};

/**
 * Logger with a minimum level and pluggable output.
 */
export class Logger
{
	private config: Required<LoggerConfig>;

	constructor(config: LoggerConfig = {})
	{
		this.config = {
			level: config.level ?? LogLevel.INFO,
			console: config.console ?? true,
			formatter: config.formatter ?? formatEntry,
			handler: config.handler ?? ((entry) => this.writeToConsole(entry))
		};
	}

	/**
	 * Merges new settings into the current configuration.
	 */
	configure(config: Partial<LoggerConfig>): void
	{
		this.config = {
			level: config.level ?? this.config.level,
			console: config.console ?? this.config.console,
			formatter: config.formatter ?? this.config.formatter,
			handler: config.handler ?? this.config.handler
		};
	}

	getLevel(): LogLevel
	{
		return this.config.level;
	}

	setLevel(level: LogLevel): void
	{
		this.config.level = level;
	}

	isEnabled(level: LogLevel): boolean
	{
		return this.config.level !== LogLevel.OFF && level >= this.config.level;
	}

	debug(message: string, context?: string, data?: Record<string, unknown>): void
	{
		this.write(LogLevel.DEBUG, message, context, data);
	}

	info(message: string, context?: string, data?: Record<string, unknown>): void
	{
		this.write(LogLevel.INFO, message, context, data);
	}

	warn(message: string, context?: string, data?: Record<string, unknown>): void
	{
		this.write(LogLevel.WARN, message, context, data);
	}

	error(message: string, context?: string, data?: Record<string, unknown>): void
	{
		this.write(LogLevel.ERROR, message, context, data);
	}

	private write(level: LogLevel, message: string, context?: string, data?: Record<string, unknown>): void
	{
		if (!this.isEnabled(level)) return;

		this.config.handler({ timestamp: new Date(), level, message, context, data });
	}

	private writeToConsole(entry: LogEntry): void
	{
		if (!this.config.console) return;

		const line = this.config.formatter(entry);
		switch (entry.level)
		{
			case LogLevel.ERROR:
				console.error(line);
				break;
			case LogLevel.WARN:
				console.warn(line);
				break;
			case LogLevel.DEBUG:
				console.debug(line);
				break;
			default:
				console.log(line);
				break;
		}
	}
}

/**
 * Process-wide logger used by every module of the library.
 */
export const globalLogger = new Logger();

/**
 * Returns a facade that tags every entry with `context` and writes through the global logger.
 */
export function getLogger(context?: string): ContextLogger
{
	return {
		debug: (message, data) => globalLogger.debug(message, context, data),
		info: (message, data) => globalLogger.info(message, context, data),
		warn: (message, data) => globalLogger.warn(message, context, data),
		error: (message, data) => globalLogger.error(message, context, data)
	};
}
