/**
 * @file Leveled logger shared by the builder, validator, renderers and catalog adapter.
 */

/**
 * Log levels, lowest to highest. A logger emits entries at or above its level.
 */
export enum LogLevel {
	ALL = 0,
	DEBUG = 10,
	INFO = 20,
	WARN = 30,
	ERROR = 40,
	/** Disables all output */
	OFF = 50
}

/** Structured data attached to a log entry. */
export type LogData = Record<string, unknown>;

export interface LogEntry {
	timestamp: Date;
	level: LogLevel;
	message: string;
	/** Module that produced the entry, e.g. `SQLRenderer` */
	context?: string;
	data?: LogData;
}

export interface LoggerConfig {
	/** Minimum level to emit (default: INFO) */
	level?: LogLevel;
	/** Write formatted entries to the console (default: true) */
	console?: boolean;
	/** Turns an entry into a line of text */
	formatter?: (entry: LogEntry) => string;
	/** Receives every emitted entry; replaces console output when set */
	handler?: (entry: LogEntry) => void;
}

/**
 * Context-bound logging facade returned by {@link getLogger}.
 */
export interface ContextLogger {
	debug(message: string, data?: LogData): void;
	info(message: string, data?: LogData): void;
	warn(message: string, data?: LogData): void;
	error(message: string, data?: LogData): void;
}

const defaultFormatter = (entry: LogEntry): string => {
	const level = LogLevel[entry.level].padEnd(5);
	const context = entry.context ? `[${entry.context}] ` : '';
	const data = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
	return `${entry.timestamp.toISOString()} ${level} ${context}${entry.message}${data}`;
};

export class Logger {
	private config: Required<LoggerConfig>;

	constructor(config: LoggerConfig = {}) {
		this.config = {
			level: config.level ?? LogLevel.INFO,
			console: config.console ?? true,
			formatter: config.formatter ?? defaultFormatter,
			handler: config.handler ?? ((entry) => this.writeToConsole(entry))
		};
	}

	/**
	 * Merges new settings into the current configuration.
	 */
	configure(config: Partial<LoggerConfig>): void {
		this.config = {
			level: config.level ?? this.config.level,
			console: config.console ?? this.config.console,
			formatter: config.formatter ?? this.config.formatter,
			handler: config.handler ?? this.config.handler
		};
	}

	getLevel(): LogLevel {
		return this.config.level;
	}

	setLevel(level: LogLevel): void {
		this.config.level = level;
	}

	isLevelEnabled(level: LogLevel): boolean {
		return this.config.level !== LogLevel.OFF && level >= this.config.level;
	}

	debug(message: string, context?: string, data?: LogData): void {
		this.emit(LogLevel.DEBUG, message, context, data);
	}

	info(message: string, context?: string, data?: LogData): void {
		this.emit(LogLevel.INFO, message, context, data);
	}

	warn(message: string, context?: string, data?: LogData): void {
		this.emit(LogLevel.WARN, message, context, data);
	}

	error(message: string, context?: string, data?: LogData): void {
		this.emit(LogLevel.ERROR, message, context, data);
	}

	private emit(level: LogLevel, message: string, context?: string, data?: LogData): void {
		if (!this.isLevelEnabled(level)) return;

		this.config.handler({ timestamp: new Date(), level, message, context, data });
	}

	private writeToConsole(entry: LogEntry): void {
		if (!this.config.console) return;

		const line = this.config.formatter(entry);

		switch (entry.level) {
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
 * Process-wide logger. Configure it once at startup to route astql output.
 */
export const globalLogger = new Logger();

/**
 * Returns a facade that writes to {@link globalLogger} under the given context.
 */
export function getLogger(context?: string): ContextLogger {
	return {
		debug: (message, data) => globalLogger.debug(message, context, data),
		info: (message, data) => globalLogger.info(message, context, data),
		warn: (message, data) => globalLogger.warn(message, context, data),
		error: (message, data) => globalLogger.error(message, context, data)
	};
}
