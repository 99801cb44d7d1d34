/**
 * Log level enum
 * Defines the severity levels for logging
 */
export enum LogLevel {
	DEBUG = 'debug',
	INFO = 'info',
	WARN = 'warn',
	ERROR = 'error',
}

/**
 * Logger interface
 * Defines the contract for logger implementations
 */
export interface ILogger {
	/**
	 * Logs a debug message
	 * @param message - Log message
	 * @param context - Optional context data
	 */
	debug(message: string, context?: Record<string, unknown>): void;

	/**
	 * Logs an info message
	 * @param message - Log message
	 * @param context - Optional context data
	 */
	info(message: string, context?: Record<string, unknown>): void;

	/**
	 * Logs a warning message
	 * @param message - Log message
	 * @param context - Optional context data
	 */
	warn(message: string, context?: Record<string, unknown>): void;

	/**
	 * Logs an error message
	 * @param message - Log message
	 * @param context - Optional context data
	 */
	error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Line writer used by the console logger
 */
export type LogWriter = (line: string, context: Record<string, unknown> | '') => void;

// stdout carries the MCP protocol, so every level goes to stderr.
const stderrWriter: LogWriter = (line, context) => console.error(line, context);

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

/**
 * Console logger implementation
 * Writes level-prefixed lines to stderr
 */
export class ConsoleLogger implements ILogger {
	/**
	 * Current log level
	 * @private
	 */
	private level: LogLevel;

	/**
	 * Creates a new console logger
	 * @param level - Minimum log level to display
	 * @param writer - Destination of formatted lines
	 */
	constructor(
		level: LogLevel = LogLevel.INFO,
		private readonly writer: LogWriter = stderrWriter,
	) {
		this.level = level;
	}

	debug(message: string, context?: Record<string, unknown>): void {
		this.write(LogLevel.DEBUG, message, context);
	}

	info(message: string, context?: Record<string, unknown>): void {
		this.write(LogLevel.INFO, message, context);
	}

	warn(message: string, context?: Record<string, unknown>): void {
		this.write(LogLevel.WARN, message, context);
	}

	error(message: string, context?: Record<string, unknown>): void {
		this.write(LogLevel.ERROR, message, context);
	}

	private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
		if (this.shouldLog(level)) {
			this.writer(`[${level.toUpperCase()}] ${message}`, context || '');
		}
	}

	/**
	 * Checks if a message with the given level should be logged
	 * @param messageLevel - Level of the message
	 * @returns True if the message should be logged, false otherwise
	 * @private
	 */
	private shouldLog(messageLevel: LogLevel): boolean {
		return LEVEL_ORDER.indexOf(messageLevel) >= LEVEL_ORDER.indexOf(this.level);
	}
}

/**
 * Logger that drops everything; the default when no logger is injected
 */
export class SilentLogger implements ILogger {
	debug(): void {}
	info(): void {}
	warn(): void {}
	error(): void {}
}

/**
 * Maps a configured level name ('DEBUG', 'info', ...) to a LogLevel
 */
export function logLevelFrom(name: string): LogLevel {
	const level = LEVEL_ORDER.find((candidate) => candidate === name.toLowerCase());
	return level ?? LogLevel.INFO;
}
