/**
 * Defines the available log levels for the logger. Log levels are ordered from most severe (FATAL)
 * to least severe (TRACE).
 */
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Structured data attached to a log line. Never put secrets or private keys in here; the mint
 * refers to proofs by their Y point.
 */
export type LogContext = Record<string, unknown>;

export const LEVEL_ORDER: Record<LogLevel, number> = {
	fatal: 0,
	error: 1,
	warn: 2,
	info: 3,
	debug: 4,
	trace: 5,
};

export interface Logger {
	fatal(message: string, context?: LogContext): void;
	error(message: string, context?: LogContext): void;
	warn(message: string, context?: LogContext): void;
	info(message: string, context?: LogContext): void;
	debug(message: string, context?: LogContext): void;
	trace(message: string, context?: LogContext): void;
	log(level: LogLevel, message: string, context?: LogContext): void;
}
