import { type LogContext, type Logger } from './Logger';
import { NULL_LOGGER } from './NullLogger';

function toError(error: Error | string): Error {
	return typeof error === 'string' ? new Error(error) : error;
}

/**
 * Log at ERROR and throw. Always throws.
 *
 * @param error - The error to throw; a string becomes a plain `Error`.
 * @param logger - Logger to use, defaults to NULL_LOGGER.
 * @param context - Optional structured context for the log.
 * @throws The given error.
 */
export function fail(
	error: Error | string,
	logger: Logger = NULL_LOGGER,
	context?: LogContext,
): never {
	const err = toError(error);
	logger.error(err.message, context);
	throw err;
}

/**
 * Throw if a Boolean condition is true. On return, the compiler knows the condition is false.
 *
 * @param condition - Condition that must be false to continue.
 * @param error - Error to throw if condition is true. Pass a factory when building it is costly.
 * @param logger - Logger to use, defaults to NULL_LOGGER.
 * @param context - Optional structured context for the log.
 */
export function failIf(
	condition: boolean,
	error: Error | string | (() => Error),
	logger: Logger = NULL_LOGGER,
	context?: LogContext,
): asserts condition is false {
	if (condition) fail(typeof error === 'function' ? error() : error, logger, context);
}

/**
 * Log at FATAL and throw. For integrity faults that must stop the mint, never for request errors.
 */
export function failFatal(error: Error, logger: Logger = NULL_LOGGER, context?: LogContext): never {
	logger.fatal(error.message, { ...context, error });
	throw error;
}
