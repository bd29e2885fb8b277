import { type LogContext, type Logger, type LogLevel, LEVEL_ORDER } from './Logger';

/**
 * Outputs messages to the console at or above a minimum level.
 *
 * Each line is prefixed with the level in square brackets and, when the logger has one, its scope:
 * `[INFO] [mint] split complete`. Context is passed as a second console argument, with `Error`
 * values reduced to `{ message, stack }` and bigints written as decimal strings.
 *
 * @example
 *
 *     const logger = new ConsoleLogger('debug', 'mint');
 *     logger.info('redeemed', { amount: 8 });
 *     // [INFO] [mint] redeemed { amount: 8 }
 */
export class ConsoleLogger implements Logger {
	private readonly minLevel: LogLevel;
	private readonly scope?: string;

	constructor(minLevel: LogLevel = 'info', scope?: string) {
		this.minLevel = minLevel;
		this.scope = scope;
	}

	/**
	 * A logger with the same level whose lines carry `scope`.
	 */
	child(scope: string): ConsoleLogger {
		return new ConsoleLogger(this.minLevel, this.scope ? `${this.scope}:${scope}` : scope);
	}

	private should(level: LogLevel): boolean {
		return LEVEL_ORDER[level] <= LEVEL_ORDER[this.minLevel];
	}

	// Note: resolved per call, not cached, so tests can spy on console
	private method(level: LogLevel): (msg: string, ...rest: unknown[]) => void {
		switch (level) {
			case 'fatal':
			case 'error':
				return console.error;
			case 'warn':
				return console.warn;
			case 'info':
				return console.info;
			case 'debug':
				return console.debug;
			case 'trace':
				return console.trace;
			default:
				return console.log;
		}
	}

	private header(level: LogLevel, message: string): string {
		const scope = this.scope ? ` [${this.scope}]` : '';
		return `[${level.toUpperCase()}]${scope} ${message}`;
	}

	private flattenContext(ctx?: LogContext): LogContext | undefined {
		if (!ctx) return undefined;
		const out: LogContext = {};
		for (const [k, v] of Object.entries(ctx)) {
			if (v instanceof Error) out[k] = { message: v.message, stack: v.stack };
			else if (typeof v === 'bigint') out[k] = v.toString();
			else out[k] = v;
		}
		return out;
	}

	private emit(level: LogLevel, message: string, context?: LogContext) {
		if (!this.should(level)) return;
		const line = this.header(level, message);
		const ctx = this.flattenContext(context);
		const fn = this.method(level);
		if (ctx && Object.keys(ctx).length) fn(line, ctx);
		else fn(line);
	}

	fatal(msg: string, ctx?: LogContext) {
		this.emit('fatal', msg, ctx);
	}
	error(msg: string, ctx?: LogContext) {
		this.emit('error', msg, ctx);
	}
	warn(msg: string, ctx?: LogContext) {
		this.emit('warn', msg, ctx);
	}
	info(msg: string, ctx?: LogContext) {
		this.emit('info', msg, ctx);
	}
	debug(msg: string, ctx?: LogContext) {
		this.emit('debug', msg, ctx);
	}
	trace(msg: string, ctx?: LogContext) {
		this.emit('trace', msg, ctx);
	}

	log(level: LogLevel, message: string, context?: LogContext) {
		this.emit(level, message, context);
	}
}

/**
 * Creates a timer to measure elapsed time in milliseconds.
 *
 * @example
 *
 *     const timer = measureTime();
 *     // ... some code ...
 *     logger.debug('done', { ms: timer.elapsed() });
 */
export function measureTime() {
	const start = Date.now();
	return {
		elapsed: () => {
			return Date.now() - start;
		},
	};
}
