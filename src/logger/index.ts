export { type Logger, type LogLevel, type LogContext, LEVEL_ORDER } from './Logger';
export { NULL_LOGGER } from './NullLogger';
export { ConsoleLogger, measureTime } from './ConsoleLogger';
export { fail, failIf, failFatal } from './helpers';
