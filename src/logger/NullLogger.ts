import type { Logger } from './Logger';

const discard = (): void => undefined;

// The default logger implementation - drops every message
export const NULL_LOGGER: Logger = {
	fatal: discard,
	error: discard,
	warn: discard,
	info: discard,
	debug: discard,
	trace: discard,
	log: discard,
};
