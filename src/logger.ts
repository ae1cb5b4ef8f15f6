import { createClog } from "@marianmeres/clog";

/**
 * Logger interface compatible with @marianmeres/clog (and any console wrapper).
 * All methods accept variadic arguments and return the first one as a string.
 */
export interface Logger {
	debug: (...args: unknown[]) => string;
	log: (...args: unknown[]) => string;
	warn: (...args: unknown[]) => string;
	error: (...args: unknown[]) => string;
}

/** Namespaced clog instance used when no logger is configured. */
export const defaultLogger: Logger = createClog("guarded-fsm");
