/**
 * Tagged logger for library modules.
 *
 * Usage:
 *   const log = createLogger("store")
 *   log.debug("Staged", path)
 */
import consola from "consola"

export interface Logger {
	debug: (message: unknown, ...args: unknown[]) => void
	info: (message: unknown, ...args: unknown[]) => void
	warn: (message: unknown, ...args: unknown[]) => void
	error: (message: unknown, ...args: unknown[]) => void
}

export function createLogger(module: string): Logger {
	const tagged = consola.withTag(`rulemux:${module}`)
	return {
		debug: (message: unknown, ...args: unknown[]) => tagged.debug(message, ...args),
		info: (message: unknown, ...args: unknown[]) => tagged.info(message, ...args),
		warn: (message: unknown, ...args: unknown[]) => tagged.warn(message, ...args),
		error: (message: unknown, ...args: unknown[]) => tagged.error(message, ...args),
	}
}

/** Logger that drops everything; handy for tests and embedding */
export const silentLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
}
