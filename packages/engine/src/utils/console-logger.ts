import chalk from "chalk";
import type { ILogger } from "../domain/logger.js";

export interface ConsoleLoggerOptions {
	/** Tag printed in front of every line, e.g. "[ramp]" */
	prefix: string;
	/** Print debug lines */
	verbose?: boolean;
}

/**
 * Logger writing `[prefix] message` lines to the console.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions): ILogger {
	const tag = chalk.cyan(options.prefix);
	return {
		debug(message) {
			if (options.verbose) console.log(`${tag} ${chalk.dim(message)}`);
		},
		info(message) {
			console.log(`${tag} ${message}`);
		},
		warn(message) {
			console.warn(`${tag} ${chalk.yellow(message)}`);
		},
		error(message) {
			console.error(`${tag} ${chalk.red(message)}`);
		},
	};
}

/**
 * Logger that discards everything. Used by tests and embedded runs.
 */
export const silentLogger: ILogger = {
	debug() {},
	info() {},
	warn() {},
	error() {},
};
