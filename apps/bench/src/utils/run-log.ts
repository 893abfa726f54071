import { stripVTControlCharacters } from "node:util";
import type { ILogger } from "@filterbench/engine";

/**
 * Logger that forwards to another logger and keeps a plain-text copy of
 * everything at info level and above, for the per-run log file.
 */
export class RunLog implements ILogger {
	readonly lines: string[] = [];

	constructor(private readonly target: ILogger) {}

	debug(message: string): void {
		this.target.debug(message);
	}

	info(message: string): void {
		this.target.info(message);
		this.capture(message);
	}

	warn(message: string): void {
		this.target.warn(message);
		this.capture(`WARN ${message}`);
	}

	error(message: string): void {
		this.target.error(message);
		this.capture(`ERROR ${message}`);
	}

	/**
	 * Print a line as-is and keep it.
	 */
	write(line: string): void {
		console.log(line);
		this.capture(line);
	}

	private capture(line: string): void {
		this.lines.push(stripVTControlCharacters(line));
	}
}
