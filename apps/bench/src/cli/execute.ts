import chalk from "chalk";
import { FatalConfigurationError, type ILogger, type RunConfig, ScenarioRunner, type Summary } from "@filterbench/engine";
import { createSessionProgressBar, formatHoldStatus, startProgressBar, stopProgressBar, updateProgressBar } from "../utils/progress.js";

/** Process exit code for a configuration problem. */
export const EXIT_FATAL_CONFIG = 2;
/** Process exit code for any other failure. */
export const EXIT_FAILURE = 1;

/**
 * Map an error thrown by a run to the process exit code.
 */
export function exitCodeFor(error: unknown): number {
	return error instanceof FatalConfigurationError ? EXIT_FATAL_CONFIG : EXIT_FAILURE;
}

export function describeError(error: unknown): string {
	if (error instanceof FatalConfigurationError) return `Configuration error: ${error.message}`;
	return error instanceof Error ? error.message : String(error);
}

/**
 * Run one benchmark with console progress: a progress bar during ramp-up,
 * a status line per tick afterwards. Ctrl-C ramps down early.
 */
export async function executeRun(config: RunConfig, logger: ILogger): Promise<Summary> {
	const runner = new ScenarioRunner({ logger });
	const bar = createSessionProgressBar("[ramp-up]");
	let started = 0;
	let barActive = false;

	runner.on("start", (info) => {
		logger.info(`Connecting to ${info.url} (${info.protocol}, ${info.poolSize} filter values)`);
		startProgressBar(bar, info.clientCount);
		barActive = true;
	});
	runner.on("session-started", () => {
		started++;
		const live = runner.live();
		if (live && barActive) updateProgressBar(bar, started, live);
	});
	runner.on("phase", (phase) => {
		if (phase === "ramp-up") return;
		if (barActive) {
			stopProgressBar(bar);
			barActive = false;
		}
		logger.info(`Phase: ${chalk.bold(phase)}`);
	});
	runner.on("measurement-start", () => logger.info("Warm-up complete, measuring"));
	runner.on("tick", (tick) => {
		const live = runner.live();
		if (live) logger.info(formatHoldStatus(tick, live));
	});

	const onSigint = () => runner.stop();
	process.once("SIGINT", onSigint);
	try {
		return await runner.run(config);
	} finally {
		process.off("SIGINT", onSigint);
		if (barActive) stopProgressBar(bar);
	}
}
