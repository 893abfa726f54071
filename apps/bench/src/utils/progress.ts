import chalk from "chalk";
import cliProgress from "cli-progress";
import type { LiveStats, RampTick } from "@filterbench/engine";

/**
 * Create a progress bar for the ramp-up phase.
 */
export function createSessionProgressBar(label: string): cliProgress.SingleBar {
	return new cliProgress.SingleBar(
		{
			format: `${chalk.cyan(label)} ${chalk.gray("|")} {bar} ${chalk.gray("|")} {value}/{total} (${chalk.green("✓")} {subscribed} ${chalk.red("✗")} {failed} ${chalk.yellow("⚠")} {errors})`,
			barCompleteChar: "█",
			barIncompleteChar: "░",
			hideCursor: true,
			clearOnComplete: false,
			stopOnComplete: true,
		},
		cliProgress.Presets.shades_classic,
	);
}

export function startProgressBar(bar: cliProgress.SingleBar, total: number): void {
	bar.start(total, 0, { subscribed: 0, failed: 0, errors: 0 });
}

/**
 * Show `started` sessions with the live outcome counters.
 */
export function updateProgressBar(bar: cliProgress.SingleBar, started: number, live: LiveStats): void {
	bar.update(started, {
		subscribed: live.subscribeSuccess,
		failed: live.subscribeFailed,
		errors: live.connectionErrors,
	});
}

export function stopProgressBar(bar: cliProgress.SingleBar): void {
	bar.stop();
}

/**
 * One status line for a hold-phase tick.
 */
export function formatHoldStatus(tick: RampTick, live: LiveStats): string {
	const elapsed = Math.round(tick.elapsedMs / 1000);
	const activeColor = live.active === live.subscribeSuccess ? chalk.green : chalk.yellow;
	const failedColor = live.subscribeFailed + live.connectionErrors === 0 ? chalk.green : chalk.red;
	return `${chalk.dim(`[${tick.phase} ${elapsed}s]`)} Active: ${activeColor(live.active)}/${tick.started} | Subscribed: ${live.subscribeSuccess} | Failed: ${failedColor(live.subscribeFailed + live.connectionErrors)} | Messages: ${live.messagesReceived}`;
}
