import { sleepUntil } from "../utils/timing.js";

/**
 * Options for running tasks with pacing.
 */
export interface PacingOptions {
	/** Total number of tasks to start */
	count: number;
	/** Time in milliseconds to spread task starts over */
	spreadMs: number;
	/** Called for each task (receives 0-based index); must not block */
	onStart: (index: number) => void;
	/** Stops scheduling further starts when aborted */
	signal?: AbortSignal;
}

/**
 * Start tasks evenly spread over `spreadMs`: task `i` starts at
 * `t0 + i * spreadMs / count`.
 *
 * Starts are scheduled against absolute times rather than chained sleeps,
 * so timer lateness does not accumulate across thousands of tasks and the
 * cumulative count stays linear in time.
 *
 * @returns Number of tasks actually started
 */
export async function runPaced(options: PacingOptions): Promise<number> {
	const { count, spreadMs, onStart, signal } = options;
	const delayMs = calculatePacingDelay(count, spreadMs / 1000);
	const startedAt = performance.now();
	let started = 0;

	for (let i = 0; i < count; i++) {
		if (delayMs > 0) {
			await sleepUntil(startedAt + i * delayMs, signal);
		}
		if (signal?.aborted) break;
		onStart(i);
		started++;
	}

	return started;
}

/**
 * Calculate the pacing delay in milliseconds.
 */
export function calculatePacingDelay(count: number, spreadSec: number): number {
	return spreadSec > 0 && count > 0 ? (spreadSec * 1000) / count : 0;
}

/**
 * Calculate the target rate (tasks per second).
 */
export function calculatePacingRate(count: number, spreadSec: number): string {
	const delayMs = calculatePacingDelay(count, spreadSec);
	return delayMs > 0 ? (1000 / delayMs).toFixed(1) : "max";
}
