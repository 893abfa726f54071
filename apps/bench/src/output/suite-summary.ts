import { extractMetricLines } from "@filterbench/engine";

export interface SuiteHeader {
	date: Date;
	target: string;
	channel: string;
	rampUpSec: number;
	holdSec: number;
	rampDownSec: number;
}

export interface SuiteLog {
	name: string;
	content: string;
}

function pad(value: number): string {
	return String(value).padStart(2, "0");
}

/**
 * Directory name for a suite's results, e.g. `benchmark_results_20250102_030405`.
 */
export function resultsDirName(date: Date): string {
	const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
	const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
	return `benchmark_results_${day}_${time}`;
}

/**
 * Log file name of one suite run.
 */
export function runLogName(scenarioId: number, clientCount: number): string {
	return `scenario${scenarioId}_${clientCount}clients.log`;
}

/**
 * Build `summary.txt`: the suite header followed by the metric lines
 * extracted from every run log, in run order.
 */
export function buildSuiteSummary(header: SuiteHeader, logs: readonly SuiteLog[]): string[] {
	const lines = [
		"WebSocket Tag Filtering Benchmark Summary",
		"==========================================",
		`Date: ${header.date.toISOString()}`,
		`Server: ${header.target}`,
		`Channel: ${header.channel}`,
		"",
		"Configuration:",
		`  Ramp Duration: ${header.rampUpSec}s`,
		`  Hold Duration: ${header.holdSec}s`,
		`  Ramp Down: ${header.rampDownSec}s`,
		"",
		"Results:",
		"--------",
		"",
	];

	for (const log of logs) {
		lines.push(`=== ${log.name} ===`);
		const metrics = extractMetricLines(log.content);
		if (metrics.length > 0) {
			lines.push(...metrics);
		} else {
			lines.push("No metrics found");
		}
		lines.push("");
	}

	return lines;
}
