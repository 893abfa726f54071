import type { LatencyStats, MetricsSnapshot } from "../domain/metrics.js";

/**
 * Labels of the metric lines that result extraction looks for. The summary
 * block below is the stable, plain-text form of a run's result; tooling
 * greps it out of run logs, so labels and layout must not drift.
 */
export const SUMMARY_LABELS = [
	"Subscribe Success",
	"Subscribe Failed",
	"Connection Errors",
	"Messages Received",
	"Mean:",
	"p95:",
	"p99:",
] as const;

function formatMs(value: number): string {
	return Number.isInteger(value) ? String(value) : value.toFixed(1);
}

function latencyBlock(title: string, stats: LatencyStats | null, withSamples = false): string[] {
	if (!stats) return [title, "  No data"];
	const lines = [
		title,
		`  Min:    ${formatMs(stats.min)}`,
		`  Mean:   ${stats.mean.toFixed(2)}`,
		`  p50:    ${formatMs(stats.p50)}`,
		`  p95:    ${formatMs(stats.p95)}`,
		`  p99:    ${formatMs(stats.p99)}`,
		`  Max:    ${formatMs(stats.max)}`,
	];
	if (withSamples) lines.push(`  Samples: ${stats.count}`);
	return lines;
}

/**
 * Render the summary block of a run, one entry per line.
 */
export function summaryLines(metrics: MetricsSnapshot): string[] {
	const lines = [
		"Connection Metrics:",
		`  Subscribe Success:   ${metrics.subscribeSuccess}`,
		`  Subscribe Failed:    ${metrics.subscribeFailed}`,
		`  Connection Errors:   ${metrics.connectionErrors}`,
		`  Filter Updates:      ${metrics.updates.successful}`,
		`  Update Failed:       ${metrics.updates.failed}`,
		`  Messages Received:   ${metrics.messagesReceived}`,
		`  Disconnects:         ${metrics.disconnects}`,
		`  Forced Terminations: ${metrics.forcedTerminations}`,
		"",
		...latencyBlock("Subscribe Latency (ms):", metrics.latency.subscribe),
	];

	// Only the update scenario produces update samples
	if (metrics.updates.attempted > 0) {
		lines.push("", ...latencyBlock("Filter Update Latency (ms):", metrics.latency.update));
	}

	lines.push("", ...latencyBlock("End-to-End Latency (ms):", metrics.latency.delivery, true));
	return lines;
}

/**
 * Keep only the metric lines of a run log, in order.
 */
export function extractMetricLines(log: string): string[] {
	return log.split(/\r?\n/).filter((line) => SUMMARY_LABELS.some((label) => line.includes(label)));
}
