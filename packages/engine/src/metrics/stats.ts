import type { LatencyStats } from "../domain/metrics.js";

/**
 * Nearest-rank percentile over an ascending-sorted array.
 * `q` is a fraction in [0, 1].
 */
export function percentile(sorted: readonly number[], q: number): number {
	if (sorted.length === 0) return 0;
	return sorted[Math.floor((sorted.length - 1) * q)] ?? 0;
}

/**
 * Calculate latency statistics from an array of samples.
 * Returns null if the array is empty.
 */
export function calculateLatencyStats(samples: readonly number[]): LatencyStats | null {
	if (samples.length === 0) return null;
	const sorted = [...samples].sort((a, b) => a - b);
	// Avoid spread into Math.min/max: sample sets can exceed the argument limit
	let sum = 0;
	for (const value of sorted) sum += value;
	return {
		count: sorted.length,
		min: sorted[0] ?? 0,
		max: sorted[sorted.length - 1] ?? 0,
		mean: sum / sorted.length,
		p50: percentile(sorted, 0.5),
		p95: percentile(sorted, 0.95),
		p99: percentile(sorted, 0.99),
	};
}
