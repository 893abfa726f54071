import { describe, expect, test } from "vitest";
import { calculateLatencyStats, percentile } from "./stats.js";

describe("percentile", () => {
	test("should return 0 for an empty array", () => {
		expect(percentile([], 0.5)).toBe(0);
	});

	test("should use the nearest rank below the exact position", () => {
		const sorted = Array.from({ length: 100 }, (_, i) => i + 1);
		expect(percentile(sorted, 0.5)).toBe(50);
		expect(percentile(sorted, 0.95)).toBe(95);
		expect(percentile(sorted, 0.99)).toBe(99);
		expect(percentile(sorted, 1)).toBe(100);
		expect(percentile(sorted, 0)).toBe(1);
	});
});

describe("calculateLatencyStats", () => {
	test("should return null for no samples", () => {
		expect(calculateLatencyStats([])).toBeNull();
	});

	test("should compute stats over unsorted samples", () => {
		expect(calculateLatencyStats([5, 1, 4, 2, 3])).toEqual({
			count: 5,
			min: 1,
			max: 5,
			mean: 3,
			p50: 3,
			p95: 4,
			p99: 4,
		});
	});

	test("should not depend on sample order", () => {
		const samples = [12, 7, 30, 1, 18, 9, 22];
		expect(calculateLatencyStats([...samples].reverse())).toEqual(calculateLatencyStats(samples));
	});

	test("should not modify the input", () => {
		const samples = [3, 1, 2];
		calculateLatencyStats(samples);
		expect(samples).toEqual([3, 1, 2]);
	});

	test("should keep p99 at or above p95", () => {
		const samples = Array.from({ length: 1000 }, (_, i) => (i * 37) % 251);
		const stats = calculateLatencyStats(samples);
		expect(stats).not.toBeNull();
		expect(stats?.p99).toBeGreaterThanOrEqual(stats?.p95 ?? Number.POSITIVE_INFINITY);
	});

	test("should handle more samples than the argument limit of Math.max", () => {
		const samples = Array.from({ length: 200_000 }, (_, i) => i);
		const stats = calculateLatencyStats(samples);
		expect(stats?.max).toBe(199_999);
		expect(stats?.min).toBe(0);
	});
});
