import { describe, expect, test } from "vitest";
import { calculatePacingDelay, calculatePacingRate, runPaced } from "./pacing.js";

describe("calculatePacingDelay", () => {
	test("should spread the count over the duration", () => {
		expect(calculatePacingDelay(100, 10)).toBe(100);
		expect(calculatePacingDelay(1000, 30)).toBe(30);
	});

	test("should return 0 for no spread or no tasks", () => {
		expect(calculatePacingDelay(100, 0)).toBe(0);
		expect(calculatePacingDelay(0, 10)).toBe(0);
	});
});

describe("calculatePacingRate", () => {
	test("should format tasks per second", () => {
		expect(calculatePacingRate(1000, 30)).toBe("33.3");
	});

	test("should report max without a spread", () => {
		expect(calculatePacingRate(1000, 0)).toBe("max");
	});
});

describe("runPaced", () => {
	test("should start every task in index order", async () => {
		const started: number[] = [];
		const count = await runPaced({ count: 4, spreadMs: 0, onStart: (index) => started.push(index) });

		expect(count).toBe(4);
		expect(started).toEqual([0, 1, 2, 3]);
	});

	test("should never start a task ahead of its slot", async () => {
		const offsets: number[] = [];
		const t0 = performance.now();
		await runPaced({ count: 5, spreadMs: 100, onStart: () => offsets.push(performance.now() - t0) });

		expect(offsets).toHaveLength(5);
		// Slot i opens at i * 20ms; allow 1ms for timer rounding
		offsets.forEach((offset, i) => {
			expect(offset).toBeGreaterThanOrEqual(i * 20 - 1);
		});
		for (let i = 1; i < offsets.length; i++) {
			expect(offsets[i]).toBeGreaterThanOrEqual(offsets[i - 1] ?? 0);
		}
	});

	test("should stop starting tasks once aborted", async () => {
		const controller = new AbortController();
		const started: number[] = [];
		const count = await runPaced({
			count: 10,
			spreadMs: 1000,
			signal: controller.signal,
			onStart: (index) => {
				started.push(index);
				if (index === 1) controller.abort();
			},
		});

		expect(count).toBe(2);
		expect(started).toEqual([0, 1]);
	});
});
