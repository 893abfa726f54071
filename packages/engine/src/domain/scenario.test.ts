import { describe, expect, test } from "vitest";
import { FatalConfigurationError } from "./errors.js";
import { getScenario, isScenarioId, SCENARIOS, withUpdateInterval } from "./scenario.js";

describe("scenarios", () => {
	test("should map ids to filter rules", () => {
		expect([1, 2, 3, 4, 5].map((id) => getScenario(id).filter)).toEqual([
			{ mode: "equals", cardinality: 1 },
			{ mode: "equals", cardinality: 1 },
			{ mode: "in-set", cardinality: 10 },
			{ mode: "in-set", cardinality: 100 },
			{ mode: "in-set", cardinality: 500 },
		]);
	});

	test("should only give the update scenario an interval", () => {
		expect(SCENARIOS[2].updateIntervalMs).toBe(5000);
		expect([1, 3, 4, 5].map((id) => getScenario(id).updateIntervalMs)).toEqual([undefined, undefined, undefined, undefined]);
	});

	test("should recognise catalog ids only", () => {
		expect(isScenarioId(3)).toBe(true);
		expect(isScenarioId(7)).toBe(false);
		expect(() => getScenario(7)).toThrow(FatalConfigurationError);
	});

	test("should override the interval without mutating the catalog", () => {
		const faster = withUpdateInterval(SCENARIOS[2], 1000);
		expect(faster.updateIntervalMs).toBe(1000);
		expect(SCENARIOS[2].updateIntervalMs).toBe(5000);
		expect(withUpdateInterval(SCENARIOS[1], 1000)).toBe(SCENARIOS[1]);
	});
});
