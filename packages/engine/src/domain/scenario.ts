import { ErrorCode, FatalConfigurationError } from "./errors.js";
import type { FilterRule } from "./filter.js";

export type ScenarioId = 1 | 2 | 3 | 4 | 5;

/**
 * A named workload pattern: how each session builds its filter and whether
 * it replaces that filter periodically.
 */
export interface Scenario {
	readonly id: ScenarioId;
	readonly label: string;
	readonly description: string;
	readonly filter: FilterRule;
	/** Present only for scenarios that replace the filter while active */
	readonly updateIntervalMs?: number;
}

/** Default replacement interval for the filter-update scenario. */
export const DEFAULT_UPDATE_INTERVAL_MS = 5000;

export const SCENARIOS: Readonly<Record<ScenarioId, Scenario>> = {
	1: {
		id: 1,
		label: "Single token_address (eq)",
		description: "Mass subscribe: each client subscribes to one random value",
		filter: { mode: "equals", cardinality: 1 },
	},
	2: {
		id: 2,
		label: "Filter updates every 5s",
		description: "Mass subscription update: each client replaces its filter periodically",
		filter: { mode: "equals", cardinality: 1 },
		updateIntervalMs: DEFAULT_UPDATE_INTERVAL_MS,
	},
	3: {
		id: 3,
		label: "10 token_addresses (IN)",
		description: "Mass subscribe: each client subscribes to 10 random values",
		filter: { mode: "in-set", cardinality: 10 },
	},
	4: {
		id: 4,
		label: "100 token_addresses (IN)",
		description: "Mass subscribe: each client subscribes to 100 random values",
		filter: { mode: "in-set", cardinality: 100 },
	},
	5: {
		id: 5,
		label: "500 token_addresses (IN)",
		description: "Mass subscribe: each client subscribes to 500 random values",
		filter: { mode: "in-set", cardinality: 500 },
	},
};

export function isScenarioId(value: number): value is ScenarioId {
	return Object.hasOwn(SCENARIOS, value);
}

/**
 * Look up a scenario by id.
 * @throws FatalConfigurationError for ids outside the catalog
 */
export function getScenario(id: number): Scenario {
	if (!isScenarioId(id)) {
		throw new FatalConfigurationError(ErrorCode.INVALID_SCENARIO, `Unknown scenario: ${id} (expected one of ${Object.keys(SCENARIOS).join(", ")})`);
	}
	return SCENARIOS[id];
}

/**
 * Scenario with its update interval replaced, for runs that override the
 * default cadence. Scenarios without periodic updates are returned unchanged.
 */
export function withUpdateInterval(scenario: Scenario, intervalMs: number | undefined): Scenario {
	if (scenario.updateIntervalMs === undefined || intervalMs === undefined) return scenario;
	return { ...scenario, updateIntervalMs: intervalMs };
}
