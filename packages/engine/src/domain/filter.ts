export type ComparisonMode = "equals" | "in-set";

/**
 * How a scenario derives a filter: the comparison mode and how many distinct
 * values each filter carries.
 */
export type FilterRule = { mode: "equals"; cardinality: 1 } | { mode: "in-set"; cardinality: number };

/**
 * The subscription predicate a session asks the server to apply to channel data.
 */
export interface SubscriptionFilter {
	/** Attribute the server filters on, e.g. token_address */
	key: string;
	mode: ComparisonMode;
	/** Distinct values; exactly one for equals */
	values: string[];
}
