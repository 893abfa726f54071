import { ErrorCode, FatalConfigurationError } from "../domain/errors.js";
import type { FilterRule, SubscriptionFilter } from "../domain/filter.js";
import type { AddressPool } from "./address-pool.js";

/** Attribute the Pusher filter targets unless configured otherwise. */
export const DEFAULT_FILTER_KEY = "token_address";

export type RandomSource = () => number;

export interface FilterGeneratorOptions {
	pool: AddressPool;
	key?: string;
	/** Uniform source in [0, 1). Defaults to Math.random. */
	random?: RandomSource;
}

/**
 * Builds subscription filters from the address pool.
 *
 * Values within one filter are drawn without replacement; successive calls
 * are independent, so a filter update need not relate to the previous one.
 * The pool is read-only and the generator keeps no cursor, so one instance
 * per session (or a shared one) is equally safe.
 */
export class FilterGenerator {
	private readonly pool: AddressPool;
	private readonly key: string;
	private readonly random: RandomSource;

	constructor(options: FilterGeneratorOptions) {
		this.pool = options.pool;
		this.key = options.key ?? DEFAULT_FILTER_KEY;
		this.random = options.random ?? Math.random;
	}

	/**
	 * Check up front that the pool can satisfy a rule.
	 * @throws FatalConfigurationError when the pool holds fewer values than the rule needs
	 */
	static assertSatisfiable(pool: AddressPool, rule: FilterRule): void {
		if (pool.size < rule.cardinality) {
			throw new FatalConfigurationError(
				ErrorCode.INVALID_CONFIG,
				`Address pool has ${pool.size} values but the scenario needs ${rule.cardinality} distinct values per filter`,
			);
		}
	}

	next(rule: FilterRule): SubscriptionFilter {
		return {
			key: this.key,
			mode: rule.mode,
			values: this.sample(rule.cardinality),
		};
	}

	/**
	 * Sparse partial Fisher-Yates: k distinct indices in O(k) time and memory,
	 * independent of the pool size.
	 */
	private sample(k: number): string[] {
		const n = this.pool.size;
		if (k > n) {
			throw new FatalConfigurationError(ErrorCode.INVALID_CONFIG, `Cannot draw ${k} distinct values from a pool of ${n}`);
		}

		const swapped = new Map<number, number>();
		const values: string[] = [];
		for (let i = 0; i < k; i++) {
			const j = Math.min(n - 1, i + Math.floor(this.random() * (n - i)));
			const atJ = swapped.get(j) ?? j;
			const atI = swapped.get(i) ?? i;
			swapped.set(j, atI);
			values.push(this.pool.at(atJ));
		}
		return values;
	}
}
