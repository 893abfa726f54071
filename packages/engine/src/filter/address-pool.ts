import * as fs from "node:fs";
import { ErrorCode, FatalConfigurationError } from "../domain/errors.js";
import type { ILogger } from "../domain/logger.js";

/** Pool size used when no token file is available. */
export const SYNTHETIC_POOL_SIZE = 10_000;

/**
 * Read-only set of distinct filter values. Shared by every session of a run.
 */
export class AddressPool {
	private readonly values: readonly string[];

	private constructor(values: readonly string[]) {
		this.values = values;
	}

	/**
	 * Build a pool from a list, dropping duplicates and empty strings.
	 */
	static fromValues(values: Iterable<string>): AddressPool {
		const unique = new Set<string>();
		for (const value of values) {
			if (value.length > 0) unique.add(value);
		}
		return new AddressPool([...unique]);
	}

	/**
	 * Generate `token_00000000`, `token_00000001`, ... for runs without a token file.
	 */
	static synthetic(count: number = SYNTHETIC_POOL_SIZE): AddressPool {
		return new AddressPool(Array.from({ length: count }, (_, i) => `token_${i.toString(16).padStart(8, "0")}`));
	}

	/**
	 * Load a pool from a JSON file containing an array of strings.
	 * @throws FatalConfigurationError if the file cannot be read or has the wrong shape
	 */
	static fromFile(filePath: string): AddressPool {
		let parsed: unknown;
		try {
			parsed = JSON.parse(fs.readFileSync(filePath, "utf-8"));
		} catch (error) {
			throw new FatalConfigurationError(ErrorCode.TOKEN_FILE_INVALID, `Could not read token file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
		}

		if (!Array.isArray(parsed) || !parsed.every((entry): entry is string => typeof entry === "string")) {
			throw new FatalConfigurationError(ErrorCode.TOKEN_FILE_INVALID, `Token file ${filePath} must contain a JSON array of strings`);
		}

		const pool = AddressPool.fromValues(parsed);
		if (pool.size === 0) {
			throw new FatalConfigurationError(ErrorCode.TOKEN_FILE_INVALID, `Token file ${filePath} contains no addresses`);
		}
		return pool;
	}

	/**
	 * Load from `filePath` when it exists, otherwise fall back to a synthetic pool.
	 */
	static load(filePath: string | undefined, logger: ILogger): AddressPool {
		if (filePath && fs.existsSync(filePath)) {
			const pool = AddressPool.fromFile(filePath);
			logger.info(`Loaded ${pool.size} token addresses from ${filePath}`);
			return pool;
		}
		if (filePath) {
			logger.warn(`Token file not found: ${filePath}, generating ${SYNTHETIC_POOL_SIZE} synthetic tokens`);
		}
		return AddressPool.synthetic();
	}

	get size(): number {
		return this.values.length;
	}

	/**
	 * Value at `index`. Indices outside the pool are a programming error.
	 */
	at(index: number): string {
		const value = this.values[index];
		if (value === undefined) {
			throw new RangeError(`Address index ${index} out of range (size ${this.values.length})`);
		}
		return value;
	}
}
