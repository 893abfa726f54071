import { ErrorCode, type Summary } from "@filterbench/engine";

/**
 * A finished filter-update run with a few failures.
 */
export function createSummary(overrides: Partial<Summary> = {}): Summary {
	return {
		scenario: { id: 2, label: "Filter updates every 5s", description: "Mass subscription update", updateIntervalMs: 5000 },
		protocol: "pusher",
		url: "wss://bench.test:443/app/test-key",
		startedAt: "2025-01-02T03:04:05.000Z",
		config: {
			host: "bench.test",
			port: 443,
			channel: "market-data",
			clientCount: 3,
			rampUpSec: 30,
			warmupSec: 0,
			holdSec: 60,
			rampDownSec: 10,
			graceSec: 10,
			clientIdOffset: 0,
			poolSize: 10000,
		},
		completed: true,
		timing: { rampUpMs: 30_000, warmupMs: 0, holdMs: 60_000, rampDownMs: 10_000, drainMs: 120, totalMs: 100_120 },
		metrics: {
			attemptedConnections: 3,
			subscribeSuccess: 2,
			subscribeFailed: 1,
			connectionErrors: 0,
			messagesReceived: 40,
			messagesDuringWarmup: 0,
			updates: { attempted: 24, successful: 23, failed: 1 },
			disconnects: 0,
			forcedTerminations: 0,
			latency: {
				subscribe: { count: 2, min: 4, max: 9, mean: 6.5, p50: 4, p95: 9, p99: 9 },
				update: { count: 23, min: 1.234, max: 30.5, mean: 12.3456, p50: 10, p95: 28, p99: 30.5 },
				delivery: null,
			},
		},
		failures: { [ErrorCode.SUBSCRIBE_TIMEOUT]: 1 },
		updateFailures: { [ErrorCode.UPDATE_TIMEOUT]: 1 },
		...overrides,
	};
}
