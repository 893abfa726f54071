import type { ErrorCode, PhaseTiming } from "@filterbench/engine";

/**
 * Latency statistics in milliseconds, rounded for output.
 */
export interface LatencyStats {
	count: number;
	min: number;
	max: number;
	avg: number;
	p50: number;
	p95: number;
	p99: number;
}

/**
 * Complete results of one run, as written to the JSON results file.
 */
export interface BenchResults {
	runId: string;
	scenario: {
		id: number;
		label: string;
	};
	timestamp: string;
	target: string;
	protocol: string;
	config: {
		host: string;
		port: number;
		channel: string;
		clients: number;
		rampUpSec: number;
		warmupSec: number;
		holdSec: number;
		rampDownSec: number;
		graceSec: number;
		clientIdOffset: number;
		poolSize: number;
		/** Only present for the filter-update scenario */
		updateIntervalMs?: number;
	};
	/** False when the run was interrupted */
	completed: boolean;
	results: {
		sessions: {
			attempted: number;
			subscribed: number;
			subscribeFailed: number;
			connectionErrors: number;
			successRate: number;
		};
		messages: {
			received: number;
			/** Received before the measurement window opened */
			duringWarmup: number;
		};
		updates: {
			attempted: number;
			successful: number;
			failed: number;
		};
		/** Server-side closes after subscribing */
		disconnects: number;
		forcedTerminations: number;
		latency: {
			subscribe: LatencyStats | null;
			update: LatencyStats | null;
			/** Publish-to-receive latency */
			delivery: LatencyStats | null;
		};
		timing: PhaseTiming;
		/** Failed sessions by error code */
		failures: Partial<Record<ErrorCode, number>>;
		/** Failed filter updates by error code */
		updateFailures: Partial<Record<ErrorCode, number>>;
	};
}
