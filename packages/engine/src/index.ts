// Domain
export * from "./domain/errors.js";
export * from "./domain/scenario.js";
export type * from "./domain/filter.js";
export type * from "./domain/logger.js";
export type * from "./domain/metrics.js";
export type * from "./domain/session.js";
export type * from "./domain/session-state.js";
export type * from "./domain/wire-protocol.js";

// Filters
export { AddressPool, SYNTHETIC_POOL_SIZE } from "./filter/address-pool.js";
export { DEFAULT_FILTER_KEY, FilterGenerator, type FilterGeneratorOptions, type RandomSource } from "./filter/filter-generator.js";

// Metrics
export { MetricsAggregator } from "./metrics/metrics-aggregator.js";
export { calculateLatencyStats, percentile } from "./metrics/stats.js";

// Wire protocols
export { extractTimestamp, PusherProtocol } from "./protocol/pusher.js";

// Sessions and ramping
export { DEFAULT_ACK_TIMEOUT_MS, DEFAULT_CONNECT_TIMEOUT_MS, SessionClient, type SessionClientEvents, type SessionClientOptions } from "./session/session-client.js";
export { connectWebSocket, type SessionSocket, type SocketFactory, type SocketHandlers, type SocketOptions } from "./session/socket.js";
export { calculatePacingDelay, calculatePacingRate, type PacingOptions, runPaced } from "./ramp/pacing.js";
export {
	DEFAULT_PROGRESS_INTERVAL_MS,
	type PhaseTiming,
	RampController,
	type RampControllerEvents,
	type RampControllerOptions,
	type RampPhase,
	type RampPlan,
	type RampResult,
	type RampTick,
} from "./ramp/ramp-controller.js";

// Runner
export { DEFAULT_GRACE_SEC, MAX_CLIENTS, type ResolvedRunConfig, type RunConfig, validateRunConfig } from "./runner/run-config.js";
export {
	type HostResolver,
	type RunStartInfo,
	runBenchmark,
	ScenarioRunner,
	type ScenarioRunnerEvents,
	type ScenarioRunnerOptions,
	type Summary,
} from "./runner/scenario-runner.js";
export { extractMetricLines, SUMMARY_LABELS, summaryLines } from "./runner/summary-lines.js";

// Utilities
export { type ConsoleLoggerOptions, createConsoleLogger, silentLogger } from "./utils/console-logger.js";
export { sleep, sleepUntil } from "./utils/timing.js";
