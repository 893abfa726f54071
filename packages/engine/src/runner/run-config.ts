import { ErrorCode, FatalConfigurationError } from "../domain/errors.js";
import { getScenario, type Scenario, withUpdateInterval } from "../domain/scenario.js";
import { DEFAULT_FILTER_KEY } from "../filter/filter-generator.js";
import { DEFAULT_PROGRESS_INTERVAL_MS } from "../ramp/ramp-controller.js";
import { DEFAULT_ACK_TIMEOUT_MS, DEFAULT_CONNECT_TIMEOUT_MS } from "../session/session-client.js";

/** Upper bound on sessions per run (per process). */
export const MAX_CLIENTS = 100_000;
export const DEFAULT_GRACE_SEC = 10;

/**
 * Parameters of one benchmark run. Durations are in seconds unless the name
 * says otherwise.
 */
export interface RunConfig {
	host: string;
	port: number;
	appKey: string;
	channel: string;
	scenarioId: number;
	clientCount: number;
	rampUpSec: number;
	holdSec: number;
	rampDownSec: number;
	warmupSec?: number;
	graceSec?: number;
	/** Added to session ids, so runs split across machines have distinct ids */
	clientIdOffset?: number;
	/** JSON array of filter values; a synthetic pool is used when it does not exist */
	tokenFile?: string;
	filterKey?: string;
	/** Overrides the update cadence of the filter-update scenario */
	filterUpdateIntervalMs?: number;
	ackTimeoutMs?: number;
	connectTimeoutMs?: number;
	/** Use wss. Defaults to true on port 443. */
	secure?: boolean;
	progressIntervalMs?: number;
}

/**
 * A validated configuration with every default filled in.
 */
export interface ResolvedRunConfig {
	host: string;
	port: number;
	appKey: string;
	channel: string;
	scenario: Scenario;
	clientCount: number;
	rampUpSec: number;
	warmupSec: number;
	holdSec: number;
	rampDownSec: number;
	graceSec: number;
	clientIdOffset: number;
	tokenFile?: string;
	filterKey: string;
	ackTimeoutMs: number;
	connectTimeoutMs: number;
	secure: boolean;
	progressIntervalMs: number;
}

function invalid(message: string): FatalConfigurationError {
	return new FatalConfigurationError(ErrorCode.INVALID_CONFIG, message);
}

function requirePositive(name: string, value: number): void {
	if (!Number.isFinite(value) || value <= 0) throw invalid(`${name} must be a positive number, got ${value}`);
}

function requireNonNegative(name: string, value: number): void {
	if (!Number.isFinite(value) || value < 0) throw invalid(`${name} must not be negative, got ${value}`);
}

/**
 * Check a run configuration and fill in defaults. Host resolution and the
 * token file are checked later, when the run starts.
 * @throws FatalConfigurationError on the first invalid field
 */
export function validateRunConfig(config: RunConfig): ResolvedRunConfig {
	const scenario = withUpdateInterval(getScenario(config.scenarioId), config.filterUpdateIntervalMs);

	if (!Number.isInteger(config.clientCount) || config.clientCount <= 0) {
		throw invalid(`Client count must be a positive integer, got ${config.clientCount}`);
	}
	if (config.clientCount > MAX_CLIENTS) {
		throw invalid(`Client count ${config.clientCount} exceeds the maximum of ${MAX_CLIENTS}`);
	}

	requirePositive("Ramp-up duration", config.rampUpSec);
	requirePositive("Hold duration", config.holdSec);
	requirePositive("Ramp-down duration", config.rampDownSec);

	const warmupSec = config.warmupSec ?? 0;
	const graceSec = config.graceSec ?? DEFAULT_GRACE_SEC;
	requireNonNegative("Warm-up duration", warmupSec);
	requireNonNegative("Grace period", graceSec);

	if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
		throw invalid(`Port must be an integer between 1 and 65535, got ${config.port}`);
	}
	if (config.host.trim() === "") throw invalid("Host must not be empty");
	if (config.appKey.trim() === "") throw invalid("App key must not be empty");
	if (config.channel.trim() === "") throw invalid("Channel must not be empty");

	const clientIdOffset = config.clientIdOffset ?? 0;
	if (!Number.isInteger(clientIdOffset) || clientIdOffset < 0) {
		throw invalid(`Client id offset must be a non-negative integer, got ${clientIdOffset}`);
	}

	if (config.filterUpdateIntervalMs !== undefined) requirePositive("Filter update interval", config.filterUpdateIntervalMs);
	const ackTimeoutMs = config.ackTimeoutMs ?? DEFAULT_ACK_TIMEOUT_MS;
	const connectTimeoutMs = config.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
	const progressIntervalMs = config.progressIntervalMs ?? DEFAULT_PROGRESS_INTERVAL_MS;
	requirePositive("Ack timeout", ackTimeoutMs);
	requirePositive("Connect timeout", connectTimeoutMs);
	requirePositive("Progress interval", progressIntervalMs);

	const filterKey = config.filterKey ?? DEFAULT_FILTER_KEY;
	if (filterKey === "") throw invalid("Filter key must not be empty");

	return {
		host: config.host,
		port: config.port,
		appKey: config.appKey,
		channel: config.channel,
		scenario,
		clientCount: config.clientCount,
		rampUpSec: config.rampUpSec,
		warmupSec,
		holdSec: config.holdSec,
		rampDownSec: config.rampDownSec,
		graceSec,
		clientIdOffset,
		tokenFile: config.tokenFile,
		filterKey,
		ackTimeoutMs,
		connectTimeoutMs,
		secure: config.secure ?? config.port === 443,
		progressIntervalMs,
	};
}
