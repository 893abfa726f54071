import { lookup } from "node:dns/promises";
import EventEmitter from "eventemitter3";
import { ErrorCode, FatalConfigurationError } from "../domain/errors.js";
import type { ILogger } from "../domain/logger.js";
import type { LiveStats, MetricsSnapshot } from "../domain/metrics.js";
import type { ScenarioId } from "../domain/scenario.js";
import type { SessionReport } from "../domain/session-state.js";
import type { IWireProtocol } from "../domain/wire-protocol.js";
import { AddressPool } from "../filter/address-pool.js";
import { FilterGenerator, type RandomSource } from "../filter/filter-generator.js";
import { MetricsAggregator } from "../metrics/metrics-aggregator.js";
import { PusherProtocol } from "../protocol/pusher.js";
import { type PhaseTiming, RampController, type RampControllerEvents } from "../ramp/ramp-controller.js";
import { SessionClient } from "../session/session-client.js";
import { silentLogger } from "../utils/console-logger.js";
import { type ResolvedRunConfig, type RunConfig, validateRunConfig } from "./run-config.js";

export type HostResolver = (host: string) => Promise<void>;

export interface ScenarioRunnerOptions {
	logger?: ILogger;
	protocol?: IWireProtocol;
	/** Checks that the host resolves. Defaults to a DNS lookup. */
	resolveHost?: HostResolver;
	random?: RandomSource;
}

/**
 * Emitted once the configuration is valid and the pool is loaded,
 * right before the first session starts.
 */
export interface RunStartInfo {
	url: string;
	scenario: { id: ScenarioId; label: string };
	protocol: string;
	clientCount: number;
	poolSize: number;
}

export interface ScenarioRunnerEvents extends RampControllerEvents {
	start: (info: RunStartInfo) => void;
}

/**
 * Result of one run. Echoes the configuration (minus the app key) so a
 * results file stands on its own.
 */
export interface Summary {
	scenario: { id: ScenarioId; label: string; description: string; updateIntervalMs?: number };
	protocol: string;
	url: string;
	startedAt: string;
	config: {
		host: string;
		port: number;
		channel: string;
		clientCount: number;
		rampUpSec: number;
		warmupSec: number;
		holdSec: number;
		rampDownSec: number;
		graceSec: number;
		clientIdOffset: number;
		poolSize: number;
	};
	/** False when the run was stopped early */
	completed: boolean;
	timing: PhaseTiming;
	metrics: MetricsSnapshot;
	/** Failed sessions by error code; sums to subscribeFailed + connectionErrors */
	failures: Partial<Record<ErrorCode, number>>;
	/** Failed filter updates by error code; sums to updates.failed */
	updateFailures: Partial<Record<ErrorCode, number>>;
}

const resolveWithDns: HostResolver = async (host) => {
	await lookup(host);
};

type FailureCounts = Partial<Record<ErrorCode, number>>;

function addCount(counts: FailureCounts, code: ErrorCode, count: number): void {
	counts[code] = (counts[code] ?? 0) + count;
}

function countFailures(reports: readonly SessionReport[]): { failures: FailureCounts; updateFailures: FailureCounts } {
	const failures: FailureCounts = {};
	const updateFailures: FailureCounts = {};
	for (const report of reports) {
		if (report.error) addCount(failures, report.error.code, 1);
		for (const code of Object.values(ErrorCode)) {
			const count = report.updateFailures[code];
			if (count) addCount(updateFailures, code, count);
		}
	}
	return { failures, updateFailures };
}

/**
 * Runs one scenario end to end: validate, resolve, load the pool, ramp the
 * sessions through the schedule and return the sealed metrics.
 *
 * Configuration problems throw FatalConfigurationError before any session is
 * created. Once sessions start, failures are only counted: a run where every
 * session fails still completes with a snapshot.
 */
export class ScenarioRunner extends EventEmitter<ScenarioRunnerEvents> {
	private readonly logger: ILogger;
	private readonly protocol: IWireProtocol;
	private readonly resolveHost: HostResolver;
	private readonly random: RandomSource | undefined;
	private controller: RampController | null = null;
	private metrics: MetricsAggregator | null = null;
	private started = false;

	constructor(options: ScenarioRunnerOptions = {}) {
		super();
		this.logger = options.logger ?? silentLogger;
		this.protocol = options.protocol ?? new PusherProtocol();
		this.resolveHost = options.resolveHost ?? resolveWithDns;
		this.random = options.random;
	}

	/**
	 * Counters of the run in progress, for progress display.
	 */
	live(): LiveStats | null {
		return this.metrics?.live() ?? null;
	}

	/**
	 * Ramp down early. The run still drains and returns a summary.
	 */
	stop(): void {
		this.controller?.stop();
	}

	async run(input: RunConfig): Promise<Summary> {
		if (this.started) throw new Error("ScenarioRunner.run() called twice");
		this.started = true;

		const config = validateRunConfig(input);
		await this.checkHost(config.host);
		const pool = AddressPool.load(config.tokenFile, this.logger);
		FilterGenerator.assertSatisfiable(pool, config.scenario.filter);

		const url = this.protocol.buildUrl({ host: config.host, port: config.port, appKey: config.appKey, secure: config.secure });
		const filters = new FilterGenerator({ pool, key: config.filterKey, random: this.random });
		const metrics = new MetricsAggregator({ measuring: config.warmupSec === 0 });
		this.metrics = metrics;

		const controller = new RampController({
			logger: this.logger,
			createSession: (index) =>
				new SessionClient({
					id: config.clientIdOffset + index,
					url,
					channel: config.channel,
					scenario: config.scenario,
					filters,
					protocol: this.protocol,
					metrics,
					logger: this.logger,
					ackTimeoutMs: config.ackTimeoutMs,
					connectTimeoutMs: config.connectTimeoutMs,
				}),
		});
		this.controller = controller;
		this.forwardEvents(controller, metrics);

		const startedAt = new Date().toISOString();
		const scenario = { id: config.scenario.id, label: config.scenario.label };
		this.logger.info(`Scenario ${scenario.id} (${scenario.label}): ${config.clientCount} clients against ${url}`);
		this.emit("start", { url, scenario, protocol: this.protocol.name, clientCount: config.clientCount, poolSize: pool.size });

		const result = await controller.start({
			clientCount: config.clientCount,
			rampUpSec: config.rampUpSec,
			warmupSec: config.warmupSec,
			holdSec: config.holdSec,
			rampDownSec: config.rampDownSec,
			graceSec: config.graceSec,
			progressIntervalMs: config.progressIntervalMs,
		});

		metrics.seal();
		const { failures, updateFailures } = countFailures(result.reports);
		return {
			scenario: {
				id: config.scenario.id,
				label: config.scenario.label,
				description: config.scenario.description,
				updateIntervalMs: config.scenario.updateIntervalMs,
			},
			protocol: this.protocol.name,
			url,
			startedAt,
			config: this.echoConfig(config, pool.size),
			completed: !result.stopped,
			timing: result.timing,
			metrics: metrics.snapshot(),
			failures,
			updateFailures,
		};
	}

	private async checkHost(host: string): Promise<void> {
		try {
			await this.resolveHost(host);
		} catch (error) {
			throw new FatalConfigurationError(ErrorCode.HOST_UNRESOLVABLE, `Cannot resolve host ${host}: ${error instanceof Error ? error.message : String(error)}`);
		}
	}

	private forwardEvents(controller: RampController, metrics: MetricsAggregator): void {
		controller.on("phase", (phase) => this.emit("phase", phase));
		controller.on("session-started", (index) => this.emit("session-started", index));
		controller.on("session-settled", (report) => this.emit("session-settled", report));
		controller.on("tick", (tick) => this.emit("tick", tick));
		controller.on("measurement-start", () => {
			metrics.beginMeasurement();
			this.emit("measurement-start");
		});
	}

	private echoConfig(config: ResolvedRunConfig, poolSize: number): Summary["config"] {
		return {
			host: config.host,
			port: config.port,
			channel: config.channel,
			clientCount: config.clientCount,
			rampUpSec: config.rampUpSec,
			warmupSec: config.warmupSec,
			holdSec: config.holdSec,
			rampDownSec: config.rampDownSec,
			graceSec: config.graceSec,
			clientIdOffset: config.clientIdOffset,
			poolSize,
		};
	}
}

/**
 * Run one benchmark with a fresh runner.
 */
export function runBenchmark(config: RunConfig, options?: ScenarioRunnerOptions): Promise<Summary> {
	return new ScenarioRunner(options).run(config);
}
