import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, describe, expect, test } from "vitest";
import { ErrorCode, FatalConfigurationError } from "../domain/errors.js";
import type { RampPhase } from "../ramp/ramp-controller.js";
import { PusherTestServer } from "../test-utils/pusher-test-server.js";
import type { RunConfig } from "./run-config.js";
import { type RunStartInfo, runBenchmark, ScenarioRunner } from "./scenario-runner.js";

const resolveHost = async () => {};

function sumCounts(counts: Partial<Record<ErrorCode, number>>): number {
	return Object.values(counts).reduce((total, count) => total + (count ?? 0), 0);
}

function quickConfig(port: number, overrides: Partial<RunConfig> = {}): RunConfig {
	return {
		host: "127.0.0.1",
		port,
		appKey: "test-key",
		channel: "test-channel",
		scenarioId: 1,
		clientCount: 5,
		rampUpSec: 0.1,
		holdSec: 0.1,
		rampDownSec: 0.1,
		graceSec: 1,
		...overrides,
	};
}

describe("ScenarioRunner", () => {
	let server: PusherTestServer | undefined;

	afterEach(async () => {
		await server?.close();
		server = undefined;
	});

	test("should run a scenario end to end", async () => {
		server = await PusherTestServer.start();
		const runner = new ScenarioRunner({ resolveHost });
		const phases: RampPhase[] = [];
		const starts: RunStartInfo[] = [];
		runner.on("phase", (phase) => phases.push(phase));
		runner.on("start", (info) => starts.push(info));

		const summary = await runner.run(quickConfig(server.port));

		expect(summary.completed).toBe(true);
		expect(summary.url).toBe(`ws://127.0.0.1:${server.port}/app/test-key`);
		expect(summary.protocol).toBe("pusher");
		expect(summary.scenario).toEqual({ id: 1, label: "Single token_address (eq)", description: "Mass subscribe: each client subscribes to one random value", updateIntervalMs: undefined });
		expect(summary.config.poolSize).toBe(10_000);
		expect(summary.metrics.attemptedConnections).toBe(5);
		expect(summary.metrics.subscribeSuccess).toBe(5);
		expect(summary.metrics.subscribeFailed).toBe(0);
		expect(summary.metrics.connectionErrors).toBe(0);
		expect(summary.metrics.forcedTerminations).toBe(0);
		expect(summary.metrics.latency.subscribe?.count).toBe(5);
		expect(summary.failures).toEqual({});
		expect(summary.updateFailures).toEqual({});
		expect(server.received).toHaveLength(5);
		expect(phases).toEqual(["ramp-up", "hold", "ramp-down", "drain", "done"]);
		expect(starts).toEqual([{ url: summary.url, scenario: { id: 1, label: "Single token_address (eq)" }, protocol: "pusher", clientCount: 5, poolSize: 10_000 }]);
		expect(runner.live()?.active).toBe(0);
	});

	test("should complete with only connection errors when the server is unreachable", async () => {
		const closed = await PusherTestServer.start();
		const port = closed.port;
		await closed.close();

		const summary = await runBenchmark(quickConfig(port), { resolveHost });

		expect(summary.completed).toBe(true);
		expect(summary.metrics.attemptedConnections).toBe(5);
		expect(summary.metrics.connectionErrors).toBe(5);
		expect(summary.metrics.subscribeSuccess).toBe(0);
		expect(summary.metrics.subscribeFailed).toBe(0);
		expect(summary.failures).toEqual({ [ErrorCode.CONNECTION_REFUSED]: 5 });
	});

	test("should count rejected subscribes as failures", async () => {
		server = await PusherTestServer.start({ subscribe: "reject" });

		const summary = await runBenchmark(quickConfig(server.port), { resolveHost });

		expect(summary.metrics.subscribeFailed).toBe(5);
		expect(summary.metrics.subscribeSuccess).toBe(0);
		expect(summary.failures).toEqual({ [ErrorCode.SUBSCRIBE_REJECTED]: 5 });
	});

	test("should break down cancelled subscribes so failures sum to the failed sessions", async () => {
		server = await PusherTestServer.start({ subscribe: "never" });

		const summary = await runBenchmark(quickConfig(server.port, { ackTimeoutMs: 5000 }), { resolveHost });

		expect(summary.metrics.subscribeFailed).toBe(5);
		expect(summary.metrics.connectionErrors).toBe(0);
		expect(summary.metrics.forcedTerminations).toBe(0);
		expect(summary.failures).toEqual({ [ErrorCode.SUBSCRIBE_CANCELLED]: 5 });
		expect(sumCounts(summary.failures)).toBe(summary.metrics.subscribeFailed + summary.metrics.connectionErrors);
	});

	test("should break down update failures so they sum to the failed updates", async () => {
		server = await PusherTestServer.start({ update: "never" });

		const summary = await runBenchmark(quickConfig(server.port, { scenarioId: 2, clientCount: 2, holdSec: 0.3, filterUpdateIntervalMs: 50 }), { resolveHost });

		expect(summary.metrics.updates.successful).toBe(0);
		expect(summary.metrics.updates.failed).toBeGreaterThan(0);
		expect(summary.updateFailures[ErrorCode.UPDATE_TIMEOUT]).toBeGreaterThan(0);
		expect(sumCounts(summary.updateFailures)).toBe(summary.metrics.updates.failed);
		expect(sumCounts(summary.failures)).toBe(summary.metrics.subscribeFailed + summary.metrics.connectionErrors);
	});

	test("should send filter updates for the update scenario", async () => {
		server = await PusherTestServer.start();

		const summary = await runBenchmark(quickConfig(server.port, { scenarioId: 2, clientCount: 2, holdSec: 0.3, filterUpdateIntervalMs: 50 }), { resolveHost });

		expect(summary.scenario.updateIntervalMs).toBe(50);
		expect(summary.metrics.updates.attempted).toBeGreaterThan(0);
		expect(summary.metrics.updates.successful + summary.metrics.updates.failed).toBe(summary.metrics.updates.attempted);
		expect(server.received.some((request) => request.isUpdate)).toBe(true);
	});

	test("should open the measurement window after warm-up", async () => {
		server = await PusherTestServer.start();
		const runner = new ScenarioRunner({ resolveHost });
		let measurementStarts = 0;
		runner.on("measurement-start", () => measurementStarts++);

		const summary = await runner.run(quickConfig(server.port, { warmupSec: 0.1 }));

		expect(measurementStarts).toBe(1);
		expect(summary.config.warmupSec).toBe(0.1);
		expect(summary.metrics.latency.subscribe?.count).toBe(5);
	});

	describe("fatal configuration", () => {
		test("should reject an unknown scenario before connecting", async () => {
			server = await PusherTestServer.start();
			const run = runBenchmark(quickConfig(server.port, { scenarioId: 9 }), { resolveHost });

			await expect(run).rejects.toBeInstanceOf(FatalConfigurationError);
			await expect(run).rejects.toMatchObject({ code: ErrorCode.INVALID_SCENARIO });
			expect(server.connectionCount).toBe(0);
		});

		test("should reject an unresolvable host", async () => {
			const failingResolver = async () => {
				throw new Error("getaddrinfo ENOTFOUND nowhere.invalid");
			};

			await expect(runBenchmark(quickConfig(443, { host: "nowhere.invalid" }), { resolveHost: failingResolver })).rejects.toMatchObject({
				code: ErrorCode.HOST_UNRESOLVABLE,
				message: "Cannot resolve host nowhere.invalid: getaddrinfo ENOTFOUND nowhere.invalid",
			});
		});

		test("should reject a token pool smaller than the scenario needs", async () => {
			server = await PusherTestServer.start();
			const dir = fs.mkdtempSync(path.join(os.tmpdir(), "scenario-runner-"));
			const tokenFile = path.join(dir, "tokens.json");
			fs.writeFileSync(tokenFile, JSON.stringify(["0x01", "0x02", "0x03"]));

			try {
				await expect(runBenchmark(quickConfig(server.port, { scenarioId: 3, tokenFile }), { resolveHost })).rejects.toMatchObject({ code: ErrorCode.INVALID_CONFIG });
				expect(server.connectionCount).toBe(0);
			} finally {
				fs.rmSync(dir, { recursive: true, force: true });
			}
		});

		test("should reject a malformed token file", async () => {
			const dir = fs.mkdtempSync(path.join(os.tmpdir(), "scenario-runner-"));
			const tokenFile = path.join(dir, "tokens.json");
			fs.writeFileSync(tokenFile, "{}");

			try {
				await expect(runBenchmark(quickConfig(443, { tokenFile }), { resolveHost })).rejects.toMatchObject({ code: ErrorCode.TOKEN_FILE_INVALID });
			} finally {
				fs.rmSync(dir, { recursive: true, force: true });
			}
		});
	});

	test("should refuse to run twice", async () => {
		server = await PusherTestServer.start();
		const runner = new ScenarioRunner({ resolveHost });
		await runner.run(quickConfig(server.port, { clientCount: 1 }));

		await expect(runner.run(quickConfig(server.port, { clientCount: 1 }))).rejects.toThrow("ScenarioRunner.run() called twice");
	});
});
