import { describe, expect, test } from "vitest";
import { ErrorCode } from "../domain/errors.js";
import type { ILogger } from "../domain/logger.js";
import { SCENARIOS } from "../domain/scenario.js";
import type { ISession } from "../domain/session.js";
import type { CloseReason, SessionReport } from "../domain/session-state.js";
import { AddressPool } from "../filter/address-pool.js";
import { FilterGenerator } from "../filter/filter-generator.js";
import { MetricsAggregator } from "../metrics/metrics-aggregator.js";
import { PusherProtocol } from "../protocol/pusher.js";
import { SessionClient } from "../session/session-client.js";
import { FakeSocket } from "../test-utils/fake-socket.js";
import { silentLogger } from "../utils/console-logger.js";
import { type RampPhase, type RampPlan, RampController, type RampTick } from "./ramp-controller.js";

/**
 * Session stand-in. Cooperative sessions finish when asked to close;
 * stuck ones only finish when terminated.
 */
class FakeSession implements ISession {
	closed = false;
	closedAt = 0;
	terminated = false;
	private done = false;
	private resolve: ((report: SessionReport) => void) | null = null;

	constructor(
		readonly id: number,
		private readonly stuck: boolean,
	) {}

	run(): Promise<SessionReport> {
		return new Promise((resolve) => {
			this.resolve = resolve;
		});
	}

	close(): void {
		this.closed = true;
		this.closedAt = performance.now();
		if (!this.stuck) this.finish("ramp-down");
	}

	terminate(): boolean {
		if (this.done) return false;
		this.terminated = true;
		this.finish("forced");
		return true;
	}

	private finish(reason: CloseReason): void {
		if (this.done) return;
		this.done = true;
		this.resolve?.({
			id: this.id,
			outcome: "subscribed",
			final: { kind: "closed", reason },
			messagesReceived: 0,
			updateAttempts: 0,
			updateFailures: {},
		});
	}
}

function createController(isStuck: (index: number) => boolean = () => false, logger: ILogger = silentLogger) {
	const sessions: FakeSession[] = [];
	const controller = new RampController({
		logger,
		createSession: (index) => {
			const session = new FakeSession(index, isStuck(index));
			sessions.push(session);
			return session;
		},
	});
	return { controller, sessions };
}

/**
 * Offsets of paced events: the i-th is due at `i * stepMs`, may run late
 * by less than one step, and never runs early (timers round to whole
 * milliseconds). The cumulative count therefore never decreases and stays
 * within one quantum of `N * t / spread`.
 */
function expectPaced(offsets: readonly number[], count: number, stepMs: number): void {
	expect(offsets).toHaveLength(count);
	offsets.forEach((offset, i) => {
		expect(offset).toBeGreaterThanOrEqual(i * stepMs - 2);
		expect(offset).toBeLessThan((i + 1) * stepMs);
		if (i > 0) expect(offset).toBeGreaterThanOrEqual(offsets[i - 1] ?? 0);
	});
}

const QUICK_PLAN: RampPlan = {
	clientCount: 5,
	rampUpSec: 0.05,
	warmupSec: 0,
	holdSec: 0.05,
	rampDownSec: 0.05,
	graceSec: 1,
};

describe("RampController", () => {
	test("should start every session and close them all in ramp-down", async () => {
		const { controller, sessions } = createController();
		const phases: RampPhase[] = [];
		controller.on("phase", (phase) => phases.push(phase));

		const result = await controller.start(QUICK_PLAN);

		expect(phases).toEqual(["ramp-up", "hold", "ramp-down", "drain", "done"]);
		expect(result.attempted).toBe(5);
		expect(result.completed).toBe(5);
		expect(result.forcedTerminations).toBe(0);
		expect(result.reports).toHaveLength(5);
		expect(result.stopped).toBe(false);
		expect(sessions.map((session) => session.id)).toEqual([0, 1, 2, 3, 4]);
		expect(sessions.every((session) => session.closed && !session.terminated)).toBe(true);
	});

	test("should start session i at i * rampUp / N and never ahead of it", async () => {
		const { controller } = createController();
		let rampUpAt = 0;
		const offsets: number[] = [];
		controller.on("phase", (phase) => {
			if (phase === "ramp-up") rampUpAt = performance.now();
		});
		controller.on("session-started", () => offsets.push(performance.now() - rampUpAt));

		// Ten starts over 300ms: one every 30ms
		await controller.start({ ...QUICK_PLAN, clientCount: 10, rampUpSec: 0.3 });

		expectPaced(offsets, 10, 30);
	});

	test("should spread close calls evenly over the ramp-down duration", async () => {
		const { controller, sessions } = createController();
		let rampDownAt = 0;
		controller.on("phase", (phase) => {
			if (phase === "ramp-down") rampDownAt = performance.now();
		});

		await controller.start({ ...QUICK_PLAN, clientCount: 10, rampDownSec: 0.3 });

		expectPaced(
			sessions.map((session) => session.closedAt - rampDownAt),
			10,
			30,
		);
	});

	test("should log the ramp rates", async () => {
		const lines: string[] = [];
		const logger: ILogger = { ...silentLogger, info: (message) => lines.push(message) };
		const { controller } = createController(() => false, logger);

		await controller.start(QUICK_PLAN);

		expect(lines).toContain("Ramping up 5 sessions over 0.05s (100.0/s)");
		expect(lines).toContain("Ramping down 5 sessions over 0.05s (100.0/s)");
	});

	test("should run a warm-up phase and announce the measurement window", async () => {
		const { controller } = createController();
		const phases: RampPhase[] = [];
		let measurementStarts = 0;
		controller.on("phase", (phase) => phases.push(phase));
		controller.on("measurement-start", () => measurementStarts++);

		const result = await controller.start({ ...QUICK_PLAN, warmupSec: 0.05 });

		expect(phases).toEqual(["ramp-up", "warmup", "hold", "ramp-down", "drain", "done"]);
		expect(measurementStarts).toBe(1);
		expect(result.timing.warmupMs).toBeGreaterThan(0);
	});

	test("should terminate sessions still open at the deadline", async () => {
		const { controller, sessions } = createController((index) => index % 2 === 0);

		const result = await controller.start({ ...QUICK_PLAN, graceSec: 0.2 });

		expect(result.attempted).toBe(5);
		expect(result.forcedTerminations).toBe(3);
		expect(result.completed).toBe(2);
		expect(sessions.filter((session) => session.terminated).map((session) => session.id)).toEqual([0, 2, 4]);
		const forced = result.reports.filter((report) => report.final.kind === "closed" && report.final.reason === "forced");
		expect(forced).toHaveLength(3);
	});

	test("should count sessions cancelled in the subscribe wait once, even when the deadline terminates them", async () => {
		const metrics = new MetricsAggregator();
		const filters = new FilterGenerator({ pool: AddressPool.synthetic(10), random: () => 0 });
		const controller = new RampController({
			logger: silentLogger,
			createSession: (index) =>
				new SessionClient({
					id: index,
					url: "ws://127.0.0.1:1/app/test-key",
					channel: "test-channel",
					scenario: SCENARIOS[1],
					filters,
					protocol: new PusherProtocol(),
					metrics,
					logger: silentLogger,
					ackTimeoutMs: 5000,
					// The server accepts the subscribe but never acks it or answers a close
					connect: (_url, _options, handlers) => {
						const socket = new FakeSocket(handlers, { answerClose: false });
						queueMicrotask(() => {
							socket.open();
							socket.receive({ event: "pusher:connection_established", data: JSON.stringify({ socket_id: "1.1" }) });
						});
						return socket;
					},
				}),
		});

		const result = await controller.start({ ...QUICK_PLAN, clientCount: 3, graceSec: 0.1 });

		expect(result.forcedTerminations).toBe(3);
		expect(result.reports.map((report) => report.error?.code)).toEqual([ErrorCode.SUBSCRIBE_CANCELLED, ErrorCode.SUBSCRIBE_CANCELLED, ErrorCode.SUBSCRIBE_CANCELLED]);
		const snapshot = metrics.snapshot();
		expect(snapshot.attemptedConnections).toBe(3);
		expect(snapshot.subscribeFailed).toBe(3);
		expect(snapshot.connectionErrors).toBe(0);
		expect(snapshot.subscribeSuccess).toBe(0);
		expect(snapshot.forcedTerminations).toBe(3);
	});

	test("should emit progress ticks during hold", async () => {
		const { controller } = createController();
		const ticks: RampTick[] = [];
		controller.on("tick", (tick) => ticks.push(tick));

		await controller.start({ ...QUICK_PLAN, holdSec: 0.3, progressIntervalMs: 50 });

		expect(ticks.length).toBeGreaterThanOrEqual(2);
		expect(ticks.every((tick) => tick.phase === "hold" && tick.started === 5 && tick.settled === 0)).toBe(true);
	});

	test("should skip to ramp-down when stopped", async () => {
		const { controller, sessions } = createController();
		controller.once("session-started", () => controller.stop());

		const result = await controller.start({ ...QUICK_PLAN, rampUpSec: 1, holdSec: 10 });

		expect(result.stopped).toBe(true);
		expect(result.attempted).toBe(1);
		expect(result.timing.holdMs).toBeLessThan(1000);
		expect(sessions[0]?.closed).toBe(true);
	});

	test("should reject a second start", async () => {
		const { controller } = createController();
		const first = controller.start(QUICK_PLAN);

		await expect(controller.start(QUICK_PLAN)).rejects.toThrow("RampController.start() called twice");
		await first;
	});
});
