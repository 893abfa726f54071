import EventEmitter from "eventemitter3";
import type { ILogger } from "../domain/logger.js";
import type { ISession, SessionFactory } from "../domain/session.js";
import type { SessionReport } from "../domain/session-state.js";
import { sleep } from "../utils/timing.js";
import { calculatePacingRate, runPaced } from "./pacing.js";

/** Interval between hold-phase progress ticks. */
export const DEFAULT_PROGRESS_INTERVAL_MS = 5000;

export type RampPhase = "ramp-up" | "warmup" | "hold" | "ramp-down" | "drain" | "done";

/**
 * Phase durations of one run, in seconds.
 */
export interface RampPlan {
	clientCount: number;
	rampUpSec: number;
	/** Settle time after ramp-up before measurement opens; 0 measures from the start */
	warmupSec: number;
	holdSec: number;
	rampDownSec: number;
	/** Extra time after ramp-down for sessions to finish closing */
	graceSec: number;
	progressIntervalMs?: number;
}

export interface PhaseTiming {
	rampUpMs: number;
	warmupMs: number;
	holdMs: number;
	rampDownMs: number;
	drainMs: number;
	totalMs: number;
}

export interface RampResult {
	/** Sessions created */
	attempted: number;
	/** Sessions that finished on their own */
	completed: number;
	/** Sessions still open at the deadline */
	forcedTerminations: number;
	/** One report per created session, in settle order */
	reports: SessionReport[];
	timing: PhaseTiming;
	/** Whether the run was stopped early with `stop()` */
	stopped: boolean;
}

export interface RampTick {
	phase: RampPhase;
	/** Milliseconds since the phase started */
	elapsedMs: number;
	/** Sessions started so far */
	started: number;
	/** Sessions settled so far */
	settled: number;
}

export interface RampControllerEvents {
	phase: (phase: RampPhase) => void;
	"session-started": (index: number) => void;
	"session-settled": (report: SessionReport) => void;
	"measurement-start": () => void;
	tick: (tick: RampTick) => void;
}

export interface RampControllerOptions {
	createSession: SessionFactory;
	logger: ILogger;
}

function whenAborted(signal: AbortSignal): Promise<void> {
	return new Promise((resolve) => {
		if (signal.aborted) {
			resolve();
			return;
		}
		signal.addEventListener("abort", () => resolve(), { once: true });
	});
}

/**
 * Drives the session population through the run's phases:
 *
 * 1. Ramp up: start `clientCount` sessions evenly over `rampUpSec`
 * 2. Warm up (optional): hold without measuring delivery
 * 3. Hold: keep the population steady, emitting a tick every few seconds
 * 4. Ramp down: ask sessions to close, evenly over `rampDownSec`
 * 5. Drain: wait for sessions to finish until the hard deadline
 *    (the sum of all phases plus `graceSec`), then terminate the rest
 *
 * Session starts never wait for earlier sessions to connect, so the start
 * rate does not depend on server response times.
 */
export class RampController extends EventEmitter<RampControllerEvents> {
	private readonly createSession: SessionFactory;
	private readonly logger: ILogger;
	private readonly stopController = new AbortController();
	private running = false;
	private stopRequested = false;

	constructor(options: RampControllerOptions) {
		super();
		this.createSession = options.createSession;
		this.logger = options.logger;
	}

	/**
	 * Skip the rest of ramp-up, warm-up and hold and go straight to ramp-down.
	 */
	stop(): void {
		if (this.stopRequested) return;
		this.stopRequested = true;
		this.logger.warn("Stop requested, ramping down early");
		this.stopController.abort();
	}

	async start(plan: RampPlan): Promise<RampResult> {
		if (this.running) throw new Error("RampController.start() called twice");
		this.running = true;

		const sessions: ISession[] = [];
		const runs: Promise<SessionReport>[] = [];
		const reports: SessionReport[] = [];
		const tickIntervalMs = plan.progressIntervalMs ?? DEFAULT_PROGRESS_INTERVAL_MS;

		const deadlineMs = (plan.rampUpSec + plan.warmupSec + plan.holdSec + plan.rampDownSec + plan.graceSec) * 1000;
		const deadline = new AbortController();
		const deadlineTimer = setTimeout(() => {
			deadline.abort();
			this.stopController.abort();
		}, deadlineMs);
		const stopSignal = this.stopController.signal;

		const runStart = performance.now();
		const timing: PhaseTiming = { rampUpMs: 0, warmupMs: 0, holdMs: 0, rampDownMs: 0, drainMs: 0, totalMs: 0 };

		try {
			// Ramp up
			this.emit("phase", "ramp-up");
			this.logger.info(`Ramping up ${plan.clientCount} sessions over ${plan.rampUpSec}s (${calculatePacingRate(plan.clientCount, plan.rampUpSec)}/s)`);
			let phaseStart = performance.now();
			await runPaced({
				count: plan.clientCount,
				spreadMs: plan.rampUpSec * 1000,
				signal: stopSignal,
				onStart: (index) => {
					const session = this.createSession(index);
					sessions.push(session);
					runs.push(
						session.run().then((report) => {
							reports.push(report);
							this.emit("session-settled", report);
							return report;
						}),
					);
					this.emit("session-started", index);
				},
			});
			timing.rampUpMs = performance.now() - phaseStart;
			this.logger.info(`Ramp-up complete: ${sessions.length}/${plan.clientCount} sessions started in ${Math.round(timing.rampUpMs)}ms`);

			// Warm up
			if (plan.warmupSec > 0) {
				this.emit("phase", "warmup");
				phaseStart = performance.now();
				await this.waitWithTicks("warmup", plan.warmupSec * 1000, tickIntervalMs, stopSignal, sessions, reports);
				timing.warmupMs = performance.now() - phaseStart;
				if (!stopSignal.aborted) this.emit("measurement-start");
			}

			// Hold
			this.emit("phase", "hold");
			phaseStart = performance.now();
			await this.waitWithTicks("hold", plan.holdSec * 1000, tickIntervalMs, stopSignal, sessions, reports);
			timing.holdMs = performance.now() - phaseStart;

			// Ramp down
			this.emit("phase", "ramp-down");
			this.logger.info(`Ramping down ${sessions.length} sessions over ${plan.rampDownSec}s (${calculatePacingRate(sessions.length, plan.rampDownSec)}/s)`);
			phaseStart = performance.now();
			await runPaced({
				count: sessions.length,
				spreadMs: plan.rampDownSec * 1000,
				signal: deadline.signal,
				onStart: (index) => sessions[index]?.close(),
			});
			timing.rampDownMs = performance.now() - phaseStart;

			// Drain
			this.emit("phase", "drain");
			phaseStart = performance.now();
			await Promise.race([Promise.all(runs), whenAborted(deadline.signal)]);

			let forcedTerminations = 0;
			if (deadline.signal.aborted) {
				for (const session of sessions) {
					if (session.terminate()) forcedTerminations++;
				}
				if (forcedTerminations > 0) {
					this.logger.warn(`Terminated ${forcedTerminations} sessions still open at the deadline`);
				}
			}
			await Promise.all(runs);
			timing.drainMs = performance.now() - phaseStart;
			timing.totalMs = performance.now() - runStart;

			this.emit("phase", "done");
			return {
				attempted: sessions.length,
				completed: sessions.length - forcedTerminations,
				forcedTerminations,
				reports,
				timing,
				stopped: this.stopRequested,
			};
		} finally {
			clearTimeout(deadlineTimer);
		}
	}

	private async waitWithTicks(
		phase: RampPhase,
		durationMs: number,
		tickIntervalMs: number,
		signal: AbortSignal,
		sessions: readonly ISession[],
		reports: readonly SessionReport[],
	): Promise<void> {
		const phaseStart = performance.now();
		const phaseEnd = phaseStart + durationMs;

		while (!signal.aborted) {
			const remaining = phaseEnd - performance.now();
			if (remaining <= 0) break;
			await sleep(Math.min(tickIntervalMs, remaining), signal);
			if (signal.aborted || performance.now() >= phaseEnd) break;
			this.emit("tick", {
				phase,
				elapsedMs: performance.now() - phaseStart,
				started: sessions.length,
				settled: reports.length,
			});
		}
	}
}
