import EventEmitter from "eventemitter3";
import { type BenchmarkError, ConnectionError, ErrorCode, SubscribeFailure, UpdateFailure } from "../domain/errors.js";
import type { ILogger } from "../domain/logger.js";
import type { IMetricsSink } from "../domain/metrics.js";
import type { Scenario } from "../domain/scenario.js";
import type { ISession } from "../domain/session.js";
import type { SessionOutcome, SessionReport, SessionState } from "../domain/session-state.js";
import type { InboundFrame, IWireProtocol } from "../domain/wire-protocol.js";
import type { FilterGenerator } from "../filter/filter-generator.js";
import { connectWebSocket, type SessionSocket, type SocketFactory } from "./socket.js";

/** Bound on the wait for a subscribe or update acknowledgment. */
export const DEFAULT_ACK_TIMEOUT_MS = 10_000;
/** Bound on the WebSocket opening handshake. */
export const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;
/** Delivery latencies at or above this are treated as clock skew and dropped. */
const MAX_DELIVERY_LATENCY_MS = 60_000;
const NORMAL_CLOSURE = 1000;

export interface SessionClientOptions {
	id: number;
	url: string;
	channel: string;
	scenario: Scenario;
	filters: FilterGenerator;
	protocol: IWireProtocol;
	metrics: IMetricsSink;
	logger: ILogger;
	ackTimeoutMs?: number;
	connectTimeoutMs?: number;
	/** Opens the socket. Defaults to a `ws` client. */
	connect?: SocketFactory;
}

export interface SessionClientEvents {
	state: (state: SessionState, previous: SessionState) => void;
}

/**
 * One simulated client: a WebSocket connection driven through
 * connect → authenticate → subscribe → active (⇄ updating) → close.
 *
 * Each session owns its socket and timers. The only thing it shares is the
 * metrics sink, and every session is classified exactly once as a
 * connection error, a subscribe success or a subscribe failure.
 * Nothing is retried.
 */
export class SessionClient extends EventEmitter<SessionClientEvents> implements ISession {
	readonly id: number;
	private readonly url: string;
	private readonly channel: string;
	private readonly scenario: Scenario;
	private readonly filters: FilterGenerator;
	private readonly protocol: IWireProtocol;
	private readonly metrics: IMetricsSink;
	private readonly logger: ILogger;
	private readonly ackTimeoutMs: number;
	private readonly connectTimeoutMs: number;
	private readonly connect: SocketFactory;

	private state: SessionState;
	private socket: SessionSocket | null = null;
	private outcome: SessionOutcome | null = null;
	/** The error that classified the session, when it was not a success */
	private failure: BenchmarkError | null = null;
	private readonly updateFailures: Partial<Record<ErrorCode, number>> = {};
	/** Whether the pending update request has been written to the socket */
	private updateSent = false;
	private opened = false;
	private countedOpen = false;
	private closeRequested = false;
	private finished = false;
	private lastError: Error | null = null;
	private ackTimer: NodeJS.Timeout | null = null;
	private updateTimer: NodeJS.Timeout | null = null;
	private updateAckTimer: NodeJS.Timeout | null = null;
	private messagesReceived = 0;
	private updateAttempts = 0;
	private runPromise: Promise<SessionReport> | null = null;
	private settle: ((report: SessionReport) => void) | null = null;

	constructor(options: SessionClientOptions) {
		super();
		this.id = options.id;
		this.url = options.url;
		this.channel = options.channel;
		this.scenario = options.scenario;
		this.filters = options.filters;
		this.protocol = options.protocol;
		this.metrics = options.metrics;
		this.logger = options.logger;
		this.ackTimeoutMs = options.ackTimeoutMs ?? DEFAULT_ACK_TIMEOUT_MS;
		this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
		this.connect = options.connect ?? connectWebSocket;
		this.state = { kind: "connecting", startedAt: performance.now() };
	}

	getState(): SessionState {
		return this.state;
	}

	/**
	 * Open the connection and drive the protocol. Resolves once the session
	 * is terminal; calling it again returns the same promise.
	 */
	run(): Promise<SessionReport> {
		if (this.runPromise) return this.runPromise;

		this.runPromise = new Promise<SessionReport>((resolve) => {
			this.settle = resolve;
		});
		this.metrics.recordConnectionAttempt();
		this.transition({ kind: "connecting", startedAt: performance.now() });

		if (this.closeRequested) {
			this.failConnection(new ConnectionError(ErrorCode.CONNECTION_ABORTED, "Closed before connecting"));
			this.finish();
			return this.runPromise;
		}

		this.logger.debug(`Session ${this.id} connecting to ${this.url}`);
		try {
			this.socket = this.connect(
				this.url,
				{ handshakeTimeoutMs: this.connectTimeoutMs },
				{
					open: () => this.handleOpen(),
					message: (text) => this.handleMessage(text),
					error: (error) => this.handleError(error),
					close: (code, reason) => this.handleClose(code, reason),
				},
			);
		} catch (error) {
			this.failConnection(new ConnectionError(ErrorCode.CONNECTION_REFUSED, error instanceof Error ? error.message : String(error)));
			this.finish();
		}

		return this.runPromise;
	}

	/**
	 * Cancel the session. A pending subscribe wait is downgraded to
	 * immediate closure (one `SUBSCRIBE_CANCELLED` failure); a pending
	 * update counts as an `UPDATE_CANCELLED` update failure.
	 */
	close(): void {
		this.closeRequested = true;
		const state = this.state;

		switch (state.kind) {
			case "connecting":
				// Aborting the handshake surfaces as a close before open: a connection error
				this.socket?.terminate();
				return;
			case "authenticating":
			case "subscribing":
				this.clearTimers();
				this.classify("subscribe-failed", new SubscribeFailure(ErrorCode.SUBSCRIBE_CANCELLED, `Closed while ${state.kind}`));
				this.logger.debug(`Session ${this.id} cancelled while waiting for subscribe ack`);
				break;
			case "updating":
				this.clearTimers();
				this.recordUpdateFailure(new UpdateFailure(ErrorCode.UPDATE_CANCELLED, "Closed while waiting for update ack"));
				break;
			case "active":
				this.clearTimers();
				break;
			default:
				return;
		}

		this.transition({ kind: "closing", reason: "ramp-down" });
		this.socket?.close(NORMAL_CLOSURE, "ramp-down");
	}

	/**
	 * Forced termination at the run deadline. Records the termination,
	 * classifies the session if it had no outcome yet, and settles `run()`.
	 */
	terminate(): boolean {
		if (this.finished) return false;

		this.metrics.recordForcedTermination();
		this.clearTimers();
		if (this.outcome === null) {
			if (this.opened) {
				this.classify("subscribe-failed", new SubscribeFailure(ErrorCode.SUBSCRIBE_CANCELLED, "Terminated at the run deadline before subscribe ack"));
			} else {
				this.classify("connection-error", new ConnectionError(ErrorCode.CONNECTION_ABORTED, "Terminated at the run deadline while connecting"));
			}
		}
		if (this.state.kind === "updating") {
			this.recordUpdateFailure(new UpdateFailure(ErrorCode.UPDATE_CANCELLED, "Terminated at the run deadline while waiting for update ack"));
		}
		if (this.state.kind !== "failed") {
			this.transition({ kind: "closed", reason: "forced" });
		}
		this.countClosed();
		this.finish();
		this.socket?.terminate();
		return true;
	}

	private handleOpen(): void {
		this.opened = true;
		this.countedOpen = true;
		this.metrics.sessionOpened();
		this.transition({ kind: "authenticating", connectedAt: performance.now() });
		// Authentication has no separate bound: one timer covers it and the subscribe ack
		this.ackTimer = setTimeout(() => this.handleAckTimeout(), this.ackTimeoutMs);
	}

	private handleMessage(text: string): void {
		const frame = this.protocol.decode(text);

		switch (frame.type) {
			case "ping":
				this.send(frame.reply);
				return;
			case "connection-established":
				if (this.state.kind === "authenticating") this.sendSubscribe();
				return;
			case "subscribe-ack":
				if (frame.channel === undefined || frame.channel === this.channel) this.handleAck();
				return;
			case "subscribe-error":
				if (frame.channel === undefined || frame.channel === this.channel) {
					this.handleRejection(frame.message);
				} else {
					this.logger.debug(`Session ${this.id} ignoring error for channel ${frame.channel}: ${frame.message}`);
				}
				return;
			case "data":
				this.handleData(frame);
				return;
			case "unknown":
				return;
		}
	}

	private handleError(error: Error): void {
		this.lastError = error;
		this.logger.debug(`Session ${this.id} socket error: ${error.message}`);
	}

	private handleClose(code: number, reason: string): void {
		this.clearTimers();
		this.countClosed();
		if (this.finished) return;

		const state = this.state;
		if (!this.opened) {
			const message = this.lastError?.message ?? `Closed during handshake (code ${code})`;
			const errorCode = this.closeRequested ? ErrorCode.CONNECTION_ABORTED : /timeout/i.test(message) ? ErrorCode.CONNECTION_TIMEOUT : ErrorCode.CONNECTION_REFUSED;
			this.failConnection(new ConnectionError(errorCode, message));
		} else {
			switch (state.kind) {
				case "authenticating":
				case "subscribing":
					this.failSubscribe(new SubscribeFailure(ErrorCode.CONNECTION_CLOSED, `Connection closed before subscribe ack (code ${code}${reason ? `: ${reason}` : ""})`));
					break;
				case "updating":
				case "active":
					if (state.kind === "updating") {
						this.recordUpdateFailure(new UpdateFailure(ErrorCode.UPDATE_CANCELLED, `Connection closed before update ack (code ${code})`));
					}
					this.metrics.recordDisconnect();
					this.logger.debug(`Session ${this.id} disconnected by server (code ${code})`);
					this.transition({ kind: "closed", reason: "server" });
					break;
				case "closing":
					this.transition({ kind: "closed", reason: state.reason });
					break;
				default:
					break;
			}
		}

		this.finish();
	}

	private sendSubscribe(): void {
		const filter = this.filters.next(this.scenario.filter);
		const sentAt = performance.now();
		this.transition({ kind: "subscribing", filter, sentAt });
		this.send(this.protocol.encodeSubscribe({ channel: this.channel, filter }));
	}

	private handleAck(): void {
		const state = this.state;
		const now = performance.now();

		if (state.kind === "subscribing") {
			this.clearAckTimer();
			this.metrics.recordLatency("subscribe", now - state.sentAt);
			this.classify("subscribed");
			this.transition({ kind: "active", filter: state.filter, subscribedAt: now });
			this.logger.debug(`Session ${this.id} subscribed in ${(now - state.sentAt).toFixed(1)}ms`);
			this.startUpdates();
		} else if (state.kind === "updating") {
			// The protocol does not correlate acks with requests, so an ack read
			// before the update was even written belongs to an earlier request
			if (!this.updateSent) {
				this.logger.debug(`Session ${this.id} ignoring ack received before its update was sent`);
				return;
			}
			this.clearUpdateAckTimer();
			this.metrics.recordLatency("update", now - state.sentAt);
			this.metrics.recordUpdateSuccess();
			this.transition({ kind: "active", filter: state.pending, subscribedAt: state.subscribedAt, lastUpdateAt: now });
		}
		// Any other state: a duplicate or late ack, already accounted for
	}

	private handleRejection(message: string): void {
		const state = this.state;
		if (state.kind === "authenticating" || state.kind === "subscribing") {
			this.failSubscribe(new SubscribeFailure(ErrorCode.SUBSCRIBE_REJECTED, message));
		} else if (state.kind === "updating") {
			this.failUpdate(new UpdateFailure(ErrorCode.UPDATE_REJECTED, message));
		} else {
			this.logger.debug(`Session ${this.id} server error in state ${state.kind}: ${message}`);
		}
	}

	private handleAckTimeout(): void {
		this.ackTimer = null;
		const kind = this.state.kind;
		if (kind === "authenticating" || kind === "subscribing") {
			this.failSubscribe(new SubscribeFailure(ErrorCode.SUBSCRIBE_TIMEOUT, `No subscribe ack within ${this.ackTimeoutMs}ms (${kind})`));
		}
	}

	private handleData(frame: Extract<InboundFrame, { type: "data" }>): void {
		// Frames still in flight after closing began are counted too
		if (this.outcome !== "subscribed" || frame.channel !== this.channel) return;

		this.messagesReceived++;
		this.metrics.recordMessageReceived();
		if (this.messagesReceived === 1) {
			this.logger.debug(`Session ${this.id} first message: ${frame.event}`);
		}

		if (frame.publishedAtMs !== undefined) {
			const latency = Date.now() - frame.publishedAtMs;
			if (latency >= 0 && latency < MAX_DELIVERY_LATENCY_MS) {
				this.metrics.recordLatency("delivery", latency);
			}
		}
	}

	private startUpdates(): void {
		const intervalMs = this.scenario.updateIntervalMs;
		if (intervalMs === undefined || intervalMs <= 0) return;
		this.updateTimer = setInterval(() => this.sendUpdate(intervalMs), intervalMs);
	}

	private sendUpdate(intervalMs: number): void {
		const state = this.state;
		// Skip the tick while a previous update is still pending, or once closing
		if (state.kind !== "active") return;

		const pending = this.filters.next(this.scenario.filter);
		const sentAt = performance.now();
		this.updateAttempts++;
		this.metrics.recordUpdateAttempt();
		this.transition({ kind: "updating", filter: state.filter, pending, sentAt, subscribedAt: state.subscribedAt });
		this.updateSent = false;
		this.send(this.protocol.encodeSubscribe({ channel: this.channel, filter: pending }), () => {
			this.updateSent = true;
		});

		const timeoutMs = Math.min(this.ackTimeoutMs, intervalMs);
		this.updateAckTimer = setTimeout(() => {
			this.updateAckTimer = null;
			if (this.state.kind === "updating") {
				this.failUpdate(new UpdateFailure(ErrorCode.UPDATE_TIMEOUT, `No update ack within ${timeoutMs}ms`));
			}
		}, timeoutMs);
	}

	private failSubscribe(error: SubscribeFailure): void {
		this.clearTimers();
		this.classify("subscribe-failed", error);
		this.transition({ kind: "failed", error });
		this.logger.debug(`Session ${this.id} subscribe failed: ${error.message}`);
		if (this.socket?.isOpen) {
			this.socket.close(NORMAL_CLOSURE, "subscribe failed");
		}
	}

	private failUpdate(error: UpdateFailure): void {
		this.clearUpdateAckTimer();
		this.recordUpdateFailure(error);
		const state = this.state;
		if (state.kind === "updating") {
			// A failed update keeps the session alive on its previous filter
			this.transition({ kind: "active", filter: state.filter, subscribedAt: state.subscribedAt });
		}
		this.logger.debug(`Session ${this.id} update failed: ${error.message}`);
	}

	private failConnection(error: ConnectionError): void {
		this.classify("connection-error", error);
		this.transition({ kind: "failed", error });
		this.logger.debug(`Session ${this.id} failed to connect: ${error.message}`);
	}

	/**
	 * Record the session's single outcome, with the error behind it for the
	 * failure outcomes. Later calls are ignored.
	 */
	private classify(outcome: "subscribed"): void;
	private classify(outcome: "connection-error" | "subscribe-failed", error: BenchmarkError): void;
	private classify(outcome: SessionOutcome, error?: BenchmarkError): void {
		if (this.outcome !== null) return;
		this.outcome = outcome;
		this.failure = error ?? null;
		switch (outcome) {
			case "connection-error":
				this.metrics.recordConnectionError();
				break;
			case "subscribed":
				this.metrics.recordSubscribeSuccess();
				break;
			case "subscribe-failed":
				this.metrics.recordSubscribeFailure();
				break;
		}
	}

	private finish(): void {
		if (this.finished) return;
		this.finished = true;
		if (this.outcome === null) {
			if (this.opened) {
				this.classify("subscribe-failed", new SubscribeFailure(ErrorCode.CONNECTION_CLOSED, "Session ended before subscribe ack"));
			} else {
				this.classify("connection-error", new ConnectionError(ErrorCode.CONNECTION_CLOSED, "Session ended while connecting"));
			}
		}

		this.settle?.({
			id: this.id,
			outcome: this.outcome ?? "connection-error",
			final: this.state,
			error: this.failure ?? undefined,
			messagesReceived: this.messagesReceived,
			updateAttempts: this.updateAttempts,
			updateFailures: { ...this.updateFailures },
		});
	}

	private recordUpdateFailure(error: UpdateFailure): void {
		this.metrics.recordUpdateFailure();
		this.updateFailures[error.code] = (this.updateFailures[error.code] ?? 0) + 1;
	}

	private countClosed(): void {
		if (!this.countedOpen) return;
		this.countedOpen = false;
		this.metrics.sessionClosed();
	}

	private transition(next: SessionState): void {
		const previous = this.state;
		this.state = next;
		this.emit("state", next, previous);
	}

	private send(data: string, onSent?: () => void): void {
		if (!this.socket?.isOpen) return;
		this.socket.send(data, (error) => {
			if (error) {
				this.logger.debug(`Session ${this.id} send failed: ${error.message}`);
				return;
			}
			onSent?.();
		});
	}

	private clearAckTimer(): void {
		if (this.ackTimer) {
			clearTimeout(this.ackTimer);
			this.ackTimer = null;
		}
	}

	private clearUpdateAckTimer(): void {
		if (this.updateAckTimer) {
			clearTimeout(this.updateAckTimer);
			this.updateAckTimer = null;
		}
	}

	private clearTimers(): void {
		this.clearAckTimer();
		this.clearUpdateAckTimer();
		if (this.updateTimer) {
			clearInterval(this.updateTimer);
			this.updateTimer = null;
		}
	}
}
