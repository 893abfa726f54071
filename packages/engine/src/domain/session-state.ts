import type { BenchmarkError, ErrorCode } from "./errors.js";
import type { SubscriptionFilter } from "./filter.js";

export type CloseReason = "ramp-down" | "server" | "forced";

/**
 * Lifecycle of one session. Timestamps are `performance.now()` values.
 */
export type SessionState =
	| { kind: "connecting"; startedAt: number }
	| { kind: "authenticating"; connectedAt: number }
	| { kind: "subscribing"; filter: SubscriptionFilter; sentAt: number }
	| { kind: "active"; filter: SubscriptionFilter; subscribedAt: number; lastUpdateAt?: number }
	| { kind: "updating"; filter: SubscriptionFilter; pending: SubscriptionFilter; sentAt: number; subscribedAt: number }
	| { kind: "closing"; reason: CloseReason }
	| { kind: "closed"; reason: CloseReason }
	| { kind: "failed"; error: BenchmarkError };

export type SessionStateKind = SessionState["kind"];

/**
 * How a session was classified. Every session gets exactly one outcome.
 */
export type SessionOutcome = "connection-error" | "subscribed" | "subscribe-failed";

/**
 * What a session reports when its run settles.
 */
export interface SessionReport {
	id: number;
	outcome: SessionOutcome;
	final: SessionState;
	/** The error behind a `connection-error` or `subscribe-failed` outcome */
	error?: BenchmarkError;
	messagesReceived: number;
	updateAttempts: number;
	/** Failed filter updates by error code */
	updateFailures: Partial<Record<ErrorCode, number>>;
}
