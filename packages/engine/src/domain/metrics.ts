export type LatencyKind = "subscribe" | "update" | "delivery";

/**
 * Write side of the per-run metrics, as seen by a session.
 * Sessions never read other sessions' counters.
 */
export interface IMetricsSink {
	recordConnectionAttempt(): void;
	recordConnectionError(): void;
	recordSubscribeSuccess(): void;
	recordSubscribeFailure(): void;
	recordMessageReceived(): void;
	recordLatency(kind: LatencyKind, latencyMs: number): void;
	recordUpdateAttempt(): void;
	recordUpdateSuccess(): void;
	recordUpdateFailure(): void;
	/** Socket dropped by the server after the session was subscribed */
	recordDisconnect(): void;
	/** Session still open at the run deadline */
	recordForcedTermination(): void;
	sessionOpened(): void;
	sessionClosed(): void;
}

/**
 * Latency statistics in milliseconds.
 */
export interface LatencyStats {
	count: number;
	min: number;
	max: number;
	mean: number;
	p50: number;
	p95: number;
	p99: number;
}

/**
 * Counters readable while the run is in progress.
 */
export interface LiveStats {
	attempted: number;
	active: number;
	subscribeSuccess: number;
	subscribeFailed: number;
	connectionErrors: number;
	messagesReceived: number;
}

/**
 * Final metrics of one run.
 */
export interface MetricsSnapshot {
	attemptedConnections: number;
	subscribeSuccess: number;
	subscribeFailed: number;
	connectionErrors: number;
	messagesReceived: number;
	/** Messages that arrived before the measurement window opened */
	messagesDuringWarmup: number;
	updates: {
		attempted: number;
		successful: number;
		failed: number;
	};
	disconnects: number;
	forcedTerminations: number;
	latency: Record<LatencyKind, LatencyStats | null>;
}
