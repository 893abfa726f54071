import type { IMetricsSink, LatencyKind, LiveStats, MetricsSnapshot } from "../domain/metrics.js";
import { calculateLatencyStats } from "./stats.js";

/**
 * Counters and latency samples for one benchmark run.
 *
 * Every session writes through the IMetricsSink methods; all of them are
 * commutative (counter increments and appends to an unordered sample set),
 * so the arrival order across sessions does not matter.
 *
 * Create one aggregator per run. After `seal()` further writes are ignored,
 * which keeps late socket events from changing a snapshot already taken.
 */
export class MetricsAggregator implements IMetricsSink {
	private attemptedConnections = 0;
	private connectionErrors = 0;
	private subscribeSuccess = 0;
	private subscribeFailed = 0;
	private messagesReceived = 0;
	private messagesDuringWarmup = 0;
	private updateAttempts = 0;
	private updateSuccesses = 0;
	private updateFailures = 0;
	private disconnects = 0;
	private forcedTerminations = 0;
	private active = 0;
	private measuring: boolean;
	private sealed = false;
	private readonly samples: Record<LatencyKind, number[]> = {
		subscribe: [],
		update: [],
		delivery: [],
	};

	/**
	 * @param options.measuring - Whether the measurement window is open from the start.
	 *   Runs with a warm-up phase start closed and call `beginMeasurement()` later.
	 */
	constructor(options: { measuring?: boolean } = {}) {
		this.measuring = options.measuring ?? true;
	}

	recordConnectionAttempt(): void {
		if (this.sealed) return;
		this.attemptedConnections++;
	}

	recordConnectionError(): void {
		if (this.sealed) return;
		this.connectionErrors++;
	}

	recordSubscribeSuccess(): void {
		if (this.sealed) return;
		this.subscribeSuccess++;
	}

	recordSubscribeFailure(): void {
		if (this.sealed) return;
		this.subscribeFailed++;
	}

	recordMessageReceived(): void {
		if (this.sealed) return;
		if (this.measuring) {
			this.messagesReceived++;
		} else {
			this.messagesDuringWarmup++;
		}
	}

	recordLatency(kind: LatencyKind, latencyMs: number): void {
		if (this.sealed || !Number.isFinite(latencyMs) || latencyMs < 0) return;
		// Subscribe latency is a one-off per session, so it is kept even during warm-up
		if (kind !== "subscribe" && !this.measuring) return;
		this.samples[kind].push(latencyMs);
	}

	recordUpdateAttempt(): void {
		if (this.sealed) return;
		this.updateAttempts++;
	}

	recordUpdateSuccess(): void {
		if (this.sealed) return;
		this.updateSuccesses++;
	}

	recordUpdateFailure(): void {
		if (this.sealed) return;
		this.updateFailures++;
	}

	recordDisconnect(): void {
		if (this.sealed) return;
		this.disconnects++;
	}

	recordForcedTermination(): void {
		if (this.sealed) return;
		this.forcedTerminations++;
	}

	sessionOpened(): void {
		this.active++;
	}

	sessionClosed(): void {
		if (this.active > 0) this.active--;
	}

	/**
	 * Open the measurement window (end of warm-up).
	 */
	beginMeasurement(): void {
		this.measuring = true;
	}

	isMeasuring(): boolean {
		return this.measuring;
	}

	/**
	 * Stop accepting writes. Called once every session is terminal.
	 */
	seal(): void {
		this.sealed = true;
	}

	isSealed(): boolean {
		return this.sealed;
	}

	/**
	 * Counters for progress display while the run is in flight.
	 */
	live(): LiveStats {
		return {
			attempted: this.attemptedConnections,
			active: this.active,
			subscribeSuccess: this.subscribeSuccess,
			subscribeFailed: this.subscribeFailed,
			connectionErrors: this.connectionErrors,
			messagesReceived: this.messagesReceived + this.messagesDuringWarmup,
		};
	}

	snapshot(): MetricsSnapshot {
		return {
			attemptedConnections: this.attemptedConnections,
			subscribeSuccess: this.subscribeSuccess,
			subscribeFailed: this.subscribeFailed,
			connectionErrors: this.connectionErrors,
			messagesReceived: this.messagesReceived,
			messagesDuringWarmup: this.messagesDuringWarmup,
			updates: {
				attempted: this.updateAttempts,
				successful: this.updateSuccesses,
				failed: this.updateFailures,
			},
			disconnects: this.disconnects,
			forcedTerminations: this.forcedTerminations,
			latency: {
				subscribe: calculateLatencyStats(this.samples.subscribe),
				update: calculateLatencyStats(this.samples.update),
				delivery: calculateLatencyStats(this.samples.delivery),
			},
		};
	}
}
