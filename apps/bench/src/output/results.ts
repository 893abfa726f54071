import type { LatencyStats as EngineLatencyStats, Summary } from "@filterbench/engine";
import type { BenchResults, LatencyStats } from "./types.js";

function round(value: number): number {
	return Math.round(value * 100) / 100;
}

function toLatencyStats(stats: EngineLatencyStats | null): LatencyStats | null {
	if (!stats) return null;
	return {
		count: stats.count,
		min: round(stats.min),
		max: round(stats.max),
		avg: round(stats.mean),
		p50: round(stats.p50),
		p95: round(stats.p95),
		p99: round(stats.p99),
	};
}

/**
 * Build the results file content from a run summary.
 */
export function buildBenchResults(summary: Summary, runId: string): BenchResults {
	const { metrics, config } = summary;

	return {
		runId,
		scenario: { id: summary.scenario.id, label: summary.scenario.label },
		timestamp: summary.startedAt,
		target: summary.url,
		protocol: summary.protocol,
		config: {
			host: config.host,
			port: config.port,
			channel: config.channel,
			clients: config.clientCount,
			rampUpSec: config.rampUpSec,
			warmupSec: config.warmupSec,
			holdSec: config.holdSec,
			rampDownSec: config.rampDownSec,
			graceSec: config.graceSec,
			clientIdOffset: config.clientIdOffset,
			poolSize: config.poolSize,
			updateIntervalMs: summary.scenario.updateIntervalMs,
		},
		completed: summary.completed,
		results: {
			sessions: {
				attempted: metrics.attemptedConnections,
				subscribed: metrics.subscribeSuccess,
				subscribeFailed: metrics.subscribeFailed,
				connectionErrors: metrics.connectionErrors,
				successRate: metrics.attemptedConnections > 0 ? round((metrics.subscribeSuccess / metrics.attemptedConnections) * 100) : 0,
			},
			messages: {
				received: metrics.messagesReceived,
				duringWarmup: metrics.messagesDuringWarmup,
			},
			updates: { ...metrics.updates },
			disconnects: metrics.disconnects,
			forcedTerminations: metrics.forcedTerminations,
			latency: {
				subscribe: toLatencyStats(metrics.latency.subscribe),
				update: toLatencyStats(metrics.latency.update),
				delivery: toLatencyStats(metrics.latency.delivery),
			},
			timing: summary.timing,
			failures: summary.failures,
			updateFailures: summary.updateFailures,
		},
	};
}
