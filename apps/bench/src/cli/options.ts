import { type Command, Option } from "commander";
import type { RunConfig } from "@filterbench/engine";

/**
 * Raw option values as commander hands them over. Numbers stay strings
 * until `toRunConfig`; the engine validates the parsed values.
 */
export interface ConnectionCliOptions {
	wsHost: string;
	wsPort: string;
	appKey: string;
	channel: string;
	tokenFile: string;
	filterUpdateInterval: string;
	clientIdOffset: string;
	verbose?: boolean;
}

export interface ScheduleCliOptions {
	rampDuration: string;
	holdDuration: string;
	rampDownDuration: string;
	warmupDuration: string;
	gracePeriod: string;
}

export interface RunCliOptions extends ConnectionCliOptions, ScheduleCliOptions {
	scenario: string;
	numClients: string;
	output?: string;
}

export interface SuiteCliOptions extends ConnectionCliOptions, ScheduleCliOptions {
	scenarios: string;
	clients: string;
	cooldown: string;
	resultsDir?: string;
}

/**
 * Server and subscription options. Every option falls back to an
 * environment variable.
 */
export function addConnectionOptions(command: Command): Command {
	return command
		.addOption(new Option("--ws-host <host>", "WebSocket server host").env("WS_HOST").default("localhost"))
		.addOption(new Option("--ws-port <port>", "WebSocket server port (443 uses wss)").env("WS_PORT").default("443"))
		.addOption(new Option("--app-key <key>", "Application key").env("APP_KEY").default(""))
		.addOption(new Option("--channel <name>", "Channel to subscribe to").env("CHANNEL").default(""))
		.addOption(new Option("--token-file <path>", "JSON array of token addresses").env("TOKEN_FILE").default("token-addresses.json"))
		.addOption(new Option("--filter-update-interval <ms>", "Filter update interval for scenario 2").env("FILTER_UPDATE_INTERVAL").default("5000"))
		.addOption(new Option("--client-id-offset <n>", "Offset added to client ids (for runs split across machines)").env("CLIENT_ID_OFFSET").default("0"))
		.option("--verbose", "Log per-session events");
}

/**
 * Phase durations, in seconds.
 */
export function addScheduleOptions(command: Command): Command {
	return command
		.addOption(new Option("--ramp-duration <seconds>", "Seconds to ramp up to the full client count").env("RAMP_DURATION").default("30"))
		.addOption(new Option("--hold-duration <seconds>", "Seconds to hold all clients").env("HOLD_DURATION").default("60"))
		.addOption(new Option("--ramp-down-duration <seconds>", "Seconds to spread disconnects over").env("RAMP_DOWN_DURATION").default("10"))
		.addOption(new Option("--warmup-duration <seconds>", "Seconds after ramp-up before measuring").env("WARMUP_DURATION").default("0"))
		.addOption(new Option("--grace-period <seconds>", "Seconds to wait for closes before terminating").env("GRACE_PERIOD").default("10"));
}

/**
 * Build the engine configuration for one scenario and client count.
 */
export function toRunConfig(cli: ConnectionCliOptions & ScheduleCliOptions, scenarioId: number, clientCount: number): RunConfig {
	return {
		host: cli.wsHost,
		port: Number.parseInt(cli.wsPort, 10),
		appKey: cli.appKey,
		channel: cli.channel,
		scenarioId,
		clientCount,
		rampUpSec: Number.parseFloat(cli.rampDuration),
		holdSec: Number.parseFloat(cli.holdDuration),
		rampDownSec: Number.parseFloat(cli.rampDownDuration),
		warmupSec: Number.parseFloat(cli.warmupDuration),
		graceSec: Number.parseFloat(cli.gracePeriod),
		clientIdOffset: Number.parseInt(cli.clientIdOffset, 10),
		tokenFile: cli.tokenFile || undefined,
		filterUpdateIntervalMs: Number.parseFloat(cli.filterUpdateInterval),
	};
}

export function parseRunOptions(cli: RunCliOptions): RunConfig {
	return toRunConfig(cli, Number.parseInt(cli.scenario, 10), Number.parseInt(cli.numClients, 10));
}

/**
 * Parse a comma-separated list of integers, e.g. "1,2,5".
 * @throws Error on empty lists or non-integer entries
 */
export function parseIntegerList(value: string, name: string): number[] {
	const entries = value
		.split(",")
		.map((entry) => entry.trim())
		.filter((entry) => entry !== "");
	if (entries.length === 0) throw new Error(`${name} must not be empty`);

	return entries.map((entry) => {
		if (!/^\d+$/.test(entry)) throw new Error(`Invalid ${name} entry: ${entry}`);
		return Number.parseInt(entry, 10);
	});
}
