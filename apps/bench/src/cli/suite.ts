#!/usr/bin/env tsx
import * as path from "node:path";
import chalk from "chalk";
import { Command } from "commander";
import { createConsoleLogger, FatalConfigurationError, getScenario, sleep } from "@filterbench/engine";
import { printBanner, printSummary } from "../output/formatter.js";
import { buildSuiteSummary, resultsDirName, runLogName, type SuiteLog } from "../output/suite-summary.js";
import { writeTextFile } from "../output/writer.js";
import { RunLog } from "../utils/run-log.js";
import { describeError, EXIT_FAILURE, EXIT_FATAL_CONFIG, executeRun } from "./execute.js";
import { addConnectionOptions, addScheduleOptions, parseIntegerList, type SuiteCliOptions, toRunConfig } from "./options.js";

interface SuiteRun {
	scenarioId: number;
	clientCount: number;
}

const program = new Command();

program
	.name("filterbench-suite")
	.description("Run every scenario for every client count, writing one log per run and a summary")
	.version("0.1.0")
	.option("--scenarios <ids>", "Comma-separated scenario ids", "1,2,3,4,5")
	.option("--clients <counts>", "Comma-separated client counts", "1000,5000,10000")
	.option("--cooldown <seconds>", "Pause between runs", "5")
	.option("--results-dir <path>", "Directory for logs and summary.txt (default: benchmark_results_<timestamp>)");
addConnectionOptions(program);
addScheduleOptions(program);

program.action(async (cli: SuiteCliOptions) => {
	const logger = createConsoleLogger({ prefix: "[suite]", verbose: cli.verbose });

	let runs: SuiteRun[];
	try {
		const scenarios = parseIntegerList(cli.scenarios, "scenarios");
		const clients = parseIntegerList(cli.clients, "clients");
		// Fail fast on unknown ids rather than after earlier runs have finished
		for (const id of scenarios) getScenario(id);
		runs = scenarios.flatMap((scenarioId) => clients.map((clientCount) => ({ scenarioId, clientCount })));
	} catch (error) {
		logger.error(describeError(error));
		process.exit(EXIT_FATAL_CONFIG);
	}

	const startedAt = new Date();
	const resultsDir = cli.resultsDir ?? resultsDirName(startedAt);
	const cooldownMs = Math.max(0, Number.parseFloat(cli.cooldown) || 0) * 1000;
	const first = toRunConfig(cli, 1, 1);
	const target = `${first.host}:${first.port}`;

	printBanner("WEBSOCKET FILTER BENCHMARK SUITE");
	console.log("");
	console.log(`Results will be saved to: ${chalk.dim(resultsDir)}`);
	console.log(`  Server:    ${target}`);
	console.log(`  Channel:   ${first.channel}`);
	console.log(`  Runs:      ${runs.length}`);
	console.log("");

	const logs: SuiteLog[] = [];
	let failedRuns = 0;

	for (const [index, run] of runs.entries()) {
		const name = runLogName(run.scenarioId, run.clientCount);
		const log = new RunLog(createConsoleLogger({ prefix: `[scenario ${run.scenarioId} / ${run.clientCount}]`, verbose: cli.verbose }));
		console.log(chalk.blue("────────────────────────────────────────────────────────────"));
		console.log(chalk.yellow(`Running: Scenario ${run.scenarioId} - ${getScenario(run.scenarioId).label}`));
		console.log(chalk.yellow(`Clients: ${run.clientCount}`));
		console.log(chalk.blue("────────────────────────────────────────────────────────────"));

		let fatal = false;
		try {
			const summary = await executeRun(toRunConfig(cli, run.scenarioId, run.clientCount), log);
			printSummary(summary, (line) => log.write(line));
			console.log(chalk.green(`✓ Scenario ${run.scenarioId} with ${run.clientCount} clients completed`));
		} catch (error) {
			log.error(describeError(error));
			// Connection settings are shared by every run, so a configuration error repeats
			fatal = error instanceof FatalConfigurationError;
			failedRuns++;
			console.log(chalk.red(`✗ Scenario ${run.scenarioId} with ${run.clientCount} clients failed`));
		}

		writeTextFile(path.join(resultsDir, name), log.lines);
		logs.push({ name, content: log.lines.join("\n") });
		if (fatal) process.exit(EXIT_FATAL_CONFIG);
		console.log("");

		if (index < runs.length - 1 && cooldownMs > 0) await sleep(cooldownMs);
	}

	const summaryPath = path.join(resultsDir, "summary.txt");
	writeTextFile(
		summaryPath,
		buildSuiteSummary(
			{ date: startedAt, target, channel: first.channel, rampUpSec: first.rampUpSec, holdSec: first.holdSec, rampDownSec: first.rampDownSec },
			logs,
		),
	);

	printBanner("BENCHMARK SUITE COMPLETE");
	console.log(`${chalk.green("✓")} Summary generated: ${summaryPath}`);
	for (const log of logs) console.log(`  - ${log.name}`);
	process.exit(failedRuns > 0 ? EXIT_FAILURE : 0);
});

await program.parseAsync(process.argv);
