#!/usr/bin/env tsx
import chalk from "chalk";
import { Command, Option } from "commander";
import { v4 as uuidv4 } from "uuid";
import { createConsoleLogger, getScenario, isScenarioId } from "@filterbench/engine";
import { printBanner, printConfiguration, printSummary } from "../output/formatter.js";
import { buildBenchResults } from "../output/results.js";
import { writeResults } from "../output/writer.js";
import { describeError, executeRun, exitCodeFor } from "./execute.js";
import { addConnectionOptions, addScheduleOptions, parseRunOptions, type RunCliOptions } from "./options.js";

const program = new Command();

program
	.name("filterbench-run")
	.description("Run one subscription-filter benchmark scenario against a WebSocket server")
	.version("0.1.0")
	.addOption(new Option("--scenario <id>", "Scenario: 1 (eq), 2 (filter updates), 3 (IN 10), 4 (IN 100), 5 (IN 500)").env("SCENARIO").default("1"))
	.addOption(new Option("--num-clients <number>", "Number of concurrent clients").env("NUM_CLIENTS").default("1000"))
	.option("--output <path>", "Path to write JSON results");
addConnectionOptions(program);
addScheduleOptions(program);

program.action(async (cli: RunCliOptions) => {
	const config = parseRunOptions(cli);
	const logger = createConsoleLogger({ prefix: "[bench]", verbose: cli.verbose });

	printBanner("WEBSOCKET FILTER BENCHMARK");
	console.log("");
	printConfiguration(config, isScenarioId(config.scenarioId) ? getScenario(config.scenarioId).label : "unknown", cli.output);
	console.log("");

	try {
		const summary = await executeRun(config, logger);
		printSummary(summary);

		if (cli.output) {
			console.log("");
			writeResults(cli.output, buildBenchResults(summary, uuidv4()));
		}

		console.log("");
		console.log(chalk.green("✓ Done"));
		process.exit(0);
	} catch (error) {
		logger.error(describeError(error));
		process.exit(exitCodeFor(error));
	}
});

await program.parseAsync(process.argv);
