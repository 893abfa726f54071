import chalk from "chalk";
import { type ErrorCode, type RunConfig, type Summary, summaryLines } from "@filterbench/engine";

const RULE = "════════════════════════════════════════════════════════════";

/**
 * Print a boxed title.
 */
export function printBanner(title: string, print: (line: string) => void = console.log): void {
	print(chalk.bold.blue(`╔${RULE}╗`));
	print(chalk.bold.blue(`║${title.padStart(30 + Math.ceil(title.length / 2)).padEnd(RULE.length)}║`));
	print(chalk.bold.blue(`╚${RULE}╝`));
}

/**
 * Print the configuration block shown before a run starts.
 */
export function printConfiguration(config: RunConfig, scenarioLabel: string, output?: string): void {
	console.log(chalk.bold("Configuration:"));
	console.log(`  Server:      ${chalk.dim(`${config.host}:${config.port}`)}`);
	console.log(`  Channel:     ${config.channel}`);
	console.log(`  Scenario:    ${chalk.cyan(`${config.scenarioId} - ${scenarioLabel}`)}`);
	console.log(`  Clients:     ${chalk.bold(config.clientCount)}`);
	console.log(`  Ramp-up:     ${config.rampUpSec}s`);
	if (config.warmupSec) console.log(`  Warm-up:     ${config.warmupSec}s`);
	console.log(`  Hold:        ${config.holdSec}s`);
	console.log(`  Ramp-down:   ${config.rampDownSec}s`);
	if (config.clientIdOffset) console.log(`  Id offset:   ${config.clientIdOffset}`);
	if (config.tokenFile) console.log(`  Token file:  ${chalk.dim(config.tokenFile)}`);
	if (output) console.log(`  Output:      ${chalk.dim(output)}`);
}

/**
 * Failure counts by error code, most frequent first.
 */
export function formatFailures(failures: Partial<Record<ErrorCode, number>>): string[] {
	return Object.entries(failures)
		.filter((entry): entry is [string, number] => typeof entry[1] === "number" && entry[1] > 0)
		.sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
		.map(([code, count]) => `  ${code}: ${count}`);
}

/**
 * Subscribe success rate with a traffic-light colour.
 */
export function formatSuccessRate(subscribed: number, attempted: number): string {
	const rate = attempted > 0 ? (subscribed / attempted) * 100 : 0;
	const color = rate >= 99 ? chalk.green : rate >= 95 ? chalk.yellow : chalk.red;
	return color(`${rate.toFixed(1)}%`);
}

/**
 * Print the summary of a finished run. The metric lines are printed
 * uncoloured so they can be extracted from captured output.
 */
export function printSummary(summary: Summary, print: (line: string) => void = console.log): void {
	const { metrics } = summary;

	print("");
	printBanner("BENCHMARK SUMMARY", print);
	print("");
	for (const line of summaryLines(metrics)) print(line);

	print("");
	print(`Success rate: ${formatSuccessRate(metrics.subscribeSuccess, metrics.attemptedConnections)} (${metrics.subscribeSuccess}/${metrics.attemptedConnections})`);
	const failures = formatFailures(summary.failures);
	if (failures.length > 0) {
		print(chalk.yellow("Failures by reason:"));
		for (const line of failures) print(line);
	}
	const updateFailures = formatFailures(summary.updateFailures);
	if (updateFailures.length > 0) {
		print(chalk.yellow("Update failures by reason:"));
		for (const line of updateFailures) print(line);
	}
	if (metrics.messagesDuringWarmup > 0) {
		print(chalk.dim(`Messages during warm-up (excluded): ${metrics.messagesDuringWarmup}`));
	}
	print(`Total time:  ${(summary.timing.totalMs / 1000).toFixed(1)}s`);
	if (!summary.completed) {
		print(chalk.yellow("Run was interrupted before the hold phase finished"));
	}
}
