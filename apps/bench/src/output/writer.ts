import * as fs from "node:fs";
import * as path from "node:path";
import chalk from "chalk";
import type { BenchResults } from "./types.js";

function ensureDir(filePath: string): void {
	const dir = path.dirname(filePath);
	if (dir && !fs.existsSync(dir)) {
		fs.mkdirSync(dir, { recursive: true });
	}
}

/**
 * Write run results to a JSON file.
 */
export function writeResults(outputPath: string, results: BenchResults): void {
	ensureDir(outputPath);
	fs.writeFileSync(outputPath, JSON.stringify(results, null, 2));
	console.log(`${chalk.cyan("[bench]")} Results written to ${outputPath}`);
}

/**
 * Write a text file (run log, suite summary), creating its directory.
 */
export function writeTextFile(filePath: string, lines: readonly string[]): void {
	ensureDir(filePath);
	fs.writeFileSync(filePath, `${lines.join("\n")}\n`);
}
