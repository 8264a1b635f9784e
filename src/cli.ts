#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import { isCompilerError } from "./errors";
import { runMetric } from "./metric";

export interface CliIo {
	out: (line: string) => void;
	err: (line: string) => void;
	readFile: (file: string) => string;
	/** File names of the bundled example programs, for the usage text. */
	listExamples: () => string[];
	/** Wrap error lines in red. */
	color: boolean;
}

// src/ under ts-jest, dist/src/ once compiled
function findExamplesDir(): string | undefined {
	return [path.resolve(__dirname, "..", "examples"), path.resolve(__dirname, "..", "..", "examples")]
		.find(dir => fs.existsSync(dir));
}

export const defaultIo: CliIo = {
	out: line => console.log(line),
	err: line => console.error(line),
	readFile: file => fs.readFileSync(file, "utf8"),
	listExamples: () => {
		const dir = findExamplesDir();
		return dir ? fs.readdirSync(dir).filter(f => f.endsWith(".metric")).sort() : [];
	},
	color: Boolean(process.stderr.isTTY) && !process.env.NO_COLOR,
};

function readFailure(file: string, e: unknown): string {
	if (e instanceof Error && "code" in e && e.code === "ENOENT") return `Error: File '${file}' not found`;
	return `Error reading file '${file}': ${e instanceof Error ? e.message : String(e)}`;
}

export function runCli(args: readonly string[], io: CliIo = defaultIo): number {
	const red = (text: string) => (io.color ? `\x1b[31m${text}\x1b[0m` : text);
	const [file] = args;

	if (file === undefined) {
		io.err("Usage: metric <file.metric>");
		io.err("");
		io.err("Available examples:");
		for (const example of io.listExamples()) io.err(`  examples/${example}`);
		return 1;
	}

	if (!file.endsWith(".metric")) {
		io.err(red(`Error: File '${file}' does not have .metric extension`));
		io.err("Metric programs should use the .metric file extension");
		return 1;
	}

	let source: string;
	try {
		source = io.readFile(file);
	} catch (e) {
		io.err(red(readFailure(file, e)));
		return 1;
	}

	try {
		const { cost, elapsedMs } = runMetric(source, { out: io.out });
		io.out(`Execution time: ${(elapsedMs / 1000).toFixed(4)} seconds`);
		io.out(`Operation count: ${cost}`);
		return 0;
	} catch (e) {
		if (!isCompilerError(e)) throw e;
		io.err(red(e.format()));
		return 1;
	}
}

if (require.main === module) {
	process.exitCode = runCli(process.argv.slice(2));
}
