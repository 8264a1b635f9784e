import { performance } from "node:perf_hooks";
import { tokenize } from "./lexer";
import { validateStyle } from "./style";
import { parse } from "./parser";
import { typeCheck } from "./typechecker";
import { execute, type ScalarValue } from "./evaluator";

export interface RunOptions {
	/** Receives each printed line. Defaults to console.log. */
	out?: (line: string) => void;
	/** Run the layout linter between tokenizing and parsing. On by default. */
	checkStyle?: boolean;
}

export interface RunResult {
	output: ScalarValue[];
	cost: number;
	/** Wall-clock time spent executing, excluding the static stages. */
	elapsedMs: number;
}

/**
 * Runs a Metric program through every stage. Any stage failure surfaces as the
 * matching CompilerError subclass; nothing is printed for a program that fails
 * before execution starts.
 */
export function runMetric(source: string, options: RunOptions = {}): RunResult {
	const { out, checkStyle = true } = options;

	const tokens = tokenize(source);
	if (checkStyle) validateStyle(source, tokens);
	const program = parse(tokens);
	typeCheck(program);

	const start = performance.now();
	const { output, cost } = execute(program, { out });
	const elapsedMs = performance.now() - start;

	return { output, cost, elapsedMs };
}
