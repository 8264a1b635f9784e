import { performance } from "node:perf_hooks";
import { tokenize } from "../src/lexer";
import { parse } from "../src/parser";
import { typeCheck } from "../src/typechecker";
import { execute } from "../src/evaluator";

type Scenario = { label: string; src: string };
type BenchRow = {
	label: string;
	ms: number;
	cost: number;
	printed: number;
};

const scenarios: Scenario[] = [
	{ label: "arith-flat", src: "let x integer = 5\nlet y integer = 10\nprint x * y + x - y" },
	{ label: "while-100", src: "let i integer = 0\nlet acc integer = 0\nwhile i < 100\n    set acc = acc + i\n    set i = i + 1\nprint acc" },
	{ label: "fib-rec-12", src: "def fib(n integer) returns integer\n    if n < 2\n        return n\n    return fib(n - 1) + fib(n - 2)\nprint fib(12)" },
	{ label: "list-fill", src: "let xs list of integer = repeat(0, 50)\nlet i integer = 0\nwhile i < len(xs)\n    set xs[i] = i * i\n    set i = i + 1\nprint xs[49]" },
	{ label: "float-mix", src: "let t float = 0.0\nlet k integer = 1\nwhile k <= 20\n    set t = t + 1.0 / k\n    set k = k + 1\nprint t" },
];

const discard = () => {};

function benchScenario(scenario: Scenario, iterations: number): BenchRow {
	const program = parse(tokenize(scenario.src));
	typeCheck(program);

	// the operation count is deterministic, so one warm run gives it
	const { cost, output } = execute(program, { out: discard });

	const start = performance.now();
	for (let i = 0; i < iterations; i++) {
		execute(program, { out: discard });
	}
	const ms = performance.now() - start;

	return { label: scenario.label, ms, cost, printed: output.length };
}

async function main() {
	const iterations = Number(process.env.BENCH_ITERS ?? 200);
	const rows = scenarios.map(scenario => benchScenario(scenario, iterations));

	console.log(`Metric benchmark (${iterations} iterations per scenario)`);
	for (const row of rows) {
		console.log(
			`${row.label.padEnd(12)} ${row.ms.toFixed(2).padStart(8)} ms  cost=${row.cost} printed=${row.printed}`
		);
	}
}

main().catch(err => {
	console.error(err);
	process.exit(1);
});
