import type {
	BinaryOperator,
	Expression,
	ExpressionOf,
	Program,
	Statement,
	StatementOf,
} from "./ast";
import { EvaluationError, UNKNOWN_POSITION, type Position } from "./errors";

export type ScalarValue = bigint | number | boolean;

export type RuntimeValue = ScalarValue | readonly ScalarValue[];

type FunctionDeclaration = StatementOf<"FunctionDeclaration">;

/** Running operation total shared by every environment derived from one execution. */
export class CostCounter {
	private total = 0;

	increment(amount = 1): void {
		this.total += amount;
	}

	get value(): number {
		return this.total;
	}
}

/**
 * Persistent binding context. Every update returns a new environment holding copied
 * maps; the cost counter is the one piece of state all copies share.
 */
export class Environment {
	private constructor(
		private readonly bindings: ReadonlyMap<string, RuntimeValue>,
		private readonly functions: ReadonlyMap<string, FunctionDeclaration>,
		readonly counter: CostCounter
	) {}

	static empty(): Environment {
		return new Environment(new Map(), new Map(), new CostCounter());
	}

	/** Fresh variable scope for a call: same functions, same counter. */
	child(): Environment {
		return new Environment(new Map(), this.functions, this.counter);
	}

	get cost(): number {
		return this.counter.value;
	}

	incrementCost(amount = 1): void {
		this.counter.increment(amount);
	}

	has(name: string): boolean {
		return this.bindings.has(name);
	}

	find(name: string): RuntimeValue | undefined {
		return this.bindings.get(name);
	}

	add(name: string, value: RuntimeValue): Environment {
		const bindings = new Map(this.bindings);
		bindings.set(name, value);
		return new Environment(bindings, this.functions, this.counter);
	}

	set(name: string, value: RuntimeValue): Environment {
		if (!this.bindings.has(name)) throw new EvaluationError(`Cannot set undefined variable: ${name}`);
		return this.add(name, value);
	}

	setListElement(name: string, index: number, value: ScalarValue): Environment {
		const current = this.bindings.get(name);
		if (current === undefined) throw new EvaluationError(`Cannot set undefined variable: ${name}`);
		if (!isList(current)) throw new EvaluationError(`Variable '${name}' is not a list`);
		const next = current.slice();
		next[index] = value;
		return this.add(name, next);
	}

	hasFunction(name: string): boolean {
		return this.functions.has(name);
	}

	getFunction(name: string): FunctionDeclaration | undefined {
		return this.functions.get(name);
	}

	addFunction(decl: FunctionDeclaration): Environment {
		const functions = new Map(this.functions);
		functions.set(decl.name, decl);
		return new Environment(this.bindings, functions, this.counter);
	}
}

export type StatementOutcome =
	| { kind: "next"; env: Environment }
	| { kind: "return"; env: Environment; value: RuntimeValue };

export interface ExecuteOptions {
	/** Receives each formatted `print` line. Defaults to console.log. */
	out?: (line: string) => void;
}

/** Output side of one execution: the print sink and every value printed so far. */
export interface Runtime {
	readonly out: (line: string) => void;
	/** Printed values in order, with a printed list spread into its elements. */
	readonly output: ScalarValue[];
}

export interface ExecutionResult {
	output: ScalarValue[];
	cost: number;
}

export function createRuntime(options: ExecuteOptions = {}): Runtime {
	return { out: options.out ?? (line => console.log(line)), output: [] };
}

// Largest length a JavaScript array can hold.
const MAX_LIST_LENGTH = 4294967295n;

// Value helpers

const isList = (v: RuntimeValue): v is readonly ScalarValue[] => Array.isArray(v);

const isScalar = (v: RuntimeValue): v is ScalarValue => !Array.isArray(v);

export function kindOf(v: RuntimeValue): "int" | "float" | "bool" | "list" {
	if (isList(v)) return "list";
	switch (typeof v) {
		case "bigint": return "int";
		case "number": return "float";
		default: return "bool";
	}
}

export function isTruthy(v: RuntimeValue): boolean {
	if (isList(v)) return v.length > 0;
	return v !== false && v !== 0n && v !== 0;
}

export function valuesEqual(a: RuntimeValue, b: RuntimeValue): boolean {
	if (isList(a) || isList(b)) {
		if (!isList(a) || !isList(b) || a.length !== b.length) return false;
		for (let i = 0; i < a.length; i++) {
			if (!valuesEqual(a[i], b[i])) return false;
		}
		return true;
	}
	if (typeof a === "bigint" && typeof b === "number") return Number(a) === b;
	if (typeof a === "number" && typeof b === "bigint") return a === Number(b);
	return a === b;
}

export function formatFloat(v: number): string {
	if (Number.isNaN(v)) return "nan";
	if (!Number.isFinite(v)) return v > 0 ? "inf" : "-inf";
	if (Object.is(v, -0)) return "-0.0";
	const abs = Math.abs(v);
	if (abs >= 1e16 || (abs !== 0 && abs < 1e-4)) {
		return v.toExponential().replace(/e([+-])(\d)$/, "e$10$2");
	}
	const text = String(v);
	return Number.isInteger(v) ? `${text}.0` : text;
}

export function formatValue(v: RuntimeValue): string {
	if (isList(v)) return `[${v.map(formatValue).join(", ")}]`;
	switch (typeof v) {
		case "bigint": return v.toString();
		case "number": return formatFloat(v);
		default: return v ? "true" : "false";
	}
}

function floorDiv(a: bigint, b: bigint): bigint {
	const q = a / b;
	return (a % b !== 0n) && ((a < 0n) !== (b < 0n)) ? q - 1n : q;
}

function floorMod(a: bigint, b: bigint): bigint {
	const r = a % b;
	return r !== 0n && ((r < 0n) !== (b < 0n)) ? r + b : r;
}

function floatMod(a: number, b: number): number {
	const r = a % b;
	return r !== 0 && ((r < 0) !== (b < 0)) ? r + b : r;
}

// Evaluation

export function evaluateExpression(
	env: Environment,
	expr: Expression,
	runtime: Runtime = createRuntime(),
	at: Position = UNKNOWN_POSITION
): RuntimeValue {
	const fail = (message: string): never => {
		throw new EvaluationError(message, at);
	};

	const ensureNumeric = (v: RuntimeValue): bigint | number => {
		if (typeof v === "bigint" || typeof v === "number") return v;
		return fail(`Expected number, got ${kindOf(v)}`);
	};

	function evalBinary(node: ExpressionOf<"BinaryExpression">): RuntimeValue {
		const left = evalExpr(node.left);

		if (node.operator === "And") {
			if (!isTruthy(left)) {
				env.incrementCost();
				return false;
			}
			const right = evalExpr(node.right);
			env.incrementCost();
			return right;
		}
		if (node.operator === "Or") {
			if (isTruthy(left)) {
				env.incrementCost();
				return true;
			}
			const right = evalExpr(node.right);
			env.incrementCost();
			return right;
		}

		const right = evalExpr(node.right);
		env.incrementCost();

		switch (node.operator) {
			case "EqualEqual": return valuesEqual(left, right);
			case "NotEqual": return !valuesEqual(left, right);
			default: return numericOperation(node.operator, ensureNumeric(left), ensureNumeric(right));
		}
	}

	function numericOperation(op: Exclude<BinaryOperator, "And" | "Or" | "EqualEqual" | "NotEqual">, a: bigint | number, b: bigint | number): RuntimeValue {
		if (typeof a === "bigint" && typeof b === "bigint") {
			switch (op) {
				case "Addition": return a + b;
				case "Subtraction": return a - b;
				case "Multiplication": return a * b;
				case "Division":
					if (b === 0n) return fail("Division by zero");
					return floorDiv(a, b);
				case "Modulus":
					if (b === 0n) return fail("Modulus by zero");
					return floorMod(a, b);
				case "LessThan": return a < b;
				case "GreaterThan": return a > b;
				case "LessThanOrEqual": return a <= b;
				case "GreaterThanOrEqual": return a >= b;
			}
		}

		const x = Number(a);
		const y = Number(b);
		switch (op) {
			case "Addition": return x + y;
			case "Subtraction": return x - y;
			case "Multiplication": return x * y;
			case "Division":
				if (y === 0) return fail("Division by zero");
				return x / y;
			case "Modulus":
				if (y === 0) return fail("Modulus by zero");
				return floatMod(x, y);
			case "LessThan": return x < y;
			case "GreaterThan": return x > y;
			case "LessThanOrEqual": return x <= y;
			case "GreaterThanOrEqual": return x >= y;
		}
	}

	function evalCall(node: ExpressionOf<"FunctionCall">): RuntimeValue {
		const decl = env.getFunction(node.name);
		if (!decl) return fail(`Undefined function: ${node.name}`);

		const args = node.args.map(evalExpr);
		env.incrementCost();

		if (args.length !== decl.params.length) {
			return fail(`Function '${node.name}' expects ${decl.params.length} arguments, got ${args.length}`);
		}

		let scope = env.child();
		decl.params.forEach((param, i) => {
			scope = scope.add(param.name, args[i]);
		});

		// the body still prints, but its values stay out of the program's output
		const outcome = executeBlock(scope, decl.body, { out: runtime.out, output: [] });
		if (outcome.kind === "return") return outcome.value;
		return fail(`Function '${node.name}' did not return a value`);
	}

	function evalExpr(node: Expression): RuntimeValue {
		switch (node.type) {
			case "IntegerLiteral":
			case "FloatLiteral":
			case "BooleanLiteral":
				return node.value;
			case "Variable": {
				env.incrementCost();
				const value = env.find(node.name);
				if (value === undefined) return fail(`Undefined variable: ${node.name}`);
				return value;
			}
			case "UnaryExpression": {
				const operand = evalExpr(node.operand);
				env.incrementCost();
				return !isTruthy(operand);
			}
			case "BinaryExpression": return evalBinary(node);
			case "FunctionCall": return evalCall(node);
			case "ListLiteral": {
				env.incrementCost();
				return node.elements.map(element => {
					const value = evalExpr(element);
					if (!isScalar(value)) return fail(`List elements must be int, bool, or float, got ${kindOf(value)}`);
					return value;
				});
			}
			case "ListAccess": {
				const list = evalExpr(node.list);
				const index = evalExpr(node.index);
				if (!isList(list)) return fail("Cannot index into non-list value");
				if (typeof index !== "bigint") return fail("List index must be integer");
				if (index < 0n || index >= BigInt(list.length)) {
					return fail(`List index ${index} out of bounds (length ${list.length})`);
				}
				env.incrementCost();
				return list[Number(index)];
			}
			case "RepeatCall": {
				const value = evalExpr(node.value);
				const count = evalExpr(node.count);
				if (typeof count !== "bigint") return fail("Repeat count must be integer");
				if (count < 0n) return fail("Repeat count cannot be negative");
				if (!isScalar(value)) return fail(`Repeat value must be int, bool, or float, got ${kindOf(value)}`);
				if (count > MAX_LIST_LENGTH) return fail(`Repeat count ${count} exceeds the maximum list length`);
				env.incrementCost();
				return new Array<ScalarValue>(Number(count)).fill(value);
			}
			case "LenCall": {
				const list = evalExpr(node.list);
				if (!isList(list)) return fail(`Expected list, got ${kindOf(list)}`);
				env.incrementCost();
				return BigInt(list.length);
			}
		}
	}

	return evalExpr(expr);
}

export function executeBlock(env: Environment, body: readonly Statement[], runtime: Runtime): StatementOutcome {
	let current = env;
	for (const stmt of body) {
		const outcome = executeStatement(current, stmt, runtime);
		if (outcome.kind === "return") return outcome;
		current = outcome.env;
	}
	return { kind: "next", env: current };
}

function conditionHolds(env: Environment, stmt: StatementOf<"If" | "While">, runtime: Runtime, at: Position): boolean {
	const value = evaluateExpression(env, stmt.condition, runtime, at);
	if (typeof value !== "boolean") throw new EvaluationError(`${stmt.type} condition must be boolean`, at);
	env.incrementCost();
	return value;
}

export function executeStatement(env: Environment, stmt: Statement, runtime: Runtime = createRuntime()): StatementOutcome {
	const at = stmt.pos ?? UNKNOWN_POSITION;
	const fail = (message: string): never => {
		throw new EvaluationError(message, at);
	};
	const evaluate = (expr: Expression) => evaluateExpression(env, expr, runtime, at);
	const next = (updated: Environment): StatementOutcome => ({ kind: "next", env: updated });

	switch (stmt.type) {
		case "Let": {
			if (env.has(stmt.name)) return fail(`Variable already bound: ${stmt.name}`);
			const updated = env.add(stmt.name, evaluate(stmt.expression));
			updated.incrementCost();
			return next(updated);
		}
		case "Set": {
			if (!env.has(stmt.name)) return fail(`Cannot set undefined variable: ${stmt.name}`);
			const updated = env.set(stmt.name, evaluate(stmt.expression));
			updated.incrementCost();
			return next(updated);
		}
		case "ListAssignment": {
			if (!env.has(stmt.name)) return fail(`Cannot set undefined variable: ${stmt.name}`);
			const index = evaluate(stmt.index);
			if (typeof index !== "bigint") return fail("List index must be integer");
			const value = evaluate(stmt.value);

			const list = env.find(stmt.name);
			if (list === undefined || !isList(list)) return fail(`Variable '${stmt.name}' is not a list`);
			if (index < 0n || index >= BigInt(list.length)) {
				return fail(`List index ${index} out of bounds (list length: ${list.length})`);
			}
			if (!isScalar(value)) return fail("Cannot assign list to list element");

			const updated = env.setListElement(stmt.name, Number(index), value);
			updated.incrementCost();
			return next(updated);
		}
		case "Print": {
			const value = evaluate(stmt.expression);
			env.incrementCost();
			runtime.out(formatValue(value));
			if (isList(value)) {
				for (const element of value) runtime.output.push(element);
			} else {
				runtime.output.push(value);
			}
			return next(env);
		}
		case "If": {
			if (!conditionHolds(env, stmt, runtime, at)) return next(env);
			return executeBlock(env, stmt.body, runtime);
		}
		case "While": {
			let current = env;
			while (conditionHolds(current, stmt, runtime, at)) {
				const outcome = executeBlock(current, stmt.body, runtime);
				if (outcome.kind === "return") return outcome;
				current = outcome.env;
			}
			return next(current);
		}
		case "Comment":
			return next(env);
		case "FunctionDeclaration": {
			if (env.hasFunction(stmt.name)) return fail(`Function already declared: ${stmt.name}`);
			return next(env.addFunction(stmt));
		}
		case "Return":
			return { kind: "return", env, value: evaluate(stmt.expression) };
	}
}

export function execute(program: Program, options: ExecuteOptions = {}): ExecutionResult {
	const runtime = createRuntime(options);
	let env = Environment.empty();

	for (const stmt of program) {
		const outcome = executeStatement(env, stmt, runtime);
		if (outcome.kind === "return") {
			throw new EvaluationError("Return statement must be inside a function", stmt.pos ?? UNKNOWN_POSITION);
		}
		env = outcome.env;
	}

	return { output: runtime.output, cost: env.cost };
}
