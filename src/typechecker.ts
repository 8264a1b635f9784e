import {
	isListType,
	listOf,
	typesEqual,
	typeToString,
	type BinaryOperator,
	type Expression,
	type ExpressionOf,
	type MetricType,
	type Program,
	type Statement,
	type StatementOf,
} from "./ast";
import { TypeCheckError, UNKNOWN_POSITION, type Position } from "./errors";

type FunctionSignature = { params: MetricType[]; returnType: MetricType };

type OperatorCategory = "arithmetic" | "modulus" | "ordering" | "equality" | "logical";

const operatorCategories: Record<BinaryOperator, OperatorCategory> = {
	Addition: "arithmetic",
	Subtraction: "arithmetic",
	Multiplication: "arithmetic",
	Division: "arithmetic",
	Modulus: "modulus",
	LessThan: "ordering",
	GreaterThan: "ordering",
	LessThanOrEqual: "ordering",
	GreaterThanOrEqual: "ordering",
	EqualEqual: "equality",
	NotEqual: "equality",
	And: "logical",
	Or: "logical",
};

const isNumeric = (t: MetricType) => t === "integer" || t === "float";

function containsReturn(body: readonly Statement[]): boolean {
	return body.some(stmt => {
		switch (stmt.type) {
			case "Return": return true;
			case "If":
			case "While": return containsReturn(stmt.body);
			default: return false;
		}
	});
}

/**
 * Static checker for a parsed program. State is the variable symbol table of the
 * active scope, the global function table and the declared return type of the
 * function currently being checked.
 */
export class TypeChecker {
	private symbols = new Map<string, MetricType>();
	private readonly functions = new Map<string, FunctionSignature>();
	private returnType: MetricType | undefined;
	private current: Position = UNKNOWN_POSITION;

	checkProgram(program: Program): void {
		for (const stmt of program) this.checkStatement(stmt);
	}

	checkStatement(stmt: Statement): void {
		const outer = this.current;
		this.current = stmt.pos ?? outer;
		try {
			this.visitStatement(stmt);
		} finally {
			this.current = outer;
		}
	}

	private fail(message: string): never {
		throw new TypeCheckError(message, this.current);
	}

	private visitStatement(stmt: Statement): void {
		switch (stmt.type) {
			case "Let": return this.checkLet(stmt);
			case "Set": return this.checkSet(stmt);
			case "ListAssignment": return this.checkListAssignment(stmt);
			case "Print":
				this.typeOf(stmt.expression);
				return;
			case "If":
			case "While": {
				const label = stmt.type;
				const condition = this.typeOf(stmt.condition);
				if (condition !== "boolean") {
					this.fail(`${label} condition must be boolean, got ${typeToString(condition)}`);
				}
				for (const inner of stmt.body) this.checkStatement(inner);
				return;
			}
			case "Comment": return;
			case "FunctionDeclaration": return this.checkFunction(stmt);
			case "Return": return this.checkReturn(stmt);
		}
	}

	private checkLet(stmt: StatementOf<"Let">): void {
		if (this.symbols.has(stmt.name)) this.fail(`Variable '${stmt.name}' is already declared`);
		const actual = this.typeOf(stmt.expression);
		if (!typesEqual(actual, stmt.annotation)) {
			this.fail(
				`Type mismatch: cannot assign ${typeToString(actual)} to variable '${stmt.name}' of type ${typeToString(stmt.annotation)}`
			);
		}
		this.symbols.set(stmt.name, stmt.annotation);
	}

	private checkSet(stmt: StatementOf<"Set">): void {
		const declared = this.lookup(stmt.name);
		const actual = this.typeOf(stmt.expression);
		if (!typesEqual(actual, declared)) {
			this.fail(
				`Type mismatch: cannot assign ${typeToString(actual)} to variable '${stmt.name}' of type ${typeToString(declared)}`
			);
		}
	}

	private checkListAssignment(stmt: StatementOf<"ListAssignment">): void {
		const declared = this.lookup(stmt.name);
		if (!isListType(declared)) {
			return this.fail(`Cannot index into non-list variable '${stmt.name}' of type ${typeToString(declared)}`);
		}
		const index = this.typeOf(stmt.index);
		if (index !== "integer") this.fail(`List index must be integer, got ${typeToString(index)}`);
		const value = this.typeOf(stmt.value);
		if (!typesEqual(value, declared.element)) {
			this.fail(`Type mismatch: cannot assign ${typeToString(value)} to list element of type ${declared.element}`);
		}
	}

	private checkFunction(stmt: StatementOf<"FunctionDeclaration">): void {
		if (this.functions.has(stmt.name)) this.fail(`Function '${stmt.name}' is already declared`);

		// registered before the body so recursive calls resolve
		this.functions.set(stmt.name, { params: stmt.params.map(p => p.type), returnType: stmt.returnType });

		// parameter names may not shadow anything visible at the declaration site
		const scope = new Map<string, MetricType>();
		for (const param of stmt.params) {
			if (this.symbols.has(param.name) || scope.has(param.name)) {
				this.fail(`Parameter '${param.name}' conflicts with existing variable`);
			}
			scope.set(param.name, param.type);
		}

		const savedSymbols = this.symbols;
		const savedReturn = this.returnType;
		this.symbols = scope;
		this.returnType = stmt.returnType;
		try {
			for (const inner of stmt.body) this.checkStatement(inner);
			if (!containsReturn(stmt.body)) this.fail(`Function '${stmt.name}' must have a return statement`);
		} finally {
			this.symbols = savedSymbols;
			this.returnType = savedReturn;
		}
	}

	private checkReturn(stmt: StatementOf<"Return">): void {
		const expected = this.returnType;
		if (expected === undefined) return this.fail("Return statement must be inside a function");
		const actual = this.typeOf(stmt.expression);
		if (!typesEqual(actual, expected)) {
			this.fail(`Return type mismatch: expected ${typeToString(expected)}, got ${typeToString(actual)}`);
		}
	}

	private lookup(name: string): MetricType {
		const t = this.symbols.get(name);
		if (t === undefined) return this.fail(`Variable '${name}' is not declared`);
		return t;
	}

	typeOf(expr: Expression): MetricType {
		switch (expr.type) {
			case "IntegerLiteral": return "integer";
			case "FloatLiteral": return "float";
			case "BooleanLiteral": return "boolean";
			case "Variable": return this.lookup(expr.name);
			case "UnaryExpression": {
				const operand = this.typeOf(expr.operand);
				if (operand !== "boolean") {
					this.fail(`Operator 'not' requires boolean operand, got ${typeToString(operand)}`);
				}
				return "boolean";
			}
			case "BinaryExpression": return this.binaryType(expr);
			case "FunctionCall": return this.callType(expr);
			case "ListLiteral": return this.listLiteralType(expr);
			case "ListAccess": {
				const list = this.typeOf(expr.list);
				if (!isListType(list)) {
					return this.fail(`Cannot index into non-list expression of type ${typeToString(list)}`);
				}
				const index = this.typeOf(expr.index);
				if (index !== "integer") this.fail(`List index must be integer, got ${typeToString(index)}`);
				return list.element;
			}
			case "RepeatCall": {
				const value = this.typeOf(expr.value);
				if (isListType(value)) return this.fail("Cannot repeat a list value");
				const count = this.typeOf(expr.count);
				if (count !== "integer") this.fail(`Repeat count must be integer, got ${typeToString(count)}`);
				return listOf(value);
			}
			case "LenCall": {
				const list = this.typeOf(expr.list);
				if (!isListType(list)) {
					this.fail(`Cannot get length of non-list expression of type ${typeToString(list)}`);
				}
				return "integer";
			}
		}
	}

	private binaryType(expr: ExpressionOf<"BinaryExpression">): MetricType {
		const left = this.typeOf(expr.left);
		const right = this.typeOf(expr.right);
		const op = expr.operator;

		switch (operatorCategories[op]) {
			case "arithmetic":
				if (!isNumeric(left) || !isNumeric(right)) this.fail(`Operator ${op} requires numeric operands`);
				return left === "float" || right === "float" ? "float" : "integer";
			case "modulus":
				if (left !== "integer" || right !== "integer") this.fail(`Operator ${op} requires integer operands`);
				return "integer";
			case "ordering":
				if (!isNumeric(left) || !isNumeric(right)) this.fail(`Operator ${op} requires numeric operands`);
				return "boolean";
			case "equality":
				if (!typesEqual(left, right)) this.fail(`Operator ${op} requires operands of same type`);
				return "boolean";
			case "logical":
				if (left !== "boolean" || right !== "boolean") this.fail(`Operator ${op} requires boolean operands`);
				return "boolean";
		}
	}

	private callType(expr: ExpressionOf<"FunctionCall">): MetricType {
		const signature = this.functions.get(expr.name);
		if (!signature) return this.fail(`Function '${expr.name}' is not declared`);

		const { params, returnType } = signature;
		if (expr.args.length !== params.length) {
			this.fail(`Function '${expr.name}' expects ${params.length} arguments, got ${expr.args.length}`);
		}
		expr.args.forEach((arg, i) => {
			const actual = this.typeOf(arg);
			if (!typesEqual(actual, params[i])) {
				this.fail(
					`Argument ${i + 1} to function '${expr.name}': expected ${typeToString(params[i])}, got ${typeToString(actual)}`
				);
			}
		});
		return returnType;
	}

	private listLiteralType(expr: ExpressionOf<"ListLiteral">): MetricType {
		const [first, ...rest] = expr.elements;
		if (first === undefined) return this.fail("Cannot infer type of empty list literal");

		const firstType = this.typeOf(first);
		rest.forEach((element, i) => {
			const t = this.typeOf(element);
			if (!typesEqual(t, firstType)) {
				this.fail(
					`List elements must be homogeneous: element 0 is ${typeToString(firstType)}, element ${i + 1} is ${typeToString(t)}`
				);
			}
		});
		if (isListType(firstType)) return this.fail("Nested lists are not supported");
		return listOf(firstType);
	}
}

export function typeCheck(program: Program): void {
	new TypeChecker().checkProgram(program);
}
