import { tokenize } from "../src/lexer";
import { parse } from "../src/parser";
import { TypeChecker, typeCheck } from "../src/typechecker";
import { TypeCheckError } from "../src/errors";
import type { Expression } from "../src/ast";

const check = (src: string) => typeCheck(parse(tokenize(src)));

function typeError(src: string): TypeCheckError {
	try {
		check(src);
	} catch (e) {
		if (e instanceof TypeCheckError) return e;
		throw e;
	}
	throw new Error("expected a type error");
}

const messageOf = (src: string) => typeError(src).message;

describe("3. Expression types", () => {
	const checker = new TypeChecker();
	const int = (value: bigint): Expression => ({ type: "IntegerLiteral", value });
	const float = (value: number): Expression => ({ type: "FloatLiteral", value });

	test("literals", () => {
		expect(checker.typeOf(int(1n))).toBe("integer");
		expect(checker.typeOf(float(1))).toBe("float");
		expect(checker.typeOf({ type: "BooleanLiteral", value: false })).toBe("boolean");
	});

	test("arithmetic promotes to float when either side is float", () => {
		const add = (left: Expression, right: Expression): Expression =>
			({ type: "BinaryExpression", left, operator: "Addition", right });
		expect(checker.typeOf(add(int(1n), int(2n)))).toBe("integer");
		expect(checker.typeOf(add(int(1n), float(2)))).toBe("float");
		expect(checker.typeOf(add(float(1), int(2n)))).toBe("float");
	});

	test("list literal, repeat and len", () => {
		expect(checker.typeOf({ type: "ListLiteral", elements: [int(1n), int(2n)] })).toEqual({ kind: "list", element: "integer" });
		expect(checker.typeOf({ type: "RepeatCall", value: float(0), count: int(3n) })).toEqual({ kind: "list", element: "float" });
		expect(checker.typeOf({ type: "LenCall", list: { type: "RepeatCall", value: int(0n), count: int(3n) } })).toBe("integer");
	});

	test("hand-built nodes report an unknown position", () => {
		try {
			checker.typeOf({ type: "Variable", name: "ghost" });
			throw new Error("expected a type error");
		} catch (e) {
			if (!(e instanceof TypeCheckError)) throw e;
			expect(e.format()).toBe("[Line 0, Column 0] TypeCheck Error | Variable 'ghost' is not declared");
		}
	});
});

describe("3b. Well-typed programs", () => {

	test.each([
		["integer let", "let x integer = 5"],
		["float arithmetic", "let x float = 1 + 2.5"],
		["boolean logic", "let b boolean = not (1 < 2) or true and 3 == 3"],
		["modulus", "let r integer = 7 % 3"],
		["list element read and write", "let xs list of integer = [1, 2]\nset xs[0] = xs[1] + 1"],
		["set with same type", "let x integer = 1\nset x = x * 2"],
		["if with boolean condition", "let n integer = 5\nif n > 3\n    print n"],
		["recursion", "def fact(n integer) returns integer\n    if n <= 1\n        return 1\n    return n * fact(n - 1)\nprint fact(5)"],
		["return nested inside while", "def f() returns integer\n    while true\n        return 1\nprint f()"],
		["functions returning lists", "def ones(n integer) returns list of integer\n    return repeat(1, n)\nlet xs list of integer = ones(3)"],
		["list equality", "let a list of integer = [1]\nprint a == [1]"],
		["variable after if leaks into scope", "if true\n    let x integer = 1\nprint x"],
	])("%s", (_label, src) => {
		expect(() => check(src)).not.toThrow();
	});
});

describe("3c. Statement errors", () => {

	test("let with mismatched type", () => {
		const err = typeError("let ok integer = 1\nlet x integer = 1.5");
		expect(err.message).toBe("Type mismatch: cannot assign float to variable 'x' of type integer");
		expect([err.line, err.column]).toEqual([2, 1]);
	});

	test("let does not widen integer to float", () => {
		expect(messageOf("let x float = 1")).toBe("Type mismatch: cannot assign integer to variable 'x' of type float");
	});

	test("list annotation mismatch renders both list types", () => {
		expect(messageOf("let xs list of float = [1, 2]"))
			.toBe("Type mismatch: cannot assign list of integer to variable 'xs' of type list of float");
	});

	test("duplicate let", () => {
		expect(messageOf("let x integer = 1\nlet x integer = 2")).toBe("Variable 'x' is already declared");
	});

	test("set of undeclared variable", () => {
		expect(messageOf("set y = 1")).toBe("Variable 'y' is not declared");
	});

	test("set with mismatched type", () => {
		expect(messageOf("let b boolean = true\nset b = 1"))
			.toBe("Type mismatch: cannot assign integer to variable 'b' of type boolean");
	});

	test("element assignment to a scalar", () => {
		expect(messageOf("let x integer = 1\nset x[0] = 1")).toBe("Cannot index into non-list variable 'x' of type integer");
	});

	test("element assignment with a float index", () => {
		expect(messageOf("let xs list of integer = [1]\nset xs[0.5] = 1")).toBe("List index must be integer, got float");
	});

	test("element assignment with a wrong value type", () => {
		expect(messageOf("let xs list of integer = [1]\nset xs[0] = true"))
			.toBe("Type mismatch: cannot assign boolean to list element of type integer");
	});

	test("non-boolean conditions", () => {
		expect(messageOf("if 1\n    print 1")).toBe("If condition must be boolean, got integer");
		expect(messageOf("while 1.5\n    print 1")).toBe("While condition must be boolean, got float");
	});

	test("error inside a block carries the inner statement position", () => {
		const err = typeError("if true\n    set y = 1");
		expect([err.line, err.column]).toEqual([2, 5]);
	});
});

describe("3d. Operator errors", () => {

	test.each([
		["print 1 + true", "Operator Addition requires numeric operands"],
		["print 1.5 % 2", "Operator Modulus requires integer operands"],
		["print true < false", "Operator LessThan requires numeric operands"],
		["print 1 == 1.0", "Operator EqualEqual requires operands of same type"],
		["print 1 and true", "Operator And requires boolean operands"],
		["print not 1", "Operator 'not' requires boolean operand, got integer"],
	])("%s", (src, message) => {
		expect(messageOf(src)).toBe(message);
	});
});

describe("3e. Functions", () => {

	test("duplicate declaration", () => {
		const src = "def f() returns integer\n    return 1\ndef f() returns integer\n    return 2";
		expect(messageOf(src)).toBe("Function 'f' is already declared");
	});

	test("parameter colliding with an outer variable", () => {
		const src = "let x integer = 1\ndef f(x integer) returns integer\n    return x";
		expect(messageOf(src)).toBe("Parameter 'x' conflicts with existing variable");
	});

	test("duplicate parameter names", () => {
		expect(messageOf("def f(a integer, a float) returns integer\n    return 1")).toBe("Parameter 'a' conflicts with existing variable");
	});

	test("function body cannot see outer variables", () => {
		expect(messageOf("let g integer = 1\ndef f() returns integer\n    return g")).toBe("Variable 'g' is not declared");
	});

	test("locals of a function do not leak out", () => {
		expect(messageOf("def f() returns integer\n    let t integer = 1\n    return t\nprint t")).toBe("Variable 't' is not declared");
	});

	test("missing return", () => {
		expect(messageOf("def f() returns integer\n    print 1")).toBe("Function 'f' must have a return statement");
	});

	test("return outside a function", () => {
		expect(messageOf("return 1")).toBe("Return statement must be inside a function");
	});

	test("return of the wrong type", () => {
		expect(messageOf("def f() returns float\n    return 1")).toBe("Return type mismatch: expected float, got integer");
	});

	test("call of an undeclared function", () => {
		expect(messageOf("print g(1)")).toBe("Function 'g' is not declared");
	});

	test("wrong number of arguments", () => {
		expect(messageOf("def f(a integer) returns integer\n    return a\nprint f(1, 2)"))
			.toBe("Function 'f' expects 1 arguments, got 2");
	});

	test("no widening at call boundaries", () => {
		expect(messageOf("def f(a float) returns float\n    return a\nprint f(1)"))
			.toBe("Argument 1 to function 'f': expected float, got integer");
	});
});

describe("3f. List errors", () => {

	test.each([
		["print []", "Cannot infer type of empty list literal"],
		["print [1, 2.0]", "List elements must be homogeneous: element 0 is integer, element 1 is float"],
		["print [[1], [2]]", "Nested lists are not supported"],
		["let x integer = 5\nprint x[0]", "Cannot index into non-list expression of type integer"],
		["let xs list of integer = [1]\nprint xs[true]", "List index must be integer, got boolean"],
		["print repeat([1], 2)", "Cannot repeat a list value"],
		["print repeat(1, 2.0)", "Repeat count must be integer, got float"],
		["print len(3)", "Cannot get length of non-list expression of type integer"],
	])("%s", (src, message) => {
		expect(messageOf(src)).toBe(message);
	});
});
