import { tokenize } from "../src/lexer";
import { validateStyle } from "../src/style";
import { StyleError } from "../src/errors";

const lint = (src: string) => validateStyle(src, tokenize(src));

function styleError(src: string, tokenized = true): StyleError {
	try {
		if (tokenized) lint(src);
		else validateStyle(src, []);
	} catch (e) {
		if (e instanceof StyleError) return e;
		throw e;
	}
	throw new Error("expected a style error");
}

const located = (e: StyleError) => [e.message, e.line, e.column];

describe("5. Accepted layout", () => {

	test.each([
		["simple program", "let x integer = 5\nlet y integer = 10\nprint x + y"],
		["one blank line between statements", "print 1\n\nprint 2"],
		["nested blocks", "let n integer = 3\nwhile n > 0\n    if n % 2 == 0\n        print n\n    set n = n - 1"],
		["comment after code", "print 1 # one"],
		["call arguments", "def f(a integer, b integer) returns integer\n    return a\nprint f(1, 2)"],
		["negative literal", "print -5"],
	])("%s", (_label, src) => {
		expect(() => lint(src)).not.toThrow();
	});
});

describe("5b. Whole-file rules", () => {

	test("empty program", () => {
		expect(located(styleError(""))).toEqual(["Program must not be empty", 1, 1]);
		expect(located(styleError("   "))).toEqual(["Program must not be empty", 1, 1]);
	});

	test("carriage return", () => {
		expect(located(styleError("print 1\r\nprint 2"))).toEqual(["Carriage return newlines not allowed; use \\n only", 1, 8]);
	});

	test("leading newline", () => {
		expect(located(styleError("\nprint 1"))).toEqual(["Leading newlines not allowed", 1, 1]);
	});

	test("trailing newline", () => {
		expect(located(styleError("print 1\n"))).toEqual(["Trailing newlines not allowed", 2, 1]);
	});

	test("more than one blank line", () => {
		expect(located(styleError("print 1\n\n\nprint 2"))).toEqual(["Too many consecutive newlines: maximum 2 allowed", 3, 1]);
	});
});

describe("5c. Line rules", () => {

	test("trailing spaces", () => {
		expect(located(styleError("print 1 \nprint 2"))).toEqual(["Trailing spaces not allowed", 1, 8]);
	});

	test("indentation not a multiple of four", () => {
		expect(located(styleError("if true\n      print 1", false)))
			.toEqual(["Indentation must be in multiples of 4 spaces", 2, 5]);
	});

	test("two statements on one line", () => {
		expect(located(styleError("let x integer = 1 print x"))).toEqual(["Statements must be separated by a newline", 1, 19]);
	});

	test("keywords inside a comment do not count", () => {
		expect(() => lint("print 1 # then print 2")).not.toThrow();
	});
});

describe("5d. Token spacing", () => {

	test("double space between tokens", () => {
		expect(located(styleError("let x integer  = 1"))).toEqual(["Multiple spaces not allowed between tokens", 1, 14]);
	});

	test("double space before a comment", () => {
		expect(located(styleError("print 1  # c"))).toEqual(["Multiple spaces not allowed between tokens", 1, 8]);
	});

	test("operator glued to an identifier", () => {
		expect(located(styleError("print x+1"))).toEqual(["Expected space before operator '+'", 1, 8]);
	});

	test("operator glued to a number", () => {
		expect(located(styleError("print 1<2"))).toEqual(["Expected space before operator '<'", 1, 8]);
	});

	test("identifier glued to a digit", () => {
		expect(located(styleError("print x1"))).toEqual(["Expected space after identifier 'x'", 1, 8]);
	});

	test("number glued to a letter", () => {
		expect(located(styleError("print 12abc"))).toEqual(["Expected space after number '12'", 1, 9]);
	});

	test("comment glued to code", () => {
		expect(located(styleError("print 1# c"))).toEqual(["Comments must be separated from code by exactly one space", 1, 8]);
	});

	test("comment line indented inside a block", () => {
		expect(located(styleError("if true\n    # note\n    print 1"))).toEqual(["Comments must be separated from code by exactly one space", 2, 5]);
	});

	test("space before a comma", () => {
		expect(located(styleError("print f(1 , 2)"))).toEqual(["Space before comma not allowed", 1, 11]);
	});

	test("no space after a comma", () => {
		expect(located(styleError("print f(1,2)"))).toEqual(["Space required after comma", 1, 10]);
	});
});
