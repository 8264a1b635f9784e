import type { KeywordTokenType, SimpleTokenType, Token } from "./ast";
import { TokenizerError } from "./errors";

const INDENT_WIDTH = 4;

export const keywords: ReadonlyMap<string, KeywordTokenType> = new Map<string, KeywordTokenType>([
	["let", "LET"],
	["print", "PRINT"],
	["true", "TRUE"],
	["false", "FALSE"],
	["if", "IF"],
	["while", "WHILE"],
	["set", "SET"],
	["integer", "INTEGER_TYPE"],
	["boolean", "BOOLEAN_TYPE"],
	["float", "FLOAT_TYPE"],
	["def", "DEF"],
	["returns", "RETURNS"],
	["return", "RETURN"],
	["list", "LIST"],
	["of", "OF"],
	["repeat", "REPEAT"],
	["len", "LEN"],
	["and", "AND"],
	["or", "OR"],
	["not", "NOT"],
]);

const twoCharOperators: ReadonlyMap<string, SimpleTokenType> = new Map<string, SimpleTokenType>([
	["==", "EQUAL_EQUAL"],
	["!=", "NOT_EQUAL"],
	["<=", "LESS_EQUAL"],
	[">=", "GREATER_EQUAL"],
]);

const oneCharOperators: ReadonlyMap<string, SimpleTokenType> = new Map<string, SimpleTokenType>([
	["+", "PLUS"],
	["-", "MINUS"],
	["*", "MULTIPLY"],
	["/", "DIVIDE"],
	["%", "MODULUS"],
	["(", "LEFT_PAREN"],
	[")", "RIGHT_PAREN"],
	["=", "EQUALS"],
	["<", "LESS_THAN"],
	[">", "GREATER_THAN"],
	[",", "COMMA"],
	["[", "LEFT_BRACKET"],
	["]", "RIGHT_BRACKET"],
]);

const isDigit = (c: string | undefined) => c !== undefined && /[0-9]/.test(c);
const isAlpha = (c: string | undefined) => c !== undefined && /\p{L}/u.test(c);

export function tokenize(input: string): Token[] {
	const lines = input.split("\n");
	const tokens: Token[] = [];
	const indentStack = [0];

	let lastContentLine = -1;
	lines.forEach((line, idx) => {
		if (line.trim() !== "") lastContentLine = idx;
	});

	for (let idx = 0; idx < lines.length; idx++) {
		const line = lines[idx];
		const lineNo = idx + 1;
		if (line.trim() === "") continue;

		let spaces = 0;
		while (line[spaces] === " ") spaces++;

		if (spaces % INDENT_WIDTH !== 0) {
			throw new TokenizerError(
				"Invalid indentation: expected multiples of 4 spaces",
				{ line: lineNo, column: spaces - (spaces % INDENT_WIDTH) + 1 }
			);
		}

		const depth = spaces / INDENT_WIDTH;
		const top = () => indentStack[indentStack.length - 1];
		const at = { line: lineNo, column: 1 };

		if (depth > top()) {
			if (depth !== top() + 1) {
				throw new TokenizerError(`Invalid indentation: expected ${(top() + 1) * INDENT_WIDTH} spaces`, at);
			}
			indentStack.push(depth);
			tokens.push({ type: "INDENT", ...at });
		} else if (depth < top()) {
			while (indentStack.length > 1 && top() > depth) {
				indentStack.pop();
				tokens.push({ type: "DEDENT", ...at });
			}
			if (top() !== depth) {
				throw new TokenizerError(`Invalid indentation: expected ${top() * INDENT_WIDTH} spaces`, at);
			}
		}

		tokens.push(...lexLine(line, spaces, lineNo));

		if (idx < lastContentLine) {
			tokens.push({ type: "STATEMENT_SEPARATOR", line: lineNo, column: line.length + 1 });
		}
	}

	const end = { line: lastContentLine + 1, column: 1 };
	while (indentStack.length > 1) {
		indentStack.pop();
		tokens.push({ type: "DEDENT", ...end });
	}

	return tokens;
}

function lexLine(line: string, start: number, lineNo: number): Token[] {
	const tokens: Token[] = [];
	let i = start;

	const pos = (at: number) => ({ line: lineNo, column: at + 1 });
	const fail = (msg: string, at: number): never => {
		throw new TokenizerError(msg, pos(at));
	};

	while (i < line.length) {
		const ch = line[i];

		if (ch === " " || ch === "\r") {
			i++;
			continue;
		}

		if (ch === "#") {
			tokens.push({ type: "COMMENT", ...pos(i) });
			break;
		}

		const pair = twoCharOperators.get(line.slice(i, i + 2));
		if (pair) {
			tokens.push({ type: pair, ...pos(i) });
			i += 2;
			continue;
		}

		// "-5" is a single literal, "x - 5" is three tokens
		if (isDigit(ch) || (ch === "-" && isDigit(line[i + 1]))) {
			const begin = i;
			if (ch === "-") i++;
			while (isDigit(line[i])) i++;
			if (line[i] === ".") {
				i++;
				const fraction = i;
				while (isDigit(line[i])) i++;
				if (i === fraction) fail("Invalid float: missing digits after decimal point", i - 1);
				tokens.push({ type: "FLOAT", value: Number(line.slice(begin, i)), ...pos(begin) });
			} else {
				tokens.push({ type: "INTEGER", value: BigInt(line.slice(begin, i)), ...pos(begin) });
			}
			continue;
		}

		const single = oneCharOperators.get(ch);
		if (single) {
			tokens.push({ type: single, ...pos(i) });
			i++;
			continue;
		}

		if (isAlpha(ch)) {
			const begin = i;
			while (isAlpha(line[i])) i++;
			const word = line.slice(begin, i);
			const keyword = keywords.get(word);
			tokens.push(keyword ? { type: keyword, ...pos(begin) } : { type: "IDENTIFIER", name: word, ...pos(begin) });
			continue;
		}

		fail(`Unexpected character: ${ch === "\t" ? "\\t" : ch}`, i);
	}

	return tokens;
}
