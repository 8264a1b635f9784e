import type { Token } from "./ast";
import { StyleError } from "./errors";

const STATEMENT_KEYWORDS = new Set(["let", "print", "if", "while", "set", "def", "return"]);
const OPERATOR_CHARS = new Set(["+", "-", "*", "/", "%", "=", "<", ">", "!"]);

const isLetter = (c: string | undefined) => c !== undefined && /\p{L}/u.test(c);
const isDigit = (c: string | undefined) => c !== undefined && /[0-9]/.test(c);
const isAlnum = (c: string | undefined) => c !== undefined && /[\p{L}\p{N}]/u.test(c);

const codeOf = (line: string) => line.split("#", 1)[0];
const indentOf = (line: string) => line.length - line.replace(/^ +/, "").length;

type LineRule = (line: string, lineNo: number) => void;

function fail(message: string, line: number, column: number): never {
	throw new StyleError(message, { line, column });
}

function forEachLine(source: string, rule: LineRule) {
	source.split("\n").forEach((line, idx) => rule(line, idx + 1));
}

function checkNotEmpty(source: string) {
	if (source.trim() === "") fail("Program must not be empty", 1, 1);
}

function checkLineEndings(source: string) {
	const at = source.indexOf("\r");
	if (at === -1) return;
	const before = source.slice(0, at);
	const line = before.split("\n").length;
	fail("Carriage return newlines not allowed; use \\n only", line, at - before.lastIndexOf("\n"));
}

function checkOuterNewlines(source: string) {
	if (source.startsWith("\n")) fail("Leading newlines not allowed", 1, 1);
	if (source.endsWith("\n")) fail("Trailing newlines not allowed", source.split("\n").length, 1);
}

function checkConsecutiveNewlines(source: string) {
	let run = 0;
	let line = 1;
	for (const ch of source) {
		if (ch !== "\n") {
			run = 0;
			continue;
		}
		if (++run > 2) fail("Too many consecutive newlines: maximum 2 allowed", line, 1);
		line++;
	}
}

const checkLineWhitespace: LineRule = (line, lineNo) => {
	if (line.endsWith(" ")) fail("Trailing spaces not allowed", lineNo, line.trimEnd().length + 1);

	const leading = indentOf(line);
	if (leading % 4 !== 0) {
		fail("Indentation must be in multiples of 4 spaces", lineNo, leading - (leading % 4) + 1);
	}
};

const checkOneStatementPerLine: LineRule = (line, lineNo) => {
	const wordPattern = /\S+/g;
	const code = codeOf(line);
	let seen = 0;
	for (let m = wordPattern.exec(code); m !== null; m = wordPattern.exec(code)) {
		if (STATEMENT_KEYWORDS.has(m[0]) && ++seen === 2) {
			fail("Statements must be separated by a newline", lineNo, m.index + 1);
		}
	}
};

function checkMultipleSpaces(code: string, lineNo: number) {
	const at = code.indexOf("  ", indentOf(code));
	if (at !== -1) fail("Multiple spaces not allowed between tokens", lineNo, at + 1);
}

function checkOperatorSpacing(code: string, lineNo: number) {
	for (let i = 1; i < code.length; i++) {
		if (OPERATOR_CHARS.has(code[i]) && isAlnum(code[i - 1])) {
			fail(`Expected space before operator '${code[i]}'`, lineNo, i + 1);
		}
	}
}

function checkWordSpacing(code: string, lineNo: number) {
	let i = 0;
	while (i < code.length) {
		const begin = i;
		if (isLetter(code[i])) {
			while (isLetter(code[i])) i++;
			if (isAlnum(code[i])) fail(`Expected space after identifier '${code.slice(begin, i)}'`, lineNo, i + 1);
		} else if (isDigit(code[i])) {
			while (isDigit(code[i]) || code[i] === ".") i++;
			if (isAlnum(code[i])) fail(`Expected space after number '${code.slice(begin, i)}'`, lineNo, i + 1);
		} else {
			i++;
		}
	}
}

const checkTokenSpacing: LineRule = (line, lineNo) => {
	const code = codeOf(line);
	if (code.trim() === "") return;
	checkMultipleSpaces(code, lineNo);
	checkOperatorSpacing(code, lineNo);
	checkWordSpacing(code, lineNo);
};

const checkCommentSpacing: LineRule = (line, lineNo) => {
	const at = line.indexOf("#");
	// a comment in the first column stands alone; anywhere else it takes exactly one space
	if (at <= 0) return;
	if (line[at - 1] !== " " || line[at - 2] === " ") {
		fail("Comments must be separated from code by exactly one space", lineNo, at + 1);
	}
};

const checkCommaSpacing: LineRule = (line, lineNo) => {
	const code = codeOf(line);
	for (let i = 0; i < code.length; i++) {
		if (code[i] !== ",") continue;
		if (code[i - 1] === " ") fail("Space before comma not allowed", lineNo, i + 1);
		if (code[i + 1] !== " ") fail("Space required after comma", lineNo, i + 1);
	}
};

/**
 * Enforces the canonical layout of a Metric program. Runs after tokenizing, so the
 * source is already known to be lexically valid; the first violated rule is reported.
 */
export function validateStyle(source: string, _tokens: readonly Token[]): void {
	checkNotEmpty(source);
	checkLineEndings(source);
	checkOuterNewlines(source);
	checkConsecutiveNewlines(source);

	forEachLine(source, checkLineWhitespace);
	forEachLine(source, checkOneStatementPerLine);
	forEachLine(source, checkTokenSpacing);
	forEachLine(source, checkCommentSpacing);
	forEachLine(source, checkCommaSpacing);
}
