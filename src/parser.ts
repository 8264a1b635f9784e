import type {
	BinaryOperator,
	Expression,
	MetricType,
	Parameter,
	Program,
	ScalarType,
	Statement,
	Token,
	TokenType,
} from "./ast";
import { ParseError, type Position } from "./errors";

const STATEMENT_EXPECTED = "Expected 'let', 'print', 'if', 'while', 'set', 'def', 'return', or comment statement";
const FACTOR_EXPECTED = "Expected integer, float, identifier, boolean, or opening parenthesis";

type OperatorTable = ReadonlyMap<TokenType, BinaryOperator>;

const orOperators: OperatorTable = new Map<TokenType, BinaryOperator>([["OR", "Or"]]);
const andOperators: OperatorTable = new Map<TokenType, BinaryOperator>([["AND", "And"]]);
const comparisonOperators: OperatorTable = new Map<TokenType, BinaryOperator>([
	["LESS_THAN", "LessThan"],
	["GREATER_THAN", "GreaterThan"],
	["LESS_EQUAL", "LessThanOrEqual"],
	["GREATER_EQUAL", "GreaterThanOrEqual"],
	["EQUAL_EQUAL", "EqualEqual"],
	["NOT_EQUAL", "NotEqual"],
]);
const additiveOperators: OperatorTable = new Map<TokenType, BinaryOperator>([
	["PLUS", "Addition"],
	["MINUS", "Subtraction"],
]);
const multiplicativeOperators: OperatorTable = new Map<TokenType, BinaryOperator>([
	["MULTIPLY", "Multiplication"],
	["DIVIDE", "Division"],
	["MODULUS", "Modulus"],
]);

const scalarTypes: ReadonlyMap<TokenType, ScalarType> = new Map<TokenType, ScalarType>([
	["INTEGER_TYPE", "integer"],
	["BOOLEAN_TYPE", "boolean"],
	["FLOAT_TYPE", "float"],
]);

export function parse(tokens: readonly Token[]): Program {
	let pos = 0;

	const peek = (offset = 0): Token | undefined => tokens[pos + offset];
	const at = (type: TokenType, offset = 0) => peek(offset)?.type === type;
	const remaining = () => tokens.length - pos;

	const where = (): Position => {
		const t = peek() ?? tokens[tokens.length - 1];
		return t ? { line: t.line, column: t.column } : { line: 1, column: 1 };
	};
	const fail = (message: string): never => {
		throw new ParseError(message, where());
	};
	const expect = (type: TokenType, message: string) => {
		if (!at(type)) fail(message);
		pos++;
	};

	function binaryRest(left: Expression, operators: OperatorTable, next: () => Expression): Expression {
		for (let t = peek(); t && operators.has(t.type); t = peek()) {
			const operator = operators.get(t.type);
			if (!operator) break;
			pos++;
			left = { type: "BinaryExpression", left, operator, right: next() };
		}
		return left;
	}

	function parseExpression(): Expression {
		return parseOr();
	}

	function parseOr(): Expression {
		return binaryRest(parseAnd(), orOperators, parseAnd);
	}

	function parseAnd(): Expression {
		return binaryRest(parseNot(), andOperators, parseNot);
	}

	function parseNot(): Expression {
		if (at("NOT")) {
			pos++;
			return { type: "UnaryExpression", operator: "Not", operand: parseNot() };
		}
		return parseComparison();
	}

	function parseComparison(): Expression {
		return binaryRest(parseAdditive(), comparisonOperators, parseAdditive);
	}

	function parseAdditive(): Expression {
		return binaryRest(parseMultiplicative(), additiveOperators, parseMultiplicative);
	}

	function parseMultiplicative(): Expression {
		return binaryRest(parseFactor(), multiplicativeOperators, parseFactor);
	}

	function parseArguments(closeMessage: string): Expression[] {
		const args: Expression[] = [];
		if (peek() && !at("RIGHT_PAREN")) {
			args.push(parseExpression());
			while (at("COMMA")) {
				pos++;
				args.push(parseExpression());
			}
		}
		expect("RIGHT_PAREN", closeMessage);
		return args;
	}

	function parseFactor(): Expression {
		const t = peek();
		if (!t) return fail(FACTOR_EXPECTED);

		switch (t.type) {
			case "INTEGER":
				pos++;
				return { type: "IntegerLiteral", value: t.value };
			case "FLOAT":
				pos++;
				return { type: "FloatLiteral", value: t.value };
			case "TRUE":
			case "FALSE":
				pos++;
				return { type: "BooleanLiteral", value: t.type === "TRUE" };
			case "IDENTIFIER": {
				pos++;
				if (at("LEFT_PAREN")) {
					pos++;
					return { type: "FunctionCall", name: t.name, args: parseArguments("Expected ')' after function arguments") };
				}
				if (at("LEFT_BRACKET")) {
					pos++;
					const index = parseExpression();
					expect("RIGHT_BRACKET", "Expected ']' after list index");
					return { type: "ListAccess", list: { type: "Variable", name: t.name }, index };
				}
				return { type: "Variable", name: t.name };
			}
			case "LEFT_PAREN": {
				pos++;
				const inner = parseExpression();
				expect("RIGHT_PAREN", "Expected closing parenthesis");
				return inner;
			}
			case "LEFT_BRACKET": {
				pos++;
				const elements: Expression[] = [];
				if (at("RIGHT_BRACKET")) {
					pos++;
					return { type: "ListLiteral", elements };
				}
				if (peek()) elements.push(parseExpression());
				while (at("COMMA")) {
					pos++;
					elements.push(parseExpression());
				}
				expect("RIGHT_BRACKET", "Expected ']' after list elements");
				return { type: "ListLiteral", elements };
			}
			case "REPEAT": {
				if (!at("LEFT_PAREN", 1)) fail("Expected '(' after 'repeat'");
				pos += 2;
				const value = parseExpression();
				expect("COMMA", "Expected ',' after repeat value");
				const count = parseExpression();
				expect("RIGHT_PAREN", "Expected ')' after repeat arguments");
				return { type: "RepeatCall", value, count };
			}
			case "LEN": {
				if (!at("LEFT_PAREN", 1)) fail("Expected '(' after 'len'");
				pos += 2;
				const list = parseExpression();
				expect("RIGHT_PAREN", "Expected ')' after len argument");
				return { type: "LenCall", list };
			}
			default:
				return fail(FACTOR_EXPECTED);
		}
	}

	function parseScalarType(): ScalarType {
		const t = peek();
		const scalar = t && scalarTypes.get(t.type);
		if (!scalar) return fail("Expected type annotation (integer, boolean, or float)");
		pos++;
		return scalar;
	}

	function parseType(): MetricType {
		if (!peek()) fail("Expected type");
		if (at("LIST")) {
			if (remaining() < 3 || !at("OF", 1)) fail("Expected 'of' after 'list'");
			pos += 2;
			return { kind: "list", element: parseScalarType() };
		}
		return parseScalarType();
	}

	function identifierAt(offset: number): string | undefined {
		const t = peek(offset);
		return t?.type === "IDENTIFIER" ? t.name : undefined;
	}

	function parseBlock(): Statement[] {
		const body: Statement[] = [];
		while (peek() && !at("DEDENT")) {
			if (at("STATEMENT_SEPARATOR") || at("INDENT")) {
				pos++;
				continue;
			}
			body.push(parseStatement());
		}
		return body;
	}

	function parseLet(): Statement {
		const name = identifierAt(1);
		if (remaining() < 5 || name === undefined) return fail("Expected 'let identifier type = expression'");
		pos += 2;
		const annotation = parseType();
		expect("EQUALS", "Expected '=' after type annotation");
		return { type: "Let", name, annotation, expression: parseExpression() };
	}

	function parsePrint(): Statement {
		pos++;
		return { type: "Print", expression: parseExpression() };
	}

	function parseSet(): Statement {
		const name = identifierAt(1);
		if (remaining() < 4 || name === undefined) return fail("Expected 'set identifier = expression'");
		pos += 2;

		if (at("LEFT_BRACKET")) {
			pos++;
			const index = parseExpression();
			expect("RIGHT_BRACKET", "Expected ']' after list index");
			expect("EQUALS", "Expected '=' after list index");
			return { type: "ListAssignment", name, index, value: parseExpression() };
		}
		if (at("EQUALS")) {
			pos++;
			return { type: "Set", name, expression: parseExpression() };
		}
		return fail("Expected 'set identifier = expression'");
	}

	function parseControlFlow(keyword: "if" | "while"): { condition: Expression; body: Statement[] } {
		pos++;
		if (!peek()) fail(`Expected expression after '${keyword}'`);
		const condition = parseExpression();
		expect("STATEMENT_SEPARATOR", `Expected newline after '${keyword}' condition`);
		expect("INDENT", `Expected indented block after '${keyword}'`);
		const body = parseBlock();
		expect("DEDENT", `Expected dedent after '${keyword}' body`);
		return { condition, body };
	}

	function parseParameter(missingName: string): Parameter {
		const name = identifierAt(0);
		if (name === undefined) return fail(missingName);
		pos++;
		if (!peek()) fail("Expected parameter type");
		return { name, type: parseType() };
	}

	function parseFunctionDeclaration(): Statement {
		if (remaining() < 6) return fail("Expected 'def identifier(parameters) returns type'");
		const name = identifierAt(1);
		if (name === undefined) return fail("Expected function name");
		pos += 2;
		expect("LEFT_PAREN", "Expected '(' after function name");

		const params: Parameter[] = [];
		if (!at("RIGHT_PAREN")) {
			params.push(parseParameter("Expected parameter name"));
			while (at("COMMA")) {
				pos++;
				params.push(parseParameter("Expected parameter name after comma"));
			}
		}
		expect("RIGHT_PAREN", "Expected ')' after parameters");
		expect("RETURNS", "Expected 'returns'");
		if (!peek()) fail("Expected return type");
		const returnType = parseType();

		expect("STATEMENT_SEPARATOR", "Expected newline after function signature");
		expect("INDENT", "Expected indented function body");
		const body = parseBlock();
		expect("DEDENT", "Expected dedent after function body");

		return { type: "FunctionDeclaration", name, params, returnType, body };
	}

	function parseReturn(): Statement {
		if (remaining() < 2) return fail("Expected 'return expression'");
		pos++;
		return { type: "Return", expression: parseExpression() };
	}

	const statementParsers: Partial<Record<TokenType, () => Statement>> = {
		LET: parseLet,
		PRINT: parsePrint,
		IF: () => ({ type: "If", ...parseControlFlow("if") }),
		WHILE: () => ({ type: "While", ...parseControlFlow("while") }),
		SET: parseSet,
		COMMENT: () => {
			pos++;
			return { type: "Comment" };
		},
		DEF: parseFunctionDeclaration,
		RETURN: parseReturn,
	};

	function parseStatement(): Statement {
		const t = peek();
		const parser = t && statementParsers[t.type];
		if (!t || !parser) return fail(STATEMENT_EXPECTED);
		const stmt = parser();
		stmt.pos = { line: t.line, column: t.column };
		return stmt;
	}

	const program: Program = [];
	while (peek()) {
		if (at("STATEMENT_SEPARATOR")) {
			pos++;
			continue;
		}
		program.push(parseStatement());
		if (at("STATEMENT_SEPARATOR")) pos++;
	}
	return program;
}
