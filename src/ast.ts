import type { Position } from "./errors";

export type KeywordTokenType =
	| "LET"
	| "PRINT"
	| "TRUE"
	| "FALSE"
	| "IF"
	| "WHILE"
	| "SET"
	| "INTEGER_TYPE"
	| "BOOLEAN_TYPE"
	| "FLOAT_TYPE"
	| "DEF"
	| "RETURNS"
	| "RETURN"
	| "LIST"
	| "OF"
	| "REPEAT"
	| "LEN"
	| "AND"
	| "OR"
	| "NOT";

export type SymbolTokenType =
	| "PLUS"
	| "MINUS"
	| "MULTIPLY"
	| "DIVIDE"
	| "MODULUS"
	| "LEFT_PAREN"
	| "RIGHT_PAREN"
	| "EQUALS"
	| "LESS_THAN"
	| "GREATER_THAN"
	| "LESS_EQUAL"
	| "GREATER_EQUAL"
	| "EQUAL_EQUAL"
	| "NOT_EQUAL"
	| "COMMA"
	| "LEFT_BRACKET"
	| "RIGHT_BRACKET";

export type LayoutTokenType = "INDENT" | "DEDENT" | "STATEMENT_SEPARATOR" | "COMMENT";

export type SimpleTokenType = KeywordTokenType | SymbolTokenType | LayoutTokenType;

export type Token = (
	| { type: SimpleTokenType }
	| { type: "INTEGER"; value: bigint }
	| { type: "FLOAT"; value: number }
	| { type: "IDENTIFIER"; name: string }
) & Position;

export type TokenType = Token["type"];

// Types

export type ScalarType = "integer" | "boolean" | "float";

export type ListType = { kind: "list"; element: ScalarType };

export type MetricType = ScalarType | ListType;

export function listOf(element: ScalarType): ListType {
	return { kind: "list", element };
}

export function isListType(t: MetricType): t is ListType {
	return typeof t === "object";
}

export function typesEqual(a: MetricType, b: MetricType): boolean {
	if (isListType(a) && isListType(b)) return a.element === b.element;
	return a === b;
}

export function typeToString(t: MetricType): string {
	return isListType(t) ? `list of ${t.element}` : t;
}

// Expressions

export type BinaryOperator =
	| "Addition"
	| "Subtraction"
	| "Multiplication"
	| "Division"
	| "Modulus"
	| "LessThan"
	| "GreaterThan"
	| "LessThanOrEqual"
	| "GreaterThanOrEqual"
	| "EqualEqual"
	| "NotEqual"
	| "And"
	| "Or";

export type UnaryOperator = "Not";

export type Expression =
	| { type: "IntegerLiteral"; value: bigint }
	| { type: "FloatLiteral"; value: number }
	| { type: "BooleanLiteral"; value: boolean }
	| { type: "Variable"; name: string }
	| { type: "UnaryExpression"; operator: UnaryOperator; operand: Expression }
	| { type: "BinaryExpression"; left: Expression; operator: BinaryOperator; right: Expression }
	| { type: "FunctionCall"; name: string; args: Expression[] }
	| { type: "ListLiteral"; elements: Expression[] }
	| { type: "ListAccess"; list: Expression; index: Expression }
	| { type: "RepeatCall"; value: Expression; count: Expression }
	| { type: "LenCall"; list: Expression };

// Statements

export type Parameter = { name: string; type: MetricType };

type Located = { pos?: Position };

export type Statement = Located & (
	| { type: "Let"; name: string; annotation: MetricType; expression: Expression }
	| { type: "Set"; name: string; expression: Expression }
	| { type: "ListAssignment"; name: string; index: Expression; value: Expression }
	| { type: "Print"; expression: Expression }
	| { type: "If"; condition: Expression; body: Statement[] }
	| { type: "While"; condition: Expression; body: Statement[] }
	| { type: "Comment" }
	| { type: "FunctionDeclaration"; name: string; params: Parameter[]; returnType: MetricType; body: Statement[] }
	| { type: "Return"; expression: Expression }
);

export type Program = Statement[];

export type StatementOf<K extends Statement["type"]> = Extract<Statement, { type: K }>;

export type ExpressionOf<K extends Expression["type"]> = Extract<Expression, { type: K }>;
