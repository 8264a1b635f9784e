export interface Position {
	line: number;
	column: number;
}

export const UNKNOWN_POSITION: Position = { line: 0, column: 0 };

export abstract class CompilerError extends Error {
	abstract readonly kind: string;
	readonly line: number;
	readonly column: number;

	constructor(message: string, pos: Position = UNKNOWN_POSITION) {
		super(message);
		this.name = new.target.name;
		this.line = pos.line;
		this.column = pos.column;
	}

	format(): string {
		return `[Line ${this.line}, Column ${this.column}] ${this.kind} Error | ${this.message}`;
	}

	toString(): string {
		return this.format();
	}
}

export class TokenizerError extends CompilerError {
	readonly kind = "Tokenizer";
}

export class StyleError extends CompilerError {
	readonly kind = "Style";
}

export class ParseError extends CompilerError {
	readonly kind = "Parse";
}

export class TypeCheckError extends CompilerError {
	readonly kind = "TypeCheck";
}

export class EvaluationError extends CompilerError {
	readonly kind = "Evaluation";
}

export function isCompilerError(e: unknown): e is CompilerError {
	return e instanceof CompilerError;
}
