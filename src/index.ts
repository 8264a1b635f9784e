export * from "./ast";
export * from "./errors";
export { tokenize, keywords } from "./lexer";
export { validateStyle } from "./style";
export { parse } from "./parser";
export { TypeChecker, typeCheck } from "./typechecker";
export {
	CostCounter,
	Environment,
	createRuntime,
	evaluateExpression,
	execute,
	executeBlock,
	executeStatement,
	formatFloat,
	formatValue,
	isTruthy,
	kindOf,
	valuesEqual,
	type ExecuteOptions,
	type ExecutionResult,
	type Runtime,
	type RuntimeValue,
	type ScalarValue,
	type StatementOutcome,
} from "./evaluator";
export { runMetric, type RunOptions, type RunResult } from "./metric";
