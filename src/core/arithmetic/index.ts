export { Calculator } from "./calculator";
export { DEFAULT_CALCULATOR_OPTIONS, OPERATIONS, OPERATION_NAMES } from "./config";
export { runCalculatorDemo } from "./demo";
export type { CalculatorDemoResult } from "./demo";
export { CalculatorError, DomainError, ExpressionError } from "./errors";
export { evaluateExpression, parseExpression } from "./expression";
export { add, divide, multiply, power, subtract } from "./operations";

export type {
	CalculatorOptions,
	Expression,
	OperationName,
	OperatorSymbol,
} from "./types/core";
