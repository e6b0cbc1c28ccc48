export class CalculatorError extends Error {
	constructor(
		message: string,
		public readonly cause?: Error,
	) {
		super(message);
		this.name = "CalculatorError";
	}
}

/**
 * Raised when an operand lies outside the domain of the operation.
 */
export class DomainError extends CalculatorError {
	constructor(
		message: string,
		public readonly operation: string,
	) {
		super(message);
		this.name = "DomainError";
	}
}

export class ExpressionError extends CalculatorError {
	constructor(
		message: string,
		public readonly expression: string,
	) {
		super(`Invalid expression '${expression}': ${message}`);
		this.name = "ExpressionError";
	}
}
