import type { Result } from "../../types/misc";
import type { Calculator } from "./calculator";
import { OPERATIONS } from "./config";
import { ExpressionError } from "./errors";
import type { Expression, OperatorSymbol } from "./types/core";

const NUMBER = String.raw`-?\d+(?:\.\d+)?`;
const EXPRESSION_PATTERN = new RegExp(
	String.raw`^\s*(${NUMBER})\s*([-+*/^])\s*(${NUMBER})\s*$`,
);

function isOperator(value: string): value is OperatorSymbol {
	return Object.hasOwn(OPERATIONS, value);
}

/**
 * Parses a binary expression such as `5 + 3` or `-2^3`.
 */
export function parseExpression(input: string): Result<Expression, ExpressionError> {
	const match = EXPRESSION_PATTERN.exec(input);
	if (!match) {
		return {
			ok: false,
			error: new ExpressionError("expected '<number> <operator> <number>'", input),
		};
	}

	const [, left = "", operator = "", right = ""] = match;
	if (!isOperator(operator)) {
		return { ok: false, error: new ExpressionError(`unknown operator '${operator}'`, input) };
	}

	const leftValue = Number(left);
	const rightValue = Number(right);
	if (!Number.isFinite(leftValue) || !Number.isFinite(rightValue)) {
		return { ok: false, error: new ExpressionError("operands must be finite numbers", input) };
	}

	return {
		ok: true,
		value: { left: leftValue, operator, right: rightValue },
	};
}

/**
 * Runs an expression on the calculator so that it lands in its history.
 */
export function evaluateExpression(calculator: Calculator, expression: Expression): number {
	const { left, operator, right } = expression;
	return calculator[OPERATIONS[operator]](left, right);
}
