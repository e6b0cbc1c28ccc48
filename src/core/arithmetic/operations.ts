import { DomainError } from "./errors";

export function add(a: number, b: number): number {
	return a + b;
}

export function subtract(a: number, b: number): number {
	return a - b;
}

/**
 * Multiplies by repeated addition of `x`, once per `i < y`.
 * A negative `y` never enters the loop, so the product is 0.
 */
export function multiply(x: number, y: number): number {
	let result = 0;
	for (let i = 0; i < y; i++) {
		result = add(result, x);
	}
	return result;
}

/**
 * @throws {DomainError} when `b` is zero
 */
export function divide(a: number, b: number): number {
	if (b === 0) {
		throw new DomainError("Division by zero", "divide");
	}
	return a / b;
}

/**
 * Raises `base` to `exponent` through repeated {@link multiply}.
 *
 * Starts from `base` and multiplies `exponent - 1` more times, so any
 * negative exponent returns `base` unchanged, and a negative base with an
 * exponent of 2 or more inherits `multiply`'s zero result.
 */
export const power = (base: number, exponent: number): number => {
	if (exponent === 0) return 1;

	let result = base;
	for (let i = 1; i < exponent; i++) {
		result = multiply(result, base);
	}
	return result;
};
