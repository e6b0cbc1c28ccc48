import { InvalidArgumentError } from "commander";
import { OPERATION_NAMES, type OperationName } from "@core/arithmetic";
import type { Result } from "../types/misc";

export function parseOperand(value: string): Result<number> {
	const parsed = Number(value);
	if (value.trim() === "" || !Number.isFinite(parsed)) {
		return { ok: false, error: new Error(`'${value}' is not a number`) };
	}
	return { ok: true, value: parsed };
}

export function parseOperation(value: string): Result<OperationName> {
	const operation = OPERATION_NAMES.find((name) => name === value);
	if (operation === undefined) {
		return {
			ok: false,
			error: new Error(`Unknown operation '${value}', expected one of: ${OPERATION_NAMES.join(", ")}`),
		};
	}
	return { ok: true, value: operation };
}

/**
 * Option parser for integer flags such as `--latency`.
 */
export function parseInteger(value: string): number {
	const parsed = Number(value);
	if (value.trim() === "" || !Number.isInteger(parsed)) {
		throw new InvalidArgumentError("Not an integer.");
	}
	return parsed;
}
