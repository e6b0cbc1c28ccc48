import type { OperationName, OperatorSymbol } from "./types/core";

export const DEFAULT_CALCULATOR_OPTIONS = {
	echo: true,
} as const;

export const OPERATIONS: Readonly<Record<OperatorSymbol, OperationName>> = {
	"+": "add",
	"-": "subtract",
	"*": "multiply",
	"/": "divide",
	"^": "power",
};

export const OPERATION_NAMES: readonly OperationName[] = [
	"add",
	"subtract",
	"multiply",
	"divide",
	"power",
];
