import type { Logger } from "@core/logging";

export type OperatorSymbol = "+" | "-" | "*" | "/" | "^";

export type OperationName = "add" | "subtract" | "multiply" | "divide" | "power";

export interface CalculatorOptions {
	readonly echo?: boolean;
	readonly logger?: Logger;
}

export interface Expression {
	readonly left: number;
	readonly operator: OperatorSymbol;
	readonly right: number;
}
