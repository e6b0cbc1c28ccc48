#!/usr/bin/env tsx

import packageJson from "../../package.json" with { type: "json" };
import { toError } from "../types/misc";
import { createCliContext } from "./context";
import { createProgram } from "./program";

const context = createCliContext();
const program = createProgram(packageJson.version, context);

// Parse command line arguments
try {
	await program.parseAsync();
} catch (error) {
	context.logger.error(toError(error).message);
	context.exitCode = 1;
}

process.exitCode = context.exitCode;
