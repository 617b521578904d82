// SPDX-License-Identifier: MIT
// Settle Runner
// Source text in, evaluated environment out.

import type { Declaration, Program } from "./ast.js";
import { createEnvironment, type Environment } from "./env.js";
import { errResult, okResult, type Result, type SettleError } from "./errors.js";
import { evaluateDeclaration, type DeclarationResult } from "./evaluator.js";
import { formatDeclarationResult, formatTypeShape, formatValue } from "./format.js";
import { parseSource } from "./parser.js";
import type { OperatorRegistry } from "./domains/registry.js";

export interface RunOptions {
	/** Environment to evaluate into; a fresh one by default */
	env?: Environment;
	registry?: OperatorRegistry;
	/** Keep going after a failing declaration instead of stopping */
	continueOnError?: boolean;
	/** Called after each declaration, in program order */
	onOutcome?: (outcome: DeclarationOutcome) => void;
}

export interface DeclarationOutcome {
	declaration: Declaration;
	result: Result<DeclarationResult>;
}

export interface DeclarationFailure {
	declaration: Declaration;
	error: SettleError;
}

export interface RunOutput {
	program: Program;
	env: Environment;
	results: DeclarationResult[];
	/** Empty unless `continueOnError` was set and something failed */
	failures: DeclarationFailure[];
}

/**
 * Parse and evaluate a whole program.
 *
 * A syntax error fails the run outright. Without `continueOnError`, the first
 * evaluation error does as well; the environment keeps what was bound before it.
 */
export function run(source: string, options: RunOptions = {}): Result<RunOutput> {
	const parsed = parseSource(source);
	if (!parsed.ok) return parsed;
	return runProgram(parsed.value, options);
}

export function runProgram(program: Program, options: RunOptions = {}): Result<RunOutput> {
	const env = options.env ?? createEnvironment();
	const results: DeclarationResult[] = [];
	const failures: DeclarationFailure[] = [];

	for (const declaration of program.declarations) {
		const result = evaluateDeclaration(declaration, env, options.registry);
		options.onOutcome?.({ declaration, result });
		if (result.ok) {
			results.push(result.value);
			continue;
		}
		if (!options.continueOnError) return errResult(result.error);
		failures.push({ declaration, error: result.error });
	}

	return okResult({ program, env, results, failures });
}

//==============================================================================
// Display
//==============================================================================

export function formatResults(output: RunOutput): string[] {
	return output.results.map((r) => formatDeclarationResult(r, output.env.types));
}

/**
 * Final state of an environment: every set binding, then every type. Sets
 * declared with a record type list their fields in declared order.
 */
export function summarizeEnvironment(env: Environment): string[] {
	const lines: string[] = [];
	for (const [name, value] of env.values) {
		lines.push(name + " = " + formatValue(value, env.types, env.valueTypes.get(name)));
	}
	for (const [name, shape] of env.types) {
		lines.push("type " + name + ": " + formatTypeShape(shape));
	}
	return lines;
}
