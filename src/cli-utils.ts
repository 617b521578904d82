/**
 * Settle CLI Utilities
 *
 * Extracted CLI functions for testability and reusability:
 * - Argument parsing (subcommands, flags)
 * - Environment configuration (SETTLE_VERBOSE)
 * - Program loading (source text or validated JSON AST)
 */

import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { z } from "zod/v4";
import type { Program } from "./ast.js";
import {
	errResult,
	invalidResult,
	okResult,
	SettleError,
	type Result,
	type ValidationResult,
	validResult,
} from "./errors.js";
import { parseSource } from "./parser.js";
import { validateProgram } from "./validator.js";

/**
 * CLI options interface
 */
export interface Options {
	verbose: boolean;
	/** Keep evaluating after a failing declaration */
	continue: boolean;
	emitAst: boolean;
	/** Print the final environment */
	env: boolean;
	help: boolean;
	/** Parse (and validate) only */
	check: boolean;
}

export const OptionsSchema = z.object({
	verbose: z.boolean(),
	continue: z.boolean(),
	emitAst: z.boolean(),
	env: z.boolean(),
	help: z.boolean(),
	check: z.boolean(),
}).meta({ id: "CliOptions", title: "CLI Options", description: "Settle command-line options" });

/**
 * Parse command-line arguments
 *
 * Supports:
 *   - Positional path argument
 *   - Flags: --verbose/-v, --continue/-c, --emit-ast, --env, --help/-h
 *   - Subcommand style: run, check, help
 *
 * Unrecognised flags are collected in `unknown`.
 */
function normalizeArgs(args: string[]): string[] {
	const subcommands: Record<string, string[]> = {
		run: [],
		check: ["--check"],
		help: ["--help"],
	};
	return args.flatMap((arg, i) => (i === 0 ? subcommands[arg] ?? [arg] : [arg]));
}

function processFlag(options: Options, arg: string): boolean {
	switch (arg) {
	case "--verbose": case "-v": options.verbose = true; return true;
	case "--continue": case "-c": options.continue = true; return true;
	case "--emit-ast": options.emitAst = true; return true;
	case "--env": options.env = true; return true;
	case "--help": case "-h": options.help = true; return true;
	case "--check": options.check = true; return true;
	default: return false;
	}
}

export function defaultOptions(): Options {
	return { verbose: false, continue: false, emitAst: false, env: false, help: false, check: false };
}

export function parseArgs(args: string[]): { path: string | null; options: Options; unknown: string[] } {
	const options = defaultOptions();
	const unknown: string[] = [];
	let path: string | null = null;

	for (const arg of normalizeArgs(args)) {
		if (processFlag(options, arg)) continue;
		if (arg.startsWith("-")) unknown.push(arg);
		else path = arg;
	}

	return { path, options: OptionsSchema.parse(options), unknown };
}

//==============================================================================
// Environment
//==============================================================================

export const EnvConfigSchema = z.object({
	SETTLE_VERBOSE: z.stringbool().optional(),
});

export type EnvConfig = z.infer<typeof EnvConfigSchema>;

/**
 * Read Settle settings from environment variables.
 */
export function readEnvConfig(env: Record<string, string | undefined>): ValidationResult<EnvConfig> {
	const parsed = EnvConfigSchema.safeParse({ SETTLE_VERBOSE: env.SETTLE_VERBOSE });
	if (!parsed.success) {
		return invalidResult<EnvConfig>(parsed.error.issues.map((issue) => ({
			path: issue.path.map(String).join(".") || "$",
			message: issue.message,
		})));
	}
	return validResult(parsed.data);
}

//==============================================================================
// Program Loading
//==============================================================================

/**
 * Turn file contents into a Program. `.json` files hold an emitted AST and are
 * validated; anything else is source text.
 */
export function loadProgram(path: string, content: string): Result<Program> {
	if (extname(path) !== ".json") return parseSource(content);

	let doc: unknown;
	try {
		doc = JSON.parse(content);
	} catch (e) {
		const reason = e instanceof Error ? e.message : String(e);
		return errResult(SettleError.valueError("Invalid JSON in " + path + ": " + reason));
	}

	const validation = validateProgram(doc);
	if (!validation.valid || validation.value === undefined) {
		const details = validation.errors.map((err) => err.path + ": " + err.message).join("; ");
		return errResult(SettleError.valueError("Invalid program in " + path + ": " + details));
	}
	return okResult(validation.value);
}

export async function readProgramFile(path: string): Promise<Result<Program>> {
	const content = await readFile(path, "utf-8");
	return loadProgram(path, content);
}
