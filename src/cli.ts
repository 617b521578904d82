// SPDX-License-Identifier: MIT
// Settle CLI
// settle [run] <file> | settle check <file> | settle help

import type { Program } from "./ast.js";
import { parseArgs, readEnvConfig, readProgramFile } from "./cli-utils.js";
import { createEnvironment } from "./env.js";
import type { Result, SettleError } from "./errors.js";
import { formatDeclarationResult } from "./format.js";
import { runProgram, summarizeEnvironment } from "./run.js";

/** Where the CLI writes. Defaults to the console. */
export interface CliIO {
	log: (line: string) => void;
	warn: (line: string) => void;
	error: (line: string) => void;
}

const consoleIO: CliIO = {
	log: (line) => { console.log(line); },
	warn: (line) => { console.warn(line); },
	error: (line) => { console.error(line); },
};

export const USAGE = `Usage: settle [run] <file> [options]
       settle check <file>
       settle help

Evaluates a Settle program (or a JSON AST emitted with --emit-ast) and prints
each declaration's result.

Options:
  -v, --verbose    Print progress messages (or set SETTLE_VERBOSE=1)
  -c, --continue   Keep evaluating after a failing declaration
      --emit-ast   Print the parsed program as JSON instead of evaluating it
      --env        Print the final environment after evaluation
  -h, --help       Show this message`;

export function formatError(error: SettleError): string {
	return error.code + ": " + error.message;
}

/**
 * Run the CLI. Resolves to the process exit code.
 */
export async function main(
	argv: string[],
	io: CliIO = consoleIO,
	env: Record<string, string | undefined> = process.env,
): Promise<number> {
	const { path, options, unknown } = parseArgs(argv);

	if (options.help) {
		io.log(USAGE);
		return 0;
	}

	for (const flag of unknown) io.warn("Ignoring unknown option: " + flag);

	const envConfig = readEnvConfig(env);
	if (!envConfig.valid) {
		for (const err of envConfig.errors) io.warn("Ignoring SETTLE_VERBOSE: " + err.message);
	}
	const verbose = options.verbose || envConfig.value?.SETTLE_VERBOSE === true;

	if (path === null) {
		io.error("No input file given");
		io.error(USAGE);
		return 1;
	}

	if (verbose) io.warn("Reading " + path);
	let loaded: Result<Program>;
	try {
		loaded = await readProgramFile(path);
	} catch (e) {
		io.error("Cannot read " + path + ": " + (e instanceof Error ? e.message : String(e)));
		return 1;
	}
	if (!loaded.ok) {
		io.error(formatError(loaded.error));
		return 1;
	}

	const program = loaded.value;
	if (verbose) io.warn("Parsed " + String(program.declarations.length) + " declaration(s)");

	if (options.emitAst) {
		io.log(JSON.stringify(program, null, 2));
		return 0;
	}

	if (options.check) {
		io.log(path + ": OK (" + String(program.declarations.length) + " declarations)");
		return 0;
	}

	const finalEnv = createEnvironment();
	let failed = 0;
	runProgram(program, {
		env: finalEnv,
		continueOnError: options.continue,
		onOutcome: ({ result }) => {
			if (result.ok) {
				io.log(formatDeclarationResult(result.value, finalEnv.types));
				return;
			}
			failed++;
			io.error(formatError(result.error));
		},
	});

	if (options.env) {
		io.log("--- Environment ---");
		for (const line of summarizeEnvironment(finalEnv)) io.log(line);
	}

	if (verbose) io.warn("Done, " + String(failed) + " failed declaration(s)");
	return failed > 0 ? 1 : 0;
}
