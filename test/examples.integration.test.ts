// SPDX-License-Identifier: MIT
// Settle Auto-Discovery Example Test Suite
// Runs every example program and compares its output with the .expected file beside it

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { existsSync, readFileSync } from "node:fs";
import { basename, dirname, relative, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { globSync } from "glob";

import { formatResults, run } from "../src/run.js";

//==============================================================================
// Discovery
//==============================================================================

interface ExampleInfo {
	path: string;
	relativePath: string;
	source: string;
	expected?: string[];
}

const ROOT = resolve(dirname(fileURLToPath(import.meta.url)), "..");

function discoverExamples(): ExampleInfo[] {
	const files = globSync("examples/**/*.settle", { cwd: ROOT, absolute: true }).sort();

	return files.map((filePath) => {
		const expectedPath = filePath.replace(/\.settle$/, ".expected");
		const info: ExampleInfo = {
			path: filePath,
			relativePath: relative(ROOT, filePath),
			source: readFileSync(filePath, "utf-8"),
		};
		if (existsSync(expectedPath)) {
			info.expected = readFileSync(expectedPath, "utf-8").trim().split("\n");
		}
		return info;
	});
}

//==============================================================================
// Test Suite
//==============================================================================

const examples = discoverExamples();

describe("Examples", () => {
	it("should find the bundled examples", () => {
		assert.ok(examples.length >= 4, "Expected at least 4 examples, found " + String(examples.length));
	});

	for (const example of examples) {
		describe(basename(example.path, ".settle"), () => {
			it("should evaluate without errors", () => {
				const result = run(example.source);
				assert.ok(result.ok, result.ok ? "" : example.relativePath + ": " + result.error.message);
			});

			const expected = example.expected;
			if (expected === undefined) return;

			it("should print the expected results", () => {
				const result = run(example.source);
				assert.ok(result.ok);
				if (!result.ok) return;
				assert.deepEqual(formatResults(result.value), expected);
			});
		});
	}
});
