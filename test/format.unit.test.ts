// SPDX-License-Identifier: MIT
// Settle Value Formatter - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { createEnvironment, defineType } from "../src/env.js";
import { evaluateProgram } from "../src/evaluator.js";
import { formatDeclarationResult, formatTypeShape, formatValue } from "../src/format.js";
import { parseSource } from "../src/parser.js";
import {
	boolVal,
	floatVal,
	intVal,
	recordShape,
	recordVal,
	setVal,
	stringVal,
	tupleShape,
	tupleVal,
	type TypeShape,
} from "../src/types.js";
import { valueEqual } from "../src/value-order.js";

const noTypes = new Map<string, TypeShape>();

describe("formatValue - scalars", () => {
	it("prints ints and booleans plainly", () => {
		assert.equal(formatValue(intVal(-4), noTypes), "-4");
		assert.equal(formatValue(boolVal(true), noTypes), "true");
	});

	it("always gives floats a fractional part", () => {
		assert.equal(formatValue(floatVal(2), noTypes), "2.0");
		assert.equal(formatValue(floatVal(2.25), noTypes), "2.25");
		assert.equal(formatValue(floatVal(1e21), noTypes), "1000000000000000000000.0");
	});

	it("quotes and escapes strings", () => {
		assert.equal(formatValue(stringVal('say "hi"\\'), noTypes), '"say \\"hi\\"\\\\"');
		assert.equal(formatValue(stringVal("a\nb"), noTypes), '"a\\nb"');
	});
});

describe("formatValue - collections", () => {
	it("prints tuples, with a trailing comma for one element", () => {
		assert.equal(formatValue(tupleVal([]), noTypes), "()");
		assert.equal(formatValue(tupleVal([intVal(1)]), noTypes), "(1,)");
		assert.equal(formatValue(tupleVal([intVal(1), stringVal("a")]), noTypes), '(1, "a")');
	});

	it("sorts orderable sets", () => {
		assert.equal(formatValue(setVal([intVal(3), floatVal(1.5), intVal(2)]), noTypes), "{1.5, 2, 3}");
		assert.equal(formatValue(setVal([stringVal("b"), stringVal("a")]), noTypes), '{"a", "b"}');
	});

	it("keeps insertion order for mixed sets", () => {
		assert.equal(formatValue(setVal([stringVal("b"), intVal(1)]), noTypes), '{"b", 1}');
	});

	it("prints records alphabetically without a hint", () => {
		const record = recordVal([["z", intVal(1)], ["a", intVal(2)]]);
		assert.equal(formatValue(record, noTypes), "(a: 2, z: 1)");
	});

	it("follows the hinted record shape, extras last", () => {
		const types = new Map<string, TypeShape>([
			["Person", recordShape([{ name: "name", typeName: "string" }, { name: "age", typeName: "int" }])],
		]);
		const record = recordVal([["zip", intVal(9)], ["age", intVal(3)], ["name", stringVal("Al")], ["city", stringVal("X")]]);
		assert.equal(formatValue(record, types, "Person"), '(name: "Al", age: 3, city: "X", zip: 9)');
		assert.equal(
			formatValue(setVal([record]), types, "Person"),
			'{(name: "Al", age: 3, city: "X", zip: 9)}',
		);
	});

	it("ignores a hint naming a tuple shape or an unknown type", () => {
		const types = new Map<string, TypeShape>([["Pair", tupleShape(["int", "int"])]]);
		const record = recordVal([["b", intVal(1)], ["a", intVal(2)]]);
		assert.equal(formatValue(record, types, "Pair"), "(a: 2, b: 1)");
		assert.equal(formatValue(record, types, "Nope"), "(a: 2, b: 1)");
	});
});

describe("formatTypeShape", () => {
	it("renders record and tuple shapes", () => {
		assert.equal(
			formatTypeShape(recordShape([{ name: "name", typeName: "string" }, { name: "age", typeName: "int" }])),
			"Record(name: string, age: int)",
		);
		assert.equal(formatTypeShape(tupleShape(["int", "string"])), "Tuple(int, string)");
	});
});

describe("formatDeclarationResult", () => {
	it("formats type and set declarations", () => {
		const env = createEnvironment();
		defineType(env, "P", tupleShape(["int"]));
		assert.equal(
			formatDeclarationResult({ kind: "type", name: "P", shape: tupleShape(["int"]) }, env.types),
			"Type 'P' defined: Tuple(int)",
		);
		assert.equal(
			formatDeclarationResult({ kind: "set", name: "S", typeName: "P", value: setVal([tupleVal([intVal(1)])]) }, env.types),
			"S = {(1,)}",
		);
	});
});

describe("formatted output round trip", () => {
	it("re-parses a formatted union to the same set", () => {
		const env = createEnvironment();
		const first = parseSource("let A = {1, 2} | {2, 3}");
		assert.ok(first.ok);
		if (!first.ok) return;
		assert.ok(evaluateProgram(first.value, env).ok);
		const a = env.values.get("A");
		assert.ok(a);
		if (!a) return;

		const text = formatValue(a, env.types);
		assert.equal(text, "{1, 2, 3}");

		const again = parseSource("let B = " + text);
		assert.ok(again.ok);
		if (!again.ok) return;
		assert.ok(evaluateProgram(again.value, env).ok);
		const b = env.values.get("B");
		assert.ok(b && valueEqual(a, b));
	});

	it("re-parses a large whole float", () => {
		const env = createEnvironment();
		const first = parseSource("let A = {1000000000000000000000.0}");
		assert.ok(first.ok);
		if (!first.ok) return;
		assert.ok(evaluateProgram(first.value, env).ok);
		const a = env.values.get("A");
		assert.ok(a);
		if (!a) return;

		const text = formatValue(a, env.types);
		assert.equal(text, "{1000000000000000000000.0}");
		const again = parseSource("let B = " + text);
		assert.ok(again.ok);
		if (!again.ok) return;
		assert.ok(evaluateProgram(again.value, env).ok);
		const b = env.values.get("B");
		assert.ok(b && valueEqual(a, b));
	});

	it("re-parses formatted records, tuples and strings", () => {
		const env = createEnvironment();
		const source = 'let A = {(name: "q\\"uote", tags: {(1,), ("x", 2.0)})}';
		const first = parseSource(source);
		assert.ok(first.ok);
		if (!first.ok) return;
		assert.ok(evaluateProgram(first.value, env).ok);
		const a = env.values.get("A");
		assert.ok(a);
		if (!a) return;

		const again = parseSource("let B = " + formatValue(a, env.types));
		assert.ok(again.ok);
		if (!again.ok) return;
		assert.ok(evaluateProgram(again.value, env).ok);
		const b = env.values.get("B");
		assert.ok(b && valueEqual(a, b));
	});
});
