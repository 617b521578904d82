// SPDX-License-Identifier: MIT
// Settle Evaluator - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { comprehension, identifier, literalSet, numberLit, setDef, typeDef } from "../src/ast.js";
import { createEnvironment, defineValue, type Environment } from "../src/env.js";
import { ErrorCodes, type SettleError } from "../src/errors.js";
import {
	Evaluator,
	evaluateDeclaration,
	evaluateExpression,
	evaluateProgram,
	type DeclarationResult,
} from "../src/evaluator.js";
import { formatValue } from "../src/format.js";
import { parseExpression, parseSource } from "../src/parser.js";
import {
	boolVal,
	hashValue,
	intVal,
	recordVal,
	setVal,
	stringVal,
	tupleVal,
	type Value,
} from "../src/types.js";
import { valueEqual } from "../src/value-order.js";

//==============================================================================
// Helpers
//==============================================================================

function runSource(source: string, env: Environment = createEnvironment()): DeclarationResult[] {
	const parsed = parseSource(source);
	if (!parsed.ok) throw new Error("parse failed: " + parsed.error.message);
	const result = evaluateProgram(parsed.value, env);
	if (!result.ok) throw new Error("evaluation failed: " + result.error.message);
	return result.value;
}

function failure(source: string, env: Environment = createEnvironment()): SettleError {
	const parsed = parseSource(source);
	if (!parsed.ok) throw new Error("parse failed: " + parsed.error.message);
	const result = evaluateProgram(parsed.value, env);
	if (result.ok) throw new Error("expected evaluation to fail");
	return result.error;
}

function binding(env: Environment, name: string): Value {
	const value = env.values.get(name);
	if (!value) throw new Error("unbound: " + name);
	return value;
}

function show(env: Environment, name: string): string {
	return formatValue(binding(env, name), env.types);
}

function evalExpr(source: string, env: Environment = createEnvironment()): Value {
	const parsed = parseExpression(source);
	if (!parsed.ok) throw new Error("parse failed: " + parsed.error.message);
	const result = evaluateExpression(parsed.value, env);
	if (!result.ok) throw new Error("evaluation failed: " + result.error.message);
	return result.value;
}

function exprError(source: string): SettleError {
	const parsed = parseExpression(source);
	if (!parsed.ok) throw new Error("parse failed: " + parsed.error.message);
	const result = evaluateExpression(parsed.value);
	if (result.ok) throw new Error("expected evaluation to fail");
	return result.error;
}

//==============================================================================
// Literals and sets
//==============================================================================

describe("evaluator - literals", () => {
	it("deduplicates literal set elements", () => {
		const env = createEnvironment();
		runSource("let A = {1, 2, 3, 3}", env);
		const a = binding(env, "A");
		assert.equal(a.kind, "set");
		if (a.kind === "set") assert.equal(a.value.size, 3);
		assert.equal(show(env, "A"), "{1, 2, 3}");
	});

	it("evaluates number literals by their lexeme", () => {
		assert.deepEqual(evalExpr("7"), intVal(7));
		assert.deepEqual(evalExpr("7.5"), { kind: "float", value: 7.5 });
		assert.deepEqual(evalExpr("2.0"), { kind: "float", value: 2 });
	});

	it("keeps the first of equal numeric representatives", () => {
		const set = evalExpr("{1, 1.0, 1 == 1}");
		assert.equal(set.kind, "set");
		if (set.kind === "set") {
			assert.deepEqual([...set.value.values()], [intVal(1)]);
		}
	});

	it("builds tuples and records", () => {
		assert.deepEqual(evalExpr('(1, "a")'), tupleVal([intVal(1), stringVal("a")]));
		assert.deepEqual(
			evalExpr('(name: "Al", age: 3)'),
			recordVal([["name", stringVal("Al")], ["age", intVal(3)]]),
		);
	});

	it("lets sets nest inside sets, tuples and records", () => {
		const env = createEnvironment();
		runSource("let S = {{1, 2}, {2, 1}, ({3}, (tags: {4}))}", env);
		assert.equal(show(env, "S"), "{{1, 2}, ({3}, (tags: {4}))}");
	});

	it("rejects an integer literal carrying a fraction", () => {
		const result = evaluateExpression(numberLit(1.5, false));
		assert.equal(result.ok, false);
		if (!result.ok) assert.equal(result.error.code, ErrorCodes.ValueError);
	});

	it("rejects an integer literal past 2^53 - 1", () => {
		const result = evaluateExpression(numberLit(2 ** 53, false));
		assert.equal(result.ok, false);
		if (result.ok) return;
		assert.equal(result.error.code, ErrorCodes.ValueError);
		assert.equal(result.error.message, "Integer literal out of range: 9007199254740992");
	});
});

//==============================================================================
// Identifiers and scope
//==============================================================================

describe("evaluator - identifiers", () => {
	it("resolves earlier set definitions", () => {
		const env = createEnvironment();
		runSource("let A = {1}\nlet B = A", env);
		assert.ok(valueEqual(binding(env, "A"), binding(env, "B")));
	});

	it("reports unbound identifiers", () => {
		const error = failure("let B = Nope");
		assert.equal(error.code, ErrorCodes.NameError);
		assert.equal(error.message, "Identifier 'Nope' not found in the current scope");
	});

	it("reports a type name used as a value", () => {
		const error = failure("type Person: Record(name: string)\nlet P = Person");
		assert.equal(error.code, ErrorCodes.NameError);
		assert.equal(error.message, "'Person' is a type, not a value");
	});

	it("shadows a global inside a comprehension without leaking", () => {
		const env = createEnvironment();
		runSource("let x = {10}\nlet S = {1, 2}\nlet T = { x | x of S }\nlet U = x", env);
		assert.equal(show(env, "T"), "{1, 2}");
		assert.equal(show(env, "U"), "{10}");
	});

	it("lets a later definition overwrite an earlier one", () => {
		const env = createEnvironment();
		runSource("let A = {1}\nlet A = A | {2}", env);
		assert.equal(show(env, "A"), "{1, 2}");
	});
});

//==============================================================================
// Set operations
//==============================================================================

describe("evaluator - set operations", () => {
	it("computes union, intersection and product", () => {
		const env = createEnvironment();
		runSource(
			"let A = {1, 2, 3}\nlet B = {2, 3, 4}\nlet U = A | B\nlet I = A & B\nlet P = {1, 2} * {\"x\", \"y\"}",
			env,
		);
		assert.equal(show(env, "U"), "{1, 2, 3, 4}");
		assert.equal(show(env, "I"), "{2, 3}");
		assert.equal(show(env, "P"), '{(1, "x"), (1, "y"), (2, "x"), (2, "y")}');
	});

	it("gives an empty product when either side is empty", () => {
		const env = createEnvironment();
		runSource("let P = {1, 2} * {}\nlet Q = {} * {1}", env);
		assert.equal(show(env, "P"), "{}");
		assert.equal(show(env, "Q"), "{}");
	});

	it("distributes product over union", () => {
		const env = createEnvironment();
		runSource(
			[
				"let A = {1, 2}",
				"let B = {2, 3}",
				'let C = {"c", "d"}',
				"let AB = A | B",
				"let L = AB * C",
				"let AC = A * C",
				"let BC = B * C",
				"let R = AC | BC",
			].join("\n"),
			env,
		);
		assert.ok(valueEqual(binding(env, "L"), binding(env, "R")));
	});

	it("keeps union and intersection commutative and associative", () => {
		const env = createEnvironment();
		runSource(
			[
				'let A = {1, "a", (1, 2)}',
				"let B = {1, 2.5, {3}}",
				'let C = {"a", {3}, 7}',
				"let U1 = A | B",
				"let U2 = B | A",
				"let I1 = A & B",
				"let I2 = B & A",
				"let UA = A | B | C",
				"let BC = B | C",
				"let UB = A | BC",
				"let IA = A & B & C",
				"let IBC = B & C",
				"let IB = A & IBC",
			].join("\n"),
			env,
		);
		assert.ok(valueEqual(binding(env, "U1"), binding(env, "U2")));
		assert.ok(valueEqual(binding(env, "I1"), binding(env, "I2")));
		assert.ok(valueEqual(binding(env, "UA"), binding(env, "UB")));
		assert.ok(valueEqual(binding(env, "IA"), binding(env, "IB")));
		assert.equal(show(env, "I1"), "{1}");
	});

	it("rejects non-set operands with the operator in the message", () => {
		const env = createEnvironment();
		const evaluator = new Evaluator(env);
		defineValue(env, "N", intVal(5));
		defineValue(env, "S", setVal([intVal(1)]));
		assert.throws(
			() => evaluator.evaluate({ kind: "setOp", left: identifier("N"), op: "|", right: identifier("S") }),
			(e: unknown) => {
				assert.ok(e instanceof Error);
				assert.equal(e.message, "Left operand of '|' must be set or record, got int");
				return true;
			},
		);
	});

	it("treats a record operand as its (name, value) pairs", () => {
		const env = createEnvironment();
		const evaluator = new Evaluator(env);
		defineValue(env, "R", recordVal([["a", intVal(1)]]));
		defineValue(env, "S", setVal([tupleVal([stringVal("b"), intVal(2)])]));
		const union = evaluator.evaluate({ kind: "setOp", left: identifier("R"), op: "|", right: identifier("S") });
		assert.equal(formatValue(union, env.types), '{("a", 1), ("b", 2)}');
	});
});

//==============================================================================
// Comprehensions
//==============================================================================

describe("evaluator - comprehensions", () => {
	it("maps every element when there is no predicate", () => {
		const env = createEnvironment();
		runSource('let S = {1, "a", (2, 3), {4}}\nlet T = { n | n of S }', env);
		assert.ok(valueEqual(binding(env, "S"), binding(env, "T")));
	});

	it("filters by predicate truthiness", () => {
		const env = createEnvironment();
		runSource("let S = {0, 1, 2}\nlet T = { n | n of S, n }\nlet U = { n | n of S, n >= 1 }", env);
		assert.equal(show(env, "T"), "{1, 2}");
		assert.equal(show(env, "U"), "{1, 2}");
	});

	it("destructures tuples onto several variables", () => {
		const env = createEnvironment();
		runSource("let P = {(1, 2), (3, 4)}\nlet Q = { (b, a) | (a, b) of P }", env);
		assert.equal(show(env, "Q"), "{(2, 1), (4, 3)}");
	});

	it("skips elements that do not destructure", () => {
		const env = createEnvironment();
		runSource("let P = {(1, 2), (1, 2, 3), 7}\nlet Q = { a | (a, b) of P }", env);
		assert.equal(show(env, "Q"), "{1}");
	});

	it("iterates a record source as (name, value) pairs", () => {
		const env = createEnvironment();
		runSource("let C = {(x: 1, y: 2)}\nlet K = { {k | (k, v) of r, v > 1} | r of C }", env);
		assert.equal(show(env, "K"), '{{"y"}}');
	});

	it("rejects a non-set source", () => {
		const env = createEnvironment();
		defineValue(env, "N", intVal(3));
		const result = evaluateExpression(comprehension([identifier("n")], ["n"], identifier("N")), env);
		assert.equal(result.ok, false);
		if (!result.ok) {
			assert.equal(result.error.code, ErrorCodes.TypeError);
			assert.equal(result.error.message, "Set comprehension source must be a set or record, got int");
		}
	});
});

//==============================================================================
// Attributes and comparisons
//==============================================================================

describe("evaluator - attributes and comparisons", () => {
	it("reads record fields", () => {
		assert.deepEqual(evalExpr("(a: 1, b: 2).b"), intVal(2));
	});

	it("rejects attribute access on a non-record", () => {
		const error = exprError("(5).x");
		assert.equal(error.code, ErrorCodes.TypeError);
		assert.equal(error.message, "Cannot access attribute 'x' on non-record value of kind int");
	});

	it("reports a missing field with the record", () => {
		const error = exprError("(a: 1).b");
		assert.equal(error.code, ErrorCodes.AttributeError);
		assert.equal(error.message, "Record (a: 1) has no attribute 'b'");
	});

	it("compares by value", () => {
		assert.deepEqual(evalExpr("{1, 2} == {2, 1}"), boolVal(true));
		assert.deepEqual(evalExpr('(a: 1, b: "x") == (b: "x", a: 1)'), boolVal(true));
		assert.deepEqual(evalExpr('1 != "1"'), boolVal(true));
		assert.deepEqual(evalExpr("1 == 1.0"), boolVal(true));
	});

	it("evaluates comparison chains left to right", () => {
		assert.deepEqual(evalExpr("1 < 2 < 3"), boolVal(true));
		assert.deepEqual(evalExpr("3 > 2 > 1"), boolVal(false));
	});

	it("orders sets by inclusion", () => {
		assert.deepEqual(evalExpr("{1} < {1, 2}"), boolVal(true));
		assert.deepEqual(evalExpr("{1, 2} < {1, 2}"), boolVal(false));
		assert.deepEqual(evalExpr("{1, 2} <= {1, 2}"), boolVal(true));
	});

	it("fails on unordered operand kinds", () => {
		const error = exprError('1 < "a"');
		assert.equal(error.code, ErrorCodes.TypeError);
		assert.equal(error.message, "'<' not supported between int and string");
	});
});

//==============================================================================
// Typed set definitions
//==============================================================================

describe("evaluator - typed set definitions", () => {
	const person = "type Person: Record(name: string, age: int)\n";

	it("acknowledges a type definition", () => {
		const [result] = runSource(person);
		assert.deepEqual(result, {
			kind: "type",
			name: "Person",
			shape: {
				kind: "record",
				fields: [
					{ name: "name", typeName: "string" },
					{ name: "age", typeName: "int" },
				],
			},
		});
	});

	it("accepts records with extra fields", () => {
		const env = createEnvironment();
		runSource(person + 'let P: Person = {(name: "A", age: 1, city: "X")}', env);
		assert.equal(show(env, "P"), '{(age: 1, city: "X", name: "A")}');
	});

	it("rejects records missing declared fields", () => {
		const error = failure(person + 'let P: Person = {(name: "A")}');
		assert.equal(error.code, ErrorCodes.TypeError);
		assert.equal(error.message, "Item (name: \"A\") missing fields for type 'Person': age");
	});

	it("rejects non-record elements of a record type", () => {
		const error = failure(person + "let P: Person = {1}");
		assert.equal(error.message, "Expected record for type 'Person', got int: 1");
	});

	it("rejects an undefined type", () => {
		const error = failure("let P: Ghost = {1}");
		assert.equal(error.code, ErrorCodes.TypeError);
		assert.equal(error.message, "Type 'Ghost' not defined for set 'P'");
	});

	it("checks tuple arity against a positional type", () => {
		const env = createEnvironment();
		assert.ok(evaluateDeclaration(typeDef("Pair", { kind: "tuple", elements: ["int", "int"] }), env).ok);
		runSource("let Ok: Pair = {(1, 2)}", env);
		assert.equal(show(env, "Ok"), "{(1, 2)}");

		const error = failure("let Bad: Pair = {(1, 2, 3)}", env);
		assert.equal(
			error.message,
			"Item (1, 2, 3) has wrong number of fields for type 'Pair': expected 2, got 3",
		);
	});

	it("does not bind a set that fails validation", () => {
		const env = createEnvironment();
		failure(person + 'let P: Person = {(name: "A")}', env);
		assert.equal(env.values.has("P"), false);
		assert.equal(env.types.has("Person"), true);
	});
});

//==============================================================================
// Program evaluation
//==============================================================================

describe("evaluateProgram", () => {
	it("returns one result per declaration in order", () => {
		const results = runSource("type T: Record()\nlet A = {(1,)}");
		assert.deepEqual(results.map((r) => r.kind), ["type", "set"]);
	});

	it("stops at the first failure and keeps earlier bindings", () => {
		const env = createEnvironment();
		const error = failure("let A = {1}\nlet B = Missing\nlet C = {3}", env);
		assert.equal(error.code, ErrorCodes.NameError);
		assert.deepEqual([...env.values.keys()], ["A"]);
	});

	it("evaluates a single declaration into an existing environment", () => {
		const env = createEnvironment();
		defineValue(env, "A", setVal([intVal(1), intVal(2)]));
		const result = evaluateDeclaration(setDef("B", literalSet([identifier("A")])), env);
		assert.ok(result.ok);
		const b = binding(env, "B");
		assert.equal(hashValue(b), "S:{S:{n:1,n:2}}");
	});
});
