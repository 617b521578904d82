// SPDX-License-Identifier: MIT
// Settle Type Definitions
// Runtime Value domain, type shapes, and value keys for set membership

import type { FieldDecl, ShapeDecl } from "./ast.js";

//==============================================================================
// Value Domain (runtime values)
//==============================================================================

export type Value =
	| IntVal
	| FloatVal
	| StringVal
	| BoolVal
	| SetVal
	| TupleVal
	| RecordVal;

export type ValueKind = Value["kind"];

export interface IntVal {
	kind: "int";
	value: number;
}

export interface FloatVal {
	kind: "float";
	value: number;
}

export interface StringVal {
	kind: "string";
	value: string;
}

// Result of a comparison
export interface BoolVal {
	kind: "bool";
	value: boolean;
}

/** Elements keyed by {@link hashValue}; iteration follows insertion order. */
export interface SetVal {
	kind: "set";
	value: ReadonlyMap<string, Value>;
}

export interface TupleVal {
	kind: "tuple";
	value: readonly Value[];
}

/** Field name to value. Field order carries no meaning for equality. */
export interface RecordVal {
	kind: "record";
	value: ReadonlyMap<string, Value>;
}

//==============================================================================
// Type Shapes
//==============================================================================

export type TypeShape = ShapeDecl;
export type RecordShape = Extract<ShapeDecl, { kind: "record" }>;
export type TupleShape = Extract<ShapeDecl, { kind: "tuple" }>;

export const recordShape = (fields: FieldDecl[]): RecordShape => ({ kind: "record", fields });
export const tupleShape = (elements: string[]): TupleShape => ({ kind: "tuple", elements });

//==============================================================================
// Value Hashing for Set keys
//==============================================================================

const keyCache = new WeakMap<Value, string>();

/**
 * Canonical key of a value: equal values have equal keys.
 *
 * Numbers and booleans share one key space (`1`, `1.0` and `true` collide).
 * Sets and records key by their sorted member keys, so two sets built in
 * different orders are the same element of an outer set.
 */
export function hashValue(v: Value): string {
	switch (v.kind) {
		case "int":
		case "float":
			return "n:" + String(v.value);
		case "bool":
			return v.value ? "n:1" : "n:0";
		case "string":
			return "s:" + JSON.stringify(v.value);
		case "tuple":
		case "set":
		case "record": {
			const cached = keyCache.get(v);
			if (cached !== undefined) return cached;
			const key = compositeKey(v);
			keyCache.set(v, key);
			return key;
		}
	}
}

function compositeKey(v: TupleVal | SetVal | RecordVal): string {
	switch (v.kind) {
		case "tuple":
			return "t:[" + v.value.map(hashValue).join(",") + "]";
		case "set":
			return "S:{" + [...v.value.keys()].sort().join(",") + "}";
		case "record": {
			const fields = [...v.value.entries()]
				.map(([name, field]) => JSON.stringify(name) + "=" + hashValue(field))
				.sort();
			return "R:{" + fields.join(",") + "}";
		}
	}
}

//==============================================================================
// Type Guards
//==============================================================================

export function isSet(v: Value): v is SetVal {
	return v.kind === "set";
}

export function isTuple(v: Value): v is TupleVal {
	return v.kind === "tuple";
}

export function isRecord(v: Value): v is RecordVal {
	return v.kind === "record";
}

export function isNumeric(v: Value): v is IntVal | FloatVal | BoolVal {
	return v.kind === "int" || v.kind === "float" || v.kind === "bool";
}

//==============================================================================
// Value Constructors
//==============================================================================

export const intVal = (value: number): IntVal => ({ kind: "int", value });
export const floatVal = (value: number): FloatVal => ({ kind: "float", value });
export const stringVal = (value: string): StringVal => ({
	kind: "string",
	value,
});
export const boolVal = (value: boolean): BoolVal => ({ kind: "bool", value });
export const tupleVal = (value: readonly Value[]): TupleVal => ({ kind: "tuple", value });

/**
 * Build a set; later duplicates of an element already present are dropped.
 */
export function setVal(elements: Iterable<Value> = []): SetVal {
	const value = new Map<string, Value>();
	for (const element of elements) {
		const key = hashValue(element);
		if (!value.has(key)) value.set(key, element);
	}
	return { kind: "set", value };
}

/**
 * Build a record; a repeated field name keeps its last value.
 */
export function recordVal(fields: Iterable<readonly [string, Value]>): RecordVal {
	return { kind: "record", value: new Map(fields) };
}

export const emptySet = (): SetVal => setVal();

//==============================================================================
// Collections
//==============================================================================

/**
 * Elements of a set-like operand. A record contributes its fields as
 * `(name, value)` pairs.
 */
export function elementsOf(v: SetVal | RecordVal): Value[] {
	if (v.kind === "set") return [...v.value.values()];
	return [...v.value.entries()].map(([name, field]) => tupleVal([stringVal(name), field]));
}

export function asSet(v: SetVal | RecordVal): SetVal {
	return v.kind === "set" ? v : setVal(elementsOf(v));
}
