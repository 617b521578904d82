// SPDX-License-Identifier: MIT
// Settle Value Formatter
// Renders values and type shapes in source syntax

import type { TypeEnv } from "./env.js";
import type { DeclarationResult } from "./evaluator.js";
import type { RecordVal, SetVal, TypeShape, Value } from "./types.js";
import { compareForSort } from "./value-order.js";

//==============================================================================
// Values
//==============================================================================

/**
 * Format a value for display.
 *
 * `typeHint` names the declared type of the enclosing set; when it refers to a
 * record shape, records list the declared fields first and in order.
 */
export function formatValue(value: Value, types: TypeEnv, typeHint?: string): string {
	switch (value.kind) {
		case "int":
			return String(value.value);
		case "float":
			return formatFloat(value.value);
		case "bool":
			return value.value ? "true" : "false";
		case "string":
			return quote(value.value);
		case "tuple": {
			const parts = value.value.map((v) => formatValue(v, types));
			return parts.length === 1 ? "(" + parts.join("") + ",)" : "(" + parts.join(", ") + ")";
		}
		case "record":
			return formatRecord(value, types, typeHint);
		case "set":
			return formatSet(value, types, typeHint);
	}
}

// Whole floats print in positional notation, which the lexer reads back
function formatFloat(n: number): string {
	return Number.isInteger(n) ? BigInt(n).toString() + ".0" : String(n);
}

function quote(s: string): string {
	const escaped = s
		.replace(/\\/g, "\\\\")
		.replace(/"/g, '\\"')
		.replace(/\n/g, "\\n")
		.replace(/\t/g, "\\t");
	return '"' + escaped + '"';
}

function formatRecord(record: RecordVal, types: TypeEnv, typeHint?: string): string {
	const shape = typeHint === undefined ? undefined : types.get(typeHint);
	const declared = shape?.kind === "record" ? shape.fields.map((f) => f.name) : [];
	const order = declared.filter((name) => record.value.has(name));
	const rest = [...record.value.keys()].filter((name) => !declared.includes(name)).sort();

	const parts: string[] = [];
	for (const name of [...order, ...rest]) {
		const field = record.value.get(name);
		if (field !== undefined) parts.push(name + ": " + formatValue(field, types));
	}
	return "(" + parts.join(", ") + ")";
}

function formatSet(set: SetVal, types: TypeEnv, typeHint?: string): string {
	const elements = [...set.value.values()];
	return "{" + sortIfOrdered(elements).map((v) => formatValue(v, types, typeHint)).join(", ") + "}";
}

// Sorted when every pair is ordered, else insertion order
function sortIfOrdered(elements: Value[]): Value[] {
	let ordered = true;
	const sorted = [...elements].sort((a, b) => {
		const order = compareForSort(a, b);
		if (order === null) {
			ordered = false;
			return 0;
		}
		return order;
	});
	return ordered ? sorted : elements;
}

//==============================================================================
// Type Shapes
//==============================================================================

export function formatTypeShape(shape: TypeShape): string {
	switch (shape.kind) {
		case "record":
			return "Record(" + shape.fields.map((f) => f.name + ": " + f.typeName).join(", ") + ")";
		case "tuple":
			return "Tuple(" + shape.elements.join(", ") + ")";
	}
}

//==============================================================================
// Declaration Results
//==============================================================================

/**
 * One line of driver output for a processed declaration.
 */
export function formatDeclarationResult(result: DeclarationResult, types: TypeEnv): string {
	switch (result.kind) {
		case "type":
			return "Type '" + result.name + "' defined: " + formatTypeShape(result.shape);
		case "set":
			return result.name + " = " + formatValue(result.value, types, result.typeName);
	}
}
