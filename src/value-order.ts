// SPDX-License-Identifier: MIT
// Settle Value Equality and Ordering

import type { ComparisonOperator } from "./ast.js";
import { SettleError } from "./errors.js";
import { asSet, hashValue, isNumeric, type SetVal, type Value } from "./types.js";

export type OrderingOperator = Exclude<ComparisonOperator, "==" | "!=">;

//==============================================================================
// Equality
//==============================================================================

export function valueEqual(a: Value, b: Value): boolean {
	return hashValue(a) === hashValue(b);
}

//==============================================================================
// Truthiness
//==============================================================================

/**
 * Predicate truthiness: false, zero, the empty string and empty collections
 * are falsy.
 */
export function isTruthy(v: Value): boolean {
	switch (v.kind) {
		case "bool":
			return v.value;
		case "int":
		case "float":
			return v.value !== 0;
		case "string":
			return v.value.length > 0;
		case "tuple":
			return v.value.length > 0;
		case "set":
		case "record":
			return v.value.size > 0;
	}
}

//==============================================================================
// Ordering
//==============================================================================

function numericOf(v: Value): number | null {
	if (!isNumeric(v)) return null;
	if (v.kind === "bool") return v.value ? 1 : 0;
	return v.value;
}

function holds(op: OrderingOperator, order: number): boolean {
	switch (op) {
		case "<":
			return order < 0;
		case "<=":
			return order <= 0;
		case ">":
			return order > 0;
		case ">=":
			return order >= 0;
	}
}

// By code point, so characters outside the BMP sort after U+FFFF
function compareStrings(a: string, b: string): number {
	const left = Array.from(a, (ch) => ch.codePointAt(0) ?? 0);
	const right = Array.from(b, (ch) => ch.codePointAt(0) ?? 0);
	const n = Math.min(left.length, right.length);
	for (let i = 0; i < n; i++) {
		const x = left[i] ?? 0;
		const y = right[i] ?? 0;
		if (x !== y) return x - y;
	}
	return left.length - right.length;
}

function isSubset(a: SetVal, b: SetVal): boolean {
	if (a.value.size > b.value.size) return false;
	for (const key of a.value.keys()) {
		if (!b.value.has(key)) return false;
	}
	return true;
}

function unordered(op: OrderingOperator, a: Value, b: Value): SettleError {
	return SettleError.typeError(
		"'" + op + "' not supported between " + a.kind + " and " + b.kind,
	);
}

/**
 * Apply an ordering operator.
 *
 * Numbers (booleans count as 0 and 1) and strings use their natural order,
 * tuples compare at their first differing element and then by length, and
 * sets or records compare by inclusion. Other pairings throw a TypeError.
 */
export function applyOrdering(op: OrderingOperator, a: Value, b: Value): boolean {
	const x = numericOf(a);
	const y = numericOf(b);
	if (x !== null && y !== null) return holds(op, x < y ? -1 : x > y ? 1 : 0);

	if (a.kind === "string" && b.kind === "string") {
		return holds(op, compareStrings(a.value, b.value));
	}

	if (a.kind === "tuple" && b.kind === "tuple") {
		const n = Math.min(a.value.length, b.value.length);
		for (let i = 0; i < n; i++) {
			const left = a.value[i];
			const right = b.value[i];
			if (left === undefined || right === undefined) break;
			if (!valueEqual(left, right)) return applyOrdering(op, left, right);
		}
		return holds(op, a.value.length - b.value.length);
	}

	if (
		(a.kind === "set" || a.kind === "record") &&
		(b.kind === "set" || b.kind === "record")
	) {
		const left = asSet(a);
		const right = asSet(b);
		const equalSize = left.value.size === right.value.size;
		switch (op) {
			case "<=":
				return isSubset(left, right);
			case "<":
				return !equalSize && isSubset(left, right);
			case ">=":
				return isSubset(right, left);
			case ">":
				return !equalSize && isSubset(right, left);
		}
	}

	throw unordered(op, a, b);
}

/**
 * Total order used to sort values for display. Returns null when the two
 * values are not totally ordered against each other.
 */
export function compareForSort(a: Value, b: Value): number | null {
	const x = numericOf(a);
	const y = numericOf(b);
	if (x !== null && y !== null) return x - y;

	if (a.kind === "string" && b.kind === "string") {
		return compareStrings(a.value, b.value);
	}

	if (a.kind === "tuple" && b.kind === "tuple") {
		const n = Math.min(a.value.length, b.value.length);
		for (let i = 0; i < n; i++) {
			const left = a.value[i];
			const right = b.value[i];
			if (left === undefined || right === undefined) break;
			const order = compareForSort(left, right);
			if (order === null) return null;
			if (order !== 0) return order;
		}
		return a.value.length - b.value.length;
	}

	return null;
}
