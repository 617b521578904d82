// SPDX-License-Identifier: MIT
// Settle Set Domain
// Set operators behind `|`, `&` and `*`

import { SettleError } from "../errors.js";
import {
	elementsOf,
	emptySet,
	setVal,
	tupleVal,
	type RecordVal,
	type SetVal,
	type Value,
} from "../types.js";
import {
	defineOperator,
	registerOperator,
	type Operator,
	type OperatorRegistry,
	type ParamSpec,
} from "./registry.js";

// Records are accepted wherever a set is: they act as their (name, value) pairs
const SET_LIKE: ParamSpec = ["set", "record"];

function setLike(v: Value): SetVal | RecordVal {
	if (v.kind === "set" || v.kind === "record") return v;
	throw SettleError.typeError("Expected set or record, got " + v.kind);
}

//==============================================================================
// Set Operators
//==============================================================================

// union(set, set) -> set
const union: Operator = defineOperator("set", "union")
	.setSymbol("|")
	.setParams(SET_LIKE, SET_LIKE)
	.setImpl((a, b) => setVal([...elementsOf(setLike(a)), ...elementsOf(setLike(b))]))
	.build();

// intersect(set, set) -> set, keeping the left operand's representatives
const intersect: Operator = defineOperator("set", "intersect")
	.setSymbol("&")
	.setParams(SET_LIKE, SET_LIKE)
	.setImpl((a, b) => {
		const right = setVal(elementsOf(setLike(b)));
		const left = setVal(elementsOf(setLike(a)));
		const result: Value[] = [];
		for (const [key, element] of left.value) {
			if (right.value.has(key)) result.push(element);
		}
		return setVal(result);
	})
	.build();

// product(set, set) -> set of 2-tuples
const product: Operator = defineOperator("set", "product")
	.setSymbol("*")
	.setParams(SET_LIKE, SET_LIKE)
	.setImpl((a, b) => {
		const left = elementsOf(setLike(a));
		const right = elementsOf(setLike(b));
		if (left.length === 0 || right.length === 0) return emptySet();
		const pairs: Value[] = [];
		for (const l of left) {
			for (const r of right) pairs.push(tupleVal([l, r]));
		}
		return setVal(pairs);
	})
	.build();

//==============================================================================
// Registry Creation
//==============================================================================

/**
 * Create the set domain registry with all set operators.
 */
export function createSetRegistry(): OperatorRegistry {
	let registry: OperatorRegistry = new Map();

	registry = registerOperator(registry, union);
	registry = registerOperator(registry, intersect);
	registry = registerOperator(registry, product);

	return registry;
}
