// SPDX-License-Identifier: MIT
// Settle Core Domain
// Comparison operators

import { boolVal } from "../types.js";
import { applyOrdering, valueEqual, type OrderingOperator } from "../value-order.js";
import {
	defineOperator,
	type Operator,
	type OperatorRegistry,
	registerOperator,
} from "./registry.js";

//==============================================================================
// Equality Operators
//==============================================================================

// eq(any, any) -> bool
const eq: Operator = defineOperator("core", "eq")
	.setSymbol("==")
	.setParams("any", "any")
	.setImpl((a, b) => boolVal(valueEqual(a, b)))
	.build();

// neq(any, any) -> bool
const neq: Operator = defineOperator("core", "neq")
	.setSymbol("!=")
	.setParams("any", "any")
	.setImpl((a, b) => boolVal(!valueEqual(a, b)))
	.build();

//==============================================================================
// Ordering Operators
//==============================================================================

function ordering(name: string, symbol: OrderingOperator): Operator {
	return defineOperator("core", name)
		.setSymbol(symbol)
		.setParams("any", "any")
		.setImpl((a, b) => boolVal(applyOrdering(symbol, a, b)))
		.build();
}

const lt = ordering("lt", "<");
const lte = ordering("lte", "<=");
const gt = ordering("gt", ">");
const gte = ordering("gte", ">=");

//==============================================================================
// Registry Creation
//==============================================================================

/**
 * Create the core domain registry with the comparison operators.
 */
export function createCoreRegistry(): OperatorRegistry {
	const operators: Operator[] = [eq, neq, lt, lte, gt, gte];

	return operators.reduce<OperatorRegistry>(
		(reg, op) => registerOperator(reg, op),
		new Map(),
	);
}
