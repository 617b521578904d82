// SPDX-License-Identifier: MIT
// Settle Operator Registry
// Named operators grouped by namespace; the evaluator dispatches through here.

import { SettleError } from "../errors.js";
import type { Value, ValueKind } from "../types.js";

//==============================================================================
// Operator Types
//==============================================================================

/** Accepted operand kinds for one parameter; "any" accepts every value. */
export type ParamSpec = readonly ValueKind[] | "any";

export interface Operator {
	ns: string;
	name: string;
	/** Source-level spelling used in error messages */
	symbol: string;
	params: readonly ParamSpec[];
	fn: (...args: Value[]) => Value;
}

export type OperatorRegistry = ReadonlyMap<string, Operator>;

export function operatorKey(ns: string, name: string): string {
	return ns + ":" + name;
}

//==============================================================================
// Builder
//==============================================================================

export class OperatorBuilder {
	private readonly ns: string;
	private readonly name: string;
	private symbol: string;
	private params: ParamSpec[] = [];
	private impl: ((...args: Value[]) => Value) | undefined;

	constructor(ns: string, name: string) {
		this.ns = ns;
		this.name = name;
		this.symbol = name;
	}

	setSymbol(symbol: string): this {
		this.symbol = symbol;
		return this;
	}

	setParams(...params: ParamSpec[]): this {
		this.params = params;
		return this;
	}

	setImpl(impl: (...args: Value[]) => Value): this {
		this.impl = impl;
		return this;
	}

	build(): Operator {
		if (!this.impl) {
			throw new Error("Operator " + operatorKey(this.ns, this.name) + " has no implementation");
		}
		return {
			ns: this.ns,
			name: this.name,
			symbol: this.symbol,
			params: this.params,
			fn: this.impl,
		};
	}
}

export function defineOperator(ns: string, name: string): OperatorBuilder {
	return new OperatorBuilder(ns, name);
}

//==============================================================================
// Registry Operations
//==============================================================================

export function registerOperator(
	registry: OperatorRegistry,
	op: Operator,
): OperatorRegistry {
	const next = new Map(registry);
	next.set(operatorKey(op.ns, op.name), op);
	return next;
}

export function mergeRegistries(...registries: OperatorRegistry[]): OperatorRegistry {
	const merged = new Map<string, Operator>();
	for (const registry of registries) {
		for (const [key, op] of registry) merged.set(key, op);
	}
	return merged;
}

export function lookupOperator(
	registry: OperatorRegistry,
	ns: string,
	name: string,
): Operator | undefined {
	return registry.get(operatorKey(ns, name));
}

const ORDINALS = ["Left", "Right"];

function describeParam(spec: ParamSpec): string {
	return spec === "any" ? "any value" : spec.join(" or ");
}

/**
 * Check arity and operand kinds, then run the operator.
 */
export function applyOperator(op: Operator, args: Value[]): Value {
	if (args.length !== op.params.length) {
		throw SettleError.typeError(
			"Operator '" + op.symbol + "' expects " + String(op.params.length) +
				" operands, got " + String(args.length),
		);
	}
	op.params.forEach((spec, i) => {
		const arg = args[i];
		if (spec === "any" || arg === undefined || spec.includes(arg.kind)) return;
		const position = op.params.length === 2
			? (ORDINALS[i] ?? "Operand") + " operand"
			: "Operand " + String(i + 1);
		throw SettleError.typeError(
			position + " of '" + op.symbol + "' must be " + describeParam(spec) +
				", got " + arg.kind,
		);
	});
	return op.fn(...args);
}
