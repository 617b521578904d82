// SPDX-License-Identifier: MIT
// Settle Evaluator
// Implements big-step evaluation: ρ ⊢ e ⇓ v

import type {
	AttributeExpr,
	ComparisonExpr,
	ComprehensionExpr,
	Declaration,
	Expr,
	NumberExpr,
	Program,
	RecordExpr,
	SetDefinition,
	SetOpExpr,
	TypeDefinition,
} from "./ast.js";
import { applyOperator, lookupOperator, type OperatorRegistry } from "./domains/registry.js";
import {
	createEnvironment,
	defineType,
	defineValue,
	extendValueEnvMany,
	globalScope,
	lookupType,
	lookupValue,
	type Environment,
	type ValueEnv,
} from "./env.js";
import { capture, exhaustive, SettleError, type Result } from "./errors.js";
import { formatValue } from "./format.js";
import { createKernelRegistry } from "./stdlib/kernel.js";
import {
	elementsOf,
	floatVal,
	intVal,
	recordVal,
	setVal,
	stringVal,
	tupleVal,
	type TypeShape,
	type Value,
} from "./types.js";
import { isTruthy } from "./value-order.js";

//==============================================================================
// Results
//==============================================================================

export type DeclarationResult =
	| { kind: "type"; name: string; shape: TypeShape }
	| { kind: "set"; name: string; typeName?: string | undefined; value: Value };

// Source operator -> registry name
const SET_OPERATORS: Readonly<Record<string, string>> = {
	"|": "union",
	"&": "intersect",
	"*": "product",
};

const COMPARISON_OPERATORS: Readonly<Record<string, string>> = {
	"==": "eq",
	"!=": "neq",
	"<": "lt",
	"<=": "lte",
	">": "gt",
	">=": "gte",
};

//==============================================================================
// Evaluator Class
//==============================================================================

export class Evaluator {
	readonly env: Environment;
	private readonly registry: OperatorRegistry;

	constructor(env: Environment = createEnvironment(), registry: OperatorRegistry = createKernelRegistry()) {
		this.env = env;
		this.registry = registry;
	}

	/**
	 * Process one declaration against the environment.
	 */
	evaluateDeclaration(decl: Declaration): DeclarationResult {
		switch (decl.kind) {
			case "typeDef":
				return this.evalTypeDefinition(decl);
			case "setDef":
				return this.evalSetDefinition(decl);
			default:
				return exhaustive(decl);
		}
	}

	/**
	 * Evaluate an expression: ρ ⊢ e ⇓ v
	 */
	evaluate(expr: Expr, scope: ValueEnv = globalScope(this.env)): Value {
		return this.evalExpr(expr, scope);
	}

	private evalExpr(expr: Expr, scope: ValueEnv): Value {
		switch (expr.kind) {
			case "identifier":
				return this.evalIdentifier(expr.name, scope);
			case "number":
				return evalNumber(expr);
			case "string":
				return stringVal(expr.value);
			case "literalSet":
				return setVal(expr.elements.map((e) => this.evalExpr(e, scope)));
			case "tuple":
				return tupleVal(expr.elements.map((e) => this.evalExpr(e, scope)));
			case "record":
				return this.evalRecord(expr, scope);
			case "setOp":
				return this.evalSetOp(expr, scope);
			case "comprehension":
				return this.evalComprehension(expr, scope);
			case "attribute":
				return this.evalAttribute(expr, scope);
			case "comparison":
				return this.evalComparison(expr, scope);
			default:
				return exhaustive(expr);
		}
	}

	//==========================================================================
	// Declarations
	//==========================================================================

	private evalTypeDefinition(decl: TypeDefinition): DeclarationResult {
		defineType(this.env, decl.name, decl.shape);
		return { kind: "type", name: decl.name, shape: decl.shape };
	}

	private evalSetDefinition(decl: SetDefinition): DeclarationResult {
		const value = this.evaluate(decl.expr);
		if (decl.typeName !== undefined) {
			this.checkShape(decl.name, decl.typeName, value);
		}
		defineValue(this.env, decl.name, value, decl.typeName);
		return { kind: "set", name: decl.name, typeName: decl.typeName, value };
	}

	/**
	 * Every element must fit the named shape. Records may carry extra fields.
	 */
	private checkShape(setName: string, typeName: string, value: Value): void {
		const shape = lookupType(this.env.types, typeName);
		if (!shape) {
			throw SettleError.typeError("Type '" + typeName + "' not defined for set '" + setName + "'");
		}
		if (value.kind !== "set") {
			throw SettleError.typeError(
				"Set '" + setName + "' of type '" + typeName + "' evaluated to a non-set value: " + value.kind,
			);
		}

		for (const item of value.value.values()) {
			const shown = formatValue(item, this.env.types);
			if (shape.kind === "record") {
				if (item.kind !== "record") {
					throw SettleError.typeError(
						"Expected record for type '" + typeName + "', got " + item.kind + ": " + shown,
					);
				}
				const missing = shape.fields.map((f) => f.name).filter((name) => !item.value.has(name));
				if (missing.length > 0) {
					throw SettleError.typeError(
						"Item " + shown + " missing fields for type '" + typeName + "': " + missing.join(", "),
					);
				}
			} else {
				if (item.kind !== "tuple") {
					throw SettleError.typeError(
						"Expected tuple for type '" + typeName + "', got " + item.kind + ": " + shown,
					);
				}
				if (item.value.length !== shape.elements.length) {
					throw SettleError.typeError(
						"Item " + shown + " has wrong number of fields for type '" + typeName +
							"': expected " + String(shape.elements.length) + ", got " + String(item.value.length),
					);
				}
			}
		}
	}

	//==========================================================================
	// Expressions
	//==========================================================================

	/**
	 * E-Var: ρ(x) = v
	 *        -------------
	 *        ρ ⊢ x ⇓ v
	 */
	private evalIdentifier(name: string, scope: ValueEnv): Value {
		const value = lookupValue(scope, name);
		if (value !== undefined) return value;
		if (lookupType(this.env.types, name)) throw SettleError.typeAsValue(name);
		throw SettleError.unboundIdentifier(name);
	}

	private evalRecord(expr: RecordExpr, scope: ValueEnv): Value {
		return recordVal(
			expr.fields.map((field) => [field.name, this.evalExpr(field.value, scope)] as const),
		);
	}

	/**
	 * E-SetOp: ρ ⊢ l ⇓ v1    ρ ⊢ r ⇓ v2    op(v1, v2) ⇓ v
	 *          ---------------------------------------------
	 *                      ρ ⊢ l op r ⇓ v
	 */
	private evalSetOp(expr: SetOpExpr, scope: ValueEnv): Value {
		const left = this.evalExpr(expr.left, scope);
		const right = this.evalExpr(expr.right, scope);
		return this.dispatch("set", SET_OPERATORS, expr.op, "set operator", [left, right]);
	}

	/**
	 * E-Compr: ρ ⊢ src ⇓ S    for each s ∈ S that binds xs:
	 *          ρ, xs:s ⊢ pred ⇓ truthy    ρ, xs:s ⊢ out ⇓ v
	 *          ------------------------------------------------
	 *          ρ ⊢ { out | xs of src, pred } ⇓ { v, ... }
	 *
	 * Elements that do not destructure onto the input variables are skipped.
	 */
	private evalComprehension(expr: ComprehensionExpr, scope: ValueEnv): Value {
		const source = this.evalExpr(expr.source, scope);
		if (source.kind !== "set" && source.kind !== "record") {
			throw SettleError.typeError(
				"Set comprehension source must be a set or record, got " + source.kind,
			);
		}

		const results: Value[] = [];
		for (const element of elementsOf(source)) {
			const bindings = bindInputs(expr.inputs, element);
			if (!bindings) continue;
			const child = extendValueEnvMany(scope, bindings);

			if (expr.predicate && !isTruthy(this.evalExpr(expr.predicate, child))) continue;

			const [single] = expr.outputs;
			results.push(
				expr.outputs.length === 1 && single
					? this.evalExpr(single, child)
					: tupleVal(expr.outputs.map((out) => this.evalExpr(out, child))),
			);
		}
		return setVal(results);
	}

	private evalAttribute(expr: AttributeExpr, scope: ValueEnv): Value {
		const object = this.evalExpr(expr.object, scope);
		if (object.kind !== "record") {
			throw SettleError.typeError(
				"Cannot access attribute '" + expr.name + "' on non-record value of kind " + object.kind,
			);
		}
		const field = object.value.get(expr.name);
		if (field === undefined) {
			throw SettleError.missingAttribute(formatValue(object, this.env.types), expr.name);
		}
		return field;
	}

	private evalComparison(expr: ComparisonExpr, scope: ValueEnv): Value {
		const left = this.evalExpr(expr.left, scope);
		const right = this.evalExpr(expr.right, scope);
		return this.dispatch("core", COMPARISON_OPERATORS, expr.op, "comparison operator", [left, right]);
	}

	private dispatch(
		ns: string,
		table: Readonly<Record<string, string>>,
		symbol: string,
		what: string,
		args: Value[],
	): Value {
		const name = table[symbol];
		const op = name === undefined ? undefined : lookupOperator(this.registry, ns, name);
		if (!op) throw SettleError.unsupported("Unknown " + what + ": " + symbol);
		return applyOperator(op, args);
	}
}

//==============================================================================
// Helpers
//==============================================================================

function evalNumber(expr: NumberExpr): Value {
	if (!Number.isFinite(expr.value)) {
		throw SettleError.valueError("Invalid number literal: " + String(expr.value));
	}
	if (expr.isFloat) return floatVal(expr.value);
	if (!Number.isInteger(expr.value)) {
		throw SettleError.valueError("Integer literal has a fractional part: " + String(expr.value));
	}
	if (!Number.isSafeInteger(expr.value)) {
		throw SettleError.valueError("Integer literal out of range: " + String(expr.value));
	}
	return intVal(expr.value);
}

/**
 * One input variable takes the whole element; several destructure a tuple of
 * the same arity. Anything else does not bind.
 */
function bindInputs(inputs: string[], element: Value): [string, Value][] | null {
	const [only] = inputs;
	if (inputs.length === 1 && only !== undefined) return [[only, element]];
	if (element.kind !== "tuple" || element.value.length !== inputs.length) return null;
	const bindings: [string, Value][] = [];
	inputs.forEach((name, i) => {
		const part = element.value[i];
		if (part !== undefined) bindings.push([name, part]);
	});
	return bindings;
}

//==============================================================================
// Program Evaluation
//==============================================================================

/**
 * Evaluate declarations in order. The first failure stops the run; bindings
 * made by earlier declarations stay in `env`.
 */
export function evaluateProgram(
	program: Program,
	env: Environment = createEnvironment(),
	registry?: OperatorRegistry,
): Result<DeclarationResult[]> {
	const evaluator = new Evaluator(env, registry);
	return capture(() => program.declarations.map((decl) => evaluator.evaluateDeclaration(decl)));
}

export function evaluateDeclaration(
	decl: Declaration,
	env: Environment,
	registry?: OperatorRegistry,
): Result<DeclarationResult> {
	const evaluator = new Evaluator(env, registry);
	return capture(() => evaluator.evaluateDeclaration(decl));
}

export function evaluateExpression(
	expr: Expr,
	env: Environment = createEnvironment(),
	registry?: OperatorRegistry,
): Result<Value> {
	const evaluator = new Evaluator(env, registry);
	return capture(() => evaluator.evaluate(expr));
}
