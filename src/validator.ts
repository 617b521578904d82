// SPDX-License-Identifier: MIT
// Settle Program Validator
// Two-phase validation: Zod safeParse for structural, then semantic checks.

import { z } from "zod/v4";
import type { Declaration, Expr, Program } from "./ast.js";
import {
	exhaustive,
	invalidResult,
	type ValidationError,
	type ValidationResult,
	validResult,
} from "./errors.js";
import { KEYWORDS } from "./tokens.js";
import { ProgramSchema } from "./zod-schemas.js";

//==============================================================================
// Zod-to-ValidationError Conversion
//==============================================================================

// ["declarations", 1, "expr"] -> "declarations[1].expr", matching the semantic checks
function formatIssuePath(path: readonly PropertyKey[]): string {
	let out = "";
	for (const segment of path) {
		if (typeof segment === "number") out += "[" + String(segment) + "]";
		else out += (out === "" ? "" : ".") + String(segment);
	}
	return out || "$";
}

function zodToValidationErrors(error: z.ZodError): ValidationError[] {
	return error.issues.map(issue => ({
		path: formatIssuePath(issue.path),
		message: issue.message,
	}));
}

//==============================================================================
// Validation State (for semantic checks)
//==============================================================================

interface ValidationState {
	errors: ValidationError[];
	path: string[];
}

function pushPath(state: ValidationState, segment: string): void {
	state.path.push(segment);
}

function popPath(state: ValidationState): void {
	state.path.pop();
}

function currentPath(state: ValidationState): string {
	return state.path.length > 0 ? state.path.join(".") : "$";
}

function addError(
	state: ValidationState,
	message: string,
	value?: unknown,
): void {
	state.errors.push({
		path: currentPath(state),
		message,
		value,
	});
}

function within(state: ValidationState, segment: string, check: () => void): void {
	pushPath(state, segment);
	check();
	popPath(state);
}

//==============================================================================
// Identifiers
//==============================================================================

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

function checkIdentifier(state: ValidationState, segment: string, name: string): void {
	within(state, segment, () => {
		if (!IDENTIFIER.test(name)) {
			addError(state, "Invalid identifier: " + JSON.stringify(name), name);
		} else if (KEYWORDS.has(name)) {
			addError(state, "Reserved word used as identifier: " + name, name);
		}
	});
}

//==============================================================================
// Expressions
//==============================================================================

function checkExprList(state: ValidationState, segment: string, exprs: Expr[]): void {
	exprs.forEach((e, i) => {
		within(state, segment + "[" + String(i) + "]", () => {
			checkExpr(state, e);
		});
	});
}

function checkExpr(state: ValidationState, expr: Expr): void {
	switch (expr.kind) {
		case "identifier":
			checkIdentifier(state, "name", expr.name);
			return;
		case "number":
		case "string":
			return;
		case "literalSet":
		case "tuple":
			checkExprList(state, "elements", expr.elements);
			return;
		case "record":
			expr.fields.forEach((field, i) => {
				within(state, "fields[" + String(i) + "]", () => {
					checkIdentifier(state, "name", field.name);
					within(state, "value", () => {
						checkExpr(state, field.value);
					});
				});
			});
			return;
		case "setOp":
		case "comparison":
			within(state, "left", () => {
				checkExpr(state, expr.left);
			});
			within(state, "right", () => {
				checkExpr(state, expr.right);
			});
			return;
		case "comprehension": {
			checkExprList(state, "outputs", expr.outputs);
			const seen = new Set<string>();
			expr.inputs.forEach((name, i) => {
				const segment = "inputs[" + String(i) + "]";
				checkIdentifier(state, segment, name);
				if (seen.has(name)) {
					within(state, segment, () => {
						addError(state, "Duplicate comprehension variable: " + name, name);
					});
				}
				seen.add(name);
			});
			within(state, "source", () => {
				checkExpr(state, expr.source);
			});
			const predicate = expr.predicate;
			if (predicate) {
				within(state, "predicate", () => {
					checkExpr(state, predicate);
				});
			}
			return;
		}
		case "attribute":
			within(state, "object", () => {
				checkExpr(state, expr.object);
			});
			checkIdentifier(state, "name", expr.name);
			return;
		default:
			exhaustive(expr);
	}
}

//==============================================================================
// Declarations
//==============================================================================

// Expression kinds the parser accepts on the right of `let X =`
const SET_EXPRESSION_KINDS: ReadonlySet<Expr["kind"]> = new Set([
	"literalSet",
	"comprehension",
	"identifier",
	"setOp",
]);

function checkDeclaration(state: ValidationState, decl: Declaration): void {
	checkIdentifier(state, "name", decl.name);
	switch (decl.kind) {
		case "typeDef":
			if (decl.shape.kind === "record") {
				decl.shape.fields.forEach((field, i) => {
					within(state, "shape.fields[" + String(i) + "]", () => {
						checkIdentifier(state, "name", field.name);
						checkIdentifier(state, "typeName", field.typeName);
					});
				});
			} else {
				decl.shape.elements.forEach((typeName, i) => {
					checkIdentifier(state, "shape.elements[" + String(i) + "]", typeName);
				});
			}
			return;
		case "setDef":
			if (decl.typeName !== undefined) checkIdentifier(state, "typeName", decl.typeName);
			within(state, "expr", () => {
				if (!SET_EXPRESSION_KINDS.has(decl.expr.kind)) {
					addError(state, "Set definition must be a set expression, got " + decl.expr.kind, decl.expr.kind);
				}
				checkExpr(state, decl.expr);
			});
			return;
		default:
			exhaustive(decl);
	}
}

//==============================================================================
// Public Validators
//==============================================================================

export function validateProgram(doc: unknown): ValidationResult<Program> {
	// Phase 1: Structural validation via Zod
	const parsed = ProgramSchema.safeParse(doc);
	if (!parsed.success) {
		return invalidResult<Program>(zodToValidationErrors(parsed.error));
	}

	// Phase 2: Semantic validation on typed data
	const state: ValidationState = { errors: [], path: [] };
	parsed.data.declarations.forEach((decl, i) => {
		within(state, "declarations[" + String(i) + "]", () => {
			checkDeclaration(state, decl);
		});
	});

	if (state.errors.length > 0) {
		return invalidResult<Program>(state.errors);
	}

	return validResult(parsed.data);
}
