// SPDX-License-Identifier: MIT
// Settle AST
// Declarations and expressions produced by the parser.

//==============================================================================
// Expression AST
//==============================================================================

export type Expr =
	| IdentifierExpr
	| NumberExpr
	| StringExpr
	| LiteralSetExpr
	| TupleExpr
	| RecordExpr
	| SetOpExpr
	| ComprehensionExpr
	| AttributeExpr
	| ComparisonExpr;

export interface IdentifierExpr {
	kind: "identifier";
	name: string;
}

export interface NumberExpr {
	kind: "number";
	value: number;
	/** Lexeme had a fractional part */
	isFloat: boolean;
}

export interface StringExpr {
	kind: "string";
	value: string;
}

export interface LiteralSetExpr {
	kind: "literalSet";
	elements: Expr[];
}

export interface TupleExpr {
	kind: "tuple";
	elements: Expr[];
}

export interface RecordField {
	name: string;
	value: Expr;
}

export interface RecordExpr {
	kind: "record";
	fields: RecordField[];
}

export type SetOperator = "|" | "&" | "*";

export interface SetOpExpr {
	kind: "setOp";
	left: Expr;
	op: SetOperator;
	right: Expr;
}

export interface ComprehensionExpr {
	kind: "comprehension";
	outputs: Expr[];
	inputs: string[];
	source: Expr;
	predicate?: Expr | undefined;
}

export interface AttributeExpr {
	kind: "attribute";
	object: Expr;
	name: string;
}

export type ComparisonOperator = "==" | "!=" | "<" | "<=" | ">" | ">=";

export interface ComparisonExpr {
	kind: "comparison";
	left: Expr;
	op: ComparisonOperator;
	right: Expr;
}

//==============================================================================
// Declarations
//==============================================================================

export interface FieldDecl {
	name: string;
	typeName: string;
}

export type ShapeDecl =
	| { kind: "record"; fields: FieldDecl[] }
	| { kind: "tuple"; elements: string[] };

export interface TypeDefinition {
	kind: "typeDef";
	name: string;
	shape: ShapeDecl;
}

export interface SetDefinition {
	kind: "setDef";
	name: string;
	typeName?: string | undefined;
	expr: Expr;
}

export type Declaration = TypeDefinition | SetDefinition;

export interface Program {
	declarations: Declaration[];
}

//==============================================================================
// Constructors
//==============================================================================

export const identifier = (name: string): IdentifierExpr => ({ kind: "identifier", name });
export const numberLit = (value: number, isFloat = !Number.isInteger(value)): NumberExpr => ({
	kind: "number",
	value,
	isFloat,
});
export const stringLit = (value: string): StringExpr => ({ kind: "string", value });
export const literalSet = (elements: Expr[]): LiteralSetExpr => ({ kind: "literalSet", elements });
export const tupleLit = (elements: Expr[]): TupleExpr => ({ kind: "tuple", elements });
export const recordLit = (fields: RecordField[]): RecordExpr => ({ kind: "record", fields });
export const setOp = (left: Expr, op: SetOperator, right: Expr): SetOpExpr => ({
	kind: "setOp",
	left,
	op,
	right,
});
export const comprehension = (
	outputs: Expr[],
	inputs: string[],
	source: Expr,
	predicate?: Expr,
): ComprehensionExpr => {
	const result: ComprehensionExpr = { kind: "comprehension", outputs, inputs, source };
	if (predicate !== undefined) result.predicate = predicate;
	return result;
};
export const attribute = (object: Expr, name: string): AttributeExpr => ({
	kind: "attribute",
	object,
	name,
});
export const comparison = (
	left: Expr,
	op: ComparisonOperator,
	right: Expr,
): ComparisonExpr => ({ kind: "comparison", left, op, right });

export const typeDef = (name: string, shape: ShapeDecl): TypeDefinition => ({
	kind: "typeDef",
	name,
	shape,
});
export const setDef = (name: string, expr: Expr, typeName?: string): SetDefinition => {
	const result: SetDefinition = { kind: "setDef", name, expr };
	if (typeName !== undefined) result.typeName = typeName;
	return result;
};
