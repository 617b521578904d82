// SPDX-License-Identifier: MIT
// Settle Zod Schemas
// Schemas for the JSON form of a parsed program (`--emit-ast` output and
// `.json` program input). Runtime values stay in types.ts.
//
// The node interfaces live in ast.ts. Recursive schemas are annotated with
// z.ZodType<T> against them, since z.union over getters would otherwise
// infer `unknown`.

import { z } from "zod/v4";
import type {
	AttributeExpr,
	ComparisonExpr,
	ComprehensionExpr,
	Declaration,
	Expr,
	LiteralSetExpr,
	Program,
	RecordExpr,
	SetDefinition,
	SetOpExpr,
	TupleExpr,
} from "./ast.js";

//==============================================================================
// Primitives
//==============================================================================

const Name = z.string();

//==============================================================================
// Zod Schemas - Leaf Expressions
//==============================================================================

export const IdentifierExprSchema = z.object({
	kind: z.literal("identifier"),
	name: Name,
}).meta({ id: "IdentifierExpr", title: "Identifier", description: "Reference to a set or comprehension variable" });

export const NumberExprSchema = z.object({
	kind: z.literal("number"),
	value: z.number(),
	isFloat: z.boolean(),
}).meta({ id: "NumberExpr", title: "Number Literal", description: "Integer or float literal" });

export const StringExprSchema = z.object({
	kind: z.literal("string"),
	value: z.string(),
}).meta({ id: "StringExpr", title: "String Literal", description: "Decoded string literal" });

//==============================================================================
// Zod Schemas - Compound Expressions
//==============================================================================

export const LiteralSetExprSchema: z.ZodType<LiteralSetExpr> = z.object({
	kind: z.literal("literalSet"),
	get elements() { return z.array(ExprSchema); },
}).meta({ id: "LiteralSetExpr", title: "Set Literal", description: "Brace-delimited list of element expressions" });

export const TupleExprSchema: z.ZodType<TupleExpr> = z.object({
	kind: z.literal("tuple"),
	get elements() { return z.array(ExprSchema); },
}).meta({ id: "TupleExpr", title: "Tuple Literal", description: "Parenthesized, comma-separated expressions" });

export const RecordExprSchema: z.ZodType<RecordExpr> = z.object({
	kind: z.literal("record"),
	get fields() {
		return z.array(z.object({ name: Name, value: ExprSchema }));
	},
}).meta({ id: "RecordExpr", title: "Record Literal", description: "Named fields inside parentheses" });

export const SetOpExprSchema: z.ZodType<SetOpExpr> = z.object({
	kind: z.literal("setOp"),
	get left() { return ExprSchema; },
	op: z.enum(["|", "&", "*"]),
	get right() { return ExprSchema; },
}).meta({ id: "SetOpExpr", title: "Set Operation", description: "Union, intersection or cross product" });

export const ComprehensionExprSchema: z.ZodType<ComprehensionExpr> = z.object({
	kind: z.literal("comprehension"),
	get outputs() { return z.array(ExprSchema); },
	inputs: z.array(Name).min(1),
	get source() { return ExprSchema; },
	get predicate() { return ExprSchema.optional(); },
}).meta({ id: "ComprehensionExpr", title: "Set Comprehension", description: "Mapping over a source set with an optional filter" });

export const AttributeExprSchema: z.ZodType<AttributeExpr> = z.object({
	kind: z.literal("attribute"),
	get object() { return ExprSchema; },
	name: Name,
}).meta({ id: "AttributeExpr", title: "Attribute Access", description: "Field lookup on a record" });

export const ComparisonExprSchema: z.ZodType<ComparisonExpr> = z.object({
	kind: z.literal("comparison"),
	get left() { return ExprSchema; },
	op: z.enum(["==", "!=", "<", "<=", ">", ">="]),
	get right() { return ExprSchema; },
}).meta({ id: "ComparisonExpr", title: "Comparison", description: "Equality or ordering test" });

/** Union of all expression variants. Uses z.union (not discriminatedUnion) due to recursion. */
export const ExprSchema: z.ZodType<Expr> = z.union([
	IdentifierExprSchema,
	NumberExprSchema,
	StringExprSchema,
	LiteralSetExprSchema,
	TupleExprSchema,
	RecordExprSchema,
	SetOpExprSchema,
	ComprehensionExprSchema,
	AttributeExprSchema,
	ComparisonExprSchema,
]).meta({ id: "Expr", title: "Expression", description: "Union of all Settle expressions" });

//==============================================================================
// Zod Schemas - Declarations
//==============================================================================

export const FieldDeclSchema = z.object({
	name: Name,
	typeName: Name,
}).meta({ id: "FieldDecl", title: "Field Declaration", description: "Field name with its declared type name" });

export const ShapeDeclSchema = z.discriminatedUnion("kind", [
	z.object({ kind: z.literal("record"), fields: z.array(FieldDeclSchema) }),
	z.object({ kind: z.literal("tuple"), elements: z.array(Name) }),
]).meta({ id: "ShapeDecl", title: "Type Shape", description: "Record fields or tuple element types" });

export const TypeDefinitionSchema = z.object({
	kind: z.literal("typeDef"),
	name: Name,
	shape: ShapeDeclSchema,
}).meta({ id: "TypeDefinition", title: "Type Definition", description: "A named record shape, or a positional tuple shape (JSON programs only)" });

export const SetDefinitionSchema: z.ZodType<SetDefinition> = z.object({
	kind: z.literal("setDef"),
	name: Name,
	typeName: Name.optional(),
	get expr() { return ExprSchema; },
}).meta({ id: "SetDefinition", title: "Set Definition", description: "`let Name[: Type] = expr`" });

export const DeclarationSchema: z.ZodType<Declaration> = z.union([
	TypeDefinitionSchema,
	SetDefinitionSchema,
]).meta({ id: "Declaration", title: "Declaration", description: "Top-level type or set definition" });

export const ProgramSchema: z.ZodType<Program> = z.object({
	declarations: z.array(DeclarationSchema),
}).meta({ id: "Program", title: "Settle Program", description: "SettleProgram" });
