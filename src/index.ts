// Settle - a declarative set language
// Main exports

//==============================================================================
// Types
//==============================================================================

export type {
	AttributeExpr,
	ComparisonExpr,
	ComparisonOperator,
	ComprehensionExpr,
	Declaration,
	Expr,
	FieldDecl,
	Program,
	RecordExpr,
	SetDefinition,
	SetOperator,
	ShapeDecl,
	TypeDefinition,
} from "./ast.js";

export type { Value, ValueKind, TypeShape, SetVal, TupleVal, RecordVal } from "./types.js";

export type { Environment, TypeEnv, ValueEnv } from "./env.js";

export type { ErrorCode, Result, ValidationError, ValidationResult } from "./errors.js";

export type { Operator, OperatorRegistry } from "./domains/registry.js";

export type { Token, TokenType, SourcePosition } from "./tokens.js";

//==============================================================================
// Value Constructors and Utilities
//==============================================================================

export {
	boolVal, emptySet, floatVal, intVal, recordVal, setVal, stringVal, tupleVal,
	recordShape, tupleShape,
	hashValue, elementsOf, isRecord, isSet, isTuple,
} from "./types.js";

export { valueEqual, isTruthy, applyOrdering, compareForSort } from "./value-order.js";

//==============================================================================
// AST Constructors
//==============================================================================

export {
	attribute, comparison, comprehension, identifier, literalSet, numberLit,
	recordLit, setDef, setOp, stringLit, tupleLit, typeDef,
} from "./ast.js";

//==============================================================================
// Error Codes
//==============================================================================

export { ErrorCodes, SettleError, isSettleError, exhaustive } from "./errors.js";

//==============================================================================
// Lexing and Parsing
//==============================================================================

export { TokenTypes, TokenStream } from "./tokens.js";
export { Lexer, tokenize, tokenStream } from "./lexer.js";
export { Parser, parse, parseExpression, parseSource } from "./parser.js";

//==============================================================================
// Evaluation
//==============================================================================

export {
	createEnvironment, defineType, defineValue, emptyValueEnv, extendValueEnv,
	extendValueEnvMany, globalScope, lookupValue,
} from "./env.js";

export {
	Evaluator, evaluateDeclaration, evaluateExpression, evaluateProgram,
	type DeclarationResult,
} from "./evaluator.js";

export {
	run, runProgram, formatResults, summarizeEnvironment,
	type DeclarationOutcome, type RunOptions, type RunOutput,
} from "./run.js";

//==============================================================================
// Operator Registry
//==============================================================================

export {
	applyOperator, defineOperator, lookupOperator, mergeRegistries, registerOperator,
} from "./domains/registry.js";
export { createCoreRegistry } from "./domains/core.js";
export { createSetRegistry } from "./domains/set.js";
export { createKernelRegistry } from "./stdlib/kernel.js";

//==============================================================================
// Formatting
//==============================================================================

export { formatDeclarationResult, formatTypeShape, formatValue } from "./format.js";

//==============================================================================
// Schemas and Validation
//==============================================================================

export { ProgramSchema, ExprSchema, DeclarationSchema } from "./zod-schemas.js";
export { programJsonSchema, isProgramSchema } from "./schemas.js";
export { validateProgram } from "./validator.js";

//==============================================================================
// CLI
//==============================================================================

export { parseArgs, loadProgram, readProgramFile, type Options } from "./cli-utils.js";
export { main, type CliIO } from "./cli.js";
