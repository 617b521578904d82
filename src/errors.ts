// SPDX-License-Identifier: MIT
// Settle Error Types
// Error domain for syntax, name, type and evaluation errors

import type { SourcePosition, Token, TokenType } from "./tokens.js";

//==============================================================================
// Error Codes
//==============================================================================

export const ErrorCodes = {
	// Parse errors
	SyntaxError: "SyntaxError",

	// Lookup errors
	NameError: "NameError",
	AttributeError: "AttributeError",

	// Shape errors
	TypeError: "TypeError",

	// Malformed input reaching evaluation
	ValueError: "ValueError",
	UnsupportedError: "UnsupportedError",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

//==============================================================================
// Syntax Error Details
//==============================================================================

export interface SyntaxDetails {
	token: Token;
	expected: TokenType[];
	position: SourcePosition;
}

//==============================================================================
// Settle Error Class
//==============================================================================

export class SettleError extends Error {
	readonly code: ErrorCode;
	readonly syntax?: SyntaxDetails;

	constructor(code: ErrorCode, message: string, syntax?: SyntaxDetails) {
		super(message);
		this.name = "SettleError";
		this.code = code;
		if (syntax !== undefined) this.syntax = syntax;
	}

	/**
	 * Create a SyntaxError at the given token
	 */
	static syntax(
		message: string,
		token: Token,
		expected: TokenType[] = [],
	): SettleError {
		const position = { offset: token.offset, line: token.line, column: token.column };
		return new SettleError(
			ErrorCodes.SyntaxError,
			message + " at line " + String(token.line) + ", column " + String(token.column),
			{ token, expected, position },
		);
	}

	/**
	 * Create a NameError for an unresolved identifier
	 */
	static unboundIdentifier(name: string): SettleError {
		return new SettleError(
			ErrorCodes.NameError,
			"Identifier '" + name + "' not found in the current scope",
		);
	}

	/**
	 * Create a NameError for a type name used as a value
	 */
	static typeAsValue(name: string): SettleError {
		return new SettleError(
			ErrorCodes.NameError,
			"'" + name + "' is a type, not a value",
		);
	}

	static typeError(message: string): SettleError {
		return new SettleError(ErrorCodes.TypeError, message);
	}

	/**
	 * Create an AttributeError for a record without the requested field
	 */
	static missingAttribute(record: string, attribute: string): SettleError {
		return new SettleError(
			ErrorCodes.AttributeError,
			"Record " + record + " has no attribute '" + attribute + "'",
		);
	}

	static valueError(message: string): SettleError {
		return new SettleError(ErrorCodes.ValueError, message);
	}

	static unsupported(message: string): SettleError {
		return new SettleError(ErrorCodes.UnsupportedError, message);
	}
}

export function isSettleError(e: unknown): e is SettleError {
	return e instanceof SettleError;
}

//==============================================================================
// Result Type
//==============================================================================

export type Result<T> =
	| { ok: true; value: T }
	| { ok: false; error: SettleError };

export function okResult<T>(value: T): Result<T> {
	return { ok: true, value };
}

export function errResult<T>(error: SettleError): Result<T> {
	return { ok: false, error };
}

/**
 * Run `fn`, turning a thrown SettleError into a failed result.
 * Anything else is a bug and keeps propagating.
 */
export function capture<T>(fn: () => T): Result<T> {
	try {
		return okResult(fn());
	} catch (e) {
		if (isSettleError(e)) return errResult(e);
		throw e;
	}
}

//==============================================================================
// Validation Error Type
//==============================================================================

export interface ValidationError {
	path: string;
	message: string;
	value?: unknown;
}

export interface ValidationResult<T> {
	valid: boolean;
	errors: ValidationError[];
	value?: T;
}

/**
 * Create a successful validation result.
 */
export function validResult<T>(value: T): ValidationResult<T> {
	return { valid: true, errors: [], value };
}

/**
 * Create a failed validation result.
 */
export function invalidResult<T>(
	errors: ValidationError[],
): ValidationResult<T> {
	return { valid: false, errors };
}

//==============================================================================
// Exhaustiveness Checking
//==============================================================================

/**
 * Asserts that a value is `never`, ensuring exhaustive type checking.
 * Use in switch default cases to ensure all variants are handled.
 *
 * @example
 * switch (expr.kind) {
 *   case "number": return ...;
 *   case "identifier": return ...;
 *   default:
 *     exhaustive(expr); // Type error if a kind is missing
 * }
 */
export function exhaustive(value: never): never {
	throw new Error(`Unexpected value: ${String(value)}`);
}
