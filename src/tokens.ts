// SPDX-License-Identifier: MIT
// Settle Token Types

//==============================================================================
// Token Types
//==============================================================================

export const TokenTypes = {
	Identifier: "IDENTIFIER",
	Number: "NUMBER",
	String: "STRING",

	// Keywords
	Let: "LET",
	Type: "TYPE",
	Of: "OF",
	Record: "RECORD",
	Filter: "FILTER",

	// Punctuation and set operators
	Equals: "EQUALS",
	Pipe: "PIPE",
	Ampersand: "AMPERSAND",
	Cross: "CROSS",
	SetOpen: "SET_OPEN",
	SetClose: "SET_CLOSE",
	LParen: "LPAREN",
	RParen: "RPAREN",
	Comma: "COMMA",
	Colon: "COLON",
	Dot: "DOT",

	// Comparison operators
	EqualsEquals: "EQUALS_EQUALS",
	NotEqual: "NOT_EQUAL",
	Less: "LESS",
	LessEqual: "LESS_EQUAL",
	Greater: "GREATER",
	GreaterEqual: "GREATER_EQUAL",

	EOF: "EOF",
	Illegal: "ILLEGAL",
} as const;

export type TokenType = (typeof TokenTypes)[keyof typeof TokenTypes];

export const KEYWORDS: ReadonlyMap<string, TokenType> = new Map<string, TokenType>([
	["let", TokenTypes.Let],
	["type", TokenTypes.Type],
	["of", TokenTypes.Of],
	["Record", TokenTypes.Record],
	["filter", TokenTypes.Filter],
]);

//==============================================================================
// Tokens
//==============================================================================

export interface SourcePosition {
	offset: number;
	line: number;
	column: number;
}

export interface Token extends SourcePosition {
	type: TokenType;
	lexeme: string;
}

export function describeToken(token: Token): string {
	if (token.type === TokenTypes.EOF) return "end of input";
	return token.type + " ('" + token.lexeme + "')";
}

//==============================================================================
// Token Stream
//==============================================================================

/**
 * Replayable, position-indexed view over a token list that always ends in EOF.
 */
export class TokenStream {
	private readonly tokens: Token[];
	private index = 0;

	constructor(tokens: Token[]) {
		const last = tokens[tokens.length - 1];
		if (last?.type === TokenTypes.EOF) {
			this.tokens = tokens;
		} else {
			const end = last ? last.offset + last.lexeme.length : 0;
			this.tokens = [
				...tokens,
				{ type: TokenTypes.EOF, lexeme: "", offset: end, line: last?.line ?? 1, column: last ? last.column + last.lexeme.length : 1 },
			];
		}
	}

	/** Token `offset` places ahead of the cursor; clamps to EOF. */
	peek(offset = 0): Token {
		const i = Math.min(this.index + offset, this.tokens.length - 1);
		const token = this.tokens[i];
		if (!token) throw new Error("Token stream is empty");
		return token;
	}

	/** Consume the current token. The cursor never moves past EOF. */
	advance(): Token {
		const token = this.peek();
		if (token.type !== TokenTypes.EOF) this.index++;
		return token;
	}

	check(type: TokenType): boolean {
		return this.peek().type === type;
	}

	atEnd(): boolean {
		return this.check(TokenTypes.EOF);
	}

	mark(): number {
		return this.index;
	}

	reset(mark: number): void {
		this.index = mark;
	}
}
