// SPDX-License-Identifier: MIT
// Settle Lexer
// Turns source text into a token list terminated by a single EOF token.

import { KEYWORDS, TokenStream, TokenTypes, type Token, type TokenType } from "./tokens.js";

const SINGLE_CHAR: ReadonlyMap<string, TokenType> = new Map<string, TokenType>([
	["{", TokenTypes.SetOpen],
	["}", TokenTypes.SetClose],
	["(", TokenTypes.LParen],
	[")", TokenTypes.RParen],
	[",", TokenTypes.Comma],
	[":", TokenTypes.Colon],
	["|", TokenTypes.Pipe],
	["&", TokenTypes.Ampersand],
	["*", TokenTypes.Cross],
	[".", TokenTypes.Dot],
]);

// "<" followed by "=" etc.
const WITH_EQUALS: ReadonlyMap<string, [TokenType, TokenType | null]> = new Map<string, [TokenType, TokenType | null]>([
	["=", [TokenTypes.EqualsEquals, TokenTypes.Equals]],
	["<", [TokenTypes.LessEqual, TokenTypes.Less]],
	[">", [TokenTypes.GreaterEqual, TokenTypes.Greater]],
	["!", [TokenTypes.NotEqual, null]],
]);

const NUMBER = /^\d+(\.\d+)?(?![.a-zA-Z_])/;
const IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]*/;

const ESCAPES: Readonly<Record<string, string>> = {
	n: "\n",
	t: "\t",
	"\\": "\\",
	'"': '"',
};

export class Lexer {
	private pos = 0;
	private line = 1;
	private column = 1;
	private readonly input: string;

	constructor(input: string) {
		this.input = input;
	}

	tokenize(): Token[] {
		const tokens: Token[] = [];
		for (;;) {
			this.skipWhitespaceAndComments();
			if (this.pos >= this.input.length) break;
			tokens.push(this.nextToken());
		}
		tokens.push(this.make(TokenTypes.EOF, "", this.pos, this.line, this.column));
		return tokens;
	}

	private nextToken(): Token {
		const start = this.pos;
		const line = this.line;
		const column = this.column;
		const char = this.input.charAt(this.pos);

		const single = SINGLE_CHAR.get(char);
		if (single !== undefined) {
			this.advance(1);
			return this.make(single, char, start, line, column);
		}

		const compound = WITH_EQUALS.get(char);
		if (compound !== undefined) {
			const [withEquals, alone] = compound;
			if (this.input.charAt(this.pos + 1) === "=") {
				this.advance(2);
				return this.make(withEquals, char + "=", start, line, column);
			}
			this.advance(1);
			return this.make(alone ?? TokenTypes.Illegal, char, start, line, column);
		}

		const rest = this.input.slice(this.pos);

		const num = NUMBER.exec(rest);
		if (num) {
			this.advance(num[0].length);
			return this.make(TokenTypes.Number, num[0], start, line, column);
		}

		if (char === '"') {
			return this.readString(start, line, column);
		}

		const ident = IDENTIFIER.exec(rest);
		if (ident) {
			const lexeme = ident[0];
			this.advance(lexeme.length);
			return this.make(KEYWORDS.get(lexeme) ?? TokenTypes.Identifier, lexeme, start, line, column);
		}

		this.advance(1);
		return this.make(TokenTypes.Illegal, char, start, line, column);
	}

	private readString(start: number, line: number, column: number): Token {
		let i = this.pos + 1;
		let value = "";
		while (i < this.input.length) {
			const c = this.input.charAt(i);
			if (c === '"') {
				this.advance(i + 1 - this.pos);
				return this.make(TokenTypes.String, value, start, line, column);
			}
			if (c === "\\" && i + 1 < this.input.length) {
				const next = this.input.charAt(i + 1);
				value += ESCAPES[next] ?? next;
				i += 2;
				continue;
			}
			value += c;
			i++;
		}
		// Unterminated: the opening quote alone is illegal, lexing resumes after it
		this.advance(1);
		return this.make(TokenTypes.Illegal, '"', start, line, column);
	}

	private skipWhitespaceAndComments(): void {
		while (this.pos < this.input.length) {
			const char = this.input.charAt(this.pos);
			if (/\s/.test(char)) {
				this.advance(1);
			} else if (this.input.startsWith("//", this.pos)) {
				while (this.pos < this.input.length && this.input.charAt(this.pos) !== "\n") {
					this.advance(1);
				}
			} else {
				return;
			}
		}
	}

	private advance(count: number): void {
		for (let k = 0; k < count; k++) {
			if (this.input.charAt(this.pos) === "\n") {
				this.line++;
				this.column = 1;
			} else {
				this.column++;
			}
			this.pos++;
		}
	}

	private make(type: TokenType, lexeme: string, offset: number, line: number, column: number): Token {
		return { type, lexeme, offset, line, column };
	}
}

export function tokenize(source: string): Token[] {
	return new Lexer(source).tokenize();
}

export function tokenStream(source: string): TokenStream {
	return new TokenStream(tokenize(source));
}
