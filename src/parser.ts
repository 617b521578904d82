// SPDX-License-Identifier: MIT
// Settle Parser
// Recursive descent over a token stream; produces a Program of declarations.

import {
	attribute,
	comparison,
	comprehension,
	identifier,
	literalSet,
	numberLit,
	recordLit,
	setDef,
	setOp,
	stringLit,
	tupleLit,
	typeDef,
	type ComparisonOperator,
	type Declaration,
	type Expr,
	type FieldDecl,
	type IdentifierExpr,
	type Program,
	type RecordField,
	type SetDefinition,
	type SetOperator,
	type TypeDefinition,
} from "./ast.js";
import { capture, SettleError, type Result } from "./errors.js";
import { tokenize } from "./lexer.js";
import {
	describeToken,
	TokenStream,
	TokenTypes,
	type Token,
	type TokenType,
} from "./tokens.js";

const SET_OPERATORS: ReadonlyMap<TokenType, SetOperator> = new Map<TokenType, SetOperator>([
	[TokenTypes.Pipe, "|"],
	[TokenTypes.Ampersand, "&"],
	[TokenTypes.Cross, "*"],
]);

const COMPARISON_OPERATORS: ReadonlyMap<TokenType, ComparisonOperator> = new Map<TokenType, ComparisonOperator>([
	[TokenTypes.EqualsEquals, "=="],
	[TokenTypes.NotEqual, "!="],
	[TokenTypes.Less, "<"],
	[TokenTypes.LessEqual, "<="],
	[TokenTypes.Greater, ">"],
	[TokenTypes.GreaterEqual, ">="],
]);

const EXPRESSION_START: TokenType[] = [
	TokenTypes.Number,
	TokenTypes.String,
	TokenTypes.Identifier,
	TokenTypes.SetOpen,
	TokenTypes.LParen,
];

//==============================================================================
// Parser Class
//==============================================================================

export class Parser {
	private readonly tokens: TokenStream;

	constructor(tokens: Token[] | TokenStream) {
		this.tokens = tokens instanceof TokenStream ? tokens : new TokenStream(tokens);
	}

	/**
	 * Program := (TypeDefinition | SetDefinition)* EOF
	 */
	parseProgram(): Program {
		const declarations: Declaration[] = [];
		while (!this.tokens.atEnd()) {
			declarations.push(this.parseDeclaration());
		}
		return { declarations };
	}

	/**
	 * A single predicate expression spanning the whole stream.
	 */
	parseStandaloneExpression(): Expr {
		const expr = this.parsePredicateExpression();
		this.expect(TokenTypes.EOF, "Unexpected trailing token");
		return expr;
	}

	private parseDeclaration(): Declaration {
		const token = this.tokens.peek();
		switch (token.type) {
			case TokenTypes.Type:
				return this.parseTypeDefinition();
			case TokenTypes.Let:
				return this.parseSetDefinition();
			default:
				throw SettleError.syntax(
					"Unexpected token at top level: " + describeToken(token),
					token,
					[TokenTypes.Type, TokenTypes.Let],
				);
		}
	}

	/**
	 * type Name : Record(field: typeName, ...)
	 *
	 * Record is the only shape with source syntax; positional shapes reach the
	 * evaluator through a JSON program.
	 */
	private parseTypeDefinition(): TypeDefinition {
		this.expect(TokenTypes.Type);
		const name = this.expect(TokenTypes.Identifier).lexeme;
		this.expect(TokenTypes.Colon);

		const shapeToken = this.tokens.peek();
		if (shapeToken.type !== TokenTypes.Record) {
			throw SettleError.syntax(
				"Unsupported type shape " + describeToken(shapeToken),
				shapeToken,
				[TokenTypes.Record],
			);
		}
		this.tokens.advance();
		return typeDef(name, { kind: "record", fields: this.parseFieldDecls() });
	}

	private parseFieldDecls(): FieldDecl[] {
		this.expect(TokenTypes.LParen);
		const fields: FieldDecl[] = [];
		if (!this.tokens.check(TokenTypes.RParen)) {
			do {
				const fieldName = this.expect(TokenTypes.Identifier).lexeme;
				this.expect(TokenTypes.Colon);
				const typeName = this.expect(TokenTypes.Identifier).lexeme;
				fields.push({ name: fieldName, typeName });
			} while (this.match(TokenTypes.Comma));
		}
		this.expect(TokenTypes.RParen);
		return fields;
	}

	/**
	 * let Name [: TypeName] = SetExpr
	 */
	private parseSetDefinition(): SetDefinition {
		this.expect(TokenTypes.Let);
		const name = this.expect(TokenTypes.Identifier).lexeme;
		let typeName: string | undefined;
		if (this.match(TokenTypes.Colon)) {
			typeName = this.expect(TokenTypes.Identifier).lexeme;
		}
		this.expect(TokenTypes.Equals);
		return setDef(name, this.parseSetExpr(), typeName);
	}

	/**
	 * SetExpr := SetPrimary (("|" | "&" | "*") SetPrimary)*
	 * One precedence level, left-associative.
	 */
	private parseSetExpr(): Expr {
		let node = this.parseSetPrimary();
		for (;;) {
			const op = SET_OPERATORS.get(this.tokens.peek().type);
			if (op === undefined) return node;
			this.tokens.advance();
			node = setOp(node, op, this.parseSetPrimary());
		}
	}

	private parseSetPrimary(): Expr {
		const token = this.tokens.peek();
		if (token.type === TokenTypes.SetOpen) return this.parseLiteralSetOrComprehension();
		if (token.type === TokenTypes.Identifier) return this.parseIdentifier();
		throw SettleError.syntax(
			"Expected set expression but got " + describeToken(token),
			token,
			[TokenTypes.SetOpen, TokenTypes.Identifier],
		);
	}

	/**
	 * "{" "}"
	 * "{" Expr ("," Expr)* ","? "}"
	 * "{" Output "|" Inputs "of" Identifier ("," Predicate)? "}"
	 */
	private parseLiteralSetOrComprehension(): Expr {
		this.expect(TokenTypes.SetOpen);
		if (this.match(TokenTypes.SetClose)) return literalSet([]);

		const first = this.parsePredicateExpression();

		if (this.match(TokenTypes.Pipe)) {
			const inputs = this.parseComprehensionInputs();
			this.expect(TokenTypes.Of);
			const source = this.parseIdentifier();
			const predicate = this.match(TokenTypes.Comma)
				? this.parsePredicateExpression()
				: undefined;
			this.expect(TokenTypes.SetClose, undefined, [TokenTypes.Comma, TokenTypes.SetClose]);
			const outputs = first.kind === "tuple" ? first.elements : [first];
			return comprehension(outputs, inputs, source, predicate);
		}

		const elements = [first];
		while (this.match(TokenTypes.Comma)) {
			if (this.tokens.check(TokenTypes.SetClose)) break;
			elements.push(this.parsePredicateExpression());
		}
		this.expect(TokenTypes.SetClose, undefined, [TokenTypes.Pipe, TokenTypes.Comma, TokenTypes.SetClose]);
		return literalSet(elements);
	}

	private parseComprehensionInputs(): string[] {
		if (!this.match(TokenTypes.LParen)) {
			return [this.expect(TokenTypes.Identifier).lexeme];
		}
		const inputs: string[] = [];
		for (;;) {
			inputs.push(this.expect(TokenTypes.Identifier).lexeme);
			if (this.match(TokenTypes.Comma)) continue;
			this.expect(
				TokenTypes.RParen,
				"Expected ',' or ')' in comprehension input variables",
				[TokenTypes.Comma, TokenTypes.RParen],
			);
			return inputs;
		}
	}

	//==========================================================================
	// Predicate expressions
	//==========================================================================

	/**
	 * Comparison := Term (CmpOp Term)*
	 * Chains re-associate to the left: a < b < c is (a < b) < c.
	 */
	private parsePredicateExpression(): Expr {
		let node = this.parseTerm();
		for (;;) {
			const op = COMPARISON_OPERATORS.get(this.tokens.peek().type);
			if (op === undefined) return node;
			this.tokens.advance();
			node = comparison(node, op, this.parseTerm());
		}
	}

	/**
	 * Term := Primary ("." Identifier)*
	 */
	private parseTerm(): Expr {
		let node = this.parsePrimary();
		while (this.match(TokenTypes.Dot)) {
			node = attribute(node, this.expect(TokenTypes.Identifier).lexeme);
		}
		return node;
	}

	private parsePrimary(): Expr {
		const token = this.tokens.peek();
		switch (token.type) {
			case TokenTypes.Number:
				this.tokens.advance();
				return parseNumber(token.lexeme);
			case TokenTypes.String:
				this.tokens.advance();
				return stringLit(token.lexeme);
			case TokenTypes.Identifier:
				return this.parseIdentifier();
			case TokenTypes.SetOpen:
				return this.parseLiteralSetOrComprehension();
			case TokenTypes.LParen:
				return this.parseParenthesized();
			default:
				throw SettleError.syntax(
					"Unexpected token in expression: " + describeToken(token),
					token,
					EXPRESSION_START,
				);
		}
	}

	/**
	 * "(" Identifier ":" ...  -> record instance
	 * "(" ")"                 -> empty tuple
	 * "(" Expr ("," ...)? ")" -> tuple, or the bare inner expression
	 */
	private parseParenthesized(): Expr {
		if (
			this.tokens.peek(1).type === TokenTypes.Identifier &&
			this.tokens.peek(2).type === TokenTypes.Colon
		) {
			return this.parseRecordInstance();
		}

		this.expect(TokenTypes.LParen);
		if (this.match(TokenTypes.RParen)) return tupleLit([]);

		const first = this.parsePredicateExpression();
		if (!this.tokens.check(TokenTypes.Comma)) {
			this.expect(TokenTypes.RParen, undefined, [TokenTypes.Comma, TokenTypes.RParen]);
			return first;
		}

		const elements = [first];
		while (this.match(TokenTypes.Comma)) {
			if (this.tokens.check(TokenTypes.RParen)) break;
			elements.push(this.parsePredicateExpression());
		}
		this.expect(TokenTypes.RParen, undefined, [TokenTypes.Comma, TokenTypes.RParen]);
		return tupleLit(elements);
	}

	private parseRecordInstance(): Expr {
		this.expect(TokenTypes.LParen);
		const fields: RecordField[] = [];
		if (!this.tokens.check(TokenTypes.RParen)) {
			do {
				const name = this.expect(TokenTypes.Identifier).lexeme;
				this.expect(TokenTypes.Colon);
				fields.push({ name, value: this.parsePredicateExpression() });
			} while (this.match(TokenTypes.Comma));
		}
		this.expect(TokenTypes.RParen, undefined, [TokenTypes.Comma, TokenTypes.RParen]);
		return recordLit(fields);
	}

	private parseIdentifier(): IdentifierExpr {
		return identifier(this.expect(TokenTypes.Identifier).lexeme);
	}

	//==========================================================================
	// Token helpers
	//==========================================================================

	private match(type: TokenType): boolean {
		if (!this.tokens.check(type)) return false;
		this.tokens.advance();
		return true;
	}

	private expect(type: TokenType, message?: string, expected: TokenType[] = [type]): Token {
		const token = this.tokens.peek();
		if (token.type === type) return this.tokens.advance();
		throw SettleError.syntax(
			(message ?? "Expected " + type) + " but got " + describeToken(token),
			token,
			expected,
		);
	}
}

function parseNumber(lexeme: string): Expr {
	const value = Number(lexeme);
	if (lexeme === "" || !Number.isFinite(value)) {
		throw SettleError.valueError("Invalid number literal: " + lexeme);
	}
	const isFloat = lexeme.includes(".");
	// Past 2^53 distinct literals would share one value
	if (!isFloat && !Number.isSafeInteger(value)) {
		throw SettleError.valueError("Integer literal out of range: " + lexeme);
	}
	return numberLit(value, isFloat);
}

//==============================================================================
// Public API
//==============================================================================

export function parse(tokens: Token[] | TokenStream): Result<Program> {
	return capture(() => new Parser(tokens).parseProgram());
}

export function parseSource(source: string): Result<Program> {
	return parse(tokenize(source));
}

export function parseExpression(source: string): Result<Expr> {
	return capture(() => new Parser(tokenize(source)).parseStandaloneExpression());
}
