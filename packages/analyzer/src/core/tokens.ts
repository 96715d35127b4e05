/**
 * Token catalog and lexeme storage.
 *
 * Token kind codes are part of the PIF output format and never change.
 */

/**
 * Token kinds - small integer discriminant.
 * Identifier and Constant are 0 and 1; reserved words run 2-15; punctuation and operators 16-37.
 */
export const TokenKind = {
	AndAnd: 36,
	Assign: 30,
	Bool: 5,
	Char: 3,
	Cin: 12,
	Colon: 32,
	Comma: 17,
	Const: 6,
	Constant: 1,
	Cout: 13,
	Do: 9,
	Dot: 18,
	Else: 11,
	EqualEqual: 31,
	For: 7,
	Greater: 29,
	GreaterEqual: 34,
	Identifier: 0,
	If: 10,
	Int: 2,
	LeftBrace: 25,
	LeftBracket: 23,
	LeftParen: 21,
	Less: 28,
	LessEqual: 33,
	Main: 15,
	Minus: 27,
	NotEqual: 35,
	OrOr: 37,
	Plus: 19,
	Return: 14,
	RightBrace: 26,
	RightBracket: 24,
	RightParen: 22,
	Semicolon: 16,
	Star: 20,
	String: 4,
	While: 8,
} as const

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind]

/** Kinds whose lexemes are stored in the symbol table. */
export type SymbolKind = typeof TokenKind.Identifier | typeof TokenKind.Constant

/** Keywords, operators and punctuation. */
export type ReservedKind = Exclude<TokenKind, SymbolKind>

export function isSymbolKind(kind: TokenKind): kind is SymbolKind {
	return kind === TokenKind.Identifier || kind === TokenKind.Constant
}

/**
 * Every reserved lexeme and its kind.
 * A Map rather than an object literal so `constructor` and friends stay identifiers.
 */
export const RESERVED_LEXEMES: ReadonlyMap<string, ReservedKind> = new Map<string, ReservedKind>([
	['int', TokenKind.Int],
	['char', TokenKind.Char],
	['string', TokenKind.String],
	['bool', TokenKind.Bool],
	['const', TokenKind.Const],
	['for', TokenKind.For],
	['while', TokenKind.While],
	['do', TokenKind.Do],
	['if', TokenKind.If],
	['else', TokenKind.Else],
	['cin', TokenKind.Cin],
	['cout', TokenKind.Cout],
	['return', TokenKind.Return],
	['main', TokenKind.Main],
	[';', TokenKind.Semicolon],
	[',', TokenKind.Comma],
	['.', TokenKind.Dot],
	['+', TokenKind.Plus],
	['*', TokenKind.Star],
	['(', TokenKind.LeftParen],
	[')', TokenKind.RightParen],
	['[', TokenKind.LeftBracket],
	[']', TokenKind.RightBracket],
	['{', TokenKind.LeftBrace],
	['}', TokenKind.RightBrace],
	['-', TokenKind.Minus],
	['<', TokenKind.Less],
	['>', TokenKind.Greater],
	['=', TokenKind.Assign],
	['==', TokenKind.EqualEqual],
	[':', TokenKind.Colon],
	['<=', TokenKind.LessEqual],
	['>=', TokenKind.GreaterEqual],
	['!=', TokenKind.NotEqual],
	['&&', TokenKind.AndAnd],
	['||', TokenKind.OrOr],
])

export function lookupReserved(text: string): ReservedKind | undefined {
	return RESERVED_LEXEMES.get(text)
}

export type LexemeId = number & { readonly __brand: 'LexemeId' }

export function lexemeId(n: number): LexemeId {
	return n as LexemeId
}

/**
 * A maximal-munch slice of the source. Never empty, never contains whitespace.
 * `offset` is 0-indexed; `line` and `column` are 1-indexed.
 */
export interface RawLexeme {
	readonly text: string
	readonly offset: number
	readonly line: number
	readonly column: number
}

/** Location in `AnalysisContext.source`, i.e. after a leading byte order mark is removed. */
export type SourcePosition = Pick<RawLexeme, 'offset' | 'line' | 'column'>

/**
 * Result of classifying one lexeme.
 * Only identifiers and constants carry a value.
 */
export type ClassifiedToken =
	| { readonly kind: SymbolKind; readonly value: string }
	| { readonly kind: ReservedKind; readonly value: null }

/**
 * Dense array storage for raw lexemes.
 * Append-only during the scan phase.
 */
export class LexemeStore {
	private readonly lexemes: RawLexeme[] = []

	add(lexeme: RawLexeme): LexemeId {
		const id = lexemeId(this.lexemes.length)
		this.lexemes.push(lexeme)
		return id
	}

	get(id: LexemeId): RawLexeme {
		const lexeme = this.lexemes[id]
		if (lexeme === undefined) {
			throw new Error(`Invalid LexemeId: ${id}`)
		}
		return lexeme
	}

	count(): number {
		return this.lexemes.length
	}

	isValid(id: LexemeId): boolean {
		return id >= 0 && id < this.lexemes.length
	}

	*[Symbol.iterator](): Generator<[LexemeId, RawLexeme]> {
		for (let i = 0; i < this.lexemes.length; i++) {
			const lexeme = this.lexemes[i]
			if (lexeme !== undefined) yield [lexemeId(i), lexeme]
		}
	}

	toArray(): RawLexeme[] {
		return this.lexemes.slice()
	}
}
