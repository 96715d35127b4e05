import type { AnalysisContext } from '../core/context.ts'
import { type ClassifiedToken, lookupReserved, type RawLexeme, TokenKind } from '../core/tokens.ts'
import { throwInvalidToken } from './errors.ts'
import { matchesRule } from './grammar.ts'

export interface ClassifyResult {
	succeeded: boolean
	/** Classified tokens in lexeme order; stops before the first invalid lexeme */
	tokens: ClassifiedToken[]
}

function isConstant(text: string): boolean {
	return (
		matchesRule(text, 'integer') ||
		matchesRule(text, 'charLiteral') ||
		matchesRule(text, 'stringLiteral')
	)
}

/**
 * Classify lexeme text, or return null when it is not a valid token.
 * Reserved lexemes win over the identifier pattern, so `int` is never an identifier.
 */
export function tryClassify(text: string): ClassifiedToken | null {
	const reserved = lookupReserved(text)
	if (reserved !== undefined) {
		return { kind: reserved, value: null }
	}
	if (matchesRule(text, 'identifier')) {
		return { kind: TokenKind.Identifier, value: text }
	}
	if (isConstant(text)) {
		return { kind: TokenKind.Constant, value: text }
	}
	return null
}

/**
 * Classify one raw lexeme.
 *
 * @throws {InvalidTokenError} If the lexeme is not a valid token
 */
export function classify(lexeme: RawLexeme): ClassifiedToken {
	return tryClassify(lexeme.text) ?? throwInvalidToken(lexeme)
}

/**
 * Classifies every scanned lexeme in order.
 * Emits TLLEX001 for the first invalid lexeme and stops there.
 */
export function classifyAll(context: AnalysisContext): ClassifyResult {
	const tokens: ClassifiedToken[] = []
	for (const [id, lexeme] of context.lexemes) {
		const token = tryClassify(lexeme.text)
		if (token === null) {
			context.emitAtLexeme('TLLEX001', id, { lexeme: lexeme.text })
			return { succeeded: false, tokens }
		}
		tokens.push(token)
	}
	return { succeeded: true, tokens }
}
