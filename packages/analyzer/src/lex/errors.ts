import type { RawLexeme, SourcePosition } from '../core/tokens.ts'

/**
 * Error thrown when a lexeme is neither reserved nor a valid identifier or constant.
 * The first invalid lexeme aborts the whole analysis. `position.offset` does not count a
 * leading byte order mark.
 */
export class InvalidTokenError extends Error {
	readonly lexeme: string
	readonly position: SourcePosition

	constructor(message: string, lexeme: string, position: SourcePosition) {
		super(message)
		this.name = 'InvalidTokenError'
		this.lexeme = lexeme
		this.position = position
	}
}

/**
 * Throws an invalid token error with a short `line:column` message.
 */
export function throwInvalidToken(lexeme: RawLexeme): never {
	throw new InvalidTokenError(
		`${lexeme.line}:${lexeme.column} Invalid token '${lexeme.text}'.`,
		lexeme.text,
		{ column: lexeme.column, line: lexeme.line, offset: lexeme.offset }
	)
}
