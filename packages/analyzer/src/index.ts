/**
 * toylex Analyzer Public API
 *
 * Phases share one AnalysisContext per run:
 * 1. Scan (source → raw lexemes)
 * 2. Classify (lexemes → token kinds, fail on the first invalid lexeme)
 * 3. PIF (tokens → symbol table + program internal form)
 */

import { AnalysisContext } from './core/context.ts'
import { classifyAll } from './lex/classifier.ts'
import { InvalidTokenError } from './lex/errors.ts'
import { scan } from './lex/scanner.ts'
import { buildPif, type PifEntry } from './pif/builder.ts'

export {
	AnalysisContext,
	type ClassifiedToken,
	type Diagnostic,
	type DiagnosticCode,
	DiagnosticSeverity,
	getDiagnostic,
	isSymbolKind,
	isValidDiagnosticCode,
	type LexemeId,
	LexemeStore,
	lexemeId,
	lookupReserved,
	RESERVED_LEXEMES,
	type RawLexeme,
	type ReservedKind,
	type SourcePosition,
	type SymbolKind,
	TokenKind,
} from './core/index.ts'
export {
	type ClassifyResult,
	classify,
	classifyAll,
	InvalidTokenError,
	type ScanResult,
	scan,
	scanText,
	tryClassify,
} from './lex/index.ts'
export { buildPif, NO_SYMBOL, type PifEntry, type PifResult } from './pif/index.ts'
export { compareKeys, type SymbolId, type SymbolRanks, SymbolTable, symbolId } from './symbols/index.ts'

/**
 * Options for the analyze function.
 */
export interface AnalyzeOptions {
	/** Path to the source file (for error messages) */
	filename?: string
}

export interface AnalysisResult {
	/** Unique identifiers and constants in ascending order */
	readonly symbolTableEntries: string[]
	/** One entry per lexeme, in source order */
	readonly pif: PifEntry[]
}

/**
 * Build the error for the first invalid lexeme recorded in the context.
 */
function invalidTokenFromContext(context: AnalysisContext): InvalidTokenError {
	const error = context.getErrors()[0]
	if (error?.lexemeId === undefined) {
		return new InvalidTokenError('Classification failed', '', context.positionAt(0))
	}
	const lexeme = context.lexemes.get(error.lexemeId)
	return new InvalidTokenError(context.formatDiagnostic(error), lexeme.text, {
		column: lexeme.column,
		line: lexeme.line,
		offset: lexeme.offset,
	})
}

/**
 * Analyze a source text into its symbol table and program internal form.
 *
 * @param source - Source text
 * @param options - Analysis options
 * @returns Symbol table entries and PIF
 * @throws {InvalidTokenError} On the first lexeme that is not a valid token
 */
export function analyze(source: string, options: AnalyzeOptions = {}): AnalysisResult {
	const context = new AnalysisContext(source, options.filename)

	scan(context)

	const classified = classifyAll(context)
	if (!classified.succeeded) {
		throw invalidTokenFromContext(context)
	}

	const { table, pif } = buildPif(classified.tokens)
	return { pif, symbolTableEntries: table.inOrderKeys() }
}
