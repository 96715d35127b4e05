import { AnalysisContext } from '../core/context.ts'
import type { RawLexeme } from '../core/tokens.ts'
import { splitLexemes } from './grammar.ts'

export interface ScanResult {
	/** Number of lexemes added to the context */
	lexemeCount: number
}

/**
 * Scans the context's source left to right, populating context.lexemes.
 *
 * At each position whitespace is skipped, then the first rule that matches wins:
 * two-character operator, identifier, integer, character literal, string literal,
 * any single character. The scanner never reports errors.
 */
export function scan(context: AnalysisContext): ScanResult {
	const before = context.lexemes.count()
	for (const span of splitLexemes(context.source)) {
		const { line, column } = context.positionAt(span.offset)
		context.lexemes.add({ column, line, offset: span.offset, text: span.text })
	}
	return { lexemeCount: context.lexemes.count() - before }
}

/**
 * Scan a standalone source text.
 */
export function scanText(source: string): RawLexeme[] {
	const context = new AnalysisContext(source)
	scan(context)
	return context.lexemes.toArray()
}
