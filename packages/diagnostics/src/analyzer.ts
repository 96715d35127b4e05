/**
 * Analyzer diagnostic definitions.
 *
 * Error code format: TL<PHASE><NUMBER>
 * - TLLEX: Lexical errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// LEXICAL ERRORS (TLLEX001-099)
// =============================================================================

export const TLLEX001: DiagnosticDef = {
	code: 'TLLEX001',
	description:
		"This text isn't a keyword, operator, identifier or constant. Character and string literals may only contain letters and digits.",
	message: "invalid token '{lexeme}'",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove `{lexeme}` or replace it with a token the language knows.',
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all analyzer diagnostics.
 */
export const ANALYZER_DIAGNOSTICS = {
	TLLEX001,
} as const

/**
 * All valid analyzer diagnostic codes.
 */
export type AnalyzerDiagnosticCode = keyof typeof ANALYZER_DIAGNOSTICS
