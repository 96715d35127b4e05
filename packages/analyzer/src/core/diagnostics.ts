/**
 * Re-export diagnostic types and analyzer definitions from the shared package.
 */

import { ANALYZER_DIAGNOSTICS } from '@toylex/diagnostics'

export {
	ANALYZER_DIAGNOSTICS,
	type AnalyzerDiagnosticCode,
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	interpolateMessage,
	severityLabel,
	TLLEX001,
} from '@toylex/diagnostics'

/**
 * All valid diagnostic codes for the analyzer.
 */
export type DiagnosticCode = keyof typeof ANALYZER_DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof ANALYZER_DIAGNOSTICS)[typeof code] {
	return ANALYZER_DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid analyzer diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return Object.hasOwn(ANALYZER_DIAGNOSTICS, code)
}
