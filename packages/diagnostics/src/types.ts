/**
 * Diagnostic severity levels. Every catalog entry is currently an error.
 */
export const DiagnosticSeverity = {
	Error: 0,
} as const

export type DiagnosticSeverity = (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity]

/**
 * Every diagnostic code starts with the project prefix followed by a phase tag and a number,
 * e.g. `TLLEX001` or `TLCLI004`.
 */
export type DiagnosticCodeString = `TL${string}`

/**
 * Diagnostic definition in the catalog.
 */
export interface DiagnosticDef {
	readonly code: DiagnosticCodeString
	readonly severity: DiagnosticSeverity
	/** One-line message; may contain `{placeholder}` arguments. */
	readonly message: string
	readonly description: string
	readonly suggestion?: string
}

/**
 * Template arguments for diagnostic messages.
 */
export type DiagnosticArgs = Record<string, string | number>

const SEVERITY_LABELS: Record<DiagnosticSeverity, string> = {
	[DiagnosticSeverity.Error]: 'error',
}

export function severityLabel(severity: DiagnosticSeverity): string {
	return SEVERITY_LABELS[severity]
}
