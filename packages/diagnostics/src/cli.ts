/**
 * CLI diagnostic definitions.
 *
 * Error code format: TLCLI<NUMBER>
 * - TLCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (TLCLI001-099)
// =============================================================================

export const TLCLI001: DiagnosticDef = {
	code: 'TLCLI001',
	description: "toylex couldn't find a file at this path.",
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const TLCLI002: DiagnosticDef = {
	code: 'TLCLI002',
	description: "The file exists but toylex can't open it.",
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const TLCLI003: DiagnosticDef = {
	code: 'TLCLI003',
	description: "toylex couldn't save the report.",
	message: 'cannot write file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have write permission for the output directory.',
}

export const TLCLI004: DiagnosticDef = {
	code: 'TLCLI004',
	description: "toylex doesn't recognize this report format.",
	message: 'unknown format "{format}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use `--format text` for the listing or `--format json` for machine-readable output.',
}

export const TLCLI005: DiagnosticDef = {
	code: 'TLCLI005',
	description: 'Something unexpected went wrong during analysis.',
	message: 'analysis failed: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check your source file, or report this if it seems like a bug.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	TLCLI001,
	TLCLI002,
	TLCLI003,
	TLCLI004,
	TLCLI005,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
