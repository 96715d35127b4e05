import { type AnalysisResult, InvalidTokenError } from '@toylex/analyzer'
import {
	interpolateMessage,
	TLCLI001,
	TLCLI002,
	TLCLI003,
	TLCLI004,
	TLCLI005,
} from '@toylex/diagnostics'

export type ReportFormat = 'text' | 'json'

/**
 * The analysis of one input file.
 */
export interface FileReport {
	file: string
	result: AnalysisResult
}

export interface JsonReport {
	file: string
	symbolTable: string[]
	pif: Array<[number, number]>
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		const message = interpolateMessage(TLCLI001.message, { path: filePath })
		return `[${TLCLI001.code}] ${message}`
	}
	const message = interpolateMessage(TLCLI002.message, { reason: getErrorMessage(error) })
	return `[${TLCLI002.code}] ${message}`
}

export function formatWriteError(error: unknown): string {
	const message = interpolateMessage(TLCLI003.message, { reason: getErrorMessage(error) })
	return `[${TLCLI003.code}] ${message}`
}

export function formatInvalidFormatError(format: string): string {
	const message = interpolateMessage(TLCLI004.message, { format })
	return `[${TLCLI004.code}] ${message}`
}

export function formatAnalyzeError(error: unknown): string {
	if (error instanceof InvalidTokenError) {
		return error.message
	}
	const message = interpolateMessage(TLCLI005.message, { reason: getErrorMessage(error) })
	return `[${TLCLI005.code}] ${message}`
}

export function isValidFormat(value: string): value is ReportFormat {
	return value === 'text' || value === 'json'
}

/**
 * Symbol table listing followed by the PIF, one `(kind, index)` pair per line.
 */
export function formatTextReport(result: AnalysisResult): string {
	const lines = ['TS (symbol table):']
	result.symbolTableEntries.forEach((entry, index) => {
		lines.push(`${index} ${entry}`)
	})
	lines.push('', 'PIF (program internal form):')
	for (const entry of result.pif) {
		lines.push(`(${entry.kind}, ${entry.index})`)
	}
	return lines.join('\n')
}

export function toJsonReport(report: FileReport): JsonReport {
	return {
		file: report.file,
		pif: report.result.pif.map((entry): [number, number] => [entry.kind, entry.index]),
		symbolTable: report.result.symbolTableEntries,
	}
}

/**
 * Render all reports in one format. Several text reports are separated by `==> file <==`
 * headers; several JSON reports become an array.
 */
export function renderReports(reports: FileReport[], format: ReportFormat): string {
	if (format === 'json') {
		const json = reports.map(toJsonReport)
		return JSON.stringify(json.length === 1 ? json[0] : json, null, 2)
	}
	const [only] = reports
	if (reports.length === 1 && only !== undefined) {
		return formatTextReport(only.result)
	}
	return reports
		.map((report) => `==> ${report.file} <==\n${formatTextReport(report.result)}`)
		.join('\n\n')
}
