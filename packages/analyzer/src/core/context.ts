/**
 * Analysis context shared by the scan, classify and PIF phases of one run.
 * Holds the source, the lexeme store and collected diagnostics.
 */

import {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
	severityLabel,
} from './diagnostics.ts'
import { type LexemeId, LexemeStore, type SourcePosition } from './tokens.ts'

export { DiagnosticSeverity } from './diagnostics.ts'

/**
 * A diagnostic message with location information.
 */
export interface Diagnostic {
	/** The diagnostic definition from the catalog */
	readonly def: DiagnosticDef
	/** Interpolated message with arguments applied */
	readonly message: string
	/** Line number (1-indexed) */
	readonly line: number
	/** Column number (1-indexed) */
	readonly column: number
	/** Number of columns to underline; at least one caret is always drawn */
	readonly length?: number
	/** Template arguments used for message interpolation */
	readonly args?: DiagnosticArgs
	/** Lexeme associated with this diagnostic (if available) */
	readonly lexemeId?: LexemeId
}

const UTF8_BOM = '\uFEFF'

function stripBom(source: string): string {
	return source.startsWith(UTF8_BOM) ? source.slice(1) : source
}

function computeLineStarts(source: string): number[] {
	const starts = [0]
	for (let i = 0; i < source.length; i++) {
		if (source[i] === '\n') starts.push(i + 1)
	}
	return starts
}

/**
 * The unified analysis context.
 *
 * Every `analyze` call owns a fresh context; nothing in it is shared between runs.
 */
export class AnalysisContext {
	/** Source text with any leading byte order mark removed */
	readonly source: string

	/** Source filename for error messages */
	readonly filename: string

	/** Lexeme storage (populated by the scanner) */
	readonly lexemes: LexemeStore

	private readonly lineStarts: number[]

	private readonly diagnostics: Diagnostic[] = []

	private errorCount = 0

	constructor(source: string, filename = '<input>') {
		this.source = stripBom(source)
		this.filename = filename
		this.lexemes = new LexemeStore()
		this.lineStarts = computeLineStarts(this.source)
	}

	/**
	 * Resolve a 0-indexed offset into 1-indexed line and column.
	 */
	positionAt(offset: number): SourcePosition {
		let low = 0
		let high = this.lineStarts.length - 1
		while (low < high) {
			const mid = (low + high + 1) >> 1
			if ((this.lineStarts[mid] ?? 0) <= offset) {
				low = mid
			} else {
				high = mid - 1
			}
		}
		const lineStart = this.lineStarts[low] ?? 0
		return { column: offset - lineStart + 1, line: low + 1, offset }
	}

	/**
	 * Emit a diagnostic by code at a lexeme's location, underlining the whole lexeme.
	 */
	emitAtLexeme(code: DiagnosticCode, lexemeId: LexemeId, args?: DiagnosticArgs): void {
		const lexeme = this.lexemes.get(lexemeId)
		const def = getDiagnostic(code)
		const message = interpolateMessage(def.message, args)
		this.addDiagnostic({
			column: lexeme.column,
			def,
			length: lexeme.text.length,
			lexemeId,
			line: lexeme.line,
			message,
			...(args ? { args } : {}),
		})
	}

	private addDiagnostic(diagnostic: Diagnostic): void {
		this.diagnostics.push(diagnostic)
		if (diagnostic.def.severity === DiagnosticSeverity.Error) {
			this.errorCount++
		}
	}

	hasErrors(): boolean {
		return this.errorCount > 0
	}

	getErrorCount(): number {
		return this.errorCount
	}

	getDiagnostics(): readonly Diagnostic[] {
		return this.diagnostics
	}

	getErrors(): Diagnostic[] {
		return this.diagnostics.filter((d) => d.def.severity === DiagnosticSeverity.Error)
	}

	getSourceLine(line: number): string | undefined {
		const start = this.lineStarts[line - 1]
		if (start === undefined) return undefined
		const next = this.lineStarts[line]
		const end = next === undefined ? this.source.length : next - 1
		return this.source.slice(start, end).replace(/\r$/, '')
	}

	private buildSourceContext(
		diagnostic: Diagnostic,
		sourceLine: string
	): { emptyPrefix: string; lines: string[] } {
		const lineNumWidth = String(diagnostic.line).length
		const pad = ' '.repeat(lineNumWidth)
		const linePrefix = ` ${diagnostic.line} | `
		const emptyPrefix = ` ${pad} | `
		const underline = '^'.repeat(Math.max(1, diagnostic.length ?? 1))
		const pointer = `${' '.repeat(diagnostic.column - 1)}${underline}`

		return {
			emptyPrefix,
			lines: [emptyPrefix, `${linePrefix}${sourceLine}`, `${emptyPrefix}${pointer}`],
		}
	}

	/**
	 * Format a diagnostic for display (Rust-style output).
	 *
	 * Example:
	 * ```
	 * error[TLLEX001]: invalid token '#'
	 *   --> main.toy:2:5
	 *    |
	 *  2 | a = #b ;
	 *    |     ^
	 *    |
	 *    = help: Remove `#` or replace it with a token the language knows.
	 * ```
	 */
	formatDiagnostic(diagnostic: Diagnostic): string {
		const { def } = diagnostic
		const header = `${severityLabel(def.severity)}[${def.code}]: ${diagnostic.message}`
		const location = `  --> ${this.filename}:${diagnostic.line}:${diagnostic.column}`

		const sourceLine = this.getSourceLine(diagnostic.line)
		if (sourceLine === undefined) {
			return `${header}\n${location}`
		}

		const { emptyPrefix, lines: contextLines } = this.buildSourceContext(diagnostic, sourceLine)
		const lines = [header, location, ...contextLines]

		if (def.suggestion) {
			const suggestion = interpolateMessage(def.suggestion, diagnostic.args)
			lines.push(emptyPrefix, `   = help: ${suggestion}`)
		}

		return lines.join('\n')
	}

	formatAllDiagnostics(): string {
		return this.diagnostics.map((d) => this.formatDiagnostic(d)).join('\n\n')
	}
}
