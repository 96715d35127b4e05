import assert from 'node:assert'
import { describe, it } from 'node:test'
import { AnalysisContext, DiagnosticSeverity } from '../../src/core/context.ts'

describe('core/context', () => {
	describe('AnalysisContext', () => {
		it('should store source and filename', () => {
			const ctx = new AnalysisContext('int a ;', 'main.toy')
			assert.strictEqual(ctx.source, 'int a ;')
			assert.strictEqual(ctx.filename, 'main.toy')
		})

		it('should use default filename if not provided', () => {
			const ctx = new AnalysisContext('')
			assert.strictEqual(ctx.filename, '<input>')
		})

		it('should strip a leading byte order mark', () => {
			const ctx = new AnalysisContext('\uFEFFint')
			assert.strictEqual(ctx.source, 'int')
		})

		it('should resolve positions in the text without the byte order mark', () => {
			const ctx = new AnalysisContext('\uFEFFa #')
			assert.deepStrictEqual(ctx.positionAt(2), { column: 3, line: 1, offset: 2 })
			assert.strictEqual(ctx.source[2], '#')
		})

		it('should start with no lexemes and no errors', () => {
			const ctx = new AnalysisContext('int')
			assert.strictEqual(ctx.lexemes.count(), 0)
			assert.strictEqual(ctx.hasErrors(), false)
			assert.strictEqual(ctx.getErrorCount(), 0)
			assert.deepStrictEqual(ctx.getDiagnostics(), [])
		})
	})

	describe('positionAt', () => {
		const ctx = new AnalysisContext('int a\n  b\n\nc')

		it('should resolve offsets on the first line', () => {
			assert.deepStrictEqual(ctx.positionAt(0), { column: 1, line: 1, offset: 0 })
			assert.deepStrictEqual(ctx.positionAt(4), { column: 5, line: 1, offset: 4 })
		})

		it('should resolve offsets on later lines', () => {
			assert.deepStrictEqual(ctx.positionAt(8), { column: 3, line: 2, offset: 8 })
			assert.deepStrictEqual(ctx.positionAt(11), { column: 1, line: 4, offset: 11 })
		})

		it('should place a newline at the end of its own line', () => {
			assert.deepStrictEqual(ctx.positionAt(5), { column: 6, line: 1, offset: 5 })
		})
	})

	describe('getSourceLine', () => {
		it('should return lines without terminators', () => {
			const ctx = new AnalysisContext('int a ;\r\nreturn ;\n')
			assert.strictEqual(ctx.getSourceLine(1), 'int a ;')
			assert.strictEqual(ctx.getSourceLine(2), 'return ;')
			assert.strictEqual(ctx.getSourceLine(3), '')
		})

		it('should return undefined past the last line', () => {
			const ctx = new AnalysisContext('int')
			assert.strictEqual(ctx.getSourceLine(2), undefined)
		})
	})

	describe('emitAtLexeme', () => {
		it('should record an interpolated error', () => {
			const ctx = new AnalysisContext('a #')
			const id = ctx.lexemes.add({ column: 3, line: 1, offset: 2, text: '#' })
			ctx.emitAtLexeme('TLLEX001', id, { lexeme: '#' })

			assert.strictEqual(ctx.hasErrors(), true)
			assert.strictEqual(ctx.getErrorCount(), 1)
			const diag = ctx.getErrors()[0]!
			assert.strictEqual(diag.def.code, 'TLLEX001')
			assert.strictEqual(diag.def.severity, DiagnosticSeverity.Error)
			assert.strictEqual(diag.message, "invalid token '#'")
			assert.deepStrictEqual(diag.args, { lexeme: '#' })
		})

		it('should anchor lexeme diagnostics at the lexeme', () => {
			const ctx = new AnalysisContext('x = "ab')
			const id = ctx.lexemes.add({ column: 5, line: 1, offset: 4, text: '"' })
			ctx.emitAtLexeme('TLLEX001', id, { lexeme: '"' })

			const diag = ctx.getDiagnostics()[0]!
			assert.strictEqual(diag.lexemeId, id)
			assert.strictEqual(diag.line, 1)
			assert.strictEqual(diag.column, 5)
			assert.strictEqual(diag.length, 1)
		})
	})

	describe('formatDiagnostic', () => {
		it('should render source context, caret and help', () => {
			const ctx = new AnalysisContext('int a ;\na = #b ;', 'main.toy')
			const id = ctx.lexemes.add({ column: 5, line: 2, offset: 12, text: '#' })
			ctx.emitAtLexeme('TLLEX001', id, { lexeme: '#' })

			assert.strictEqual(
				ctx.formatDiagnostic(ctx.getErrors()[0]!),
				[
					"error[TLLEX001]: invalid token '#'",
					'  --> main.toy:2:5',
					'   | ',
					' 2 | a = #b ;',
					'   |     ^',
					'   | ',
					'   = help: Remove `#` or replace it with a token the language knows.',
				].join('\n')
			)
		})

		it('should underline the whole lexeme', () => {
			const ctx = new AnalysisContext('ab')
			const id = ctx.lexemes.add({ column: 1, line: 1, offset: 0, text: 'ab' })
			ctx.emitAtLexeme('TLLEX001', id, { lexeme: 'ab' })

			const lines = ctx.formatDiagnostic(ctx.getErrors()[0]!).split('\n')
			assert.strictEqual(lines[4], '   | ^^')
		})

		it('should omit source context for lines outside the source', () => {
			const ctx = new AnalysisContext('a')
			const id = ctx.lexemes.add({ column: 1, line: 9, offset: 40, text: '#' })
			ctx.emitAtLexeme('TLLEX001', id, { lexeme: '#' })

			assert.strictEqual(
				ctx.formatAllDiagnostics(),
				"error[TLLEX001]: invalid token '#'\n  --> <input>:9:1"
			)
		})
	})
})
