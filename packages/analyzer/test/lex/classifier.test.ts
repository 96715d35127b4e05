import assert from 'node:assert'
import { describe, it } from 'node:test'
import { AnalysisContext } from '../../src/core/context.ts'
import { TokenKind } from '../../src/core/tokens.ts'
import { classify, classifyAll, tryClassify } from '../../src/lex/classifier.ts'
import { InvalidTokenError } from '../../src/lex/errors.ts'
import { scan } from '../../src/lex/scanner.ts'

describe('lex/classifier', () => {
	describe('tryClassify', () => {
		it('should classify reserved words without a value', () => {
			assert.deepStrictEqual(tryClassify('int'), { kind: TokenKind.Int, value: null })
			assert.deepStrictEqual(tryClassify('main'), { kind: TokenKind.Main, value: null })
		})

		it('should classify operators and punctuation without a value', () => {
			assert.deepStrictEqual(tryClassify('=='), { kind: TokenKind.EqualEqual, value: null })
			assert.deepStrictEqual(tryClassify(':'), { kind: TokenKind.Colon, value: null })
		})

		it('should classify identifiers with their text', () => {
			assert.deepStrictEqual(tryClassify('count'), { kind: TokenKind.Identifier, value: 'count' })
			assert.deepStrictEqual(tryClassify('_tmp1'), { kind: TokenKind.Identifier, value: '_tmp1' })
		})

		it('should keep words that only resemble keywords as identifiers', () => {
			assert.deepStrictEqual(tryClassify('Int'), { kind: TokenKind.Identifier, value: 'Int' })
			assert.deepStrictEqual(tryClassify('constructor'), {
				kind: TokenKind.Identifier,
				value: 'constructor',
			})
		})

		it('should classify integer, character and string literals as constants', () => {
			assert.deepStrictEqual(tryClassify('007'), { kind: TokenKind.Constant, value: '007' })
			assert.deepStrictEqual(tryClassify("'z'"), { kind: TokenKind.Constant, value: "'z'" })
			assert.deepStrictEqual(tryClassify('"abc"'), { kind: TokenKind.Constant, value: '"abc"' })
			assert.deepStrictEqual(tryClassify('""'), { kind: TokenKind.Constant, value: '""' })
		})

		it('should reject anything else', () => {
			for (const text of ['#', '!', '&', '|', "'", '"', '@', '/', 'é', "'ab'", '"a b"', '1a']) {
				assert.strictEqual(tryClassify(text), null, text)
			}
		})
	})

	describe('classify', () => {
		it('should classify a raw lexeme', () => {
			const token = classify({ column: 1, line: 1, offset: 0, text: 'x' })
			assert.deepStrictEqual(token, { kind: TokenKind.Identifier, value: 'x' })
		})

		it('should throw InvalidTokenError with lexeme and position', () => {
			assert.throws(
				() => classify({ column: 7, line: 3, offset: 20, text: '#' }),
				(err: Error) => {
					assert.ok(err instanceof InvalidTokenError)
					assert.strictEqual(err.lexeme, '#')
					assert.deepStrictEqual(err.position, { column: 7, line: 3, offset: 20 })
					assert.strictEqual(err.message, "3:7 Invalid token '#'.")
					return true
				}
			)
		})
	})

	describe('classifyAll', () => {
		it('should classify every lexeme in order', () => {
			const ctx = new AnalysisContext('int a ;')
			scan(ctx)
			const result = classifyAll(ctx)

			assert.strictEqual(result.succeeded, true)
			assert.deepStrictEqual(result.tokens, [
				{ kind: TokenKind.Int, value: null },
				{ kind: TokenKind.Identifier, value: 'a' },
				{ kind: TokenKind.Semicolon, value: null },
			])
		})

		it('should stop at the first invalid lexeme and emit one diagnostic', () => {
			const ctx = new AnalysisContext('a = #b $ ;')
			scan(ctx)
			const result = classifyAll(ctx)

			assert.strictEqual(result.succeeded, false)
			assert.strictEqual(result.tokens.length, 2)
			assert.strictEqual(ctx.getErrorCount(), 1)

			const diag = ctx.getErrors()[0]!
			assert.strictEqual(diag.def.code, 'TLLEX001')
			assert.strictEqual(diag.message, "invalid token '#'")
			assert.strictEqual(diag.line, 1)
			assert.strictEqual(diag.column, 5)
		})
	})
})
