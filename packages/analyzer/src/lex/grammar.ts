import type { Node, Semantics } from 'ohm-js'
import * as ohm from 'ohm-js'

/**
 * Lexical grammar.
 *
 * `Lexemes` is the only syntactic rule: ohm skips `space` before every lexeme and at the
 * end of input, so whitespace never reaches a lexeme. The alternatives of `lexeme` are an
 * ordered choice, which fixes the matching priority, and every repetition is greedy, which
 * gives the longest match. `any` is last so that every non-space character becomes a lexeme;
 * deciding whether it is valid is the classifier's job.
 *
 * Character and string literal bodies are restricted to ASCII letters and digits.
 */
const grammarSource = String.raw`
ToyLex {
  Lexemes = lexeme*

  lexeme (a lexeme)
    = twoCharOperator
    | identifier
    | integer
    | charLiteral
    | stringLiteral
    | any

  twoCharOperator = "==" | "!=" | "<=" | ">=" | "&&" | "||"

  identifier (an identifier) = identifierStart identifierPart*
  identifierStart = asciiLetter | "_"
  identifierPart = identifierStart | digit

  integer (an integer) = digit+
  charLiteral (a character literal) = "'" asciiAlnum "'"
  stringLiteral (a string literal) = "\"" asciiAlnum* "\""

  asciiLetter = "a".."z" | "A".."Z"
  asciiAlnum = asciiLetter | digit

  space := "\t".."\r" | "\u001C".." " | "\u0085" | "\u00A0" | "\u1680"
         | "\u2000".."\u200A" | "\u2028" | "\u2029" | "\u202F" | "\u205F" | "\u3000"
}
`

/**
 * The compiled lexical grammar.
 */
export const ToyLexGrammar = ohm.grammar(grammarSource)

/**
 * Grammar rules usable as start rules for whole-lexeme matching.
 */
export type LexicalRule = 'identifier' | 'integer' | 'charLiteral' | 'stringLiteral'

/**
 * A lexeme's text and its 0-indexed offset in the matched input.
 */
export interface LexemeSpan {
	text: string
	offset: number
}

/**
 * Create semantics for the lexical grammar.
 */
export function createSemantics(): Semantics {
	const semantics = ToyLexGrammar.createSemantics()

	semantics.addOperation<LexemeSpan[]>('toSpans', {
		Lexemes(list: Node) {
			return list.children.map((lexeme: Node) => ({
				offset: lexeme.source.startIdx,
				text: lexeme.sourceString,
			}))
		},
	})

	return semantics
}

/**
 * Default semantics instance.
 */
export const semantics = createSemantics()

function splitLine(line: string, lineStart: number): LexemeSpan[] {
	const matchResult = ToyLexGrammar.match(line)
	if (matchResult.failed()) {
		throw new Error(`Lexical grammar rejected input: ${matchResult.message ?? 'no message'}`)
	}
	const spans: LexemeSpan[] = semantics(matchResult)['toSpans']()
	return spans.map((span) => ({ offset: lineStart + span.offset, text: span.text }))
}

/**
 * Split input into lexeme spans. Never fails: unknown characters become one-character spans.
 *
 * Matched one line at a time so ohm's memo table stays bounded by the longest line. A newline
 * is whitespace and no lexeme contains one, so the spans equal those of a single match.
 */
export function splitLexemes(input: string): LexemeSpan[] {
	const spans: LexemeSpan[] = []
	let lineStart = 0
	for (const line of input.split('\n')) {
		spans.push(...splitLine(line, lineStart))
		lineStart += line.length + 1
	}
	return spans
}

/**
 * Whether the whole text matches one lexical rule.
 */
export function matchesRule(text: string, rule: LexicalRule): boolean {
	return ToyLexGrammar.match(text, rule).succeeded()
}
