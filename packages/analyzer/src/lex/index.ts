/**
 * Lexical analysis module.
 * Splits source text into raw lexemes and classifies them.
 */

export { type ClassifyResult, classify, classifyAll, tryClassify } from './classifier.ts'
export { InvalidTokenError } from './errors.ts'
export { type LexemeSpan, type LexicalRule, matchesRule, splitLexemes } from './grammar.ts'
export { type ScanResult, scan, scanText } from './scanner.ts'
