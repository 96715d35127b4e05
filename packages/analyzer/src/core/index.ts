/**
 * Core data structures for the toylex analyzer.
 * Dense arrays with integer IDs, one context per analysis run.
 */

export { AnalysisContext, type Diagnostic } from './context.ts'
export {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
	isValidDiagnosticCode,
} from './diagnostics.ts'
export {
	type ClassifiedToken,
	isSymbolKind,
	type LexemeId,
	LexemeStore,
	lexemeId,
	lookupReserved,
	RESERVED_LEXEMES,
	type RawLexeme,
	type ReservedKind,
	type SourcePosition,
	type SymbolKind,
	TokenKind,
} from './tokens.ts'
