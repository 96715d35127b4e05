/**
 * Program Internal Form construction.
 *
 * Two passes: the first inserts every identifier and constant and remembers the node each
 * token points at; the second resolves all ranks from the finished tree. Resolving a rank at
 * insertion time would go stale as soon as a smaller key is inserted later.
 */

import type { ClassifiedToken, TokenKind } from '../core/tokens.ts'
import { type SymbolId, type SymbolRanks, SymbolTable } from '../symbols/table.ts'

/** Index of every reserved token in the PIF. */
export const NO_SYMBOL = -1

export interface PifEntry {
	readonly kind: TokenKind
	/** Final rank in the symbol table, or NO_SYMBOL */
	readonly index: number
}

export interface PifResult {
	readonly table: SymbolTable
	readonly pif: PifEntry[]
}

interface PendingEntry {
	readonly kind: TokenKind
	readonly symbol: SymbolId | null
}

function resolveIndex(ranks: SymbolRanks, symbol: SymbolId | null): number {
	if (symbol === null) return NO_SYMBOL
	const rank = ranks.get(symbol)
	if (rank === undefined) {
		throw new Error(`Invalid SymbolId: ${symbol}`)
	}
	return rank
}

/**
 * Build the symbol table and PIF for a classified token stream.
 */
export function buildPif(tokens: Iterable<ClassifiedToken>): PifResult {
	const table = new SymbolTable()
	const pending: PendingEntry[] = []

	for (const token of tokens) {
		const symbol = token.value === null ? null : table.insert(token.value)
		pending.push({ kind: token.kind, symbol })
	}

	const ranks = table.ranks()
	const pif = pending.map(
		(entry): PifEntry => ({ index: resolveIndex(ranks, entry.symbol), kind: entry.kind })
	)

	return { pif, table }
}
