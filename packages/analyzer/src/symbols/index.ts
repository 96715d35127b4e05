export { compareKeys, type SymbolId, type SymbolRanks, SymbolTable, symbolId } from './table.ts'
