export { buildPif, NO_SYMBOL, type PifEntry, type PifResult } from './builder.ts'
