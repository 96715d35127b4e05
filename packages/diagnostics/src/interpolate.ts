import type { DiagnosticArgs } from './types.ts'

/**
 * Interpolate template arguments into a message.
 * Replaces {key} with the corresponding value from args; unknown keys are left as written.
 */
export function interpolateMessage(message: string, args?: DiagnosticArgs): string {
	if (!args) return message
	return message.replace(/\{(\w+)\}/g, (placeholder, key: string) => {
		const value = Object.hasOwn(args, key) ? args[key] : undefined
		return value !== undefined ? String(value) : placeholder
	})
}
