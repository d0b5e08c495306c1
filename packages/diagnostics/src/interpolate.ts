import type { DiagnosticArgs, DiagnosticDef } from './types.ts'

/**
 * Interpolate template arguments into a message.
 * Replaces {key} with the corresponding value from args; unknown keys are left as-is.
 */
export function interpolateMessage(message: string, args?: DiagnosticArgs): string {
	if (!args) return message
	return message.replace(/\{(\w+)\}/g, (placeholder, key: string) => {
		const value = args[key]
		return value !== undefined ? String(value) : placeholder
	})
}

/**
 * One-line rendering used where there is no source location: `[CODE] message`.
 */
export function formatCodedMessage(def: DiagnosticDef, args?: DiagnosticArgs): string {
	return `[${def.code}] ${interpolateMessage(def.message, args)}`
}
