import type { DiagnosticArg, DiagnosticArgs } from './types.ts'

function renderArg(value: DiagnosticArg): string {
	if (typeof value === 'string') return value
	if (typeof value === 'number') return String(value)
	return value.join(', ')
}

/**
 * Interpolate template arguments into a message.
 * Replaces {key} with the matching argument; unknown keys are left in place.
 */
export function interpolateMessage(message: string, args?: DiagnosticArgs): string {
	if (!args) return message
	return message.replace(/\{(\w+)\}/g, (placeholder, key: string) => {
		const value = args[key]
		return value !== undefined ? renderArg(value) : placeholder
	})
}
