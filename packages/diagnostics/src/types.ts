/**
 * Diagnostic severity levels.
 */
export const DiagnosticSeverity = {
	Error: 0,
	Note: 2,
	Warning: 1,
} as const

export type DiagnosticSeverity = (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity]

/**
 * A diagnostic definition in the catalog.
 *
 * `message` and `suggestion` are templates: `{name}` placeholders are
 * filled from the arguments given when the diagnostic is reported.
 */
export interface DiagnosticDef {
	readonly code: string
	readonly severity: DiagnosticSeverity
	readonly message: string
	readonly description: string
	readonly suggestion?: string
}

/**
 * A single template argument. Lists are rendered comma-separated.
 */
export type DiagnosticArg = string | number | readonly string[]

/**
 * Template arguments for diagnostic messages.
 */
export type DiagnosticArgs = Readonly<Record<string, DiagnosticArg>>
