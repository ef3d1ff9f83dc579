/**
 * Checking context shared by the parse and check phases.
 * Holds the source, the parsed program, the elaboration and all diagnostics.
 */

import type { Elaboration } from '../check/elaboration.ts'
import type { Position, Program } from '../parse/ast.ts'
import {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
} from './diagnostics.ts'

export { DiagnosticSeverity } from './diagnostics.ts'

/**
 * A diagnostic message with location information.
 */
export interface Diagnostic {
	/** The diagnostic definition from the catalog */
	readonly def: DiagnosticDef
	/** Interpolated message with arguments applied */
	readonly message: string
	/** Line number (1-indexed) */
	readonly line: number
	/** Column number (1-indexed) */
	readonly column: number
	/** Template arguments used for message interpolation */
	readonly args?: DiagnosticArgs
	/** Override the default suggestion text */
	readonly suggestionOverride?: string
}

function computeLineStarts(source: string): number[] {
	const starts = [0]
	for (let i = 0; i < source.length; i++) {
		if (source.charCodeAt(i) === 10) starts.push(i + 1)
	}
	return starts
}

export function formatPosition(position: Position): string {
	return `${position.line}:${position.column}`
}

export class CheckingContext {
	/** Original source code */
	readonly source: string

	/** Source filename for error messages */
	readonly filename: string

	/** Parsed declarations (populated by parser) */
	program: Program | null = null

	/** Declaration types and resolved annotations (populated by checker) */
	elaboration: Elaboration | null = null

	private readonly lineStarts: number[]

	private readonly diagnostics: Diagnostic[] = []

	private errorCount = 0

	constructor(source: string, filename = '<input>') {
		this.source = source
		this.filename = filename
		this.lineStarts = computeLineStarts(source)
	}

	/**
	 * Map a source offset to a 1-indexed line and column.
	 */
	positionAt(offset: number): Position {
		let low = 0
		let high = this.lineStarts.length - 1
		while (low < high) {
			const mid = (low + high + 1) >> 1
			const start = this.lineStarts[mid] ?? 0
			if (start <= offset) low = mid
			else high = mid - 1
		}
		const lineStart = this.lineStarts[low] ?? 0
		return { column: offset - lineStart + 1, line: low + 1, offset }
	}

	/**
	 * Position of a 1-indexed line and column, clamped to the source.
	 */
	positionAtLine(line: number, column: number): Position {
		const lineStart = this.lineStarts[line - 1]
		if (lineStart === undefined) return this.positionAt(this.source.length)
		return this.positionAt(Math.min(lineStart + column - 1, this.source.length))
	}

	// ===========================================================================
	// EMIT
	// ===========================================================================

	emit(code: DiagnosticCode, position: Position, args?: DiagnosticArgs): void {
		const def = getDiagnostic(code)
		this.addDiagnosticInternal({
			column: position.column,
			def,
			line: position.line,
			message: interpolateMessage(def.message, args),
			...(args ? { args } : {}),
		})
	}

	/**
	 * Emit a diagnostic with a custom suggestion override.
	 */
	emitWithSuggestion(
		code: DiagnosticCode,
		position: Position,
		suggestionOverride: string,
		args?: DiagnosticArgs
	): void {
		const def = getDiagnostic(code)
		this.addDiagnosticInternal({
			column: position.column,
			def,
			line: position.line,
			message: interpolateMessage(def.message, args),
			suggestionOverride,
			...(args ? { args } : {}),
		})
	}

	private addDiagnosticInternal(diagnostic: Diagnostic): void {
		this.diagnostics.push(diagnostic)
		if (diagnostic.def.severity === DiagnosticSeverity.Error) {
			this.errorCount++
		}
	}

	// ===========================================================================
	// QUERY METHODS
	// ===========================================================================

	hasErrors(): boolean {
		return this.errorCount > 0
	}

	getErrorCount(): number {
		return this.errorCount
	}

	getDiagnostics(): readonly Diagnostic[] {
		return this.diagnostics
	}

	getErrors(): Diagnostic[] {
		return this.diagnostics.filter((d) => d.def.severity === DiagnosticSeverity.Error)
	}

	getWarnings(): Diagnostic[] {
		return this.diagnostics.filter((d) => d.def.severity === DiagnosticSeverity.Warning)
	}

	getSourceLine(line: number): string | undefined {
		const start = this.lineStarts[line - 1]
		if (start === undefined) return undefined
		const end = this.lineStarts[line]
		const text = this.source.slice(start, end === undefined ? undefined : end - 1)
		return text.endsWith('\r') ? text.slice(0, -1) : text
	}

	// ===========================================================================
	// FORMATTING
	// ===========================================================================

	private getSeverityLabel(severity: DiagnosticSeverity): string {
		const labels: Record<DiagnosticSeverity, string> = {
			[DiagnosticSeverity.Error]: 'error',
			[DiagnosticSeverity.Warning]: 'warning',
			[DiagnosticSeverity.Note]: 'note',
		}
		return labels[severity]
	}

	/**
	 * Format a diagnostic for display (Rust-style output).
	 *
	 * Example:
	 * ```
	 * error[LDCHECK004]: function in resource interface cannot have an implementation
	 *   --> vault.lode:3:5
	 *    |
	 *  3 |     fun withdraw() { self.balance = 0 }
	 *    |                      ^
	 *    |
	 *    = help: Keep only `pre` and `post` blocks, or remove the body.
	 * ```
	 */
	formatDiagnostic(diagnostic: Diagnostic): string {
		const { def } = diagnostic
		const header = `${this.getSeverityLabel(def.severity)}[${def.code}]: ${diagnostic.message}`
		const location = `  --> ${this.filename}:${diagnostic.line}:${diagnostic.column}`

		const sourceLine = this.getSourceLine(diagnostic.line)
		if (sourceLine === undefined) {
			return `${header}\n${location}`
		}

		const pad = ' '.repeat(String(diagnostic.line).length)
		const emptyPrefix = ` ${pad} | `
		const pointer = `${' '.repeat(diagnostic.column - 1)}^`
		const lines = [
			header,
			location,
			emptyPrefix,
			` ${diagnostic.line} | ${sourceLine}`,
			`${emptyPrefix}${pointer}`,
		]

		const suggestionText = diagnostic.suggestionOverride ?? def.suggestion
		if (suggestionText) {
			const suggestion = interpolateMessage(suggestionText, diagnostic.args)
			lines.push(emptyPrefix, `   = help: ${suggestion}`)
		}

		return lines.join('\n')
	}

	formatAllDiagnostics(): string {
		return this.diagnostics.map((d) => this.formatDiagnostic(d)).join('\n\n')
	}
}
