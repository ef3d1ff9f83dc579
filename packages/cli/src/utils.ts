import {
	type DiagnosticDef,
	interpolateMessage,
	LDCLI001,
	LDCLI002,
	LDCLI003,
	LDCLI004,
} from '@lode/diagnostics'
import {
	ACCESS_CHECK_MODES,
	type CheckingContext,
	type Diagnostic,
	DiagnosticSeverity,
	InternalFault,
} from '@lode/runtime'

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

function formatCliDiagnostic(def: DiagnosticDef, args: Record<string, string>): string {
	return `[${def.code}] ${interpolateMessage(def.message, args)}`
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return formatCliDiagnostic(LDCLI001, { path: filePath })
	}
	return formatCliDiagnostic(LDCLI002, { reason: getErrorMessage(error) })
}

export function formatInvalidAccessModeError(mode: string): string {
	const modes = ACCESS_CHECK_MODES.join(', ')
	const help = interpolateMessage(LDCLI003.suggestion ?? '', { modes })
	return `${formatCliDiagnostic(LDCLI003, { mode })}\n  = help: ${help}`
}

export function formatInternalError(error: unknown): string {
	const reason = error instanceof InternalFault ? `internal fault: ${error.message}` : getErrorMessage(error)
	return formatCliDiagnostic(LDCLI004, { reason })
}

export type SeverityName = 'error' | 'warning' | 'note'

export function severityName(diagnostic: Diagnostic): SeverityName {
	switch (diagnostic.def.severity) {
		case DiagnosticSeverity.Error:
			return 'error'
		case DiagnosticSeverity.Warning:
			return 'warning'
		case DiagnosticSeverity.Note:
			return 'note'
	}
}

export interface JsonDiagnostic {
	readonly code: string
	readonly severity: SeverityName
	readonly message: string
	readonly file: string
	readonly line: number
	readonly column: number
}

export function toJsonDiagnostic(filename: string, diagnostic: Diagnostic): JsonDiagnostic {
	return {
		code: diagnostic.def.code,
		column: diagnostic.column,
		file: filename,
		line: diagnostic.line,
		message: diagnostic.message,
		severity: severityName(diagnostic),
	}
}

export function formatDiagnosticsJson(context: CheckingContext): string {
	const diagnostics = context.getDiagnostics().map((d) => toJsonDiagnostic(context.filename, d))
	return JSON.stringify({ diagnostics, errorCount: context.getErrorCount() }, null, 2)
}

export function formatSummary(filePath: string, errorCount: number): string {
	return errorCount === 0
		? `${filePath}: no problems found`
		: `${filePath}: ${errorCount} error${errorCount === 1 ? '' : 's'}`
}
