/**
 * CLI diagnostic definitions.
 *
 * Error code format: LDCLI<NUMBER>
 * - LDCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (LDCLI001-099)
// =============================================================================

export const LDCLI001: DiagnosticDef = {
	code: 'LDCLI001',
	description: "Lode couldn't find a file at this path.",
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const LDCLI002: DiagnosticDef = {
	code: 'LDCLI002',
	description: "The file exists but Lode can't open it.",
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const LDCLI003: DiagnosticDef = {
	code: 'LDCLI003',
	description: "Lode doesn't recognize this access checking mode.",
	message: 'unknown access mode "{mode}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use one of: {modes}.',
}

export const LDCLI004: DiagnosticDef = {
	code: 'LDCLI004',
	description: 'Something unexpected went wrong while checking.',
	message: 'checking failed: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'This is a checker bug. Please report it with the file that triggered it.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	LDCLI001,
	LDCLI002,
	LDCLI003,
	LDCLI004,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
