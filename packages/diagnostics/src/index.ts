/**
 * @lode/diagnostics
 *
 * Shared diagnostic types and definitions for Lode packages.
 */

export {
	CHECKER_DIAGNOSTICS,
	type CheckerDiagnosticCode,
	LDCHECK001,
	LDCHECK002,
	LDCHECK003,
	LDCHECK004,
	LDCHECK005,
	LDCHECK006,
	LDCHECK007,
	LDCHECK008,
	LDCHECK009,
	LDCHECK010,
	LDCHECK011,
	LDCHECK012,
	LDCHECK013,
	LDCHECK014,
	LDCHECK015,
	LDCHECK016,
	LDCHECK017,
	LDCHECK018,
	LDCHECK019,
	LDCHECK020,
	LDCHECK021,
	LDCHECK022,
	LDCHECK023,
	LDCHECK024,
	LDPARSE001,
} from './checker.ts'
export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	LDCLI001,
	LDCLI002,
	LDCLI003,
	LDCLI004,
} from './cli.ts'
export { interpolateMessage } from './interpolate.ts'
export {
	type DiagnosticArg,
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	type DiagnosticSeverity as DiagnosticSeverityType,
} from './types.ts'

import { CHECKER_DIAGNOSTICS } from './checker.ts'
import { CLI_DIAGNOSTICS } from './cli.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...CHECKER_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return code in DIAGNOSTICS
}
