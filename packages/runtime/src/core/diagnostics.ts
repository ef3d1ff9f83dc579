/**
 * Re-export diagnostic types and checker definitions from the shared package.
 */

import { CHECKER_DIAGNOSTICS } from '@lode/diagnostics'

export {
	CHECKER_DIAGNOSTICS,
	type CheckerDiagnosticCode,
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	interpolateMessage,
} from '@lode/diagnostics'

/**
 * All diagnostic codes the runtime can emit.
 */
export type DiagnosticCode = keyof typeof CHECKER_DIAGNOSTICS

export function getDiagnostic(code: DiagnosticCode): (typeof CHECKER_DIAGNOSTICS)[typeof code] {
	return CHECKER_DIAGNOSTICS[code]
}
