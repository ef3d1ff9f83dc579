/**
 * Core data structures shared by every phase.
 */

export { CheckingContext, type Diagnostic, formatPosition } from './context.ts'
export {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
} from './diagnostics.ts'
export { assertNever, InternalFault, unreachable } from './errors.ts'
