/**
 * Semantic checker for type declarations.
 */

export { ACCESS_CHECK_MODES, AccessCheckMode, isAccessCheckMode } from './access.ts'
export { type ActivationEntry, Activations, type ScopeGuard, within } from './activations.ts'
export {
	type BuiltinEnum,
	type BuiltinEnumCase,
	DEFAULT_BUILTIN_ENUMS,
	declareBuiltinEnum,
	ENUM_RAW_VALUE_FIELD,
	HashAlgorithm,
	lookupPrimitive,
	SignatureAlgorithm,
} from './builtins.ts'
export { type CheckOptions, type CheckResult, check, checkProgram } from './checker.ts'
export { checkComposite, declareComposite, lookupCompositeType } from './composites.ts'
export { Elaboration } from './elaboration.ts'
export { checkInterface, declareInterface, lookupInterfaceType } from './interfaces.ts'
export {
	type CheckerOptions,
	type CheckerState,
	createCheckerState,
	type TypeEntry,
	type ValueEntry,
} from './state.ts'
export * from './types.ts'
