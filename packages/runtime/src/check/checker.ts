/**
 * Program checker entry point.
 *
 * Declares the builtins, then runs Phase 1 over every top-level
 * declaration before Phase 2 over any, so declarations may refer to
 * each other regardless of order.
 */

import type { CheckingContext } from '../core/context.ts'
import { unreachable } from '../core/errors.ts'
import type { CompositeDeclaration, InterfaceDeclaration, Program } from '../parse/ast.ts'
import { type BuiltinEnum, DEFAULT_BUILTIN_ENUMS, declareBuiltinEnum, declareBuiltinValues } from './builtins.ts'
import { checkComposite, declareComposite } from './composites.ts'
import { checkInterface, declareInterface } from './interfaces.ts'
import { type CheckerOptions, type CheckerState, createCheckerState } from './state.ts'

export interface CheckOptions extends CheckerOptions {
	/** Replaces the default algorithm enums */
	readonly builtinEnums?: readonly BuiltinEnum[]
}

export interface CheckResult {
	readonly succeeded: boolean
}

export function checkProgram(state: CheckerState, context: CheckingContext, program: Program): void {
	const interfaces = program.declarations.filter(
		(d): d is InterfaceDeclaration => d.kind === 'interface'
	)
	const composites = program.declarations.filter(
		(d): d is CompositeDeclaration => d.kind === 'composite'
	)

	for (const declaration of interfaces) declareInterface(state, context, declaration, null)
	for (const declaration of composites) declareComposite(state, context, declaration, null)

	for (const declaration of interfaces) checkInterface(state, context, declaration)
	for (const declaration of composites) checkComposite(state, context, declaration)
}

/**
 * Check the parsed program held by `context`.
 * Diagnostics go to the context; the elaboration is stored on it.
 */
export function check(context: CheckingContext, options: CheckOptions = {}): CheckResult {
	const program = context.program ?? unreachable('check called before a program was parsed')
	const state = createCheckerState(context.filename, options)

	declareBuiltinValues(state)
	for (const builtin of options.builtinEnums ?? DEFAULT_BUILTIN_ENUMS) {
		declareBuiltinEnum(state, builtin)
	}

	checkProgram(state, context, program)

	context.elaboration = state.elaboration
	return { succeeded: !context.hasErrors() }
}
