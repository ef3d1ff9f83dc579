/**
 * Access modifier validation.
 */

import type { CheckingContext } from '../core/context.ts'
import {
	Access,
	type FieldDeclaration,
	type FunctionDeclaration,
	type Identifier,
	type TypeDeclaration,
	VariableKind,
} from '../parse/ast.ts'
import type { CheckerState } from './state.ts'
import { DeclarationKind, declarationKindName } from './types.ts'

export const AccessCheckMode = {
	/** No access checks at all */
	None: 'none',
	/** Unspecified access reads as private: fields and functions must state theirs */
	NotSpecifiedRestricted: 'not-specified-restricted',
	/** Unspecified access reads as public */
	NotSpecifiedUnrestricted: 'not-specified-unrestricted',
	/** Every declaration must state its access */
	Strict: 'strict',
} as const

export type AccessCheckMode = (typeof AccessCheckMode)[keyof typeof AccessCheckMode]

export const ACCESS_CHECK_MODES: readonly AccessCheckMode[] = Object.values(AccessCheckMode)

export function isAccessCheckMode(value: string): value is AccessCheckMode {
	return ACCESS_CHECK_MODES.some((mode) => mode === value)
}

function requiresExplicitAccess(mode: AccessCheckMode, isMember: boolean): boolean {
	return mode === AccessCheckMode.Strict || (isMember && mode === AccessCheckMode.NotSpecifiedRestricted)
}

function checkUnspecified(
	state: CheckerState,
	context: CheckingContext,
	access: Access,
	kind: string,
	identifier: Identifier,
	isMember: boolean
): void {
	if (access === Access.NotSpecified && requiresExplicitAccess(state.accessCheckMode, isMember)) {
		context.emit('LDCHECK003', identifier.position, { kind, name: identifier.name })
	}
}

/**
 * Validate a type declaration's own access modifier.
 * Top-level declarations cannot be private; `pub(set)` is never valid here.
 */
export function checkDeclarationAccess(
	state: CheckerState,
	context: CheckingContext,
	declaration: TypeDeclaration,
	isTopLevel: boolean
): void {
	if (state.accessCheckMode === AccessCheckMode.None) return

	const kind = declarationKindName(declaration.compositeKind, declaration.kind === 'interface')
	const invalid =
		declaration.access === Access.PublicSettable ||
		(isTopLevel && declaration.access === Access.Private)
	if (invalid) {
		context.emit('LDCHECK002', declaration.position, { access: declaration.access, kind })
		return
	}
	checkUnspecified(state, context, declaration.access, kind, declaration.identifier, false)
}

/**
 * Validate field access modifiers. `pub(set)` requires a `var` field.
 */
export function checkFieldsAccess(
	state: CheckerState,
	context: CheckingContext,
	fields: readonly FieldDeclaration[]
): void {
	if (state.accessCheckMode === AccessCheckMode.None) return

	for (const field of fields) {
		if (field.access === Access.PublicSettable && field.variableKind !== VariableKind.Variable) {
			context.emit('LDCHECK002', field.position, {
				access: field.access,
				kind: `${DeclarationKind.Constant} ${DeclarationKind.Field}`,
			})
			continue
		}
		checkUnspecified(state, context, field.access, DeclarationKind.Field, field.identifier, true)
	}
}

export function checkFunctionAccess(
	state: CheckerState,
	context: CheckingContext,
	fn: FunctionDeclaration
): void {
	if (state.accessCheckMode === AccessCheckMode.None) return

	if (fn.access === Access.PublicSettable) {
		context.emit('LDCHECK002', fn.position, { access: fn.access, kind: DeclarationKind.Function })
		return
	}
	checkUnspecified(state, context, fn.access, DeclarationKind.Function, fn.identifier, true)
}
