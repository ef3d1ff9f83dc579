/**
 * Nested type declarations.
 *
 * Phase 1 of a declaration declares its nested types in their own layer,
 * fully checks nested composites, and records name → declaration so that
 * Phase 2 can bring the nested types back into scope.
 */

import type { CheckingContext } from '../core/context.ts'
import { unreachable } from '../core/errors.ts'
import { CompositeKind, type TypeDeclaration } from '../parse/ast.ts'
import { within } from './activations.ts'
import { checkComposite, declareComposite } from './composites.ts'
import { typeDeclarationKindName } from './declarations.ts'
import { declareInterface } from './interfaces.ts'
import { type CheckerState, enterDeclarationScope, markContainerType } from './state.ts'
import type { NominalType } from './types.ts'

function nestedDeclarations(declaration: TypeDeclaration): TypeDeclaration[] {
	return declaration.members.all.filter(
		(member): member is TypeDeclaration => member.kind === 'interface' || member.kind === 'composite'
	)
}

/**
 * Only contracts and contract interfaces hold nested types, and a contract
 * never nests inside anything.
 */
function checkNestingRules(context: CheckingContext, declaration: TypeDeclaration): void {
	const containerAllows = declaration.compositeKind === CompositeKind.Contract
	for (const nested of nestedDeclarations(declaration)) {
		if (containerAllows && nested.compositeKind !== CompositeKind.Contract) continue
		context.emit('LDCHECK018', nested.identifier.position, {
			containerKind: typeDeclarationKindName(declaration),
			nestedKind: typeDeclarationKindName(nested),
		})
	}
}

export function declareNestedTypes(
	state: CheckerState,
	context: CheckingContext,
	declaration: TypeDeclaration,
	type: NominalType
): void {
	within(enterDeclarationScope(state), () =>
		// Held across declaration too: the nested composites' Phase 2 runs in here and needs the flag
		within(markContainerType(state, type), () => {
			checkNestingRules(context, declaration)

			for (const nested of declaration.members.interfaces) {
				declareInterface(state, context, nested, type)
			}
			for (const nested of declaration.members.composites) {
				declareComposite(state, context, nested, type)
			}
			for (const nested of declaration.members.composites) {
				checkComposite(state, context, nested)
			}

			const byName = new Map<string, TypeDeclaration>()
			for (const nested of nestedDeclarations(declaration)) {
				const { name } = nested.identifier
				if (byName.has(name)) continue
				const nestedType =
					state.elaboration.typeOf(nested) ?? unreachable(`nested type '${name}' was not declared`)
				byName.set(name, nested)
				type.nestedTypes.set(name, nestedType)
			}
			state.elaboration.nestedDeclarations.set(declaration, byName)
		})
	)
}

/**
 * Bring the nested types of `type` into the current type layer.
 */
export function declareNestedTypesInScope(
	state: CheckerState,
	declaration: TypeDeclaration,
	type: NominalType
): void {
	const byName =
		state.elaboration.nestedDeclarations.get(declaration) ??
		unreachable(`nested types of '${type.identifier}' were never recorded`)

	for (const [name, nestedType] of type.nestedTypes) {
		const nested = byName.get(name) ?? unreachable(`no declaration for nested type '${name}'`)
		state.typeActivations.declare({
			access: nested.access,
			declarationKind: typeDeclarationKindName(nested),
			identifier: name,
			position: nested.identifier.position,
			type: nestedType,
		})
	}
}
