/**
 * Interface declaration checking.
 *
 * Phase 1 (`declareInterface`) makes the type visible under its name.
 * Phase 2 (`checkInterface`) validates the declaration and fills in its
 * members, reading everything Phase 1 produced from the elaboration.
 */

import type { CheckingContext } from '../core/context.ts'
import { unreachable } from '../core/errors.ts'
import { CompositeKind, type InterfaceDeclaration } from '../parse/ast.ts'
import { checkDeclarationAccess, checkFieldsAccess, checkFunctionAccess } from './access.ts'
import { within } from './activations.ts'
import { checkMemberIdentifiers, declareNominalType, typeDeclarationKindName } from './declarations.ts'
import { checkFunctionBody, checkInterfaceFunctionBlock } from './functions.ts'
import { buildMembers } from './members.ts'
import { declareNestedTypes, declareNestedTypesInScope } from './nested.ts'
import { checkResourceFieldNesting } from './resources.ts'
import {
	checkDestructors,
	checkInitializers,
	checkUnknownSpecialFunctions,
	resolveSpecialFunctionParameters,
} from './special-functions.ts'
import { type CheckerState, markContainerType } from './state.ts'
import { lookupAnnotationType } from './type-resolution.ts'
import { createInterfaceType, type InterfaceType, type NominalType } from './types.ts'

// =============================================================================
// PHASE 1
// =============================================================================

export function declareInterface(
	state: CheckerState,
	context: CheckingContext,
	declaration: InterfaceDeclaration,
	containerType: NominalType | null
): InterfaceType {
	const type = createInterfaceType(
		declaration.identifier.name,
		declaration.compositeKind,
		state.location
	)
	type.containerType = containerType

	declareNominalType(state, context, declaration, type)
	declareNestedTypes(state, context, declaration, type)

	state.elaboration.interfaceTypes.set(declaration, type)
	return type
}

// =============================================================================
// PHASE 2
// =============================================================================

function checkInterfaceFunctions(
	state: CheckerState,
	context: CheckingContext,
	declaration: InterfaceDeclaration,
	type: InterfaceType
): void {
	const containerKind = typeDeclarationKindName(declaration)
	for (const fn of declaration.members.functions) {
		checkFunctionAccess(state, context, fn)
		checkInterfaceFunctionBlock(context, fn.functionBlock, 'function', containerKind)
		checkFunctionBody(state, context, type, {
			functionBlock: fn.functionBlock,
			parameters: fn.parameters,
			returnType:
				fn.returnTypeAnnotation === null ? null : lookupAnnotationType(state, fn.returnTypeAnnotation),
		})
	}
}

function checkInterfaceKind(context: CheckingContext, declaration: InterfaceDeclaration): void {
	const { compositeKind } = declaration
	if (compositeKind === CompositeKind.Enum || compositeKind === CompositeKind.Event) {
		context.emit('LDCHECK017', declaration.identifier.position, { kind: compositeKind })
	}
}

export function lookupInterfaceType(
	state: CheckerState,
	declaration: InterfaceDeclaration
): InterfaceType {
	return (
		state.elaboration.interfaceTypes.get(declaration) ??
		unreachable(`interface '${declaration.identifier.name}' was checked before it was declared`)
	)
}

export function checkInterface(
	state: CheckerState,
	context: CheckingContext,
	declaration: InterfaceDeclaration
): void {
	const type = lookupInterfaceType(state, declaration)

	within(markContainerType(state, type), () => {
		checkDeclarationAccess(state, context, declaration, type.containerType === null)
		checkFieldsAccess(state, context, declaration.members.fields)
		checkMemberIdentifiers(context, declaration.members)

		within(state.typeActivations.enter(), () => {
			declareNestedTypesInScope(state, declaration, type)

			buildMembers(state, context, declaration, type)
			type.initializerParameterTypeAnnotations = resolveSpecialFunctionParameters(
				state,
				context,
				declaration
			)

			checkInitializers(state, context, declaration, type)
			checkDestructors(state, context, declaration, type)
			checkUnknownSpecialFunctions(context, declaration)
			checkInterfaceFunctions(state, context, declaration, type)
			checkResourceFieldNesting(state, context, type, declaration.members.fields)
			checkInterfaceKind(context, declaration)

			for (const nested of declaration.members.interfaces) {
				checkInterface(state, context, nested)
			}
		})
	})
}
