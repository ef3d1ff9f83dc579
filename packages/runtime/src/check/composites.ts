/**
 * Composite declaration checking.
 *
 * Same two phases as interfaces. Composites differ in that their functions
 * need bodies, enums take a raw type and cases, and their other
 * conformances must name interfaces.
 */

import type { CheckingContext } from '../core/context.ts'
import { unreachable } from '../core/errors.ts'
import { CompositeKind, type CompositeDeclaration } from '../parse/ast.ts'
import { checkDeclarationAccess, checkFieldsAccess, checkFunctionAccess } from './access.ts'
import { within } from './activations.ts'
import { enumRawValueMember, ENUM_RAW_VALUE_FIELD } from './builtins.ts'
import { checkMemberIdentifiers, declareNominalType } from './declarations.ts'
import { checkFunctionBody } from './functions.ts'
import { checkInterface } from './interfaces.ts'
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
import { lookupAnnotationType, resolveNominalType } from './type-resolution.ts'
import {
	type CompositeType,
	createCompositeType,
	DeclarationKind,
	type InterfaceType,
	isIntegerType,
	type NominalType,
	typeToString,
} from './types.ts'

// =============================================================================
// PHASE 1
// =============================================================================

export function declareComposite(
	state: CheckerState,
	context: CheckingContext,
	declaration: CompositeDeclaration,
	containerType: NominalType | null
): CompositeType {
	const type = createCompositeType(
		declaration.identifier.name,
		declaration.compositeKind,
		state.location
	)
	type.containerType = containerType

	declareNominalType(state, context, declaration, type)
	declareNestedTypes(state, context, declaration, type)

	state.elaboration.compositeTypes.set(declaration, type)
	return type
}

// =============================================================================
// PHASE 2
// =============================================================================

/**
 * An enum's first conformance is its raw type; the rest, and every
 * conformance of other composites, must be interfaces.
 */
function resolveConformances(
	state: CheckerState,
	context: CheckingContext,
	declaration: CompositeDeclaration,
	type: CompositeType
): void {
	let conformances = declaration.conformances
	type.enumRawType = null

	if (declaration.compositeKind === CompositeKind.Enum) {
		const [rawTypeNode, ...rest] = conformances
		conformances = rest
		if (rawTypeNode === undefined) {
			context.emit('LDCHECK023', declaration.identifier.position, {
				name: type.identifier,
				type: 'none',
			})
		} else {
			const rawType = resolveNominalType(state, context, rawTypeNode)
			if (rawType.kind !== 'invalid' && !isIntegerType(rawType)) {
				context.emit('LDCHECK023', rawTypeNode.position, {
					name: type.identifier,
					type: typeToString(rawType),
				})
			}
			type.enumRawType = rawType
		}
	}

	const interfaces: InterfaceType[] = []
	for (const node of conformances) {
		const resolved = resolveNominalType(state, context, node)
		if (resolved.kind === 'interface') interfaces.push(resolved)
	}
	type.conformances = interfaces
}

function checkEnumCases(
	context: CheckingContext,
	declaration: CompositeDeclaration,
	type: CompositeType
): void {
	const { enumCases } = declaration.members
	if (declaration.compositeKind === CompositeKind.Enum) {
		type.enumCases = enumCases.map((c) => c.identifier.name)
		return
	}

	type.enumCases = []
	for (const enumCase of enumCases) {
		context.emit('LDCHECK024', enumCase.identifier.position, {
			container: type.identifier,
			name: enumCase.identifier.name,
		})
	}
}

function addEnumRawValue(type: CompositeType): void {
	if (type.compositeKind !== CompositeKind.Enum || type.enumRawType === null) return
	if (type.members.has(ENUM_RAW_VALUE_FIELD)) return
	type.members.set(
		ENUM_RAW_VALUE_FIELD,
		enumRawValueMember(type, { isResource: false, type: type.enumRawType })
	)
}

function checkCompositeFunctions(
	state: CheckerState,
	context: CheckingContext,
	declaration: CompositeDeclaration,
	type: CompositeType
): void {
	for (const fn of declaration.members.functions) {
		checkFunctionAccess(state, context, fn)
		if (fn.functionBlock === null) {
			context.emit('LDCHECK022', fn.identifier.position, {
				kind: DeclarationKind.Function,
				name: fn.identifier.name,
			})
		}
		checkFunctionBody(state, context, type, {
			functionBlock: fn.functionBlock,
			parameters: fn.parameters,
			returnType:
				fn.returnTypeAnnotation === null ? null : lookupAnnotationType(state, fn.returnTypeAnnotation),
		})
	}
}

export function lookupCompositeType(
	state: CheckerState,
	declaration: CompositeDeclaration
): CompositeType {
	return (
		state.elaboration.compositeTypes.get(declaration) ??
		unreachable(`composite '${declaration.identifier.name}' was checked before it was declared`)
	)
}

export function checkComposite(
	state: CheckerState,
	context: CheckingContext,
	declaration: CompositeDeclaration
): void {
	const type = lookupCompositeType(state, declaration)

	within(markContainerType(state, type), () => {
		checkDeclarationAccess(state, context, declaration, type.containerType === null)
		checkFieldsAccess(state, context, declaration.members.fields)
		checkMemberIdentifiers(context, declaration.members)

		within(state.typeActivations.enter(), () => {
			declareNestedTypesInScope(state, declaration, type)

			resolveConformances(state, context, declaration, type)
			checkEnumCases(context, declaration, type)

			buildMembers(state, context, declaration, type)
			addEnumRawValue(type)
			type.initializerParameterTypeAnnotations = resolveSpecialFunctionParameters(
				state,
				context,
				declaration
			)

			checkInitializers(state, context, declaration, type)
			checkDestructors(state, context, declaration, type)
			checkUnknownSpecialFunctions(context, declaration)
			checkCompositeFunctions(state, context, declaration, type)
			checkResourceFieldNesting(state, context, type, declaration.members.fields)

			for (const nested of declaration.members.interfaces) {
				checkInterface(state, context, nested)
			}
		})
	})
}
