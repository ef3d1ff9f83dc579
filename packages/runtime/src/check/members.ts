/**
 * Member table construction for interface and composite types.
 */

import type { CheckingContext } from '../core/context.ts'
import type { FieldDeclaration, FunctionDeclaration, Position, TypeDeclaration } from '../parse/ast.ts'
import { type CheckerState, isContainerType } from './state.ts'
import { resolveAnnotation, resolveFunctionType } from './type-resolution.ts'
import {
	DeclarationKind,
	isNominalType,
	type Member,
	type NominalType,
	qualifiedIdentifier,
	type TypeAnnotation,
} from './types.ts'

/**
 * A field whose type is directly a type still being checked would contain
 * itself. Optionals, references and containers break the cycle.
 */
function checkSelfNesting(
	state: CheckerState,
	context: CheckingContext,
	field: FieldDeclaration,
	annotation: TypeAnnotation
): void {
	if (isNominalType(annotation.type) && isContainerType(state, annotation.type)) {
		context.emit('LDCHECK021', field.typeAnnotation.position, {
			field: field.identifier.name,
			type: qualifiedIdentifier(annotation.type),
		})
	}
}

function fieldMember(
	type: NominalType,
	field: FieldDeclaration,
	typeAnnotation: TypeAnnotation
): Member {
	return {
		access: field.access,
		containerType: type,
		declaration: field,
		declarationKind: DeclarationKind.Field,
		identifier: field.identifier,
		typeAnnotation,
		variableKind: field.variableKind,
	}
}

function functionMember(
	type: NominalType,
	fn: FunctionDeclaration,
	typeAnnotation: TypeAnnotation
): Member {
	return {
		access: fn.access,
		containerType: type,
		declaration: fn,
		declarationKind: DeclarationKind.Function,
		identifier: fn.identifier,
		typeAnnotation,
		variableKind: null,
	}
}

/**
 * Resolve field and function types and build the member table.
 * Fields come first, then functions; on a name clash the first one stays.
 * Replaces whatever table the type had.
 */
export function buildMembers(
	state: CheckerState,
	context: CheckingContext,
	declaration: TypeDeclaration,
	type: NominalType
): Map<string, Member> {
	const members = new Map<string, Member>()
	const origins = new Map<string, Position>()

	const add = (member: Member): void => {
		if (members.has(member.identifier.name)) return
		members.set(member.identifier.name, member)
		origins.set(member.identifier.name, member.identifier.position)
	}

	for (const field of declaration.members.fields) {
		const annotation = resolveAnnotation(state, context, field.typeAnnotation)
		checkSelfNesting(state, context, field, annotation)
		add(fieldMember(type, field, annotation))
	}

	for (const fn of declaration.members.functions) {
		const functionType = resolveFunctionType(state, context, fn.parameters, fn.returnTypeAnnotation)
		add(functionMember(type, fn, { isResource: false, type: functionType }))
	}

	type.members = members
	state.elaboration.memberOrigins.set(type, origins)
	return members
}
