/**
 * Declaration of nominal types and member name collisions.
 */

import { type CheckingContext, formatPosition } from '../core/context.ts'
import type {
	Identifier,
	MemberDeclaration,
	Members,
	Position,
	TypeDeclaration,
} from '../parse/ast.ts'
import type { CheckerState } from './state.ts'
import { DeclarationKind, declarationKindName, type NominalType } from './types.ts'

export function typeDeclarationKindName(declaration: TypeDeclaration): string {
	return declarationKindName(declaration.compositeKind, declaration.kind === 'interface')
}

/**
 * Report that `identifier` is already taken. A null `previous` means the
 * name belongs to a builtin.
 */
export function reportRedeclaration(
	context: CheckingContext,
	kind: string,
	identifier: Identifier,
	previous: Position | null
): void {
	if (previous === null) {
		context.emitWithSuggestion(
			'LDCHECK001',
			identifier.position,
			`\`${identifier.name}\` is a builtin type. Choose another name.`,
			{ kind, name: identifier.name }
		)
		return
	}
	context.emit('LDCHECK001', identifier.position, {
		kind,
		name: identifier.name,
		previous: formatPosition(previous),
	})
}

/**
 * Declare a nominal type in the innermost type layer.
 */
export function declareNominalType(
	state: CheckerState,
	context: CheckingContext,
	declaration: TypeDeclaration,
	type: NominalType
): void {
	const kind = typeDeclarationKindName(declaration)
	const existing = state.typeActivations.declare({
		access: declaration.access,
		declarationKind: kind,
		identifier: declaration.identifier.name,
		position: declaration.identifier.position,
		type,
	})
	if (existing !== undefined) {
		reportRedeclaration(context, kind, declaration.identifier, existing.position)
	}
}

function memberKindName(member: MemberDeclaration): string {
	switch (member.kind) {
		case 'field':
			return DeclarationKind.Field
		case 'function':
			return DeclarationKind.Function
		case 'enum-case':
			return DeclarationKind.EnumCase
		case 'special-function':
			return member.specialKind
		case 'interface':
		case 'composite':
			return typeDeclarationKindName(member)
	}
}

function isTypeDeclaration(member: MemberDeclaration): member is TypeDeclaration {
	return member.kind === 'interface' || member.kind === 'composite'
}

/**
 * Members share one namespace. The first declaration owns a name; every
 * later one is reported once. Clashes between two nested types were already
 * reported when they were declared, so they are skipped here.
 */
export function checkMemberIdentifiers(context: CheckingContext, members: Members): void {
	const owners = new Map<string, Position>()
	const nestedTypeNames = new Set<string>()

	for (const member of members.all) {
		if (member.kind === 'special-function') continue
		const { identifier } = member
		const owner = owners.get(identifier.name)

		if (owner === undefined) {
			owners.set(identifier.name, identifier.position)
		} else if (!(isTypeDeclaration(member) && nestedTypeNames.has(identifier.name))) {
			reportRedeclaration(context, memberKindName(member), identifier, owner)
		}

		if (isTypeDeclaration(member)) nestedTypeNames.add(identifier.name)
	}
}
