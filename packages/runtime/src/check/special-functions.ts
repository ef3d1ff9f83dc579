/**
 * Initializer and destructor checking.
 */

import type { CheckingContext } from '../core/context.ts'
import {
	CompositeKind,
	type Expression,
	type SpecialFunctionDeclaration,
	SpecialFunctionKind,
	type Statement,
	type TypeDeclaration,
} from '../parse/ast.ts'
import { typeDeclarationKindName } from './declarations.ts'
import { checkFunctionBody, checkInterfaceFunctionBlock } from './functions.ts'
import type { CheckerState } from './state.ts'
import { lookupAnnotationType, resolveAnnotation } from './type-resolution.ts'
import {
	DeclarationKind,
	isOptionalType,
	isResourceType,
	type NominalType,
	type TypeAnnotation,
} from './types.ts'

function specialFunctionsOf(
	declaration: TypeDeclaration,
	kind: SpecialFunctionKind
): SpecialFunctionDeclaration[] {
	return declaration.members.specialFunctions.filter((fn) => fn.specialKind === kind)
}

/**
 * Resolve the parameter annotations of every special function and return
 * those of the first initializer.
 */
export function resolveSpecialFunctionParameters(
	state: CheckerState,
	context: CheckingContext,
	declaration: TypeDeclaration
): readonly TypeAnnotation[] {
	let initializerParameters: readonly TypeAnnotation[] | null = null
	for (const fn of declaration.members.specialFunctions) {
		const annotations = fn.parameters.map((p) => resolveAnnotation(state, context, p.typeAnnotation))
		if (initializerParameters === null && fn.specialKind === SpecialFunctionKind.Initializer) {
			initializerParameters = annotations
		}
	}
	return initializerParameters ?? []
}

function reportExtras(
	context: CheckingContext,
	type: NominalType,
	declaration: TypeDeclaration,
	functions: readonly SpecialFunctionDeclaration[],
	member: string
): void {
	for (const extra of functions.slice(1)) {
		context.emit('LDCHECK011', extra.identifier.position, {
			kind: typeDeclarationKindName(declaration),
			member,
			name: type.identifier,
		})
	}
}

/**
 * `self.name` as the field name, or null.
 */
function selfFieldName(expression: Expression): string | null {
	if (expression.kind !== 'member' || expression.optional) return null
	const { target } = expression
	return target.kind === 'identifier' && target.identifier.name === 'self'
		? expression.member.name
		: null
}

function assignedFields(statements: readonly Statement[]): Set<string> {
	const assigned = new Set<string>()
	for (const statement of statements) {
		if (statement.kind !== 'assignment') continue
		const name = selfFieldName(statement.target)
		if (name !== null) assigned.add(name)
	}
	return assigned
}

function destroyedFields(statements: readonly Statement[]): Set<string> {
	const destroyed = new Set<string>()
	for (const statement of statements) {
		if (statement.kind !== 'expression' || statement.expression.kind !== 'destroy') continue
		const name = selfFieldName(statement.expression.target)
		if (name !== null) destroyed.add(name)
	}
	return destroyed
}

function checkBodyPresence(
	context: CheckingContext,
	type: NominalType,
	declaration: TypeDeclaration,
	fn: SpecialFunctionDeclaration,
	implementedKind: string
): void {
	if (type.kind === 'interface') {
		checkInterfaceFunctionBlock(
			context,
			fn.functionBlock,
			implementedKind,
			typeDeclarationKindName(declaration)
		)
	} else if (fn.functionBlock === null) {
		context.emit('LDCHECK022', fn.identifier.position, {
			kind: implementedKind,
			name: fn.identifier.name,
		})
	}
}

function checkFieldInitialization(
	state: CheckerState,
	context: CheckingContext,
	declaration: TypeDeclaration,
	initializer: SpecialFunctionDeclaration
): void {
	if (initializer.functionBlock === null) return

	const assigned = assignedFields(initializer.functionBlock.statements)
	for (const field of declaration.members.fields) {
		if (assigned.has(field.identifier.name)) continue
		if (isOptionalType(lookupAnnotationType(state, field.typeAnnotation))) continue
		context.emit('LDCHECK009', initializer.identifier.position, { field: field.identifier.name })
	}
}

/** Events are constructed from their fields; enums from their cases. */
function requiresInitializer(type: NominalType): boolean {
	return type.compositeKind !== CompositeKind.Event && type.compositeKind !== CompositeKind.Enum
}

export function checkInitializers(
	state: CheckerState,
	context: CheckingContext,
	declaration: TypeDeclaration,
	type: NominalType
): void {
	const initializers = specialFunctionsOf(declaration, SpecialFunctionKind.Initializer)
	reportExtras(context, type, declaration, initializers, DeclarationKind.Initializer)

	for (const initializer of initializers) {
		checkBodyPresence(context, type, declaration, initializer, DeclarationKind.Initializer)
		if (type.kind === 'composite') {
			checkFieldInitialization(state, context, declaration, initializer)
		}
		checkFunctionBody(state, context, type, {
			functionBlock: initializer.functionBlock,
			parameters: initializer.parameters,
			returnType: null,
		})
	}

	if (
		type.kind === 'composite' &&
		initializers.length === 0 &&
		declaration.members.fields.length > 0 &&
		requiresInitializer(type)
	) {
		context.emit('LDCHECK010', declaration.identifier.position, {
			kind: typeDeclarationKindName(declaration),
			name: type.identifier,
		})
	}
}

function checkDestroyedFields(
	state: CheckerState,
	context: CheckingContext,
	declaration: TypeDeclaration,
	destructor: SpecialFunctionDeclaration
): void {
	if (destructor.functionBlock === null) return

	const destroyed = destroyedFields(destructor.functionBlock.statements)
	for (const field of resourceFields(state, declaration)) {
		if (!destroyed.has(field)) {
			context.emit('LDCHECK015', destructor.identifier.position, { field })
		}
	}
}

function resourceFields(state: CheckerState, declaration: TypeDeclaration): string[] {
	return declaration.members.fields
		.filter((field) => isResourceType(lookupAnnotationType(state, field.typeAnnotation)))
		.map((field) => field.identifier.name)
}

export function checkDestructors(
	state: CheckerState,
	context: CheckingContext,
	declaration: TypeDeclaration,
	type: NominalType
): void {
	const destructors = specialFunctionsOf(declaration, SpecialFunctionKind.Destructor)
	reportExtras(context, type, declaration, destructors, DeclarationKind.Destructor)
	const isResource = type.compositeKind === CompositeKind.Resource

	for (const destructor of destructors) {
		if (!isResource) {
			context.emit('LDCHECK012', destructor.identifier.position, {
				kind: typeDeclarationKindName(declaration),
				name: type.identifier,
			})
		}
		const [firstParameter] = destructor.parameters
		if (firstParameter !== undefined) {
			context.emit('LDCHECK013', firstParameter.position, { name: type.identifier })
		}

		checkBodyPresence(context, type, declaration, destructor, DeclarationKind.Destructor)
		if (type.kind === 'composite' && isResource) {
			checkDestroyedFields(state, context, declaration, destructor)
		}
		checkFunctionBody(state, context, type, {
			functionBlock: destructor.functionBlock,
			parameters: destructor.parameters,
			returnType: null,
		})
	}

	if (type.kind === 'composite' && isResource && destructors.length === 0) {
		const fields = resourceFields(state, declaration)
		if (fields.length > 0) {
			context.emit('LDCHECK014', declaration.identifier.position, {
				fields: fields.map((name) => `self.${name}`),
				name: type.identifier,
			})
		}
	}
}

export function checkUnknownSpecialFunctions(
	context: CheckingContext,
	declaration: TypeDeclaration
): void {
	for (const fn of specialFunctionsOf(declaration, SpecialFunctionKind.Unknown)) {
		context.emit('LDCHECK016', fn.identifier.position, { name: fn.identifier.name })
	}
}
