/**
 * Type annotation resolution.
 *
 * Turns annotations as written into checker types, reporting unknown names
 * and misplaced or missing `@` markers. Every resolved annotation is stored
 * in the elaboration so later passes can read it back without re-reporting.
 */

import type { CheckingContext } from '../core/context.ts'
import { assertNever, unreachable } from '../core/errors.ts'
import {
	type Identifier,
	type NominalTypeNode,
	type Parameter,
	type TypeAnnotationNode,
	type TypeNode,
} from '../parse/ast.ts'
import { lookupPrimitive } from './builtins.ts'
import type { CheckerState } from './state.ts'
import {
	type FunctionType,
	InvalidType,
	isResourceType,
	type NominalType,
	type Type,
	type TypeAnnotation,
	typeToString,
	VoidType,
} from './types.ts'

/**
 * Resolve a dotted type path: the head through the type scope,
 * every further part through the previous type's nested types.
 */
export function resolveTypePath(
	state: CheckerState,
	context: CheckingContext,
	head: Identifier,
	rest: readonly Identifier[]
): NominalType | null {
	const fullName = [head, ...rest].map((id) => id.name).join('.')
	const entry = state.typeActivations.find(head.name)
	if (entry === undefined) {
		context.emit('LDCHECK019', head.position, { name: fullName })
		return null
	}

	let type = entry.type
	for (const part of rest) {
		const nested = type.nestedTypes.get(part.name)
		if (nested === undefined) {
			context.emit('LDCHECK019', part.position, { name: fullName })
			return null
		}
		type = nested
	}
	return type
}

export function resolveNominalType(
	state: CheckerState,
	context: CheckingContext,
	node: NominalTypeNode
): Type {
	if (node.nestedIdentifiers.length === 0) {
		const builtin = lookupPrimitive(node.identifier.name)
		if (builtin !== undefined) return builtin
	}
	return resolveTypePath(state, context, node.identifier, node.nestedIdentifiers) ?? InvalidType
}

function resolveTypeNode(state: CheckerState, context: CheckingContext, node: TypeNode): Type {
	switch (node.kind) {
		case 'nominal':
			return resolveNominalType(state, context, node)
		case 'optional':
			return { kind: 'optional', type: resolveTypeNode(state, context, node.type) }
		case 'variable-sized':
			return { kind: 'variable-sized', type: resolveAnnotation(state, context, node.element).type }
		case 'constant-sized':
			return {
				kind: 'constant-sized',
				size: node.size,
				type: resolveAnnotation(state, context, node.element).type,
			}
		case 'dictionary':
			return {
				keyType: resolveAnnotation(state, context, node.keyType).type,
				kind: 'dictionary',
				valueType: resolveAnnotation(state, context, node.valueType).type,
			}
		case 'reference':
			return {
				authorized: node.authorized,
				kind: 'reference',
				type: resolveTypeNode(state, context, node.type),
			}
		default:
			return assertNever(node, 'type node')
	}
}

/**
 * The node an annotation names once optionals are peeled off.
 */
export function unwrapOptionalNode(node: TypeNode): TypeNode {
	return node.kind === 'optional' ? unwrapOptionalNode(node.type) : node
}

function checkResourceMarker(
	context: CheckingContext,
	annotation: TypeAnnotationNode,
	type: Type
): void {
	if (type.kind === 'invalid') return

	const isResource = isResourceType(type)
	if (annotation.isResource && !isResource) {
		context.emit('LDCHECK007', annotation.position, { type: typeToString(type) })
	} else if (
		!annotation.isResource &&
		isResource &&
		unwrapOptionalNode(annotation.type).kind === 'nominal'
	) {
		context.emit('LDCHECK008', annotation.position, { type: typeToString(type) })
	}
}

export function resolveAnnotation(
	state: CheckerState,
	context: CheckingContext,
	annotation: TypeAnnotationNode
): TypeAnnotation {
	const type = resolveTypeNode(state, context, annotation.type)
	checkResourceMarker(context, annotation, type)
	state.elaboration.annotationTypes.set(annotation, type)
	return { isResource: annotation.isResource, type }
}

export function resolveFunctionType(
	state: CheckerState,
	context: CheckingContext,
	parameters: readonly Parameter[],
	returnTypeAnnotation: TypeAnnotationNode | null
): FunctionType {
	return {
		kind: 'function',
		parameterTypeAnnotations: parameters.map((p) => resolveAnnotation(state, context, p.typeAnnotation)),
		returnTypeAnnotation:
			returnTypeAnnotation === null
				? { isResource: false, type: VoidType }
				: resolveAnnotation(state, context, returnTypeAnnotation),
	}
}

/**
 * Read back an annotation resolved earlier in the same pass.
 */
export function lookupAnnotationType(state: CheckerState, annotation: TypeAnnotationNode): Type {
	return (
		state.elaboration.annotationTypes.get(annotation) ??
		unreachable(`annotation at ${annotation.position.line}:${annotation.position.column} was never resolved`)
	)
}
