/**
 * Resource field nesting rules.
 */

import type { CheckingContext } from '../core/context.ts'
import { assertNever } from '../core/errors.ts'
import { CompositeKind, type FieldDeclaration, type TypeAnnotationNode } from '../parse/ast.ts'
import type { CheckerState } from './state.ts'
import { lookupAnnotationType, unwrapOptionalNode } from './type-resolution.ts'
import { isResourceType, type NominalType, nominalKindName, type Type, typeToString } from './types.ts'

/**
 * The resource a container type ultimately holds, for messages.
 */
function innermostResource(type: Type): Type {
	switch (type.kind) {
		case 'optional':
		case 'variable-sized':
		case 'constant-sized':
			return innermostResource(type.type)
		case 'dictionary':
			return innermostResource(type.valueType)
		default:
			return type
	}
}

/**
 * Walk an annotation tree. The first unmarked container that holds a
 * resource is reported; nothing below it is.
 */
function checkContainerMarkers(
	state: CheckerState,
	context: CheckingContext,
	field: FieldDeclaration,
	annotation: TypeAnnotationNode
): void {
	const node = unwrapOptionalNode(annotation.type)
	switch (node.kind) {
		case 'variable-sized':
		case 'constant-sized':
		case 'dictionary': {
			const type = lookupAnnotationType(state, annotation)
			if (!annotation.isResource && isResourceType(type)) {
				context.emit('LDCHECK006', annotation.position, {
					field: field.identifier.name,
					type: typeToString(innermostResource(type)),
				})
				return
			}
			if (node.kind === 'dictionary') {
				checkContainerMarkers(state, context, field, node.keyType)
				checkContainerMarkers(state, context, field, node.valueType)
			} else {
				checkContainerMarkers(state, context, field, node.element)
			}
			return
		}
		case 'nominal':
		case 'reference':
		case 'optional':
			return
		default:
			assertNever(node, 'type node')
	}
}

export function checkResourceFieldNesting(
	state: CheckerState,
	context: CheckingContext,
	type: NominalType,
	fields: readonly FieldDeclaration[]
): void {
	for (const field of fields) {
		switch (type.compositeKind) {
			case CompositeKind.Struct:
			case CompositeKind.Event:
			case CompositeKind.Enum: {
				const fieldType = lookupAnnotationType(state, field.typeAnnotation)
				if (isResourceType(fieldType)) {
					context.emit('LDCHECK005', field.typeAnnotation.position, {
						container: type.identifier,
						field: field.identifier.name,
						kind: nominalKindName(type),
						type: typeToString(fieldType),
					})
				}
				break
			}
			case CompositeKind.Resource:
			case CompositeKind.Contract:
				checkContainerMarkers(state, context, field, field.typeAnnotation)
				break
			default:
				assertNever(type.compositeKind, 'composite kind')
		}
	}
}
