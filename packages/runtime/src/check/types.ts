/**
 * Static types produced by the checker.
 */

import { assertNever } from '../core/errors.ts'
import {
	type Access,
	CompositeKind,
	type FieldDeclaration,
	type FunctionDeclaration,
	type Identifier,
	type VariableKind,
} from '../parse/ast.ts'

export const PrimitiveName = {
	Address: 'Address',
	AnyResource: 'AnyResource',
	AnyStruct: 'AnyStruct',
	Bool: 'Bool',
	Character: 'Character',
	Fix64: 'Fix64',
	Int: 'Int',
	Int8: 'Int8',
	Int16: 'Int16',
	Int32: 'Int32',
	Int64: 'Int64',
	Int128: 'Int128',
	Int256: 'Int256',
	Never: 'Never',
	Path: 'Path',
	String: 'String',
	UFix64: 'UFix64',
	UInt: 'UInt',
	UInt8: 'UInt8',
	UInt16: 'UInt16',
	UInt32: 'UInt32',
	UInt64: 'UInt64',
	UInt128: 'UInt128',
	UInt256: 'UInt256',
	Void: 'Void',
	Word8: 'Word8',
	Word16: 'Word16',
	Word32: 'Word32',
	Word64: 'Word64',
} as const

export type PrimitiveName = (typeof PrimitiveName)[keyof typeof PrimitiveName]

const INTEGER_NAMES: ReadonlySet<PrimitiveName> = new Set([
	PrimitiveName.Int,
	PrimitiveName.Int8,
	PrimitiveName.Int16,
	PrimitiveName.Int32,
	PrimitiveName.Int64,
	PrimitiveName.Int128,
	PrimitiveName.Int256,
	PrimitiveName.UInt,
	PrimitiveName.UInt8,
	PrimitiveName.UInt16,
	PrimitiveName.UInt32,
	PrimitiveName.UInt64,
	PrimitiveName.UInt128,
	PrimitiveName.UInt256,
	PrimitiveName.Word8,
	PrimitiveName.Word16,
	PrimitiveName.Word32,
	PrimitiveName.Word64,
])

export interface PrimitiveType {
	readonly kind: 'primitive'
	readonly name: PrimitiveName
}

export interface OptionalType {
	readonly kind: 'optional'
	readonly type: Type
}

export interface VariableSizedType {
	readonly kind: 'variable-sized'
	readonly type: Type
}

export interface ConstantSizedType {
	readonly kind: 'constant-sized'
	readonly type: Type
	readonly size: number
}

export interface DictionaryType {
	readonly kind: 'dictionary'
	readonly keyType: Type
	readonly valueType: Type
}

export interface ReferenceType {
	readonly kind: 'reference'
	readonly authorized: boolean
	readonly type: Type
}

/**
 * A type together with whether it was written with `@`.
 */
export interface TypeAnnotation {
	readonly isResource: boolean
	readonly type: Type
}

export interface FunctionType {
	readonly kind: 'function'
	readonly parameterTypeAnnotations: readonly TypeAnnotation[]
	readonly returnTypeAnnotation: TypeAnnotation
}

export interface InvalidType {
	readonly kind: 'invalid'
}

export const DeclarationKind = {
	Before: 'before',
	Constant: 'constant',
	Destructor: 'destructor',
	EnumCase: 'enum case',
	Field: 'field',
	Function: 'function',
	Initializer: 'initializer',
	Parameter: 'parameter',
	Result: 'result',
	Self: 'self',
	Type: 'type',
	Variable: 'variable',
} as const

export type DeclarationKind = (typeof DeclarationKind)[keyof typeof DeclarationKind]

export interface Member {
	readonly containerType: NominalType
	readonly access: Access
	readonly identifier: Identifier
	readonly declarationKind: typeof DeclarationKind.Field | typeof DeclarationKind.Function
	readonly variableKind: VariableKind | null
	readonly typeAnnotation: TypeAnnotation
	readonly declaration: FieldDeclaration | FunctionDeclaration | null
}

interface NominalTypeBase {
	readonly identifier: string
	readonly compositeKind: CompositeKind
	readonly location: string
	readonly nestedTypes: Map<string, NominalType>
	members: Map<string, Member>
	initializerParameterTypeAnnotations: readonly TypeAnnotation[]
	/** Enclosing declaration's type, for qualified names and lookup */
	containerType: NominalType | null
}

export interface InterfaceType extends NominalTypeBase {
	readonly kind: 'interface'
}

export interface CompositeType extends NominalTypeBase {
	readonly kind: 'composite'
	conformances: readonly InterfaceType[]
	enumRawType: Type | null
	enumCases: readonly string[]
}

export type NominalType = InterfaceType | CompositeType

export type Type =
	| PrimitiveType
	| OptionalType
	| VariableSizedType
	| ConstantSizedType
	| DictionaryType
	| ReferenceType
	| FunctionType
	| NominalType
	| InvalidType

// =============================================================================
// CONSTRUCTORS
// =============================================================================

export const InvalidType: InvalidType = { kind: 'invalid' }

export function primitive(name: PrimitiveName): PrimitiveType {
	return { kind: 'primitive', name }
}

export const VoidType = primitive(PrimitiveName.Void)

export function createInterfaceType(
	identifier: string,
	compositeKind: CompositeKind,
	location: string
): InterfaceType {
	return {
		compositeKind,
		containerType: null,
		identifier,
		initializerParameterTypeAnnotations: [],
		kind: 'interface',
		location,
		members: new Map(),
		nestedTypes: new Map(),
	}
}

export function createCompositeType(
	identifier: string,
	compositeKind: CompositeKind,
	location: string
): CompositeType {
	return {
		compositeKind,
		conformances: [],
		containerType: null,
		enumCases: [],
		enumRawType: null,
		identifier,
		initializerParameterTypeAnnotations: [],
		kind: 'composite',
		location,
		members: new Map(),
		nestedTypes: new Map(),
	}
}

// =============================================================================
// QUERIES
// =============================================================================

export function isNominalType(type: Type): type is NominalType {
	return type.kind === 'interface' || type.kind === 'composite'
}

export function isIntegerType(type: Type): boolean {
	return type.kind === 'primitive' && INTEGER_NAMES.has(type.name)
}

export function isOptionalType(type: Type): type is OptionalType {
	return type.kind === 'optional'
}

/**
 * Whether values of this type are linear.
 */
export function isResourceType(type: Type): boolean {
	switch (type.kind) {
		case 'primitive':
			return type.name === PrimitiveName.AnyResource
		case 'optional':
		case 'variable-sized':
		case 'constant-sized':
			return isResourceType(type.type)
		case 'dictionary':
			return isResourceType(type.valueType)
		case 'interface':
		case 'composite':
			return type.compositeKind === CompositeKind.Resource
		case 'reference':
		case 'function':
		case 'invalid':
			return false
		default:
			return assertNever(type, 'type')
	}
}

export function qualifiedIdentifier(type: NominalType): string {
	const parts = [type.identifier]
	for (let container = type.containerType; container !== null; container = container.containerType) {
		parts.unshift(container.identifier)
	}
	return parts.join('.')
}

/**
 * Display name of a nominal type's declaration kind, e.g. `resource interface`.
 */
export function nominalKindName(type: NominalType): string {
	return declarationKindName(type.compositeKind, type.kind === 'interface')
}

export function declarationKindName(compositeKind: CompositeKind, isInterface: boolean): string {
	return isInterface ? `${compositeKind} interface` : compositeKind
}

export function typeToString(type: Type): string {
	switch (type.kind) {
		case 'primitive':
			return type.name
		case 'optional':
			return `${typeToString(type.type)}?`
		case 'variable-sized':
			return `[${typeToString(type.type)}]`
		case 'constant-sized':
			return `[${typeToString(type.type)}; ${type.size}]`
		case 'dictionary':
			return `{${typeToString(type.keyType)}: ${typeToString(type.valueType)}}`
		case 'reference':
			return `${type.authorized ? 'auth ' : ''}&${typeToString(type.type)}`
		case 'function': {
			const parameters = type.parameterTypeAnnotations.map(annotationToString).join(', ')
			return `((${parameters}): ${annotationToString(type.returnTypeAnnotation)})`
		}
		case 'interface':
		case 'composite':
			return qualifiedIdentifier(type)
		case 'invalid':
			return '<<invalid>>'
		default:
			return assertNever(type, 'type')
	}
}

export function annotationToString(annotation: TypeAnnotation): string {
	return `${annotation.isResource ? '@' : ''}${typeToString(annotation.type)}`
}
