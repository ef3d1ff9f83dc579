/**
 * Builtin types and values available in every program.
 */

import { Access, CompositeKind, type Position } from '../parse/ast.ts'
import type { CheckerState } from './state.ts'
import {
	createCompositeType,
	type CompositeType,
	DeclarationKind,
	type FunctionType,
	InvalidType,
	type Member,
	PrimitiveName,
	type PrimitiveType,
	primitive,
	type TypeAnnotation,
	VoidType,
} from './types.ts'

const PRIMITIVES: ReadonlyMap<string, PrimitiveType> = new Map(
	Object.values(PrimitiveName).map((name): [string, PrimitiveType] => [name, primitive(name)])
)

export function lookupPrimitive(name: string): PrimitiveType | undefined {
	return PRIMITIVES.get(name)
}

// =============================================================================
// ENUMS
// =============================================================================

export interface BuiltinEnumCase {
	readonly name: string
	readonly rawValue: number
	readonly docString: string
}

/**
 * A fixed enumeration supplied by the host, e.g. a family of algorithms.
 */
export interface BuiltinEnum {
	readonly identifier: string
	readonly rawType: PrimitiveName
	readonly cases: readonly BuiltinEnumCase[]
}

export const SignatureAlgorithm: BuiltinEnum = {
	cases: [
		{
			docString:
				'Elliptic Curve Digital Signature Algorithm (ECDSA) on the NIST P-256 curve',
			name: 'ECDSA_P256',
			rawValue: 0,
		},
		{
			docString: 'Elliptic Curve Digital Signature Algorithm (ECDSA) on the secp256k1 curve',
			name: 'ECDSA_Secp256k1',
			rawValue: 1,
		},
		{
			docString: 'BLS signature algorithm on the BLS12-381 curve',
			name: 'BLSBLS12381',
			rawValue: 2,
		},
	],
	identifier: 'SignatureAlgorithm',
	rawType: PrimitiveName.UInt8,
}

export const HashAlgorithm: BuiltinEnum = {
	cases: [
		{ docString: 'Secure Hashing Algorithm 2 (SHA-2) with a 256-bit digest', name: 'SHA2_256', rawValue: 0 },
		{ docString: 'Secure Hashing Algorithm 2 (SHA-2) with a 384-bit digest', name: 'SHA2_384', rawValue: 1 },
		{ docString: 'Secure Hashing Algorithm 3 (SHA-3) with a 256-bit digest', name: 'SHA3_256', rawValue: 2 },
		{ docString: 'Secure Hashing Algorithm 3 (SHA-3) with a 384-bit digest', name: 'SHA3_384', rawValue: 3 },
		{ docString: 'KECCAK Message Authentication Code with a 128-bit digest', name: 'KMAC128', rawValue: 4 },
	],
	identifier: 'HashAlgorithm',
	rawType: PrimitiveName.UInt8,
}

export const DEFAULT_BUILTIN_ENUMS: readonly BuiltinEnum[] = [SignatureAlgorithm, HashAlgorithm]

export const ENUM_RAW_VALUE_FIELD = 'rawValue'

/** Position given to members that have no source declaration */
export const BUILTIN_POSITION: Position = { column: 0, line: 0, offset: 0 }

/**
 * Build the `rawValue` member every enum exposes.
 * Enum cases are instances of the enum, not members of it.
 */
export function enumRawValueMember(enumType: CompositeType, rawType: TypeAnnotation): Member {
	return {
		access: Access.Public,
		containerType: enumType,
		declaration: null,
		declarationKind: DeclarationKind.Field,
		identifier: { name: ENUM_RAW_VALUE_FIELD, position: BUILTIN_POSITION },
		typeAnnotation: rawType,
		variableKind: null,
	}
}

/**
 * Register a host-supplied enum in the current type layer.
 * The cases are taken as given.
 */
export function declareBuiltinEnum(state: CheckerState, builtin: BuiltinEnum): CompositeType {
	const enumType = createCompositeType(builtin.identifier, CompositeKind.Enum, state.location)
	const rawType = lookupPrimitive(builtin.rawType) ?? InvalidType
	enumType.enumRawType = rawType
	enumType.enumCases = builtin.cases.map((c) => c.name)
	enumType.members = new Map([
		[ENUM_RAW_VALUE_FIELD, enumRawValueMember(enumType, { isResource: false, type: rawType })],
	])

	state.typeActivations.declare({
		access: Access.Public,
		declarationKind: CompositeKind.Enum,
		identifier: builtin.identifier,
		position: null,
		type: enumType,
	})
	return enumType
}

// =============================================================================
// VALUES
// =============================================================================

function hostFunction(parameters: readonly PrimitiveType[], returnType: PrimitiveType): FunctionType {
	return {
		kind: 'function',
		parameterTypeAnnotations: parameters.map((type) => ({ isResource: false, type })),
		returnTypeAnnotation: { isResource: false, type: returnType },
	}
}

const BUILTIN_FUNCTIONS: ReadonlyArray<readonly [string, FunctionType]> = [
	['assert', hostFunction([primitive(PrimitiveName.Bool), primitive(PrimitiveName.String)], VoidType)],
	['getAccount', hostFunction([primitive(PrimitiveName.Address)], primitive(PrimitiveName.AnyStruct))],
	['log', hostFunction([primitive(PrimitiveName.AnyStruct)], VoidType)],
	['panic', hostFunction([primitive(PrimitiveName.String)], primitive(PrimitiveName.Never))],
]

export function declareBuiltinValues(state: CheckerState): void {
	for (const [identifier, type] of BUILTIN_FUNCTIONS) {
		state.valueActivations.declare({
			declarationKind: DeclarationKind.Function,
			identifier,
			isConstant: true,
			position: null,
			type,
		})
	}
}
