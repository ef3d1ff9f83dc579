/**
 * Runtime values.
 *
 * A closed union discriminated by `kind`. Exactly four variants are
 * containers (Array, Dictionary, Composite, Some); everything else is a leaf.
 */

import type { FunctionType, Type } from '../check/types.ts'
import { CompositeKind, type FunctionDeclaration } from '../parse/ast.ts'

// =============================================================================
// ERRORS
// =============================================================================

export class OverflowError extends Error {
	override readonly name = 'OverflowError'

	constructor(
		readonly numberKind: NumberKind,
		readonly value: bigint
	) {
		super(`${value} is out of range for ${numberKind}`)
	}
}

export class UnhashableKeyError extends Error {
	override readonly name = 'UnhashableKeyError'

	constructor(readonly keyKind: Value['kind']) {
		super(`${keyKind} values cannot be dictionary keys`)
	}
}

// =============================================================================
// NUMBERS
// =============================================================================

export const NumberKind = {
	Fix64: 'Fix64',
	Int: 'Int',
	Int8: 'Int8',
	Int16: 'Int16',
	Int32: 'Int32',
	Int64: 'Int64',
	Int128: 'Int128',
	Int256: 'Int256',
	UFix64: 'UFix64',
	UInt: 'UInt',
	UInt8: 'UInt8',
	UInt16: 'UInt16',
	UInt32: 'UInt32',
	UInt64: 'UInt64',
	UInt128: 'UInt128',
	UInt256: 'UInt256',
	Word8: 'Word8',
	Word16: 'Word16',
	Word32: 'Word32',
	Word64: 'Word64',
} as const

export type NumberKind = (typeof NumberKind)[keyof typeof NumberKind]

export const NUMBER_KINDS: readonly NumberKind[] = Object.values(NumberKind)

/** Fixed-point values are stored scaled by this factor */
export const FIX64_SCALE = 100_000_000n

interface NumberRange {
	readonly min: bigint | null
	readonly max: bigint | null
	readonly signed: boolean
}

function signedRange(bits: bigint): NumberRange {
	return { max: (1n << (bits - 1n)) - 1n, min: -(1n << (bits - 1n)), signed: true }
}

function unsignedRange(bits: bigint): NumberRange {
	return { max: (1n << bits) - 1n, min: 0n, signed: false }
}

const NUMBER_RANGES: Readonly<Record<NumberKind, NumberRange>> = {
	[NumberKind.Fix64]: signedRange(64n),
	[NumberKind.Int]: { max: null, min: null, signed: true },
	[NumberKind.Int8]: signedRange(8n),
	[NumberKind.Int16]: signedRange(16n),
	[NumberKind.Int32]: signedRange(32n),
	[NumberKind.Int64]: signedRange(64n),
	[NumberKind.Int128]: signedRange(128n),
	[NumberKind.Int256]: signedRange(256n),
	[NumberKind.UFix64]: unsignedRange(64n),
	[NumberKind.UInt]: { max: null, min: 0n, signed: false },
	[NumberKind.UInt8]: unsignedRange(8n),
	[NumberKind.UInt16]: unsignedRange(16n),
	[NumberKind.UInt32]: unsignedRange(32n),
	[NumberKind.UInt64]: unsignedRange(64n),
	[NumberKind.UInt128]: unsignedRange(128n),
	[NumberKind.UInt256]: unsignedRange(256n),
	[NumberKind.Word8]: unsignedRange(8n),
	[NumberKind.Word16]: unsignedRange(16n),
	[NumberKind.Word32]: unsignedRange(32n),
	[NumberKind.Word64]: unsignedRange(64n),
}

export function isSignedNumberKind(kind: NumberKind): boolean {
	return NUMBER_RANGES[kind].signed
}

export function isNumberKind(kind: string): kind is NumberKind {
	return NUMBER_KINDS.some((k) => k === kind)
}

/**
 * One number value type per kind, so that narrowing on `kind` keeps the
 * exact kind.
 */
export type NumberValueOf<K extends NumberKind> = K extends NumberKind
	? { readonly kind: K; readonly value: bigint }
	: never

export type NumberValue = NumberValueOf<NumberKind>

// =============================================================================
// VARIANTS
// =============================================================================

export interface VoidValue {
	readonly kind: 'Void'
}

export interface BoolValue {
	readonly kind: 'Bool'
	readonly value: boolean
}

export interface StringValue {
	readonly kind: 'String'
	readonly value: string
}

export interface ArrayValue {
	readonly kind: 'Array'
	readonly elements: readonly Value[]
}

export interface DictionaryEntry {
	readonly key: Value
	readonly value: Value
}

export interface DictionaryValue {
	readonly kind: 'Dictionary'
	/** Keyed by `hashKey(key)`, in insertion order */
	readonly entries: ReadonlyMap<string, DictionaryEntry>
}

export interface CompositeValue {
	readonly kind: 'Composite'
	readonly location: string
	readonly qualifiedIdentifier: string
	readonly compositeKind: CompositeKind
	/** In declaration order */
	readonly fields: ReadonlyMap<string, Value>
	/** Address of the account holding the value, if stored */
	owner: bigint | null
	/** Set once a resource has been moved or destroyed */
	invalidated: boolean
}

export interface SomeValue {
	readonly kind: 'Some'
	readonly value: Value
}

export interface NilValue {
	readonly kind: 'Nil'
}

export interface StorageReferenceValue {
	readonly kind: 'StorageReference'
	readonly authorized: boolean
	readonly targetAddress: bigint
	readonly targetKey: string
}

export interface EphemeralReferenceValue {
	readonly kind: 'EphemeralReference'
	readonly authorized: boolean
	readonly value: Value
}

export interface AddressValue {
	readonly kind: 'Address'
	readonly value: bigint
}

export const PathDomain = {
	Private: 'private',
	Public: 'public',
	Storage: 'storage',
} as const

export type PathDomain = (typeof PathDomain)[keyof typeof PathDomain]

export interface PathValue {
	readonly kind: 'Path'
	readonly domain: PathDomain
	readonly identifier: string
}

export interface CapabilityValue {
	readonly kind: 'Capability'
	readonly address: bigint
	readonly path: PathValue
	/** null for an untyped capability */
	readonly borrowType: Type | null
}

export interface LinkValue {
	readonly kind: 'Link'
	readonly targetPath: PathValue
	readonly borrowType: Type
}

export interface InterpretedFunctionValue {
	readonly kind: 'InterpretedFunction'
	readonly declaration: FunctionDeclaration
	readonly type: FunctionType
	/** Values captured where the function was defined */
	readonly activation: ReadonlyMap<string, Value>
}

export interface HostFunctionValue {
	readonly kind: 'HostFunction'
	readonly type: FunctionType
	readonly invoke: (args: readonly Value[]) => Value
}

export interface BoundFunctionValue {
	readonly kind: 'BoundFunction'
	readonly receiver: CompositeValue
	readonly function: InterpretedFunctionValue | HostFunctionValue
}

export interface AuthAccountValue {
	readonly kind: 'AuthAccount'
	readonly address: bigint
}

export interface PublicAccountValue {
	readonly kind: 'PublicAccount'
	readonly address: bigint
}

export interface AuthAccountContractsValue {
	readonly kind: 'AuthAccountContracts'
	readonly address: bigint
}

export interface DeployedContractValue {
	readonly kind: 'DeployedContract'
	readonly address: bigint
	readonly name: string
	readonly code: Uint8Array
}

export interface TypeValue {
	readonly kind: 'Type'
	readonly type: Type
}

export type Value =
	| VoidValue
	| BoolValue
	| StringValue
	| NumberValue
	| ArrayValue
	| DictionaryValue
	| CompositeValue
	| SomeValue
	| NilValue
	| StorageReferenceValue
	| EphemeralReferenceValue
	| AddressValue
	| PathValue
	| CapabilityValue
	| LinkValue
	| InterpretedFunctionValue
	| HostFunctionValue
	| BoundFunctionValue
	| AuthAccountValue
	| PublicAccountValue
	| AuthAccountContractsValue
	| DeployedContractValue
	| TypeValue

export type ValueKind = Value['kind']

export type ValueOfKind<K extends ValueKind> = Extract<Value, { readonly kind: K }>

// =============================================================================
// CONSTRUCTORS
// =============================================================================

export const VoidValue: VoidValue = { kind: 'Void' }

export const NilValue: NilValue = { kind: 'Nil' }

export function boolValue(value: boolean): BoolValue {
	return { kind: 'Bool', value }
}

export function stringValue(value: string): StringValue {
	return { kind: 'String', value }
}

/**
 * Build a number, rejecting values outside the kind's range.
 */
export function numberValue<K extends NumberKind>(kind: K, value: bigint): NumberValueOf<K>
export function numberValue(kind: NumberKind, value: bigint): NumberValue {
	const { min, max } = NUMBER_RANGES[kind]
	if ((min !== null && value < min) || (max !== null && value > max)) {
		throw new OverflowError(kind, value)
	}
	return { kind, value }
}

export function arrayValue(elements: readonly Value[]): ArrayValue {
	return { elements, kind: 'Array' }
}

/**
 * Stable identity of a key value. Only strings, booleans, numbers,
 * addresses and paths can be keys.
 */
export function hashKey(key: Value): string {
	switch (key.kind) {
		case 'String':
			return `String:${key.value}`
		case 'Bool':
			return `Bool:${key.value}`
		case 'Address':
			return `Address:${key.value}`
		case 'Path':
			return `Path:${key.domain}/${key.identifier}`
		default:
			if (isNumberValue(key)) return `${key.kind}:${key.value}`
			throw new UnhashableKeyError(key.kind)
	}
}

/**
 * Build a dictionary. A later entry with an equal key replaces the
 * earlier one's value but keeps its position.
 */
export function dictionaryValue(entries: Iterable<readonly [Value, Value]>): DictionaryValue {
	const map = new Map<string, DictionaryEntry>()
	for (const [key, value] of entries) {
		map.set(hashKey(key), { key, value })
	}
	return { entries: map, kind: 'Dictionary' }
}

export interface CompositeInit {
	readonly location: string
	readonly qualifiedIdentifier: string
	readonly compositeKind: CompositeKind
	readonly fields: Iterable<readonly [string, Value]>
	readonly owner?: bigint | null
}

export function compositeValue(init: CompositeInit): CompositeValue {
	return {
		compositeKind: init.compositeKind,
		fields: new Map(init.fields),
		invalidated: false,
		kind: 'Composite',
		location: init.location,
		owner: init.owner ?? null,
		qualifiedIdentifier: init.qualifiedIdentifier,
	}
}

export function someValue(value: Value): SomeValue {
	return { kind: 'Some', value }
}

export function addressValue(value: bigint): AddressValue {
	if (value < 0n || value >= 1n << 64n) throw new OverflowError(NumberKind.UInt64, value)
	return { kind: 'Address', value }
}

export function pathValue(domain: PathDomain, identifier: string): PathValue {
	return { domain, identifier, kind: 'Path' }
}

// =============================================================================
// QUERIES
// =============================================================================

export function isNumberValue(value: Value): value is NumberValue {
	return isNumberKind(value.kind)
}

export function isResourceValue(value: Value): value is CompositeValue {
	return value.kind === 'Composite' && value.compositeKind === CompositeKind.Resource
}
