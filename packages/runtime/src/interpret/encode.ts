/**
 * Deterministic storage encoding.
 *
 * Every value is a one-byte tag followed by its payload. Containers write a
 * header with their child count; the children follow in traversal order.
 *
 *   unsigned integers, counts   ULEB128
 *   signed integers             SLEB128
 *   strings                     ULEB128 byte length, then UTF-8
 *   addresses                   8 bytes, big-endian
 */

import { typeToString } from '../check/types.ts'
import { assertNever } from '../core/errors.ts'
import type { Interpreter } from './interpreter.ts'
import {
	isNumberValue,
	isSignedNumberKind,
	NumberKind,
	PathDomain,
	type PathValue,
	type Value,
	type ValueKind,
} from './values.ts'
import { type LeafValue, VisitDecision } from './visitor.ts'

export class EncodeError extends Error {
	override readonly name = 'EncodeError'

	constructor(readonly valueKind: ValueKind) {
		super(`${valueKind} values cannot be stored`)
	}
}

export const ValueTag = {
	Address: 0x04,
	Array: 0x10,
	Bool: 0x01,
	Capability: 0x06,
	Composite: 0x12,
	Dictionary: 0x11,
	Link: 0x07,
	Nil: 0x03,
	Path: 0x05,
	Some: 0x13,
	String: 0x02,
	Type: 0x08,
	Void: 0x00,
} as const

export const NUMBER_TAGS: Readonly<Record<NumberKind, number>> = {
	[NumberKind.Int]: 0x20,
	[NumberKind.Int8]: 0x21,
	[NumberKind.Int16]: 0x22,
	[NumberKind.Int32]: 0x23,
	[NumberKind.Int64]: 0x24,
	[NumberKind.Int128]: 0x25,
	[NumberKind.Int256]: 0x26,
	[NumberKind.UInt]: 0x28,
	[NumberKind.UInt8]: 0x29,
	[NumberKind.UInt16]: 0x2a,
	[NumberKind.UInt32]: 0x2b,
	[NumberKind.UInt64]: 0x2c,
	[NumberKind.UInt128]: 0x2d,
	[NumberKind.UInt256]: 0x2e,
	[NumberKind.Word8]: 0x30,
	[NumberKind.Word16]: 0x31,
	[NumberKind.Word32]: 0x32,
	[NumberKind.Word64]: 0x33,
	[NumberKind.Fix64]: 0x38,
	[NumberKind.UFix64]: 0x39,
}

const PATH_DOMAIN_BYTES: Readonly<Record<PathDomain, number>> = {
	[PathDomain.Storage]: 1,
	[PathDomain.Private]: 2,
	[PathDomain.Public]: 3,
}

const utf8 = new TextEncoder()

export class ByteWriter {
	private readonly bytes: number[] = []

	byte(value: number): void {
		this.bytes.push(value & 0xff)
	}

	unsigned(value: bigint): void {
		let rest = value
		do {
			const low = Number(rest & 0x7fn)
			rest >>= 7n
			this.byte(rest === 0n ? low : low | 0x80)
		} while (rest !== 0n)
	}

	signed(value: bigint): void {
		let rest = value
		for (;;) {
			const low = Number(rest & 0x7fn)
			rest >>= 7n
			const signBit = (low & 0x40) !== 0
			if ((rest === 0n && !signBit) || (rest === -1n && signBit)) {
				this.byte(low)
				return
			}
			this.byte(low | 0x80)
		}
	}

	count(value: number): void {
		this.unsigned(BigInt(value))
	}

	string(value: string): void {
		const encoded = utf8.encode(value)
		this.count(encoded.length)
		for (const b of encoded) this.byte(b)
	}

	address(value: bigint): void {
		for (let shift = 56n; shift >= 0n; shift -= 8n) {
			this.byte(Number((value >> shift) & 0xffn))
		}
	}

	toBytes(): Uint8Array {
		return Uint8Array.from(this.bytes)
	}
}

function writePath(writer: ByteWriter, path: PathValue): void {
	writer.byte(PATH_DOMAIN_BYTES[path.domain])
	writer.string(path.identifier)
}

function encodeLeaf(writer: ByteWriter, value: LeafValue): void {
	switch (value.kind) {
		case 'Void':
		case 'Nil':
			writer.byte(ValueTag[value.kind])
			return
		case 'Bool':
			writer.byte(ValueTag.Bool)
			writer.byte(value.value ? 1 : 0)
			return
		case 'String':
			writer.byte(ValueTag.String)
			writer.string(value.value)
			return
		case 'Address':
			writer.byte(ValueTag.Address)
			writer.address(value.value)
			return
		case 'Path':
			writer.byte(ValueTag.Path)
			writePath(writer, value)
			return
		case 'Capability':
			writer.byte(ValueTag.Capability)
			writer.address(value.address)
			writePath(writer, value.path)
			if (value.borrowType === null) {
				writer.byte(0)
			} else {
				writer.byte(1)
				writer.string(typeToString(value.borrowType))
			}
			return
		case 'Link':
			writer.byte(ValueTag.Link)
			writePath(writer, value.targetPath)
			writer.string(typeToString(value.borrowType))
			return
		case 'Type':
			writer.byte(ValueTag.Type)
			writer.string(typeToString(value.type))
			return
		case 'StorageReference':
		case 'EphemeralReference':
		case 'InterpretedFunction':
		case 'HostFunction':
		case 'BoundFunction':
		case 'AuthAccount':
		case 'PublicAccount':
		case 'AuthAccountContracts':
		case 'DeployedContract':
			throw new EncodeError(value.kind)
		default:
			if (isNumberValue(value)) {
				writer.byte(NUMBER_TAGS[value.kind])
				if (isSignedNumberKind(value.kind)) writer.signed(value.value)
				else writer.unsigned(value.value)
				return
			}
			assertNever(value, 'leaf value')
	}
}

/**
 * Encode a value for storage. Equal values give identical bytes.
 * Throws `EncodeError` for references, functions and account handles.
 */
export function encodeValue(interpreter: Interpreter, value: Value): Uint8Array {
	const writer = new ByteWriter()

	interpreter.walk(value, {
		Array: (_, array) => {
			writer.byte(ValueTag.Array)
			writer.count(array.elements.length)
			return VisitDecision.Continue
		},
		Composite: (_, composite) => {
			writer.byte(ValueTag.Composite)
			writer.string(composite.location)
			writer.string(composite.qualifiedIdentifier)
			writer.string(composite.compositeKind)
			writer.count(composite.fields.size)
			for (const name of composite.fields.keys()) writer.string(name)
			return VisitDecision.Continue
		},
		Dictionary: (_, dictionary) => {
			writer.byte(ValueTag.Dictionary)
			writer.count(dictionary.entries.size)
			return VisitDecision.Continue
		},
		fallback: (_, leaf) => encodeLeaf(writer, leaf),
		Some: () => {
			writer.byte(ValueTag.Some)
			return VisitDecision.Continue
		},
	})

	return writer.toBytes()
}
