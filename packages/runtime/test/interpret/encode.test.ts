import assert from 'node:assert'
import { describe, it } from 'node:test'
import fc from 'fast-check'
import { PrimitiveName, primitive } from '../../src/check/types.ts'
import { copyValue } from '../../src/interpret/copy.ts'
import { ByteWriter, EncodeError, encodeValue } from '../../src/interpret/encode.ts'
import { Interpreter } from '../../src/interpret/interpreter.ts'
import {
	addressValue,
	arrayValue,
	boolValue,
	type CapabilityValue,
	compositeValue,
	dictionaryValue,
	NilValue,
	NumberKind,
	numberValue,
	PathDomain,
	pathValue,
	someValue,
	stringValue,
	type Value,
	VoidValue,
} from '../../src/interpret/values.ts'
import { CompositeKind } from '../../src/parse/ast.ts'
import { valueTree } from './arbitraries.ts'
import { SAMPLE_VALUES, UNSTORABLE_KINDS } from './samples.ts'

const interpreter = new Interpreter()

function bytes(value: Value): number[] {
	return [...encodeValue(interpreter, value)]
}

describe('interpret/encode', () => {
	describe('leaves', () => {
		it('should encode simple values', () => {
			assert.deepStrictEqual(bytes(boolValue(true)), [0x01, 1])
			assert.deepStrictEqual(bytes(VoidValue), [0x00])
			assert.deepStrictEqual(bytes(NilValue), [0x03])
			assert.deepStrictEqual(bytes(stringValue('hi')), [0x02, 2, 0x68, 0x69])
		})

		it('should encode strings by their UTF-8 length', () => {
			assert.deepStrictEqual(bytes(stringValue('é')), [0x02, 2, 0xc3, 0xa9])
		})

		it('should encode unsigned numbers as ULEB128', () => {
			assert.deepStrictEqual(bytes(numberValue(NumberKind.UInt64, 300n)), [0x2c, 0xac, 0x02])
			assert.deepStrictEqual(bytes(numberValue(NumberKind.UInt8, 0n)), [0x29, 0x00])
		})

		it('should encode signed numbers as SLEB128', () => {
			assert.deepStrictEqual(bytes(numberValue(NumberKind.Int8, -1n)), [0x21, 0x7f])
			assert.deepStrictEqual(bytes(numberValue(NumberKind.Int, 64n)), [0x20, 0xc0, 0x00])
			assert.deepStrictEqual(bytes(numberValue(NumberKind.Int, -128n)), [0x20, 0x80, 0x7f])
		})

		it('should encode addresses as eight big-endian bytes', () => {
			assert.deepStrictEqual(bytes(addressValue(1n)), [0x04, 0, 0, 0, 0, 0, 0, 0, 1])
			assert.deepStrictEqual(bytes(addressValue(0x0102n)), [0x04, 0, 0, 0, 0, 0, 0, 1, 2])
		})

		it('should encode paths with their domain', () => {
			assert.deepStrictEqual(bytes(pathValue(PathDomain.Storage, 'v')), [0x05, 1, 1, 0x76])
			assert.deepStrictEqual(bytes(pathValue(PathDomain.Public, 'v')), [0x05, 3, 1, 0x76])
		})

		it('should encode types by name', () => {
			const value: Value = { kind: 'Type', type: primitive(PrimitiveName.Int) }
			assert.deepStrictEqual(bytes(value), [0x08, 3, 0x49, 0x6e, 0x74])
		})

		it('should encode capabilities with an optional borrow type', () => {
			const untyped: CapabilityValue = {
				address: 2n,
				borrowType: null,
				kind: 'Capability',
				path: pathValue(PathDomain.Public, 'p'),
			}
			assert.deepStrictEqual(bytes(untyped), [0x06, 0, 0, 0, 0, 0, 0, 0, 2, 3, 1, 0x70, 0])

			const typed: Value = { ...untyped, borrowType: primitive(PrimitiveName.Int) }
			assert.deepStrictEqual(
				bytes(typed),
				[0x06, 0, 0, 0, 0, 0, 0, 0, 2, 3, 1, 0x70, 1, 3, 0x49, 0x6e, 0x74]
			)
		})

		it('should encode links', () => {
			const link: Value = {
				borrowType: primitive(PrimitiveName.Bool),
				kind: 'Link',
				targetPath: pathValue(PathDomain.Private, 'x'),
			}
			assert.deepStrictEqual(bytes(link), [0x07, 2, 1, 0x78, 4, 0x42, 0x6f, 0x6f, 0x6c])
		})
	})

	describe('containers', () => {
		it('should write a header with the element count', () => {
			assert.deepStrictEqual(bytes(arrayValue([boolValue(false), NilValue])), [0x10, 2, 0x01, 0, 0x03])
			assert.deepStrictEqual(bytes(someValue(boolValue(true))), [0x13, 0x01, 1])
		})

		it('should write dictionary keys before values', () => {
			const dictionary = dictionaryValue([[stringValue('a'), numberValue(NumberKind.UInt8, 1n)]])
			assert.deepStrictEqual(bytes(dictionary), [0x11, 1, 0x02, 1, 0x61, 0x29, 1])
		})

		it('should write composite identity and field names before the fields', () => {
			const composite = compositeValue({
				compositeKind: CompositeKind.Struct,
				fields: [['x', boolValue(true)]],
				location: 'L',
				qualifiedIdentifier: 'S',
			})
			assert.deepStrictEqual(bytes(composite), [
				0x12,
				1,
				0x4c,
				1,
				0x53,
				6,
				0x73,
				0x74,
				0x72,
				0x75,
				0x63,
				0x74,
				1,
				1,
				0x78,
				0x01,
				1,
			])
		})

		it('should give equal trees identical bytes', () => {
			fc.assert(
				fc.property(valueTree(4), (value) => {
					assert.deepStrictEqual(bytes(copyValue(interpreter, value)), bytes(value))
				})
			)
		})
	})

	describe('unstorable values', () => {
		const reference: Value = { authorized: false, kind: 'EphemeralReference', value: boolValue(true) }

		it('should reject references', () => {
			assert.throws(
				() => bytes(reference),
				(error: unknown) =>
					error instanceof EncodeError &&
					error.valueKind === 'EphemeralReference' &&
					error.message === 'EphemeralReference values cannot be stored'
			)
		})

		it('should reject references nested in containers', () => {
			assert.throws(() => bytes(arrayValue([boolValue(true), reference])), EncodeError)
		})

		it('should reject every reference, function and account handle', () => {
			const unstorable = SAMPLE_VALUES.filter((value) => UNSTORABLE_KINDS.has(value.kind))
			assert.strictEqual(unstorable.length, UNSTORABLE_KINDS.size)
			for (const value of unstorable) {
				assert.throws(
					() => bytes(value),
					(error: unknown) => error instanceof EncodeError && error.valueKind === value.kind,
					value.kind
				)
			}
		})

		it('should encode every other kind', () => {
			for (const value of SAMPLE_VALUES.filter((v) => !UNSTORABLE_KINDS.has(v.kind))) {
				assert.doesNotThrow(() => bytes(value), value.kind)
			}
		})
	})

	describe('ByteWriter', () => {
		it('should write counts as ULEB128', () => {
			const cases: Array<[number, number[]]> = [
				[0, [0x00]],
				[127, [0x7f]],
				[128, [0x80, 0x01]],
			]
			for (const [count, expected] of cases) {
				const writer = new ByteWriter()
				writer.count(count)
				assert.deepStrictEqual([...writer.toBytes()], expected)
			}
		})

		it('should write zero as a single byte', () => {
			const writer = new ByteWriter()
			writer.unsigned(0n)
			writer.signed(0n)
			assert.deepStrictEqual([...writer.toBytes()], [0x00, 0x00])
		})
	})
})
