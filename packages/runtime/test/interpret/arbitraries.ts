import fc from 'fast-check'
import { PrimitiveName, primitive, type Type } from '../../src/check/types.ts'
import {
	addressValue,
	arrayValue,
	boolValue,
	compositeValue,
	dictionaryValue,
	isSignedNumberKind,
	NilValue,
	NUMBER_KINDS,
	numberValue,
	PathDomain,
	type PathValue,
	pathValue,
	someValue,
	stringValue,
	type Value,
	VoidValue,
} from '../../src/interpret/values.ts'
import { CompositeKind } from '../../src/parse/ast.ts'

const number: fc.Arbitrary<Value> = fc
	.constantFrom(...NUMBER_KINDS)
	.chain((kind) =>
		fc.bigInt({ max: 100n, min: isSignedNumberKind(kind) ? -100n : 0n }).map((n): Value => numberValue(kind, n))
	)

const path: fc.Arbitrary<PathValue> = fc
	.tuple(fc.constantFrom(...Object.values(PathDomain)), fc.string({ maxLength: 3 }))
	.map(([domain, identifier]) => pathValue(domain, identifier))

const namedType: fc.Arbitrary<Type> = fc
	.constantFrom(PrimitiveName.Bool, PrimitiveName.Int, PrimitiveName.String)
	.map((name) => primitive(name))

/** Every storable leaf kind */
const leaf: fc.Arbitrary<Value> = fc.oneof(
	fc.constant<Value>(VoidValue),
	fc.constant<Value>(NilValue),
	fc.boolean().map((b): Value => boolValue(b)),
	fc.string({ maxLength: 4 }).map((s): Value => stringValue(s)),
	number,
	fc.bigInt({ max: 0xffffn, min: 0n }).map((n): Value => addressValue(n)),
	path,
	namedType.map((t): Value => ({ kind: 'Type', type: t })),
	fc
		.tuple(fc.bigInt({ max: 0xffn, min: 0n }), path, fc.option(namedType))
		.map(([address, capabilityPath, borrowType]): Value => ({
			address,
			borrowType,
			kind: 'Capability',
			path: capabilityPath,
		})),
	fc.tuple(path, namedType).map(([targetPath, borrowType]): Value => ({ borrowType, kind: 'Link', targetPath }))
)

/** Value trees built only from storable kinds */
export const valueTree: fc.Memo<Value> = fc.memo((n) => {
	if (n <= 1) return leaf
	const child = valueTree(n - 1)
	return fc.oneof(
		leaf,
		fc.array(child, { maxLength: 3 }).map((elements): Value => arrayValue(elements)),
		child.map((value): Value => someValue(value)),
		fc.array(child, { maxLength: 3 }).map(
			(values): Value =>
				compositeValue({
					compositeKind: CompositeKind.Struct,
					fields: values.map((value, i): [string, Value] => [`f${i}`, value]),
					location: 'test',
					qualifiedIdentifier: 'S',
				})
		),
		fc.array(fc.tuple(fc.string({ maxLength: 2 }), child), { maxLength: 3 }).map(
			(entries): Value => dictionaryValue(entries.map(([key, value]): [Value, Value] => [stringValue(key), value]))
		)
	)
})

/**
 * Every value in `value`, containers before their children.
 */
export function preorder(value: Value): Value[] {
	switch (value.kind) {
		case 'Array':
			return [value, ...value.elements.flatMap(preorder)]
		case 'Dictionary':
			return [
				value,
				...[...value.entries.values()].flatMap((entry) => [...preorder(entry.key), ...preorder(entry.value)]),
			]
		case 'Composite':
			return [value, ...[...value.fields.values()].flatMap(preorder)]
		case 'Some':
			return [value, ...preorder(value.value)]
		default:
			return [value]
	}
}
