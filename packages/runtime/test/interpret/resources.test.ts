import assert from 'node:assert'
import { describe, it } from 'node:test'
import { Interpreter } from '../../src/interpret/interpreter.ts'
import { collectStorageReferences, invalidateResources, setOwner } from '../../src/interpret/resources.ts'
import {
	arrayValue,
	boolValue,
	type CompositeValue,
	compositeValue,
	dictionaryValue,
	someValue,
	type StorageReferenceValue,
	stringValue,
	type Value,
} from '../../src/interpret/values.ts'
import { CompositeKind } from '../../src/parse/ast.ts'

const interpreter = new Interpreter()

function resource(name: string, fields: Array<[string, Value]> = []): CompositeValue {
	return compositeValue({
		compositeKind: CompositeKind.Resource,
		fields,
		location: 'test',
		qualifiedIdentifier: name,
	})
}

function struct(name: string, fields: Array<[string, Value]> = []): CompositeValue {
	return compositeValue({
		compositeKind: CompositeKind.Struct,
		fields,
		location: 'test',
		qualifiedIdentifier: name,
	})
}

function storageReference(key: string): StorageReferenceValue {
	return { authorized: false, kind: 'StorageReference', targetAddress: 1n, targetKey: key }
}

describe('interpret/resources', () => {
	describe('invalidateResources', () => {
		it('should mark resources outermost first and leave structs alone', () => {
			const inner = resource('Inner')
			const label = struct('Label')
			const outer = resource('Outer', [
				['items', arrayValue([inner])],
				['label', label],
			])

			const marked = invalidateResources(interpreter, outer)
			assert.deepStrictEqual(
				marked.map((r) => r.qualifiedIdentifier),
				['Outer', 'Inner']
			)
			assert.strictEqual(outer.invalidated, true)
			assert.strictEqual(inner.invalidated, true)
			assert.strictEqual(label.invalidated, false)
		})

		it('should skip everything inside an already invalidated resource', () => {
			const inner = resource('Inner')
			const outer = resource('Outer', [['inner', inner]])
			outer.invalidated = true

			assert.deepStrictEqual(invalidateResources(interpreter, someValue(outer)), [])
			assert.strictEqual(inner.invalidated, false)
		})

		it('should mark nothing the second time', () => {
			const value = dictionaryValue([[stringValue('a'), resource('A')]])
			assert.strictEqual(invalidateResources(interpreter, value).length, 1)
			assert.deepStrictEqual(invalidateResources(interpreter, value), [])
		})
	})

	describe('setOwner', () => {
		it('should move every nested composite', () => {
			const inner = resource('Inner')
			const label = struct('Label')
			const outer = resource('Outer', [
				['inner', someValue(inner)],
				['labels', dictionaryValue([[stringValue('l'), label]])],
			])

			setOwner(interpreter, outer, 5n)
			assert.deepStrictEqual([outer.owner, inner.owner, label.owner], [5n, 5n, 5n])

			setOwner(interpreter, outer, null)
			assert.deepStrictEqual([outer.owner, inner.owner, label.owner], [null, null, null])
		})
	})

	describe('collectStorageReferences', () => {
		it('should collect references in traversal order', () => {
			const first = storageReference('first')
			const second = storageReference('second')
			const value = struct('Holder', [
				['a', first],
				['b', arrayValue([boolValue(true), second])],
			])
			const references = collectStorageReferences(interpreter, value)
			assert.strictEqual(references.length, 2)
			assert.strictEqual(references[0], first)
			assert.strictEqual(references[1], second)
		})

		it('should not look through an ephemeral reference', () => {
			const hidden = storageReference('hidden')
			const value: Value = {
				authorized: false,
				kind: 'EphemeralReference',
				value: arrayValue([hidden]),
			}
			assert.deepStrictEqual(collectStorageReferences(interpreter, value), [])
		})
	})
})
