/**
 * Deep copy built from the preorder stream.
 *
 * Each container opens a frame expecting a known number of children;
 * when the last child arrives the container is rebuilt and handed to the
 * frame below. Leaves are immutable and shared.
 */

import { assertNever, unreachable } from '../core/errors.ts'
import type { Interpreter } from './interpreter.ts'
import {
	arrayValue,
	compositeValue,
	type DictionaryEntry,
	type DictionaryValue,
	someValue,
	type Value,
} from './values.ts'
import { type ContainerValue, VisitDecision } from './visitor.ts'

interface Frame {
	readonly container: ContainerValue
	readonly expected: number
	readonly children: Value[]
}

function childAt(frame: Frame, index: number): Value {
	return frame.children[index] ?? unreachable(`missing child ${index} of ${frame.container.kind}`)
}

function rebuildDictionary(frame: Frame, original: DictionaryValue): DictionaryValue {
	const entries = new Map<string, DictionaryEntry>()
	let index = 0
	for (const hash of original.entries.keys()) {
		entries.set(hash, { key: childAt(frame, index), value: childAt(frame, index + 1) })
		index += 2
	}
	return { entries, kind: 'Dictionary' }
}

function rebuild(frame: Frame): Value {
	const { container } = frame
	switch (container.kind) {
		case 'Array':
			return arrayValue(frame.children)
		case 'Dictionary':
			return rebuildDictionary(frame, container)
		case 'Composite':
			return compositeValue({
				compositeKind: container.compositeKind,
				fields: [...container.fields.keys()].map((name, i): [string, Value] => [name, childAt(frame, i)]),
				location: container.location,
				owner: container.owner,
				qualifiedIdentifier: container.qualifiedIdentifier,
			})
		case 'Some':
			return someValue(childAt(frame, 0))
		default:
			return assertNever(container, 'container')
	}
}

function childCount(container: ContainerValue): number {
	switch (container.kind) {
		case 'Array':
			return container.elements.length
		case 'Dictionary':
			return container.entries.size * 2
		case 'Composite':
			return container.fields.size
		case 'Some':
			return 1
		default:
			return assertNever(container, 'container')
	}
}

export function copyValue(interpreter: Interpreter, value: Value): Value {
	const stack: Frame[] = []
	const roots: Value[] = []

	const complete = (copied: Value): void => {
		let current = copied
		for (;;) {
			const top = stack.at(-1)
			if (top === undefined) {
				roots.push(current)
				return
			}
			top.children.push(current)
			if (top.children.length < top.expected) return
			stack.pop()
			current = rebuild(top)
		}
	}

	const open = (container: ContainerValue): VisitDecision => {
		const frame: Frame = { children: [], container, expected: childCount(container) }
		if (frame.expected === 0) complete(rebuild(frame))
		else stack.push(frame)
		return VisitDecision.Continue
	}

	interpreter.walk(value, {
		Array: (_, array) => open(array),
		Composite: (_, composite) => open(composite),
		Dictionary: (_, dictionary) => open(dictionary),
		fallback: (_, leaf) => complete(leaf),
		Some: (_, some) => open(some),
	})

	return roots[0] ?? unreachable('copy produced no value')
}
