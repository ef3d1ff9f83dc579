import { describe, it } from 'node:test'
import fc from 'fast-check'
import { Interpreter } from '../../src/interpret/interpreter.ts'
import type { Value } from '../../src/interpret/values.ts'
import { VisitDecision } from '../../src/interpret/visitor.ts'
import { preorder, valueTree } from './arbitraries.ts'

function visitAll(value: Value, decide: (value: Value) => VisitDecision): Value[] {
	const visited: Value[] = []
	const enter = (container: Value): VisitDecision => {
		visited.push(container)
		return decide(container)
	}
	new Interpreter().walk(value, {
		Array: (_, array) => enter(array),
		Composite: (_, composite) => enter(composite),
		Dictionary: (_, dictionary) => enter(dictionary),
		fallback: (_, leaf) => {
			visited.push(leaf)
		},
		Some: (_, some) => enter(some),
	})
	return visited
}

describe('interpret/visitor (property-based)', () => {
	it('should visit every value exactly once in preorder', () => {
		fc.assert(
			fc.property(valueTree(4), (value) => {
				const visited = visitAll(value, () => VisitDecision.Continue)
				const expected = preorder(value)
				return visited.length === expected.length && visited.every((v, i) => v === expected[i])
			})
		)
	})

	it('should visit only the root when every container prunes', () => {
		fc.assert(
			fc.property(valueTree(4), (value) => {
				const visited = visitAll(value, () => VisitDecision.Prune)
				return visited.length === 1 && visited[0] === value
			})
		)
	})
})
