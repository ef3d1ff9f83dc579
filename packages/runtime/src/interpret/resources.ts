/**
 * Ownership traversals over resource values.
 */

import type { Interpreter } from './interpreter.ts'
import { type CompositeValue, isResourceValue, type StorageReferenceValue, type Value } from './values.ts'
import { VisitDecision } from './visitor.ts'

/**
 * Mark every resource in `value` as invalidated, outermost first.
 * A resource that is already invalidated is skipped with everything in it.
 * Returns the resources this call marked.
 */
export function invalidateResources(interpreter: Interpreter, value: Value): CompositeValue[] {
	const marked: CompositeValue[] = []

	interpreter.walk(value, {
		Composite: (_, composite) => {
			if (!isResourceValue(composite)) return VisitDecision.Continue
			if (composite.invalidated) return VisitDecision.Prune
			composite.invalidated = true
			marked.push(composite)
			return VisitDecision.Continue
		},
	})

	return marked
}

/**
 * Move every composite in `value` to `owner`; null means not stored.
 */
export function setOwner(interpreter: Interpreter, value: Value, owner: bigint | null): void {
	interpreter.walk(value, {
		Composite: (_, composite) => {
			composite.owner = owner
			return VisitDecision.Continue
		},
	})
}

export function collectStorageReferences(
	interpreter: Interpreter,
	value: Value
): StorageReferenceValue[] {
	const references: StorageReferenceValue[] = []
	interpreter.walk(value, {
		StorageReference: (_, reference) => {
			references.push(reference)
		},
	})
	return references
}
