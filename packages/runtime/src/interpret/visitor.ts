/**
 * Preorder value traversal.
 *
 * A visitor is a record of optional callbacks, one per value kind.
 * Container callbacks run before the container's children and decide
 * whether they are visited; leaf callbacks only observe. An unset
 * container slot continues, an unset leaf slot falls back to `fallback`.
 */

import { assertNever } from '../core/errors.ts'
import type { Interpreter } from './interpreter.ts'
import type { Value, ValueKind, ValueOfKind } from './values.ts'

export const VisitDecision = {
	Continue: 'continue',
	Prune: 'prune',
} as const

export type VisitDecision = (typeof VisitDecision)[keyof typeof VisitDecision]

export type ContainerKind = 'Array' | 'Dictionary' | 'Composite' | 'Some'

export type LeafKind = Exclude<ValueKind, ContainerKind>

export type ContainerValue = ValueOfKind<ContainerKind>

export type LeafValue = ValueOfKind<LeafKind>

export type ContainerSlots = {
	readonly [K in ContainerKind]?: (interpreter: Interpreter, value: ValueOfKind<K>) => VisitDecision
}

export type LeafSlots = {
	readonly [K in LeafKind]?: (interpreter: Interpreter, value: ValueOfKind<K>) => void
}

export type Visitor = ContainerSlots &
	LeafSlots & {
		/** Runs for a leaf whose own slot is unset */
		readonly fallback?: (interpreter: Interpreter, value: LeafValue) => void
	}

type LeafCallback<V extends LeafValue> = ((interpreter: Interpreter, value: V) => void) | undefined

function visitLeaf<V extends LeafValue>(
	interpreter: Interpreter,
	visitor: Visitor,
	slot: LeafCallback<V>,
	value: V
): void {
	if (slot !== undefined) {
		slot(interpreter, value)
		return
	}
	visitor.fallback?.(interpreter, value)
}

function entered(decision: VisitDecision | undefined): boolean {
	return decision !== VisitDecision.Prune
}

/**
 * Visit `value` and, unless pruned, everything it contains, in preorder.
 * Dictionary entries are visited key first. References and functions are
 * leaves: what they point to is never visited.
 */
export function walkValue(interpreter: Interpreter, visitor: Visitor, value: Value): void {
	switch (value.kind) {
		// Containers
		case 'Array':
			if (entered(visitor.Array?.(interpreter, value))) {
				for (const element of value.elements) walkValue(interpreter, visitor, element)
			}
			return
		case 'Dictionary':
			if (entered(visitor.Dictionary?.(interpreter, value))) {
				for (const entry of value.entries.values()) {
					walkValue(interpreter, visitor, entry.key)
					walkValue(interpreter, visitor, entry.value)
				}
			}
			return
		case 'Composite':
			if (entered(visitor.Composite?.(interpreter, value))) {
				for (const field of value.fields.values()) walkValue(interpreter, visitor, field)
			}
			return
		case 'Some':
			if (entered(visitor.Some?.(interpreter, value))) {
				walkValue(interpreter, visitor, value.value)
			}
			return

		// Simple values
		case 'Void':
			return visitLeaf(interpreter, visitor, visitor.Void, value)
		case 'Bool':
			return visitLeaf(interpreter, visitor, visitor.Bool, value)
		case 'String':
			return visitLeaf(interpreter, visitor, visitor.String, value)
		case 'Nil':
			return visitLeaf(interpreter, visitor, visitor.Nil, value)

		// Numbers
		case 'Int':
			return visitLeaf(interpreter, visitor, visitor.Int, value)
		case 'Int8':
			return visitLeaf(interpreter, visitor, visitor.Int8, value)
		case 'Int16':
			return visitLeaf(interpreter, visitor, visitor.Int16, value)
		case 'Int32':
			return visitLeaf(interpreter, visitor, visitor.Int32, value)
		case 'Int64':
			return visitLeaf(interpreter, visitor, visitor.Int64, value)
		case 'Int128':
			return visitLeaf(interpreter, visitor, visitor.Int128, value)
		case 'Int256':
			return visitLeaf(interpreter, visitor, visitor.Int256, value)
		case 'UInt':
			return visitLeaf(interpreter, visitor, visitor.UInt, value)
		case 'UInt8':
			return visitLeaf(interpreter, visitor, visitor.UInt8, value)
		case 'UInt16':
			return visitLeaf(interpreter, visitor, visitor.UInt16, value)
		case 'UInt32':
			return visitLeaf(interpreter, visitor, visitor.UInt32, value)
		case 'UInt64':
			return visitLeaf(interpreter, visitor, visitor.UInt64, value)
		case 'UInt128':
			return visitLeaf(interpreter, visitor, visitor.UInt128, value)
		case 'UInt256':
			return visitLeaf(interpreter, visitor, visitor.UInt256, value)
		case 'Word8':
			return visitLeaf(interpreter, visitor, visitor.Word8, value)
		case 'Word16':
			return visitLeaf(interpreter, visitor, visitor.Word16, value)
		case 'Word32':
			return visitLeaf(interpreter, visitor, visitor.Word32, value)
		case 'Word64':
			return visitLeaf(interpreter, visitor, visitor.Word64, value)
		case 'Fix64':
			return visitLeaf(interpreter, visitor, visitor.Fix64, value)
		case 'UFix64':
			return visitLeaf(interpreter, visitor, visitor.UFix64, value)

		// References
		case 'StorageReference':
			return visitLeaf(interpreter, visitor, visitor.StorageReference, value)
		case 'EphemeralReference':
			return visitLeaf(interpreter, visitor, visitor.EphemeralReference, value)

		// Identity and access
		case 'Address':
			return visitLeaf(interpreter, visitor, visitor.Address, value)
		case 'Path':
			return visitLeaf(interpreter, visitor, visitor.Path, value)
		case 'Capability':
			return visitLeaf(interpreter, visitor, visitor.Capability, value)
		case 'Link':
			return visitLeaf(interpreter, visitor, visitor.Link, value)

		// Functions
		case 'InterpretedFunction':
			return visitLeaf(interpreter, visitor, visitor.InterpretedFunction, value)
		case 'HostFunction':
			return visitLeaf(interpreter, visitor, visitor.HostFunction, value)
		case 'BoundFunction':
			return visitLeaf(interpreter, visitor, visitor.BoundFunction, value)

		// Accounts
		case 'AuthAccount':
			return visitLeaf(interpreter, visitor, visitor.AuthAccount, value)
		case 'PublicAccount':
			return visitLeaf(interpreter, visitor, visitor.PublicAccount, value)
		case 'AuthAccountContracts':
			return visitLeaf(interpreter, visitor, visitor.AuthAccountContracts, value)
		case 'DeployedContract':
			return visitLeaf(interpreter, visitor, visitor.DeployedContract, value)

		case 'Type':
			return visitLeaf(interpreter, visitor, visitor.Type, value)

		default:
			return assertNever(value, 'value')
	}
}

/** Visitor with every slot unset: visits everything, does nothing. */
export const EMPTY_VISITOR: Visitor = {}
