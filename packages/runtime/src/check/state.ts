/**
 * Checker state management types and functions.
 *
 * Tracks the two scope stacks (types and values), the set of types
 * currently being checked as containers, and the elaboration being built.
 */

import type { Access, Position } from '../parse/ast.ts'
import { AccessCheckMode } from './access.ts'
import { Activations, type ScopeGuard } from './activations.ts'
import { Elaboration } from './elaboration.ts'
import type { DeclarationKind, NominalType, Type } from './types.ts'

/**
 * Entry of the type scope stack.
 */
export interface TypeEntry {
	readonly identifier: string
	readonly type: NominalType
	/** e.g. `resource interface` */
	readonly declarationKind: string
	readonly access: Access
	/** null for builtins */
	readonly position: Position | null
}

/**
 * Entry of the value scope stack.
 */
export interface ValueEntry {
	readonly identifier: string
	readonly type: Type
	readonly declarationKind: DeclarationKind
	readonly isConstant: boolean
	/** null for builtins */
	readonly position: Position | null
}

export interface CheckerOptions {
	readonly accessCheckMode?: AccessCheckMode
	/** Location stamped on declared types; defaults to the context filename */
	readonly location?: string
}

/**
 * Core checker state passed through all checking functions.
 */
export interface CheckerState {
	readonly elaboration: Elaboration
	readonly typeActivations: Activations<TypeEntry>
	readonly valueActivations: Activations<ValueEntry>
	/** Types whose declaration body is being checked */
	readonly containerTypes: Set<NominalType>
	readonly accessCheckMode: AccessCheckMode
	readonly location: string
}

export function createCheckerState(location: string, options: CheckerOptions = {}): CheckerState {
	return {
		accessCheckMode: options.accessCheckMode ?? AccessCheckMode.NotSpecifiedUnrestricted,
		containerTypes: new Set(),
		elaboration: new Elaboration(),
		location: options.location ?? location,
		typeActivations: new Activations(),
		valueActivations: new Activations(),
	}
}

/**
 * Flag `type` as being checked until the returned guard is released.
 */
export function markContainerType(state: CheckerState, type: NominalType): ScopeGuard {
	const added = !state.containerTypes.has(type)
	state.containerTypes.add(type)
	let released = false

	return {
		release: () => {
			if (released) return
			released = true
			if (added) state.containerTypes.delete(type)
		},
	}
}

export function isContainerType(state: CheckerState, type: NominalType): boolean {
	return state.containerTypes.has(type)
}

/**
 * Enter fresh type and value layers together; released innermost first.
 */
export function enterDeclarationScope(state: CheckerState): ScopeGuard {
	const typeGuard = state.typeActivations.enter()
	const valueGuard = state.valueActivations.enter()
	return {
		release: () => {
			valueGuard.release()
			typeGuard.release()
		},
	}
}
