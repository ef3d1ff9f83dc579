/**
 * Lexical scope stack.
 *
 * A stack of name → entry layers. `enter()` pushes a layer and hands back a
 * guard whose `release()` pops it; `within()` ties a guard to a callback so
 * the layer is popped on every exit path.
 */

import { unreachable } from '../core/errors.ts'

export interface ScopeGuard {
	release(): void
}

export interface ActivationEntry {
	readonly identifier: string
}

/**
 * Run `body`, then release `guard` whether `body` returned or threw.
 */
export function within<T>(guard: ScopeGuard, body: () => T): T {
	try {
		return body()
	} finally {
		guard.release()
	}
}

export class Activations<V extends ActivationEntry> {
	private readonly layers: Map<string, V>[] = [new Map()]

	/** Number of layers, including the root layer */
	get depth(): number {
		return this.layers.length
	}

	enter(): ScopeGuard {
		const layer = new Map<string, V>()
		this.layers.push(layer)
		let released = false

		return {
			release: () => {
				if (released) unreachable('scope layer released twice')
				if (this.layers.at(-1) !== layer) unreachable('scope layers released out of order')
				released = true
				this.layers.pop()
			},
		}
	}

	/**
	 * Look a name up from the innermost layer outward.
	 */
	find(name: string): V | undefined {
		for (let i = this.layers.length - 1; i >= 0; i--) {
			const entry = this.layers[i]?.get(name)
			if (entry !== undefined) return entry
		}
		return undefined
	}

	findInCurrent(name: string): V | undefined {
		return this.current().get(name)
	}

	/**
	 * Declare an entry in the innermost layer.
	 * Returns the entry already holding the name, leaving it in place, if any.
	 */
	declare(entry: V): V | undefined {
		const layer = this.current()
		const existing = layer.get(entry.identifier)
		if (existing !== undefined) return existing
		layer.set(entry.identifier, entry)
		return undefined
	}

	/** Entries of the innermost layer, in declaration order */
	currentEntries(): V[] {
		return [...this.current().values()]
	}

	private current(): Map<string, V> {
		return this.layers.at(-1) ?? unreachable('scope stack has no layers')
	}
}
