/**
 * Internal faults: conditions that well-formed parser output can never produce.
 * They are thrown, never reported as diagnostics.
 */

export class InternalFault extends Error {
	override readonly name = 'InternalFault'
}

export function unreachable(message: string): never {
	throw new InternalFault(message)
}

/**
 * Exhaustiveness guard for switches over closed unions.
 */
export function assertNever(value: never, what = 'value'): never {
	throw new InternalFault(`unexpected ${what}: ${String(value)}`)
}
