import type { Value } from './values.ts'
import { type Visitor, walkValue } from './visitor.ts'

export interface InterpreterOptions {
	/** Location stamped on values created by this interpreter */
	readonly location?: string
}

/**
 * Execution context handed to every visitor callback.
 */
export class Interpreter {
	readonly location: string

	constructor(options: InterpreterOptions = {}) {
		this.location = options.location ?? '<input>'
	}

	walk(value: Value, visitor: Visitor): void {
		walkValue(this, visitor, value)
	}
}
