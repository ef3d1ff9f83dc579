/**
 * Lode runtime: declaration parser, semantic checker and runtime values.
 */

import { type CheckOptions, check } from './check/checker.ts'
import { CheckingContext } from './core/context.ts'
import { parse } from './parse/parser.ts'

export * from './check/index.ts'
export * from './core/index.ts'
export * from './interpret/index.ts'
export * from './parse/index.ts'

export interface AnalyzeOptions extends CheckOptions {
	/** Shown in diagnostic locations */
	readonly filename?: string
}

/**
 * Parse and check `source`. Checking only runs if parsing succeeded.
 * All diagnostics are on the returned context.
 */
export function analyze(source: string, options: AnalyzeOptions = {}): CheckingContext {
	const context = new CheckingContext(source, options.filename)
	if (parse(context).succeeded) {
		check(context, options)
	}
	return context
}
