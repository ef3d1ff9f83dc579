import { type AnalyzeOptions, analyze, type CheckingContext, type Diagnostic } from '../src/index.ts'

export interface DiagnosticSummary {
	readonly code: string
	readonly line: number
	readonly column: number
	readonly message: string
}

export function analyzeSource(source: string, options: AnalyzeOptions = {}): CheckingContext {
	return analyze(source, { filename: 'test.lode', ...options })
}

export function summarize(diagnostic: Diagnostic): DiagnosticSummary {
	return {
		code: diagnostic.def.code,
		column: diagnostic.column,
		line: diagnostic.line,
		message: diagnostic.message,
	}
}

export function summaries(context: CheckingContext): DiagnosticSummary[] {
	return context.getDiagnostics().map(summarize)
}

export function codes(context: CheckingContext): string[] {
	return context.getDiagnostics().map((d) => d.def.code)
}

export function onlyDiagnostic(context: CheckingContext): Diagnostic {
	const diagnostics = context.getDiagnostics()
	const [first] = diagnostics
	if (diagnostics.length !== 1 || first === undefined) {
		throw new Error(`expected one diagnostic, got: ${codes(context).join(', ') || 'none'}`)
	}
	return first
}
