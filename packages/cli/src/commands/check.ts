import { readFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import {
	AccessCheckMode,
	analyze,
	type CheckingContext,
	DiagnosticSeverity,
	isAccessCheckMode,
} from '@lode/runtime'
import {
	formatDiagnosticsJson,
	formatInternalError,
	formatInvalidAccessModeError,
	formatReadError,
	formatSummary,
} from '../utils.ts'

export default class CheckCommand extends BaseCommand {
	static override commandName = 'check'
	static override description = 'Check the type declarations in a Lode source file'

	@args.string({ description: 'Input .lode file to check' })
	declare input: string

	@flags.string<string>({
		alias: 'm',
		default: AccessCheckMode.NotSpecifiedUnrestricted,
		description: 'Access checking: none, not-specified-restricted, not-specified-unrestricted or strict',
	})
	declare accessMode: string

	@flags.boolean({ description: 'Print diagnostics as JSON' })
	declare json: boolean

	private async readSourceFile(): Promise<string | null> {
		try {
			return await readFile(this.input, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.input, error))
			this.exitCode = 1
			return null
		}
	}

	private resolveAccessMode(): AccessCheckMode | null {
		if (isAccessCheckMode(this.accessMode)) return this.accessMode
		this.logger.error(formatInvalidAccessModeError(this.accessMode))
		this.exitCode = 1
		return null
	}

	private analyzeSource(source: string, accessCheckMode: AccessCheckMode): CheckingContext | null {
		try {
			return analyze(source, { accessCheckMode, filename: this.input })
		} catch (error: unknown) {
			this.logger.error(formatInternalError(error))
			this.exitCode = 1
			return null
		}
	}

	private printDiagnostics(context: CheckingContext): void {
		for (const diagnostic of context.getDiagnostics()) {
			const text = context.formatDiagnostic(diagnostic)
			switch (diagnostic.def.severity) {
				case DiagnosticSeverity.Error:
					this.logger.error(text)
					break
				case DiagnosticSeverity.Warning:
					this.logger.warning(text)
					break
				case DiagnosticSeverity.Note:
					this.logger.info(text)
					break
			}
		}
	}

	private report(context: CheckingContext): void {
		if (this.json) {
			this.logger.log(formatDiagnosticsJson(context))
		} else {
			this.printDiagnostics(context)
			const summary = formatSummary(this.input, context.getErrorCount())
			if (context.hasErrors()) this.logger.error(summary)
			else this.logger.success(summary)
		}

		if (context.hasErrors()) {
			this.exitCode = 1
		}
	}

	override async run(): Promise<void> {
		const accessCheckMode = this.resolveAccessMode()
		if (accessCheckMode === null) return

		const source = await this.readSourceFile()
		if (source === null) return

		const context = this.analyzeSource(source, accessCheckMode)
		if (context === null) return

		this.report(context)
	}
}
