import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { analyze } from '@toylex/analyzer'
import {
	type FileReport,
	formatAnalyzeError,
	formatInvalidFormatError,
	formatReadError,
	formatWriteError,
	isValidFormat,
	type ReportFormat,
	renderReports,
} from '../utils.ts'

export default class AnalyzeCommand extends BaseCommand {
	static override commandName = 'analyze'
	static override description = 'Build the symbol table and program internal form of source files'

	@args.spread({ description: 'Source files to analyze' })
	declare inputs: string[]

	@flags.string({
		alias: 'f',
		default: 'text',
		description: 'Report format: text (listing) or json',
	})
	declare format: string

	@flags.string({ alias: 'o', description: 'Write the report to a file instead of stdout' })
	declare output?: string

	private async readSourceFile(input: string): Promise<string | null> {
		try {
			return await readFile(input, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(input, error))
			this.exitCode = 1
			return null
		}
	}

	private analyzeSource(input: string, source: string): FileReport | null {
		try {
			return { file: input, result: analyze(source, { filename: input }) }
		} catch (error: unknown) {
			this.logger.error(formatAnalyzeError(error))
			this.exitCode = 1
			return null
		}
	}

	private validateFormat(): ReportFormat | null {
		if (!isValidFormat(this.format)) {
			this.logger.error(formatInvalidFormatError(this.format))
			this.exitCode = 1
			return null
		}
		return this.format
	}

	private async writeReport(outputPath: string, content: string): Promise<void> {
		try {
			await mkdir(dirname(outputPath), { recursive: true })
			await writeFile(outputPath, `${content}\n`)
		} catch (error: unknown) {
			this.logger.error(formatWriteError(error))
			this.exitCode = 1
		}
	}

	override async run(): Promise<void> {
		const format = this.validateFormat()
		if (format === null) return

		const reports: FileReport[] = []
		for (const input of this.inputs) {
			const source = await this.readSourceFile(input)
			if (source === null) continue

			const report = this.analyzeSource(input, source)
			if (report !== null) reports.push(report)
		}
		if (reports.length === 0) return

		const content = renderReports(reports, format)
		if (this.output === undefined) {
			this.logger.log(content)
			return
		}
		await this.writeReport(this.output, content)
	}
}
