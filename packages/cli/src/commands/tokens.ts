import { readFile } from 'node:fs/promises'
import { args, BaseCommand } from '@adonisjs/ace'
import { lex } from '@stabel/compiler'
import { formatCompileError, formatReadError, listTokens } from '../utils.ts'

export default class TokensCommand extends BaseCommand {
	static override commandName = 'tokens'
	static override description = 'Print the token sequence of a Stabel source file'

	@args.string({ description: 'Input .stabel file to tokenize' })
	declare input: string

	override async run(): Promise<void> {
		let source: string
		try {
			source = await readFile(this.input, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.input, error))
			this.exitCode = 1
			return
		}

		try {
			for (const line of listTokens(lex(source, this.input))) {
				this.logger.log(line)
			}
		} catch (error: unknown) {
			this.logger.error(formatCompileError(error))
			this.exitCode = 1
		}
	}
}
