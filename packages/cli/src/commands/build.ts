import { execFile } from 'node:child_process'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { promisify } from 'node:util'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { type CompileResult, compile } from '@stabel/compiler'
import {
	DEFAULT_NATIVE_COMPILER,
	formatCompileError,
	formatNativeCompilerError,
	formatReadError,
	formatWriteError,
	nativeCompilerArgs,
	resolveOutputPath,
} from '../utils.ts'

const execFileAsync = promisify(execFile)

export default class BuildCommand extends BaseCommand {
	static override commandName = 'build'
	static override description = 'Transpile a Stabel source file to C'

	@args.string({ description: 'Input .stabel file to compile' })
	declare input: string

	@flags.string({ alias: 'o', description: 'Output directory (created if not exists)' })
	declare output?: string

	@flags.number({ description: 'Capacity of the generated stack (default 255)' })
	declare stackSize?: number

	@flags.boolean({
		default: true,
		description: 'Comment each statement with the token it came from',
		showNegatedVariantInHelp: true,
	})
	declare trace: boolean

	@flags.boolean({ description: 'Also compile the generated C to an executable' })
	declare native: boolean

	@flags.string({
		default: DEFAULT_NATIVE_COMPILER,
		description: 'C compiler used with --native',
	})
	declare cc: string

	private async readSourceFile(): Promise<string | null> {
		try {
			return await readFile(this.input, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.input, error))
			this.exitCode = 1
			return null
		}
	}

	private compileSource(source: string): CompileResult | null {
		try {
			return compile(source, {
				filename: this.input,
				trace: this.trace,
				...(this.stackSize !== undefined ? { stackSize: this.stackSize } : {}),
			})
		} catch (error: unknown) {
			this.logger.error(formatCompileError(error))
			this.exitCode = 1
			return null
		}
	}

	private async writeOutputFile(outputPath: string, code: string): Promise<boolean> {
		try {
			await mkdir(this.output ?? '.', { recursive: true })
			await writeFile(outputPath, code)
			return true
		} catch (error: unknown) {
			this.logger.error(formatWriteError(error))
			this.exitCode = 1
			return false
		}
	}

	private async compileNative(sourcePath: string): Promise<void> {
		const executablePath = resolveOutputPath(this.input, this.output, 'out')
		try {
			await execFileAsync(this.cc, nativeCompilerArgs(sourcePath, executablePath))
			this.logger.success(`Built ${executablePath}`)
		} catch (error: unknown) {
			this.logger.error(formatNativeCompilerError(this.cc, error))
			this.exitCode = 1
		}
	}

	override async run(): Promise<void> {
		const source = await this.readSourceFile()
		if (source === null) return

		const result = this.compileSource(source)
		if (result === null) return

		const outputPath = resolveOutputPath(this.input, this.output, 'c')
		if (!(await this.writeOutputFile(outputPath, result.code))) return
		this.logger.success(`Wrote ${outputPath} (${result.tokenCount} tokens)`)

		if (this.native) {
			await this.compileNative(outputPath)
		}
	}
}
