import { basename, join } from 'node:path'
import { type CompilationContext, CompileError, formatToken } from '@stabel/compiler'
import { formatCodedMessage, STCLI001, STCLI002, STCLI003, STCLI004, STCLI005 } from '@stabel/diagnostics'

export const SOURCE_EXTENSION = '.stabel'

export const DEFAULT_NATIVE_COMPILER = 'cc'

export type OutputKind = 'c' | 'out'

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return formatCodedMessage(STCLI001, { path: filePath })
	}
	return formatCodedMessage(STCLI002, { reason: getErrorMessage(error) })
}

export function formatWriteError(error: unknown): string {
	return formatCodedMessage(STCLI003, { reason: getErrorMessage(error) })
}

export function formatNativeCompilerError(cc: string, error: unknown): string {
	const reason =
		isNodeError(error) && error.code === 'ENOENT' ? 'command not found' : getErrorMessage(error).trim()
	return formatCodedMessage(STCLI004, { cc, reason })
}

export function formatCompileError(error: unknown): string {
	if (error instanceof CompileError) {
		return error.message
	}
	return formatCodedMessage(STCLI005, { reason: getErrorMessage(error) })
}

export function resolveOutputFilename(inputPath: string, kind: OutputKind): string {
	return `${basename(inputPath, SOURCE_EXTENSION)}.${kind}`
}

export function resolveOutputPath(
	inputPath: string,
	outputDir: string | undefined,
	kind: OutputKind
): string {
	const filename = resolveOutputFilename(inputPath, kind)
	const dir = outputDir ?? '.'
	return join(dir, filename)
}

/**
 * Arguments for `<cc> <source> -o <executable>`.
 */
export function nativeCompilerArgs(sourcePath: string, executablePath: string): string[] {
	return [sourcePath, '-o', executablePath]
}

/**
 * One `INT(..)` / `ID(..)` / `OP(..)` line per token.
 */
export function listTokens(context: CompilationContext): string[] {
	const lines: string[] = []
	for (const [, token] of context.tokens) {
		lines.push(formatToken(token, context.strings))
	}
	return lines
}
