import type { CompilationContext } from '../core/context.ts'
import { DEFAULT_STACK_SIZE, indent, renderMain, renderPrelude } from './target.ts'
import type { EmittedChunk, TranspileResult } from './transpiler.ts'

export { BlockTracker, type ElseOutcome, type OpenBlock, VariableRegistry } from './registry.ts'
export { C_RESERVED_WORDS, DEFAULT_STACK_SIZE, RUNTIME_NAMES } from './target.ts'
export {
	type EmittedChunk,
	isKeyword,
	isReservedName,
	KEYWORDS,
	type Keyword,
	type TranspileResult,
	transpile,
} from './transpiler.ts'

export class CompileError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'CompileError'
	}
}

export interface EmitOptions {
	/** Capacity of the generated stack (default 255) */
	stackSize?: number
	/** Precede each token's statements with a `// INT(5)` style comment (default true) */
	trace?: boolean
}

export interface CompileResult {
	/** Complete C source */
	code: string
	tokenCount: number
	/** Declared variable names, in declaration order */
	variables: string[]
}

function renderChunk(chunk: EmittedChunk, trace: boolean): string {
	const prefix = indent(chunk.depth)
	const lines = trace ? [`// ${chunk.trace}`, ...chunk.lines] : chunk.lines
	return lines.map((line) => `${prefix}${line}`).join('\n')
}

function isValidStackSize(stackSize: number): boolean {
	return Number.isSafeInteger(stackSize) && stackSize > 0
}

/**
 * Wrap transpiled chunks into a complete C program.
 *
 * @throws {CompileError} If the stack size is not a positive integer
 */
export function emit(
	context: CompilationContext,
	result: TranspileResult,
	options: EmitOptions = {}
): CompileResult {
	const { stackSize = DEFAULT_STACK_SIZE, trace = true } = options

	if (!isValidStackSize(stackSize)) {
		context.emitForFile('STGEN010', { size: stackSize })
		throw new CompileError(`invalid stack size ${stackSize}`)
	}

	const sections = result.chunks
		.filter((chunk) => trace || chunk.lines.length > 0)
		.map((chunk) => renderChunk(chunk, trace))

	return {
		code: `${renderPrelude(stackSize)}\n${renderMain(sections, result.hoisted)}`,
		tokenCount: context.tokens.count(),
		variables: result.variables,
	}
}
