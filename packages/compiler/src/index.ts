/**
 * Stabel Compiler Public API
 *
 * Two phases share one CompilationContext:
 * - Tokenization (source → dense token store)
 * - Transpilation (tokens → C statements, one forward pass with ±1 lookaround)
 * followed by emission of the complete C program.
 */

import {
	CompileError,
	type CompileResult,
	type EmitOptions,
	emit,
	type TranspileResult,
	transpile,
} from './codegen/index.ts'
import { CompilationContext } from './core/context.ts'
import { tokenize } from './lex/tokenizer.ts'

export {
	BlockTracker,
	C_RESERVED_WORDS,
	CompileError,
	type CompileResult,
	DEFAULT_STACK_SIZE,
	type ElseOutcome,
	type EmitOptions,
	type EmittedChunk,
	emit,
	isKeyword,
	isReservedName,
	KEYWORDS,
	type Keyword,
	type OpenBlock,
	RUNTIME_NAMES,
	type TranspileResult,
	transpile,
	VariableRegistry,
} from './codegen/index.ts'
export {
	CompilationContext,
	type Diagnostic,
	DiagnosticSeverity,
	StringStore,
	type StringId,
} from './core/context.ts'
export { type Token, type TokenId, TokenKind, TokenStore, tokenId } from './core/tokens.ts'
export {
	type ClassifiedToken,
	classify,
	formatToken,
	isIdentifierToken,
	isOperatorToken,
	MAX_INT_LITERAL,
	type TokenizeResult,
	tokenize,
} from './lex/index.ts'

/**
 * Options for the compile function.
 */
export interface CompileOptions extends EmitOptions {
	/** Path to the source file (for error messages) */
	filename?: string
}

/**
 * Get the formatted error message from the first diagnostic.
 */
function getFormattedError(context: CompilationContext, fallback: string): string {
	const error = context.getErrors()[0]
	if (!error) return fallback
	return context.formatDiagnostic(error)
}

/**
 * Run the emission phase with proper error formatting.
 */
function runEmitPhase(
	context: CompilationContext,
	result: TranspileResult,
	options: EmitOptions
): CompileResult {
	try {
		return emit(context, result, options)
	} catch (error: unknown) {
		if (error instanceof CompileError) {
			throw new CompileError(getFormattedError(context, error.message))
		}
		throw error
	}
}

/**
 * Tokenize only, for tools that list tokens.
 *
 * @throws {CompileError} If the source contains an unrecognized character
 */
export function lex(source: string, filename?: string): CompilationContext {
	const context = new CompilationContext(source, filename)
	const tokenResult = tokenize(context)
	if (!tokenResult.succeeded) {
		throw new CompileError(getFormattedError(context, 'Tokenization failed'))
	}
	return context
}

/**
 * Compile Stabel source to C.
 *
 * @returns The complete C program plus token and variable counts
 * @throws {CompileError} On the first lexical or transpilation error; no partial output
 */
export function compile(source: string, options: CompileOptions = {}): CompileResult {
	const { filename, ...emitOptions } = options

	// Phase 1: Tokenization
	const context = lex(source, filename)

	// Phase 2: Transpilation
	const transpileResult = transpile(context)
	if (!transpileResult.succeeded) {
		throw new CompileError(getFormattedError(context, 'Transpilation failed'))
	}

	// Phase 3: Emission
	return runEmitPhase(context, transpileResult, emitOptions)
}
