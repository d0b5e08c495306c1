/**
 * Transpile phase: one forward pass over the token store.
 *
 * Each token is resolved with at most one token of lookback and one of
 * lookahead, and produces one chunk of C statements. Identifier priority:
 * keyword > declared variable > fresh declaration target > error.
 */

import type { CompilationContext } from '../core/context.ts'
import type { DiagnosticArgs, DiagnosticCode } from '../core/diagnostics.ts'
import { type Token, type TokenId, tokenId } from '../core/tokens.ts'
import { isOperatorSymbol } from '../grammar/index.ts'
import { classify, formatToken, isIdentifierToken, isOperatorToken } from '../lex/classify.ts'
import { BlockTracker, VariableRegistry } from './registry.ts'
import {
	arithmetic,
	assignVariable,
	closeBlock,
	declareVariable,
	duplicate,
	isTargetReserved,
	openElse,
	openIfEqual,
	printPopped,
	printTop,
	pushEquality,
	pushValue,
	swap,
} from './target.ts'

/**
 * Statements emitted for one source token.
 */
export interface EmittedChunk {
	readonly tokenId: TokenId
	/** Trace rendering of the source token, e.g. `INT(5)` */
	readonly trace: string
	readonly lines: readonly string[]
	/** Block nesting depth the lines are printed at */
	readonly depth: number
}

export interface TranspileResult {
	succeeded: boolean
	chunks: EmittedChunk[]
	/** Declared variable names, in declaration order */
	variables: string[]
	/** Variables first defined inside a block; declared at the top of `main` */
	hoisted: string[]
}

export const KEYWORDS = ['echo', 'peek', 'end', 'then', 'def'] as const

export type Keyword = (typeof KEYWORDS)[number]

export function isKeyword(name: string): name is Keyword {
	return KEYWORDS.some((keyword) => keyword === name)
}

/**
 * True when `name` cannot be declared with `def`.
 */
export function isReservedName(name: string): boolean {
	return isKeyword(name) || isTargetReserved(name)
}

interface TranspileState {
	readonly context: CompilationContext
	readonly registry: VariableRegistry
	readonly blocks: BlockTracker
	readonly hoisted: string[]
}

/**
 * The token being transpiled and its neighbours.
 */
interface Cursor {
	readonly id: TokenId
	readonly token: Token
	readonly previous: Token | undefined
	readonly next: Token | undefined
}

/**
 * What a rule produced. `null` means the rule reported a diagnostic.
 */
interface Emission {
	readonly lines: readonly string[]
	readonly depth: number
}

type RuleResult = Emission | null

type KeywordRule = (cursor: Cursor, state: TranspileState) => RuleResult

function emitted(lines: readonly string[], state: TranspileState): Emission {
	return { depth: state.blocks.depth, lines }
}

function fail(
	state: TranspileState,
	code: DiagnosticCode,
	at: TokenId,
	args?: DiagnosticArgs
): null {
	state.context.emitAtToken(code, at, args)
	return null
}

// =============================================================================
// KEYWORDS
// =============================================================================

function transpileThen(cursor: Cursor, state: TranspileState): RuleResult {
	if (!isOperatorToken(cursor.previous, ['=', '!'])) {
		return fail(state, 'STGEN001', cursor.id)
	}
	// The branch itself was opened by the preceding `=`.
	return emitted([], state)
}

function transpileEnd(cursor: Cursor, state: TranspileState): RuleResult {
	if (!state.blocks.close()) {
		return fail(state, 'STGEN007', cursor.id)
	}
	return emitted(closeBlock(), state)
}

function transpileDef(cursor: Cursor, state: TranspileState): RuleResult {
	const target = cursor.previous ? classify(cursor.previous, state.context.strings) : undefined
	if (target?.kind !== 'identifier') {
		return fail(state, 'STGEN002', cursor.id)
	}

	const name = target.value
	if (isReservedName(name)) {
		return fail(state, 'STGEN009', tokenId(cursor.id - 1), { name })
	}

	if (!state.registry.declare(name)) {
		return emitted(assignVariable(name), state)
	}
	// C scopes a declaration to its block; Stabel variables live for the whole program.
	if (state.blocks.depth > 0) {
		state.hoisted.push(name)
		return emitted(assignVariable(name), state)
	}
	return emitted(declareVariable(name), state)
}

const KEYWORD_RULES: Record<Keyword, KeywordRule> = {
	def: transpileDef,
	echo: (_cursor, state) => emitted(printPopped(), state),
	end: transpileEnd,
	peek: (_cursor, state) => emitted(printTop(), state),
	then: transpileThen,
}

// =============================================================================
// IDENTIFIERS
// =============================================================================

function transpileName(name: string, cursor: Cursor, state: TranspileState): RuleResult {
	// A name directly before `def` is its target; `def` does the work.
	const isDeclarationTarget = isIdentifierToken(cursor.next, 'def', state.context.strings)
	if (isDeclarationTarget) return emitted([], state)

	if (state.registry.has(name)) {
		return emitted(pushValue(name), state)
	}
	return fail(state, 'STGEN003', cursor.id, { name })
}

function transpileIdentifier(name: string, cursor: Cursor, state: TranspileState): RuleResult {
	if (isKeyword(name)) {
		return KEYWORD_RULES[name](cursor, state)
	}
	return transpileName(name, cursor, state)
}

// =============================================================================
// OPERATORS
// =============================================================================

function transpileEquality(cursor: Cursor, state: TranspileState): RuleResult {
	if (!isIdentifierToken(cursor.next, 'then', state.context.strings)) {
		return emitted(pushEquality(), state)
	}
	const emission = emitted(openIfEqual(), state)
	state.blocks.open(tokenId(cursor.id + 1))
	return emission
}

function transpileElse(cursor: Cursor, state: TranspileState): RuleResult {
	switch (state.blocks.openElse()) {
		case 'no-block':
			return fail(state, 'STGEN005', cursor.id)
		case 'duplicate':
			return fail(state, 'STGEN006', cursor.id)
		case 'opened':
			// `} else {` sits at the depth of the `if` it continues.
			return { depth: state.blocks.depth - 1, lines: openElse() }
	}
}

function transpileOperator(symbol: string, cursor: Cursor, state: TranspileState): RuleResult {
	if (!isOperatorSymbol(symbol)) {
		return fail(state, 'STGEN004', cursor.id, {
			token: formatToken(cursor.token, state.context.strings),
		})
	}

	switch (symbol) {
		case '+':
		case '-':
		case '*':
		case '/':
			return emitted(arithmetic(symbol), state)
		case '@':
			return emitted(swap(), state)
		case ':':
			return emitted(duplicate(), state)
		case '=':
			return transpileEquality(cursor, state)
		case '!':
			return transpileElse(cursor, state)
	}
}

// =============================================================================
// DRIVER
// =============================================================================

function transpileToken(cursor: Cursor, state: TranspileState): RuleResult {
	const classified = classify(cursor.token, state.context.strings)
	switch (classified.kind) {
		case 'integer':
			return emitted(pushValue(classified.value), state)
		case 'identifier':
			return transpileIdentifier(classified.value, cursor, state)
		case 'operator':
			return transpileOperator(classified.value, cursor, state)
	}
}

function checkBlocksClosed(state: TranspileState): boolean {
	const block = state.blocks.innermost()
	if (block === undefined) return true
	state.context.emitAtToken('STGEN008', block.openedBy)
	return false
}

/**
 * Transpiles context.tokens into C statement chunks.
 * Stops at the first diagnostic; a failed result carries no usable chunks.
 *
 * @param registry - declared variables; fresh for every pass unless the caller supplies one
 */
export function transpile(
	context: CompilationContext,
	registry: VariableRegistry = new VariableRegistry()
): TranspileResult {
	const state: TranspileState = { blocks: new BlockTracker(), context, hoisted: [], registry }
	const chunks: EmittedChunk[] = []
	const failed = (): TranspileResult => ({
		chunks: [],
		hoisted: [],
		succeeded: false,
		variables: [...registry],
	})

	for (const [id, token] of context.tokens) {
		const cursor: Cursor = {
			id,
			next: context.tokens.peek(id, 1),
			previous: context.tokens.peek(id, -1),
			token,
		}
		const emission = transpileToken(cursor, state)
		if (emission === null) return failed()

		chunks.push({
			depth: emission.depth,
			lines: emission.lines,
			tokenId: id,
			trace: formatToken(token, context.strings),
		})
	}

	if (!checkBlocksClosed(state)) return failed()

	return { chunks, hoisted: state.hoisted, succeeded: true, variables: [...registry] }
}
