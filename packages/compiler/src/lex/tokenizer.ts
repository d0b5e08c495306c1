import type { CompilationContext } from '../core/context.ts'
import { TokenKind } from '../core/tokens.ts'
import { type Lexeme, scan } from '../grammar/index.ts'

export interface TokenizeResult {
	succeeded: boolean
}

/** Largest literal the generated C `int` stack can hold. */
export const MAX_INT_LITERAL = 2147483647

const UTF8_BOM = '\uFEFF'

function stripBom(source: string): string {
	return source.startsWith(UTF8_BOM) ? source.slice(1) : source
}

/**
 * Maps source offsets to 1-indexed line/column pairs.
 */
class LineIndex {
	private readonly lineStarts: number[] = [0]

	constructor(source: string) {
		for (let i = 0; i < source.length; i++) {
			if (source[i] === '\n') this.lineStarts.push(i + 1)
		}
	}

	locate(offset: number): { line: number; column: number } {
		let low = 0
		let high = this.lineStarts.length - 1
		while (low < high) {
			const mid = Math.ceil((low + high) / 2)
			const start = this.lineStarts[mid] ?? 0
			if (start <= offset) low = mid
			else high = mid - 1
		}
		return { column: offset - (this.lineStarts[low] ?? 0) + 1, line: low + 1 }
	}
}

function addIntLiteral(
	lexeme: Lexeme,
	line: number,
	column: number,
	context: CompilationContext
): boolean {
	const value = Number(lexeme.text)
	if (value > MAX_INT_LITERAL) {
		context.emit('STLEX002', line, column, { max: MAX_INT_LITERAL, value: lexeme.text })
		return false
	}
	context.tokens.add({ column, kind: TokenKind.IntLiteral, line, payload: value })
	return true
}

/**
 * Adds the token for one lexeme. Returns false when the lexeme is an error.
 */
function addToken(lexeme: Lexeme, lines: LineIndex, context: CompilationContext): boolean {
	const { line, column } = lines.locate(lexeme.offset)

	switch (lexeme.kind) {
		case 'integer':
			return addIntLiteral(lexeme, line, column, context)
		case 'identifier':
			context.tokens.add({
				column,
				kind: TokenKind.Identifier,
				line,
				payload: context.strings.intern(lexeme.text),
			})
			return true
		case 'operator':
			context.tokens.add({
				column,
				kind: TokenKind.Operator,
				line,
				payload: lexeme.text.charCodeAt(0),
			})
			return true
		case 'stray':
			context.emit('STLEX001', line, column, { char: lexeme.text })
			return false
	}
}

/**
 * Tokenizes source code, populating context.tokens.
 * Stops at the first unrecognized character or out-of-range literal.
 */
export function tokenize(context: CompilationContext): TokenizeResult {
	const source = stripBom(context.source)
	const lines = new LineIndex(source)

	for (const lexeme of scan(source)) {
		if (!addToken(lexeme, lines, context)) {
			return { succeeded: false }
		}
	}

	return { succeeded: !context.hasErrors() }
}
