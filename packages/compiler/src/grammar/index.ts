import type { Node, Semantics } from 'ohm-js'
import * as ohm from 'ohm-js'

/**
 * Stabel Lexical Grammar
 *
 * Stabel has no nesting, so the grammar only describes lexemes:
 *   integer     digits, maximal munch (no sign; `-` is always an operator)
 *   identifier  ASCII letters and underscores
 *   operator    one of + - * / @ : = !  (never multi-character)
 *
 * Spaces, newlines and carriage returns separate lexemes and are skipped by
 * the syntactic `Program` rule. Anything else matches `stray`, which the
 * tokenizer reports as an unrecognized character.
 */
const grammarSource = String.raw`
Stabel {
  Program (a program) = lexeme*

  lexeme = integer | identifier | operator | stray

  integer (an integer) = digit+
  identifier (an identifier) = identifierChar+
  identifierChar = "a".."z" | "A".."Z" | "_"
  operator (an operator) = "+" | "-" | "*" | "/" | "@" | ":" | "=" | "!"
  stray = any

  space := " " | "\n" | "\r"
}
`

/**
 * The compiled Stabel grammar.
 */
export const StabelGrammar = ohm.grammar(grammarSource)

/**
 * Operator symbols accepted by the grammar, in declaration order.
 */
export const OPERATOR_SYMBOLS = ['+', '-', '*', '/', '@', ':', '=', '!'] as const

export type OperatorSymbol = (typeof OPERATOR_SYMBOLS)[number]

export function isOperatorSymbol(value: string): value is OperatorSymbol {
	return OPERATOR_SYMBOLS.some((symbol) => symbol === value)
}

/**
 * A raw lexeme as matched by the grammar, before it becomes a token.
 */
export interface Lexeme {
	kind: 'integer' | 'identifier' | 'operator' | 'stray'
	text: string
	/** Offset of the first character in the source */
	offset: number
}

function toLexeme(kind: Lexeme['kind'], node: Node): Lexeme {
	return { kind, offset: node.source.startIdx, text: node.sourceString }
}

/**
 * Create semantics for the Stabel grammar.
 */
export function createSemantics(): Semantics {
	const semantics = StabelGrammar.createSemantics()

	semantics.addOperation<Lexeme>('toLexeme', {
		identifier(_chars: Node) {
			return toLexeme('identifier', this)
		},
		integer(_digits: Node) {
			return toLexeme('integer', this)
		},
		lexeme(inner: Node) {
			return inner['toLexeme']()
		},
		operator(_symbol: Node) {
			return toLexeme('operator', this)
		},
		stray(_char: Node) {
			return toLexeme('stray', this)
		},
	})

	semantics.addOperation<Lexeme[]>('toLexemes', {
		Program(lexemes: Node) {
			return lexemes.children.map((lexeme: Node) => lexeme['toLexeme']())
		},
	})

	return semantics
}

/**
 * Default semantics instance.
 */
export const semantics = createSemantics()

/**
 * Split source text into lexemes.
 *
 * The grammar accepts every input (stray characters become `stray` lexemes),
 * so a failed match can only mean the grammar itself is broken.
 */
export function scan(source: string): Lexeme[] {
	const matchResult = StabelGrammar.match(source)
	if (matchResult.failed()) {
		throw new Error(`Lexical grammar rejected input: ${matchResult.message ?? 'unknown failure'}`)
	}
	return semantics(matchResult)['toLexemes']()
}
