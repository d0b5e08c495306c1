import { type StringStore, stringId } from '../core/context.ts'
import { type Token, TokenKind } from '../core/tokens.ts'

/**
 * A token resolved to its kind and payload value.
 */
export type ClassifiedToken =
	| { readonly kind: 'integer'; readonly value: number }
	| { readonly kind: 'identifier'; readonly value: string }
	| { readonly kind: 'operator'; readonly value: string }

/**
 * Resolve a token to its kind and value.
 * Pure: depends only on the token and the (append-only) string table.
 */
export function classify(token: Token, strings: StringStore): ClassifiedToken {
	switch (token.kind) {
		case TokenKind.IntLiteral:
			return { kind: 'integer', value: token.payload }
		case TokenKind.Identifier:
			return { kind: 'identifier', value: strings.get(stringId(token.payload)) }
		case TokenKind.Operator:
			return { kind: 'operator', value: String.fromCharCode(token.payload) }
	}
}

/**
 * True when the token exists and is the identifier `name`.
 */
export function isIdentifierToken(
	token: Token | undefined,
	name: string,
	strings: StringStore
): boolean {
	if (token?.kind !== TokenKind.Identifier) return false
	return strings.get(stringId(token.payload)) === name
}

/**
 * True when the token exists and is one of the given operator symbols.
 */
export function isOperatorToken(token: Token | undefined, symbols: readonly string[]): boolean {
	if (token?.kind !== TokenKind.Operator) return false
	return symbols.includes(String.fromCharCode(token.payload))
}

/**
 * Render a token as `INT(5)`, `ID(name)` or `OP(+)`.
 */
export function formatToken(token: Token, strings: StringStore): string {
	const classified = classify(token, strings)
	switch (classified.kind) {
		case 'integer':
			return `INT(${classified.value})`
		case 'identifier':
			return `ID(${classified.value})`
		case 'operator':
			return `OP(${classified.value})`
	}
}
