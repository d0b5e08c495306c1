/**
 * Token storage using dense arrays with integer IDs.
 */

/** Token kinds - small integer discriminant. */
export const TokenKind = {
	// Identifiers and literals (100-199)
	Identifier: 100,
	IntLiteral: 101,

	// Operators (10-99)
	Operator: 10,
} as const

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind]

export type TokenId = number & { readonly __brand: 'TokenId' }

export function tokenId(n: number): TokenId {
	return n as TokenId
}

/**
 * A single token - fixed size, no pointers.
 * Payload meaning depends on kind:
 * - IntLiteral: the integer value
 * - Identifier: index into the string table
 * - Operator: character code of the operator symbol
 */
export interface Token {
	readonly kind: TokenKind
	readonly line: number
	readonly column: number
	readonly payload: number
}

/**
 * Dense array storage for tokens.
 * Append-only during tokenization phase.
 */
export class TokenStore {
	private readonly tokens: Token[] = []

	add(token: Token): TokenId {
		const id = this.tokens.length as TokenId
		this.tokens.push(token)
		return id
	}

	get(id: TokenId): Token {
		const token = this.tokens[id]
		if (token === undefined) {
			throw new Error(`Invalid TokenId: ${id}`)
		}
		return token
	}

	/**
	 * Lookaround: the token `offset` positions away from `id`.
	 * Positions outside the store are absent, not an error.
	 */
	peek(id: TokenId, offset: number): Token | undefined {
		return this.tokens[id + offset]
	}

	count(): number {
		return this.tokens.length
	}

	isValid(id: TokenId): boolean {
		return id >= 0 && id < this.tokens.length
	}

	*[Symbol.iterator](): Generator<[TokenId, Token]> {
		for (let i = 0; i < this.tokens.length; i++) {
			const token = this.tokens[i]
			if (token !== undefined) yield [i as TokenId, token]
		}
	}
}
