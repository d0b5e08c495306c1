import assert from 'node:assert'
import { describe, it } from 'node:test'
import { type Token, TokenKind, TokenStore, tokenId } from '../../src/core/tokens.ts'

function storeOf(...payloads: number[]): TokenStore {
	const store = new TokenStore()
	payloads.forEach((payload, i) => {
		store.add({ column: i * 2 + 1, kind: TokenKind.IntLiteral, line: 1, payload })
	})
	return store
}

describe('core/tokens', () => {
	describe('TokenKind', () => {
		it('should keep literal kinds in the 100 range', () => {
			assert.strictEqual(TokenKind.Identifier, 100)
			assert.strictEqual(TokenKind.IntLiteral, 101)
		})

		it('should keep operators below the literal range', () => {
			assert.strictEqual(TokenKind.Operator, 10)
		})
	})

	describe('tokenId', () => {
		it('should create TokenId from number', () => {
			assert.strictEqual(tokenId(5), 5)
		})
	})

	describe('TokenStore', () => {
		it('should start empty', () => {
			assert.strictEqual(new TokenStore().count(), 0)
		})

		it('should add tokens and return sequential IDs', () => {
			const store = new TokenStore()
			const first: Token = { column: 1, kind: TokenKind.IntLiteral, line: 1, payload: 4 }
			const second: Token = { column: 3, kind: TokenKind.Operator, line: 1, payload: 43 }

			assert.strictEqual(store.add(first), 0)
			assert.strictEqual(store.add(second), 1)
			assert.strictEqual(store.count(), 2)
		})

		it('should retrieve tokens by ID', () => {
			const store = new TokenStore()
			const id = store.add({ column: 5, kind: TokenKind.Identifier, line: 3, payload: 0 })
			const token = store.get(id)

			assert.strictEqual(token.kind, TokenKind.Identifier)
			assert.strictEqual(token.line, 3)
			assert.strictEqual(token.column, 5)
			assert.strictEqual(token.payload, 0)
		})

		it('should throw for invalid ID', () => {
			assert.throws(() => new TokenStore().get(tokenId(0)), /Invalid TokenId: 0/)
		})

		it('should validate IDs', () => {
			const store = storeOf(1)
			assert.strictEqual(store.isValid(tokenId(0)), true)
			assert.strictEqual(store.isValid(tokenId(1)), false)
			assert.strictEqual(store.isValid(tokenId(-1)), false)
		})

		it('should iterate in insertion order', () => {
			const payloads: number[] = []
			for (const [, token] of storeOf(7, 8, 9)) payloads.push(token.payload)
			assert.deepStrictEqual(payloads, [7, 8, 9])
		})

		describe('peek', () => {
			it('should look one token back and ahead', () => {
				const store = storeOf(7, 8, 9)
				assert.strictEqual(store.peek(tokenId(1), -1)?.payload, 7)
				assert.strictEqual(store.peek(tokenId(1), 0)?.payload, 8)
				assert.strictEqual(store.peek(tokenId(1), 1)?.payload, 9)
			})

			it('should treat positions before the first token as absent', () => {
				assert.strictEqual(storeOf(7).peek(tokenId(0), -1), undefined)
			})

			it('should treat positions after the last token as absent', () => {
				assert.strictEqual(storeOf(7).peek(tokenId(0), 1), undefined)
			})
		})
	})
})
