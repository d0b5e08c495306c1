import assert from 'node:assert'
import { describe, it } from 'node:test'
import { StringStore } from '../../src/core/context.ts'
import { type Token, TokenKind } from '../../src/core/tokens.ts'
import { classify, formatToken, isIdentifierToken, isOperatorToken } from '../../src/lex/classify.ts'

const strings = new StringStore()

function int(value: number): Token {
	return { column: 1, kind: TokenKind.IntLiteral, line: 1, payload: value }
}

function ident(name: string): Token {
	return { column: 1, kind: TokenKind.Identifier, line: 1, payload: strings.intern(name) }
}

function op(symbol: string): Token {
	return { column: 1, kind: TokenKind.Operator, line: 1, payload: symbol.charCodeAt(0) }
}

describe('lex/classify', () => {
	describe('classify', () => {
		it('should classify integers with their value', () => {
			assert.deepStrictEqual(classify(int(42), strings), { kind: 'integer', value: 42 })
		})

		it('should classify identifiers with their name', () => {
			assert.deepStrictEqual(classify(ident('count'), strings), { kind: 'identifier', value: 'count' })
		})

		it('should classify operators with their symbol', () => {
			assert.deepStrictEqual(classify(op('@'), strings), { kind: 'operator', value: '@' })
		})

		it('should not depend on call order', () => {
			const token = ident('again')
			assert.deepStrictEqual(classify(token, strings), classify(token, strings))
		})
	})

	describe('isIdentifierToken', () => {
		it('should match the named identifier', () => {
			assert.strictEqual(isIdentifierToken(ident('def'), 'def', strings), true)
			assert.strictEqual(isIdentifierToken(ident('then'), 'def', strings), false)
		})

		it('should reject other kinds', () => {
			assert.strictEqual(isIdentifierToken(int(1), 'def', strings), false)
			assert.strictEqual(isIdentifierToken(op('='), 'def', strings), false)
		})

		it('should treat an absent token as no match', () => {
			assert.strictEqual(isIdentifierToken(undefined, 'def', strings), false)
		})
	})

	describe('isOperatorToken', () => {
		it('should match any listed symbol', () => {
			assert.strictEqual(isOperatorToken(op('='), ['=', '!']), true)
			assert.strictEqual(isOperatorToken(op('!'), ['=', '!']), true)
			assert.strictEqual(isOperatorToken(op('+'), ['=', '!']), false)
		})

		it('should reject identifiers and absent tokens', () => {
			assert.strictEqual(isOperatorToken(ident('x'), ['=']), false)
			assert.strictEqual(isOperatorToken(undefined, ['=']), false)
		})
	})

	describe('formatToken', () => {
		it('should render each kind', () => {
			assert.strictEqual(formatToken(int(5), strings), 'INT(5)')
			assert.strictEqual(formatToken(ident('x'), strings), 'ID(x)')
			assert.strictEqual(formatToken(op('+'), strings), 'OP(+)')
		})
	})
})
