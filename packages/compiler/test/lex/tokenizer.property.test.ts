import { describe, it } from 'node:test'
import fc from 'fast-check'
import { CompilationContext } from '../../src/core/context.ts'
import { formatToken } from '../../src/lex/classify.ts'
import { tokenize } from '../../src/lex/tokenizer.ts'

const lexemeArb = fc.oneof(
	fc.integer({ max: 100000, min: 0 }).map(String),
	fc.stringMatching(/^[a-zA-Z_]{1,8}$/),
	fc.constantFrom('+', '-', '*', '/', '@', ':', '=', '!')
)

const separatorArb = fc.constantFrom(' ', '\n', '  ', '\r\n')

function getTokenSequence(ctx: CompilationContext): string[] {
	const tokens: string[] = []
	for (const [, token] of ctx.tokens) {
		tokens.push(`${token.line}:${token.column}:${formatToken(token, ctx.strings)}`)
	}
	return tokens
}

describe('lex/tokenizer properties', () => {
	describe('safety properties', () => {
		it('never throws on arbitrary string input', () => {
			fc.assert(
				fc.property(fc.string(), (input) => {
					tokenize(new CompilationContext(input))
					return true
				}),
				{ numRuns: 1000 }
			)
		})

		it('fails exactly when an error was reported', () => {
			fc.assert(
				fc.property(fc.string(), (input) => {
					const ctx = new CompilationContext(input)
					const result = tokenize(ctx)
					return result.succeeded === !ctx.hasErrors() && ctx.getErrorCount() <= 1
				}),
				{ numRuns: 1000 }
			)
		})
	})

	describe('determinism properties', () => {
		it('same input always produces same token sequence', () => {
			fc.assert(
				fc.property(fc.string(), (input) => {
					const ctx1 = new CompilationContext(input)
					const ctx2 = new CompilationContext(input)
					tokenize(ctx1)
					tokenize(ctx2)
					return JSON.stringify(getTokenSequence(ctx1)) === JSON.stringify(getTokenSequence(ctx2))
				}),
				{ numRuns: 1000 }
			)
		})
	})

	describe('structural properties', () => {
		it('separated lexemes produce one token each', () => {
			fc.assert(
				fc.property(fc.array(lexemeArb, { maxLength: 30 }), separatorArb, (lexemes, separator) => {
					const ctx = new CompilationContext(lexemes.join(separator))
					const result = tokenize(ctx)
					return result.succeeded && ctx.tokens.count() === lexemes.length
				}),
				{ numRuns: 500 }
			)
		})

		it('every token has valid line and column (>= 1)', () => {
			fc.assert(
				fc.property(fc.string(), (input) => {
					const ctx = new CompilationContext(input)
					tokenize(ctx)
					for (const [, token] of ctx.tokens) {
						if (token.line < 1 || token.column < 1) return false
					}
					return true
				}),
				{ numRuns: 1000 }
			)
		})

		it('tokens appear in source order', () => {
			fc.assert(
				fc.property(fc.array(lexemeArb, { maxLength: 30 }), separatorArb, (lexemes, separator) => {
					const ctx = new CompilationContext(lexemes.join(separator))
					tokenize(ctx)
					let previous = [0, 0]
					for (const [, token] of ctx.tokens) {
						const [line = 0, column = 0] = previous
						if (token.line < line || (token.line === line && token.column <= column)) return false
						previous = [token.line, token.column]
					}
					return true
				}),
				{ numRuns: 500 }
			)
		})
	})
})
