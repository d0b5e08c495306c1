/**
 * Lexical analysis module.
 * Tokenizes source code into a flat array of tokens and classifies them.
 */

export {
	type ClassifiedToken,
	classify,
	formatToken,
	isIdentifierToken,
	isOperatorToken,
} from './classify.ts'
export { MAX_INT_LITERAL, type TokenizeResult, tokenize } from './tokenizer.ts'
