/**
 * C target: the fixed runtime prelude and one template per emitted statement.
 *
 * The generated program keeps a bounded `int` array as its stack, with two
 * global scratch registers (`__a__`, `__b__`) for multi-operand operations.
 */

import { readFileSync } from 'node:fs'

export const DEFAULT_STACK_SIZE = 255

export const INDENT = '    '

export type ArithmeticSymbol = '+' | '-' | '*' | '/'

/** Names the prelude defines; programs may not declare variables with them. */
export const RUNTIME_NAMES = [
	'MAX_SIZE',
	'__a__',
	'__b__',
	'exit',
	'main',
	'pop',
	'printf',
	'push',
	'stack',
	'top',
] as const

function loadWordList(fileName: string): readonly string[] {
	const parsed: unknown = JSON.parse(readFileSync(new URL(fileName, import.meta.url), 'utf-8'))
	if (!Array.isArray(parsed) || !parsed.every((word) => typeof word === 'string')) {
		throw new Error(`${fileName} must contain an array of strings`)
	}
	return parsed
}

/** C keywords and standard header macros that would break the generated source. */
export const C_RESERVED_WORDS: ReadonlySet<string> = new Set(loadWordList('./c-reserved-words.json'))

const RUNTIME_NAME_SET: ReadonlySet<string> = new Set<string>(RUNTIME_NAMES)

/**
 * True when declaring `name` as a C variable would clash with C itself or the prelude.
 */
export function isTargetReserved(name: string): boolean {
	return C_RESERVED_WORDS.has(name) || RUNTIME_NAME_SET.has(name)
}

/**
 * Runtime prelude: headers, the stack and its guarded push/pop.
 */
export function renderPrelude(stackSize: number): string {
	return [
		'#include <stdio.h>',
		'#include <stdlib.h>',
		'',
		`#define MAX_SIZE ${stackSize}`,
		'',
		'int stack[MAX_SIZE];',
		'int top = -1;',
		'int __a__;',
		'int __b__;',
		'',
		'void push(int item) {',
		`${INDENT}if (top == MAX_SIZE - 1) {`,
		`${INDENT}${INDENT}printf("Stack Overflow\\n");`,
		`${INDENT}${INDENT}exit(1);`,
		`${INDENT}}`,
		`${INDENT}stack[++top] = item;`,
		'}',
		'',
		'int pop(void) {',
		`${INDENT}if (top == -1) {`,
		`${INDENT}${INDENT}printf("Stack Underflow\\n");`,
		`${INDENT}${INDENT}exit(1);`,
		`${INDENT}}`,
		`${INDENT}return stack[top--];`,
		'}',
		'',
	].join('\n')
}

/**
 * Wrap rendered statement sections in `main`, after the declarations of `hoisted` variables.
 */
export function renderMain(sections: readonly string[], hoisted: readonly string[] = []): string {
	const declarations = hoisted.map((name) => `${INDENT}int ${name} = 0;`)
	const head = declarations.length > 0 ? [declarations.join('\n')] : []
	const body = [...head, ...sections, `${INDENT}return 0;`].join('\n\n')
	return `int main(void) {\n${body}\n}\n`
}

export function indent(depth: number): string {
	return INDENT.repeat(depth + 1)
}

// =============================================================================
// STATEMENT TEMPLATES
// =============================================================================

export function pushValue(value: number | string): string[] {
	return [`push(${value});`]
}

export function printPopped(): string[] {
	return ['printf("%d\\n", pop());']
}

export function printTop(): string[] {
	return ['__a__ = pop();', 'push(__a__);', 'printf("%d\\n", __a__);']
}

export function declareVariable(name: string): string[] {
	return [`int ${name} = pop();`]
}

export function assignVariable(name: string): string[] {
	return [`${name} = pop();`]
}

export function arithmetic(symbol: ArithmeticSymbol): string[] {
	return ['__a__ = pop();', `push(pop() ${symbol} __a__);`]
}

export function swap(): string[] {
	return ['__a__ = pop();', '__b__ = pop();', 'push(__a__);', 'push(__b__);']
}

export function duplicate(): string[] {
	return ['__a__ = pop();', 'push(__a__);', 'push(__a__);']
}

export function popOperands(): string[] {
	return ['__b__ = pop();', '__a__ = pop();']
}

export function openIfEqual(): string[] {
	return [...popOperands(), 'if (__a__ == __b__) {']
}

export function pushEquality(): string[] {
	return [...popOperands(), 'push(__a__ == __b__);']
}

export function openElse(): string[] {
	return ['} else {']
}

export function closeBlock(): string[] {
	return ['}']
}
