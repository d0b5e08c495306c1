/**
 * Compiler diagnostic definitions.
 *
 * Error code format: ST<PHASE><NUMBER>
 * - STLEX: Lexer errors (001-099)
 * - STGEN: Transpiler errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// LEXER ERRORS (STLEX001-099)
// =============================================================================

export const STLEX001: DiagnosticDef = {
	code: 'STLEX001',
	description:
		'Stabel source may only contain digits, letters, underscores, the operators + - * / @ : = ! and spaces or newlines.',
	message: "unrecognized character '{char}'",
	name: 'UnrecognizedCharacter',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove the character, or replace tabs with spaces.',
}

export const STLEX002: DiagnosticDef = {
	code: 'STLEX002',
	description: 'The generated stack holds C `int` values, so literals must fit in 32 bits.',
	message: 'integer literal {value} is too large',
	name: 'IntegerOutOfRange',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use a value no greater than {max}.',
}

// =============================================================================
// TRANSPILER ERRORS (STGEN001-099)
// =============================================================================

export const STGEN001: DiagnosticDef = {
	code: 'STGEN001',
	description: '`then` opens the branch of an equality test, so it has to come right after `=` or `!`.',
	message: '`then` must follow `=` or `!`',
	name: 'MissingEqualityBeforeThen',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Compare two values first, like `a b = then`.',
}

export const STGEN002: DiagnosticDef = {
	code: 'STGEN002',
	description: '`def` stores the top of the stack into the variable named just before it.',
	message: '`def` must follow an identifier',
	name: 'MissingIdentifierBeforeDef',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Name the variable first, like `5 x def`.',
}

export const STGEN003: DiagnosticDef = {
	code: 'STGEN003',
	description: "This name isn't a keyword and no variable with this name has been defined yet.",
	message: 'unrecognized identifier `{name}`',
	name: 'UnrecognizedIdentifier',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Declare it first with `<value> {name} def`, or check the spelling.',
}

export const STGEN004: DiagnosticDef = {
	code: 'STGEN004',
	description: "The transpiler met an operator it doesn't know. This shouldn't happen!",
	message: 'unrecognized token {token}',
	name: 'UnrecognizedToken',
	severity: DiagnosticSeverity.Error,
	suggestion: 'This is a compiler bug. Please report it with the source that triggered it.',
}

export const STGEN005: DiagnosticDef = {
	code: 'STGEN005',
	description: '`!` starts the else branch of an open `= then` block.',
	message: '`!` without an open block',
	name: 'ElseWithoutBlock',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Open a block with `a b = then` before using `!`.',
}

export const STGEN006: DiagnosticDef = {
	code: 'STGEN006',
	description: 'Each `= then` block can have at most one else branch.',
	message: 'block already has an else branch',
	name: 'DuplicateElse',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Close the block with `end` before starting another comparison.',
}

export const STGEN007: DiagnosticDef = {
	code: 'STGEN007',
	description: '`end` closes the innermost `= then` block, but none is open here.',
	message: '`end` without an open block',
	name: 'EndWithoutBlock',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove this `end`, or open a block with `a b = then` before it.',
}

export const STGEN008: DiagnosticDef = {
	code: 'STGEN008',
	description: 'Every block opened with `= then` has to be closed with `end`.',
	message: 'block opened here is never closed',
	name: 'UnclosedBlock',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add `end` after the last statement of the block.',
}

export const STGEN009: DiagnosticDef = {
	code: 'STGEN009',
	description:
		'Keywords, C keywords and the names used by the generated runtime cannot be used as variable names.',
	message: '`{name}` is a reserved name',
	name: 'ReservedName',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Pick a different variable name.',
}

export const STGEN010: DiagnosticDef = {
	code: 'STGEN010',
	description: 'The generated stack needs room for at least one value.',
	message: 'invalid stack size {size}',
	name: 'InvalidStackSize',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use a positive whole number.',
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all compiler diagnostics.
 */
export const COMPILER_DIAGNOSTICS = {
	// Transpiler errors
	STGEN001,
	STGEN002,
	STGEN003,
	STGEN004,
	STGEN005,
	STGEN006,
	STGEN007,
	STGEN008,
	STGEN009,
	STGEN010,
	// Lexer errors
	STLEX001,
	STLEX002,
} as const

/**
 * All valid compiler diagnostic codes.
 */
export type CompilerDiagnosticCode = keyof typeof COMPILER_DIAGNOSTICS
