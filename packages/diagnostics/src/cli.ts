/**
 * CLI diagnostic definitions.
 *
 * Error code format: STCLI<NUMBER>
 * - STCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (STCLI001-099)
// =============================================================================

export const STCLI001: DiagnosticDef = {
	code: 'STCLI001',
	description: "Stabel couldn't find a file at this path.",
	message: 'file not found: {path}',
	name: 'FileNotFound',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const STCLI002: DiagnosticDef = {
	code: 'STCLI002',
	description: "The file exists but Stabel can't open it.",
	message: 'cannot read file: {reason}',
	name: 'FileUnreadable',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const STCLI003: DiagnosticDef = {
	code: 'STCLI003',
	description: "Stabel couldn't save the generated C file.",
	message: 'cannot write file: {reason}',
	name: 'FileUnwritable',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have write permission for the output directory.',
}

export const STCLI004: DiagnosticDef = {
	code: 'STCLI004',
	description: 'The C compiler rejected the generated program or could not be started.',
	message: 'native compiler `{cc}` failed: {reason}',
	name: 'NativeCompilerFailed',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Make sure `{cc}` is installed and on your PATH, or pick another one with `--cc`.',
}

export const STCLI005: DiagnosticDef = {
	code: 'STCLI005',
	description: 'Something unexpected went wrong during compilation.',
	message: 'compilation failed: {reason}',
	name: 'CompilationFailed',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check your source file, or report this if it seems like a bug.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	STCLI001,
	STCLI002,
	STCLI003,
	STCLI004,
	STCLI005,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
