/**
 * Re-export diagnostic types and compiler definitions from shared package.
 */

import { COMPILER_DIAGNOSTICS } from '@stabel/diagnostics'

export {
	COMPILER_DIAGNOSTICS,
	type CompilerDiagnosticCode,
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	interpolateMessage,
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
	STLEX001,
	STLEX002,
} from '@stabel/diagnostics'

/**
 * All valid diagnostic codes for the compiler.
 */
export type DiagnosticCode = keyof typeof COMPILER_DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof COMPILER_DIAGNOSTICS)[typeof code] {
	return COMPILER_DIAGNOSTICS[code]
}
