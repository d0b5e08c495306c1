/**
 * @stabel/diagnostics
 *
 * Shared diagnostic types and definitions for Stabel packages.
 */

export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	STCLI001,
	STCLI002,
	STCLI003,
	STCLI004,
	STCLI005,
} from './cli.ts'
export {
	COMPILER_DIAGNOSTICS,
	type CompilerDiagnosticCode,
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
} from './compiler.ts'
export { formatCodedMessage, interpolateMessage } from './interpolate.ts'
export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
} from './types.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'
import { COMPILER_DIAGNOSTICS } from './compiler.ts'
import type { DiagnosticDef } from './types.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...COMPILER_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return code in DIAGNOSTICS
}

/**
 * Find a diagnostic definition by its error kind name, e.g. `UnrecognizedIdentifier`.
 */
export function findDiagnosticByName(name: string): DiagnosticDef | undefined {
	return Object.values(DIAGNOSTICS).find((def) => def.name === name)
}
