/**
 * Unified compilation context that flows through all phases.
 * Contains the token and string stores and diagnostic collection.
 */

import {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
} from './diagnostics.ts'
import { type TokenId, TokenStore } from './tokens.ts'

export { DiagnosticSeverity } from './diagnostics.ts'

/**
 * A diagnostic message with location information.
 */
export interface Diagnostic {
	/** The diagnostic definition from the catalog */
	readonly def: DiagnosticDef
	/** Interpolated message with arguments applied */
	readonly message: string
	/** Line number (1-indexed) */
	readonly line: number
	/** Column number (1-indexed) */
	readonly column: number
	/** Template arguments used for message interpolation */
	readonly args?: DiagnosticArgs
	/** Token associated with this diagnostic (if available) */
	readonly tokenId?: TokenId
}

/**
 * Branded type for string IDs.
 * Used for identifier names interned in StringStore.
 */
export type StringId = number & { readonly __brand: 'StringId' }

export function stringId(n: number): StringId {
	return n as StringId
}

/**
 * Dense array storage for interned strings.
 * Used for identifier names - same string always returns same ID.
 */
export class StringStore {
	private readonly strings: string[] = []
	private readonly stringToId: Map<string, StringId> = new Map()

	/** Intern a string, returning its ID. Same string always returns same ID. */
	intern(s: string): StringId {
		const existing = this.stringToId.get(s)
		if (existing !== undefined) return existing

		const id = stringId(this.strings.length)
		this.strings.push(s)
		this.stringToId.set(s, id)
		return id
	}

	get(id: StringId): string {
		const s = this.strings[id]
		if (s === undefined) throw new Error(`Invalid StringId: ${id}`)
		return s
	}

	count(): number {
		return this.strings.length
	}
}

/**
 * The unified compilation context.
 * Passed through all compilation phases.
 *
 * Phases add to stores and never mutate earlier phase data.
 */
export class CompilationContext {
	/** Original source code */
	readonly source: string

	/** Source filename for error messages */
	readonly filename: string

	/** Interned strings for identifier names (populated by tokenizer) */
	readonly strings: StringStore

	/** Token storage (populated by tokenizer) */
	readonly tokens: TokenStore

	/** Collected diagnostics */
	private readonly diagnostics: Diagnostic[] = []

	private errorCount = 0

	constructor(source: string, filename = '<input>') {
		this.source = source
		this.filename = filename
		this.strings = new StringStore()
		this.tokens = new TokenStore()
	}

	/**
	 * Emit a diagnostic by code at a specific location.
	 */
	emit(code: DiagnosticCode, line: number, column: number, args?: DiagnosticArgs): void {
		const def = getDiagnostic(code)
		const message = interpolateMessage(def.message, args)
		this.addDiagnostic({
			column,
			def,
			line,
			message,
			...(args ? { args } : {}),
		})
	}

	/**
	 * Emit a diagnostic about the compilation as a whole, such as an invalid option.
	 * It carries line and column 0 and is formatted without a source excerpt.
	 */
	emitForFile(code: DiagnosticCode, args?: DiagnosticArgs): void {
		this.emit(code, 0, 0, args)
	}

	/**
	 * Emit a diagnostic by code at a token's location.
	 */
	emitAtToken(code: DiagnosticCode, tokenId: TokenId, args?: DiagnosticArgs): void {
		const token = this.tokens.get(tokenId)
		const def = getDiagnostic(code)
		const message = interpolateMessage(def.message, args)
		this.addDiagnostic({
			column: token.column,
			def,
			line: token.line,
			message,
			tokenId,
			...(args ? { args } : {}),
		})
	}

	private addDiagnostic(diagnostic: Diagnostic): void {
		this.diagnostics.push(diagnostic)
		if (diagnostic.def.severity === DiagnosticSeverity.Error) {
			this.errorCount++
		}
	}

	// ===========================================================================
	// QUERY METHODS
	// ===========================================================================

	hasErrors(): boolean {
		return this.errorCount > 0
	}

	getErrorCount(): number {
		return this.errorCount
	}

	getDiagnostics(): readonly Diagnostic[] {
		return this.diagnostics
	}

	getErrors(): Diagnostic[] {
		return this.diagnostics.filter((d) => d.def.severity === DiagnosticSeverity.Error)
	}

	getSourceLine(line: number): string | undefined {
		const lines = this.source.replace(/^\uFEFF/, '').split('\n')
		return lines[line - 1]?.replace(/\r$/, '')
	}

	// ===========================================================================
	// FORMATTING
	// ===========================================================================

	private getSeverityLabel(severity: DiagnosticSeverity): string {
		const labels: Record<DiagnosticSeverity, string> = {
			[DiagnosticSeverity.Error]: 'error',
			[DiagnosticSeverity.Warning]: 'warning',
			[DiagnosticSeverity.Note]: 'note',
		}
		return labels[severity]
	}

	private buildSourceContext(
		diagnostic: Diagnostic,
		sourceLine: string
	): { emptyPrefix: string; lines: string[] } {
		const lineNumWidth = String(diagnostic.line).length
		const pad = ' '.repeat(lineNumWidth)
		const linePrefix = ` ${diagnostic.line} | `
		const emptyPrefix = ` ${pad} | `
		const pointer = `${' '.repeat(diagnostic.column - 1)}^`

		return {
			emptyPrefix,
			lines: [emptyPrefix, `${linePrefix}${sourceLine}`, `${emptyPrefix}${pointer}`],
		}
	}

	private formatHelp(suggestion: string, diagnostic: Diagnostic): string {
		return `   = help: ${interpolateMessage(suggestion, diagnostic.args)}`
	}

	/**
	 * Format a diagnostic for display.
	 *
	 * Example:
	 * ```
	 * error[STGEN003]: unrecognized identifier `foo`
	 *   --> prog.stabel:1:3
	 *    |
	 *  1 | 1 foo
	 *    |   ^
	 *    |
	 *    = help: Declare it first with `<value> foo def`, or check the spelling.
	 * ```
	 */
	formatDiagnostic(diagnostic: Diagnostic): string {
		const { def } = diagnostic
		const severityLabel = this.getSeverityLabel(def.severity)
		const header = `${severityLabel}[${def.code}]: ${diagnostic.message}`

		if (diagnostic.line < 1) {
			const lines = [header, `  --> ${this.filename}`]
			if (def.suggestion) lines.push(this.formatHelp(def.suggestion, diagnostic))
			return lines.join('\n')
		}

		const location = `  --> ${this.filename}:${diagnostic.line}:${diagnostic.column}`

		const sourceLine = this.getSourceLine(diagnostic.line)
		if (sourceLine === undefined) {
			return `${header}\n${location}`
		}

		const { emptyPrefix, lines: contextLines } = this.buildSourceContext(diagnostic, sourceLine)
		const lines = [header, location, ...contextLines]

		if (def.suggestion) {
			lines.push(emptyPrefix, this.formatHelp(def.suggestion, diagnostic))
		}

		return lines.join('\n')
	}

	formatAllDiagnostics(): string {
		return this.diagnostics.map((d) => this.formatDiagnostic(d)).join('\n\n')
	}
}
