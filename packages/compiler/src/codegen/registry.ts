import type { TokenId } from '../core/tokens.ts'

/**
 * Names declared with `def`, in declaration order.
 * Only grows; lives for one transpilation pass.
 */
export class VariableRegistry {
	private readonly names = new Set<string>()

	has(name: string): boolean {
		return this.names.has(name)
	}

	/** Registers `name`. Returns false if it was already declared. */
	declare(name: string): boolean {
		if (this.names.has(name)) return false
		this.names.add(name)
		return true
	}

	get size(): number {
		return this.names.size
	}

	[Symbol.iterator](): IterableIterator<string> {
		return this.names.values()
	}
}

/**
 * A conditional block opened by `= then`.
 */
export interface OpenBlock {
	/** The `then` token that opened the block */
	readonly openedBy: TokenId
	hasElse: boolean
}

export type ElseOutcome = 'opened' | 'no-block' | 'duplicate'

/**
 * Stack of open conditional blocks.
 */
export class BlockTracker {
	private readonly blocks: OpenBlock[] = []

	get depth(): number {
		return this.blocks.length
	}

	open(openedBy: TokenId): void {
		this.blocks.push({ hasElse: false, openedBy })
	}

	/** Switches the innermost block to its else branch. */
	openElse(): ElseOutcome {
		const block = this.innermost()
		if (block === undefined) return 'no-block'
		if (block.hasElse) return 'duplicate'
		block.hasElse = true
		return 'opened'
	}

	/** Closes the innermost block. Returns false if none is open. */
	close(): boolean {
		return this.blocks.pop() !== undefined
	}

	innermost(): OpenBlock | undefined {
		return this.blocks[this.blocks.length - 1]
	}
}
