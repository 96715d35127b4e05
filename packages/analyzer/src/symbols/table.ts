/**
 * Symbol table: an unbalanced binary search tree keyed by lexeme.
 *
 * Nodes live in a dense arena and refer to their children by SymbolId, so callers can
 * hold on to a node identity without holding a reference into the tree.
 */

export type SymbolId = number & { readonly __brand: 'SymbolId' }

export function symbolId(n: number): SymbolId {
	return n as SymbolId
}

interface SymbolNode {
	readonly key: string
	left: SymbolId | null
	right: SymbolId | null
}

/**
 * Ordinary string ordering. Keys produced by the scanner are ASCII, where UTF-16 code unit
 * order and code point order agree.
 */
export function compareKeys(a: string, b: string): number {
	if (a < b) return -1
	if (a > b) return 1
	return 0
}

/**
 * Final rank of every node, indexed by SymbolId.
 */
export type SymbolRanks = ReadonlyMap<SymbolId, number>

export class SymbolTable {
	private readonly nodes: SymbolNode[] = []
	private root: SymbolId | null = null

	/**
	 * Insert a key, returning its node. Inserting a key that is already present returns the
	 * existing node and leaves the tree unchanged.
	 */
	insert(key: string): SymbolId {
		if (this.root === null) {
			this.root = this.append(key)
			return this.root
		}

		let currentId = this.root
		for (;;) {
			const current = this.node(currentId)
			const order = compareKeys(key, current.key)
			if (order === 0) return currentId

			const next = order < 0 ? current.left : current.right
			if (next === null) {
				const id = this.append(key)
				if (order < 0) {
					current.left = id
				} else {
					current.right = id
				}
				return id
			}
			currentId = next
		}
	}

	find(key: string): SymbolId | undefined {
		let currentId = this.root
		while (currentId !== null) {
			const current = this.node(currentId)
			const order = compareKeys(key, current.key)
			if (order === 0) return currentId
			currentId = order < 0 ? current.left : current.right
		}
		return undefined
	}

	has(key: string): boolean {
		return this.find(key) !== undefined
	}

	/**
	 * 0-indexed position of a key in the in-order traversal of the current tree.
	 * Later insertions of smaller keys shift this value.
	 */
	rank(key: string): number {
		const target = this.find(key)
		if (target === undefined) {
			throw new Error(`Unknown symbol: ${key}`)
		}
		let rank = 0
		for (const id of this.walkInOrder()) {
			if (id === target) return rank
			rank++
		}
		throw new Error(`Symbol not reachable from root: ${key}`)
	}

	/**
	 * Rank of every node, computed in one traversal.
	 */
	ranks(): SymbolRanks {
		const ranks = new Map<SymbolId, number>()
		for (const id of this.walkInOrder()) {
			ranks.set(id, ranks.size)
		}
		return ranks
	}

	/** Keys in ascending order. */
	inOrderKeys(): string[] {
		const keys: string[] = []
		for (const id of this.walkInOrder()) {
			keys.push(this.node(id).key)
		}
		return keys
	}

	get(id: SymbolId): string {
		return this.node(id).key
	}

	count(): number {
		return this.nodes.length
	}

	isValid(id: SymbolId): boolean {
		return id >= 0 && id < this.nodes.length
	}

	/** Number of nodes on the longest root-to-leaf path; 0 for an empty table. */
	height(): number {
		if (this.root === null) return 0
		let height = 0
		const pending: Array<[SymbolId, number]> = [[this.root, 1]]
		for (let entry = pending.pop(); entry !== undefined; entry = pending.pop()) {
			const [id, depth] = entry
			height = Math.max(height, depth)
			const { left, right } = this.node(id)
			if (left !== null) pending.push([left, depth + 1])
			if (right !== null) pending.push([right, depth + 1])
		}
		return height
	}

	/** Iterates nodes in insertion order. */
	*[Symbol.iterator](): Generator<[SymbolId, string]> {
		for (let i = 0; i < this.nodes.length; i++) {
			const node = this.nodes[i]
			if (node !== undefined) yield [symbolId(i), node.key]
		}
	}

	/** Iterative so that degenerate (sorted-insertion) trees cannot overflow the stack. */
	private *walkInOrder(): Generator<SymbolId> {
		const stack: SymbolId[] = []
		let currentId = this.root
		while (currentId !== null || stack.length > 0) {
			while (currentId !== null) {
				stack.push(currentId)
				currentId = this.node(currentId).left
			}
			const id = stack.pop()
			if (id === undefined) return
			yield id
			currentId = this.node(id).right
		}
	}

	private append(key: string): SymbolId {
		const id = symbolId(this.nodes.length)
		this.nodes.push({ key, left: null, right: null })
		return id
	}

	private node(id: SymbolId): SymbolNode {
		const node = this.nodes[id]
		if (node === undefined) {
			throw new Error(`Invalid SymbolId: ${id}`)
		}
		return node
	}
}
