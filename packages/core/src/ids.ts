/**
 * Insertion-ordered OSM IDs with an ID → index lookup.
 *
 * OSM IDs are 64-bit integers, stored as doubles: exact up to 2^53, which covers
 * all current IDs. Negative IDs (new, unsaved entities) are allowed.
 */
export class Ids {
	private indexes = new Map<number, number>()

	get size() {
		return this.indexes.size
	}

	/**
	 * Add an ID and return its index. IDs must be unique.
	 */
	add(id: number): number {
		if (this.indexes.has(id)) throw Error(`Duplicate ID: ${id}`)
		const index = this.indexes.size
		this.indexes.set(id, index)
		return index
	}

	has(id: number): boolean {
		return this.indexes.has(id)
	}

	/**
	 * Lookup id → index. Returns -1 for unknown IDs.
	 */
	getIndexFromId(id: number): number {
		return this.indexes.get(id) ?? -1
	}
}
