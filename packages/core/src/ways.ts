import type { OsmTags, OsmWay } from "@polyring/shared/types"
import { Ids } from "./ids"

/**
 * A way as handed out by the store. The object is stable for as long as the way
 * is not replaced, so it can be compared by identity.
 */
export class Way {
	readonly id: number
	readonly refs: readonly number[]
	readonly tags: OsmTags
	selected = false

	constructor(way: OsmWay) {
		this.id = way.id
		this.refs = Object.freeze([...way.refs])
		this.tags = way.tags ?? {}
	}

	get nodeCount() {
		return this.refs.length
	}

	/**
	 * A way is closed when it starts and ends on the same node.
	 */
	isClosed() {
		return this.refs.length > 0 && this.refs[0] === this.refs.at(-1)
	}
}

export class Ways {
	readonly ids = new Ids()
	private ways: Way[] = []

	get size() {
		return this.ids.size
	}

	addWay(way: OsmWay): number {
		const index = this.ids.add(way.id)
		this.ways.push(new Way(way))
		return index
	}

	has(id: number) {
		return this.ids.has(id)
	}

	getById(id: number): Way | undefined {
		const index = this.ids.getIndexFromId(id)
		if (index === -1) return undefined
		return this.ways[index]
	}

	/**
	 * Replace a way's content. The previous `Way` object is left untouched; the
	 * replacement keeps its selection state.
	 */
	replace(way: OsmWay): Way {
		const index = this.ids.getIndexFromId(way.id)
		const previous = this.ways[index]
		if (index === -1 || !previous) throw Error(`Way ${way.id} not found`)
		const next = new Way(way)
		next.selected = previous.selected
		this.ways[index] = next
		return next
	}
}
