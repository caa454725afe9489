import type { Dataset } from "@polyring/core"
import { Multipolygon } from "./multipolygon"
import type { MultipolygonOptions } from "./types"

/**
 * Builds multipolygons from a dataset on first request and keeps them current.
 *
 * Node moves are forwarded to the cached multipolygons. A change to a relation,
 * or to any of its ways, evicts that relation's entry so the next `get`
 * rebuilds it.
 */
export class MultipolygonCache {
	private readonly dataset: Dataset
	private readonly options: Partial<MultipolygonOptions>
	private readonly entries = new Map<number, Multipolygon>()
	private readonly unsubscribe: (() => void)[]

	constructor(dataset: Dataset, options: Partial<MultipolygonOptions> = {}) {
		this.dataset = dataset
		this.options = options
		this.unsubscribe = [
			dataset.on("nodemoved", (event) => this.nodeMoved(event.detail.id)),
			dataset.on("waychanged", (event) => this.wayChanged(event.detail.id)),
			dataset.on("relationchanged", (event) =>
				this.entries.delete(event.detail.id),
			),
		]
	}

	get size() {
		return this.entries.size
	}

	has(relationId: number) {
		return this.entries.has(relationId)
	}

	/**
	 * The relation's multipolygon, or undefined if the relation is not loaded.
	 */
	get(relationId: number): Multipolygon | undefined {
		const cached = this.entries.get(relationId)
		if (cached) return cached
		const resolved = this.dataset.resolveRelation(relationId)
		if (!resolved) return undefined
		const multipolygon = new Multipolygon(resolved, this.options)
		this.entries.set(relationId, multipolygon)
		return multipolygon
	}

	clear() {
		this.entries.clear()
	}

	/**
	 * Stop listening to the dataset and drop all entries.
	 */
	dispose() {
		for (const unsubscribe of this.unsubscribe) unsubscribe()
		this.unsubscribe.length = 0
		this.clear()
	}

	private nodeMoved(nodeId: number) {
		for (const multipolygon of this.entries.values()) {
			multipolygon.nodeMoved(nodeId)
		}
	}

	private wayChanged(wayId: number) {
		for (const relationId of this.dataset.relations.getParentsOfWay(wayId)) {
			this.entries.delete(relationId)
		}
	}
}
