import type { OsmNode, XY } from "@polyring/shared/types"
import { Ids } from "./ids"
import { ResizeableTypedArray as RTA } from "./typed-arrays"

/**
 * Node arena. Coordinates live in typed arrays addressed by index; everything
 * else refers to nodes by OSM ID and looks coordinates up here.
 */
export class Nodes {
	readonly ids = new Ids()
	private xs = new RTA(Float64Array)
	private ys = new RTA(Float64Array)

	get size() {
		return this.ids.size
	}

	/**
	 * Add a single node and return its index.
	 */
	addNode(node: OsmNode): number {
		const index = this.ids.add(node.id)
		this.xs.push(node.x)
		this.ys.push(node.y)
		return index
	}

	has(id: number) {
		return this.ids.has(id)
	}

	/**
	 * Planar coordinates of a node, or undefined if the node is not loaded.
	 */
	getCoordinates(id: number): XY | undefined {
		const index = this.ids.getIndexFromId(id)
		if (index === -1) return undefined
		return [this.xs.at(index), this.ys.at(index)]
	}

	/**
	 * Overwrite a node's coordinates. Throws if the node does not exist.
	 */
	setCoordinates(id: number, [x, y]: XY) {
		const index = this.ids.getIndexFromId(id)
		if (index === -1) throw Error(`Node ${id} not found`)
		this.xs.set(index, x)
		this.ys.set(index, y)
	}
}
