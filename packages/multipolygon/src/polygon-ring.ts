import type { Bbox2D, XY } from "@polyring/shared/types"
import type { JoinedWay } from "./join-ways"
import { RingPath } from "./ring-path"
import type { MemberWay, NodeLocator } from "./types"

/**
 * How a candidate ring relates to a containing ring.
 */
export type Intersection = "inside" | "outside" | "crossing"

/**
 * One polygon boundary plus the inner rings nested in it.
 *
 * The path is the contour of the ring's own nodes followed by the path of each
 * inner ring, so under the even-odd rule inner rings become holes. Node
 * positions are read from the locator when the path is built. `nodeMoved` and
 * `addInner` only mark the cached path and bounds stale; the next read rebuilds
 * them.
 */
export class PolygonRing {
	readonly nodes: readonly number[]
	readonly ways: readonly MemberWay[]
	selected: boolean

	private readonly locator: NodeLocator
	private readonly nodeSet: ReadonlySet<number>
	private readonly innerRings: PolygonRing[] = []
	private path = new RingPath()
	private bounds: Bbox2D | null = null
	private dirty = true

	constructor(
		nodes: readonly number[],
		selected: boolean,
		ways: readonly MemberWay[],
		locator: NodeLocator,
	) {
		this.nodes = Object.freeze([...nodes])
		this.ways = Object.freeze([...ways])
		this.selected = selected
		this.locator = locator
		this.nodeSet = new Set(nodes)
	}

	static fromJoinedWay(joined: JoinedWay, locator: NodeLocator): PolygonRing {
		return new PolygonRing(joined.nodes, joined.selected, joined.ways, locator)
	}

	/**
	 * Copy with its own geometry. Node IDs, ways and the locator are shared, and
	 * the inner list is a new list holding the same inner rings.
	 */
	copy(): PolygonRing {
		const copy = new PolygonRing(
			this.nodes,
			this.selected,
			this.ways,
			this.locator,
		)
		copy.innerRings.push(...this.innerRings)
		copy.path = this.getPath().clone()
		copy.dirty = false
		return copy
	}

	get inners(): readonly PolygonRing[] {
		return this.innerRings
	}

	isClosed() {
		return this.nodes.length === 0 || this.nodes[0] === this.nodes.at(-1)
	}

	/**
	 * Coordinates of the ring's own nodes. Nodes the locator does not know are
	 * left out.
	 */
	getCoordinates(): XY[] {
		const coordinates: XY[] = []
		for (const id of this.nodes) {
			const xy = this.locator.getCoordinates(id)
			if (xy) coordinates.push(xy)
		}
		return coordinates
	}

	/**
	 * The ring's path including inner rings. Do not modify the result.
	 */
	getPath(): RingPath {
		if (this.dirty) {
			const path = new RingPath()
			const coordinates = this.getCoordinates()
			coordinates.forEach(([x, y], i) => {
				if (i === 0) path.moveTo(x, y)
				else path.lineTo(x, y)
			})
			path.closePath()
			for (const inner of this.innerRings) {
				path.append(inner.getPath())
			}
			this.path = path
			this.bounds = null
			this.dirty = false
		}
		return this.path
	}

	getBounds(): Bbox2D {
		const path = this.getPath()
		this.bounds ??= path.getBounds()
		return this.bounds
	}

	/**
	 * Nest `inner` in this ring. The caller is responsible for it lying inside.
	 */
	addInner(inner: PolygonRing) {
		this.innerRings.push(inner)
		if (!this.dirty) this.path.append(inner.getPath())
		this.bounds = null
	}

	/**
	 * Classify `candidate` by testing each of its vertices against this ring's
	 * path. Edges can cross without any vertex falling inside, in which case the
	 * result is "outside" or "inside" even though the rings overlap.
	 */
	contains(candidate: RingPath): Intersection {
		const path = this.getPath()
		let contained = 0
		let total = 0
		for (const [x, y] of candidate.vertices()) {
			if (path.contains(x, y)) contained++
			total++
		}
		if (contained === total) return "inside"
		if (contained === 0) return "outside"
		return "crossing"
	}

	/**
	 * True if this ring or one of its inner rings uses the node.
	 */
	usesNode(nodeId: number): boolean {
		return (
			this.nodeSet.has(nodeId) ||
			this.innerRings.some((inner) => inner.nodeSet.has(nodeId))
		)
	}

	/**
	 * Mark geometry stale after a node moved. Inner rings using the node are marked
	 * too, and so is this ring whenever one of them was. Returns whether anything
	 * was marked.
	 */
	nodeMoved(nodeId: number): boolean {
		let innerChanged = false
		for (const inner of this.innerRings) {
			if (inner.nodeSet.has(nodeId)) {
				inner.invalidate()
				innerChanged = true
			}
		}
		const changed = innerChanged || this.nodeSet.has(nodeId)
		if (changed) this.invalidate()
		return changed
	}

	private invalidate() {
		this.dirty = true
		this.bounds = null
	}
}
