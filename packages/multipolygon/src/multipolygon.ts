import { bboxUnion } from "@polyring/shared/bbox"
import type { Bbox2D } from "@polyring/shared/types"
import { joinWays } from "./join-ways"
import { combineRings } from "./nesting"
import { PolygonRing } from "./polygon-ring"
import { RoleMatcher } from "./role-matcher"
import type {
	MemberWay,
	MultipolygonOptions,
	MultipolygonSource,
	NodeLocator,
} from "./types"

/**
 * Rings assembled from a multipolygon relation's way members.
 *
 * Everything is built in the constructor. Afterwards the rings only change
 * through `nodeMoved`, which the owner calls for each node move it is notified
 * of.
 */
export class Multipolygon {
	/** Outer member ways, before joining, in member order. */
	readonly outerWays: MemberWay[] = []
	/** Inner member ways, before joining, in member order. */
	readonly innerWays: MemberWay[] = []
	/** Outer rings, each carrying the inner rings nested in it. */
	readonly combinedRings: PolygonRing[]

	constructor(
		source: MultipolygonSource,
		options: Partial<MultipolygonOptions> = {},
	) {
		const matcher = options.roleMatcher ?? new RoleMatcher()
		const log = options.logger ?? ((...msg) => console.log(...msg))

		for (const member of source.members) {
			if (!member.drawable) continue
			const way = member.way
			if (!way || way.nodeCount < 2) continue

			if (matcher.isInnerRole(member.role)) {
				this.innerWays.push(way)
			} else if (matcher.isOuterRole(member.role) || !member.role) {
				this.outerWays.push(way)
			}
		}

		const innerRings = createRings(this.innerWays, source.nodes)
		const outerRings = createRings(this.outerWays, source.nodes)
		this.combinedRings =
			outerRings.length > 0 ? combineRings(outerRings, innerRings, log) : []
	}

	/**
	 * Forward a node move to every ring. Returns true if any ring used the node.
	 */
	nodeMoved(nodeId: number): boolean {
		let changed = false
		for (const ring of this.combinedRings) {
			if (ring.nodeMoved(nodeId)) changed = true
		}
		return changed
	}

	usesNode(nodeId: number): boolean {
		return this.combinedRings.some((ring) => ring.usesNode(nodeId))
	}

	/**
	 * Union of the combined rings' bounds, undefined when there are no rings.
	 */
	getBounds(): Bbox2D | undefined {
		let bounds: Bbox2D | undefined
		for (const ring of this.combinedRings) {
			const ringBounds = ring.getBounds()
			bounds = bounds ? bboxUnion(bounds, ringBounds) : [...ringBounds]
		}
		return bounds
	}
}

/**
 * Closed ways become rings on their own; open ways are joined first. Joined
 * chains become rings even when they do not close.
 */
function createRings(
	ways: readonly MemberWay[],
	locator: NodeLocator,
): PolygonRing[] {
	const rings: PolygonRing[] = []
	const waysToJoin: MemberWay[] = []
	for (const way of ways) {
		if (way.isClosed()) {
			rings.push(new PolygonRing(way.refs, way.selected, [way], locator))
		} else {
			waysToJoin.push(way)
		}
	}
	for (const joined of joinWays(waysToJoin)) {
		rings.push(PolygonRing.fromJoinedWay(joined, locator))
	}
	return rings
}
