import { bboxContains, bboxIntersects } from "@polyring/shared/bbox"
import type { Logger } from "@polyring/shared/types"
import type { PolygonRing } from "./polygon-ring"

/**
 * Find the outer ring that `inner` belongs to.
 *
 * Bounding boxes are tried first: a single outer whose box contains the inner's
 * box wins, otherwise a single outer whose box overlaps it. When the boxes are
 * ambiguous every outer is tested with `contains`. Each outer that does not
 * report "outside" replaces the current result unless the result contains it
 * entirely. Returns undefined when no outer qualifies.
 */
export function findOuterRing(
	inner: PolygonRing,
	outers: readonly PolygonRing[],
): PolygonRing | undefined {
	const innerBox = inner.getBounds()
	let insideRing: PolygonRing | undefined
	let intersectingRing: PolygonRing | undefined
	let insideCount = 0
	let intersectingCount = 0

	for (const outer of outers) {
		const outerBox = outer.getBounds()
		if (bboxContains(outerBox, innerBox)) {
			insideRing = outer
			insideCount++
		} else if (bboxIntersects(outerBox, innerBox)) {
			intersectingRing = outer
			intersectingCount++
		}
	}

	if (insideCount === 1) return insideRing
	if (intersectingCount === 1) return intersectingRing

	const innerPath = inner.getPath()
	let result: PolygonRing | undefined
	for (const outer of outers) {
		if (outer.contains(innerPath) === "outside") continue
		if (!result || result.contains(outer.getPath()) !== "inside") {
			result = outer
		}
	}
	return result
}

/**
 * Attach inner rings to outer rings and return the combined rings.
 *
 * Outer rings are copied before inner rings are attached, so the input rings are
 * left as they were. An inner ring that fits no outer ring goes to the first
 * combined ring. This is a known approximation for relations whose outers are
 * disjoint and whose inner lies in none of them.
 */
export function combineRings(
	outers: readonly PolygonRing[],
	inners: readonly PolygonRing[],
	log: Logger,
): PolygonRing[] {
	if (inners.length === 0) return [...outers]

	const combined = outers.map((outer) => outer.copy())
	const [first] = combined
	if (!first) throw Error("Cannot combine inner rings without an outer ring")

	if (combined.length === 1) {
		for (const inner of inners) first.addInner(inner)
		return combined
	}

	for (const inner of inners) {
		const outer = findOuterRing(inner, combined)
		if (outer) {
			outer.addInner(inner)
			continue
		}
		log(
			`No outer ring contains the inner ring starting at node ${inner.nodes[0]}, attaching it to the first outer ring`,
		)
		first.addInner(inner)
	}
	return combined
}
