/**
 * Planar bounding box predicates.
 *
 * Follows rectangle semantics: a box with zero width or height is empty, and an
 * empty box neither contains nor intersects anything.
 *
 * @module
 */

import type { Bbox2D } from "./types"

/** True if the box has no area. */
export function bboxIsEmpty(bb: Bbox2D) {
	return !(bb[2] > bb[0] && bb[3] > bb[1])
}

/**
 * Check if `outer` fully contains `inner`. Shared edges count as contained.
 */
export function bboxContains(outer: Bbox2D, inner: Bbox2D) {
	if (bboxIsEmpty(outer) || bboxIsEmpty(inner)) return false
	return (
		inner[0] >= outer[0] &&
		inner[1] >= outer[1] &&
		inner[2] <= outer[2] &&
		inner[3] <= outer[3]
	)
}

/**
 * Check if the interiors of the two boxes overlap. Boxes that only touch along an
 * edge do not intersect.
 */
export function bboxIntersects(bb1: Bbox2D, bb2: Bbox2D) {
	if (bboxIsEmpty(bb1) || bboxIsEmpty(bb2)) return false
	return (
		bb2[2] > bb1[0] && bb2[3] > bb1[1] && bb2[0] < bb1[2] && bb2[1] < bb1[3]
	)
}

/**
 * Smallest box covering both boxes.
 */
export function bboxUnion(bb1: Bbox2D, bb2: Bbox2D): Bbox2D {
	return [
		Math.min(bb1[0], bb2[0]),
		Math.min(bb1[1], bb2[1]),
		Math.max(bb1[2], bb2[2]),
		Math.max(bb1[3], bb2[3]),
	]
}
