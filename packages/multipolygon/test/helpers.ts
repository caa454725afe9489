import { Dataset, Way } from "@polyring/core"
import { assertValue } from "@polyring/shared/assert"
import type {
	Bbox2D,
	OsmRelationMember,
	XY,
} from "@polyring/shared/types"
import { PolygonRing } from "../src/polygon-ring"
import type { MultipolygonSource } from "../src/types"

export interface Fixture {
	nodes: Record<number, XY>
	ways?: Record<number, number[]>
	members?: OsmRelationMember[]
}

export const RELATION_ID = 100

/**
 * Four corner nodes numbered from `firstId`, clockwise from the bottom-left.
 */
export function rectangle(
	firstId: number,
	[minX, minY, maxX, maxY]: Bbox2D,
): Record<number, XY> {
	return {
		[firstId]: [minX, minY],
		[firstId + 1]: [minX, maxY],
		[firstId + 2]: [maxX, maxY],
		[firstId + 3]: [maxX, minY],
	}
}

/**
 * Closed way refs around the rectangle created by `rectangle(firstId, ...)`.
 */
export function rectangleRefs(firstId: number): number[] {
	return [firstId, firstId + 1, firstId + 2, firstId + 3, firstId]
}

export function createDataset(fixture: Fixture): Dataset {
	const dataset = new Dataset({ id: "test" })
	for (const [id, [x, y]] of Object.entries(fixture.nodes)) {
		dataset.nodes.addNode({ id: Number(id), x, y })
	}
	for (const [id, refs] of Object.entries(fixture.ways ?? {})) {
		dataset.ways.addWay({ id: Number(id), refs })
	}
	dataset.relations.addRelation({
		id: RELATION_ID,
		tags: { type: "multipolygon" },
		members: fixture.members ?? [],
	})
	return dataset
}

export function resolveSource(dataset: Dataset): MultipolygonSource {
	const resolved = dataset.resolveRelation(RELATION_ID)
	assertValue(resolved, "Test relation is missing")
	return resolved
}

export function way(id: number, refs: number[], selected = false): Way {
	const w = new Way({ id, refs })
	w.selected = selected
	return w
}

/**
 * A closed ring around a rectangle, backed by its own dataset.
 */
export function rectangleRing(firstId: number, bbox: Bbox2D): PolygonRing {
	const dataset = createDataset({ nodes: rectangle(firstId, bbox) })
	const refs = rectangleRefs(firstId)
	return new PolygonRing(refs, false, [way(firstId, refs)], dataset.nodes)
}

/**
 * A closed ring through the given points, in order.
 */
export function polygonRing(firstId: number, points: XY[]): PolygonRing {
	const nodes: Record<number, XY> = {}
	points.forEach((point, i) => {
		nodes[firstId + i] = point
	})
	const dataset = createDataset({ nodes })
	const refs = [...points.keys(), 0].map((i) => firstId + i)
	return new PolygonRing(refs, false, [way(firstId, refs)], dataset.nodes)
}
