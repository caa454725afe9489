import { describe, expect, it, vi } from "vitest"
import { MultipolygonCache } from "../src/cache"
import { createDataset, RELATION_ID, rectangle, rectangleRefs } from "./helpers"

function fixture() {
	const dataset = createDataset({
		nodes: { ...rectangle(1, [0, 0, 10, 10]), ...rectangle(5, [2, 2, 4, 4]) },
		ways: { 10: rectangleRefs(1), 11: rectangleRefs(5), 12: [1, 3] },
		members: [
			{ type: "way", ref: 10, role: "outer" },
			{ type: "way", ref: 11, role: "inner" },
		],
	})
	const cache = new MultipolygonCache(dataset, { logger: vi.fn() })
	return { dataset, cache }
}

describe("MultipolygonCache", () => {
	it("builds a multipolygon once and reuses it", () => {
		const { cache } = fixture()
		expect(cache.has(RELATION_ID)).toBe(false)
		const mp = cache.get(RELATION_ID)
		expect(mp?.combinedRings).toHaveLength(1)
		expect(cache.get(RELATION_ID)).toBe(mp)
		expect(cache.size).toBe(1)
	})

	it("returns undefined for relations that are not loaded", () => {
		const { cache } = fixture()
		expect(cache.get(999)).toBeUndefined()
		expect(cache.size).toBe(0)
	})

	it("forwards node moves to cached multipolygons", () => {
		const { dataset, cache } = fixture()
		const mp = cache.get(RELATION_ID)
		expect(mp?.getBounds()).toEqual([0, 0, 10, 10])

		dataset.moveNode(3, 12, 12)
		expect(cache.get(RELATION_ID)).toBe(mp)
		expect(mp?.getBounds()).toEqual([0, 0, 12, 12])
	})

	it("evicts a relation when one of its ways changes", () => {
		const { dataset, cache } = fixture()
		const mp = cache.get(RELATION_ID)

		dataset.updateWay({ id: 11, refs: [6, 7, 8, 6] })
		expect(cache.has(RELATION_ID)).toBe(false)
		const rebuilt = cache.get(RELATION_ID)
		expect(rebuilt).not.toBe(mp)
		expect(rebuilt?.combinedRings[0]?.inners[0]?.nodes).toEqual([6, 7, 8, 6])
	})

	it("evicts a relation when one of its ways is selected", () => {
		const { dataset, cache } = fixture()
		cache.get(RELATION_ID)
		dataset.setWaySelected(10, true)
		expect(cache.has(RELATION_ID)).toBe(false)
		expect(cache.get(RELATION_ID)?.combinedRings[0]?.selected).toBe(true)
	})

	it("keeps relations that do not use the changed way", () => {
		const { dataset, cache } = fixture()
		cache.get(RELATION_ID)
		dataset.updateWay({ id: 12, refs: [2, 4] })
		expect(cache.has(RELATION_ID)).toBe(true)
	})

	it("evicts a relation when it changes", () => {
		const { dataset, cache } = fixture()
		cache.get(RELATION_ID)
		dataset.updateRelation({
			id: RELATION_ID,
			tags: { type: "multipolygon" },
			members: [{ type: "way", ref: 10, role: "outer" }],
		})
		expect(cache.has(RELATION_ID)).toBe(false)
		expect(cache.get(RELATION_ID)?.innerWays).toHaveLength(0)
	})

	it("stops listening once disposed", () => {
		const { dataset, cache } = fixture()
		cache.get(RELATION_ID)
		cache.dispose()
		expect(cache.size).toBe(0)

		cache.get(RELATION_ID)
		dataset.updateWay({ id: 10, refs: [1, 2, 3, 1] })
		expect(cache.has(RELATION_ID)).toBe(true)
	})
})
