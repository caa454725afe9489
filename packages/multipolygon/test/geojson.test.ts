import { describe, expect, it, vi } from "vitest"
import { multipolygonToFeature } from "../src/geojson"
import { Multipolygon } from "../src/multipolygon"
import {
	createDataset,
	rectangle,
	rectangleRefs,
	resolveSource,
} from "./helpers"

describe("multipolygonToFeature", () => {
	it("writes outer rings counterclockwise and holes clockwise", () => {
		const dataset = createDataset({
			nodes: { ...rectangle(1, [0, 0, 10, 10]), ...rectangle(5, [2, 2, 4, 4]) },
			ways: { 10: rectangleRefs(1), 11: rectangleRefs(5) },
			members: [
				{ type: "way", ref: 10, role: "outer" },
				{ type: "way", ref: 11, role: "inner" },
			],
		})
		const mp = new Multipolygon(resolveSource(dataset), { logger: vi.fn() })

		expect(multipolygonToFeature(mp, { id: 100 })).toEqual({
			type: "Feature",
			properties: { id: 100 },
			geometry: {
				type: "MultiPolygon",
				coordinates: [
					[
						[
							[0, 0],
							[10, 0],
							[10, 10],
							[0, 10],
							[0, 0],
						],
						[
							[2, 2],
							[2, 4],
							[4, 4],
							[4, 2],
							[2, 2],
						],
					],
				],
			},
		})
	})

	it("writes one polygon per outer ring", () => {
		const dataset = createDataset({
			nodes: {
				...rectangle(1, [0, 0, 10, 10]),
				...rectangle(5, [20, 0, 30, 10]),
			},
			ways: { 10: rectangleRefs(1), 11: rectangleRefs(5) },
			members: [
				{ type: "way", ref: 10, role: "outer" },
				{ type: "way", ref: 11, role: "outer" },
			],
		})
		const mp = new Multipolygon(resolveSource(dataset), { logger: vi.fn() })
		const feature = multipolygonToFeature(mp)
		expect(feature?.properties).toEqual({})
		expect(feature?.geometry.coordinates).toHaveLength(2)
		expect(feature?.geometry.coordinates[1]?.[0]?.[1]).toEqual([30, 0])
	})

	it("closes rings built from chains that do not close", () => {
		const dataset = createDataset({
			nodes: rectangle(1, [0, 0, 10, 10]),
			ways: { 10: [1, 2, 3], 11: [3, 4] },
			members: [
				{ type: "way", ref: 10, role: "outer" },
				{ type: "way", ref: 11, role: "outer" },
			],
		})
		const mp = new Multipolygon(resolveSource(dataset), { logger: vi.fn() })
		expect(multipolygonToFeature(mp)?.geometry.coordinates).toEqual([
			[
				[
					[0, 0],
					[10, 0],
					[10, 10],
					[0, 10],
					[0, 0],
				],
			],
		])
	})

	it("returns null when every ring is degenerate", () => {
		const dataset = createDataset({
			nodes: rectangle(1, [0, 0, 10, 10]),
			ways: { 10: [1, 2] },
			members: [{ type: "way", ref: 10, role: "outer" }],
		})
		const mp = new Multipolygon(resolveSource(dataset), { logger: vi.fn() })
		expect(mp.combinedRings).toHaveLength(1)
		expect(multipolygonToFeature(mp)).toBeNull()
	})
})
