import { describe, expect, it } from "vitest"
import type { OsmNode, OsmRelation, OsmWay } from "../src/types"
import { isNode, isRelation, isWay } from "../src/utils"

describe("utils", () => {
	const node: OsmNode = { id: 1, x: 10, y: 20 }
	const way: OsmWay = { id: 2, refs: [1, 2, 3] }
	const relation: OsmRelation = {
		id: 3,
		members: [{ type: "way", ref: 2, role: "outer" }],
	}

	it("narrows entity types", () => {
		expect(isNode(node)).toBe(true)
		expect(isWay(way)).toBe(true)
		expect(isRelation(relation)).toBe(true)
		expect(isWay(node)).toBe(false)
		expect(isNode(way)).toBe(false)
		expect(isRelation(way)).toBe(false)
	})
})
