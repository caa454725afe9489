/**
 * A planar (already projected) coordinate. `y` grows northwards.
 */
export type XY = [x: number, y: number]

/**
 * An axis-aligned bounding box in the format [minX, minY, maxX, maxY].
 */
export type Bbox2D = [minX: number, minY: number, maxX: number, maxY: number]

/**
 * Shared OSM Types
 */

export type OsmEntityType = "node" | "way" | "relation"

export interface OsmTags {
	[key: string]: string | number
}

export interface IOsmEntity {
	id: number
	tags?: OsmTags
}

export interface OsmNode extends IOsmEntity {
	x: number
	y: number
}

export interface OsmWay extends IOsmEntity {
	// OSM IDs of the nodes that make up this way
	refs: number[]
}

export interface OsmRelationMember {
	type: OsmEntityType
	ref: number
	role?: string
}

export interface OsmRelation extends IOsmEntity {
	members: OsmRelationMember[]
}

export type OsmEntity = OsmNode | OsmWay | OsmRelation

/**
 * Log sink accepted by long running operations.
 */
export type Logger = (message: string) => void
