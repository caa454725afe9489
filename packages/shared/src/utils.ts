/**
 * Type guards for OSM entities.
 *
 * @module
 */

import type {
	OsmEntity,
	OsmNode,
	OsmRelation,
	OsmWay,
} from "./types"

/** Type guard: check if entity is a Node. */
export function isNode(entity: OsmEntity): entity is OsmNode {
	return "x" in entity && "y" in entity
}

/** Type guard: check if entity is a Way. */
export function isWay(entity: OsmEntity): entity is OsmWay {
	return "refs" in entity
}

/** Type guard: check if entity is a Relation. */
export function isRelation(entity: OsmEntity): entity is OsmRelation {
	return "members" in entity
}
