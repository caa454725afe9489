import type { Logger, XY } from "@polyring/shared/types"
import type { RoleMatcher } from "./role-matcher"

/**
 * Looks up a node's planar coordinates by OSM ID. Rings keep node IDs and a
 * locator instead of coordinates, so they can be rebuilt after a node moves.
 */
export interface NodeLocator {
	getCoordinates(id: number): XY | undefined
}

/**
 * The parts of a way the assembler reads. Implemented by the store's `Way`.
 */
export interface MemberWay {
	readonly id: number
	readonly refs: readonly number[]
	readonly nodeCount: number
	readonly selected: boolean
	isClosed(): boolean
}

export interface MultipolygonMember {
	/** Missing or empty means the member has no role. */
	role?: string
	/** Missing for node and relation members. */
	way?: MemberWay
	drawable: boolean
}

export interface MultipolygonSource {
	members: Iterable<MultipolygonMember>
	nodes: NodeLocator
}

export interface MultipolygonOptions {
	roleMatcher: RoleMatcher
	logger: Logger
}
