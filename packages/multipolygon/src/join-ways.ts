import type { MemberWay } from "./types"

/**
 * A chain of ways stitched together end to end.
 */
export interface JoinedWay {
	/** Node IDs in chain order. A shared endpoint appears once. */
	nodes: number[]
	/** True if any contributing way is selected. */
	selected: boolean
	/** Contributing ways, in the order they were joined. */
	ways: MemberWay[]
}

/**
 * Closed when the chain ends where it starts. An empty chain counts as closed.
 */
export function joinedWayIsClosed(joined: JoinedWay): boolean {
	return joined.nodes.length === 0 || joined.nodes[0] === joined.nodes.at(-1)
}

/**
 * Stitch open ways into maximal chains by matching endpoint node IDs.
 *
 * The first unused way seeds a chain. Each pass over the remaining ways splices
 * in any way that touches one of the chain's ends, in either direction; passes
 * repeat until one makes no match. Chains that do not close are returned as
 * they are. Output order follows the order of the seeds.
 */
export function joinWays(ways: readonly MemberWay[]): JoinedWay[] {
	const pool: (MemberWay | null)[] = [...ways]
	let left = pool.length
	const chains: JoinedWay[] = []

	while (left > 0) {
		let chain: JoinedWay | null = null
		let joined = true
		while (joined && left > 0) {
			joined = false
			for (let i = 0; i < pool.length && left > 0; i++) {
				const way = pool[i]
				if (!way) continue
				if (!chain) {
					chain = { nodes: [...way.refs], selected: way.selected, ways: [way] }
				} else if (spliceWay(chain, way)) {
					joined = true
				} else {
					continue
				}
				pool[i] = null
				left--
			}
		}
		if (chain) chains.push(chain)
	}

	return chains
}

type SpliceEnd = "tail-head" | "tail-tail" | "head-head" | "head-tail"

/**
 * Which end of `chain` `way` attaches to, or null if it touches neither end.
 * The first splice onto a seed way prefers the seed's tail over its head.
 */
function findSpliceEnd(chain: JoinedWay, way: MemberWay): SpliceEnd | null {
	const head = chain.nodes[0]
	const tail = chain.nodes.at(-1)
	const wayHead = way.refs[0]
	const wayTail = way.refs.at(-1)

	if (chain.ways.length === 1) {
		if (tail === wayHead) return "tail-head"
		if (tail === wayTail) return "tail-tail"
		if (head === wayHead) return "head-head"
		if (head === wayTail) return "head-tail"
		return null
	}
	if (tail === wayHead) return "tail-head"
	if (head === wayTail) return "head-tail"
	if (head === wayHead) return "head-head"
	if (tail === wayTail) return "tail-tail"
	return null
}

/**
 * Splice `way` onto whichever end of `chain` it shares a node with. Returns false
 * if it touches neither end.
 */
function spliceWay(chain: JoinedWay, way: MemberWay): boolean {
	const nodes = chain.nodes
	switch (findSpliceEnd(chain, way)) {
		case "tail-head":
			nodes.pop()
			nodes.push(...way.refs)
			break
		case "head-tail":
			nodes.shift()
			nodes.unshift(...way.refs)
			break
		case "head-head":
			nodes.shift()
			nodes.unshift(...[...way.refs].reverse())
			break
		case "tail-tail":
			nodes.pop()
			nodes.push(...[...way.refs].reverse())
			break
		case null:
			return false
	}

	if (way.selected) chain.selected = true
	chain.ways.push(way)
	return true
}
