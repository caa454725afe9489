import type { OsmRelation, OsmRelationMember } from "@polyring/shared/types"
import { Ids } from "./ids"

export class Relations {
	readonly ids = new Ids()
	private relations: OsmRelation[] = []
	// way ID -> IDs of relations that reference it
	private wayParents = new Map<number, Set<number>>()

	get size() {
		return this.ids.size
	}

	addRelation(relation: OsmRelation): number {
		const index = this.ids.add(relation.id)
		const copy = cloneRelation(relation)
		this.relations.push(copy)
		this.indexMembers(copy)
		return index
	}

	has(id: number) {
		return this.ids.has(id)
	}

	getById(id: number): OsmRelation | undefined {
		const index = this.ids.getIndexFromId(id)
		if (index === -1) return undefined
		return this.relations[index]
	}

	replace(relation: OsmRelation): OsmRelation {
		const index = this.ids.getIndexFromId(relation.id)
		const previous = this.relations[index]
		if (index === -1 || !previous)
			throw Error(`Relation ${relation.id} not found`)
		for (const member of previous.members) {
			if (member.type === "way") {
				this.wayParents.get(member.ref)?.delete(previous.id)
			}
		}
		const copy = cloneRelation(relation)
		this.relations[index] = copy
		this.indexMembers(copy)
		return copy
	}

	/**
	 * IDs of the relations that have the way as a member.
	 */
	getParentsOfWay(wayId: number): number[] {
		return [...(this.wayParents.get(wayId) ?? [])]
	}

	private indexMembers(relation: OsmRelation) {
		for (const member of relation.members) {
			if (member.type !== "way") continue
			let parents = this.wayParents.get(member.ref)
			if (!parents) {
				parents = new Set()
				this.wayParents.set(member.ref, parents)
			}
			parents.add(relation.id)
		}
	}
}

function cloneRelation(relation: OsmRelation): OsmRelation {
	return {
		...relation,
		members: relation.members.map(
			(member): OsmRelationMember => ({ ...member }),
		),
	}
}
