import { throttle } from "@polyring/shared/throttle"
import type {
	Logger,
	OsmEntity,
	OsmEntityType,
	OsmRelation,
	OsmWay,
} from "@polyring/shared/types"
import { isNode, isRelation, isWay } from "@polyring/shared/utils"
import { Nodes } from "./nodes"
import { Relations } from "./relations"
import { type Way, Ways } from "./ways"

export interface NodeMovedDetail {
	id: number
	x: number
	y: number
}

export interface EntityChangedDetail {
	id: number
}

export interface DatasetEventMap {
	nodemoved: CustomEvent<NodeMovedDetail>
	waychanged: CustomEvent<EntityChangedDetail>
	relationchanged: CustomEvent<EntityChangedDetail>
}

export type DatasetEventType = keyof DatasetEventMap

export type DatasetListener<K extends DatasetEventType> = (
	event: DatasetEventMap[K],
) => void

/**
 * A relation member with its way resolved against the store.
 */
export interface ResolvedMember {
	type: OsmEntityType
	ref: number
	role?: string
	way?: Way
	drawable: boolean
}

export interface ResolvedRelation {
	relation: OsmRelation
	members: ResolvedMember[]
	nodes: Nodes
}

export interface DatasetOptions {
	id: string
	logger: Logger
}

/**
 * In-memory OSM entity store with change notifications.
 *
 * Listeners are notified synchronously and one at a time, after the store has
 * been updated.
 */
export class Dataset extends EventTarget {
	readonly id: string
	readonly nodes = new Nodes()
	readonly ways = new Ways()
	readonly relations = new Relations()

	constructor(opts: Partial<DatasetOptions> = {}) {
		super()
		this.id = opts.id ?? "unknown"
	}

	/**
	 * Load a list of entities. Nodes, ways and relations may appear in any order.
	 */
	static fromEntities(
		entities: Iterable<OsmEntity>,
		opts: Partial<DatasetOptions> = {},
	): Dataset {
		const dataset = new Dataset(opts)
		const log = opts.logger ?? ((...msg) => console.log(...msg))
		const logEverySecond = throttle(log, 1_000)

		let count = 0
		for (const entity of entities) {
			if (isNode(entity)) dataset.nodes.addNode(entity)
			else if (isWay(entity)) dataset.ways.addWay(entity)
			else if (isRelation(entity)) dataset.relations.addRelation(entity)
			logEverySecond(`Loaded ${++count} entities...`)
		}
		log(
			`Loaded dataset ${dataset.id}: ${dataset.nodes.size} nodes, ${dataset.ways.size} ways, ${dataset.relations.size} relations`,
		)
		return dataset
	}

	/**
	 * Move a node and notify listeners with its new position.
	 */
	moveNode(id: number, x: number, y: number) {
		this.nodes.setCoordinates(id, [x, y])
		this.emit("nodemoved", { id, x, y })
	}

	setWaySelected(id: number, selected: boolean) {
		const way = this.ways.getById(id)
		if (!way) throw Error(`Way ${id} not found`)
		if (way.selected === selected) return
		way.selected = selected
		this.emit("waychanged", { id })
	}

	updateWay(way: OsmWay) {
		this.ways.replace(way)
		this.emit("waychanged", { id: way.id })
	}

	updateRelation(relation: OsmRelation) {
		this.relations.replace(relation)
		this.emit("relationchanged", { id: relation.id })
	}

	/**
	 * A way is drawable when all of its nodes are loaded. Other entities are
	 * drawable when they exist.
	 */
	isDrawable(type: OsmEntityType, ref: number): boolean {
		if (type === "node") return this.nodes.has(ref)
		if (type === "relation") return this.relations.has(ref)
		const way = this.ways.getById(ref)
		if (!way) return false
		return way.refs.every((nodeId) => this.nodes.has(nodeId))
	}

	/**
	 * Resolve a relation's members against the store.
	 */
	resolveRelation(id: number): ResolvedRelation | undefined {
		const relation = this.relations.getById(id)
		if (!relation) return undefined
		const members = relation.members.map((member): ResolvedMember => {
			const way =
				member.type === "way" ? this.ways.getById(member.ref) : undefined
			return {
				...member,
				...(way ? { way } : {}),
				drawable: this.isDrawable(member.type, member.ref),
			}
		})
		return { relation, members, nodes: this.nodes }
	}

	on<K extends DatasetEventType>(type: K, listener: DatasetListener<K>) {
		const handler = (event: Event) => {
			if (event instanceof CustomEvent) listener(event as DatasetEventMap[K])
		}
		this.addEventListener(type, handler)
		return () => this.removeEventListener(type, handler)
	}

	private emit<K extends DatasetEventType>(
		type: K,
		detail: DatasetEventMap[K]["detail"],
	) {
		this.dispatchEvent(new CustomEvent(type, { detail }))
	}
}
