import { rewind } from "@turf/turf"
import type {
	Feature,
	GeoJsonProperties,
	MultiPolygon,
	Position,
} from "geojson"
import type { Multipolygon } from "./multipolygon"
import { closeContour } from "./ring-path"

/**
 * Convert a multipolygon's combined rings to a GeoJSON MultiPolygon feature: one
 * polygon per outer ring, holes from its inner rings. Rings with fewer than four
 * positions once closed are skipped. Winding follows RFC 7946 (outer rings
 * counterclockwise). Returns null when no ring is left.
 */
export function multipolygonToFeature(
	multipolygon: Multipolygon,
	properties: GeoJsonProperties = {},
): Feature<MultiPolygon> | null {
	const polygons: Position[][][] = []
	for (const ring of multipolygon.combinedRings) {
		const outer = closeContour(ring.getCoordinates())
		if (outer.length < 4) continue
		const holes = ring.inners
			.map((inner) => closeContour(inner.getCoordinates()))
			.filter((hole) => hole.length >= 4)
		polygons.push([outer, ...holes])
	}
	if (polygons.length === 0) return null

	const feature: Feature<MultiPolygon> = {
		type: "Feature",
		properties,
		geometry: { type: "MultiPolygon", coordinates: polygons },
	}
	return rewind(feature)
}
