import type { Bbox2D, XY } from "@polyring/shared/types"
import { bbox, booleanPointInPolygon } from "@turf/turf"
import type { Polygon, Position } from "geojson"

/**
 * A planar path made of closed contours, filled with the even-odd rule: a point
 * is inside when it lies within an odd number of contours. Appending a contour
 * that lies within another therefore cuts a hole.
 */
export class RingPath {
	private contourList: XY[][] = []
	private current: XY[] | null = null
	private polygon: Polygon | null = null

	moveTo(x: number, y: number) {
		this.current = [[x, y]]
		this.contourList.push(this.current)
		this.polygon = null
	}

	lineTo(x: number, y: number) {
		if (!this.current) throw Error("lineTo called before moveTo")
		this.current.push([x, y])
		this.polygon = null
	}

	/**
	 * End the current contour. Contours are always treated as closed, this only
	 * stops further `lineTo` calls from extending it.
	 */
	closePath() {
		this.current = null
	}

	/**
	 * Add every contour of `other` as a separate contour of this path.
	 */
	append(other: RingPath) {
		for (const contour of other.contourList) {
			this.contourList.push(contour.map(([x, y]): XY => [x, y]))
		}
		this.current = null
		this.polygon = null
	}

	clone(): RingPath {
		const copy = new RingPath()
		copy.append(this)
		return copy
	}

	get isEmpty() {
		return this.contourList.length === 0
	}

	contours(): readonly (readonly XY[])[] {
		return this.contourList
	}

	/**
	 * Every point added with `moveTo` or `lineTo`, in order.
	 */
	*vertices(): IterableIterator<XY> {
		for (const contour of this.contourList) {
			yield* contour
		}
	}

	/**
	 * Even-odd point membership. Points on an edge count as inside.
	 */
	contains(x: number, y: number): boolean {
		if (this.isEmpty) return false
		return booleanPointInPolygon([x, y], this.toPolygon())
	}

	getBounds(): Bbox2D {
		const [minX, minY, maxX, maxY] = bbox(this.toPolygon())
		return [minX, minY, maxX, maxY]
	}

	/**
	 * The path as a GeoJSON polygon, every contour explicitly closed. The first
	 * contour is not necessarily the outermost one.
	 */
	toPolygon(): Polygon {
		this.polygon ??= {
			type: "Polygon",
			coordinates: this.contourList.map(closeContour),
		}
		return this.polygon
	}
}

/**
 * Copy a contour, repeating the first position at the end if it is not already
 * there.
 */
export function closeContour(contour: readonly XY[]): Position[] {
	const positions = contour.map(([x, y]) => [x, y])
	const first = contour[0]
	const last = contour.at(-1)
	if (first && last && (first[0] !== last[0] || first[1] !== last[1])) {
		positions.push([first[0], first[1]])
	}
	return positions
}
