import { CompositeGeometry } from "./composite"
import type { Dimension } from "./dimension"
import type { Point } from "./point"

/**
 * An ordered sequence of points. Also used for polygon rings.
 */
export class LineString extends CompositeGeometry<"LineString", Point> {
	readonly type = "LineString" as const

	static make(points: Point[], srid?: number, dimension?: Dimension) {
		return new LineString(points, srid, dimension)
	}

	static makeEmpty(srid?: number, dimension?: Dimension) {
		return new LineString([], srid, dimension)
	}

	private constructor(
		points: Point[],
		srid: number | undefined,
		dimension: Dimension | undefined,
	) {
		super("LineString", points, srid, dimension)
	}

	getPoints(): readonly Point[] {
		return this.children
	}

	/** True when the line has points and its first and last points coincide. */
	isClosed(): boolean {
		const first = this.children[0]
		const last = this.children[this.children.length - 1]
		if (first === undefined || last === undefined) return false
		return (
			first.getX() === last.getX() &&
			first.getY() === last.getY() &&
			first.getZ() === last.getZ() &&
			first.getM() === last.getM()
		)
	}
}
