import { CompositeGeometry } from "./composite"
import type { Dimension } from "./dimension"
import type { Point } from "./point"

export class MultiPoint extends CompositeGeometry<"MultiPoint", Point> {
	readonly type = "MultiPoint" as const

	static make(points: Point[], srid?: number, dimension?: Dimension) {
		return new MultiPoint(points, srid, dimension)
	}

	static makeEmpty(srid?: number, dimension?: Dimension) {
		return new MultiPoint([], srid, dimension)
	}

	private constructor(
		points: Point[],
		srid: number | undefined,
		dimension: Dimension | undefined,
	) {
		super("MultiPoint", points, srid, dimension)
	}

	getPoints(): readonly Point[] {
		return this.children
	}
}
