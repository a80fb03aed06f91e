import { CompositeGeometry } from "./composite"
import type { Dimension } from "./dimension"
import type { Polygon } from "./polygon"

export class MultiPolygon extends CompositeGeometry<"MultiPolygon", Polygon> {
	readonly type = "MultiPolygon" as const

	static make(polygons: Polygon[], srid?: number, dimension?: Dimension) {
		return new MultiPolygon(polygons, srid, dimension)
	}

	static makeEmpty(srid?: number, dimension?: Dimension) {
		return new MultiPolygon([], srid, dimension)
	}

	private constructor(
		polygons: Polygon[],
		srid: number | undefined,
		dimension: Dimension | undefined,
	) {
		super("MultiPolygon", polygons, srid, dimension)
	}

	getPolygons(): readonly Polygon[] {
		return this.children
	}
}
