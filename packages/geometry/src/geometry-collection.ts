import { CompositeGeometry } from "./composite"
import type { Dimension } from "./dimension"
import type { Geometry } from "./types"

/**
 * A heterogeneous list of geometries, possibly nested collections.
 *
 * Collections can only be stored in `geometry` columns: PostGIS geography does
 * not support them.
 */
export class GeometryCollection extends CompositeGeometry<
	"GeometryCollection",
	Geometry
> {
	readonly type = "GeometryCollection" as const

	static make(geometries: Geometry[], srid?: number, dimension?: Dimension) {
		return new GeometryCollection(geometries, srid, dimension)
	}

	static makeEmpty(srid?: number, dimension?: Dimension) {
		return new GeometryCollection([], srid, dimension)
	}

	private constructor(
		geometries: Geometry[],
		srid: number | undefined,
		dimension: Dimension | undefined,
	) {
		super("GeometryCollection", geometries, srid, dimension)
	}

	getGeometries(): readonly Geometry[] {
		return this.children
	}
}
