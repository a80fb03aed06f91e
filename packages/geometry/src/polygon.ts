import { CompositeGeometry } from "./composite"
import type { Dimension } from "./dimension"
import type { LineString } from "./line-string"

/**
 * A polygon as a list of linear rings. Ring 0 is the exterior ring, every
 * following ring is a hole.
 */
export class Polygon extends CompositeGeometry<"Polygon", LineString> {
	readonly type = "Polygon" as const

	static make(rings: LineString[], srid?: number, dimension?: Dimension) {
		return new Polygon(rings, srid, dimension)
	}

	static makeEmpty(srid?: number, dimension?: Dimension) {
		return new Polygon([], srid, dimension)
	}

	private constructor(
		rings: LineString[],
		srid: number | undefined,
		dimension: Dimension | undefined,
	) {
		super("Polygon", rings, srid, dimension)
	}

	getLineStrings(): readonly LineString[] {
		return this.children
	}

	getExteriorRing(): LineString | undefined {
		return this.children[0]
	}

	getInteriorRings(): readonly LineString[] {
		return this.children.slice(1)
	}
}
