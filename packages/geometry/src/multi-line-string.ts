import { CompositeGeometry } from "./composite"
import type { Dimension } from "./dimension"
import type { LineString } from "./line-string"

export class MultiLineString extends CompositeGeometry<
	"MultiLineString",
	LineString
> {
	readonly type = "MultiLineString" as const

	static make(
		lineStrings: LineString[],
		srid?: number,
		dimension?: Dimension,
	) {
		return new MultiLineString(lineStrings, srid, dimension)
	}

	static makeEmpty(srid?: number, dimension?: Dimension) {
		return new MultiLineString([], srid, dimension)
	}

	private constructor(
		lineStrings: LineString[],
		srid: number | undefined,
		dimension: Dimension | undefined,
	) {
		super("MultiLineString", lineStrings, srid, dimension)
	}

	getLineStrings(): readonly LineString[] {
		return this.children
	}
}
