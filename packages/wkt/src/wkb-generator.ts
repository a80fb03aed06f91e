import type { Geometry } from "@postgeo/geometry"
import { toWkbHex } from "@postgeo/wkb"
import { qualify, type SqlGenerator, sridOrDefault } from "./generator"

/**
 * SQL generator that passes geometries as EWKB hex. Keeps every coordinate
 * bit-exact, unlike WKT which goes through decimal text.
 */
export class WkbGenerator implements SqlGenerator {
	toGeometrySql(geometry: Geometry, schema: string, srid?: number): string {
		const hex = toWkbHex(geometry, { srid: sridOrDefault(geometry, srid) })
		return `${qualify(schema, "ST_GeomFromEWKB")}(decode('${hex}', 'hex'))`
	}

	toGeographySql(geometry: Geometry, schema: string, srid?: number): string {
		const sql = this.toGeometrySql(geometry, schema, srid)
		return `${qualify(schema, "geography")}(${sql})`
	}
}
