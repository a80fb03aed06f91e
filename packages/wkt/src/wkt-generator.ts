import type { Geometry } from "@postgeo/geometry"
import { qualify, type SqlGenerator, sridOrDefault } from "./generator"
import { toWkt } from "./wkt"

/**
 * SQL generator based on WKT text.
 *
 * @example
 * ```ts
 * new WktGenerator().toGeometrySql(Point.make(1, 2), "public")
 * // public.ST_GeomFromText('POINT(1 2)', 4326)
 * ```
 */
export class WktGenerator implements SqlGenerator {
	toGeometrySql(geometry: Geometry, schema: string, srid?: number): string {
		const fn = qualify(schema, "ST_GeomFromText")
		return `${fn}('${toWkt(geometry)}', ${sridOrDefault(geometry, srid)})`
	}

	/**
	 * PostGIS' geography text constructor takes a single argument, so the SRID
	 * travels inside the EWKT literal.
	 */
	toGeographySql(geometry: Geometry, schema: string, srid?: number): string {
		const fn = qualify(schema, "ST_GeogFromText")
		return `${fn}('SRID=${sridOrDefault(geometry, srid)};${toWkt(geometry)}')`
	}
}
