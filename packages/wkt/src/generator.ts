import type { Geometry } from "@postgeo/geometry"
import { WGS84_SRID } from "@postgeo/shared/types"

/**
 * Turns a geometry into a SQL expression that constructs it in PostGIS.
 *
 * The SRID is emitted as given. Reconciling it with the target column is up to
 * the caller. When omitted, the geometry's own SRID is used, then 4326.
 */
export interface SqlGenerator {
	toGeometrySql(geometry: Geometry, schema: string, srid?: number): string
	toGeographySql(geometry: Geometry, schema: string, srid?: number): string
}

/** Prefix a function name with its schema. An empty schema leaves it bare. */
export function qualify(schema: string, fn: string): string {
	return schema === "" ? fn : `${schema}.${fn}`
}

export function sridOrDefault(geometry: Geometry, srid?: number): number {
	return srid ?? geometry.getSrid() ?? WGS84_SRID
}
