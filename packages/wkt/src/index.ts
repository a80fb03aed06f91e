/**
 * @postgeo/wkt - WKT rendering and SQL constructor generation.
 *
 * @example
 * ```ts
 * import { toWkt, WktGenerator } from "@postgeo/wkt"
 *
 * toWkt(point) // "POINT(9.1 48.7)"
 * new WktGenerator().toGeometrySql(point, "public")
 * // "public.ST_GeomFromText('POINT(9.1 48.7)', 4326)"
 * ```
 *
 * @module @postgeo/wkt
 */

export * from "./generator"
export * from "./wkb-generator"
export * from "./wkt"
export * from "./wkt-generator"
