/**
 * @postgeo/geometry - In-memory model of PostGIS geometries.
 *
 * A closed family of OGC shapes, each carrying an optional SRID and a
 * {@link Dimension} derived from its coordinates:
 * - Point, LineString, Polygon
 * - MultiPoint, MultiLineString, MultiPolygon
 * - GeometryCollection
 *
 * @example
 * ```ts
 * import { LineString, Point } from "@postgeo/geometry"
 *
 * const line = LineString.make([Point.make(0, 0), Point.make(1, 1)], 4326)
 * line.getPoints()[0]?.getSrid() // 4326
 * ```
 *
 * @module @postgeo/geometry
 */

export { assertChildDimension } from "./composite"
export * from "./dimension"
export * from "./geometry"
export * from "./geometry-collection"
export * from "./line-string"
export * from "./multi-line-string"
export * from "./multi-point"
export * from "./multi-polygon"
export * from "./point"
export * from "./polygon"
export * from "./types"
export * from "./utils"
