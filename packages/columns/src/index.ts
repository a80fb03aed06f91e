/**
 * @postgeo/columns - Write geometries to, and read them from, PostGIS columns.
 *
 * Holds per-column configuration (`geometry` or `geography`, SRID) and applies
 * it: picks the SQL constructor, reconciles SRIDs and keeps geometry
 * collections out of geography columns. Reading decodes EWKB values.
 *
 * @module @postgeo/columns
 */

export * from "./postgis-columns"
export * from "./types"
