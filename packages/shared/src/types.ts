/**
 * Types shared across packages.
 */

/** The storage kind of a PostGIS column. */
export type PostgisType = "geometry" | "geography"

/** Well-known SRID of WGS 84, the default for geodetic data. */
export const WGS84_SRID = 4326
