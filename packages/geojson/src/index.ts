/**
 * @postgeo/geojson - Convert between the geometry model and GeoJSON.
 *
 * @module @postgeo/geojson
 */

export * from "./from-geojson"
export * from "./to-geojson"
