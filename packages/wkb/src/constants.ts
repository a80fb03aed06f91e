/**
 * EWKB type codes and flag bits, as written by PostGIS.
 */

import type { GeometryType } from "@postgeo/geometry"

export const BIG_ENDIAN = 0
export const LITTLE_ENDIAN = 1

export const EWKB_Z_FLAG = 0x80000000
export const EWKB_M_FLAG = 0x40000000
export const EWKB_SRID_FLAG = 0x20000000
export const EWKB_TYPE_MASK = 0x0fffffff

export const WKB_TYPE_CODES = {
	Point: 1,
	LineString: 2,
	Polygon: 3,
	MultiPoint: 4,
	MultiLineString: 5,
	MultiPolygon: 6,
	GeometryCollection: 7,
} as const satisfies Record<GeometryType, number>

/** Geometry type for a base shape code, or undefined for unknown codes. */
export function geometryTypeFromCode(code: number): GeometryType | undefined {
	switch (code) {
		case 1:
			return "Point"
		case 2:
			return "LineString"
		case 3:
			return "Polygon"
		case 4:
			return "MultiPoint"
		case 5:
			return "MultiLineString"
		case 6:
			return "MultiPolygon"
		case 7:
			return "GeometryCollection"
		default:
			return undefined
	}
}

/** Smallest possible encoding of a nested geometry: byte order, type, count. */
export const MIN_GEOMETRY_BYTES = 1 + 4 + 4
