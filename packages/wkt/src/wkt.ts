/**
 * WKT generation.
 *
 * Renders geometries as OGC Well-Known Text in the dialect PostGIS accepts,
 * e.g. `POINT Z(1 2 3)` or `MULTIPOLYGON(((0 0,1 0,1 1,0 0)))`. Parsing WKT is
 * not supported.
 *
 * @module
 */

import {
	assertChildDimension,
	Dimension,
	type Geometry,
	type GeometryType,
	type LineString,
	type Point,
	type Polygon,
} from "@postgeo/geometry"
import { assertNever } from "@postgeo/shared/assert"
import { InvalidGeometryError } from "@postgeo/shared/errors"

export const WKT_KEYWORDS = {
	Point: "POINT",
	LineString: "LINESTRING",
	Polygon: "POLYGON",
	MultiPoint: "MULTIPOINT",
	MultiLineString: "MULTILINESTRING",
	MultiPolygon: "MULTIPOLYGON",
	GeometryCollection: "GEOMETRYCOLLECTION",
} as const satisfies Record<GeometryType, string>

const DIMENSION_SUFFIXES: Record<Dimension, string> = {
	[Dimension.D2]: "",
	[Dimension.Z]: " Z",
	[Dimension.M]: " M",
	[Dimension.ZM]: " ZM",
}

/**
 * Render a geometry as WKT. Empty geometries render as `<KEYWORD> EMPTY`.
 *
 * @throws InvalidGeometryError for NaN coordinates outside an empty point, for
 * infinite coordinates, and for a child whose dimension differs from its
 * parent's.
 */
export function toWkt(geometry: Geometry): string {
	const keyword = WKT_KEYWORDS[geometry.type]
	if (geometry.isEmpty()) return `${keyword} EMPTY`
	const suffix = DIMENSION_SUFFIXES[geometry.dimension]
	return `${keyword}${suffix}(${wktBody(geometry)})`
}

/**
 * Render a geometry as PostGIS extended WKT: `SRID=<srid>;<WKT>` when the
 * geometry has an SRID, plain WKT otherwise.
 */
export function toEwkt(geometry: Geometry, srid = geometry.getSrid()): string {
	const wkt = toWkt(geometry)
	return srid === undefined ? wkt : `SRID=${srid};${wkt}`
}

function wktBody(geometry: Geometry): string {
	switch (geometry.type) {
		case "Point":
			return coordinates(geometry, geometry.type)
		case "LineString":
			return pointList(geometry, geometry.type)
		case "Polygon":
			return ringList(geometry, geometry.type)
		case "MultiPoint":
			return geometry
				.getPoints()
				.map((point) => {
					assertChildDimension(geometry, point)
					return point.isEmpty()
						? "EMPTY"
						: `(${coordinates(point, geometry.type)})`
				})
				.join(",")
		case "MultiLineString":
			return geometry
				.getLineStrings()
				.map((line) => {
					assertChildDimension(geometry, line)
					return parenthesized(pointList(line, geometry.type), line)
				})
				.join(",")
		case "MultiPolygon":
			return geometry
				.getPolygons()
				.map((polygon) => {
					assertChildDimension(geometry, polygon)
					return parenthesized(ringList(polygon, geometry.type), polygon)
				})
				.join(",")
		case "GeometryCollection":
			return geometry
				.getGeometries()
				.map((child) => {
					assertChildDimension(geometry, child)
					return toWkt(child)
				})
				.join(",")
		default:
			return assertNever(geometry)
	}
}

function parenthesized(body: string, geometry: Geometry): string {
	return geometry.isEmpty() ? "EMPTY" : `(${body})`
}

function ringList(polygon: Polygon, owner: GeometryType): string {
	return polygon
		.getLineStrings()
		.map((ring) => {
			assertChildDimension(polygon, ring)
			return parenthesized(pointList(ring, owner), ring)
		})
		.join(",")
}

function pointList(line: LineString, owner: GeometryType): string {
	return line
		.getPoints()
		.map((point) => {
			assertChildDimension(line, point)
			return coordinates(point, owner)
		})
		.join(",")
}

/**
 * Space-separated coordinates of a point in x y [z] [m] order.
 */
function coordinates(point: Point, owner: GeometryType): string {
	const values = [point.getX(), point.getY()]
	const z = point.getZ()
	const m = point.getM()
	if (z !== undefined) values.push(z)
	if (m !== undefined) values.push(m)
	for (const value of values) {
		if (!Number.isFinite(value)) {
			throw new InvalidGeometryError(
				owner,
				`coordinate ${value} cannot be written as WKT`,
			)
		}
	}
	return values.join(" ")
}
