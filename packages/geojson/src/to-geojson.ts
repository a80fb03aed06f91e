/**
 * Geometry to GeoJSON conversion.
 *
 * @module
 */

import type {
	Geometry,
	LineString,
	Point,
	Polygon,
} from "@postgeo/geometry"
import { assertNever } from "@postgeo/shared/assert"
import { InvalidGeometryError } from "@postgeo/shared/errors"
import type * as GeoJSON from "geojson"

/**
 * Convert a geometry to a GeoJSON geometry object. Positions are `[x, y]` or
 * `[x, y, z]`; an empty point has no coordinates.
 *
 * GeoJSON has no SRID: the geometry's SRID is dropped and coordinates are
 * written as they are, without reprojection.
 *
 * @throws InvalidGeometryError for measured geometries, GeoJSON cannot hold M.
 */
export function toGeoJson(geometry: Geometry): GeoJSON.Geometry {
	if (geometry.isMeasured()) {
		throw new InvalidGeometryError(
			geometry.type,
			`GeoJSON cannot hold ${geometry.dimension} coordinates`,
		)
	}
	switch (geometry.type) {
		case "Point":
			return { type: "Point", coordinates: position(geometry) }
		case "LineString":
			return { type: "LineString", coordinates: positions(geometry) }
		case "Polygon":
			return { type: "Polygon", coordinates: rings(geometry) }
		case "MultiPoint":
			return {
				type: "MultiPoint",
				coordinates: geometry.getPoints().map(position),
			}
		case "MultiLineString":
			return {
				type: "MultiLineString",
				coordinates: geometry.getLineStrings().map(positions),
			}
		case "MultiPolygon":
			return {
				type: "MultiPolygon",
				coordinates: geometry.getPolygons().map(rings),
			}
		case "GeometryCollection":
			return {
				type: "GeometryCollection",
				geometries: geometry.getGeometries().map(toGeoJson),
			}
		default:
			return assertNever(geometry)
	}
}

function position(point: Point): GeoJSON.Position {
	if (point.isEmpty()) return []
	const z = point.getZ()
	return z === undefined
		? [point.getX(), point.getY()]
		: [point.getX(), point.getY(), z]
}

function positions(line: LineString): GeoJSON.Position[] {
	return line.getPoints().map(position)
}

function rings(polygon: Polygon): GeoJSON.Position[][] {
	return polygon.getLineStrings().map(positions)
}
