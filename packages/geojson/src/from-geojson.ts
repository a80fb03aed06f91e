/**
 * GeoJSON to geometry conversion.
 *
 * @module
 */

import {
	type Geometry,
	GeometryCollection,
	LineString,
	MultiLineString,
	MultiPoint,
	MultiPolygon,
	Point,
	Polygon,
} from "@postgeo/geometry"
import { assertNever } from "@postgeo/shared/assert"
import { InvalidGeometryError } from "@postgeo/shared/errors"
import type * as GeoJSON from "geojson"

/**
 * Convert a GeoJSON geometry object to a geometry with the given SRID.
 * Three-value positions produce Z geometries and an empty position an empty
 * point.
 *
 * @throws InvalidGeometryError for positions that do not have two or three
 * values, or for mixed 2D and 3D positions.
 */
export function fromGeoJson(
	geojson: GeoJSON.Geometry,
	srid?: number,
): Geometry {
	switch (geojson.type) {
		case "Point":
			return toPoint(geojson.coordinates, "Point", srid)
		case "LineString":
			return toLineString(geojson.coordinates, "LineString", srid)
		case "Polygon":
			return toPolygon(geojson.coordinates, "Polygon", srid)
		case "MultiPoint":
			return MultiPoint.make(
				geojson.coordinates.map((p) => toPoint(p, "MultiPoint")),
				srid,
			)
		case "MultiLineString":
			return MultiLineString.make(
				geojson.coordinates.map((l) => toLineString(l, "MultiLineString")),
				srid,
			)
		case "MultiPolygon":
			return MultiPolygon.make(
				geojson.coordinates.map((p) => toPolygon(p, "MultiPolygon")),
				srid,
			)
		case "GeometryCollection":
			return GeometryCollection.make(
				geojson.geometries.map((child) => fromGeoJson(child)),
				srid,
			)
		default:
			return assertNever(geojson)
	}
}

function toPoint(
	position: GeoJSON.Position,
	owner: Geometry["type"],
	srid?: number,
): Point {
	if (position.length === 0) return Point.makeEmpty(srid)
	const [x, y, z] = position
	if (x === undefined || y === undefined || position.length > 3) {
		throw new InvalidGeometryError(
			owner,
			`position with ${position.length} values, expected 2 or 3`,
		)
	}
	return Point.make(x, y, z, null, srid)
}

function toLineString(
	positions: GeoJSON.Position[],
	owner: Geometry["type"],
	srid?: number,
): LineString {
	return LineString.make(
		positions.map((p) => toPoint(p, owner)),
		srid,
	)
}

function toPolygon(
	rings: GeoJSON.Position[][],
	owner: Geometry["type"],
	srid?: number,
): Polygon {
	return Polygon.make(
		rings.map((ring) => toLineString(ring, owner)),
		srid,
	)
}
