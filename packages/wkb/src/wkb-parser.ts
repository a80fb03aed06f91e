/**
 * EWKB decoding.
 *
 * Decodes PostGIS Extended Well-Known Binary into the geometry model. Supports
 * all seven OGC shapes with Z, M and ZM coordinates, the EWKB SRID and
 * dimension flags, and ISO type codes (1001, 2001, 3001, ...).
 *
 * @module
 */

import {
	coordinateCount,
	type Dimension,
	dimensionFromFlags,
	type Geometry,
	GeometryCollection,
	type GeometryOfType,
	type GeometryType,
	hasZDimension,
	isMeasured,
	LineString,
	MultiLineString,
	MultiPoint,
	MultiPolygon,
	Point,
	Polygon,
} from "@postgeo/geometry"
import { assertNever } from "@postgeo/shared/assert"
import { MalformedWkbError } from "@postgeo/shared/errors"
import {
	EWKB_M_FLAG,
	EWKB_SRID_FLAG,
	EWKB_TYPE_MASK,
	EWKB_Z_FLAG,
	geometryTypeFromCode,
	MIN_GEOMETRY_BYTES,
} from "./constants"
import { hexToBytes } from "./hex"
import { WkbReader } from "./wkb-reader"

export interface WkbParseOptions {
	/**
	 * Reject polygon rings that are not closed or have fewer than four points.
	 * Off by default: rings are taken as they are.
	 */
	strictRings?: boolean
}

/** Geometry type and flags decoded from an EWKB type word. */
export interface WkbHeader {
	type: GeometryType
	dimension: Dimension
	hasSrid: boolean
}

/** SRID and dimension a nested geometry inherits from its parent. */
type Inherited = {
	srid: number | undefined
	dimension: Dimension
}

/**
 * Parse EWKB bytes, or their hex text, into a geometry.
 *
 * @throws MalformedWkbError when the input is truncated, has an unknown shape
 * code, an impossible element count, or bytes after the geometry.
 *
 * @example
 * ```ts
 * const point = parseWkb("0101000020E610000033333333333322409A99999999594840")
 * ```
 */
export function parseWkb(
	input: Uint8Array | string,
	options: WkbParseOptions = {},
): Geometry {
	const bytes = typeof input === "string" ? hexToBytes(input) : input
	const reader = new WkbReader(bytes)
	const geometry = readGeometry(reader, options)
	if (reader.remaining > 0) {
		throw new MalformedWkbError(
			`${reader.remaining} unexpected bytes after geometry`,
			reader.offset,
		)
	}
	return geometry
}

/**
 * Decode an EWKB type word into its shape and flags.
 */
export function parseTypeWord(word: number, offset = 0): WkbHeader {
	let hasZ = (word & EWKB_Z_FLAG) !== 0
	let hasM = (word & EWKB_M_FLAG) !== 0
	const hasSrid = (word & EWKB_SRID_FLAG) !== 0

	// ISO WKB encodes the dimension in the thousands of the type code.
	const code = word & EWKB_TYPE_MASK
	const iso = Math.floor(code / 1000)
	if (iso === 1 || iso === 3) hasZ = true
	if (iso === 2 || iso === 3) hasM = true

	const type = iso <= 3 ? geometryTypeFromCode(code % 1000) : undefined
	if (type === undefined) {
		throw new MalformedWkbError(`unknown geometry type code ${code}`, offset)
	}
	return { type, dimension: dimensionFromFlags(hasZ, hasM), hasSrid }
}

function readGeometry(
	reader: WkbReader,
	options: WkbParseOptions,
	inherited?: Inherited,
): Geometry {
	const start = reader.offset
	reader.readByteOrder()
	const header = parseTypeWord(reader.readUint32(), start + 1)

	let srid = inherited?.srid
	if (header.hasSrid) {
		if (inherited) {
			throw new MalformedWkbError(
				"nested geometry carries its own SRID",
				start + 1,
			)
		}
		srid = reader.readInt32()
	}

	const { dimension } = header
	if (inherited && inherited.dimension !== dimension) {
		throw new MalformedWkbError(
			`nested ${header.type} has dimension ${dimension} inside a ${inherited.dimension} geometry`,
			start,
		)
	}

	const child: Inherited = { srid, dimension }
	switch (header.type) {
		case "Point":
			return readPoint(reader, dimension, srid)
		case "LineString":
			return LineString.make(
				readPoints(reader, dimension, srid),
				srid,
				dimension,
			)
		case "Polygon":
			return readPolygon(reader, options, dimension, srid)
		case "MultiPoint":
			return MultiPoint.make(
				readChildren(reader, options, child, "Point"),
				srid,
				dimension,
			)
		case "MultiLineString":
			return MultiLineString.make(
				readChildren(reader, options, child, "LineString"),
				srid,
				dimension,
			)
		case "MultiPolygon":
			return MultiPolygon.make(
				readChildren(reader, options, child, "Polygon"),
				srid,
				dimension,
			)
		case "GeometryCollection": {
			const count = reader.readCount(MIN_GEOMETRY_BYTES, "geometry")
			const geometries: Geometry[] = []
			for (let i = 0; i < count; i++) {
				geometries.push(readGeometry(reader, options, child))
			}
			return GeometryCollection.make(geometries, srid, dimension)
		}
		default:
			return assertNever(header.type)
	}
}

function readPoint(
	reader: WkbReader,
	dimension: Dimension,
	srid: number | undefined,
): Point {
	const x = reader.readDouble()
	const y = reader.readDouble()
	const z = hasZDimension(dimension) ? reader.readDouble() : undefined
	const m = isMeasured(dimension) ? reader.readDouble() : undefined
	return Point.make(x, y, z, m, srid)
}

function readPoints(
	reader: WkbReader,
	dimension: Dimension,
	srid: number | undefined,
): Point[] {
	const count = reader.readCount(coordinateCount(dimension) * 8, "point")
	const points: Point[] = []
	for (let i = 0; i < count; i++) {
		points.push(readPoint(reader, dimension, srid))
	}
	return points
}

function readPolygon(
	reader: WkbReader,
	options: WkbParseOptions,
	dimension: Dimension,
	srid: number | undefined,
): Polygon {
	const count = reader.readCount(4, "ring")
	const rings: LineString[] = []
	for (let i = 0; i < count; i++) {
		const start = reader.offset
		const ring = LineString.make(
			readPoints(reader, dimension, srid),
			srid,
			dimension,
		)
		if (options.strictRings) assertValidRing(ring, i, start)
		rings.push(ring)
	}
	return Polygon.make(rings, srid, dimension)
}

function assertValidRing(ring: LineString, index: number, offset: number) {
	if (ring.length < 4) {
		throw new MalformedWkbError(
			`ring ${index} has ${ring.length} points, at least 4 are required`,
			offset,
		)
	}
	if (!ring.isClosed()) {
		throw new MalformedWkbError(`ring ${index} is not closed`, offset)
	}
}

/**
 * Read the counted child geometries of a Multi* geometry, each a complete
 * WKB geometry of the given type.
 */
function readChildren<T extends "Point" | "LineString" | "Polygon">(
	reader: WkbReader,
	options: WkbParseOptions,
	inherited: Inherited,
	type: T,
): GeometryOfType<T>[] {
	const count = reader.readCount(MIN_GEOMETRY_BYTES, type)
	const children: GeometryOfType<T>[] = []
	for (let i = 0; i < count; i++) {
		const start = reader.offset
		const child = readGeometry(reader, options, inherited)
		if (!isGeometryOfType(child, type)) {
			throw new MalformedWkbError(
				`expected ${type} but found ${child.type}`,
				start,
			)
		}
		children.push(child)
	}
	return children
}

function isGeometryOfType<T extends GeometryType>(
	geometry: Geometry,
	type: T,
): geometry is GeometryOfType<T> {
	return geometry.type === type
}
