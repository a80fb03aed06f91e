/**
 * EWKB encoding.
 *
 * Writes geometries as PostGIS Extended Well-Known Binary. The SRID is stored
 * once, on the root geometry; Z and M flags are set on every level. Empty
 * points are written with NaN coordinates, like PostGIS does.
 *
 * @module
 */

import {
	assertChildDimension,
	coordinateCount,
	type Geometry,
	hasZDimension,
	isMeasured,
	type LineString,
	type Point,
} from "@postgeo/geometry"
import { assertNever } from "@postgeo/shared/assert"
import {
	BIG_ENDIAN,
	EWKB_M_FLAG,
	EWKB_SRID_FLAG,
	EWKB_Z_FLAG,
	LITTLE_ENDIAN,
	WKB_TYPE_CODES,
} from "./constants"
import { bytesToHex } from "./hex"

export interface WkbWriteOptions {
	/** Byte order of every multi-byte value. Default: true. */
	littleEndian?: boolean
	/** Write the SRID (when there is one). Default: true. */
	includeSrid?: boolean
	/** Write this SRID instead of the geometry's own. */
	srid?: number
}

/**
 * Encode a geometry as EWKB bytes.
 */
export function toWkb(
	geometry: Geometry,
	options: WkbWriteOptions = {},
): Uint8Array {
	const littleEndian = options.littleEndian ?? true
	const srid =
		(options.includeSrid ?? true)
			? (options.srid ?? geometry.getSrid())
			: undefined

	const bytes = new Uint8Array(encodedSize(geometry, srid !== undefined))
	const writer = new WkbWriter(bytes, littleEndian)
	writer.writeGeometry(geometry, srid)
	return bytes
}

/**
 * Encode a geometry as uppercase EWKB hex, the text PostGIS returns for
 * geometry columns.
 */
export function toWkbHex(
	geometry: Geometry,
	options: WkbWriteOptions = {},
): string {
	return bytesToHex(toWkb(geometry, options))
}

/**
 * Byte length of the EWKB encoding of a geometry.
 *
 * @throws InvalidGeometryError when a child's dimension differs from its
 * parent's, as happens after changing z or m of a point inside a composite.
 */
export function encodedSize(geometry: Geometry, withSrid = false): number {
	const header = 1 + 4 + (withSrid ? 4 : 0)
	const tuple = coordinateCount(geometry.dimension) * 8
	switch (geometry.type) {
		case "Point":
			return header + tuple
		case "LineString":
			return header + 4 + pointsSize(geometry, tuple)
		case "Polygon":
			return geometry.getLineStrings().reduce((size, ring) => {
				assertChildDimension(geometry, ring)
				return size + 4 + pointsSize(ring, tuple)
			}, header + 4)
		case "MultiPoint":
			return sumChildren(geometry, header, geometry.getPoints())
		case "MultiLineString":
			return sumChildren(geometry, header, geometry.getLineStrings())
		case "MultiPolygon":
			return sumChildren(geometry, header, geometry.getPolygons())
		case "GeometryCollection":
			return sumChildren(geometry, header, geometry.getGeometries())
		default:
			return assertNever(geometry)
	}
}

function pointsSize(line: LineString, tuple: number): number {
	for (const point of line.getPoints()) assertChildDimension(line, point)
	return line.length * tuple
}

function sumChildren(
	parent: Geometry,
	header: number,
	children: readonly Geometry[],
): number {
	return children.reduce((size, child) => {
		assertChildDimension(parent, child)
		return size + encodedSize(child)
	}, header + 4)
}

class WkbWriter {
	private readonly view: DataView
	private readonly littleEndian: boolean
	private offset = 0

	constructor(bytes: Uint8Array, littleEndian: boolean) {
		this.littleEndian = littleEndian
		this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
	}

	writeGeometry(geometry: Geometry, srid?: number) {
		this.writeHeader(geometry, srid)
		switch (geometry.type) {
			case "Point":
				this.writeCoordinates(geometry)
				break
			case "LineString":
				this.writePoints(geometry)
				break
			case "Polygon": {
				const rings = geometry.getLineStrings()
				this.writeUint32(rings.length)
				for (const ring of rings) {
					assertChildDimension(geometry, ring)
					this.writePoints(ring)
				}
				break
			}
			case "MultiPoint":
				this.writeChildren(geometry, geometry.getPoints())
				break
			case "MultiLineString":
				this.writeChildren(geometry, geometry.getLineStrings())
				break
			case "MultiPolygon":
				this.writeChildren(geometry, geometry.getPolygons())
				break
			case "GeometryCollection":
				this.writeChildren(geometry, geometry.getGeometries())
				break
			default:
				assertNever(geometry)
		}
	}

	private writeHeader(geometry: Geometry, srid: number | undefined) {
		let word: number = WKB_TYPE_CODES[geometry.type]
		if (hasZDimension(geometry.dimension)) word |= EWKB_Z_FLAG
		if (isMeasured(geometry.dimension)) word |= EWKB_M_FLAG
		if (srid !== undefined) word |= EWKB_SRID_FLAG

		const byteOrder = this.littleEndian ? LITTLE_ENDIAN : BIG_ENDIAN
		this.view.setUint8(this.offset, byteOrder)
		this.offset += 1
		this.writeUint32(word >>> 0)
		if (srid !== undefined) {
			this.view.setInt32(this.offset, srid, this.littleEndian)
			this.offset += 4
		}
	}

	private writeChildren(parent: Geometry, children: readonly Geometry[]) {
		this.writeUint32(children.length)
		for (const child of children) {
			assertChildDimension(parent, child)
			this.writeGeometry(child)
		}
	}

	private writePoints(line: LineString) {
		const points = line.getPoints()
		this.writeUint32(points.length)
		for (const point of points) {
			assertChildDimension(line, point)
			this.writeCoordinates(point)
		}
	}

	private writeCoordinates(point: Point) {
		this.writeDouble(point.getX())
		this.writeDouble(point.getY())
		const z = point.getZ()
		const m = point.getM()
		if (z !== undefined) this.writeDouble(z)
		if (m !== undefined) this.writeDouble(m)
	}

	private writeUint32(value: number) {
		this.view.setUint32(this.offset, value, this.littleEndian)
		this.offset += 4
	}

	private writeDouble(value: number) {
		this.view.setFloat64(this.offset, value, this.littleEndian)
		this.offset += 8
	}
}
