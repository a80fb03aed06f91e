import {
	Dimension,
	GeometryCollection,
	LineString,
	MultiPoint,
	Point,
	Polygon,
} from "@postgeo/geometry"
import { MalformedWkbError } from "@postgeo/shared/errors"
import { describe, expect, it } from "vitest"
import { parseTypeWord, parseWkb } from "../src/wkb-parser"
import { byteOrder, f64, i32, point2d, u32, wkb } from "./helpers"

const POINT_4326_HEX = "0101000020E610000033333333333322409A99999999594840"

describe("parseWkb", () => {
	it("decodes a 2D point with SRID", () => {
		const bytes = wkb([
			byteOrder(),
			u32(0x20000001),
			i32(4326),
			f64(9.1),
			f64(48.7),
		])
		const geometry = parseWkb(bytes)

		expect(geometry.type).toBe("Point")
		if (geometry.type !== "Point") return
		expect(geometry.getX()).toBe(9.1)
		expect(geometry.getY()).toBe(48.7)
		expect(geometry.getSrid()).toBe(4326)
		expect(geometry.dimension).toBe(Dimension.D2)
		expect(geometry.getZ()).toBeUndefined()
		expect(geometry.getM()).toBeUndefined()
	})

	it("decodes hex text as PostGIS returns it", () => {
		const upper = parseWkb(POINT_4326_HEX)
		const bytea = parseWkb(`\\x${POINT_4326_HEX.toLowerCase()}`)
		expect(upper).toEqual(Point.make(9.1, 48.7, null, null, 4326))
		expect(bytea).toEqual(upper)
	})

	it("decodes big endian input", () => {
		const bytes = wkb(
			[byteOrder(false), u32(1), f64(-122.4194), f64(37.7749)],
			false,
		)
		expect(parseWkb(bytes)).toEqual(Point.make(-122.4194, 37.7749))
	})

	it("reads Z and M from EWKB flags", () => {
		const z = parseWkb(
			wkb([
				byteOrder(),
				u32(0xa0000001),
				i32(3857),
				f64(1),
				f64(2),
				f64(3),
			]),
		)
		expect(z).toEqual(Point.make(1, 2, 3, null, 3857))

		const m = parseWkb(
			wkb([byteOrder(), u32(0x40000001), f64(1), f64(2), f64(4)]),
		)
		expect(m.dimension).toBe(Dimension.M)
		expect(m).toEqual(Point.make(1, 2, null, 4))

		const zm = parseWkb(
			wkb([byteOrder(), u32(0xc0000001), f64(1), f64(2), f64(3), f64(4)]),
		)
		expect(zm).toEqual(Point.make(1, 2, 3, 4))
	})

	it("reads Z and M from ISO type codes", () => {
		const zm = parseWkb(
			wkb([byteOrder(false), u32(3001), f64(1), f64(2), f64(3), f64(4)], false),
		)
		expect(zm.dimension).toBe(Dimension.ZM)
		const line = parseWkb(
			wkb([byteOrder(), u32(1002), u32(1), f64(1), f64(2), f64(3)]),
		)
		expect(line).toEqual(LineString.make([Point.make(1, 2, 3)]))
	})

	it("decodes an empty point from NaN coordinates", () => {
		const geometry = parseWkb(
			wkb([byteOrder(), u32(1), f64(Number.NaN), f64(Number.NaN)]),
		)
		expect(geometry.isEmpty()).toBe(true)
		expect(geometry).toEqual(Point.makeEmpty())
	})

	it("decodes polygons ring by ring", () => {
		const ring = [0, 0, 4, 0, 4, 4, 0, 0].map(f64)
		const hole = [1, 1, 2, 1, 2, 2, 1, 1].map(f64)
		const geometry = parseWkb(
			wkb([
				byteOrder(),
				u32(0x20000003),
				i32(4326),
				u32(2),
				u32(4),
				...ring,
				u32(4),
				...hole,
			]),
		)

		expect(geometry.type).toBe("Polygon")
		if (geometry.type !== "Polygon") return
		expect(geometry.getSrid()).toBe(4326)
		expect(geometry.getLineStrings()).toHaveLength(2)
		expect(geometry.getExteriorRing()?.getPoints()[1]?.getX()).toBe(4)
		expect(geometry.getInteriorRings()[0]?.getPoints()[2]?.getY()).toBe(2)
		expect(geometry.getInteriorRings()[0]?.getSrid()).toBe(4326)
	})

	it("passes the root SRID down to nested geometries", () => {
		const bytes = wkb([
			byteOrder(),
			u32(0x20000007),
			i32(31467),
			u32(2),
			...point2d(1, 2),
			byteOrder(),
			u32(4),
			u32(2),
			...point2d(3, 4),
			...point2d(5, 6),
		])
		const geometry = parseWkb(bytes)

		expect(geometry).toEqual(
			GeometryCollection.make(
				[
					Point.make(1, 2),
					MultiPoint.make([Point.make(3, 4), Point.make(5, 6)]),
				],
				31467,
			),
		)
		if (geometry.type !== "GeometryCollection") return
		const multi = geometry.getGeometries()[1]
		expect(multi?.getSrid()).toBe(31467)
		if (multi?.type !== "MultiPoint") return
		expect(multi.getPoints()[1]?.getSrid()).toBe(31467)
	})

	it("keeps the dimension of empty composites", () => {
		const geometry = parseWkb(wkb([byteOrder(), u32(0x80000003), u32(0)]))
		expect(geometry).toEqual(Polygon.makeEmpty(undefined, Dimension.Z))
	})

	describe("malformed input", () => {
		it("rejects every truncation of a valid buffer", () => {
			const bytes = wkb([
				byteOrder(),
				u32(0x20000006),
				i32(4326),
				u32(1),
				byteOrder(),
				u32(3),
				u32(1),
				u32(4),
				f64(0),
				f64(0),
				f64(1),
				f64(0),
				f64(1),
				f64(1),
				f64(0),
				f64(0),
			])
			expect(parseWkb(bytes).type).toBe("MultiPolygon")
			for (let length = 0; length < bytes.length; length++) {
				expect(() => parseWkb(bytes.subarray(0, length))).toThrow(
					MalformedWkbError,
				)
			}
		})

		it("reports a missing final coordinate", () => {
			const bytes = wkb([byteOrder(), u32(1), f64(9.1), f64(48.7)])
			expect(() => parseWkb(bytes.subarray(0, 20))).toThrow(
				"Malformed WKB at byte 13: unexpected end of buffer reading double",
			)
		})

		it("rejects unknown shape codes", () => {
			const unknown = new Uint8Array([0x01, 0x64, 0x00, 0x00, 0x00])
			expect(() => parseWkb(unknown)).toThrow(
				"Malformed WKB at byte 1: unknown geometry type code 100",
			)
			expect(() => parseWkb(wkb([byteOrder(), u32(4001)]))).toThrow(
				"unknown geometry type code 4001",
			)
		})

		it("rejects invalid byte order markers", () => {
			const invalid = new Uint8Array([0x02, 0x01, 0x00, 0x00, 0x00])
			expect(() => parseWkb(invalid)).toThrow(
				"Malformed WKB at byte 0: invalid byte order 2",
			)
		})

		it("rejects counts larger than the remaining buffer", () => {
			const bytes = wkb([byteOrder(), u32(2), u32(0xffffffff)])
			expect(() => parseWkb(bytes)).toThrow(
				"Malformed WKB at byte 5: point count 4294967295 exceeds the 0 remaining bytes",
			)
			const collection = wkb([byteOrder(), u32(7), u32(1000), ...point2d(1, 2)])
			expect(() => parseWkb(collection)).toThrow(
				"geometry count 1000 exceeds the 21 remaining bytes",
			)
		})

		it("rejects trailing bytes", () => {
			const bytes = wkb([...point2d(1, 2), ["u8", 0]])
			expect(() => parseWkb(bytes)).toThrow(
				"Malformed WKB at byte 21: 1 unexpected bytes after geometry",
			)
		})

		it("rejects nested geometries with their own SRID", () => {
			const bytes = wkb([
				byteOrder(),
				u32(0x20000004),
				i32(4326),
				u32(1),
				byteOrder(),
				u32(0x20000001),
				i32(4326),
				f64(1),
				f64(2),
			])
			expect(() => parseWkb(bytes)).toThrow(
				"Malformed WKB at byte 14: nested geometry carries its own SRID",
			)
		})

		it("rejects nested geometries with a different dimension", () => {
			const bytes = wkb([
				byteOrder(),
				u32(4),
				u32(1),
				byteOrder(),
				u32(0x80000001),
				f64(1),
				f64(2),
				f64(3),
			])
			expect(() => parseWkb(bytes)).toThrow(
				"Malformed WKB at byte 9: nested Point has dimension Z inside a 2D geometry",
			)
		})

		it("rejects children of the wrong type", () => {
			const bytes = wkb([
				byteOrder(),
				u32(4),
				u32(1),
				byteOrder(),
				u32(2),
				u32(0),
			])
			expect(() => parseWkb(bytes)).toThrow(
				"Malformed WKB at byte 9: expected Point but found LineString",
			)
		})

		it("rejects bad hex text", () => {
			expect(() => parseWkb("010")).toThrow("hex string has odd length 3")
			expect(() => parseWkb("01zz")).toThrow(
				"hex string contains a non-hex character",
			)
		})
	})

	describe("strictRings", () => {
		const openRing = wkb([
			byteOrder(),
			u32(3),
			u32(1),
			u32(4),
			f64(0),
			f64(0),
			f64(1),
			f64(0),
			f64(1),
			f64(1),
			f64(0),
			f64(1),
		])
		const shortRing = wkb([
			byteOrder(),
			u32(3),
			u32(1),
			u32(3),
			f64(0),
			f64(0),
			f64(1),
			f64(0),
			f64(0),
			f64(0),
		])

		it("accepts open rings by default", () => {
			expect(parseWkb(openRing).type).toBe("Polygon")
			expect(parseWkb(shortRing).type).toBe("Polygon")
		})

		it("rejects open and short rings when enabled", () => {
			expect(() => parseWkb(openRing, { strictRings: true })).toThrow(
				"Malformed WKB at byte 9: ring 0 is not closed",
			)
			expect(() => parseWkb(shortRing, { strictRings: true })).toThrow(
				"Malformed WKB at byte 9: ring 0 has 3 points, at least 4 are required",
			)
		})
	})
})

describe("parseTypeWord", () => {
	it("splits the type word into shape and flags", () => {
		expect(parseTypeWord(0xe0000006)).toEqual({
			type: "MultiPolygon",
			dimension: Dimension.ZM,
			hasSrid: true,
		})
		expect(parseTypeWord(2003)).toEqual({
			type: "Polygon",
			dimension: Dimension.M,
			hasSrid: false,
		})
	})
})
