import { InvalidGeometryError } from "@postgeo/shared/errors"
import { describe, expect, it } from "vitest"
import { Dimension } from "../src/dimension"
import { GeometryCollection } from "../src/geometry-collection"
import { LineString } from "../src/line-string"
import { MultiLineString } from "../src/multi-line-string"
import { MultiPoint } from "../src/multi-point"
import { MultiPolygon } from "../src/multi-polygon"
import { Point } from "../src/point"
import { Polygon } from "../src/polygon"
import { geometryEquals, isGeometry } from "../src/utils"

const square = (srid?: number) =>
	LineString.make(
		[
			Point.make(0, 0),
			Point.make(1, 0),
			Point.make(1, 1),
			Point.make(0, 1),
			Point.make(0, 0),
		],
		srid,
	)

describe("composite geometries", () => {
	it("takes the dimension of its children", () => {
		const line = LineString.make([Point.make(0, 0, 1), Point.make(1, 1, 2)])
		expect(line.dimension).toBe(Dimension.Z)
		expect(line.is3d()).toBe(true)
		expect(line.isEmpty()).toBe(false)
		expect(line.length).toBe(2)
	})

	it("rejects children with mixed dimensions", () => {
		expect(() =>
			LineString.make([Point.make(0, 0), Point.make(1, 1, 2)]),
		).toThrow(InvalidGeometryError)
		expect(() =>
			LineString.make([Point.make(0, 0), Point.make(1, 1, 2)]),
		).toThrow("Invalid LineString: mixed dimensions 2D and Z")
	})

	it("rejects an explicit dimension that disagrees with the children", () => {
		expect(() =>
			MultiPoint.make([Point.make(0, 0)], undefined, Dimension.M),
		).toThrow("Invalid MultiPoint: requested dimension M but children are 2D")
	})

	it("uses the requested dimension when empty", () => {
		expect(LineString.makeEmpty().dimension).toBe(Dimension.D2)
		const empty = Polygon.makeEmpty(4326, Dimension.ZM)
		expect(empty.isEmpty()).toBe(true)
		expect(empty.dimension).toBe(Dimension.ZM)
		expect(empty.getSrid()).toBe(4326)
	})

	it("shares its SRID with every descendant", () => {
		const polygon = Polygon.make([square()])
		const multi = MultiPolygon.make([polygon], 3857)
		expect(multi.getSrid()).toBe(3857)
		expect(polygon.getSrid()).toBe(3857)
		const ring = polygon.getExteriorRing()
		expect(ring?.getSrid()).toBe(3857)
		expect(ring?.getPoints()[2]?.getSrid()).toBe(3857)
	})

	it("inherits the SRID of its children when none is given", () => {
		const line = LineString.make([
			Point.make(0, 0, null, null, 31467),
			Point.make(1, 1),
		])
		expect(line.getSrid()).toBe(31467)
		expect(line.getPoints()[1]?.getSrid()).toBe(31467)
	})

	it("rejects children with a conflicting SRID", () => {
		expect(() =>
			MultiPoint.make([Point.make(0, 0, null, null, 4326)], 3857),
		).toThrow("Invalid Point: SRID 4326 conflicts with enclosing SRID 3857")
	})

	it("leaves its children untouched when construction fails", () => {
		const first = Point.make(0, 0)
		const conflicting = Point.make(1, 1, null, null, 3857)
		expect(() => LineString.make([first, conflicting], 4326)).toThrow(
			"Invalid Point: SRID 3857 conflicts with enclosing SRID 4326",
		)
		expect(first.hasSrid()).toBe(false)

		const ring = square()
		const nested = Polygon.make([square(3857)])
		expect(() =>
			MultiPolygon.make([Polygon.make([ring]), nested], 4326),
		).toThrow(InvalidGeometryError)
		expect(ring.hasSrid()).toBe(false)
		expect(ring.getPoints()[0]?.hasSrid()).toBe(false)
	})

	it("copies the list of children", () => {
		const points = [Point.make(0, 0)]
		const multi = MultiPoint.make(points)
		points.push(Point.make(1, 1, 9))
		expect(multi.length).toBe(1)
		expect(multi.getPoints()).toHaveLength(1)
		expect(multi.dimension).toBe(Dimension.D2)
	})

	it("splits polygon rings into exterior and holes", () => {
		const hole = LineString.make([
			Point.make(0.2, 0.2),
			Point.make(0.4, 0.2),
			Point.make(0.4, 0.4),
			Point.make(0.2, 0.2),
		])
		const exterior = square()
		const polygon = Polygon.make([exterior, hole])
		expect(polygon.getExteriorRing()).toBe(exterior)
		expect(polygon.getInteriorRings()).toEqual([hole])
		expect(polygon.getLineStrings()).toHaveLength(2)
	})

	it("detects closed line strings", () => {
		expect(square().isClosed()).toBe(true)
		expect(
			LineString.make([Point.make(0, 0), Point.make(1, 1)]).isClosed(),
		).toBe(false)
		expect(LineString.makeEmpty().isClosed()).toBe(false)
	})

	it("nests heterogeneous geometries in collections", () => {
		const inner = GeometryCollection.make([Point.make(5, 5)])
		const collection = GeometryCollection.make(
			[
				Point.make(1, 2),
				MultiLineString.make([square()]),
				inner,
			],
			4326,
		)
		expect(collection.getGeometries().map((g) => g.type)).toEqual([
			"Point",
			"MultiLineString",
			"GeometryCollection",
		])
		expect(inner.getGeometries()[0]?.getSrid()).toBe(4326)
		expect(GeometryCollection.makeEmpty().isEmpty()).toBe(true)
	})
})

describe("geometryEquals", () => {
	it("compares structure, SRID and coordinates", () => {
		expect(geometryEquals(square(4326), square(4326))).toBe(true)
		expect(geometryEquals(square(4326), square(3857))).toBe(false)
		expect(geometryEquals(Point.make(1, 2), Point.make(1, 2, 0))).toBe(false)
		expect(
			geometryEquals(MultiPoint.makeEmpty(), LineString.makeEmpty()),
		).toBe(false)
	})

	it("treats empty points as equal", () => {
		expect(
			geometryEquals(
				Point.makeEmpty(4326, Dimension.Z),
				Point.makeEmpty(4326, Dimension.Z),
			),
		).toBe(true)
	})

	it("recognizes geometries", () => {
		expect(isGeometry(Point.make(1, 2))).toBe(true)
		expect(isGeometry({ type: "Point" })).toBe(false)
		expect(isGeometry(null)).toBe(false)
	})
})
