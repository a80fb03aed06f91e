/**
 * Point geometry.
 *
 * The only mutable variant: coordinates can be changed in place, and changing
 * z or m re-derives the dimension. Points in WGS 84 additionally expose
 * latitude/longitude/altitude accessors.
 *
 * @module
 */

import { GeodeticMismatchError } from "@postgeo/shared/errors"
import { WGS84_SRID } from "@postgeo/shared/types"
import {
	Dimension,
	fromCoordinates,
	hasZDimension,
	isMeasured,
} from "./dimension"
import { BaseGeometry } from "./geometry"

export class Point extends BaseGeometry<"Point"> {
	readonly type = "Point" as const
	private x: number
	private y: number
	private z: number | undefined
	private m: number | undefined

	/**
	 * Create a point. The dimension follows from which of `z` and `m` are given.
	 *
	 * @example
	 * ```ts
	 * Point.make(1, 2) // 2D
	 * Point.make(1, 2, null, 7, 3857) // M, SRID 3857
	 * ```
	 */
	static make(
		x: number,
		y: number,
		z?: number | null,
		m?: number | null,
		srid?: number,
	): Point {
		return new Point(x, y, z ?? undefined, m ?? undefined, srid)
	}

	/**
	 * Create a point in WGS 84 (SRID 4326) from latitude and longitude.
	 * Longitude becomes x and latitude becomes y.
	 */
	static makeGeodetic(
		latitude: number,
		longitude: number,
		altitude?: number | null,
		m?: number | null,
	): Point {
		return new Point(
			longitude,
			latitude,
			altitude ?? undefined,
			m ?? undefined,
			WGS84_SRID,
		)
	}

	/**
	 * Create an empty point: every coordinate the dimension declares is NaN.
	 */
	static makeEmpty(srid?: number, dimension: Dimension = Dimension.D2): Point {
		return new Point(
			Number.NaN,
			Number.NaN,
			hasZDimension(dimension) ? Number.NaN : undefined,
			isMeasured(dimension) ? Number.NaN : undefined,
			srid,
		)
	}

	private constructor(
		x: number,
		y: number,
		z: number | undefined,
		m: number | undefined,
		srid: number | undefined,
	) {
		super(srid, fromCoordinates(x, y, z, m))
		this.x = x
		this.y = y
		this.z = z
		this.m = m
	}

	isEmpty(): boolean {
		return Number.isNaN(this.x) && Number.isNaN(this.y)
	}

	getX(): number {
		return this.x
	}

	setX(x: number): void {
		this.x = x
	}

	getY(): number {
		return this.y
	}

	setY(y: number): void {
		this.y = y
	}

	getZ(): number | undefined {
		return this.z
	}

	setZ(z: number | null | undefined): void {
		this.z = z ?? undefined
		this.updateDimension()
	}

	getM(): number | undefined {
		return this.m
	}

	setM(m: number | null | undefined): void {
		this.m = m ?? undefined
		this.updateDimension()
	}

	private updateDimension() {
		this.currentDimension = fromCoordinates(this.x, this.y, this.z, this.m)
	}

	// Geodetic accessors, only for WGS 84 or unspecified SRIDs.

	isGeodetic(): boolean {
		return (
			this.srid === undefined || this.srid === WGS84_SRID || this.srid === 0
		)
	}

	getLatitude(): number {
		this.assertGeodetic()
		return this.y
	}

	setLatitude(latitude: number): void {
		this.assertGeodetic()
		this.y = latitude
	}

	getLongitude(): number {
		this.assertGeodetic()
		return this.x
	}

	setLongitude(longitude: number): void {
		this.assertGeodetic()
		this.x = longitude
	}

	getAltitude(): number | undefined {
		this.assertGeodetic()
		return this.z
	}

	setAltitude(altitude: number | null | undefined): void {
		this.assertGeodetic()
		this.setZ(altitude)
	}

	private assertGeodetic() {
		if (!this.isGeodetic()) throw new GeodeticMismatchError(this.srid)
	}
}
