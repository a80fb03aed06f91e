/**
 * Error taxonomy.
 *
 * Every failure in the codec and column layer is raised as one of these
 * classes. Messages name the offending value (SRID, column, variant) and the
 * same value is kept on the error as a property.
 *
 * @module
 */

/** Base class of every error thrown by postgeo packages. */
export class PostgeoError extends Error {
	constructor(message: string) {
		super(message)
		this.name = new.target.name
	}
}

/**
 * The EWKB input could not be decoded: truncated buffer, unknown shape code,
 * impossible element count, bad hex text or trailing bytes.
 */
export class MalformedWkbError extends PostgeoError {
	/** Byte offset at which decoding failed. */
	readonly offset: number

	constructor(message: string, offset: number) {
		super(`Malformed WKB at byte ${offset}: ${message}`)
		this.offset = offset
	}
}

/** A geometry collection was routed to a geography column. */
export class UnsupportedGeometryForGeographyError extends PostgeoError {
	readonly geometryType: string
	readonly column: string | undefined

	constructor(geometryType: string, column?: string) {
		super(
			column === undefined
				? `${geometryType} cannot be stored as geography`
				: `${geometryType} cannot be stored in geography column '${column}'`,
		)
		this.geometryType = geometryType
		this.column = column
	}
}

/** Geometry and column SRIDs differ and transforming is off. */
export class SridMismatchError extends PostgeoError {
	readonly expected: number
	readonly actual: number

	constructor(expected: number, actual: number) {
		super(
			`SRID mismatch: column expects ${expected} but geometry has ${actual}. Enable transformToDatabaseProjection to transform it.`,
		)
		this.expected = expected
		this.actual = actual
	}
}

/** A latitude/longitude/altitude accessor was used on a non-geodetic point. */
export class GeodeticMismatchError extends PostgeoError {
	readonly srid: number | undefined

	constructor(srid: number | undefined) {
		super(
			`Geodetic accessors require SRID 4326, 0 or no SRID, but the point has SRID ${srid}`,
		)
		this.srid = srid
	}
}

/** A column was requested that has no configuration. */
export class MissingColumnConfigurationError extends PostgeoError {
	readonly column: string

	constructor(column: string) {
		super(`Column '${column}' is not configured as a PostGIS column`)
		this.column = column
	}
}

/**
 * A geometry breaks a structural rule: mixed child dimensions, a child with a
 * conflicting SRID, or a coordinate that cannot be rendered.
 */
export class InvalidGeometryError extends PostgeoError {
	readonly geometryType: string

	constructor(geometryType: string, message: string) {
		super(`Invalid ${geometryType}: ${message}`)
		this.geometryType = geometryType
	}
}
