/**
 * Coordination between model attributes and the codec.
 *
 * Decides how a geometry is written to a given column (geometry or geography
 * constructor, SRID check or transform) and decodes values read back from the
 * database. Executing SQL is left to the caller.
 *
 * @module
 */

import { type Geometry, isGeometry } from "@postgeo/geometry"
import {
	MissingColumnConfigurationError,
	SridMismatchError,
	UnsupportedGeometryForGeographyError,
} from "@postgeo/shared/errors"
import {
	logProgress,
	type ProgressEvent,
	progressEvent,
} from "@postgeo/shared/progress"
import { WGS84_SRID } from "@postgeo/shared/types"
import { parseWkb } from "@postgeo/wkb"
import { qualify, WktGenerator } from "@postgeo/wkt"
import type {
	Attributes,
	ColumnConfig,
	ColumnDefinitions,
	EncodedAttributes,
	PostgisSettings,
} from "./types"

/**
 * PostGIS columns of one table or model.
 *
 * @example
 * ```ts
 * const columns = new PostgisColumns({
 *   location: { type: "geography" },
 *   area: { srid: 25832 },
 * })
 * columns.toSql("location", Point.makeGeodetic(52.5, 13.4))
 * // public.ST_GeogFromText('SRID=4326;POINT(13.4 52.5)')
 * ```
 */
export class PostgisColumns {
	readonly settings: PostgisSettings
	private readonly columns: Map<string, ColumnConfig>
	private readonly onProgress: (progress: ProgressEvent) => void

	constructor(
		columns: ColumnDefinitions,
		settings: Partial<PostgisSettings> = {},
		onProgress: (progress: ProgressEvent) => void = logProgress,
	) {
		this.settings = {
			schema: settings.schema ?? "public",
			defaultType: settings.defaultType ?? "geometry",
			defaultSrid: settings.defaultSrid ?? WGS84_SRID,
			transformToDatabaseProjection:
				settings.transformToDatabaseProjection ?? false,
			generator: settings.generator ?? new WktGenerator(),
			parseOptions: settings.parseOptions ?? {},
		}
		this.onProgress = onProgress
		this.columns = new Map(
			isColumnList(columns)
				? columns.map((name): [string, ColumnConfig] => [
						name,
						this.resolveConfig({}),
					])
				: Object.entries(columns).map(
						([name, config]): [string, ColumnConfig] => [
							name,
							this.resolveConfig(config),
						],
					),
		)
	}

	getColumnNames(): string[] {
		return Array.from(this.columns.keys())
	}

	hasColumn(key: string): boolean {
		return this.columns.has(key)
	}

	/**
	 * @throws MissingColumnConfigurationError if the column is not declared.
	 */
	getColumnConfig(key: string): ColumnConfig {
		const config = this.columns.get(key)
		if (config === undefined) throw new MissingColumnConfigurationError(key)
		return config
	}

	/**
	 * SQL expression that writes a geometry to a column.
	 *
	 * A geometry without an SRID takes the column's. A geometry with a
	 * different SRID is transformed when `transformToDatabaseProjection` is
	 * set and rejected otherwise.
	 *
	 * @throws UnsupportedGeometryForGeographyError for a collection headed to a
	 * geography column.
	 * @throws SridMismatchError when the SRIDs differ and transforming is off.
	 */
	toSql(key: string, geometry: Geometry): string {
		const column = this.getColumnConfig(key)
		const { generator, schema } = this.settings
		if (
			column.type === "geography" &&
			geometry.type === "GeometryCollection"
		) {
			throw new UnsupportedGeometryForGeographyError(geometry.type, key)
		}

		const srid = geometry.getSrid() ?? column.srid
		if (srid === column.srid) {
			return column.type === "geometry"
				? generator.toGeometrySql(geometry, schema, srid)
				: generator.toGeographySql(geometry, schema, srid)
		}
		if (!this.settings.transformToDatabaseProjection) {
			throw new SridMismatchError(column.srid, srid)
		}

		this.onProgress(
			progressEvent(
				`Transforming '${key}' from SRID ${srid} to ${column.srid}`,
			),
		)
		// ST_Transform takes a geometry: geography columns get the cast after.
		const sql = generator.toGeometrySql(geometry, schema, srid)
		const transformed = `${qualify(schema, "ST_Transform")}(${sql}, ${column.srid})`
		return column.type === "geometry"
			? transformed
			: `${qualify(schema, "geography")}(${transformed})`
	}

	/**
	 * Replace every geometry attribute with its SQL expression. The input is
	 * left untouched; the original geometries are returned alongside.
	 *
	 * @throws MissingColumnConfigurationError for a geometry in an undeclared
	 * column.
	 */
	encodeAttributes(attributes: Attributes): EncodedAttributes {
		const encoded: Attributes = { ...attributes }
		const geometries: Record<string, Geometry> = {}
		for (const [key, value] of Object.entries(attributes)) {
			if (!isGeometry(value)) continue
			encoded[key] = this.toSql(key, value)
			geometries[key] = value
		}
		return { attributes: encoded, geometries }
	}

	/** Put the original geometries back after a write. */
	restoreAttributes(
		attributes: Attributes,
		geometries: Record<string, Geometry>,
	): Attributes {
		return { ...attributes, ...geometries }
	}

	/**
	 * Decode the EWKB values (hex text or bytes) of every declared column in a
	 * row read from the database. Other values are passed through.
	 */
	decodeAttributes(row: Attributes): Attributes {
		const decoded: Attributes = { ...row }
		for (const key of this.columns.keys()) {
			const value = row[key]
			if (typeof value === "string" || value instanceof Uint8Array) {
				decoded[key] = parseWkb(value, this.settings.parseOptions)
			}
		}
		return decoded
	}

	private resolveConfig(config: Partial<ColumnConfig>): ColumnConfig {
		return {
			type: config.type ?? this.settings.defaultType,
			srid: config.srid ?? this.settings.defaultSrid,
		}
	}
}

function isColumnList(
	columns: ColumnDefinitions,
): columns is readonly string[] {
	return Array.isArray(columns)
}
