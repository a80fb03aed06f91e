/**
 * Type definitions for PostGIS column handling.
 * @module
 */

import type { Geometry } from "@postgeo/geometry"
import type { PostgisType } from "@postgeo/shared/types"
import type { WkbParseOptions } from "@postgeo/wkb"
import type { SqlGenerator } from "@postgeo/wkt"

/** Storage kind and SRID of one column. */
export interface ColumnConfig {
	type: PostgisType
	srid: number
}

/**
 * Column declarations: a list of names using the default configuration, or a
 * map from name to (partial) configuration.
 */
export type ColumnDefinitions =
	| readonly string[]
	| Readonly<Record<string, Partial<ColumnConfig>>>

/** Settings shared by every column. */
export interface PostgisSettings {
	/** Schema that qualifies PostGIS function names. Default: "public". */
	schema: string
	/** Column type when a column does not declare one. Default: "geometry". */
	defaultType: PostgisType
	/** Column SRID when a column does not declare one. Default: 4326. */
	defaultSrid: number
	/**
	 * Wrap geometries whose SRID differs from their column in `ST_Transform`
	 * instead of failing. Default: false.
	 */
	transformToDatabaseProjection: boolean
	/** Generator that turns geometries into SQL. Default: `WktGenerator`. */
	generator: SqlGenerator
	/** Options for decoding values read from the database. */
	parseOptions: WkbParseOptions
}

/** Attribute values keyed by column name. */
export type Attributes = Record<string, unknown>

/** Result of encoding attributes for a write. */
export interface EncodedAttributes {
	/** Attributes with every geometry replaced by its SQL expression. */
	attributes: Attributes
	/** The original geometries, keyed by column, for restoring afterwards. */
	geometries: Record<string, Geometry>
}
