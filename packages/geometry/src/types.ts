import type { GeometryCollection } from "./geometry-collection"
import type { LineString } from "./line-string"
import type { MultiLineString } from "./multi-line-string"
import type { MultiPoint } from "./multi-point"
import type { MultiPolygon } from "./multi-polygon"
import type { Point } from "./point"
import type { Polygon } from "./polygon"

export type GeometryType =
	| "Point"
	| "LineString"
	| "Polygon"
	| "MultiPoint"
	| "MultiLineString"
	| "MultiPolygon"
	| "GeometryCollection"

/**
 * The closed set of geometry variants. Switch on `type` to narrow.
 */
export type Geometry =
	| Point
	| LineString
	| Polygon
	| MultiPoint
	| MultiLineString
	| MultiPolygon
	| GeometryCollection

export type GeometryOfType<T extends GeometryType> = Extract<
	Geometry,
	{ type: T }
>
