/**
 * Geometry utilities.
 *
 * @module
 */

import { dequal } from "dequal/lite"
import { BaseGeometry } from "./geometry"
import type { Geometry } from "./types"

/** Type guard: check if a value is one of the geometry variants. */
export function isGeometry(value: unknown): value is Geometry {
	return value instanceof BaseGeometry
}

/**
 * Deep structural equality of two geometries: variant, SRID, dimension and
 * every coordinate. NaN equals NaN, so empty points compare equal.
 */
export function geometryEquals(a: Geometry, b: Geometry): boolean {
	return dequal(a, b)
}
