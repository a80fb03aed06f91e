/**
 * @postgeo/wkb - PostGIS Extended Well-Known Binary codec.
 *
 * Decodes EWKB (as bytes or the hex text PostGIS returns) into the
 * `@postgeo/geometry` model and encodes geometries back to EWKB.
 *
 * @example
 * ```ts
 * import { parseWkb, toWkbHex } from "@postgeo/wkb"
 *
 * const geometry = parseWkb(row.location)
 * const hex = toWkbHex(geometry)
 * ```
 *
 * @module @postgeo/wkb
 */

export * from "./constants"
export * from "./hex"
export * from "./wkb-parser"
export * from "./wkb-reader"
export * from "./wkb-writer"
