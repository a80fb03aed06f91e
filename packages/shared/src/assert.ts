/**
 * Assertion utilities.
 *
 * @module
 */

/**
 * Fails the type-check when a union has a case the caller did not handle, and
 * throws if a value slips past it at run time.
 *
 * @example
 * ```ts
 * switch (geometry.type) {
 *   case "Point": ...
 *   default: assertNever(geometry)
 * }
 * ```
 */
export function assertNever(value: never, message?: string): never {
	throw Error(message ?? `Unexpected value: ${String(value)}`)
}
