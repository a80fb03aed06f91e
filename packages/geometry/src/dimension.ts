/**
 * Coordinate dimension of a geometry.
 *
 * A dimension is always derived from which optional components a coordinate
 * carries, never set on its own.
 *
 * @module
 */

export const Dimension = {
	D2: "2D",
	Z: "Z",
	M: "M",
	ZM: "ZM",
} as const

export type Dimension = (typeof Dimension)[keyof typeof Dimension]

/**
 * Classify a coordinate by the presence of its optional z and m components.
 * Only presence counts: `NaN` is a present value.
 */
export function fromCoordinates(
	_x: number,
	_y: number,
	z?: number | null,
	m?: number | null,
): Dimension {
	return dimensionFromFlags(z != null, m != null)
}

export function dimensionFromFlags(hasZ: boolean, hasM: boolean): Dimension {
	if (hasZ && hasM) return Dimension.ZM
	if (hasZ) return Dimension.Z
	if (hasM) return Dimension.M
	return Dimension.D2
}

export function hasZDimension(dimension: Dimension): boolean {
	return dimension === Dimension.Z || dimension === Dimension.ZM
}

export function isMeasured(dimension: Dimension): boolean {
	return dimension === Dimension.M || dimension === Dimension.ZM
}

/** Number of doubles per coordinate tuple (2 to 4). */
export function coordinateCount(dimension: Dimension): number {
	return (
		2 + (hasZDimension(dimension) ? 1 : 0) + (isMeasured(dimension) ? 1 : 0)
	)
}
