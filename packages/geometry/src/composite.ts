import { InvalidGeometryError } from "@postgeo/shared/errors"
import { Dimension } from "./dimension"
import { BaseGeometry } from "./geometry"
import type { Geometry, GeometryType } from "./types"

/**
 * Resolve the dimension of a composite from its children. Children must all
 * share one dimension. An empty composite uses the requested dimension.
 */
export function uniformDimension(
	type: GeometryType,
	children: readonly Geometry[],
	requested?: Dimension,
): Dimension {
	const first = children[0]
	if (first === undefined) return requested ?? Dimension.D2
	for (const child of children) {
		if (child.dimension !== first.dimension) {
			throw new InvalidGeometryError(
				type,
				`mixed dimensions ${first.dimension} and ${child.dimension}`,
			)
		}
	}
	if (requested !== undefined && requested !== first.dimension) {
		throw new InvalidGeometryError(
			type,
			`requested dimension ${requested} but children are ${first.dimension}`,
		)
	}
	return first.dimension
}

/**
 * The SRID of a composite: the one requested, or else the first SRID found on
 * a child.
 */
export function resolveSrid(
	children: readonly Geometry[],
	requested?: number,
): number | undefined {
	if (requested !== undefined) return requested
	return children.find((child) => child.hasSrid())?.getSrid()
}

/**
 * Throw when a child's dimension no longer matches its composite's. Points stay
 * mutable after construction, so writers check this before encoding.
 */
export function assertChildDimension(parent: Geometry, child: Geometry): void {
	if (child.dimension === parent.dimension) return
	throw new InvalidGeometryError(
		parent.type,
		`${child.type} has dimension ${child.dimension} inside a ${parent.dimension} geometry`,
	)
}

/**
 * A geometry made of an ordered list of child geometries. The list is copied
 * on construction.
 */
export abstract class CompositeGeometry<
	T extends GeometryType,
	C extends Geometry,
> extends BaseGeometry<T> {
	protected readonly children: C[]

	protected constructor(
		type: T,
		children: C[],
		srid: number | undefined,
		dimension: Dimension | undefined,
	) {
		super(
			resolveSrid(children, srid),
			uniformDimension(type, children, dimension),
		)
		this.children = [...children]
		for (const child of this.children) child.assertSridCompatible(this.srid)
		for (const child of this.children) child.adoptSrid(this.srid)
	}

	isEmpty(): boolean {
		return this.children.length === 0
	}

	/** Number of direct children. */
	get length(): number {
		return this.children.length
	}

	override assertSridCompatible(srid: number | undefined): void {
		super.assertSridCompatible(srid)
		for (const child of this.children) child.assertSridCompatible(srid)
	}

	protected override applySrid(srid: number | undefined): void {
		super.applySrid(srid)
		for (const child of this.children) child.adoptSrid(srid)
	}
}
