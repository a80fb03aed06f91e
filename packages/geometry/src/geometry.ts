/**
 * Behavior shared by every geometry variant.
 *
 * The variant set is closed: see {@link Geometry} in `./types` for the union
 * that code should switch on.
 *
 * @module
 */

import { InvalidGeometryError } from "@postgeo/shared/errors"
import {
	type Dimension,
	hasZDimension,
	isMeasured as isMeasuredDimension,
} from "./dimension"
import type { GeometryType } from "./types"

export abstract class BaseGeometry<T extends GeometryType = GeometryType> {
	abstract readonly type: T
	protected srid: number | undefined
	protected currentDimension: Dimension

	protected constructor(srid: number | undefined, dimension: Dimension) {
		this.srid = srid
		this.currentDimension = dimension
	}

	get dimension(): Dimension {
		return this.currentDimension
	}

	hasSrid(): boolean {
		return this.srid !== undefined
	}

	getSrid(): number | undefined {
		return this.srid
	}

	is3d(): boolean {
		return hasZDimension(this.currentDimension)
	}

	isMeasured(): boolean {
		return isMeasuredDimension(this.currentDimension)
	}

	abstract isEmpty(): boolean

	/**
	 * Throw if this geometry, or any descendant, already carries an SRID other
	 * than `srid`. Changes nothing.
	 *
	 * @internal Called by composite constructors.
	 */
	assertSridCompatible(srid: number | undefined): void {
		if (srid === undefined || this.srid === undefined || this.srid === srid) {
			return
		}
		throw new InvalidGeometryError(
			this.type,
			`SRID ${this.srid} conflicts with enclosing SRID ${srid}`,
		)
	}

	/**
	 * Take over the SRID of an enclosing geometry. A geometry without an SRID
	 * adopts it; one with a different SRID is rejected before anything changes.
	 *
	 * @internal Called by composite constructors.
	 */
	adoptSrid(srid: number | undefined): void {
		this.assertSridCompatible(srid)
		this.applySrid(srid)
	}

	protected applySrid(srid: number | undefined): void {
		if (srid !== undefined) this.srid = srid
	}
}
