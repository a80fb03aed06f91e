type Field = ["u8" | "u32" | "i32" | "f64", number]

const FIELD_SIZES = { u8: 1, u32: 4, i32: 4, f64: 8 } as const

/**
 * Assemble a WKB buffer field by field.
 */
export function wkb(fields: Field[], littleEndian = true): Uint8Array {
	const size = fields.reduce((sum, [kind]) => sum + FIELD_SIZES[kind], 0)
	const buffer = new ArrayBuffer(size)
	const view = new DataView(buffer)
	let offset = 0
	for (const [kind, value] of fields) {
		switch (kind) {
			case "u8":
				view.setUint8(offset, value)
				break
			case "u32":
				view.setUint32(offset, value, littleEndian)
				break
			case "i32":
				view.setInt32(offset, value, littleEndian)
				break
			case "f64":
				view.setFloat64(offset, value, littleEndian)
				break
		}
		offset += FIELD_SIZES[kind]
	}
	return new Uint8Array(buffer)
}

export const byteOrder = (littleEndian = true): Field => [
	"u8",
	littleEndian ? 1 : 0,
]
export const u32 = (value: number): Field => ["u32", value]
export const i32 = (value: number): Field => ["i32", value]
export const f64 = (value: number): Field => ["f64", value]

/** Fields of a nested 2D point without SRID. */
export const point2d = (x: number, y: number): Field[] => [
	byteOrder(),
	u32(1),
	f64(x),
	f64(y),
]
