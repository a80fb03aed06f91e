import { MalformedWkbError } from "@postgeo/shared/errors"
import { BIG_ENDIAN, LITTLE_ENDIAN } from "./constants"

/**
 * Bounds-checked binary reader over a byte buffer. Every read checks the
 * remaining length first and throws {@link MalformedWkbError} instead of
 * reading past the end.
 */
export class WkbReader {
	private readonly view: DataView
	private position = 0
	private littleEndian = true

	constructor(data: Uint8Array) {
		this.view = new DataView(data.buffer, data.byteOffset, data.byteLength)
	}

	get offset(): number {
		return this.position
	}

	get remaining(): number {
		return this.view.byteLength - this.position
	}

	/**
	 * Read a byte order marker and use it for every following multi-byte read.
	 */
	readByteOrder(): void {
		const byteOrder = this.readByte()
		if (byteOrder !== BIG_ENDIAN && byteOrder !== LITTLE_ENDIAN) {
			throw new MalformedWkbError(
				`invalid byte order ${byteOrder}`,
				this.position - 1,
			)
		}
		this.littleEndian = byteOrder === LITTLE_ENDIAN
	}

	readByte(): number {
		this.ensure(1, "byte")
		const value = this.view.getUint8(this.position)
		this.position += 1
		return value
	}

	readUint32(): number {
		this.ensure(4, "uint32")
		const value = this.view.getUint32(this.position, this.littleEndian)
		this.position += 4
		return value
	}

	readInt32(): number {
		this.ensure(4, "int32")
		const value = this.view.getInt32(this.position, this.littleEndian)
		this.position += 4
		return value
	}

	readDouble(): number {
		this.ensure(8, "double")
		const value = this.view.getFloat64(this.position, this.littleEndian)
		this.position += 8
		return value
	}

	/**
	 * Read an element count and check that `count * minElementBytes` bytes are
	 * still available, so a corrupted count cannot trigger a huge allocation.
	 */
	readCount(minElementBytes: number, what: string): number {
		const start = this.position
		const count = this.readUint32()
		if (count * minElementBytes > this.remaining) {
			throw new MalformedWkbError(
				`${what} count ${count} exceeds the ${this.remaining} remaining bytes`,
				start,
			)
		}
		return count
	}

	private ensure(size: number, what: string) {
		if (this.remaining < size) {
			throw new MalformedWkbError(
				`unexpected end of buffer reading ${what}`,
				this.position,
			)
		}
	}
}
