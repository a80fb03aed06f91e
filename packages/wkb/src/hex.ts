import { MalformedWkbError } from "@postgeo/shared/errors"

const HEX_PATTERN = /^[0-9a-fA-F]*$/

/**
 * Decode hex text as PostGIS prints it (optionally with the bytea `\x`
 * prefix) into bytes.
 */
export function hexToBytes(hex: string): Uint8Array {
	const digits = hex.startsWith("\\x") ? hex.slice(2) : hex
	if (digits.length % 2 !== 0) {
		throw new MalformedWkbError(
			`hex string has odd length ${digits.length}`,
			0,
		)
	}
	if (!HEX_PATTERN.test(digits)) {
		throw new MalformedWkbError("hex string contains a non-hex character", 0)
	}
	return Buffer.from(digits, "hex")
}

/** Encode bytes as uppercase hex, the way PostGIS prints geometries. */
export function bytesToHex(bytes: Uint8Array): string {
	return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength)
		.toString("hex")
		.toUpperCase()
}
