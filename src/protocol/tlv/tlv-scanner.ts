import { TLV_EXTENDED_LENGTH, TLV_RESERVED_LENGTH, TlvType, type TlvLocation } from "./tlv";

/**
 * Finds the first TLV of `type` in a tag memory image.
 *
 * NULL bytes are skipped, a TERMINATOR ends the scan, and any other TLV is
 * stepped over by its declared length. A reserved length (0xFFFF) or a
 * buffer that ends inside a type or length field also ends the scan.
 *
 * @param buf Tag memory, starting at the first TLV
 * @param type TLV type to look for
 * @returns Location of the value, or null when the scan ends without a match
 *
 * @example
 * ```ts
 * const loc = findFirstTlv(memory, TlvType.NdefMessage);
 * if (loc) {
 *   const message = memory.subarray(loc.offset, loc.offset + loc.length);
 * }
 * ```
 */
export function findFirstTlv(buf: Uint8Array, type: number): TlvLocation | null {
	let index = 0;

	while (index < buf.length) {
		const current = buf[index];

		if (current === TlvType.Null) {
			index += 1;
			continue;
		}
		if (current === TlvType.Terminator) {
			return null;
		}

		index += 1;
		if (index >= buf.length) {
			return null;
		}

		let length: number;
		if (buf[index] === TLV_EXTENDED_LENGTH) {
			if (index + 3 > buf.length) {
				return null;
			}
			length = (buf[index + 1] << 8) | buf[index + 2];
			index += 3;
			if (length === TLV_RESERVED_LENGTH) {
				return null;
			}
		} else {
			length = buf[index];
			index += 1;
		}

		if (current === type) {
			return { type: current, offset: index, length };
		}
		index += length;
	}

	return null;
}
