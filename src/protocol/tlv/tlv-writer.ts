import { BinaryCodec } from "../../core/binary-codec";
import { TLV_EXTENDED_LENGTH, TLV_MAX_LENGTH, TlvType, type TlvEntry } from "./tlv";

function lengthFieldSize(length: number): number {
	return length < TLV_EXTENDED_LENGTH ? 1 : 3;
}

function writeTlv(out: Uint8Array, offset: number, entry: TlvEntry): number {
	const length = entry.value.length;
	if (length > TLV_MAX_LENGTH) {
		throw new RangeError(`TLV value too long: ${length} bytes, max ${TLV_MAX_LENGTH}`);
	}

	let o = offset;
	out[o++] = entry.type;
	if (length < TLV_EXTENDED_LENGTH) {
		out[o++] = length;
	} else {
		out[o++] = TLV_EXTENDED_LENGTH;
		BinaryCodec.write(BinaryCodec.u16, length, out, o);
		o += 2;
	}
	out.set(entry.value, o);
	return o + length - offset;
}

/**
 * Encodes a single TLV, choosing the 1- or 3-byte length form.
 *
 * @throws RangeError if the value is longer than 0xFFFE bytes
 */
export function encodeTlv(type: number, value: Uint8Array): Uint8Array {
	const out = new Uint8Array(1 + lengthFieldSize(value.length) + value.length);
	writeTlv(out, 0, { type, value });
	return out;
}

/**
 * Encodes a sequence of TLVs followed by a TERMINATOR, the layout of a
 * tag memory area.
 */
export function encodeTlvStream(entries: TlvEntry[]): Uint8Array {
	let size = 1;
	for (const entry of entries) {
		size += 1 + lengthFieldSize(entry.value.length) + entry.value.length;
	}

	const out = new Uint8Array(size);
	let offset = 0;
	for (const entry of entries) {
		offset += writeTlv(out, offset, entry);
	}
	out[offset] = TlvType.Terminator;
	return out;
}
