import { BinaryCodec } from "../../core/binary-codec";
import { ErrorCode, TagError } from "../errors";
import { RecordFlag, type ParsedRecord } from "./record";

/**
 * Parses the record starting at `offset`.
 *
 * Header: flags (TNF in bits 0-2, IL in bit 3, SR in bit 4), type length,
 * then a 1-byte (SR) or 4-byte payload length and, with IL, a 1-byte id
 * length. Type, id and payload follow in that order.
 *
 * @param buf Buffer holding the record
 * @param offset Offset of the flags byte
 * @returns The record, with spans relative to `buf`, and its total size
 * @throws TagError `RecordTruncated` if the header or the declared
 *   contents run past the end of `buf`
 */
export function parseRecord(buf: Uint8Array, offset = 0): ParsedRecord {
	const available = buf.length - offset;
	if (available < 2) {
		throw new TagError(ErrorCode.RecordTruncated);
	}

	const flags = buf[offset];
	const shortRecord = (flags & RecordFlag.ShortRecord) !== 0;
	const idLengthPresent = (flags & RecordFlag.IdLengthPresent) !== 0;
	const typeLength = buf[offset + 1];

	const payloadLengthSize = shortRecord ? 1 : 4;
	const idLengthSize = idLengthPresent ? 1 : 0;
	const headerSize = 2 + payloadLengthSize + idLengthSize;
	if (available < headerSize) {
		throw new TagError(ErrorCode.RecordTruncated);
	}

	const payloadLength = shortRecord
		? buf[offset + 2]
		: BinaryCodec.read(BinaryCodec.u32, buf, offset + 2);
	const idLength = idLengthPresent ? buf[offset + 2 + payloadLengthSize] : 0;

	const size = headerSize + typeLength + idLength + payloadLength;
	if (size > available) {
		throw new TagError(
			ErrorCode.RecordTruncated,
			`record truncated: needs ${size} bytes, ${available} available`
		);
	}

	const typeOffset = offset + headerSize;
	const idOffset = typeOffset + typeLength;
	const payloadOffset = idOffset + idLength;

	return {
		record: {
			tnf: flags & RecordFlag.TnfMask,
			type: { offset: typeOffset, length: typeLength },
			id: idLength > 0 ? { offset: idOffset, length: idLength } : null,
			payload: { offset: payloadOffset, length: payloadLength },
		},
		size,
	};
}
