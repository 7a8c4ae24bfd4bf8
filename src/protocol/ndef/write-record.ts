import { BinaryCodec } from "../../core/binary-codec";
import { RecordFlag, type RecordInput } from "./record";

export interface RecordPosition {
	/** Sets MB, the first record of a message */
	messageBegin?: boolean;
	/** Sets ME, the last record of a message */
	messageEnd?: boolean;
}

const MAX_SHORT_PAYLOAD = 0xff;
const MAX_TYPE_LENGTH = 0xff;
const MAX_ID_LENGTH = 0xff;

/**
 * Encodes one record. The short form is used for payloads up to 255 bytes,
 * and the id length field is present whenever `input.id` is given.
 *
 * @throws RangeError if the type or id is longer than 255 bytes
 */
export function encodeRecord(input: RecordInput, position: RecordPosition = {}): Uint8Array {
	const { type, id, payload } = input;
	if (type.length > MAX_TYPE_LENGTH) {
		throw new RangeError(`Record type too long: ${type.length} bytes, max ${MAX_TYPE_LENGTH}`);
	}
	if (id && id.length > MAX_ID_LENGTH) {
		throw new RangeError(`Record id too long: ${id.length} bytes, max ${MAX_ID_LENGTH}`);
	}

	const shortRecord = payload.length <= MAX_SHORT_PAYLOAD;
	let flags = input.tnf & RecordFlag.TnfMask;
	if (position.messageBegin) flags |= RecordFlag.MessageBegin;
	if (position.messageEnd) flags |= RecordFlag.MessageEnd;
	if (shortRecord) flags |= RecordFlag.ShortRecord;
	if (id) flags |= RecordFlag.IdLengthPresent;

	const headerSize = 2 + (shortRecord ? 1 : 4) + (id ? 1 : 0);
	const out = new Uint8Array(headerSize + type.length + (id?.length ?? 0) + payload.length);

	out[0] = flags;
	out[1] = type.length;
	let o = 2;
	if (shortRecord) {
		out[o++] = payload.length;
	} else {
		BinaryCodec.write(BinaryCodec.u32, payload.length, out, o);
		o += 4;
	}
	if (id) {
		out[o++] = id.length;
	}

	out.set(type, o);
	o += type.length;
	if (id) {
		out.set(id, o);
		o += id.length;
	}
	out.set(payload, o);

	return out;
}

/**
 * Encodes records back to back as one message, flagging the first with MB
 * and the last with ME.
 *
 * @throws RangeError if `records` is empty
 */
export function encodeMessage(records: RecordInput[]): Uint8Array {
	if (records.length === 0) {
		throw new RangeError("A message needs at least one record");
	}

	const parts = records.map((record, i) =>
		encodeRecord(record, {
			messageBegin: i === 0,
			messageEnd: i === records.length - 1,
		})
	);

	const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0));
	let offset = 0;
	for (const part of parts) {
		out.set(part, offset);
		offset += part.length;
	}
	return out;
}
