/**
 * Type Name Format: how a record's type field is interpreted.
 */
export enum Tnf {
	Empty = 0x00,
	WellKnown = 0x01,
	Media = 0x02,
	/** Type field is an absolute URI */
	AbsoluteUri = 0x03,
	External = 0x04,
	Unknown = 0x05,
	Unchanged = 0x06,
	Reserved = 0x07,
}

/** Bits of the record header flags byte */
export const RecordFlag = {
	TnfMask: 0x07,
	IdLengthPresent: 0x08,
	ShortRecord: 0x10,
	Chunked: 0x20,
	MessageEnd: 0x40,
	MessageBegin: 0x80,
} as const;

/**
 * A run of bytes inside a buffer the caller owns. Spans never copy; they
 * are only meaningful together with the buffer they were parsed from.
 */
export interface ByteSpan {
	offset: number;
	length: number;
}

/**
 * A parsed record. `type`, `id` and `payload` point into the parsed buffer.
 */
export interface NdefRecord {
	tnf: number;
	type: ByteSpan;
	/** null when the record carries no id (or an empty one) */
	id: ByteSpan | null;
	payload: ByteSpan;
}

export interface ParsedRecord {
	record: NdefRecord;
	/** Bytes consumed; the next record starts right after */
	size: number;
}

/**
 * Record contents to encode.
 */
export interface RecordInput {
	tnf: number;
	type: Uint8Array;
	id?: Uint8Array;
	payload: Uint8Array;
}

/**
 * Returns the bytes of a span as a zero-copy view of `buf`.
 */
export function spanBytes(buf: Uint8Array, span: ByteSpan): Uint8Array {
	return buf.subarray(span.offset, span.offset + span.length);
}
