import { ErrorCode, TagError } from "../errors";
import { Tnf, encodeMessage, parseRecord, spanBytes, type NdefRecord } from "../ndef";

/**
 * URI scheme every record type of the application starts with.
 */
export const RECORD_TYPE_SCHEME = "https://pma.inftech.hs-mannheim.de/eput";

/**
 * The two records of an application message.
 */
export interface ApplicationMessage {
	/** Device data (first record) */
	data: NdefRecord;
	/** Metadata describing the data layout (second record) */
	metadata: NdefRecord;
	/** Bytes consumed by both records */
	size: number;
}

export interface ApplicationMessageInput {
	/** Full type URI of the data record */
	dataType: string;
	data: Uint8Array;
	/** Full type URI of the metadata record, parameters included */
	metadataType: string;
	metadata: Uint8Array;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

function startsWith(buf: Uint8Array, offset: number, length: number, prefix: Uint8Array): boolean {
	if (prefix.length > length) {
		return false;
	}
	for (let i = 0; i < prefix.length; i++) {
		if (buf[offset + i] !== prefix[i]) {
			return false;
		}
	}
	return true;
}

function isApplicationRecord(buf: Uint8Array, record: NdefRecord, scheme: Uint8Array): boolean {
	return (
		record.tnf === Tnf.AbsoluteUri &&
		startsWith(buf, record.type.offset, record.type.length, scheme)
	);
}

/**
 * Parses the data record and then the metadata record of an application
 * message. Both must be absolute-URI records whose type starts with
 * `scheme`. The metadata record is only parsed once the data record has
 * passed.
 *
 * @param buf NDEF message bytes
 * @param scheme Type prefix to require
 * @throws TagError `RecordTruncated` from either record,
 *   `WrongRecordType` if either record fails validation
 */
export function parseApplicationMessage(
	buf: Uint8Array,
	scheme: string = RECORD_TYPE_SCHEME
): ApplicationMessage {
	const prefix = encoder.encode(scheme);

	const first = parseRecord(buf);
	if (!isApplicationRecord(buf, first.record, prefix)) {
		throw new TagError(ErrorCode.WrongRecordType, "data record has wrong type");
	}

	const second = parseRecord(buf, first.size);
	if (!isApplicationRecord(buf, second.record, prefix)) {
		throw new TagError(ErrorCode.WrongRecordType, "metadata record has wrong type");
	}

	return {
		data: first.record,
		metadata: second.record,
		size: first.size + second.size,
	};
}

/**
 * Encodes a data record and a metadata record as one message.
 */
export function encodeApplicationMessage(input: ApplicationMessageInput): Uint8Array {
	return encodeMessage([
		{ tnf: Tnf.AbsoluteUri, type: encoder.encode(input.dataType), payload: input.data },
		{ tnf: Tnf.AbsoluteUri, type: encoder.encode(input.metadataType), payload: input.metadata },
	]);
}

/**
 * Decodes the type of a record as a string.
 */
export function recordTypeUri(buf: Uint8Array, record: NdefRecord): string {
	return decoder.decode(spanBytes(buf, record.type));
}

/**
 * Query parameters of a record's type URI, such as `zip=0` on a metadata
 * record. Empty when the type has no query part.
 */
export function recordTypeParameters(buf: Uint8Array, record: NdefRecord): URLSearchParams {
	const uri = recordTypeUri(buf, record);
	const query = uri.indexOf("?");
	return new URLSearchParams(query === -1 ? "" : uri.slice(query + 1));
}
