import { describe, expect, it } from "vitest";
import { ErrorCode, TagError, isTagError } from "../errors";
import { Tnf, encodeMessage, spanBytes } from "../ndef";
import {
	RECORD_TYPE_SCHEME,
	encodeApplicationMessage,
	parseApplicationMessage,
	recordTypeParameters,
	recordTypeUri,
} from "./application-message";

const ascii = (s: string) => new TextEncoder().encode(s);

const DATA_TYPE = `${RECORD_TYPE_SCHEME}/data`;
const META_TYPE = `${RECORD_TYPE_SCHEME}/meta?zip=0`;

function codeOf(fn: () => unknown): ErrorCode | undefined {
	try {
		fn();
	} catch (err) {
		if (isTagError(err)) return err.code;
		throw err;
	}
	return undefined;
}

describe("parseApplicationMessage", () => {
	const message = encodeApplicationMessage({
		dataType: DATA_TYPE,
		data: Uint8Array.from([1, 2, 3]),
		metadataType: META_TYPE,
		metadata: Uint8Array.from([4, 5]),
	});

	it("returns both records", () => {
		const result = parseApplicationMessage(message);

		expect(result.size).toBe(105);
		expect(result.data).toEqual({
			tnf: Tnf.AbsoluteUri,
			type: { offset: 3, length: 44 },
			id: null,
			payload: { offset: 47, length: 3 },
		});
		expect(result.metadata).toEqual({
			tnf: Tnf.AbsoluteUri,
			type: { offset: 53, length: 50 },
			id: null,
			payload: { offset: 103, length: 2 },
		});
		expect(Array.from(spanBytes(message, result.data.payload))).toEqual([1, 2, 3]);
		expect(Array.from(spanBytes(message, result.metadata.payload))).toEqual([4, 5]);
	});

	it("accepts a type equal to the bare scheme", () => {
		const bytes = encodeMessage([
			{ tnf: Tnf.AbsoluteUri, type: ascii(RECORD_TYPE_SCHEME), payload: new Uint8Array(0) },
			{ tnf: Tnf.AbsoluteUri, type: ascii(RECORD_TYPE_SCHEME), payload: new Uint8Array(0) },
		]);
		expect(parseApplicationMessage(bytes).size).toBe(bytes.length);
	});

	it("rejects a data record with the wrong TNF before looking at the metadata record", () => {
		const first = encodeMessage([
			{ tnf: Tnf.WellKnown, type: ascii(DATA_TYPE), payload: Uint8Array.from([1]) },
		]);
		// a metadata record that would fail as truncated if it were parsed
		const bytes = new Uint8Array(first.length + 2);
		bytes.set(first);
		bytes.set([0x13, 0x40], first.length);

		expect(() => parseApplicationMessage(bytes)).toThrow("data record has wrong type");
		expect(codeOf(() => parseApplicationMessage(bytes))).toBe(ErrorCode.WrongRecordType);
	});

	it("rejects a data record with a foreign scheme", () => {
		const bytes = encodeMessage([
			{ tnf: Tnf.AbsoluteUri, type: ascii("https://example.com/data"), payload: new Uint8Array(0) },
			{ tnf: Tnf.AbsoluteUri, type: ascii(META_TYPE), payload: new Uint8Array(0) },
		]);
		expect(codeOf(() => parseApplicationMessage(bytes))).toBe(ErrorCode.WrongRecordType);
	});

	it("rejects a type shorter than the scheme", () => {
		const bytes = encodeMessage([
			{ tnf: Tnf.AbsoluteUri, type: ascii(RECORD_TYPE_SCHEME.slice(0, 10)), payload: new Uint8Array(0) },
			{ tnf: Tnf.AbsoluteUri, type: ascii(META_TYPE), payload: new Uint8Array(0) },
		]);
		expect(codeOf(() => parseApplicationMessage(bytes))).toBe(ErrorCode.WrongRecordType);
	});

	it("rejects a bad metadata record after a good data record", () => {
		const bytes = encodeMessage([
			{ tnf: Tnf.AbsoluteUri, type: ascii(DATA_TYPE), payload: Uint8Array.from([1]) },
			{ tnf: Tnf.Media, type: ascii(META_TYPE), payload: Uint8Array.from([2]) },
		]);
		expect(() => parseApplicationMessage(bytes)).toThrow("metadata record has wrong type");
	});

	it("propagates truncation of the data record", () => {
		expect(codeOf(() => parseApplicationMessage(message.subarray(0, 20)))).toBe(
			ErrorCode.RecordTruncated
		);
	});

	it("propagates truncation of the metadata record", () => {
		expect(codeOf(() => parseApplicationMessage(message.subarray(0, 104)))).toBe(
			ErrorCode.RecordTruncated
		);
		expect(codeOf(() => parseApplicationMessage(message.subarray(0, 50)))).toBe(
			ErrorCode.RecordTruncated
		);
	});

	it("validates against a caller-supplied scheme", () => {
		const bytes = encodeApplicationMessage({
			dataType: "urn:test:data",
			data: new Uint8Array(0),
			metadataType: "urn:test:meta",
			metadata: new Uint8Array(0),
		});
		expect(parseApplicationMessage(bytes, "urn:test:").size).toBe(bytes.length);
		expect(() => parseApplicationMessage(bytes)).toThrow(TagError);
	});
});

describe("record type helpers", () => {
	const message = encodeApplicationMessage({
		dataType: DATA_TYPE,
		data: new Uint8Array(0),
		metadataType: META_TYPE,
		metadata: new Uint8Array(0),
	});
	const { data, metadata } = parseApplicationMessage(message);

	it("decodes the type URI", () => {
		expect(recordTypeUri(message, data)).toBe(DATA_TYPE);
		expect(recordTypeUri(message, metadata)).toBe(META_TYPE);
	});

	it("reads type parameters", () => {
		expect(recordTypeParameters(message, metadata).get("zip")).toBe("0");
		expect(Array.from(recordTypeParameters(message, data).keys())).toEqual([]);
	});
});
