import { ErrorCode, TagError } from "../protocol/errors";
import {
	RECORD_TYPE_SCHEME,
	parseApplicationMessage,
	type ApplicationMessage,
} from "../protocol/message";
import { spanBytes, type ByteSpan, type NdefRecord } from "../protocol/ndef";
import type { DefinedPayload } from "../protocol/payload";
import { TlvType, findFirstTlv } from "../protocol/tlv";
import type { ReaderConfig } from "./types";

function shiftSpan(span: ByteSpan, by: number): ByteSpan {
	return { offset: span.offset + by, length: span.length };
}

function shiftRecord(record: NdefRecord, by: number): NdefRecord {
	return {
		tnf: record.tnf,
		type: shiftSpan(record.type, by),
		id: record.id ? shiftSpan(record.id, by) : null,
		payload: shiftSpan(record.payload, by),
	};
}

/**
 * Reads application data out of a tag memory image or a bare NDEF message.
 *
 * @example
 * ```ts
 * const reader = new TagReader({ debug: true });
 *
 * // Whole tag memory: TLV area holding the NDEF message
 * const state = reader.readPayload(memory, Heater);
 *
 * // An NDEF message handed over by the platform's NFC stack
 * const same = reader.readNdef(ndefMessage, Heater);
 * ```
 */
export class TagReader {
	private config: Required<ReaderConfig>;

	constructor(config: ReaderConfig = {}) {
		this.config = {
			scheme: config.scheme ?? RECORD_TYPE_SCHEME,
			debug: config.debug ?? false,
		};
	}

	/**
	 * Locates the NDEF message in tag memory.
	 *
	 * @throws TagError `NoNdefTlv` if there is no NDEF message TLV, it is
	 *   empty, or its value runs past the end of `memory`
	 */
	locate(memory: Uint8Array): ByteSpan {
		const tlv = findFirstTlv(memory, TlvType.NdefMessage);
		if (!tlv) {
			this.log(`No NDEF TLV in ${memory.length} bytes`);
			throw new TagError(ErrorCode.NoNdefTlv);
		}
		if (tlv.length === 0 || tlv.offset + tlv.length > memory.length) {
			this.log(`Unusable NDEF TLV at ${tlv.offset} (length ${tlv.length})`);
			throw new TagError(ErrorCode.NoNdefTlv);
		}

		this.log(`NDEF message at ${tlv.offset}, ${tlv.length} bytes`);
		return { offset: tlv.offset, length: tlv.length };
	}

	/**
	 * Locates and parses the application message in tag memory.
	 * Record spans are relative to `memory`.
	 */
	readMessage(memory: Uint8Array): ApplicationMessage {
		const location = this.locate(memory);
		const message = this.parseMessage(spanBytes(memory, location));

		return {
			data: shiftRecord(message.data, location.offset),
			metadata: shiftRecord(message.metadata, location.offset),
			size: message.size,
		};
	}

	/**
	 * Decodes the data payload stored in tag memory.
	 */
	readPayload<T extends object>(memory: Uint8Array, payload: DefinedPayload<T>): T {
		const message = this.readMessage(memory);
		return this.decodePayload(spanBytes(memory, message.data.payload), payload);
	}

	/**
	 * Decodes the data payload of a bare NDEF message.
	 */
	readNdef<T extends object>(ndef: Uint8Array, payload: DefinedPayload<T>): T {
		const message = this.parseMessage(ndef);
		return this.decodePayload(spanBytes(ndef, message.data.payload), payload);
	}

	private parseMessage(ndef: Uint8Array): ApplicationMessage {
		try {
			const message = parseApplicationMessage(ndef, this.config.scheme);
			this.log(
				`Parsed data record (${message.data.payload.length} bytes) and metadata record (${message.metadata.payload.length} bytes)`
			);
			return message;
		} catch (error) {
			this.log(`Message rejected: ${error}`);
			throw error;
		}
	}

	private decodePayload<T extends object>(bytes: Uint8Array, payload: DefinedPayload<T>): T {
		const value = payload.codec.decode(bytes);
		this.log(`Decoded ${payload.name} payload`);
		return value;
	}

	/**
	 * Debug logging
	 */
	private log(message: string): void {
		if (this.config.debug) {
			console.log(`[TagReader] ${message}`);
		}
	}
}
