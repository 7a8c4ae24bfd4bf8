/**
 * TLV block types of an NFC Forum tag memory area.
 */
export const TlvType = {
	/** Padding, one byte with no length field */
	Null: 0x00,
	LockControl: 0x01,
	MemoryControl: 0x02,
	NdefMessage: 0x03,
	Proprietary: 0xfd,
	/** Last TLV in the memory area */
	Terminator: 0xfe,
} as const;

/** First length byte announcing a 2-byte length */
export const TLV_EXTENDED_LENGTH = 0xff;

/** Extended length value reserved by the NFC Forum */
export const TLV_RESERVED_LENGTH = 0xffff;

/** Largest value length a TLV can declare */
export const TLV_MAX_LENGTH = 0xfffe;

/**
 * Position of a TLV value inside a scanned buffer.
 */
export interface TlvLocation {
	type: number;
	/** Offset of the first value byte */
	offset: number;
	/** Declared value length; may run past the end of the buffer */
	length: number;
}

/**
 * One TLV to write with {@link encodeTlvStream}.
 */
export interface TlvEntry {
	type: number;
	value: Uint8Array;
}
