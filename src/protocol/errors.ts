/**
 * Status codes reported by the tag protocol layer.
 *
 * Values are negative so they never collide with a byte length.
 */
export enum ErrorCode {
	/** No NDEF message TLV in tag memory, or it is empty or overruns the buffer */
	NoNdefTlv = -10,
	/** A record declares more bytes than the buffer holds */
	RecordTruncated = -20,
	/** A record is not a URI record of the application scheme */
	WrongRecordType = -21,
	/** A data payload does not have the length its definition requires */
	DataWrongLength = -30,
}

const defaultMessages: Record<ErrorCode, string> = {
	[ErrorCode.NoNdefTlv]: "no NDEF message TLV found",
	[ErrorCode.RecordTruncated]: "record truncated",
	[ErrorCode.WrongRecordType]: "wrong record type",
	[ErrorCode.DataWrongLength]: "data payload has wrong length",
};

export class TagError extends Error {
	readonly code: ErrorCode;

	constructor(code: ErrorCode, message?: string) {
		super(message ?? defaultMessages[code]);
		this.code = code;
		this.name = "TagError";
	}
}

/**
 * Narrows an unknown thrown value to a TagError, optionally of one code.
 */
export function isTagError(err: unknown, code?: ErrorCode): err is TagError {
	return err instanceof TagError && (code === undefined || err.code === code);
}
