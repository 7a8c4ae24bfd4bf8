/**
 * Data payload type definitions
 *
 * A payload is the fixed-layout body of the data record. Its schema is
 * known to both sides ahead of time; nothing on the wire describes it.
 */

/**
 * Codec interface for encoding/decoding payloads
 */
export interface PayloadCodec<T> {
	encode(value: T): Uint8Array;
	decode(buf: Uint8Array): T;
}

/**
 * Compile-time payload definition with type safety
 * Created by definePayload() helper
 */
export interface DefinedPayload<T extends object> {
	name: string;
	/** Exact payload length in bytes */
	size: number;
	codec: PayloadCodec<T>;
	type: T; // Phantom type for inference
}
