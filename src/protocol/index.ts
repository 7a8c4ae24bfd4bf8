/**
 * Protocol layer - tag memory and NDEF message handling
 *
 * - TLV scanning and writing for tag memory areas
 * - NDEF record parsing into spans over the caller's buffer
 * - The application's data + metadata message
 * - Fixed-layout data payloads (use definePayload helper)
 *
 * @example
 * ```ts
 * import { findFirstTlv, parseApplicationMessage, spanBytes, TlvType } from './protocol';
 *
 * const tlv = findFirstTlv(memory, TlvType.NdefMessage);
 * if (tlv) {
 *   const ndef = memory.subarray(tlv.offset, tlv.offset + tlv.length);
 *   const { data, metadata } = parseApplicationMessage(ndef);
 *   const payload = spanBytes(ndef, data.payload);
 * }
 * ```
 */

export * from "./errors";
export * from "./tlv";
export * from "./ndef";
export * from "./message";
export * from "./payload";
