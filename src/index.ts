/**
 * tagwire
 *
 * Binary codecs and record parsing for NFC tag devices:
 * - Big-endian scalar codecs (8 to 64-bit integers, floats, booleans)
 * - Time, range and fixed-point decimal fields
 * - Option bitmaps
 * - TLV scanning and NDEF record parsing
 * - The application's two-record message and its data payloads
 */

// Core codecs
export * from "./core";

// Tag memory and message protocol
export * from "./protocol";

// High-level reader
export * from "./reader";
