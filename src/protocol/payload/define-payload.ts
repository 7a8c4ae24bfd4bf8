import type { DefinedPayload, PayloadCodec } from "./payload";
import type { Schema } from "../../core/binary-codec";
import { BinaryCodec, getSchemaSize } from "../../core/binary-codec";
import { ErrorCode, TagError } from "../errors";

/**
 * Configuration for defining a payload layout.
 * @template T The payload data type, inferred from the schema
 */
export interface PayloadDefinition<T extends object> {
	/** Name used in error messages */
	name: string;
	/** Schema describing the payload fields, in wire order */
	schema: Schema<T>;
}

/**
 * Codec that requires the payload to be exactly as long as its schema.
 * @template T The payload data type
 */
class PayloadCodecImpl<T extends object> implements PayloadCodec<T> {
	constructor(
		private name: string,
		private schema: Schema<T>,
		private size: number
	) {}

	encode(value: T): Uint8Array {
		return BinaryCodec.encode(this.schema, value);
	}

	decode(buf: Uint8Array): T {
		if (buf.length !== this.size) {
			throw new TagError(
				ErrorCode.DataWrongLength,
				`${this.name} payload must be ${this.size} bytes, got ${buf.length}`
			);
		}

		// Create a target object with nil values
		const target = {} as T;
		for (const key of Object.keys(this.schema) as (keyof T)[]) {
			target[key] = this.schema[key].toNil();
		}
		return BinaryCodec.decode(this.schema, buf, target);
	}
}

/**
 * Define a fixed-layout data payload.
 *
 * @template T The payload data type, inferred from the schema
 * @param definition Payload name and schema
 * @returns A DefinedPayload with its size and codec
 *
 * @example
 * ```ts
 * const Heater = definePayload({
 *   name: "heater",
 *   schema: {
 *     power: BinaryCodec.bool,
 *     target: fixedPoint32(1),
 *     schedule: timeRange,
 *     lastWritten: timePoint,
 *   },
 * });
 *
 * const bytes = Heater.codec.encode({ ... });
 * const state = Heater.codec.decode(spanBytes(memory, message.data.payload));
 * ```
 */
export function definePayload<T extends object>(
	definition: PayloadDefinition<T>
): DefinedPayload<T> {
	const size = getSchemaSize(definition.schema);

	return {
		name: definition.name,
		size,
		codec: new PayloadCodecImpl<T>(definition.name, definition.schema, size),
		type: undefined as unknown as T, // Phantom type for inference
	};
}
