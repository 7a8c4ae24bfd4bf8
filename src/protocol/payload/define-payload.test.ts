import { describe, it, expect } from "vitest";
import { definePayload } from "./define-payload";
import { BinaryCodec } from "../../core/binary-codec";
import { fixedPoint32 } from "../../core/fixed-point";
import { timePoint, timeRange } from "../../core/time-codec";
import { ErrorCode, isTagError } from "../errors";

const Heater = definePayload({
	name: "heater",
	schema: {
		power: BinaryCodec.bool,
		target: fixedPoint32(1),
		schedule: timeRange,
		lastWritten: timePoint,
	},
});

type Heater = typeof Heater.type;

const sample: Heater = {
	power: true,
	target: { unscaled: 215, scale: 1 },
	schedule: {
		from: { hours: 6, minutes: 30, seconds: 0 },
		to: { hours: 22, minutes: 0, seconds: 0 },
	},
	lastWritten: 1700000000n,
};

describe("definePayload", () => {
	it("computes the payload size from the schema", () => {
		expect(Heater.size).toBe(19);
		expect(Heater.name).toBe("heater");
	});

	it("encodes fields in schema order", () => {
		const bytes = Heater.codec.encode(sample);
		expect(Array.from(bytes)).toEqual([
			1,
			0x00, 0x00, 0x00, 0xd7,
			6, 30, 0, 22, 0, 0,
			0x00, 0x00, 0x00, 0x00, 0x65, 0x53, 0xf1, 0x00,
		]);
	});

	it("decodes what it encodes", () => {
		expect(Heater.codec.decode(Heater.codec.encode(sample))).toEqual(sample);
	});

	it("decodes from a view into a larger buffer", () => {
		const memory = new Uint8Array(30);
		memory.set(Heater.codec.encode(sample), 5);
		expect(Heater.codec.decode(memory.subarray(5, 24))).toEqual(sample);
	});

	it.each([0, 18, 20])("rejects a %i-byte payload", (length) => {
		let caught: unknown;
		try {
			Heater.codec.decode(new Uint8Array(length));
		} catch (err) {
			caught = err;
		}
		expect(isTagError(caught, ErrorCode.DataWrongLength)).toBe(true);
		expect(caught).toMatchObject({ message: `heater payload must be 19 bytes, got ${length}` });
	});

	it("supports an empty payload", () => {
		const Empty = definePayload({ name: "empty", schema: {} });
		expect(Empty.size).toBe(0);
		expect(Empty.codec.decode(new Uint8Array(0))).toEqual({});
	});
});
