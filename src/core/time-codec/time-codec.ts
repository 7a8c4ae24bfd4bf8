import { BinaryPrimitives, type Field } from "../binary-codec";

/**
 * Signed 64-bit point in time. The unit is agreed between the device and
 * its reader; the codec only moves the counter.
 */
export type TimePoint = bigint;

/**
 * Signed 16-bit zone offset, in a caller-defined unit.
 */
export type ZoneOffset = number;

/**
 * Wall-clock time of day. Fields are not range-checked: values such as
 * 24:60:60 are legal on the wire and used as sentinels.
 */
export interface TimeOfDay {
  hours: number;
  minutes: number;
  seconds: number;
}

export interface DateRange {
  from: TimePoint;
  to: TimePoint;
}

export interface TimeRange {
  from: TimeOfDay;
  to: TimeOfDay;
}

export interface ZonedTime {
  time: TimePoint;
  offset: ZoneOffset;
}

const { u8, i16, i64 } = BinaryPrimitives;

/** TimePoint as a signed 64-bit integer */
export const timePoint: Field<TimePoint> = i64;

/** ZoneOffset as a signed 16-bit integer */
export const zoneOffset: Field<ZoneOffset> = i16;

/** hours, minutes, seconds as three u8 */
export const timeOfDay: Field<TimeOfDay> = {
  size: 3,
  write(buf, o, v) {
    u8.write(buf, o, v.hours);
    u8.write(buf, o + 1, v.minutes);
    u8.write(buf, o + 2, v.seconds);
  },
  read(buf, o) {
    return {
      hours: u8.read(buf, o),
      minutes: u8.read(buf, o + 1),
      seconds: u8.read(buf, o + 2),
    };
  },
  toNil: () => ({ hours: 0, minutes: 0, seconds: 0 }),
};

/** Two TimePoints: from, then to */
export const dateRange: Field<DateRange> = {
  size: timePoint.size * 2,
  write(buf, o, v) {
    timePoint.write(buf, o, v.from);
    timePoint.write(buf, o + timePoint.size, v.to);
  },
  read(buf, o) {
    return {
      from: timePoint.read(buf, o),
      to: timePoint.read(buf, o + timePoint.size),
    };
  },
  toNil: () => ({ from: 0n, to: 0n }),
};

/** Two TimeOfDay values: from, then to */
export const timeRange: Field<TimeRange> = {
  size: timeOfDay.size * 2,
  write(buf, o, v) {
    timeOfDay.write(buf, o, v.from);
    timeOfDay.write(buf, o + timeOfDay.size, v.to);
  },
  read(buf, o) {
    return {
      from: timeOfDay.read(buf, o),
      to: timeOfDay.read(buf, o + timeOfDay.size),
    };
  },
  toNil: () => ({ from: timeOfDay.toNil(), to: timeOfDay.toNil() }),
};

/** TimePoint followed by its ZoneOffset */
export const zonedTime: Field<ZonedTime> = {
  size: timePoint.size + zoneOffset.size,
  write(buf, o, v) {
    timePoint.write(buf, o, v.time);
    zoneOffset.write(buf, o + timePoint.size, v.offset);
  },
  read(buf, o) {
    return {
      time: timePoint.read(buf, o),
      offset: zoneOffset.read(buf, o + timePoint.size),
    };
  },
  toNil: () => ({ time: 0n, offset: 0 }),
};
