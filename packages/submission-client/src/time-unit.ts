export const TIME_UNITS = ["millisecond", "second", "minute", "hour", "day"] as const;

export type TimeUnit = (typeof TIME_UNITS)[number];

const MS_PER_UNIT: Record<TimeUnit, number> = {
  millisecond: 1,
  second: 1_000,
  minute: 60_000,
  hour: 3_600_000,
  day: 86_400_000,
};

export function timeUnitToMillis(unit: TimeUnit): number {
  return MS_PER_UNIT[unit];
}

export function isTimeUnit(value: string): value is TimeUnit {
  return TIME_UNITS.some((unit) => unit === value);
}
