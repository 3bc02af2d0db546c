import { DateTime } from "luxon";

export interface Clock {
  now(): DateTime;
}

export function systemClock(timeZone: string): Clock {
  return { now: () => DateTime.now().setZone(timeZone) };
}

export function fixedClock(iso: string, timeZone = "UTC"): Clock {
  const instant = DateTime.fromISO(iso, { zone: timeZone });
  return { now: () => instant };
}

export function isoDay(dt: DateTime) {
  return dt.toFormat("yyyy-LL-dd");
}
