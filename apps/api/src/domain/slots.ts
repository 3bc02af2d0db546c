import { DateTime } from "luxon";

export const DAY_START = "09:00";
export const DAY_END = "17:00";
export const SLOT_MINUTES = 30;

export function parseTimeToMinutes(t: string) {
  const [hh, mm] = t.split(":").map(Number);
  return hh * 60 + mm;
}

export function formatMinutes(m: number) {
  const hh = String(Math.floor(m / 60)).padStart(2, "0");
  const mm = String(m % 60).padStart(2, "0");
  return `${hh}:${mm}`;
}

function buildGrid() {
  const slots: string[] = [];
  const end = parseTimeToMinutes(DAY_END);
  for (let m = parseTimeToMinutes(DAY_START); m < end; m += SLOT_MINUTES) {
    slots.push(formatMinutes(m));
  }
  return slots;
}

/** 09:00, 09:30 … 16:30 */
export const SLOT_GRID: readonly string[] = Object.freeze(buildGrid());

export function isGridSlot(timeSlot: string) {
  return SLOT_GRID.includes(timeSlot);
}

function overlaps(aStart: number, aEnd: number, bStart: number, bEnd: number) {
  return aStart < bEnd && aEnd > bStart;
}

/** Grid slots touched by the half-open interval [startMinutes, endMinutes). */
export function slotsOverlapping(startMinutes: number, endMinutes: number) {
  return SLOT_GRID.filter((slot) => {
    const s = parseTimeToMinutes(slot);
    return overlaps(s, s + SLOT_MINUTES, startMinutes, endMinutes);
  });
}

export function isIsoDate(date: string) {
  return /^\d{4}-\d{2}-\d{2}$/.test(date) && DateTime.fromISO(date).isValid;
}
