/* eslint-disable */
import { format, isValid, parse, startOfDay } from "date-fns";

// Calendar dates travel as yyyy-MM-dd and wall-clock times as HH:mm; both are
// interpreted in the runtime's local zone (UTC on Cloud Functions).
export const DATE_FORMAT = "yyyy-MM-dd";
export const TIME_FORMAT = "HH:mm";

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const TIME_PATTERN = /^([01]\d|2[0-3]):[0-5]\d(:[0-5]\d)?$/;

export function isCalendarDate(value: string): boolean {
  return DATE_PATTERN.test(value) && isValid(parse(value, DATE_FORMAT, new Date()));
}

export function isClockTime(value: string): boolean {
  return TIME_PATTERN.test(value);
}

export function toDate(value: string): Date {
  const date = parse(value, DATE_FORMAT, new Date());
  if (!isValid(date)) {
    throw new RangeError(`Invalid calendar date: ${value}`);
  }
  return date;
}

export function formatDate(date: Date): string {
  return format(date, DATE_FORMAT);
}

export function today(now: Date): Date {
  return startOfDay(now);
}

/** Drops a seconds component, so "08:00:00" and "08:00" compare equal. */
export function normalizeTime(value: string): string {
  return value.slice(0, 5);
}

export function hourOf(time: string): number {
  return Number(time.slice(0, 2));
}

export function minutesOf(time: string): number {
  return hourOf(time) * 60 + Number(time.slice(3, 5));
}

export function formatMinutes(total: number): string {
  const hours = Math.floor(total / 60) % 24;
  const minutes = total % 60;
  return `${String(hours).padStart(2, "0")}:${String(minutes).padStart(2, "0")}`;
}
