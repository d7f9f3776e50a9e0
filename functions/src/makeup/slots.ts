/* eslint-disable */
import { addDays, getDay } from "date-fns";
import type { SchedulerConfig } from "../config";
import { formatDate, today } from "../utils/calendar";

export interface CandidateSlot {
  date: string;
  time: string;
  weekday: number; // 0 = Sunday
}

/**
 * Every preferred time on every day of the look-ahead window, skipping the
 * excluded weekday. The window starts the day after `now`, not at the
 * session's own date.
 */
export function generateCandidateSlots(now: Date, config: SchedulerConfig): CandidateSlot[] {
  const start = today(now);
  const candidates: CandidateSlot[] = [];

  for (let offset = 1; offset <= config.horizonDays; offset++) {
    const day = addDays(start, offset);
    const weekday = getDay(day);
    if (weekday === config.excludedWeekday) continue;

    const date = formatDate(day);
    for (const time of config.preferredTimes) {
      candidates.push({ date, time, weekday });
    }
  }

  return candidates;
}
