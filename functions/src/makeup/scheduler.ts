/* eslint-disable */
import { addDays, differenceInCalendarDays, getDay } from "date-fns";
import type { SchedulerConfig } from "../config";
import { formatDate, hourOf, normalizeTime, toDate, today } from "../utils/calendar";
import { type CandidateSlot, generateCandidateSlots } from "./slots";
import type { MakeUpStore } from "./store";
import type { MakeUpSession, ScoredSlot } from "./types";

export const REASON_SEPARATOR = " · ";

export interface SchedulingContext {
  /** Date of the course's latest completed session, or today when there is none. */
  lastSessionDate: Date;
  bookedTimes: Map<string, Set<string>>;
  weekdayLoad: Map<number, number>;
}

export function buildSchedulingContext(
  existing: MakeUpSession[],
  lastCompleted: MakeUpSession | null,
  now: Date
): SchedulingContext {
  const bookedTimes = new Map<string, Set<string>>();
  const weekdayLoad = new Map<number, number>();

  for (const session of existing) {
    const times = bookedTimes.get(session.date) ?? new Set<string>();
    times.add(normalizeTime(session.startTime));
    bookedTimes.set(session.date, times);

    const weekday = getDay(toDate(session.date));
    weekdayLoad.set(weekday, (weekdayLoad.get(weekday) ?? 0) + 1);
  }

  return {
    lastSessionDate: lastCompleted ? toDate(lastCompleted.date) : today(now),
    bookedTimes,
    weekdayLoad,
  };
}

export function scoreSlot(
  slot: CandidateSlot,
  context: SchedulingContext,
  config: SchedulerConfig
): ScoredSlot {
  const { weights } = config;
  const reasons: string[] = [];
  let score = 0;

  // 1. spacing from the last completed session
  const gap = differenceInCalendarDays(toDate(slot.date), context.lastSessionDate);
  if (gap >= config.idealGapMinDays && gap <= config.idealGapMaxDays) {
    score += weights.gapFromLast;
    reasons.push(`good gap of ${gap} days from last session`);
  } else if (gap > config.idealGapMaxDays) {
    score += Math.floor(weights.gapFromLast / 2);
    reasons.push(`adequate gap of ${gap} days`);
  } else {
    score += config.lowScore;
    reasons.push("close to last session");
  }

  // 2. time of day
  const hour = hourOf(slot.time);
  if (hour <= config.morningCutoffHour) {
    score += weights.morningPreference;
    reasons.push("morning slot, better learning retention");
  } else if (hour <= config.afternoonCutoffHour) {
    score += Math.floor(weights.morningPreference / 2);
    reasons.push("early afternoon slot");
  } else {
    score += config.lowScore;
    reasons.push("late afternoon slot");
  }

  // 3. faculty conflicts
  const booked = context.bookedTimes.get(slot.date);
  if (!booked?.has(normalizeTime(slot.time))) {
    score += weights.noConflict;
    reasons.push("faculty is free at this time");
  } else {
    score += config.conflictPenalty;
    reasons.push("⚠ faculty has another session at this time");
  }

  // 4. weekday load
  const load = context.weekdayLoad.get(slot.weekday) ?? 0;
  if (load === 0) {
    score += weights.dayBalance;
    reasons.push("no other sessions on this day");
  } else if (load === 1) {
    score += Math.floor(weights.dayBalance / 2);
  } else {
    reasons.push(`${load} sessions already on this day`);
  }

  return {
    date: slot.date,
    time: slot.time,
    // capped above only; a poor slot keeps its negative score
    score: Math.min(score, config.maxScore),
    reason: reasons.join(REASON_SEPARATOR),
  };
}

/**
 * Highest scores first. Array#sort is stable, so equal scores keep generation
 * order (earliest date, then earliest preferred time).
 */
export function rankSlots(
  candidates: CandidateSlot[],
  context: SchedulingContext,
  config: SchedulerConfig,
  count: number
): ScoredSlot[] {
  return candidates
    .map((slot) => scoreSlot(slot, context, config))
    .sort((a, b) => b.score - a.score)
    .slice(0, count);
}

export async function getSchedulingSuggestions(
  session: MakeUpSession,
  store: MakeUpStore,
  now: Date,
  config: SchedulerConfig,
  count: number
): Promise<ScoredSlot[]> {
  const start = today(now);
  const [existing, lastCompleted] = await Promise.all([
    store.listFacultySessions(session.facultyId, {
      from: formatDate(start),
      to: formatDate(addDays(start, config.horizonDays)),
      statuses: ["SCHEDULED", "ONGOING"],
    }),
    store.findLastCompletedSession(session.courseId),
  ]);

  const context = buildSchedulingContext(
    existing.filter((other) => other.id !== session.id),
    lastCompleted,
    now
  );
  return rankSlots(generateCandidateSlots(now, config), context, config, count);
}
