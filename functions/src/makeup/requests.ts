/* eslint-disable */
import { z } from "zod";
import { isCalendarDate, isClockTime, normalizeTime } from "../utils/calendar";
import { MakeUpError } from "./errors";
import { MAKEUP_REASONS } from "./types";

const REQUIRED_FIELDS_MESSAGE = "Please fill all required fields.";

const requiredText = z
  .string({ required_error: REQUIRED_FIELDS_MESSAGE, invalid_type_error: REQUIRED_FIELDS_MESSAGE })
  .trim()
  .min(1, REQUIRED_FIELDS_MESSAGE);

export const ScheduleSessionSchema = z.object({
  courseId: requiredText,
  date: requiredText.refine(isCalendarDate, "Date must be yyyy-MM-dd."),
  startTime: requiredText.refine(isClockTime, "Start time must be HH:mm.").transform(normalizeTime),
  endTime: requiredText.refine(isClockTime, "End time must be HH:mm.").transform(normalizeTime),
  venue: requiredText.max(100),
  reason: z.enum(MAKEUP_REASONS).default("OTHER"),
  notes: z.string().trim().default(""),
});

export type ScheduleSessionInput = z.infer<typeof ScheduleSessionSchema>;

export const SessionRefSchema = z.object({
  sessionId: requiredText,
});

export const ActivateCodeSchema = SessionRefSchema.extend({
  durationMinutes: z.coerce.number().int().positive().optional(),
});

export const AcceptSuggestionSchema = SessionRefSchema.extend({
  suggestionId: requiredText,
});

// A missing code is an empty one, which attendance reports as malformed.
export const MarkAttendanceSchema = z.object({
  code: z.string().catch(""),
});

/** Parses a callable payload, reporting the first problem as invalid-argument. */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, data: unknown): z.output<T> {
  const parsed = schema.safeParse(data ?? {});
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    throw new MakeUpError("invalid-argument", issue?.message ?? REQUIRED_FIELDS_MESSAGE);
  }
  return parsed.data;
}
