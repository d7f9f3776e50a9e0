/* eslint-disable */
import type { StudentDashboardEntry, SessionDetail } from "./service";
import type { MakeUpAttendance, MakeUpSession, SchedulingSuggestion } from "./types";

// Callable responses are plain JSON, so timestamps leave as ISO strings.

function iso(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

export function sessionJson(session: MakeUpSession) {
  return {
    ...session,
    codeActivatedAt: iso(session.codeActivatedAt),
    codeExpiresAt: iso(session.codeExpiresAt),
    createdAt: session.createdAt.toISOString(),
  };
}

export function attendanceJson(attendance: MakeUpAttendance) {
  return { ...attendance, markedAt: attendance.markedAt.toISOString() };
}

export function suggestionJson(suggestion: SchedulingSuggestion) {
  return { ...suggestion, createdAt: suggestion.createdAt.toISOString() };
}

export function sessionDetailJson(detail: SessionDetail) {
  return {
    ...detail,
    session: sessionJson(detail.session),
    attendances: detail.attendances.map(attendanceJson),
    suggestions: detail.suggestions.map(suggestionJson),
  };
}

export function studentEntryJson({ session, marked }: StudentDashboardEntry) {
  return {
    marked,
    session: {
      ...session,
      codeActivatedAt: iso(session.codeActivatedAt),
      codeExpiresAt: iso(session.codeExpiresAt),
      createdAt: session.createdAt.toISOString(),
    },
  };
}
