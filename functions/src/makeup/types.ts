/* eslint-disable */

export type SessionStatus = "SCHEDULED" | "ONGOING" | "COMPLETED" | "CANCELLED";

export const SESSION_STATUSES = ["SCHEDULED", "ONGOING", "COMPLETED", "CANCELLED"] as const;

export type MakeUpReason = "HOLIDAY" | "SICK" | "EVENT" | "EXTRA" | "OTHER";

export const MAKEUP_REASONS = ["HOLIDAY", "SICK", "EVENT", "EXTRA", "OTHER"] as const;

export type MakeUpAttendanceStatus = "PRESENT" | "ABSENT";

export interface MakeUpSession {
  id: string;
  facultyId: string;
  courseId: string;
  date: string; // yyyy-MM-dd
  startTime: string; // HH:mm
  endTime: string; // HH:mm
  venue: string;
  reason: MakeUpReason;
  notes: string;
  remedialCode: string;
  codeActive: boolean;
  codeActivatedAt: Date | null;
  codeExpiresAt: Date | null;
  status: SessionStatus;
  aiScore: number;
  createdAt: Date;
}

export type NewMakeUpSession = Omit<MakeUpSession, "id">;

/** Fields a lifecycle transition may change on a stored session. */
export type SessionPatch = Partial<
  Pick<
    MakeUpSession,
    | "codeActive"
    | "codeActivatedAt"
    | "codeExpiresAt"
    | "status"
    | "aiScore"
    | "date"
    | "startTime"
    | "endTime"
  >
>;

export interface MakeUpAttendance {
  sessionId: string;
  studentId: string;
  status: MakeUpAttendanceStatus;
  markedAt: Date;
  codeUsed: string;
  ipAddress: string | null;
}

export interface SchedulingSuggestion {
  id: string;
  sessionId: string;
  suggestedDate: string;
  suggestedTime: string;
  score: number;
  reason: string;
  /** Position in the ranking the scheduler returned. */
  rank: number;
  isAccepted: boolean;
  createdAt: Date;
}

/** A scored slot before it is stored against a session. */
export interface ScoredSlot {
  date: string;
  time: string;
  score: number;
  reason: string;
}

export interface Course {
  id: string;
  code: string;
  name: string;
  facultyId: string | null;
  studentIds: string[];
}

export interface CodeStatus {
  active: boolean;
  expiresInSeconds: number;
  status: SessionStatus;
}

export type AttendanceRejection =
  | "malformed"
  | "invalidCode"
  | "notActive"
  | "expired"
  | "notEnrolled"
  | "alreadyMarked";

export type AttendanceResult =
  | { ok: true; attendance: MakeUpAttendance; session: MakeUpSession }
  | { ok: false; reason: AttendanceRejection; message: string };

export type SuggestionOutcome =
  | { ok: true; suggestions: SchedulingSuggestion[] }
  | { ok: false; error: unknown };
