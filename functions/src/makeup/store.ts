/* eslint-disable */
import type {
  Course,
  MakeUpAttendance,
  MakeUpSession,
  NewMakeUpSession,
  ScoredSlot,
  SchedulingSuggestion,
  SessionPatch,
  SessionStatus,
} from "./types";

export interface FacultySessionQuery {
  from: string;
  to: string;
  statuses: SessionStatus[];
}

/**
 * Persistence for make-up sessions and the records they own.
 *
 * Implementations enforce two uniqueness constraints: a remedial code belongs
 * to at most one session (`DuplicateCodeError`) and a student has at most one
 * attendance row per session (`DuplicateAttendanceError`).
 */
export interface MakeUpStore {
  createSession(draft: NewMakeUpSession): Promise<MakeUpSession>;
  getSession(sessionId: string): Promise<MakeUpSession | null>;
  findSessionByCode(code: string): Promise<MakeUpSession | null>;
  updateSession(sessionId: string, patch: SessionPatch): Promise<void>;
  /**
   * Reads the session and writes `apply`'s patch atomically, so the guard in
   * `apply` always sees the latest status. A null patch writes nothing. Throws
   * not-found for a missing session; errors thrown by `apply` propagate.
   */
  transitionSession(
    sessionId: string,
    apply: (session: MakeUpSession) => SessionPatch | null
  ): Promise<MakeUpSession>;
  /** Swaps the session's code, releasing the old one. */
  replaceCode(sessionId: string, oldCode: string, newCode: string): Promise<void>;
  listFacultySessions(facultyId: string, query?: FacultySessionQuery): Promise<MakeUpSession[]>;
  listCourseSessions(courseIds: string[]): Promise<MakeUpSession[]>;
  findLastCompletedSession(courseId: string): Promise<MakeUpSession | null>;

  saveSuggestions(sessionId: string, slots: ScoredSlot[], createdAt: Date): Promise<SchedulingSuggestion[]>;
  /** Highest score first; equal scores in generation order. */
  listSuggestions(sessionId: string, limit: number): Promise<SchedulingSuggestion[]>;
  getSuggestion(sessionId: string, suggestionId: string): Promise<SchedulingSuggestion | null>;
  markSuggestionAccepted(sessionId: string, suggestionId: string): Promise<void>;

  createAttendance(record: MakeUpAttendance): Promise<void>;
  hasAttendance(sessionId: string, studentId: string): Promise<boolean>;
  /** Oldest mark first. */
  listAttendances(sessionId: string): Promise<MakeUpAttendance[]>;
  listMarkedSessionIds(studentId: string): Promise<Set<string>>;
}

/** Read-only view of courses and their enrollment. */
export interface CourseDirectory {
  getCourse(courseId: string): Promise<Course | null>;
  isEnrolled(courseId: string, studentId: string): Promise<boolean>;
  listStudentCourses(studentId: string): Promise<Course[]>;
}
