/* eslint-disable */
import * as logger from "firebase-functions/logger";
import type { MakeUpConfig } from "../config";
import type { Clock, RandomSource } from "../utils/clock";
import { formatDate, formatMinutes, minutesOf, today } from "../utils/calendar";
import { type AttendanceSubmission, submitAttendance } from "./attendance";
import { DuplicateCodeError, MakeUpError } from "./errors";
import {
  activateCode,
  cancelSession,
  codeStatus,
  deactivateCode,
  generateRemedialCode,
} from "./remedialCode";
import type { ScheduleSessionInput } from "./requests";
import { getSchedulingSuggestions } from "./scheduler";
import type { CourseDirectory, MakeUpStore } from "./store";
import type {
  AttendanceResult,
  CodeStatus,
  MakeUpAttendance,
  MakeUpSession,
  NewMakeUpSession,
  SchedulingSuggestion,
  SuggestionOutcome,
} from "./types";

export interface MakeUpServiceDeps {
  store: MakeUpStore;
  courses: CourseDirectory;
  clock: Clock;
  random?: RandomSource;
  loadConfig: () => Promise<MakeUpConfig>;
}

export interface SessionDetail {
  session: MakeUpSession;
  attendances: MakeUpAttendance[];
  suggestions: SchedulingSuggestion[];
  attendanceCount: number;
  totalEnrolled: number;
  attendancePercent: number;
  isUpcoming: boolean;
}

export interface FacultyDashboard {
  upcoming: MakeUpSession[];
  completed: MakeUpSession[];
}

/** What a student sees of a session: everything except its code. */
export type StudentSessionView = Omit<MakeUpSession, "remedialCode">;

export interface StudentDashboardEntry {
  session: StudentSessionView;
  marked: boolean;
}

const DETAIL_SUGGESTIONS = 3;

function newestFirst(a: MakeUpSession, b: MakeUpSession): number {
  return b.date.localeCompare(a.date) || b.startTime.localeCompare(a.startTime);
}

function assertMovable(session: MakeUpSession): void {
  if (session.status !== "SCHEDULED") {
    throw new MakeUpError("failed-precondition", "Only scheduled sessions can be moved.");
  }
}

export function isUpcoming(session: MakeUpSession, now: Date): boolean {
  return session.date >= formatDate(today(now)) && session.status === "SCHEDULED";
}

export class MakeUpService {
  private readonly store: MakeUpStore;
  private readonly courses: CourseDirectory;
  private readonly clock: Clock;
  private readonly random: RandomSource;
  private readonly loadConfig: () => Promise<MakeUpConfig>;

  constructor(deps: MakeUpServiceDeps) {
    this.store = deps.store;
    this.courses = deps.courses;
    this.clock = deps.clock;
    this.random = deps.random ?? Math.random;
    this.loadConfig = deps.loadConfig;
  }

  /**
   * Creates a SCHEDULED session with a fresh code, then scores alternative
   * slots for it. The session stands even when suggestion generation fails.
   */
  async scheduleSession(
    facultyId: string,
    input: ScheduleSessionInput
  ): Promise<{ session: MakeUpSession; suggestions: SuggestionOutcome }> {
    const course = await this.courses.getCourse(input.courseId);
    if (!course || course.facultyId !== facultyId) {
      throw new MakeUpError("not-found", "Course not found.");
    }

    const config = await this.loadConfig();
    const draft: Omit<NewMakeUpSession, "remedialCode"> = {
      facultyId,
      courseId: course.id,
      date: input.date,
      startTime: input.startTime,
      endTime: input.endTime,
      venue: input.venue,
      reason: input.reason,
      notes: input.notes,
      codeActive: false,
      codeActivatedAt: null,
      codeExpiresAt: null,
      status: "SCHEDULED",
      aiScore: 0,
      createdAt: this.clock.now(),
    };

    const session = await this.withFreshCode(config.code.generationAttempts, (remedialCode) =>
      this.store.createSession({ ...draft, remedialCode })
    );
    logger.info("Make-up session scheduled", { sessionId: session.id, courseId: course.id });

    if (!config.suggestions.enabled) {
      return { session, suggestions: { ok: true, suggestions: [] } };
    }

    const suggestions = await this.createSuggestions(session, config.suggestions.count);
    if (suggestions.ok && suggestions.suggestions.length > 0) {
      return { session: { ...session, aiScore: suggestions.suggestions[0].score }, suggestions };
    }
    return { session, suggestions };
  }

  /** Best-effort: failures are logged and returned, never thrown. */
  async createSuggestions(session: MakeUpSession, count?: number): Promise<SuggestionOutcome> {
    try {
      const config = await this.loadConfig();
      const now = this.clock.now();
      const slots = await getSchedulingSuggestions(
        session,
        this.store,
        now,
        config.scheduler,
        count ?? config.suggestions.count
      );
      const suggestions = await this.store.saveSuggestions(session.id, slots, now);
      if (slots.length > 0) {
        await this.store.updateSession(session.id, { aiScore: slots[0].score });
      }
      return { ok: true, suggestions };
    } catch (error) {
      logger.warn("Scheduling suggestions failed", { sessionId: session.id, error: String(error) });
      return { ok: false, error };
    }
  }

  async activate(facultyId: string, sessionId: string, durationMinutes?: number): Promise<CodeStatus> {
    const session = await this.getOwnedSession(facultyId, sessionId);
    const { code } = await this.loadConfig();
    const duration = durationMinutes ?? code.defaultDurationMinutes;
    if (duration > code.maxDurationMinutes) {
      throw new MakeUpError(
        "invalid-argument",
        `Duration cannot exceed ${code.maxDurationMinutes} minutes.`
      );
    }

    const now = this.clock.now();
    const updated = await this.store.transitionSession(session.id, (current) =>
      activateCode(current, now, duration)
    );
    logger.info("Remedial code activated", { sessionId, duration });
    return codeStatus(updated, now);
  }

  async deactivate(facultyId: string, sessionId: string): Promise<CodeStatus> {
    const session = await this.getOwnedSession(facultyId, sessionId);
    let closed = false;
    const updated = await this.store.transitionSession(session.id, (current) => {
      const patch = deactivateCode(current);
      closed = patch !== null;
      return patch;
    });
    if (closed) logger.info("Attendance closed", { sessionId });
    return codeStatus(updated, this.clock.now());
  }

  /**
   * Replaces a possibly leaked code, whatever the session's status. The
   * activation window is left as is.
   */
  async regenerate(facultyId: string, sessionId: string): Promise<string> {
    const session = await this.getOwnedSession(facultyId, sessionId);
    const { code } = await this.loadConfig();

    const remedialCode = await this.withFreshCode(code.generationAttempts, async (candidate) => {
      await this.store.replaceCode(session.id, session.remedialCode, candidate);
      return candidate;
    });
    logger.info("Remedial code regenerated", { sessionId });
    return remedialCode;
  }

  async cancel(facultyId: string, sessionId: string): Promise<MakeUpSession> {
    const session = await this.getOwnedSession(facultyId, sessionId);
    const cancelled = await this.store.transitionSession(session.id, cancelSession);
    logger.info("Make-up session cancelled", { sessionId });
    return cancelled;
  }

  async submitAttendance(
    studentId: string,
    code: string,
    ipAddress: string | null
  ): Promise<AttendanceResult> {
    const submission: AttendanceSubmission = { code, studentId, ipAddress };
    const result = await submitAttendance(submission, this.store, this.courses, this.clock.now());
    if (result.ok) {
      logger.info("Make-up attendance marked", { sessionId: result.session.id, studentId });
    } else {
      logger.info("Make-up attendance rejected", { studentId, reason: result.reason });
    }
    return result;
  }

  async codeStatus(sessionId: string): Promise<CodeStatus> {
    const session = await this.requireSession(sessionId);
    return codeStatus(session, this.clock.now());
  }

  async sessionDetail(facultyId: string, sessionId: string): Promise<SessionDetail> {
    const session = await this.getOwnedSession(facultyId, sessionId);
    const [attendances, suggestions, course] = await Promise.all([
      this.store.listAttendances(session.id),
      this.store.listSuggestions(session.id, DETAIL_SUGGESTIONS),
      this.courses.getCourse(session.courseId),
    ]);

    const attendanceCount = attendances.filter((a) => a.status === "PRESENT").length;
    const totalEnrolled = course?.studentIds.length ?? 0;
    const attendancePercent =
      totalEnrolled === 0 ? 0 : Math.round((attendanceCount / totalEnrolled) * 1000) / 10;

    return {
      session,
      attendances,
      suggestions,
      attendanceCount,
      totalEnrolled,
      attendancePercent,
      isUpcoming: isUpcoming(session, this.clock.now()),
    };
  }

  async facultyDashboard(facultyId: string): Promise<FacultyDashboard> {
    const sessions = (await this.store.listFacultySessions(facultyId)).sort(newestFirst);
    return {
      upcoming: sessions.filter((s) => s.status === "SCHEDULED" || s.status === "ONGOING"),
      completed: sessions.filter((s) => s.status === "COMPLETED"),
    };
  }

  async studentDashboard(studentId: string): Promise<StudentDashboardEntry[]> {
    const courses = await this.courses.listStudentCourses(studentId);
    if (courses.length === 0) return [];

    const [sessions, marked] = await Promise.all([
      this.store.listCourseSessions(courses.map((c) => c.id)),
      this.store.listMarkedSessionIds(studentId),
    ]);

    return sessions.sort(newestFirst).map(({ remedialCode, ...session }) => ({
      session,
      marked: marked.has(session.id),
    }));
  }

  /** Moves a scheduled session to the chosen slot, keeping its length. */
  async acceptSuggestion(
    facultyId: string,
    sessionId: string,
    suggestionId: string
  ): Promise<MakeUpSession> {
    const session = await this.getOwnedSession(facultyId, sessionId);
    assertMovable(session);
    const suggestion = await this.store.getSuggestion(session.id, suggestionId);
    if (!suggestion) {
      throw new MakeUpError("not-found", "Suggestion not found.");
    }

    const moved = await this.store.transitionSession(session.id, (current) => {
      assertMovable(current);
      const length = Math.max(0, minutesOf(current.endTime) - minutesOf(current.startTime));
      return {
        date: suggestion.suggestedDate,
        startTime: suggestion.suggestedTime,
        endTime: formatMinutes(minutesOf(suggestion.suggestedTime) + length),
      };
    });
    await this.store.markSuggestionAccepted(session.id, suggestion.id);
    return moved;
  }

  private async requireSession(sessionId: string): Promise<MakeUpSession> {
    const session = await this.store.getSession(sessionId);
    if (!session) {
      throw new MakeUpError("not-found", "Session not found.");
    }
    return session;
  }

  private async getOwnedSession(facultyId: string, sessionId: string): Promise<MakeUpSession> {
    const session = await this.requireSession(sessionId);
    if (session.facultyId !== facultyId) {
      throw new MakeUpError("permission-denied", "Access denied.");
    }
    return session;
  }

  private async withFreshCode<T>(attempts: number, write: (code: string) => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      const code = generateRemedialCode(this.random);
      try {
        return await write(code);
      } catch (err) {
        if (!(err instanceof DuplicateCodeError) || attempt >= attempts) throw err;
        logger.warn("Remedial code collision, retrying", { attempt });
      }
    }
  }
}
