/* eslint-disable */
import { type DocumentSnapshot, type Firestore, Timestamp } from "firebase-admin/firestore";
import { z } from "zod";
import { DuplicateAttendanceError, DuplicateCodeError, MakeUpError } from "./errors";
import type { CourseDirectory, FacultySessionQuery, MakeUpStore } from "./store";
import {
  type Course,
  MAKEUP_REASONS,
  type MakeUpAttendance,
  type MakeUpSession,
  type NewMakeUpSession,
  type ScoredSlot,
  type SchedulingSuggestion,
  SESSION_STATUSES,
  type SessionPatch,
} from "./types";

export const SESSIONS = "MAKEUP_SESSIONS";
export const ATTENDANCE = "ATTENDANCE";
export const SUGGESTIONS = "SUGGESTIONS";
export const CODES = "REMEDIAL_CODES";
export const COURSES = "COURSES";

// Firestore "in" filters take at most 30 values.
const IN_FILTER_LIMIT = 30;

const timestamp = z.instanceof(Timestamp).transform((value) => value.toDate());

const SessionDocSchema = z.object({
  facultyId: z.string(),
  courseId: z.string(),
  date: z.string(),
  startTime: z.string(),
  endTime: z.string(),
  venue: z.string(),
  reason: z.enum(MAKEUP_REASONS).default("OTHER"),
  notes: z.string().default(""),
  remedialCode: z.string(),
  codeActive: z.boolean().default(false),
  codeActivatedAt: timestamp.nullable().default(null),
  codeExpiresAt: timestamp.nullable().default(null),
  status: z.enum(SESSION_STATUSES),
  aiScore: z.number().default(0),
  createdAt: timestamp,
});

const AttendanceDocSchema = z.object({
  sessionId: z.string(),
  studentId: z.string(),
  status: z.enum(["PRESENT", "ABSENT"]),
  markedAt: timestamp,
  codeUsed: z.string(),
  ipAddress: z.string().nullable().default(null),
});

const SuggestionDocSchema = z.object({
  suggestedDate: z.string(),
  suggestedTime: z.string(),
  score: z.number(),
  reason: z.string(),
  rank: z.number().int().default(0),
  isAccepted: z.boolean().default(false),
  createdAt: timestamp,
});

const CodeDocSchema = z.object({ sessionId: z.string() });

const CourseDocSchema = z.object({
  code: z.string(),
  name: z.string(),
  facultyId: z.string().nullable().default(null),
  studentIds: z.array(z.string()).default([]),
});

function parseDoc<T extends z.ZodTypeAny>(
  schema: T,
  snap: DocumentSnapshot
): z.output<T> {
  const parsed = schema.safeParse(snap.data());
  if (!parsed.success) {
    throw new Error(`Malformed document ${snap.ref.path}: ${parsed.error.message}`);
  }
  return parsed.data;
}

function toSession(snap: DocumentSnapshot): MakeUpSession {
  return { id: snap.id, ...parseDoc(SessionDocSchema, snap) };
}

function toSuggestion(sessionId: string, snap: DocumentSnapshot): SchedulingSuggestion {
  return { id: snap.id, sessionId, ...parseDoc(SuggestionDocSchema, snap) };
}

/** gRPC ALREADY_EXISTS, raised by create() on an existing document. */
export function isAlreadyExists(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    (err.code === 6 || err.code === "already-exists")
  );
}

export class FirestoreMakeUpStore implements MakeUpStore {
  constructor(private readonly db: Firestore) {}

  private sessionRef(sessionId: string) {
    return this.db.collection(SESSIONS).doc(sessionId);
  }

  async createSession(draft: NewMakeUpSession): Promise<MakeUpSession> {
    const sessionRef = this.db.collection(SESSIONS).doc();
    const batch = this.db.batch();
    batch.create(this.db.collection(CODES).doc(draft.remedialCode), {
      sessionId: sessionRef.id,
      createdAt: draft.createdAt,
    });
    batch.create(sessionRef, draft);

    try {
      await batch.commit();
    } catch (err) {
      if (isAlreadyExists(err)) throw new DuplicateCodeError(draft.remedialCode);
      throw err;
    }
    return { id: sessionRef.id, ...draft };
  }

  async getSession(sessionId: string): Promise<MakeUpSession | null> {
    const snap = await this.sessionRef(sessionId).get();
    return snap.exists ? toSession(snap) : null;
  }

  async findSessionByCode(code: string): Promise<MakeUpSession | null> {
    const codeSnap = await this.db.collection(CODES).doc(code).get();
    if (!codeSnap.exists) return null;
    const { sessionId } = parseDoc(CodeDocSchema, codeSnap);
    return this.getSession(sessionId);
  }

  async updateSession(sessionId: string, patch: SessionPatch): Promise<void> {
    await this.sessionRef(sessionId).update(patch);
  }

  async transitionSession(
    sessionId: string,
    apply: (session: MakeUpSession) => SessionPatch | null
  ): Promise<MakeUpSession> {
    const sessionRef = this.sessionRef(sessionId);
    return this.db.runTransaction(async (tx) => {
      const snap = await tx.get(sessionRef);
      if (!snap.exists) throw new MakeUpError("not-found", "Session not found.");
      const session = toSession(snap);
      const patch = apply(session);
      if (!patch) return session;
      tx.update(sessionRef, patch);
      return { ...session, ...patch };
    });
  }

  async replaceCode(sessionId: string, oldCode: string, newCode: string): Promise<void> {
    const sessionRef = this.sessionRef(sessionId);
    const codes = this.db.collection(CODES);
    try {
      await this.db.runTransaction(async (tx) => {
        const snap = await tx.get(sessionRef);
        const current = snap.exists ? toSession(snap).remedialCode : oldCode;
        tx.create(codes.doc(newCode), { sessionId, createdAt: Timestamp.now() });
        tx.delete(codes.doc(current));
        tx.update(sessionRef, { remedialCode: newCode });
      });
    } catch (err) {
      if (isAlreadyExists(err)) throw new DuplicateCodeError(newCode);
      throw err;
    }
  }

  async listFacultySessions(facultyId: string, query?: FacultySessionQuery): Promise<MakeUpSession[]> {
    let ref = this.db.collection(SESSIONS).where("facultyId", "==", facultyId);
    if (query) {
      ref = ref
        .where("status", "in", query.statuses)
        .where("date", ">=", query.from)
        .where("date", "<=", query.to);
    }
    const snap = await ref.get();
    return snap.docs.map(toSession);
  }

  async listCourseSessions(courseIds: string[]): Promise<MakeUpSession[]> {
    const sessions: MakeUpSession[] = [];
    for (let i = 0; i < courseIds.length; i += IN_FILTER_LIMIT) {
      const snap = await this.db
        .collection(SESSIONS)
        .where("courseId", "in", courseIds.slice(i, i + IN_FILTER_LIMIT))
        .get();
      sessions.push(...snap.docs.map(toSession));
    }
    return sessions;
  }

  async findLastCompletedSession(courseId: string): Promise<MakeUpSession | null> {
    const snap = await this.db
      .collection(SESSIONS)
      .where("courseId", "==", courseId)
      .where("status", "==", "COMPLETED")
      .orderBy("date", "desc")
      .limit(1)
      .get();
    return snap.empty ? null : toSession(snap.docs[0]);
  }

  async saveSuggestions(
    sessionId: string,
    slots: ScoredSlot[],
    createdAt: Date
  ): Promise<SchedulingSuggestion[]> {
    const collection = this.sessionRef(sessionId).collection(SUGGESTIONS);
    const batch = this.db.batch();
    const saved = slots.map((slot, rank) => {
      const ref = collection.doc();
      const suggestion: SchedulingSuggestion = {
        id: ref.id,
        sessionId,
        suggestedDate: slot.date,
        suggestedTime: slot.time,
        score: slot.score,
        reason: slot.reason,
        rank,
        isAccepted: false,
        createdAt,
      };
      const { id, ...data } = suggestion;
      batch.create(ref, data);
      return suggestion;
    });
    await batch.commit();
    return saved;
  }

  async listSuggestions(sessionId: string, limit: number): Promise<SchedulingSuggestion[]> {
    const snap = await this.sessionRef(sessionId)
      .collection(SUGGESTIONS)
      .orderBy("score", "desc")
      .orderBy("rank", "asc")
      .limit(limit)
      .get();
    return snap.docs.map((doc) => toSuggestion(sessionId, doc));
  }

  async getSuggestion(sessionId: string, suggestionId: string): Promise<SchedulingSuggestion | null> {
    const snap = await this.sessionRef(sessionId).collection(SUGGESTIONS).doc(suggestionId).get();
    return snap.exists ? toSuggestion(sessionId, snap) : null;
  }

  async markSuggestionAccepted(sessionId: string, suggestionId: string): Promise<void> {
    await this.sessionRef(sessionId)
      .collection(SUGGESTIONS)
      .doc(suggestionId)
      .update({ isAccepted: true });
  }

  async createAttendance(record: MakeUpAttendance): Promise<void> {
    // keyed by student, so create() is the (session, student) uniqueness check
    const ref = this.sessionRef(record.sessionId).collection(ATTENDANCE).doc(record.studentId);
    try {
      await ref.create({ ...record });
    } catch (err) {
      if (isAlreadyExists(err)) throw new DuplicateAttendanceError(record.sessionId, record.studentId);
      throw err;
    }
  }

  async hasAttendance(sessionId: string, studentId: string): Promise<boolean> {
    const snap = await this.sessionRef(sessionId).collection(ATTENDANCE).doc(studentId).get();
    return snap.exists;
  }

  async listAttendances(sessionId: string): Promise<MakeUpAttendance[]> {
    const snap = await this.sessionRef(sessionId)
      .collection(ATTENDANCE)
      .orderBy("markedAt", "asc")
      .get();
    return snap.docs.map((doc) => parseDoc(AttendanceDocSchema, doc));
  }

  async listMarkedSessionIds(studentId: string): Promise<Set<string>> {
    const snap = await this.db.collectionGroup(ATTENDANCE).where("studentId", "==", studentId).get();
    return new Set(snap.docs.map((doc) => parseDoc(AttendanceDocSchema, doc).sessionId));
  }
}

export class FirestoreCourseDirectory implements CourseDirectory {
  constructor(private readonly db: Firestore) {}

  async getCourse(courseId: string): Promise<Course | null> {
    const snap = await this.db.collection(COURSES).doc(courseId).get();
    return snap.exists ? { id: snap.id, ...parseDoc(CourseDocSchema, snap) } : null;
  }

  async isEnrolled(courseId: string, studentId: string): Promise<boolean> {
    const course = await this.getCourse(courseId);
    return course?.studentIds.includes(studentId) ?? false;
  }

  async listStudentCourses(studentId: string): Promise<Course[]> {
    const snap = await this.db.collection(COURSES).where("studentIds", "array-contains", studentId).get();
    return snap.docs.map((doc) => ({ id: doc.id, ...parseDoc(CourseDocSchema, doc) }));
  }
}

/**
 * Removes what a deleted session owned: its attendance and suggestion
 * subcollections and, if it still points at the session, its code reservation.
 */
export async function purgeSessionRecords(
  db: Firestore,
  sessionId: string,
  remedialCode: string
): Promise<void> {
  const sessionRef = db.collection(SESSIONS).doc(sessionId);
  await db.recursiveDelete(sessionRef.collection(ATTENDANCE));
  await db.recursiveDelete(sessionRef.collection(SUGGESTIONS));

  const codeRef = db.collection(CODES).doc(remedialCode);
  await db.runTransaction(async (tx) => {
    const snap = await tx.get(codeRef);
    if (snap.exists && snap.get("sessionId") === sessionId) {
      tx.delete(codeRef);
    }
  });
}
