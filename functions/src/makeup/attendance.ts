/* eslint-disable */
import { DuplicateAttendanceError } from "./errors";
import { isCodeValid, normalizeSubmittedCode } from "./remedialCode";
import type { CourseDirectory, MakeUpStore } from "./store";
import type { AttendanceRejection, AttendanceResult, MakeUpAttendance } from "./types";

export interface AttendanceSubmission {
  code: string;
  studentId: string;
  ipAddress: string | null;
}

export const REJECTION_MESSAGES: Record<AttendanceRejection, string> = {
  malformed: "Please enter a valid 6-character code.",
  invalidCode: "Invalid code. Please check and try again.",
  notActive: "Code is not active yet.",
  expired: "Code has expired.",
  notEnrolled: "You are not enrolled in this course.",
  alreadyMarked: "You have already marked attendance.",
};

function reject(reason: AttendanceRejection): AttendanceResult {
  return { ok: false, reason, message: REJECTION_MESSAGES[reason] };
}

/**
 * Records a PRESENT mark for the student, checking in order: code shape, code
 * lookup, activation window, enrollment, prior mark. The first failing check
 * decides the outcome. A concurrent duplicate that slips past the prior-mark
 * check is caught by the store's (session, student) constraint.
 */
export async function submitAttendance(
  submission: AttendanceSubmission,
  store: MakeUpStore,
  courses: CourseDirectory,
  now: Date
): Promise<AttendanceResult> {
  const code = normalizeSubmittedCode(submission.code);
  if (!code) return reject("malformed");

  const session = await store.findSessionByCode(code);
  if (!session) return reject("invalidCode");

  if (!isCodeValid(session, now)) {
    return reject(session.codeActive ? "expired" : "notActive");
  }

  if (!(await courses.isEnrolled(session.courseId, submission.studentId))) {
    return reject("notEnrolled");
  }

  if (await store.hasAttendance(session.id, submission.studentId)) {
    return reject("alreadyMarked");
  }

  const attendance: MakeUpAttendance = {
    sessionId: session.id,
    studentId: submission.studentId,
    status: "PRESENT",
    markedAt: now,
    // the code as typed, kept even if the session's code is regenerated later
    codeUsed: code,
    ipAddress: submission.ipAddress,
  };

  try {
    await store.createAttendance(attendance);
  } catch (err) {
    if (err instanceof DuplicateAttendanceError) return reject("alreadyMarked");
    throw err;
  }

  return { ok: true, attendance, session };
}
