/* eslint-disable */

/** Subset of the callable error codes the make-up functions report. */
export type MakeUpErrorCode =
  | "invalid-argument"
  | "not-found"
  | "permission-denied"
  | "failed-precondition"
  | "already-exists"
  | "unauthenticated";

export class MakeUpError extends Error {
  constructor(readonly code: MakeUpErrorCode, message: string) {
    super(message);
    this.name = "MakeUpError";
  }
}

export class DuplicateCodeError extends MakeUpError {
  constructor(readonly remedialCode: string) {
    super("already-exists", `Remedial code ${remedialCode} is already in use.`);
    this.name = "DuplicateCodeError";
  }
}

export class DuplicateAttendanceError extends MakeUpError {
  constructor(sessionId: string, studentId: string) {
    super("already-exists", `Attendance already recorded for ${studentId} in session ${sessionId}.`);
    this.name = "DuplicateAttendanceError";
  }
}

export class InvalidTransitionError extends MakeUpError {
  constructor(action: string, status: string) {
    super("failed-precondition", `Cannot ${action} a session that is ${status}.`);
    this.name = "InvalidTransitionError";
  }
}
