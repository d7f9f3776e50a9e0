/* eslint-disable */
import { firestore, https } from "firebase-functions/v1";
import * as logger from "firebase-functions/logger";
import { db, makeUpService } from "./firebase";
import { MakeUpError } from "./makeup/errors";
import { purgeSessionRecords } from "./makeup/firestoreStore";
import {
  AcceptSuggestionSchema,
  ActivateCodeSchema,
  MarkAttendanceSchema,
  parseRequest,
  ScheduleSessionSchema,
  SessionRefSchema,
} from "./makeup/requests";
import {
  sessionDetailJson,
  sessionJson,
  studentEntryJson,
  suggestionJson,
} from "./makeup/serialize";
import { logStatus } from "./utils/log";

type CallableHandler<T> = (data: unknown, uid: string, context: https.CallableContext) => Promise<T>;

async function toHttpsError(name: string, error: unknown): Promise<https.HttpsError> {
  if (error instanceof https.HttpsError) return error;
  if (error instanceof MakeUpError) {
    return new https.HttpsError(error.code, error.message);
  }
  const errorMessage = `Error (${name}): ${error}`;
  logger.error(errorMessage);
  await logStatus("error", errorMessage);
  return new https.HttpsError("internal", "Something went wrong. Please try again.");
}

/** Signed-in callable; domain errors become HttpsErrors with the same code. */
function callable<T>(name: string, handler: CallableHandler<T>) {
  return https.onCall(async (data: unknown, context) => {
    const uid = context.auth?.uid;
    if (!uid) {
      throw new https.HttpsError("unauthenticated", "Please sign in to continue.");
    }
    try {
      return await handler(data, uid, context);
    } catch (error) {
      throw await toHttpsError(name, error);
    }
  });
}

// Faculty

export const scheduleMakeUpSession = callable("scheduleMakeUpSession", async (data, uid) => {
  const input = parseRequest(ScheduleSessionSchema, data);
  const { session, suggestions } = await makeUpService.scheduleSession(uid, input);

  if (suggestions.ok) {
    await logStatus("success");
  } else {
    await logStatus("error", `Suggestions failed for session ${session.id}: ${suggestions.error}`);
  }

  return {
    session: sessionJson(session),
    suggestions: suggestions.ok ? suggestions.suggestions.map(suggestionJson) : [],
    message: `Make-up class scheduled! Remedial Code: ${session.remedialCode}`,
  };
});

export const activateRemedialCode = callable("activateRemedialCode", async (data, uid) => {
  const { sessionId, durationMinutes } = parseRequest(ActivateCodeSchema, data);
  const status = await makeUpService.activate(uid, sessionId, durationMinutes);
  const minutes = Math.round(status.expiresInSeconds / 60);
  return {
    ...status,
    message: `Code activated! Students have ${minutes} minutes to mark attendance.`,
  };
});

export const deactivateRemedialCode = callable("deactivateRemedialCode", async (data, uid) => {
  const { sessionId } = parseRequest(SessionRefSchema, data);
  const status = await makeUpService.deactivate(uid, sessionId);
  return { ...status, message: "Attendance closed. Session marked as completed." };
});

export const regenerateRemedialCode = callable("regenerateRemedialCode", async (data, uid) => {
  const { sessionId } = parseRequest(SessionRefSchema, data);
  const remedialCode = await makeUpService.regenerate(uid, sessionId);
  return { remedialCode, message: `New remedial code generated: ${remedialCode}` };
});

export const cancelMakeUpSession = callable("cancelMakeUpSession", async (data, uid) => {
  const { sessionId } = parseRequest(SessionRefSchema, data);
  const session = await makeUpService.cancel(uid, sessionId);
  return { session: sessionJson(session), message: "Make-up class cancelled." };
});

export const acceptSchedulingSuggestion = callable("acceptSchedulingSuggestion", async (data, uid) => {
  const { sessionId, suggestionId } = parseRequest(AcceptSuggestionSchema, data);
  const session = await makeUpService.acceptSuggestion(uid, sessionId, suggestionId);
  return {
    session: sessionJson(session),
    message: `Make-up class moved to ${session.date} at ${session.startTime}.`,
  };
});

export const getMakeUpSessionDetail = callable("getMakeUpSessionDetail", async (data, uid) => {
  const { sessionId } = parseRequest(SessionRefSchema, data);
  return sessionDetailJson(await makeUpService.sessionDetail(uid, sessionId));
});

export const getFacultyMakeUpDashboard = callable("getFacultyMakeUpDashboard", async (_data, uid) => {
  const { upcoming, completed } = await makeUpService.facultyDashboard(uid);
  return { upcoming: upcoming.map(sessionJson), completed: completed.map(sessionJson) };
});

// Student

export const getStudentMakeUpDashboard = callable("getStudentMakeUpDashboard", async (_data, uid) => {
  const entries = await makeUpService.studentDashboard(uid);
  return { sessions: entries.map(studentEntryJson) };
});

export const markMakeUpAttendance = callable("markMakeUpAttendance", async (data, uid, context) => {
  const { code } = parseRequest(MarkAttendanceSchema, data);
  const result = await makeUpService.submitAttendance(uid, code, context.rawRequest.ip ?? null);
  if (!result.ok) {
    return { ok: false, reason: result.reason, message: result.message };
  }
  return {
    ok: true,
    message: `Attendance marked for the make-up class on ${result.session.date}!`,
  };
});

// Code status poll, e.g. GET /remedialCodeStatus?sessionId=abc
export const remedialCodeStatus = https.onRequest(async (req, res) => {
  const sessionId = req.query.sessionId;
  if (typeof sessionId !== "string" || !sessionId) {
    res.status(400).json({ error: "sessionId is required" });
    return;
  }

  try {
    res.json(await makeUpService.codeStatus(sessionId));
  } catch (error) {
    if (error instanceof MakeUpError && error.code === "not-found") {
      res.status(404).json({ error: error.message });
      return;
    }
    logger.error("Error reading code status:", error);
    res.status(500).json({ error: "internal" });
  }
});

// Cascade cleanup when a session document is deleted
export const onMakeUpSessionDelete = firestore
  .document("MAKEUP_SESSIONS/{sessionId}")
  .onDelete(async (snapshot, context) => {
    const remedialCode = snapshot.get("remedialCode");
    if (typeof remedialCode !== "string") {
      logger.error("No remedial code on the deleted session document.");
      return;
    }

    try {
      await purgeSessionRecords(db, context.params.sessionId, remedialCode);
      const successMessage = `Make-up records removed for session: ${context.params.sessionId}`;
      logger.info(successMessage);
      await logStatus("success", successMessage);
    } catch (error) {
      const errorMessage = `Error (Session Id ${context.params.sessionId}): ${error}`;
      logger.error(errorMessage);
      await logStatus("error", errorMessage);
    }
  });
