/* eslint-disable */
import { FieldValue } from "firebase-admin/firestore";
import * as logger from "firebase-functions/logger";
import { db } from "../firebase";

/** Keeps the LOGS/firebaseFunction health document current. */
export async function logStatus(status: "success" | "error", message?: string) {
  try {
    if (status === "success") {
      await db.collection("LOGS").doc("firebaseFunction").set(
        {
          health: "Healthy",
          successCount: FieldValue.increment(1),
        },
        { merge: true }
      );
    } else {
      await db.collection("LOGS").doc("firebaseFunction").set(
        {
          health: "Error",
          failureCount: FieldValue.increment(1),
          errors: FieldValue.arrayUnion({
            timestamp: new Date(),
            message: message ?? "unknown error",
          }),
        },
        { merge: true }
      );
    }
  } catch (err) {
    logger.error("LOGGING ERROR:", err);
  }
}
