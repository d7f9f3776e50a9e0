/* eslint-disable */
import { initializeApp, getApps } from "firebase-admin/app";
import { getFirestore } from "firebase-admin/firestore";
import * as logger from "firebase-functions/logger";
import { type MakeUpConfig, resolveMakeUpConfig } from "./config";
import { FirestoreCourseDirectory, FirestoreMakeUpStore } from "./makeup/firestoreStore";
import { MakeUpService } from "./makeup/service";
import { systemClock } from "./utils/clock";

// Initialize Firebase Admin only once
if (!getApps().length) {
  initializeApp();
}

export const db = getFirestore();

/** Defaults overlaid with CONFIG/APP_CONFIG.makeup, read on every call. */
export async function loadMakeUpConfig(): Promise<MakeUpConfig> {
  const configSnap = await db.collection("CONFIG").doc("APP_CONFIG").get();
  const resolution = resolveMakeUpConfig(configSnap.get("makeup"));
  if (!resolution.ok) {
    logger.warn("Ignoring invalid make-up config overrides", { issues: resolution.issues });
  }
  return resolution.config;
}

export const makeUpService = new MakeUpService({
  store: new FirestoreMakeUpStore(db),
  courses: new FirestoreCourseDirectory(db),
  clock: systemClock,
  loadConfig: loadMakeUpConfig,
});
