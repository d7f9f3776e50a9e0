/* eslint-disable */
import { addMinutes, differenceInSeconds } from "date-fns";
import type { RandomSource } from "../utils/clock";
import { InvalidTransitionError } from "./errors";
import type { CodeStatus, MakeUpSession, SessionPatch, SessionStatus } from "./types";

export const CODE_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";
export const CODE_LENGTH = 6;

/**
 * Six symbols from a 36-character alphabet, about 31 bits. Not secret-grade:
 * codes only work inside an activation window and for enrolled students.
 * Uniqueness is checked by the store, not here.
 */
export function generateRemedialCode(random: RandomSource = Math.random): string {
  let code = "";
  for (let i = 0; i < CODE_LENGTH; i++) {
    code += CODE_ALPHABET[Math.floor(random() * CODE_ALPHABET.length)];
  }
  return code;
}

/** Returns the normalized code, or null when it cannot be a remedial code. */
export function normalizeSubmittedCode(input: string): string | null {
  const code = input.trim().toUpperCase();
  // counted in code points, so an astral symbol is one character
  return [...code].length === CODE_LENGTH ? code : null;
}

export function isCodeValid(session: MakeUpSession, now: Date): boolean {
  if (!session.codeActive) return false;
  if (session.codeExpiresAt && now > session.codeExpiresAt) return false;
  return true;
}

export function isTerminal(status: SessionStatus): boolean {
  return status === "COMPLETED" || status === "CANCELLED";
}

/** Re-activating an active session restarts its window. */
export function activateCode(
  session: MakeUpSession,
  now: Date,
  durationMinutes: number
): SessionPatch {
  if (isTerminal(session.status)) {
    throw new InvalidTransitionError("activate the code of", session.status.toLowerCase());
  }
  return {
    codeActive: true,
    codeActivatedAt: now,
    codeExpiresAt: addMinutes(now, durationMinutes),
    status: "ONGOING",
  };
}

/** Closes attendance. Returns null when the session is already completed. */
export function deactivateCode(session: MakeUpSession): SessionPatch | null {
  if (session.status === "COMPLETED") return null;
  if (session.status === "CANCELLED") {
    throw new InvalidTransitionError("close", "cancelled");
  }
  return { codeActive: false, status: "COMPLETED" };
}

export function cancelSession(session: MakeUpSession): SessionPatch {
  if (isTerminal(session.status)) {
    throw new InvalidTransitionError("cancel", session.status.toLowerCase());
  }
  return { codeActive: false, status: "CANCELLED" };
}

export function codeStatus(session: MakeUpSession, now: Date): CodeStatus {
  const active = isCodeValid(session, now);
  let expiresInSeconds = 0;
  if (active && session.codeExpiresAt) {
    expiresInSeconds = Math.max(0, differenceInSeconds(session.codeExpiresAt, now));
  }
  return { active, expiresInSeconds, status: session.status };
}
