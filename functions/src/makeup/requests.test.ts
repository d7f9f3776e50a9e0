import { describe, expect, it } from "vitest";
import { MakeUpError } from "./errors";
import { ActivateCodeSchema, MarkAttendanceSchema, parseRequest, ScheduleSessionSchema } from "./requests";

const valid = {
  courseId: "course-1",
  date: "2026-10-21",
  startTime: "08:00:00",
  endTime: "09:00",
  venue: " Block 32 Room 101 ",
};

describe("parseRequest", () => {
  it("fills defaults and normalizes times", () => {
    expect(parseRequest(ScheduleSessionSchema, valid)).toEqual({
      courseId: "course-1",
      date: "2026-10-21",
      startTime: "08:00",
      endTime: "09:00",
      venue: "Block 32 Room 101",
      reason: "OTHER",
      notes: "",
    });
  });

  it("reports missing required fields", () => {
    const { venue, ...withoutVenue } = valid;

    expect(() => parseRequest(ScheduleSessionSchema, withoutVenue)).toThrow(
      new MakeUpError("invalid-argument", "Please fill all required fields.")
    );
    expect(() => parseRequest(ScheduleSessionSchema, { ...valid, venue: "   " })).toThrow(
      "Please fill all required fields."
    );
    expect(() => parseRequest(ScheduleSessionSchema, undefined)).toThrow("Please fill all required fields.");
  });

  it("rejects dates that do not exist", () => {
    expect(() => parseRequest(ScheduleSessionSchema, { ...valid, date: "2026-02-30" })).toThrow(
      "Date must be yyyy-MM-dd."
    );
  });

  it("rejects an unknown reason", () => {
    expect(() => parseRequest(ScheduleSessionSchema, { ...valid, reason: "BORED" })).toThrow(MakeUpError);
  });

  it("coerces a form-posted duration", () => {
    expect(parseRequest(ActivateCodeSchema, { sessionId: "s1", durationMinutes: "45" })).toEqual({
      sessionId: "s1",
      durationMinutes: 45,
    });
  });

  it("reads a missing or non-text code as empty", () => {
    expect(parseRequest(MarkAttendanceSchema, {})).toEqual({ code: "" });
    expect(parseRequest(MarkAttendanceSchema, { code: 123456 })).toEqual({ code: "" });
    expect(parseRequest(MarkAttendanceSchema, { code: "abc123" })).toEqual({ code: "abc123" });
  });
});
