import { describe, expect, it } from "vitest";
import { defaultMakeUpConfig } from "../config";
import { formatDate } from "../utils/calendar";
import { makeSession, MemoryMakeUpStore } from "../testing/memoryStore";
import {
  buildSchedulingContext,
  getSchedulingSuggestions,
  rankSlots,
  scoreSlot,
  type SchedulingContext,
} from "./scheduler";
import { generateCandidateSlots } from "./slots";

const NOW = new Date(2026, 9, 19, 9, 0); // Monday
const config = defaultMakeUpConfig.scheduler;

function context(overrides: Partial<SchedulingContext> = {}): SchedulingContext {
  return {
    lastSessionDate: new Date(2026, 9, 18),
    bookedTimes: new Map(),
    weekdayLoad: new Map(),
    ...overrides,
  };
}

describe("scoreSlot", () => {
  const wednesday = { date: "2026-10-21", time: "08:00", weekday: 3 };

  it("gives a well spaced, free morning slot on a quiet day full marks", () => {
    expect(scoreSlot(wednesday, context(), config)).toEqual({
      date: "2026-10-21",
      time: "08:00",
      score: 100,
      reason:
        "good gap of 3 days from last session · morning slot, better learning retention · " +
        "faculty is free at this time · no other sessions on this day",
    });
  });

  it("halves the gap weight once the gap passes the ideal range", () => {
    const scored = scoreSlot(wednesday, context({ lastSessionDate: new Date(2026, 9, 16) }), config);

    expect(scored.score).toBe(85);
    expect(scored.reason.startsWith("adequate gap of 5 days · ")).toBe(true);
  });

  it("halves the balance weight for one existing session without a note", () => {
    const scored = scoreSlot(
      { ...wednesday, time: "14:00" },
      context({ weekdayLoad: new Map([[3, 1]]) }),
      config
    );

    expect(scored.score).toBe(30 + 10 + 40 + 5);
    expect(scored.reason).toBe(
      "good gap of 3 days from last session · early afternoon slot · faculty is free at this time"
    );
  });

  it("keeps a negative raw score instead of flooring it", () => {
    const scored = scoreSlot(
      { date: "2026-10-21", time: "16:00", weekday: 3 },
      context({
        lastSessionDate: new Date(2026, 9, 21),
        bookedTimes: new Map([["2026-10-21", new Set(["16:00"])]]),
        weekdayLoad: new Map([[3, 2]]),
      }),
      config
    );

    expect(scored.score).toBe(-10);
    expect(scored.reason).toBe(
      "close to last session · late afternoon slot · " +
        "⚠ faculty has another session at this time · 2 sessions already on this day"
    );
  });

  it("caps the total at the maximum score", () => {
    const tuned = { ...config, weights: { ...config.weights, gapFromLast: 60 } };

    expect(scoreSlot(wednesday, context(), tuned).score).toBe(100);
  });
});

describe("buildSchedulingContext", () => {
  it("indexes booked times by date and counts sessions per weekday", () => {
    const existing = [
      makeSession({ id: "a", date: "2026-10-21", startTime: "09:00:00" }),
      makeSession({ id: "b", date: "2026-10-21", startTime: "11:00" }),
      makeSession({ id: "c", date: "2026-10-28", startTime: "08:00" }),
    ];

    const ctx = buildSchedulingContext(existing, null, NOW);

    expect([...(ctx.bookedTimes.get("2026-10-21") ?? [])]).toEqual(["09:00", "11:00"]);
    expect(ctx.weekdayLoad.get(3)).toBe(3);
    expect(formatDate(ctx.lastSessionDate)).toBe("2026-10-19");
  });

  it("measures gaps from the last completed session when there is one", () => {
    const ctx = buildSchedulingContext([], makeSession({ date: "2026-10-12" }), NOW);

    expect(formatDate(ctx.lastSessionDate)).toBe("2026-10-12");
  });
});

describe("rankSlots", () => {
  it("breaks ties by generation order", () => {
    const ranked = rankSlots(
      generateCandidateSlots(NOW, config),
      context({ lastSessionDate: new Date(2026, 9, 19) }),
      config,
      3
    );

    expect(ranked.map((s) => `${s.date} ${s.time} ${s.score}`)).toEqual([
      "2026-10-21 08:00 100",
      "2026-10-21 09:00 100",
      "2026-10-21 10:00 100",
    ]);
  });
});

describe("getSchedulingSuggestions", () => {
  it("avoids the faculty's other bookings but ignores the session being scheduled", async () => {
    const store = new MemoryMakeUpStore();
    store.insert(makeSession({ id: "other", remedialCode: "OTHER1", date: "2026-10-21", startTime: "08:00" }));
    store.insert(makeSession({ id: "done", remedialCode: "DONE01", date: "2026-10-22", status: "COMPLETED", courseId: "course-9" }));
    store.insert(makeSession({ id: "later", remedialCode: "LATER1", date: "2026-11-05", startTime: "08:00" }));
    const self = store.insert(makeSession({ id: "self", remedialCode: "SELF01", date: "2026-10-22", startTime: "08:00" }));

    const suggestions = await getSchedulingSuggestions(self, store, NOW, config, 3);

    expect(suggestions.map((s) => `${s.date} ${s.time} ${s.score}`)).toEqual([
      "2026-10-22 08:00 100",
      "2026-10-22 09:00 100",
      "2026-10-22 10:00 100",
    ]);
  });

  it("scores a conflicting slot below its free neighbours", async () => {
    const store = new MemoryMakeUpStore();
    store.insert(makeSession({ id: "other", remedialCode: "OTHER1", date: "2026-10-21", startTime: "08:00" }));
    const self = store.insert(makeSession({ id: "self", remedialCode: "SELF01", date: "2026-10-30" }));

    const all = await getSchedulingSuggestions(self, store, NOW, config, 60);
    const find = (date: string, time: string) =>
      all.find((s) => s.date === date && s.time === time)?.score;

    expect(find("2026-10-21", "08:00")).toBe(30 + 20 - 20 + 5);
    expect(find("2026-10-21", "09:00")).toBe(30 + 20 + 40 + 5);
    expect(find("2026-10-20", "08:00")).toBe(5 + 20 + 40 + 10);
  });

  it("uses the latest completed session of the same course", async () => {
    const store = new MemoryMakeUpStore();
    store.insert(makeSession({ id: "old", remedialCode: "OLD001", date: "2026-10-10", status: "COMPLETED" }));
    store.insert(makeSession({ id: "recent", remedialCode: "RCNT01", date: "2026-10-16", status: "COMPLETED" }));
    store.insert(
      makeSession({ id: "elsewhere", remedialCode: "ELSE01", courseId: "course-2", date: "2026-10-18", status: "COMPLETED" })
    );
    const self = store.insert(makeSession({ id: "self", remedialCode: "SELF01", date: "2026-10-30" }));

    const suggestions = await getSchedulingSuggestions(self, store, NOW, config, 3);

    expect(suggestions.map((s) => `${s.date} ${s.time}`)).toEqual([
      "2026-10-20 08:00",
      "2026-10-20 09:00",
      "2026-10-20 10:00",
    ]);
    expect(suggestions[0].reason.startsWith("good gap of 4 days from last session")).toBe(true);
  });
});
