import { describe, expect, it } from "vitest";
import { defaultMakeUpConfig } from "../config";
import { generateCandidateSlots } from "./slots";

const NOW = new Date(2026, 9, 19, 9, 0); // Monday
const config = defaultMakeUpConfig.scheduler;

describe("generateCandidateSlots", () => {
  it("crosses every eligible day of the next two weeks with the preferred times", () => {
    const slots = generateCandidateSlots(NOW, config);

    // 14 days hold two Sundays, leaving 12 days of 5 times each
    expect(slots).toHaveLength(60);
    expect(slots[0]).toEqual({ date: "2026-10-20", time: "08:00", weekday: 2 });
    expect(slots[4]).toEqual({ date: "2026-10-20", time: "14:00", weekday: 2 });
    expect(slots[59]).toEqual({ date: "2026-11-02", time: "14:00", weekday: 1 });
  });

  it("skips the excluded weekday entirely", () => {
    const dates = new Set(generateCandidateSlots(NOW, config).map((s) => s.date));

    expect(dates.has("2026-10-25")).toBe(false);
    expect(dates.has("2026-11-01")).toBe(false);
    expect(dates.size).toBe(12);
  });

  it("honours a different excluded weekday", () => {
    const dates = new Set(
      generateCandidateSlots(NOW, { ...config, excludedWeekday: 6 }).map((s) => s.date)
    );

    expect(dates.has("2026-10-24")).toBe(false);
    expect(dates.has("2026-10-31")).toBe(false);
    expect(dates.has("2026-10-25")).toBe(true);
  });

  it("starts the window the day after now, whatever the time of day", () => {
    const lateNight = new Date(2026, 9, 19, 23, 59);
    const slots = generateCandidateSlots(lateNight, { ...config, horizonDays: 5 });

    expect(slots).toHaveLength(25);
    expect(slots[0].date).toBe("2026-10-20");
    expect(slots[24].date).toBe("2026-10-24");
  });
});
