import { describe, expect, it } from "vitest";
import { defaultMakeUpConfig, resolveMakeUpConfig } from "./config";

describe("resolveMakeUpConfig", () => {
  it("uses the defaults when nothing is stored", () => {
    expect(resolveMakeUpConfig(undefined, {})).toEqual({ ok: true, config: defaultMakeUpConfig });
  });

  it("merges partial overrides over the defaults", () => {
    const resolution = resolveMakeUpConfig(
      { scheduler: { weights: { noConflict: 50 }, preferredTimes: ["07:30", "16:00"] }, code: { defaultDurationMinutes: 20 } },
      {}
    );

    expect(resolution.ok).toBe(true);
    expect(resolution.config.scheduler.weights).toEqual({
      gapFromLast: 30,
      morningPreference: 20,
      noConflict: 50,
      dayBalance: 10,
    });
    expect(resolution.config.scheduler.preferredTimes).toEqual(["07:30", "16:00"]);
    expect(resolution.config.scheduler.horizonDays).toBe(14);
    expect(resolution.config.code).toEqual({ defaultDurationMinutes: 20, maxDurationMinutes: 240, generationAttempts: 5 });
  });

  it("falls back to the defaults and reports invalid overrides", () => {
    expect(resolveMakeUpConfig({ scheduler: { preferredTimes: ["7am"] } }, {})).toEqual({
      ok: false,
      config: defaultMakeUpConfig,
      issues: ["scheduler.preferredTimes.0: Preferred times must be HH:mm"],
    });
  });

  it("lets the environment switch suggestions off", () => {
    const resolution = resolveMakeUpConfig({ suggestions: { count: 5 } }, { ENABLE_AI_SUGGESTIONS: "false" });

    expect(resolution.config.suggestions).toEqual({ enabled: false, count: 5 });
  });
});
