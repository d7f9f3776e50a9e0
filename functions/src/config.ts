/* eslint-disable */
import { z } from "zod";
import { isClockTime } from "./utils/calendar";

const WeightsSchema = z.object({
  gapFromLast: z.number().int(),
  morningPreference: z.number().int(),
  noConflict: z.number().int(),
  dayBalance: z.number().int(),
});

const SchedulerConfigSchema = z.object({
  horizonDays: z.number().int().min(1).max(60),
  excludedWeekday: z.number().int().min(0).max(6), // 0 = Sunday
  preferredTimes: z
    .array(z.string().refine(isClockTime, "Preferred times must be HH:mm"))
    .min(1),
  weights: WeightsSchema,
  lowScore: z.number().int(),
  conflictPenalty: z.number().int(),
  maxScore: z.number().int(),
  idealGapMinDays: z.number().int(),
  idealGapMaxDays: z.number().int(),
  morningCutoffHour: z.number().int().min(0).max(23),
  afternoonCutoffHour: z.number().int().min(0).max(23),
});

const CodeConfigSchema = z.object({
  defaultDurationMinutes: z.number().int().positive(),
  maxDurationMinutes: z.number().int().positive(),
  generationAttempts: z.number().int().min(1).max(20),
});

const SuggestionConfigSchema = z.object({
  enabled: z.boolean(),
  count: z.number().int().min(1).max(20),
});

const MakeUpConfigSchema = z.object({
  scheduler: SchedulerConfigSchema,
  code: CodeConfigSchema,
  suggestions: SuggestionConfigSchema,
});

export type ScoringWeights = z.infer<typeof WeightsSchema>;
export type SchedulerConfig = z.infer<typeof SchedulerConfigSchema>;
export type CodeConfig = z.infer<typeof CodeConfigSchema>;
export type MakeUpConfig = z.infer<typeof MakeUpConfigSchema>;

export const defaultMakeUpConfig: MakeUpConfig = {
  scheduler: {
    horizonDays: 14,
    excludedWeekday: 0,
    preferredTimes: ["08:00", "09:00", "10:00", "11:00", "14:00"],
    weights: {
      gapFromLast: 30,
      morningPreference: 20,
      noConflict: 40,
      dayBalance: 10,
    },
    lowScore: 5,
    conflictPenalty: -20,
    maxScore: 100,
    idealGapMinDays: 2,
    idealGapMaxDays: 4,
    morningCutoffHour: 11,
    afternoonCutoffHour: 14,
  },
  code: {
    defaultDurationMinutes: 30,
    maxDurationMinutes: 240,
    generationAttempts: 5,
  },
  suggestions: {
    enabled: true,
    count: 3,
  },
};

// Overrides stored under CONFIG/APP_CONFIG.makeup may name any subset of keys.
const MakeUpOverridesSchema = z.object({
  scheduler: SchedulerConfigSchema.extend({ weights: WeightsSchema.partial() })
    .partial()
    .optional(),
  code: CodeConfigSchema.partial().optional(),
  suggestions: SuggestionConfigSchema.partial().optional(),
});

export type MakeUpOverrides = z.infer<typeof MakeUpOverridesSchema>;

export type ConfigResolution =
  | { ok: true; config: MakeUpConfig }
  | { ok: false; config: MakeUpConfig; issues: string[] };

/**
 * Merges stored overrides over the defaults. Invalid overrides are reported
 * and the defaults are used unchanged.
 */
export function resolveMakeUpConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env
): ConfigResolution {
  const base = applyEnv(defaultMakeUpConfig, env);
  if (raw === undefined || raw === null) {
    return { ok: true, config: base };
  }

  const parsed = MakeUpOverridesSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      config: base,
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    };
  }

  const overrides = parsed.data;
  const config: MakeUpConfig = {
    scheduler: {
      ...base.scheduler,
      ...overrides.scheduler,
      weights: { ...base.scheduler.weights, ...overrides.scheduler?.weights },
    },
    code: { ...base.code, ...overrides.code },
    suggestions: { ...base.suggestions, ...overrides.suggestions },
  };
  return { ok: true, config: applyEnv(config, env) };
}

function applyEnv(config: MakeUpConfig, env: NodeJS.ProcessEnv): MakeUpConfig {
  if (env.ENABLE_AI_SUGGESTIONS !== "false") {
    return config;
  }
  return { ...config, suggestions: { ...config.suggestions, enabled: false } };
}
