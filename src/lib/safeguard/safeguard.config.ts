/**
 * Safeguard rules – thresholds and condition restrictions.
 * Loaded from config/safeguard-rules.json (or SAFEGUARD_RULES_PATH); thresholds
 * missing from the file fall back to the defaults below.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { AppError } from '@/src/lib/errors/app-error';

const conditionRestrictionSchema = z.object({
  key: z.string().min(1),
  description: z.string().min(1),
  terms: z.array(z.string().min(1)).min(1),
});

const conditionRuleSetSchema = z.object({
  diet: z.array(conditionRestrictionSchema).default([]),
  exercise: z.array(conditionRestrictionSchema).default([]),
});

export const safeguardRulesSchema = z.object({
  diet: z
    .object({
      minDailyCalories: z.number().positive().default(1200),
      maxDailyCalories: z.number().positive().default(4000),
      maxSingleMealCalories: z.number().positive().default(1500),
      minProteinRatio: z.number().min(0).max(1).default(0.1),
      maxFatRatio: z.number().min(0).max(1).default(0.4),
    })
    .default({}),
  exercise: z
    .object({
      durationLimits: z
        .record(z.string(), z.number().positive())
        .default({ beginner: 30, intermediate: 60, advanced: 120 }),
      defaultDurationLimit: z.number().positive().default(60),
      maxWeeklySessions: z.number().int().positive().default(7),
      defaultWeeklyFrequency: z.number().int().positive().default(3),
      hiitMaxWeeklySessions: z.number().int().positive().default(3),
      highIntensityCautionLevels: z
        .array(z.string())
        .default(['beginner', 'intermediate']),
    })
    .default({}),
  environment: z
    .object({
      heatThresholdC: z.number().default(35),
      coldThresholdC: z.number().default(5),
      hydrationThresholdC: z.number().default(30),
      slipConditions: z.array(z.string()).default(['rainy', 'icy']),
      defaultTemperatureC: z.number().default(20),
      defaultCondition: z.string().default('clear'),
    })
    .default({}),
  conditionMatchMode: z.enum(['substring', 'word_boundary']).default('substring'),
  conditionRestrictions: z.record(z.string(), conditionRuleSetSchema).default({}),
});

export type SafeguardRules = z.infer<typeof safeguardRulesSchema>;
export type ConditionRestriction = z.infer<typeof conditionRestrictionSchema>;

/**
 * Validate a raw rules object. Invalid rules are a configuration error.
 */
export function parseSafeguardRules(raw: unknown): SafeguardRules {
  const result = safeguardRulesSchema.safeParse(raw);
  if (!result.success) {
    throw new AppError('PIPELINE_CONFIG_INVALID', 'Invalid safeguard rules', {
      issues: result.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    });
  }
  return result.data;
}

let cached: SafeguardRules | null = null;

function loadRules(): SafeguardRules {
  if (cached) return cached;
  const rulesPath =
    process.env.SAFEGUARD_RULES_PATH ??
    join(process.cwd(), 'config', 'safeguard-rules.json');

  if (!existsSync(rulesPath)) {
    console.warn(
      `[SafeguardRules] ${rulesPath} not found, using default thresholds without condition restrictions`,
    );
    cached = parseSafeguardRules({});
    return cached;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(rulesPath, 'utf-8'));
  } catch (error) {
    throw new AppError(
      'PIPELINE_CONFIG_INVALID',
      `Safeguard rules at ${rulesPath} are not valid JSON`,
      error,
    );
  }
  cached = parseSafeguardRules(raw);
  return cached;
}

/** Get safeguard rules (file + defaults). Reset cache for tests with resetSafeguardRulesCache(). */
export function getSafeguardRules(): SafeguardRules {
  return loadRules();
}

/** Only for tests – reset in-memory cache so rules are re-read. */
export function resetSafeguardRulesCache(): void {
  cached = null;
}
