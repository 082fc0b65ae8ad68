/**
 * Plan pipeline configuration
 *
 * Order: code defaults, then config/plan-pipeline.json (or
 * PLAN_PIPELINE_CONFIG_PATH), then PLAN_PIPELINE_* env overrides.
 * Validation failures are configuration errors and stop a run before any
 * generation work.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { AppError } from '@/src/lib/errors/app-error';
import { SCORING_POLICY_NAMES } from '@/src/lib/safeguard/scoringPolicies';

export const planPipelineConfigSchema = z
  .object({
    /** Generation calls per run (B) */
    basePlanCount: z.number().int().min(1).default(3),
    /** Variants per base candidate (V) */
    variantCount: z.number().int().min(1).default(3),
    minScale: z.number().positive().default(0.7),
    maxScale: z.number().positive().default(1.3),
    /** Selection size (K) */
    topK: z.number().int().min(1).default(3),
    scoringPolicy: z.enum(SCORING_POLICY_NAMES).default('weighted'),
    /** 0 disables the timeout */
    generationTimeoutMs: z.number().int().min(0).default(60_000),
    assessmentTimeoutMs: z.number().int().min(0).default(30_000),
    enableRuleChecks: z.boolean().default(true),
    enableSemanticAssessment: z.boolean().default(true),
    generationTemperature: z.number().min(0).max(2).default(0.7),
    /** Health runs keep only candidates scoring at least this much */
    minSafetyScore: z.number().min(0).max(100).default(60),
    outputPaths: z
      .object({
        diet: z.string().min(1).default('output/diet-plans.json'),
        exercise: z.string().min(1).default('output/exercise-plans.json'),
      })
      .default({}),
  })
  .refine((config) => config.minScale <= config.maxScale, {
    message: 'minScale must not exceed maxScale',
    path: ['minScale'],
  });

export type PlanPipelineConfig = z.infer<typeof planPipelineConfigSchema>;

export function parsePlanPipelineConfig(raw: unknown): PlanPipelineConfig {
  const result = planPipelineConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new AppError('PIPELINE_CONFIG_INVALID', 'Invalid plan pipeline configuration', {
      issues: result.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    });
  }
  return result.data;
}

type EnvOverride = {
  env: string;
  key: keyof PlanPipelineConfig;
  parse: (value: string) => unknown;
};

const toNumber = (value: string): number => Number(value.trim());
const toBoolean = (value: string): unknown => {
  const v = value.trim().toLowerCase();
  if (v === 'true' || v === '1') return true;
  if (v === 'false' || v === '0') return false;
  return value;
};

const ENV_OVERRIDES: EnvOverride[] = [
  { env: 'PLAN_PIPELINE_BASE_PLAN_COUNT', key: 'basePlanCount', parse: toNumber },
  { env: 'PLAN_PIPELINE_VARIANT_COUNT', key: 'variantCount', parse: toNumber },
  { env: 'PLAN_PIPELINE_MIN_SCALE', key: 'minScale', parse: toNumber },
  { env: 'PLAN_PIPELINE_MAX_SCALE', key: 'maxScale', parse: toNumber },
  { env: 'PLAN_PIPELINE_TOP_K', key: 'topK', parse: toNumber },
  { env: 'PLAN_PIPELINE_SCORING_POLICY', key: 'scoringPolicy', parse: (v) => v.trim() },
  { env: 'PLAN_PIPELINE_GENERATION_TIMEOUT_MS', key: 'generationTimeoutMs', parse: toNumber },
  { env: 'PLAN_PIPELINE_ASSESSMENT_TIMEOUT_MS', key: 'assessmentTimeoutMs', parse: toNumber },
  { env: 'PLAN_PIPELINE_ENABLE_RULE_CHECKS', key: 'enableRuleChecks', parse: toBoolean },
  { env: 'PLAN_PIPELINE_MIN_SAFETY_SCORE', key: 'minSafetyScore', parse: toNumber },
  {
    env: 'PLAN_PIPELINE_ENABLE_SEMANTIC_ASSESSMENT',
    key: 'enableSemanticAssessment',
    parse: toBoolean,
  },
];

function readConfigFile(): Record<string, unknown> {
  const configPath =
    process.env.PLAN_PIPELINE_CONFIG_PATH ??
    join(process.cwd(), 'config', 'plan-pipeline.json');

  if (!existsSync(configPath)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new AppError(
      'PIPELINE_CONFIG_INVALID',
      `Plan pipeline config at ${configPath} is not valid JSON`,
      error,
    );
  }
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new AppError(
      'PIPELINE_CONFIG_INVALID',
      `Plan pipeline config at ${configPath} must be a JSON object`,
    );
  }
  return { ...raw };
}

function envOverrides(): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  for (const { env, key, parse } of ENV_OVERRIDES) {
    const value = process.env[env];
    if (value !== undefined && value.trim() !== '') {
      overrides[key] = parse(value);
    }
  }
  return overrides;
}

let cached: PlanPipelineConfig | null = null;

/** Get pipeline config (defaults + file + env). Reset cache for tests with resetPlanPipelineConfigCache(). */
export function getPlanPipelineConfig(): PlanPipelineConfig {
  if (cached) return cached;
  cached = parsePlanPipelineConfig({ ...readConfigFile(), ...envOverrides() });
  return cached;
}

/**
 * Apply per-run overrides (e.g. CLI flags) on top of the loaded config.
 */
export function resolvePlanPipelineConfig(
  overrides: Partial<PlanPipelineConfig> = {},
): PlanPipelineConfig {
  return parsePlanPipelineConfig({ ...getPlanPipelineConfig(), ...overrides });
}

/** Only for tests – reset in-memory cache so config is re-read. */
export function resetPlanPipelineConfigCache(): void {
  cached = null;
}
