/**
 * Safeguard - Semantic assessment normalization
 *
 * The semantic collaborator answers in the canonical record shape
 * (`risk_factors`, `safety_checks`; older output uses `checks`). Output is
 * validated entry by entry: entries that do not conform are dropped, the
 * rest are kept. Anything unusable contributes no signals.
 */

import { z } from 'zod';
import { parseModelJson } from '@/src/lib/ai/gemini/modelJson';
import type { RiskFactor, SafetyCheck, SafetySignals } from './safeguard.types';

const severitySchema = z
  .string()
  .transform((s) => s.trim().toLowerCase().replace(/[\s-]+/g, '_'))
  .pipe(z.enum(['low', 'moderate', 'high', 'very_high']));

const semanticRiskFactorSchema = z.object({
  factor: z.string().min(1),
  category: z.string().min(1).default('semantic'),
  severity: severitySchema,
  description: z.string().default(''),
  recommendation: z.string().default(''),
});

const semanticCheckSchema = z.object({
  check_name: z.string().min(1),
  passed: z.boolean(),
  message: z.string().default(''),
  severity: severitySchema.optional(),
});

/**
 * Response contract requested from the model (strict form of the above)
 */
export const semanticAssessmentResponseSchema = z.object({
  risk_factors: z.array(
    z.object({
      factor: z.string(),
      category: z.string(),
      severity: z.enum(['low', 'moderate', 'high', 'very_high']),
      description: z.string(),
      recommendation: z.string(),
    }),
  ),
  safety_checks: z.array(
    z.object({
      check_name: z.string(),
      passed: z.boolean(),
      message: z.string(),
      severity: z.enum(['low', 'moderate', 'high', 'very_high']).optional(),
    }),
  ),
});

const semanticOutputSchema = z.object({
  risk_factors: z.array(z.unknown()).optional(),
  safety_checks: z.array(z.unknown()).optional(),
  checks: z.array(z.unknown()).optional(),
});

/**
 * Validate raw semantic output into signals. Strings are parsed as model
 * JSON first. Returns empty signals for anything that is not an object.
 */
export function normalizeSemanticAssessment(raw: unknown): SafetySignals {
  const value = typeof raw === 'string' ? parseModelJson(raw) : raw;
  const parsed = semanticOutputSchema.safeParse(value);
  if (!parsed.success) {
    return { riskFactors: [], safetyChecks: [] };
  }

  const riskFactors: RiskFactor[] = [];
  for (const entry of parsed.data.risk_factors ?? []) {
    const result = semanticRiskFactorSchema.safeParse(entry);
    if (result.success) riskFactors.push(result.data);
  }

  const safetyChecks: SafetyCheck[] = [];
  const rawChecks = [
    ...(parsed.data.safety_checks ?? []),
    ...(parsed.data.checks ?? []),
  ];
  for (const entry of rawChecks) {
    const result = semanticCheckSchema.safeParse(entry);
    if (!result.success) continue;
    const { check_name, passed, message, severity } = result.data;
    safetyChecks.push({
      checkName: check_name,
      passed,
      message,
      ...(severity && { severity }),
    });
  }

  return { riskFactors, safetyChecks };
}
