/**
 * Safeguard - Scoring policies
 *
 * Exactly one policy is active per deployment:
 *
 * - weighted (default): graded score from the share of passed checks minus a
 *   severity penalty per risk factor
 * - risk_factor_gate: binary; any high/very_high risk factor fails the plan
 * - check_gate: binary; any failed check fails the plan
 *
 * Warnings are computed outside the policies and are the same for all three.
 */

import { AppError } from '@/src/lib/errors/app-error';
import type {
  AssessmentStatus,
  PolicyOutcome,
  RiskFactor,
  RiskLevel,
  RiskSeverity,
  ScoringContext,
  ScoringPolicy,
  ScoringPolicyName,
} from './safeguard.types';

export const SCORING_POLICY_NAMES = [
  'weighted',
  'risk_factor_gate',
  'check_gate',
] as const satisfies readonly ScoringPolicyName[];

export const SEVERITY_PENALTY: Record<RiskSeverity, number> = {
  low: 5,
  moderate: 15,
  high: 30,
  very_high: 50,
};

export const EXERCISE_REMINDERS: readonly string[] = [
  'Start gradually and listen to your body',
  'Stay hydrated before, during, and after exercise',
  'Stop immediately if you experience pain or discomfort',
];

export function isSevere(severity: RiskSeverity | undefined): boolean {
  return severity === 'high' || severity === 'very_high';
}

/**
 * Descriptions of all high/very_high risk factors
 */
export function collectWarnings(riskFactors: readonly RiskFactor[]): string[] {
  return riskFactors
    .filter((rf) => isSevere(rf.severity))
    .map((rf) => rf.description);
}

function band(score: number): { status: AssessmentStatus; riskLevel: RiskLevel } {
  if (score >= 80) return { status: 'passed', riskLevel: 'low' };
  if (score >= 60) return { status: 'warning', riskLevel: 'moderate' };
  if (score >= 40) return { status: 'review', riskLevel: 'high' };
  return { status: 'failed', riskLevel: 'very_high' };
}

function buildRecommendations(
  riskFactors: readonly RiskFactor[],
  context: ScoringContext,
): string[] {
  const recommendations: string[] = riskFactors
    .map((rf) => rf.recommendation)
    .filter((text) => text.trim().length > 0);

  const conditions = context.profile.medicalConditions;
  if (conditions.length > 0) {
    recommendations.push(
      `Consult healthcare provider before starting due to: ${conditions.join(', ')}`,
    );
  }
  if (context.planType === 'exercise') {
    recommendations.push(...EXERCISE_REMINDERS);
  }
  return [...new Set(recommendations)];
}

const weightedPolicy: ScoringPolicy = {
  name: 'weighted',
  score({ riskFactors, safetyChecks }, context) {
    const passed = safetyChecks.filter((c) => c.passed).length;
    const baseScore =
      safetyChecks.length === 0 ? 100 : (passed / safetyChecks.length) * 100;
    const penalty = riskFactors.reduce(
      (sum, rf) => sum + SEVERITY_PENALTY[rf.severity],
      0,
    );
    const score = Math.round(Math.min(100, Math.max(0, baseScore - penalty)));

    return {
      score,
      isSafe: score >= 60 && !riskFactors.some((rf) => isSevere(rf.severity)),
      ...band(score),
      recommendations: buildRecommendations(riskFactors, context),
    };
  },
};

const PASSED: PolicyOutcome = {
  score: 100,
  isSafe: true,
  status: 'passed',
  riskLevel: 'low',
  recommendations: [],
};

const FAILED: PolicyOutcome = {
  score: 0,
  isSafe: false,
  status: 'failed',
  riskLevel: 'very_high',
  recommendations: [],
};

const riskFactorGatePolicy: ScoringPolicy = {
  name: 'risk_factor_gate',
  score({ riskFactors }) {
    return riskFactors.some((rf) => isSevere(rf.severity))
      ? { ...FAILED, recommendations: [] }
      : { ...PASSED, recommendations: [] };
  },
};

const checkGatePolicy: ScoringPolicy = {
  name: 'check_gate',
  score({ safetyChecks }) {
    return safetyChecks.some((c) => !c.passed)
      ? { ...FAILED, recommendations: [] }
      : { ...PASSED, recommendations: [] };
  },
};

const POLICIES: Record<ScoringPolicyName, ScoringPolicy> = {
  weighted: weightedPolicy,
  risk_factor_gate: riskFactorGatePolicy,
  check_gate: checkGatePolicy,
};

export function isScoringPolicyName(name: string): name is ScoringPolicyName {
  return SCORING_POLICY_NAMES.some((policy) => policy === name);
}

/**
 * Resolve a configured policy name. Unknown names are a configuration error.
 */
export function createScoringPolicy(name: string): ScoringPolicy {
  if (!isScoringPolicyName(name)) {
    throw new AppError(
      'PIPELINE_CONFIG_INVALID',
      `Unknown scoring policy "${name}"`,
      { allowed: [...SCORING_POLICY_NAMES] },
    );
  }
  return POLICIES[name];
}
