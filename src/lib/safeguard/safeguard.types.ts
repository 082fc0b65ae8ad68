/**
 * Safeguard - Type Definitions
 *
 * Safety signals (checks and risk factors), the assessment produced from
 * them, and the subjects the assessor accepts.
 */

import type {
  EnvironmentContext,
  ExercisePlan,
  MealType,
  PlanType,
  ScaledFoodItem,
  UserProfile,
} from '@/src/lib/plans/plans.types';

/**
 * Severity of a risk factor or failed check (ordinal)
 */
export type RiskSeverity = 'low' | 'moderate' | 'high' | 'very_high';

/**
 * Overall risk band of an assessment. Same scale as RiskSeverity.
 */
export type RiskLevel = RiskSeverity;

export type AssessmentStatus = 'passed' | 'warning' | 'review' | 'failed';

/**
 * Named pass/fail test with an explanatory message
 */
export type SafetyCheck = {
  checkName: string;
  passed: boolean;
  message: string;
  severity?: RiskSeverity;
};

/**
 * Named, severity-tagged concern attached to a plan
 */
export type RiskFactor = {
  factor: string;
  /** e.g. nutritional, exercise, medical, environmental, semantic */
  category: string;
  severity: RiskSeverity;
  description: string;
  recommendation: string;
};

/**
 * Pooled output of the signal sources
 */
export type SafetySignals = {
  riskFactors: RiskFactor[];
  safetyChecks: SafetyCheck[];
};

export type SafetyAssessment = {
  readonly score: number;
  readonly isSafe: boolean;
  readonly status: AssessmentStatus;
  readonly riskLevel: RiskLevel;
  readonly riskFactors: readonly RiskFactor[];
  readonly safetyChecks: readonly SafetyCheck[];
  readonly recommendations: readonly string[];
  readonly warnings: readonly string[];
  /** ISO-8601 */
  readonly assessedAt: string;
};

/**
 * Canonical serialized assessment (artifact files, semantic collaborator I/O)
 */
export type SafetyAssessmentRecord = {
  score: number;
  is_safe: boolean;
  status: AssessmentStatus;
  risk_level: RiskLevel;
  risk_factors: Array<{
    factor: string;
    category: string;
    severity: RiskSeverity;
    description: string;
    recommendation: string;
  }>;
  safety_checks: Array<{
    check_name: string;
    passed: boolean;
    message: string;
    severity?: RiskSeverity;
  }>;
  recommendations: string[];
  warnings: string[];
  assessed_at: string;
};

// ============================================================================
// Subjects
// ============================================================================

export type MacroRatios = {
  proteinRatio?: number;
  carbsRatio?: number;
  fatRatio?: number;
};

/**
 * Diet subject. With mealType set it is one meal (single-meal ceiling),
 * otherwise a full day (daily floor and ceiling).
 */
export type DietAssessmentSubject = {
  planType: 'diet';
  items: ScaledFoodItem[];
  totalCalories: number;
  mealType?: MealType;
  macroRatios?: MacroRatios;
};

export type ExerciseAssessmentSubject = {
  planType: 'exercise';
  plan: ExercisePlan;
};

export type AssessmentSubject =
  | DietAssessmentSubject
  | ExerciseAssessmentSubject;

export type AssessmentInput = {
  subject: AssessmentSubject;
  profile: UserProfile;
  environment: EnvironmentContext;
  /** Opaque domain-knowledge text, passed through to the semantic assessor */
  retrievalContext?: string;
};

/**
 * External semantic collaborator. Returns raw (unvalidated) output in the
 * canonical record shape; the assessor normalizes it.
 */
export interface SemanticAssessor {
  assess(input: AssessmentInput, signal: AbortSignal): Promise<unknown>;
}

// ============================================================================
// Scoring
// ============================================================================

export type ScoringPolicyName = 'weighted' | 'risk_factor_gate' | 'check_gate';

export type ScoringContext = {
  planType: PlanType;
  profile: UserProfile;
};

export type PolicyOutcome = {
  score: number;
  isSafe: boolean;
  status: AssessmentStatus;
  riskLevel: RiskLevel;
  recommendations: string[];
};

/**
 * One scoring strategy, selected at configuration time and never blended
 */
export interface ScoringPolicy {
  readonly name: ScoringPolicyName;
  score(signals: SafetySignals, context: ScoringContext): PolicyOutcome;
}
