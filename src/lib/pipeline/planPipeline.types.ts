/**
 * Plan Pipeline Types
 */

import type {
  PlanCandidateSource,
  PlanRequest,
} from '@/src/lib/agents/plan-generator/planGenerator.types';
import type {
  ExercisePlan,
  MealType,
  PlanType,
  ScaledFoodItem,
  VariantConfig,
} from '@/src/lib/plans/plans.types';
import type {
  AssessmentInput,
  AssessmentSubject,
  SafetyAssessment,
} from '@/src/lib/safeguard/safeguard.types';
import type { PlanPipelineConfig } from './planPipeline.config';
import type { PlanArtifactStore } from './planArtifact.store';
import type { PlanPipelineRunLogger } from './planPipelineRunLogger';

type CandidateCommon = {
  /** 1..n in generation order */
  readonly id: number;
  readonly variant: string;
  readonly scaleFactor: number;
  /** 1-based generation call that produced the base candidate */
  readonly baseId: number;
  readonly assessment: SafetyAssessment;
};

export type DietPlanCandidate = CandidateCommon & {
  readonly planType: 'diet';
  readonly mealType: MealType;
  readonly items: readonly ScaledFoodItem[];
  readonly totalCalories: number;
  readonly targetCalories: number;
  /** Percent deviation of totalCalories from targetCalories */
  readonly caloriesDeviation: number;
};

export type ExercisePlanCandidate = CandidateCommon & {
  readonly planType: 'exercise';
  readonly plan: ExercisePlan;
  readonly targetDurationMinutes: number;
  /** Percent deviation of the plan duration from targetDurationMinutes */
  readonly durationDeviation: number;
};

export type PlanCandidate = DietPlanCandidate | ExercisePlanCandidate;

/**
 * A scaled variant waiting for its assessment
 */
export type CandidateDraft<TContent> = {
  id: number;
  baseId: number;
  variant: VariantConfig;
  content: TContent;
};

/**
 * The per-plan-type half of a run: how bases are checked, expanded, turned
 * into assessment subjects and into candidates.
 */
export interface PlanPipelineDriver<
  TRequest extends PlanRequest,
  TBase,
  TContent,
  TCandidate extends PlanCandidate,
> {
  readonly planType: PlanType;
  /** False for bases that count as a failed generation (e.g. no items) */
  isUsable(base: TBase): boolean;
  expand(
    base: TBase,
    variants: readonly VariantConfig[],
  ): Array<{ variant: VariantConfig; content: TContent }>;
  toSubject(request: TRequest, content: TContent): AssessmentSubject;
  toCandidate(
    request: TRequest,
    draft: CandidateDraft<TContent>,
    assessment: SafetyAssessment,
  ): TCandidate;
}

export interface PlanAssessor {
  assess(input: AssessmentInput): Promise<SafetyAssessment>;
}

export type PlanPipelineDeps<TRequest, TBase> = {
  source: PlanCandidateSource<TRequest, TBase>;
  assessor: PlanAssessor;
  config: PlanPipelineConfig;
  store?: PlanArtifactStore;
  logger?: PlanPipelineRunLogger;
  now?: () => Date;
};

export type PlanPipelineResult<TCandidate extends PlanCandidate> = {
  allPlans: TCandidate[];
  topPlans: TCandidate[];
  assessments: Record<number, SafetyAssessment>;
  generatedAt: string;
  /** Where the artifact went; absent when nothing was persisted */
  artifactLocation?: string;
  persisted: boolean;
};
