/**
 * Plan Generator Types
 *
 * Contract between the pipeline and whatever produces base candidates.
 */

import type {
  BaseFoodItem,
  EnvironmentContext,
  ExercisePlan,
  MealType,
  PlanType,
  UserProfile,
  UserRequirement,
} from '@/src/lib/plans/plans.types';
import type { ExerciseTargets } from './planTargets';

/**
 * Who the plan is for and under which circumstances
 */
export type PlanRequest = {
  profile: UserProfile;
  environment: EnvironmentContext;
  requirement: UserRequirement;
};

export type DietGenerationRequest = PlanRequest & {
  mealType: MealType;
  /** Calorie target for this meal */
  targetCalories: number;
};

export type ExerciseGenerationRequest = PlanRequest & {
  targets: ExerciseTargets;
};

/**
 * Per-call input besides the request itself.
 *
 * `retrievalContext` is the prepared context, or whatever an earlier call
 * returned; a source fetches context only when it is undefined.
 */
export type GenerationCall = {
  /** 0-based index of this call within the run */
  attempt: number;
  retrievalContext?: string;
  signal: AbortSignal;
};

/**
 * A null base means the call produced nothing usable.
 */
export type CandidateSourceResult<TBase> = {
  base: TBase | null;
  retrievalContext?: string;
};

export interface PlanCandidateSource<TRequest, TBase> {
  /**
   * Resolve the retrieval context once, before the first generation call.
   * The pipeline threads the result into every call, including the ones
   * after a failed call.
   */
  prepareContext?(request: TRequest): Promise<string>;
  generate(
    request: TRequest,
    call: GenerationCall,
  ): Promise<CandidateSourceResult<TBase>>;
}

export type DietCandidateSource = PlanCandidateSource<
  DietGenerationRequest,
  BaseFoodItem[]
>;

export type ExerciseCandidateSource = PlanCandidateSource<
  ExerciseGenerationRequest,
  ExercisePlan
>;

/**
 * Looks up opaque domain-knowledge text for a user's conditions.
 */
export interface RetrievalContextProvider {
  fetchContext(planType: PlanType, profile: UserProfile): Promise<string>;
}
