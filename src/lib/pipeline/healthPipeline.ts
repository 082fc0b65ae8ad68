/**
 * Health pipeline: a diet run and an exercise run for the same user, plus a
 * combined assessment over every candidate of both.
 *
 * Each half persists its own artifact through its deps. The minimum-score
 * filter runs afterwards and only narrows the returned candidate lists;
 * `assessments` keeps every candidate.
 */

import { AppError } from '@/src/lib/errors/app-error';
import {
  combineAssessments,
  type CombinedAssessment,
} from '@/src/lib/safeguard/safeguardAssessor.service';
import {
  runDietPipeline,
  type DietPipelineDeps,
  type DietPipelineRequest,
} from './dietPipeline';
import {
  runExercisePipeline,
  type ExercisePipelineDeps,
} from './exercisePipeline';
import type {
  DietPlanCandidate,
  ExercisePlanCandidate,
  PlanCandidate,
  PlanPipelineResult,
} from './planPipeline.types';

export type HealthPipelineDeps = {
  /** Omit to skip the diet half */
  diet?: DietPipelineDeps;
  /** Omit to skip the exercise half */
  exercise?: ExercisePipelineDeps;
};

export type HealthPipelineOptions = {
  /** Keep only candidates scoring at least this much; unset keeps all */
  minScore?: number;
  now?: () => Date;
};

export type HealthPipelineResult = {
  diet: PlanPipelineResult<DietPlanCandidate> | null;
  exercise: PlanPipelineResult<ExercisePlanCandidate> | null;
  combinedAssessment: CombinedAssessment;
  generatedAt: string;
};

export function filterSafeCandidates<T extends PlanCandidate>(
  candidates: readonly T[],
  minScore: number,
): T[] {
  return candidates.filter((candidate) => candidate.assessment.score >= minScore);
}

function filterResult<T extends PlanCandidate>(
  result: PlanPipelineResult<T>,
  minScore: number | undefined,
): PlanPipelineResult<T> {
  if (minScore === undefined) return result;
  return {
    ...result,
    allPlans: filterSafeCandidates(result.allPlans, minScore),
    topPlans: filterSafeCandidates(result.topPlans, minScore),
  };
}

export async function runHealthPipeline(
  request: DietPipelineRequest,
  deps: HealthPipelineDeps,
  options: HealthPipelineOptions = {},
): Promise<HealthPipelineResult> {
  if (!deps.diet && !deps.exercise) {
    throw new AppError(
      'PIPELINE_CONFIG_INVALID',
      'A health run needs a diet or an exercise source',
    );
  }
  const now = options.now ?? (() => new Date());

  const diet = deps.diet ? await runDietPipeline(request, deps.diet) : null;
  const exercise = deps.exercise
    ? await runExercisePipeline(
        {
          profile: request.profile,
          environment: request.environment,
          requirement: request.requirement,
        },
        deps.exercise,
      )
    : null;

  // Scored over every assessed candidate, before filtering
  const combinedAssessment = combineAssessments(
    diet?.allPlans.map((c) => c.assessment) ?? [],
    exercise?.allPlans.map((c) => c.assessment) ?? [],
  );

  console.log(
    `[HealthPipeline] ${combinedAssessment.totalAssessed} assessed, overall ${combinedAssessment.overallScore} (${
      combinedAssessment.isSafe ? 'safe' : 'unsafe'
    })`,
  );

  return {
    diet: diet && filterResult(diet, options.minScore),
    exercise: exercise && filterResult(exercise, options.minScore),
    combinedAssessment,
    generatedAt: now().toISOString(),
  };
}
