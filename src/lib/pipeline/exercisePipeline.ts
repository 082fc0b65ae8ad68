/**
 * Exercise pipeline: one exercise plan per base candidate.
 */

import type {
  ExerciseGenerationRequest,
  PlanRequest,
} from '@/src/lib/agents/plan-generator/planGenerator.types';
import {
  deviationPercent,
  exerciseTargets,
} from '@/src/lib/agents/plan-generator/planTargets';
import type { ExercisePlan } from '@/src/lib/plans/plans.types';
import { expandExerciseVariants } from '@/src/lib/variants/exerciseVariantExpander';
import { runPlanPipeline } from './planPipeline.service';
import type {
  ExercisePlanCandidate,
  PlanPipelineDeps,
  PlanPipelineDriver,
  PlanPipelineResult,
} from './planPipeline.types';

export type ExercisePipelineDeps = PlanPipelineDeps<ExerciseGenerationRequest, ExercisePlan>;

export const exercisePipelineDriver: PlanPipelineDriver<
  ExerciseGenerationRequest,
  ExercisePlan,
  ExercisePlan,
  ExercisePlanCandidate
> = {
  planType: 'exercise',

  isUsable: (plan) => Object.keys(plan.sessions).length > 0,

  expand(plan, variants) {
    const expanded = expandExerciseVariants(plan, [...variants]);
    return variants.map((variant) => ({ variant, content: expanded[variant.name] }));
  },

  toSubject: (_request, plan) => ({ planType: 'exercise', plan }),

  toCandidate(request, draft, assessment) {
    const target = request.targets.durationMinutes;
    return {
      id: draft.id,
      variant: draft.variant.name,
      scaleFactor: draft.variant.scaleFactor,
      baseId: draft.baseId,
      assessment,
      planType: 'exercise',
      plan: draft.content,
      targetDurationMinutes: target,
      durationDeviation: deviationPercent(draft.content.totalDurationMinutes, target),
    };
  },
};

export function toExerciseGenerationRequest(
  request: PlanRequest,
): ExerciseGenerationRequest {
  return {
    ...request,
    targets: exerciseTargets(request.profile, request.requirement.goal),
  };
}

export function runExercisePipeline(
  request: PlanRequest,
  deps: ExercisePipelineDeps,
): Promise<PlanPipelineResult<ExercisePlanCandidate>> {
  return runPlanPipeline(exercisePipelineDriver, toExerciseGenerationRequest(request), deps);
}
