/**
 * Diet pipeline: one meal type per run.
 *
 * The generation target is the meal's share of the user's daily calorie
 * target; each candidate reports its deviation from it.
 */

import type {
  DietGenerationRequest,
  PlanRequest,
} from '@/src/lib/agents/plan-generator/planGenerator.types';
import {
  dailyCalorieTarget,
  deviationPercent,
  mealCalorieTarget,
} from '@/src/lib/agents/plan-generator/planTargets';
import type {
  BaseFoodItem,
  MealType,
  ScaledFoodItem,
} from '@/src/lib/plans/plans.types';
import {
  expandDietVariants,
  totalItemCalories,
} from '@/src/lib/variants/dietVariantExpander';
import { runPlanPipeline } from './planPipeline.service';
import type {
  DietPlanCandidate,
  PlanPipelineDeps,
  PlanPipelineDriver,
  PlanPipelineResult,
} from './planPipeline.types';

export type DietPipelineRequest = PlanRequest & { mealType: MealType };

export type DietPipelineDeps = PlanPipelineDeps<DietGenerationRequest, BaseFoodItem[]>;

export const dietPipelineDriver: PlanPipelineDriver<
  DietGenerationRequest,
  BaseFoodItem[],
  ScaledFoodItem[],
  DietPlanCandidate
> = {
  planType: 'diet',

  isUsable: (items) => items.length > 0,

  expand(items, variants) {
    const expanded = expandDietVariants(items, [...variants]);
    return variants.map((variant) => ({ variant, content: expanded[variant.name] }));
  },

  toSubject: (request, items) => ({
    planType: 'diet',
    items,
    totalCalories: totalItemCalories(items),
    mealType: request.mealType,
  }),

  toCandidate(request, draft, assessment) {
    const totalCalories = totalItemCalories(draft.content);
    return {
      id: draft.id,
      variant: draft.variant.name,
      scaleFactor: draft.variant.scaleFactor,
      baseId: draft.baseId,
      assessment,
      planType: 'diet',
      mealType: request.mealType,
      items: draft.content,
      totalCalories,
      targetCalories: request.targetCalories,
      caloriesDeviation: deviationPercent(totalCalories, request.targetCalories),
    };
  },
};

export function toDietGenerationRequest(request: DietPipelineRequest): DietGenerationRequest {
  const daily = dailyCalorieTarget(request.profile, request.requirement.goal);
  return { ...request, targetCalories: mealCalorieTarget(daily, request.mealType) };
}

export function runDietPipeline(
  request: DietPipelineRequest,
  deps: DietPipelineDeps,
): Promise<PlanPipelineResult<DietPlanCandidate>> {
  return runPlanPipeline(dietPipelineDriver, toDietGenerationRequest(request), deps);
}
