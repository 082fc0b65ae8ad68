/**
 * Safeguard - Standalone assessment input
 *
 * One finished plan plus the user it is for, as read by the CLI's assess-only
 * mode. Diet items are assessed as given, without variant scaling.
 */

import { z } from 'zod';
import { AppError } from '@/src/lib/errors/app-error';
import {
  baseFoodItemsSchema,
  environmentContextSchema,
  exercisePlanSchema,
  mealTypeSchema,
  userProfileSchema,
} from '@/src/lib/plans/plans.schemas';
import type { BaseFoodItem, ScaledFoodItem } from '@/src/lib/plans/plans.types';
import { roundTo } from '@/src/lib/variants/rounding';
import {
  originalCalorieRate,
  totalItemCalories,
} from '@/src/lib/variants/dietVariantExpander';
import type { AssessmentInput, AssessmentSubject } from './safeguard.types';

export const AS_GIVEN_VARIANT = 'as_given';

const ratioSchema = z.number().min(0).max(1).optional();

export const planAssessmentInputSchema = z.object({
  profile: userProfileSchema,
  environment: environmentContextSchema.default({}),
  retrievalContext: z.string().optional(),
  plan: z.discriminatedUnion('planType', [
    z.object({
      planType: z.literal('diet'),
      mealType: mealTypeSchema.optional(),
      items: baseFoodItemsSchema,
      macroRatios: z
        .object({
          proteinRatio: ratioSchema,
          carbsRatio: ratioSchema,
          fatRatio: ratioSchema,
        })
        .optional(),
    }),
    z.object({
      planType: z.literal('exercise'),
      plan: exercisePlanSchema,
    }),
  ]),
});

export type PlanAssessmentInput = z.infer<typeof planAssessmentInputSchema>;

function asGiven(item: BaseFoodItem): ScaledFoodItem {
  const totalCalories = roundTo(originalCalorieRate(item) * item.quantity, 1);
  return {
    name: item.name,
    quantity: item.quantity,
    unit: item.unit,
    caloriesPerUnit:
      item.quantity > 0 ? roundTo(totalCalories / item.quantity, 2) : 0,
    totalCalories,
    variant: AS_GIVEN_VARIANT,
  };
}

function toSubject(plan: PlanAssessmentInput['plan']): AssessmentSubject {
  if (plan.planType === 'exercise') {
    return { planType: 'exercise', plan: plan.plan };
  }
  const items = plan.items.map(asGiven);
  return {
    planType: 'diet',
    items,
    totalCalories: totalItemCalories(items),
    mealType: plan.mealType,
    macroRatios: plan.macroRatios,
  };
}

/**
 * Validate raw input. Throws VALIDATION_ERROR with the zod issues as details.
 */
export function parseAssessmentInput(raw: unknown): AssessmentInput {
  const parsed = planAssessmentInputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AppError('VALIDATION_ERROR', 'Invalid assessment input', {
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    });
  }

  const { profile, environment, retrievalContext, plan } = parsed.data;
  return {
    subject: toSubject(plan),
    profile,
    environment,
    retrievalContext,
  };
}
