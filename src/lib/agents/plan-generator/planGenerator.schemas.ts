/**
 * Response schemas for base-candidate generation.
 *
 * These double as the Gemini response schema (via zod-to-json-schema) and as
 * the validation of what the model returned.
 */

import { z } from 'zod';
import {
  baseFoodItemSchema,
  exercisePlanSchema,
} from '@/src/lib/plans/plans.schemas';

export const dietGenerationResponseSchema = z.object({
  items: z.array(baseFoodItemSchema).min(1),
});

export type DietGenerationResponse = z.infer<typeof dietGenerationResponseSchema>;

/** The model may omit the id; the source fills it in */
export const exerciseGenerationResponseSchema = exercisePlanSchema.extend({
  id: z.number().int().optional(),
});

export type ExerciseGenerationResponse = z.infer<
  typeof exerciseGenerationResponseSchema
>;
