/**
 * Plan Schemas - Zod validation for plan boundaries
 *
 * Used to validate generator output, CLI input and user profiles before they
 * reach the expanders and the assessor.
 */

import { z } from 'zod';

// ============================================================================
// Shared enums
// ============================================================================

export const planTypeSchema = z.enum(['diet', 'exercise']);

export const mealTypeSchema = z.enum(['breakfast', 'lunch', 'dinner', 'snacks']);

export const intensityLevelSchema = z.enum([
  'low',
  'moderate',
  'high',
  'very_high',
]);

export const exerciseTypeSchema = z.enum([
  'cardio',
  'strength',
  'flexibility',
  'balance',
  'hiit',
]);

export const fitnessLevelSchema = z.enum([
  'sedentary',
  'beginner',
  'intermediate',
  'advanced',
]);

export const fitnessGoalSchema = z.enum([
  'weight_loss',
  'weight_gain',
  'muscle_building',
  'cardio_improvement',
  'flexibility',
  'endurance',
  'general_fitness',
  'maintenance',
]);

// ============================================================================
// Diet
// ============================================================================

/**
 * Unit is any non-empty string: unknown units are scaled continuously
 * instead of rejecting the whole candidate.
 */
export const baseFoodItemSchema = z.object({
  name: z.string().min(1),
  quantity: z.number(),
  unit: z.string().min(1),
  totalCalories: z.number().min(0).optional(),
  caloriesPerUnit: z.number().min(0).optional(),
});

export const baseFoodItemsSchema = z.array(baseFoodItemSchema).min(1);

// ============================================================================
// Exercise
// ============================================================================

export const exerciseItemSchema = z.object({
  name: z.string().min(1),
  exerciseType: exerciseTypeSchema,
  durationMinutes: z.number().int().positive(),
  intensity: intensityLevelSchema,
  caloriesBurned: z.number().min(0),
  equipment: z.array(z.string()).default([]),
  targetMuscles: z.array(z.string()).default([]),
  instructions: z.array(z.string()).default([]),
});

export const exerciseSessionSchema = z.object({
  timeOfDay: z.enum(['morning', 'afternoon', 'evening', 'any']).default('any'),
  exercises: z.array(exerciseItemSchema),
  totalDurationMinutes: z.number().min(0),
  totalCaloriesBurned: z.number().min(0),
  overallIntensity: intensityLevelSchema,
});

export const exercisePlanSchema = z.object({
  id: z.number().int(),
  title: z.string().min(1),
  sessions: z
    .record(z.string(), exerciseSessionSchema)
    .refine((sessions) => Object.keys(sessions).length > 0, {
      message: 'Exercise plan needs at least one session',
    }),
  totalDurationMinutes: z.number().min(0),
  totalCaloriesBurned: z.number().min(0),
  weeklyFrequency: z.number().int().min(1).max(14).optional(),
  progression: z.string().optional(),
  reasoning: z.string().optional(),
  safetyNotes: z.array(z.string()).optional(),
});

// ============================================================================
// User + environment
// ============================================================================

export const userProfileSchema = z.object({
  age: z.number().int().min(1).max(120),
  gender: z.enum(['male', 'female']),
  heightCm: z.number().positive(),
  weightKg: z.number().positive(),
  medicalConditions: z.array(z.string()).default([]),
  dietaryRestrictions: z.array(z.string()).default([]),
  fitnessLevel: fitnessLevelSchema.default('beginner'),
});

export const environmentContextSchema = z.object({
  weather: z
    .object({
      condition: z.string().optional(),
      temperatureC: z.number().optional(),
    })
    .optional(),
  location: z.enum(['indoor', 'outdoor']).optional(),
  season: z.string().optional(),
});

export const userRequirementSchema = z.object({
  goal: fitnessGoalSchema.optional(),
  preference: z.string().optional(),
});

/**
 * Request file accepted by the pipeline CLI
 */
export const planRequestInputSchema = z.object({
  profile: userProfileSchema,
  environment: environmentContextSchema.default({}),
  requirement: userRequirementSchema.default({}),
});

export type PlanRequestInput = z.infer<typeof planRequestInputSchema>;
