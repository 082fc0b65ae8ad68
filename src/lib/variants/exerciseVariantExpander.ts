/**
 * Exercise Variant Expander
 *
 * Scales every exercise in a base plan by the variant factor, shifts the
 * intensity one step in the direction of the factor and recomputes the
 * session and plan totals.
 */

import {
  INTENSITY_ORDER,
  type ExerciseItem,
  type ExercisePlan,
  type ExerciseSession,
  type IntensityLevel,
  type VariantConfig,
} from '@/src/lib/plans/plans.types';

export const MIN_EXERCISE_DURATION_MINUTES = 5;

type IntensityRemap = Record<IntensityLevel, IntensityLevel>;

const EASIER: IntensityRemap = {
  very_high: 'high',
  high: 'moderate',
  moderate: 'low',
  low: 'low',
};

const UNCHANGED: IntensityRemap = {
  very_high: 'very_high',
  high: 'high',
  moderate: 'moderate',
  low: 'low',
};

const HARDER: IntensityRemap = {
  very_high: 'very_high',
  high: 'very_high',
  moderate: 'high',
  low: 'moderate',
};

export type ExerciseVariants = Record<string, ExercisePlan>;

export function intensityRemapFor(factor: number): IntensityRemap {
  if (factor < 1) return EASIER;
  if (factor > 1) return HARDER;
  return UNCHANGED;
}

/**
 * Highest intensity among the exercises, `low` for an empty session.
 */
export function highestIntensity(exercises: ExerciseItem[]): IntensityLevel {
  let highest = 0;
  for (const exercise of exercises) {
    highest = Math.max(highest, INTENSITY_ORDER.indexOf(exercise.intensity));
  }
  return INTENSITY_ORDER[highest] ?? 'low';
}

export function scaleExerciseItem(
  exercise: ExerciseItem,
  factor: number,
  remap: IntensityRemap = intensityRemapFor(factor),
): ExerciseItem {
  const durationMinutes = Math.max(
    MIN_EXERCISE_DURATION_MINUTES,
    Math.round(exercise.durationMinutes * factor),
  );
  const caloriesBurned =
    exercise.durationMinutes > 0
      ? Math.round(
          (exercise.caloriesBurned * durationMinutes) / exercise.durationMinutes,
        )
      : exercise.caloriesBurned;

  return {
    ...exercise,
    durationMinutes,
    caloriesBurned,
    intensity: remap[exercise.intensity],
    equipment: [...exercise.equipment],
    targetMuscles: [...exercise.targetMuscles],
    instructions: [...exercise.instructions],
  };
}

export function scaleExerciseSession(
  session: ExerciseSession,
  factor: number,
): ExerciseSession {
  const remap = intensityRemapFor(factor);
  const exercises = session.exercises.map((exercise) =>
    scaleExerciseItem(exercise, factor, remap),
  );

  return {
    timeOfDay: session.timeOfDay,
    exercises,
    totalDurationMinutes: exercises.reduce((sum, e) => sum + e.durationMinutes, 0),
    totalCaloriesBurned: exercises.reduce((sum, e) => sum + e.caloriesBurned, 0),
    overallIntensity: highestIntensity(exercises),
  };
}

export function scaleExercisePlan(
  plan: ExercisePlan,
  variant: VariantConfig,
): ExercisePlan {
  const sessions: Record<string, ExerciseSession> = {};
  let totalDurationMinutes = 0;
  let totalCaloriesBurned = 0;

  for (const [key, session] of Object.entries(plan.sessions)) {
    const scaled = scaleExerciseSession(session, variant.scaleFactor);
    sessions[key] = scaled;
    totalDurationMinutes += scaled.totalDurationMinutes;
    totalCaloriesBurned += scaled.totalCaloriesBurned;
  }

  return {
    ...plan,
    title: `${plan.title} (${variant.name})`,
    sessions,
    totalDurationMinutes,
    totalCaloriesBurned,
    ...(plan.safetyNotes && { safetyNotes: [...plan.safetyNotes] }),
  };
}

/**
 * One full plan per variant, keyed in variant order.
 */
export function expandExerciseVariants(
  plan: ExercisePlan,
  variants: VariantConfig[],
): ExerciseVariants {
  const result: ExerciseVariants = {};
  for (const variant of variants) {
    result[variant.name] = scaleExercisePlan(plan, variant);
  }
  return result;
}
