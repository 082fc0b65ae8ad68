/**
 * Plan Targets
 *
 * Aggregate targets handed to the generator and used for the deviation of
 * each candidate: daily/meal calories for diets, duration, weekly frequency
 * and calories burned for exercise.
 */

import type {
  FitnessGoal,
  FitnessLevel,
  MealType,
  UserProfile,
} from '@/src/lib/plans/plans.types';
import { roundTo } from '@/src/lib/variants/rounding';

// ============================================================================
// Diet
// ============================================================================

const ACTIVITY_FACTORS: Record<FitnessLevel, number> = {
  sedentary: 1.2,
  beginner: 1.375,
  intermediate: 1.55,
  advanced: 1.725,
};

const GOAL_CALORIE_ADJUSTMENT: Partial<Record<FitnessGoal, number>> = {
  weight_loss: -500,
  weight_gain: 500,
  muscle_building: 300,
  maintenance: 0,
};

/** Share of the daily target per meal type */
export const MEAL_CALORIE_SHARE: Record<MealType, number> = {
  breakfast: 0.25,
  lunch: 0.35,
  dinner: 0.3,
  snacks: 0.1,
};

/**
 * Harris-Benedict basal metabolic rate (kcal/day)
 */
export function calculateBmr(
  profile: Pick<UserProfile, 'age' | 'gender' | 'heightCm' | 'weightKg'>,
): number {
  const { age, gender, heightCm, weightKg } = profile;
  if (gender === 'male') {
    return 88.362 + 13.397 * weightKg + 4.799 * heightCm - 5.677 * age;
  }
  return 447.593 + 9.247 * weightKg + 3.098 * heightCm - 4.33 * age;
}

export function activityFactor(level: FitnessLevel): number {
  return ACTIVITY_FACTORS[level];
}

/**
 * Daily calorie target: BMR x activity factor plus the goal adjustment,
 * truncated to whole kcal.
 */
export function dailyCalorieTarget(
  profile: UserProfile,
  goal: FitnessGoal = 'maintenance',
): number {
  const tdee = calculateBmr(profile) * activityFactor(profile.fitnessLevel);
  return Math.trunc(tdee + (GOAL_CALORIE_ADJUSTMENT[goal] ?? 0));
}

export function mealCalorieTarget(
  dailyTarget: number,
  mealType: MealType,
): number {
  return Math.trunc(dailyTarget * MEAL_CALORIE_SHARE[mealType]);
}

/**
 * Percentage deviation of an actual total from its target, 1 decimal.
 * A zero target has no meaningful deviation and reports 0.
 */
export function deviationPercent(actual: number, target: number): number {
  if (target === 0) return 0;
  return roundTo(((actual - target) / target) * 100, 1);
}

// ============================================================================
// Exercise
// ============================================================================

export type ExerciseTargets = {
  durationMinutes: number;
  weeklyFrequency: number;
  caloriesBurned: number;
};

const GOAL_CALORIES_BURNED: Partial<Record<FitnessGoal, number>> = {
  weight_loss: 400,
  muscle_building: 200,
  cardio_improvement: 450,
  flexibility: 100,
  endurance: 400,
  general_fitness: 250,
  maintenance: 150,
};

const DEFAULT_CALORIES_BURNED = 250;

/** Conditions that lower the calorie-burn target */
const CALORIE_REDUCING_CONDITIONS = new Set([
  'heart_disease',
  'obesity',
  'arthritis',
]);

const CALORIE_REDUCTION_FACTOR = 0.75;

const BASE_DURATION_MINUTES: Partial<Record<FitnessLevel, number>> = {
  beginner: 20,
  intermediate: 40,
  advanced: 60,
};

const DEFAULT_DURATION_MINUTES = 30;

const GOAL_DURATION_MULTIPLIER: Partial<Record<FitnessGoal, number>> = {
  weight_loss: 1.0,
  muscle_building: 0.85,
  cardio_improvement: 1.1,
  flexibility: 0.7,
  endurance: 1.0,
  general_fitness: 1.0,
  maintenance: 0.9,
};

const BASE_WEEKLY_FREQUENCY: Partial<Record<FitnessLevel, number>> = {
  beginner: 3,
  intermediate: 4,
  advanced: 5,
};

const DEFAULT_WEEKLY_FREQUENCY = 3;

const GOAL_FREQUENCY_ADJUSTMENT: Partial<Record<FitnessGoal, number>> = {
  weight_loss: 1,
  cardio_improvement: 1,
  endurance: 1,
  maintenance: -1,
};

const CONDITION_FREQUENCY_ADJUSTMENT: ReadonlyArray<[string, number]> = [
  ['heart_disease', -2],
  ['obesity', -1],
  ['arthritis', -1],
  ['back_pain', 0],
];

export function targetCaloriesBurned(
  goal: FitnessGoal,
  medicalConditions: readonly string[],
): number {
  const base = GOAL_CALORIES_BURNED[goal] ?? DEFAULT_CALORIES_BURNED;
  const reduced = medicalConditions.some((c) =>
    CALORIE_REDUCING_CONDITIONS.has(c.toLowerCase()),
  );
  return Math.trunc(base * (reduced ? CALORIE_REDUCTION_FACTOR : 1));
}

export function targetDurationMinutes(
  level: FitnessLevel,
  goal: FitnessGoal,
): number {
  const base = BASE_DURATION_MINUTES[level] ?? DEFAULT_DURATION_MINUTES;
  return Math.trunc(base * (GOAL_DURATION_MULTIPLIER[goal] ?? 1));
}

/**
 * Sessions per week, 1..7. Each condition applies the first restriction it
 * matches (either name containing the other), never dropping below one.
 */
export function targetWeeklyFrequency(
  level: FitnessLevel,
  goal: FitnessGoal,
  medicalConditions: readonly string[],
): number {
  let frequency =
    (BASE_WEEKLY_FREQUENCY[level] ?? DEFAULT_WEEKLY_FREQUENCY) +
    (GOAL_FREQUENCY_ADJUSTMENT[goal] ?? 0);

  for (const condition of medicalConditions) {
    const name = condition.trim().toLowerCase();
    if (!name) continue;
    const match = CONDITION_FREQUENCY_ADJUSTMENT.find(
      ([key]) => key.includes(name) || name.includes(key),
    );
    if (match) {
      frequency = Math.max(1, frequency + match[1]);
    }
  }

  return Math.max(1, Math.min(7, frequency));
}

export function exerciseTargets(
  profile: UserProfile,
  goal: FitnessGoal = 'maintenance',
): ExerciseTargets {
  return {
    durationMinutes: targetDurationMinutes(profile.fitnessLevel, goal),
    weeklyFrequency: targetWeeklyFrequency(
      profile.fitnessLevel,
      goal,
      profile.medicalConditions,
    ),
    caloriesBurned: targetCaloriesBurned(goal, profile.medicalConditions),
  };
}
