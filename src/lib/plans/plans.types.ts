/**
 * Plan Types - Shared domain model for diet and exercise plans
 *
 * Base candidates come from the generator, variants from the expanders,
 * candidates (with their safety assessment) from the pipeline.
 */

/**
 * PlanType - which kind of plan is being generated or assessed
 */
export type PlanType = 'diet' | 'exercise';

/**
 * Portion units the generator is allowed to use
 */
export type FoodUnit =
  | 'gram' // continuous
  | 'ml' // continuous
  | 'piece'
  | 'slice'
  | 'cup'
  | 'bowl'
  | 'spoon'; // never scaled

export const FOOD_UNITS: readonly FoodUnit[] = [
  'gram',
  'ml',
  'piece',
  'slice',
  'cup',
  'bowl',
  'spoon',
];

export function isFoodUnit(unit: string): unit is FoodUnit {
  return FOOD_UNITS.some((known) => known === unit);
}

export type MealType = 'breakfast' | 'lunch' | 'dinner' | 'snacks';

/**
 * Base food item as produced by the generator.
 *
 * `unit` is a plain string at this boundary: an unknown unit is tolerated and
 * scaled like a continuous unit.
 */
export type BaseFoodItem = {
  name: string;
  quantity: number;
  unit: FoodUnit | (string & {});
  /** Calories for the whole portion (preferred) */
  totalCalories?: number;
  /** Calories for one unit (legacy generator output) */
  caloriesPerUnit?: number;
};

/**
 * Food item after variant scaling
 */
export type ScaledFoodItem = {
  name: string;
  quantity: number;
  unit: FoodUnit | (string & {});
  caloriesPerUnit: number;
  totalCalories: number;
  variant: string;
};

/**
 * Ordinal exercise intensity (low < moderate < high < very_high)
 */
export type IntensityLevel = 'low' | 'moderate' | 'high' | 'very_high';

export const INTENSITY_ORDER: readonly IntensityLevel[] = [
  'low',
  'moderate',
  'high',
  'very_high',
];

export type ExerciseType =
  | 'cardio'
  | 'strength'
  | 'flexibility'
  | 'balance'
  | 'hiit';

export type TimeOfDay = 'morning' | 'afternoon' | 'evening' | 'any';

export type ExerciseItem = {
  name: string;
  exerciseType: ExerciseType;
  durationMinutes: number;
  intensity: IntensityLevel;
  caloriesBurned: number;
  equipment: string[];
  targetMuscles: string[];
  instructions: string[];
};

export type ExerciseSession = {
  timeOfDay: TimeOfDay;
  exercises: ExerciseItem[];
  totalDurationMinutes: number;
  totalCaloriesBurned: number;
  overallIntensity: IntensityLevel;
};

/**
 * Exercise plan (base or variant). Session keys keep insertion order.
 */
export type ExercisePlan = {
  id: number;
  title: string;
  sessions: Record<string, ExerciseSession>;
  totalDurationMinutes: number;
  totalCaloriesBurned: number;
  /** Recommended sessions per week (rule checks assume 3 when absent) */
  weeklyFrequency?: number;
  progression?: string;
  reasoning?: string;
  safetyNotes?: string[];
};

/**
 * Named scale factor applied to a base candidate
 */
export type VariantConfig = {
  name: string;
  scaleFactor: number;
};

export type FitnessLevel = 'sedentary' | 'beginner' | 'intermediate' | 'advanced';

export type Gender = 'male' | 'female';

export type UserProfile = {
  age: number;
  gender: Gender;
  heightCm: number;
  weightKg: number;
  medicalConditions: string[];
  dietaryRestrictions: string[];
  fitnessLevel: FitnessLevel;
};

export type WeatherCondition = 'clear' | 'cloudy' | 'rainy' | 'icy' | 'snowy' | 'windy';

export type EnvironmentContext = {
  weather?: {
    condition?: WeatherCondition | (string & {});
    temperatureC?: number;
  };
  /** Where exercise takes place; environment risks apply outdoors only */
  location?: 'indoor' | 'outdoor';
  season?: string;
};

export type FitnessGoal =
  | 'weight_loss'
  | 'weight_gain'
  | 'muscle_building'
  | 'cardio_improvement'
  | 'flexibility'
  | 'endurance'
  | 'general_fitness'
  | 'maintenance';

export type UserRequirement = {
  goal?: FitnessGoal;
  /** Free-form preference, passed to the generator verbatim */
  preference?: string;
};
