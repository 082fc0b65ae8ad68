/**
 * Plans Module - Barrel exports
 *
 * Domain types and boundary schemas shared by the expanders, the assessor and
 * the pipeline.
 */

// Types
export type {
  PlanType,
  FoodUnit,
  MealType,
  BaseFoodItem,
  ScaledFoodItem,
  IntensityLevel,
  ExerciseType,
  TimeOfDay,
  ExerciseItem,
  ExerciseSession,
  ExercisePlan,
  VariantConfig,
  FitnessLevel,
  FitnessGoal,
  Gender,
  UserProfile,
  WeatherCondition,
  EnvironmentContext,
  UserRequirement,
} from './plans.types';

export { FOOD_UNITS, INTENSITY_ORDER, isFoodUnit } from './plans.types';

// Schemas
export {
  planTypeSchema,
  mealTypeSchema,
  intensityLevelSchema,
  exerciseTypeSchema,
  fitnessLevelSchema,
  fitnessGoalSchema,
  baseFoodItemSchema,
  baseFoodItemsSchema,
  exerciseItemSchema,
  exerciseSessionSchema,
  exercisePlanSchema,
  userProfileSchema,
  environmentContextSchema,
  userRequirementSchema,
  planRequestInputSchema,
} from './plans.schemas';

export type { PlanRequestInput } from './plans.schemas';
