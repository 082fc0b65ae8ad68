/**
 * Persisted artifact of one pipeline run (snake_case JSON):
 *
 *   { all_plans, top_plans, assessments: { [id]: record }, generated_at }
 *
 * Every plan embeds its own `_assessment` plus `_variant`, `_scale_factor`
 * and `_base_id`.
 */

import type {
  ExerciseItem,
  ExercisePlan,
  ExerciseSession,
  IntensityLevel,
  MealType,
  ScaledFoodItem,
} from '@/src/lib/plans/plans.types';
import { toAssessmentRecord } from '@/src/lib/safeguard/safeguardAssessor.service';
import type { SafetyAssessmentRecord } from '@/src/lib/safeguard/safeguard.types';
import type {
  DietPlanCandidate,
  ExercisePlanCandidate,
  PlanCandidate,
  PlanPipelineResult,
} from './planPipeline.types';

type CandidateRecordMeta = {
  id: number;
  _variant: string;
  _scale_factor: number;
  _base_id: number;
  _assessment: SafetyAssessmentRecord;
};

export type FoodItemRecord = {
  name: string;
  quantity: number;
  unit: string;
  calories_per_unit: number;
  total_calories: number;
  variant: string;
};

export type DietPlanRecord = CandidateRecordMeta & {
  plan_type: 'diet';
  meal_type: MealType;
  items: FoodItemRecord[];
  total_calories: number;
  target_calories: number;
  calories_deviation: number;
};

export type ExerciseItemRecord = {
  name: string;
  exercise_type: string;
  duration_minutes: number;
  intensity: IntensityLevel;
  calories_burned: number;
  equipment: string[];
  target_muscles: string[];
  instructions: string[];
};

export type ExerciseSessionRecord = {
  time_of_day: string;
  exercises: ExerciseItemRecord[];
  total_duration_minutes: number;
  total_calories_burned: number;
  overall_intensity: IntensityLevel;
};

export type ExercisePlanRecord = CandidateRecordMeta & {
  plan_type: 'exercise';
  title: string;
  sessions: Record<string, ExerciseSessionRecord>;
  total_duration_minutes: number;
  total_calories_burned: number;
  weekly_frequency?: number;
  progression?: string;
  reasoning?: string;
  safety_notes?: string[];
  target_duration_minutes: number;
  duration_deviation: number;
};

export type PlanRecord = DietPlanRecord | ExercisePlanRecord;

export type PlanArtifact = {
  all_plans: PlanRecord[];
  top_plans: PlanRecord[];
  assessments: Record<string, SafetyAssessmentRecord>;
  generated_at: string;
};

function recordMeta(candidate: PlanCandidate): CandidateRecordMeta {
  return {
    id: candidate.id,
    _variant: candidate.variant,
    _scale_factor: candidate.scaleFactor,
    _base_id: candidate.baseId,
    _assessment: toAssessmentRecord(candidate.assessment),
  };
}

function foodItemRecord(item: ScaledFoodItem): FoodItemRecord {
  return {
    name: item.name,
    quantity: item.quantity,
    unit: item.unit,
    calories_per_unit: item.caloriesPerUnit,
    total_calories: item.totalCalories,
    variant: item.variant,
  };
}

function dietPlanRecord(candidate: DietPlanCandidate): DietPlanRecord {
  return {
    ...recordMeta(candidate),
    plan_type: 'diet',
    meal_type: candidate.mealType,
    items: candidate.items.map(foodItemRecord),
    total_calories: candidate.totalCalories,
    target_calories: candidate.targetCalories,
    calories_deviation: candidate.caloriesDeviation,
  };
}

function exerciseItemRecord(item: ExerciseItem): ExerciseItemRecord {
  return {
    name: item.name,
    exercise_type: item.exerciseType,
    duration_minutes: item.durationMinutes,
    intensity: item.intensity,
    calories_burned: item.caloriesBurned,
    equipment: [...item.equipment],
    target_muscles: [...item.targetMuscles],
    instructions: [...item.instructions],
  };
}

function exerciseSessionRecord(session: ExerciseSession): ExerciseSessionRecord {
  return {
    time_of_day: session.timeOfDay,
    exercises: session.exercises.map(exerciseItemRecord),
    total_duration_minutes: session.totalDurationMinutes,
    total_calories_burned: session.totalCaloriesBurned,
    overall_intensity: session.overallIntensity,
  };
}

function planOptionalFields(
  plan: ExercisePlan,
): Pick<ExercisePlanRecord, 'weekly_frequency' | 'progression' | 'reasoning' | 'safety_notes'> {
  const fields: Pick<
    ExercisePlanRecord,
    'weekly_frequency' | 'progression' | 'reasoning' | 'safety_notes'
  > = {};
  if (plan.weeklyFrequency !== undefined) fields.weekly_frequency = plan.weeklyFrequency;
  if (plan.progression !== undefined) fields.progression = plan.progression;
  if (plan.reasoning !== undefined) fields.reasoning = plan.reasoning;
  if (plan.safetyNotes !== undefined) fields.safety_notes = [...plan.safetyNotes];
  return fields;
}

function exercisePlanRecord(candidate: ExercisePlanCandidate): ExercisePlanRecord {
  const { plan } = candidate;
  const sessions: Record<string, ExerciseSessionRecord> = {};
  for (const [key, session] of Object.entries(plan.sessions)) {
    sessions[key] = exerciseSessionRecord(session);
  }
  return {
    ...recordMeta(candidate),
    plan_type: 'exercise',
    title: plan.title,
    sessions,
    total_duration_minutes: plan.totalDurationMinutes,
    total_calories_burned: plan.totalCaloriesBurned,
    ...planOptionalFields(plan),
    target_duration_minutes: candidate.targetDurationMinutes,
    duration_deviation: candidate.durationDeviation,
  };
}

export function toPlanRecord(candidate: PlanCandidate): PlanRecord {
  return candidate.planType === 'diet'
    ? dietPlanRecord(candidate)
    : exercisePlanRecord(candidate);
}

export function toPlanArtifact(
  result: Pick<
    PlanPipelineResult<PlanCandidate>,
    'allPlans' | 'topPlans' | 'assessments' | 'generatedAt'
  >,
): PlanArtifact {
  const assessments: Record<string, SafetyAssessmentRecord> = {};
  for (const [id, assessment] of Object.entries(result.assessments)) {
    assessments[id] = toAssessmentRecord(assessment);
  }
  return {
    all_plans: result.allPlans.map(toPlanRecord),
    top_plans: result.topPlans.map(toPlanRecord),
    assessments,
    generated_at: result.generatedAt,
  };
}
