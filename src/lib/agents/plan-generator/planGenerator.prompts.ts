/**
 * Plan Generator Prompts
 *
 * Builds the prompts for one base diet meal or one base exercise plan.
 */

import type { FitnessGoal } from '@/src/lib/plans/plans.types';
import type {
  DietGenerationRequest,
  ExerciseGenerationRequest,
  PlanRequest,
} from './planGenerator.types';

/**
 * Generation strategies per goal, cycled through by attempt
 */
const STRATEGIES_BY_GOAL: Partial<Record<FitnessGoal, string[]>> = {
  weight_loss: ['calorie_burn', 'variety', 'sustainability'],
  muscle_building: ['progressive_overload', 'variety', 'recovery'],
  cardio_improvement: ['intervals', 'endurance', 'variety'],
  flexibility: ['mobility', 'balance', 'recovery'],
  endurance: ['progressive', 'variety', 'intensity'],
  general_fitness: ['balanced', 'variety', 'progressive'],
  maintenance: ['balanced', 'sustainability', 'variety'],
};

const STRATEGY_GUIDANCE: Record<string, string> = {
  balanced: 'Focus on a mix of cardio, strength and flexibility.',
  variety: 'Include diverse exercises to prevent boredom and plateaus.',
  calorie_burn: 'Favour sustained movement that burns calories steadily.',
  recovery: 'Leave room for recovery between demanding exercises.',
  progressive_overload: 'Build load gradually across the weeks.',
};

export function strategyForAttempt(
  goal: FitnessGoal | undefined,
  attempt: number,
): string {
  const strategies = (goal && STRATEGIES_BY_GOAL[goal]) || ['balanced', 'variety'];
  return strategies[attempt % strategies.length];
}

function list(values: readonly string[]): string {
  return values.length > 0 ? values.join(', ') : 'None';
}

function formatProfile({ profile, requirement, environment }: PlanRequest): string {
  return `## User Profile
- Age: ${profile.age}
- Gender: ${profile.gender}
- Height: ${profile.heightCm}cm
- Weight: ${profile.weightKg}kg
- Fitness level: ${profile.fitnessLevel}
- Medical conditions: ${list(profile.medicalConditions)}
- Dietary restrictions: ${list(profile.dietaryRestrictions)}

## Goal
- Primary goal: ${requirement.goal ?? 'maintenance'}
${requirement.preference ? `- Preference: ${requirement.preference}\n` : ''}
## Environment
- Weather: ${environment.weather?.condition ?? 'clear'}, ${environment.weather?.temperatureC ?? 20}°C
- Location: ${environment.location ?? 'outdoor'}
- Season: ${environment.season ?? 'any'}`;
}

function formatContext(retrievalContext: string | undefined): string {
  const text = retrievalContext?.trim();
  return text ? `\n## Domain Knowledge\n${text}\n` : '';
}

export function buildDietGenerationPrompt(
  request: DietGenerationRequest,
  retrievalContext?: string,
): string {
  return `You are a nutrition planner. Create the base food items for ONE ${request.mealType} meal.

${formatProfile(request)}

## Target
- Meal: ${request.mealType}
- Target calories: ${request.targetCalories} kcal
${formatContext(retrievalContext)}
## Rules
- Respect every medical condition and dietary restriction above.
- Use only these units: gram, ml, piece, slice, cup, bowl, spoon.
- Give each item its name, quantity, unit and totalCalories for that quantity.
- Item calories should add up to roughly the target.

Return JSON: {"items": [{"name", "quantity", "unit", "totalCalories"}]}.`;
}

export function buildExerciseGenerationPrompt(
  request: ExerciseGenerationRequest,
  attempt: number,
  retrievalContext?: string,
): string {
  const { targets } = request;
  const strategy = strategyForAttempt(request.requirement.goal, attempt);
  const guidance = STRATEGY_GUIDANCE[strategy] ?? 'Focus on balanced training.';

  return `You are an exercise planner. Create ONE daily exercise plan.

${formatProfile(request)}

## Targets
- Calories burned per day: ${targets.caloriesBurned} kcal
- Duration per session: ${targets.durationMinutes} minutes
- Weekly frequency: ${targets.weeklyFrequency} sessions
${formatContext(retrievalContext)}
## Strategy: ${strategy.toUpperCase()}
${guidance}

## Rules
- Group exercises into sessions keyed by time of day (morning, afternoon, evening).
- Each exercise has name, exerciseType (cardio, strength, flexibility, balance, hiit),
  durationMinutes (whole minutes), intensity (low, moderate, high, very_high) and caloriesBurned.
- Session and plan totals must equal the sum of their exercises.
- Set weeklyFrequency, and add progression, reasoning and safetyNotes.

Return ONLY the JSON plan object.`;
}
