/**
 * Plan Generator - Public API
 */

export type {
  PlanRequest,
  DietGenerationRequest,
  ExerciseGenerationRequest,
  GenerationCall,
  CandidateSourceResult,
  PlanCandidateSource,
  DietCandidateSource,
  ExerciseCandidateSource,
  RetrievalContextProvider,
} from './planGenerator.types';

export {
  calculateBmr,
  dailyCalorieTarget,
  mealCalorieTarget,
  deviationPercent,
  exerciseTargets,
  MEAL_CALORIE_SHARE,
} from './planTargets';
export type { ExerciseTargets } from './planTargets';

export {
  GeminiDietCandidateSource,
  parseDietGenerationOutput,
} from './dietCandidateSource';
export {
  GeminiExerciseCandidateSource,
  parseExerciseGenerationOutput,
} from './exerciseCandidateSource';
export {
  ConditionGuidanceService,
  formatConditionGuidance,
  CONDITION_GUIDANCE_TABLE,
} from './conditionGuidance.service';
export { resolveRetrievalContext } from './retrievalContext';
