/**
 * Plan Pipeline - Public API
 */

export type {
  DietPlanCandidate,
  ExercisePlanCandidate,
  PlanCandidate,
  PlanPipelineDeps,
  PlanPipelineDriver,
  PlanPipelineResult,
  PlanAssessor,
} from './planPipeline.types';

export { runPlanPipeline } from './planPipeline.service';
export {
  dietPipelineDriver,
  runDietPipeline,
  toDietGenerationRequest,
} from './dietPipeline';
export type { DietPipelineRequest, DietPipelineDeps } from './dietPipeline';
export {
  exercisePipelineDriver,
  runExercisePipeline,
  toExerciseGenerationRequest,
} from './exercisePipeline';
export type { ExercisePipelineDeps } from './exercisePipeline';
export { filterSafeCandidates, runHealthPipeline } from './healthPipeline';
export type {
  HealthPipelineDeps,
  HealthPipelineOptions,
  HealthPipelineResult,
} from './healthPipeline';

export { rankCandidates, selectTopCandidates } from './planRanking';
export { toPlanArtifact, toPlanRecord } from './planArtifact';
export type { PlanArtifact, PlanRecord } from './planArtifact';
export {
  FilePlanArtifactStore,
  SupabasePlanArtifactStore,
  PLAN_GENERATION_RUNS_TABLE,
} from './planArtifact.store';
export type { PlanArtifactStore, PlanArtifactMeta } from './planArtifact.store';

export {
  getPlanPipelineConfig,
  parsePlanPipelineConfig,
  resolvePlanPipelineConfig,
  resetPlanPipelineConfigCache,
} from './planPipeline.config';
export type { PlanPipelineConfig } from './planPipeline.config';

export { createPlanPipelineRunLogger } from './planPipelineRunLogger';
export type { PlanPipelineRunLogger } from './planPipelineRunLogger';
