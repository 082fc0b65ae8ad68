/**
 * Safeguard - Public API
 */

export type {
  RiskSeverity,
  RiskLevel,
  AssessmentStatus,
  SafetyCheck,
  RiskFactor,
  SafetySignals,
  SafetyAssessment,
  SafetyAssessmentRecord,
  MacroRatios,
  DietAssessmentSubject,
  ExerciseAssessmentSubject,
  AssessmentSubject,
  AssessmentInput,
  SemanticAssessor,
  ScoringPolicyName,
  ScoringPolicy,
} from './safeguard.types';

export {
  SafeguardAssessor,
  toAssessmentRecord,
  combineAssessments,
  HIGH_RISK_NOTE,
  NO_ASSESSMENTS_NOTE,
} from './safeguardAssessor.service';
export type {
  SafeguardAssessorOptions,
  CombinedAssessment,
} from './safeguardAssessor.service';

export {
  parseAssessmentInput,
  planAssessmentInputSchema,
} from './assessmentInput';
export type { PlanAssessmentInput } from './assessmentInput';

export {
  createScoringPolicy,
  isScoringPolicyName,
  SCORING_POLICY_NAMES,
} from './scoringPolicies';
export { createTextMatcher } from './matchers';
export type { MatchMode, TextMatcher, TextAtom } from './matchers';
export { runRuleChecks } from './ruleChecks';
export { runConditionChecks } from './conditionChecks';
export { runEnvironmentChecks } from './environmentChecks';
export { normalizeSemanticAssessment } from './semanticAssessment';
export { GeminiSemanticAssessor } from './geminiSemanticAssessor';
export {
  getSafeguardRules,
  parseSafeguardRules,
  resetSafeguardRulesCache,
} from './safeguard.config';
export type { SafeguardRules } from './safeguard.config';
