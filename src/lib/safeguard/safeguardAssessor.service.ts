/**
 * Safeguard Assessor Service
 *
 * Produces one SafetyAssessment for a diet or exercise subject. Four signal
 * sources are pooled before scoring:
 *
 * 1. Rule checks (threshold table, can be disabled)
 * 2. Condition restriction checks (keyword matching on plan content)
 * 3. Environment checks
 * 4. Semantic assessment (external collaborator, optional)
 *
 * The pooled signals are scored by the single configured ScoringPolicy. A
 * semantic collaborator that throws, times out or returns unusable output
 * contributes nothing.
 */

import { describeError } from '@/src/lib/errors/app-error';
import { withTimeout } from '@/src/lib/utils/timeout';
import { runConditionChecks } from './conditionChecks';
import { runEnvironmentChecks } from './environmentChecks';
import { createTextMatcher, type TextMatcher } from './matchers';
import { runRuleChecks } from './ruleChecks';
import { getSafeguardRules, type SafeguardRules } from './safeguard.config';
import type {
  AssessmentInput,
  RiskLevel,
  SafetyAssessment,
  SafetyAssessmentRecord,
  SafetySignals,
  ScoringPolicy,
  SemanticAssessor,
} from './safeguard.types';
import { collectWarnings } from './scoringPolicies';
import { normalizeSemanticAssessment } from './semanticAssessment';

const DEFAULT_ASSESSMENT_TIMEOUT_MS = 30_000;

function freezeCopy<T extends object>(value: T): Readonly<T> {
  return Object.freeze({ ...value });
}

export type SafeguardAssessorOptions = {
  policy: ScoringPolicy;
  /** Threshold table and restrictions (default: config/safeguard-rules.json) */
  rules?: SafeguardRules;
  /** Matcher for condition restrictions (default: rules.conditionMatchMode) */
  matcher?: TextMatcher;
  semanticAssessor?: SemanticAssessor;
  /** Numeric threshold checks (default true) */
  enableRuleChecks?: boolean;
  assessmentTimeoutMs?: number;
  now?: () => Date;
};

export class SafeguardAssessor {
  private readonly policy: ScoringPolicy;
  private readonly rules: SafeguardRules;
  private readonly matcher: TextMatcher;
  private readonly semanticAssessor?: SemanticAssessor;
  private readonly enableRuleChecks: boolean;
  private readonly assessmentTimeoutMs: number;
  private readonly now: () => Date;

  constructor(options: SafeguardAssessorOptions) {
    this.policy = options.policy;
    this.rules = options.rules ?? getSafeguardRules();
    this.matcher =
      options.matcher ?? createTextMatcher(this.rules.conditionMatchMode);
    this.semanticAssessor = options.semanticAssessor;
    this.enableRuleChecks = options.enableRuleChecks ?? true;
    this.assessmentTimeoutMs =
      options.assessmentTimeoutMs ?? DEFAULT_ASSESSMENT_TIMEOUT_MS;
    this.now = options.now ?? (() => new Date());
  }

  get policyName(): ScoringPolicy['name'] {
    return this.policy.name;
  }

  async assess(input: AssessmentInput): Promise<SafetyAssessment> {
    const { subject, profile, environment } = input;
    const sources: SafetySignals[] = [];

    if (this.enableRuleChecks) {
      sources.push(runRuleChecks(subject, profile, this.rules));
    }
    sources.push(runConditionChecks(subject, profile, this.rules, this.matcher));
    sources.push(runEnvironmentChecks(subject, environment, this.rules));
    sources.push(await this.semanticSignals(input));

    const signals: SafetySignals = {
      riskFactors: sources.flatMap((s) => s.riskFactors),
      safetyChecks: sources.flatMap((s) => s.safetyChecks),
    };

    const outcome = this.policy.score(signals, {
      planType: subject.planType,
      profile,
    });

    return Object.freeze({
      ...outcome,
      riskFactors: Object.freeze(signals.riskFactors.map(freezeCopy)),
      safetyChecks: Object.freeze(signals.safetyChecks.map(freezeCopy)),
      recommendations: Object.freeze([...outcome.recommendations]),
      warnings: Object.freeze(collectWarnings(signals.riskFactors)),
      assessedAt: this.now().toISOString(),
    });
  }

  private async semanticSignals(input: AssessmentInput): Promise<SafetySignals> {
    const semanticAssessor = this.semanticAssessor;
    if (!semanticAssessor) return { riskFactors: [], safetyChecks: [] };

    try {
      const raw = await withTimeout(
        (signal) => semanticAssessor.assess(input, signal),
        this.assessmentTimeoutMs,
        'Semantic assessment',
      );
      const signals = normalizeSemanticAssessment(raw);
      if (
        signals.riskFactors.length === 0 &&
        signals.safetyChecks.length === 0
      ) {
        console.warn(
          `[SafeguardAssessor] Semantic assessment returned no usable signals (${input.subject.planType})`,
        );
      }
      return signals;
    } catch (error) {
      console.warn(
        `[SafeguardAssessor] Semantic assessment failed (${input.subject.planType}): ${describeError(error)}`,
      );
      return { riskFactors: [], safetyChecks: [] };
    }
  }
}

/**
 * Canonical snake_case record of an assessment
 */
export function toAssessmentRecord(
  assessment: SafetyAssessment,
): SafetyAssessmentRecord {
  return {
    score: assessment.score,
    is_safe: assessment.isSafe,
    status: assessment.status,
    risk_level: assessment.riskLevel,
    risk_factors: assessment.riskFactors.map((rf) => ({
      factor: rf.factor,
      category: rf.category,
      severity: rf.severity,
      description: rf.description,
      recommendation: rf.recommendation,
    })),
    safety_checks: assessment.safetyChecks.map((check) => ({
      check_name: check.checkName,
      passed: check.passed,
      message: check.message,
      ...(check.severity && { severity: check.severity }),
    })),
    recommendations: [...assessment.recommendations],
    warnings: [...assessment.warnings],
    assessed_at: assessment.assessedAt,
  };
}

export const HIGH_RISK_NOTE =
  'Some plans have high risk. Review safety notes carefully.';
export const NO_ASSESSMENTS_NOTE = 'No candidates generated';

export type CombinedAssessment = {
  overallScore: number;
  isSafe: boolean;
  /** low >= 80, moderate >= 60, otherwise high */
  riskLevel: Extract<RiskLevel, 'low' | 'moderate' | 'high'>;
  recommendations: string[];
  totalAssessed: number;
};

/**
 * Summary over every diet and exercise assessment of a health run.
 *
 * The score is the integer mean; the run is safe only when every assessment
 * is. Recommendations: the high-risk note when any assessment is high or
 * very_high, then the first two recommendations of the first three
 * assessments, de-duplicated and capped at five.
 */
export function combineAssessments(
  dietAssessments: readonly SafetyAssessment[],
  exerciseAssessments: readonly SafetyAssessment[],
): CombinedAssessment {
  const all = [...dietAssessments, ...exerciseAssessments];
  if (all.length === 0) {
    return {
      overallScore: 100,
      isSafe: true,
      riskLevel: 'low',
      recommendations: [NO_ASSESSMENTS_NOTE],
      totalAssessed: 0,
    };
  }

  const overallScore = Math.floor(
    all.reduce((sum, a) => sum + a.score, 0) / all.length,
  );

  const recommendations: string[] = [];
  if (all.some((a) => a.riskLevel === 'high' || a.riskLevel === 'very_high')) {
    recommendations.push(HIGH_RISK_NOTE);
  }
  for (const assessment of all.slice(0, 3)) {
    recommendations.push(...assessment.recommendations.slice(0, 2));
  }

  return {
    overallScore,
    isSafe: all.every((a) => a.isSafe),
    riskLevel:
      overallScore >= 80 ? 'low' : overallScore >= 60 ? 'moderate' : 'high',
    recommendations: [...new Set(recommendations)].slice(0, 5),
    totalAssessed: all.length,
  };
}
