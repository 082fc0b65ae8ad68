import { describe, it } from 'node:test';
import assert from 'node:assert';
import { AppError } from '@/src/lib/errors/app-error';
import type { UserProfile } from '@/src/lib/plans/plans.types';
import {
  collectWarnings,
  createScoringPolicy,
  EXERCISE_REMINDERS,
} from './scoringPolicies';
import type {
  RiskFactor,
  RiskSeverity,
  SafetyCheck,
  ScoringContext,
} from './safeguard.types';

const profile: UserProfile = {
  age: 40,
  gender: 'female',
  heightCm: 170,
  weightKg: 70,
  medicalConditions: [],
  dietaryRestrictions: [],
  fitnessLevel: 'intermediate',
};

const dietContext: ScoringContext = { planType: 'diet', profile };

function risk(severity: RiskSeverity, recommendation = `Handle ${severity}`): RiskFactor {
  return {
    factor: `${severity}_risk`,
    category: 'test',
    severity,
    description: `A ${severity} risk`,
    recommendation,
  };
}

function check(passed: boolean): SafetyCheck {
  return { checkName: passed ? 'ok' : 'not_ok', passed, message: '' };
}

describe('risk_factor_gate policy', () => {
  const policy = createScoringPolicy('risk_factor_gate');

  it('passes with only moderate risk factors and fails on a high one', () => {
    const moderate = policy.score(
      { riskFactors: [risk('moderate')], safetyChecks: [] },
      dietContext,
    );
    assert.strictEqual(moderate.isSafe, true);
    assert.strictEqual(moderate.score, 100);
    assert.strictEqual(moderate.status, 'passed');
    assert.strictEqual(moderate.riskLevel, 'low');

    const high = policy.score(
      { riskFactors: [risk('moderate'), risk('high')], safetyChecks: [] },
      dietContext,
    );
    assert.strictEqual(high.isSafe, false);
    assert.strictEqual(high.score, 0);
    assert.strictEqual(high.status, 'failed');
    assert.strictEqual(high.riskLevel, 'very_high');
    assert.deepStrictEqual(high.recommendations, []);
  });

  it('ignores failed checks', () => {
    const outcome = policy.score(
      { riskFactors: [], safetyChecks: [check(false)] },
      dietContext,
    );
    assert.strictEqual(outcome.score, 100);
  });
});

describe('check_gate policy', () => {
  const policy = createScoringPolicy('check_gate');

  it('fails on any failed check regardless of risk factors', () => {
    assert.strictEqual(
      policy.score({ riskFactors: [], safetyChecks: [check(true), check(false)] }, dietContext)
        .score,
      0,
    );
    const passed = policy.score(
      { riskFactors: [risk('very_high')], safetyChecks: [check(true)] },
      dietContext,
    );
    assert.strictEqual(passed.score, 100);
    assert.strictEqual(passed.isSafe, true);
  });

  it('only ever scores 0 or 100', () => {
    const combos: SafetyCheck[][] = [[], [check(true)], [check(false)], [check(true), check(false)]];
    for (const safetyChecks of combos) {
      const { score } = policy.score({ riskFactors: [], safetyChecks }, dietContext);
      assert.ok(score === 0 || score === 100);
    }
  });
});

describe('weighted policy', () => {
  const policy = createScoringPolicy('weighted');

  it('scores 100 with no checks and no risks', () => {
    assert.deepStrictEqual(
      policy.score({ riskFactors: [], safetyChecks: [] }, dietContext),
      {
        score: 100,
        isSafe: true,
        status: 'passed',
        riskLevel: 'low',
        recommendations: [],
      },
    );
  });

  it('subtracts severity penalties from the passed-check share', () => {
    // 2/3 passed = 66.67, minus 15 = 51.67
    const outcome = policy.score(
      {
        riskFactors: [risk('moderate')],
        safetyChecks: [check(true), check(true), check(false)],
      },
      dietContext,
    );
    assert.strictEqual(outcome.score, 52);
    assert.strictEqual(outcome.isSafe, false);
    assert.strictEqual(outcome.status, 'review');
    assert.strictEqual(outcome.riskLevel, 'high');
  });

  it('is unsafe with a high risk even when the score is in the warning band', () => {
    const outcome = policy.score(
      { riskFactors: [risk('high')], safetyChecks: [] },
      dietContext,
    );
    assert.strictEqual(outcome.score, 70);
    assert.strictEqual(outcome.status, 'warning');
    assert.strictEqual(outcome.riskLevel, 'moderate');
    assert.strictEqual(outcome.isSafe, false);
  });

  it('clamps at zero when penalties exceed 100', () => {
    const outcome = policy.score(
      {
        riskFactors: [risk('very_high'), risk('very_high'), risk('high')],
        safetyChecks: [check(true)],
      },
      dietContext,
    );
    assert.strictEqual(outcome.score, 0);
    assert.strictEqual(outcome.status, 'failed');
    assert.strictEqual(outcome.riskLevel, 'very_high');
  });

  it('builds de-duplicated recommendations', () => {
    const outcome = policy.score(
      {
        riskFactors: [
          risk('low', 'Drink water'),
          risk('moderate', 'Drink water'),
          risk('low', ''),
        ],
        safetyChecks: [],
      },
      {
        planType: 'exercise',
        profile: { ...profile, medicalConditions: ['asthma', 'arthritis'] },
      },
    );
    assert.deepStrictEqual(outcome.recommendations, [
      'Drink water',
      'Consult healthcare provider before starting due to: asthma, arthritis',
      ...EXERCISE_REMINDERS,
    ]);
  });
});

describe('collectWarnings', () => {
  it('keeps descriptions of high and very high risks', () => {
    assert.deepStrictEqual(
      collectWarnings([risk('low'), risk('high'), risk('moderate'), risk('very_high')]),
      ['A high risk', 'A very_high risk'],
    );
  });
});

describe('createScoringPolicy', () => {
  it('rejects unknown policy names', () => {
    assert.throws(
      () => createScoringPolicy('strictest'),
      (error: unknown) =>
        error instanceof AppError && error.code === 'PIPELINE_CONFIG_INVALID',
    );
  });
});
