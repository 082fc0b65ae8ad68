import { describe, it } from 'node:test';
import assert from 'node:assert';
import { runEnvironmentChecks } from './environmentChecks';
import { parseSafeguardRules } from './safeguard.config';
import type { AssessmentSubject } from './safeguard.types';

const rules = parseSafeguardRules({});

const exerciseSubject: AssessmentSubject = {
  planType: 'exercise',
  plan: {
    id: 1,
    title: 'Park run',
    sessions: {},
    totalDurationMinutes: 0,
    totalCaloriesBurned: 0,
  },
};

const dietSubject: AssessmentSubject = {
  planType: 'diet',
  items: [],
  totalCalories: 1800,
};

describe('runEnvironmentChecks', () => {
  it('flags heat and slippery weather for outdoor exercise', () => {
    const { riskFactors, safetyChecks } = runEnvironmentChecks(
      exerciseSubject,
      { weather: { temperatureC: 38, condition: 'Rainy' } },
      rules,
    );
    assert.deepStrictEqual(safetyChecks, []);
    assert.deepStrictEqual(riskFactors, [
      {
        factor: 'high_temperature_exercise',
        category: 'environmental',
        severity: 'high',
        description: 'High temperature (38°C) increases heat stress risk',
        recommendation: 'Exercise indoors or in early morning/late evening',
      },
      {
        factor: 'inclement_weather',
        category: 'environmental',
        severity: 'moderate',
        description: 'rainy weather increases slip/fall risk',
        recommendation: 'Move exercise indoors or choose safe surfaces',
      },
    ]);
  });

  it('flags cold weather as moderate', () => {
    const { riskFactors } = runEnvironmentChecks(
      exerciseSubject,
      { weather: { temperatureC: -2, condition: 'icy' } },
      rules,
    );
    assert.deepStrictEqual(
      riskFactors.map((rf) => [rf.factor, rf.severity]),
      [
        ['cold_temperature_exercise', 'moderate'],
        ['inclement_weather', 'moderate'],
      ],
    );
  });

  it('treats a missing environment as 20°C and clear', () => {
    assert.deepStrictEqual(runEnvironmentChecks(exerciseSubject, {}, rules), {
      riskFactors: [],
      safetyChecks: [],
    });
  });

  it('skips weather risks for indoor exercise', () => {
    assert.deepStrictEqual(
      runEnvironmentChecks(
        exerciseSubject,
        { location: 'indoor', weather: { temperatureC: 40, condition: 'icy' } },
        rules,
      ),
      { riskFactors: [], safetyChecks: [] },
    );
  });

  it('adds a passing hydration reminder for diets in hot weather', () => {
    assert.deepStrictEqual(
      runEnvironmentChecks(dietSubject, { weather: { temperatureC: 32 } }, rules),
      {
        riskFactors: [],
        safetyChecks: [
          {
            checkName: 'hot_weather_hydration',
            passed: true,
            message: 'Consider increased fluid intake for hot weather',
          },
        ],
      },
    );
    assert.deepStrictEqual(
      runEnvironmentChecks(dietSubject, { weather: { temperatureC: 38 } }, rules)
        .riskFactors,
      [],
    );
  });
});
