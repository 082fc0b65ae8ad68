import { describe, it } from 'node:test';
import assert from 'node:assert';
import { AppError } from '@/src/lib/errors/app-error';
import { parseAssessmentInput } from './assessmentInput';

const profile = {
  age: 50,
  gender: 'male',
  heightCm: 176,
  weightKg: 84,
  medicalConditions: ['diabetes'],
};

describe('parseAssessmentInput', () => {
  it('builds a diet subject from items as given', () => {
    const input = parseAssessmentInput({
      profile,
      plan: {
        planType: 'diet',
        mealType: 'dinner',
        items: [
          { name: 'Brown rice', quantity: 150, unit: 'gram', totalCalories: 195 },
          { name: 'Grilled chicken', quantity: 1, unit: 'piece', caloriesPerUnit: 220 },
        ],
      },
    });

    assert.deepStrictEqual(input.subject, {
      planType: 'diet',
      items: [
        {
          name: 'Brown rice',
          quantity: 150,
          unit: 'gram',
          caloriesPerUnit: 1.3,
          totalCalories: 195,
          variant: 'as_given',
        },
        {
          name: 'Grilled chicken',
          quantity: 1,
          unit: 'piece',
          caloriesPerUnit: 220,
          totalCalories: 220,
          variant: 'as_given',
        },
      ],
      totalCalories: 415,
      mealType: 'dinner',
      macroRatios: undefined,
    });
    assert.deepStrictEqual(input.environment, {});
    assert.strictEqual(input.profile.fitnessLevel, 'beginner');
    assert.deepStrictEqual(input.profile.dietaryRestrictions, []);
  });

  it('passes an exercise plan through', () => {
    const input = parseAssessmentInput({
      profile,
      environment: { location: 'outdoor', weather: { temperatureC: 31 } },
      plan: {
        planType: 'exercise',
        plan: {
          id: 4,
          title: 'Park jog',
          sessions: {
            morning: {
              timeOfDay: 'morning',
              exercises: [
                {
                  name: 'Jog',
                  exerciseType: 'cardio',
                  durationMinutes: 20,
                  intensity: 'moderate',
                  caloriesBurned: 180,
                },
              ],
              totalDurationMinutes: 20,
              totalCaloriesBurned: 180,
              overallIntensity: 'moderate',
            },
          },
          totalDurationMinutes: 20,
          totalCaloriesBurned: 180,
        },
      },
    });

    assert.strictEqual(input.subject.planType, 'exercise');
    if (input.subject.planType === 'exercise') {
      assert.strictEqual(input.subject.plan.title, 'Park jog');
      assert.deepStrictEqual(input.subject.plan.sessions.morning.exercises[0].equipment, []);
    }
    assert.strictEqual(input.environment.weather?.temperatureC, 31);
  });

  it('rejects invalid input with VALIDATION_ERROR and the offending paths', () => {
    assert.throws(
      () =>
        parseAssessmentInput({
          profile: { ...profile, age: 0 },
          plan: { planType: 'diet', items: [] },
        }),
      (error: unknown) => {
        if (!(error instanceof AppError) || error.code !== 'VALIDATION_ERROR') {
          return false;
        }
        const issues = error.details?.issues;
        return (
          Array.isArray(issues) &&
          issues.some((issue) => String(issue).startsWith('profile.age:')) &&
          issues.some((issue) => String(issue).startsWith('plan.items:'))
        );
      },
    );
  });

  it('rejects an unknown plan type', () => {
    assert.throws(
      () => parseAssessmentInput({ profile, plan: { planType: 'sleep' } }),
      (error: unknown) => error instanceof AppError && error.code === 'VALIDATION_ERROR',
    );
  });
});
