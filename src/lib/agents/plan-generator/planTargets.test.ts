import { describe, it } from 'node:test';
import assert from 'node:assert';
import type { UserProfile } from '@/src/lib/plans/plans.types';
import {
  calculateBmr,
  dailyCalorieTarget,
  deviationPercent,
  exerciseTargets,
  mealCalorieTarget,
  targetWeeklyFrequency,
} from './planTargets';

const male: UserProfile = {
  age: 30,
  gender: 'male',
  heightCm: 180,
  weightKg: 80,
  medicalConditions: [],
  dietaryRestrictions: [],
  fitnessLevel: 'intermediate',
};

const female: UserProfile = {
  age: 25,
  gender: 'female',
  heightCm: 165,
  weightKg: 60,
  medicalConditions: [],
  dietaryRestrictions: [],
  fitnessLevel: 'sedentary',
};

describe('calorie targets', () => {
  it('computes Harris-Benedict BMR per gender', () => {
    assert.ok(Math.abs(calculateBmr(male) - 1853.632) < 1e-9);
    assert.ok(Math.abs(calculateBmr(female) - 1405.333) < 1e-9);
  });

  it('applies the activity factor and goal adjustment, truncated', () => {
    assert.strictEqual(dailyCalorieTarget(male), 2873);
    assert.strictEqual(dailyCalorieTarget(male, 'weight_loss'), 2373);
    assert.strictEqual(dailyCalorieTarget(female, 'maintenance'), 1686);
  });

  it('ignores goals without a calorie adjustment', () => {
    assert.strictEqual(dailyCalorieTarget(male, 'flexibility'), 2873);
  });

  it('splits the daily target by meal share', () => {
    assert.strictEqual(mealCalorieTarget(2873, 'breakfast'), 718);
    assert.strictEqual(mealCalorieTarget(2873, 'lunch'), 1005);
    assert.strictEqual(mealCalorieTarget(2000, 'dinner'), 600);
    assert.strictEqual(mealCalorieTarget(2873, 'snacks'), 287);
  });
});

describe('deviationPercent', () => {
  it('reports signed percentage deviation with one decimal', () => {
    assert.strictEqual(deviationPercent(1850, 2000), -7.5);
    assert.strictEqual(deviationPercent(2100, 2000), 5);
    assert.strictEqual(deviationPercent(700, 600), 16.7);
  });

  it('returns 0 for a zero target', () => {
    assert.strictEqual(deviationPercent(350, 0), 0);
  });
});

describe('exerciseTargets', () => {
  it('reduces calories and frequency for heart disease', () => {
    assert.deepStrictEqual(
      exerciseTargets(
        { ...male, fitnessLevel: 'beginner', medicalConditions: ['Heart_Disease'] },
        'weight_loss',
      ),
      { durationMinutes: 20, weeklyFrequency: 2, caloriesBurned: 300 },
    );
  });

  it('scales duration by the goal multiplier', () => {
    assert.deepStrictEqual(exerciseTargets(male, 'muscle_building'), {
      durationMinutes: 34,
      weeklyFrequency: 4,
      caloriesBurned: 200,
    });
    assert.deepStrictEqual(
      exerciseTargets({ ...male, fitnessLevel: 'advanced' }, 'cardio_improvement'),
      { durationMinutes: 66, weeklyFrequency: 6, caloriesBurned: 450 },
    );
  });

  it('uses defaults for an unlisted level and goal', () => {
    assert.deepStrictEqual(exerciseTargets(female, 'weight_gain'), {
      durationMinutes: 30,
      weeklyFrequency: 3,
      caloriesBurned: 250,
    });
  });

  it('defaults the goal to maintenance', () => {
    assert.deepStrictEqual(exerciseTargets(male), {
      durationMinutes: 36,
      weeklyFrequency: 3,
      caloriesBurned: 150,
    });
  });
});

describe('targetWeeklyFrequency', () => {
  it('stacks condition adjustments', () => {
    assert.strictEqual(
      targetWeeklyFrequency('advanced', 'endurance', ['obesity', 'arthritis']),
      4,
    );
  });

  it('never goes below one session', () => {
    assert.strictEqual(
      targetWeeklyFrequency('beginner', 'maintenance', ['heart_disease']),
      1,
    );
  });

  it('matches condition names by containment', () => {
    assert.strictEqual(
      targetWeeklyFrequency('intermediate', 'general_fitness', ['chronic_arthritis']),
      3,
    );
  });
});
