import { describe, it } from 'node:test';
import assert from 'node:assert';
import type { ExercisePlan } from '@/src/lib/plans/plans.types';
import {
  expandExerciseVariants,
  highestIntensity,
  intensityRemapFor,
  scaleExerciseItem,
} from './exerciseVariantExpander';

function basePlan(): ExercisePlan {
  return {
    id: 1,
    title: 'Morning conditioning',
    weeklyFrequency: 4,
    progression: 'Add 5 minutes per week',
    sessions: {
      morning: {
        timeOfDay: 'morning',
        exercises: [
          {
            name: 'Brisk walk',
            exerciseType: 'cardio',
            durationMinutes: 20,
            intensity: 'moderate',
            caloriesBurned: 100,
            equipment: [],
            targetMuscles: ['legs'],
            instructions: ['Keep a steady pace'],
          },
          {
            name: 'Bodyweight squats',
            exerciseType: 'strength',
            durationMinutes: 6,
            intensity: 'high',
            caloriesBurned: 45,
            equipment: [],
            targetMuscles: ['quadriceps', 'glutes'],
            instructions: ['Keep heels down'],
          },
        ],
        totalDurationMinutes: 26,
        totalCaloriesBurned: 145,
        overallIntensity: 'high',
      },
      evening: {
        timeOfDay: 'evening',
        exercises: [],
        totalDurationMinutes: 0,
        totalCaloriesBurned: 0,
        overallIntensity: 'low',
      },
    },
    totalDurationMinutes: 26,
    totalCaloriesBurned: 145,
  };
}

describe('intensityRemapFor', () => {
  it('steps intensity down below 1, up above 1 and keeps it at 1', () => {
    assert.deepStrictEqual(intensityRemapFor(0.8), {
      very_high: 'high',
      high: 'moderate',
      moderate: 'low',
      low: 'low',
    });
    assert.strictEqual(intensityRemapFor(1).high, 'high');
    assert.deepStrictEqual(intensityRemapFor(1.2), {
      very_high: 'very_high',
      high: 'very_high',
      moderate: 'high',
      low: 'moderate',
    });
  });
});

describe('scaleExerciseItem', () => {
  it('never drops below five minutes', () => {
    const scaled = scaleExerciseItem(basePlan().sessions.morning.exercises[1], 0.5);
    assert.strictEqual(scaled.durationMinutes, 5);
    // 45 * 5 / 6
    assert.strictEqual(scaled.caloriesBurned, 38);
    assert.strictEqual(scaled.intensity, 'moderate');
  });

  it('keeps calories when the base duration is zero', () => {
    const scaled = scaleExerciseItem(
      {
        name: 'Stretch',
        exerciseType: 'flexibility',
        durationMinutes: 0,
        intensity: 'low',
        caloriesBurned: 12,
        equipment: [],
        targetMuscles: [],
        instructions: [],
      },
      1.3,
    );
    assert.strictEqual(scaled.durationMinutes, 5);
    assert.strictEqual(scaled.caloriesBurned, 12);
  });

  it('has no entry under five minutes for any factor', () => {
    const exercise = basePlan().sessions.morning.exercises[1];
    for (let factor = 0.1; factor <= 2; factor += 0.1) {
      assert.ok(scaleExerciseItem(exercise, factor).durationMinutes >= 5);
    }
  });
});

describe('highestIntensity', () => {
  it('defaults to low for an empty session', () => {
    assert.strictEqual(highestIntensity([]), 'low');
  });
});

describe('expandExerciseVariants', () => {
  it('builds one full plan per variant with recomputed totals', () => {
    const variants = expandExerciseVariants(basePlan(), [
      { name: 'Variant_1', scaleFactor: 0.7 },
      { name: 'Variant_2', scaleFactor: 1 },
      { name: 'Variant_3', scaleFactor: 1.3 },
    ]);

    assert.deepStrictEqual(Object.keys(variants), [
      'Variant_1',
      'Variant_2',
      'Variant_3',
    ]);

    const easier = variants.Variant_1;
    assert.strictEqual(easier.title, 'Morning conditioning (Variant_1)');
    // walk 14 min / 70 kcal, squats max(5, 4) = 5 min / round(37.5) = 38 kcal
    assert.deepStrictEqual(
      easier.sessions.morning.exercises.map((e) => [
        e.durationMinutes,
        e.caloriesBurned,
        e.intensity,
      ]),
      [
        [14, 70, 'low'],
        [5, 38, 'moderate'],
      ],
    );
    assert.strictEqual(easier.sessions.morning.totalDurationMinutes, 19);
    assert.strictEqual(easier.sessions.morning.totalCaloriesBurned, 108);
    assert.strictEqual(easier.sessions.morning.overallIntensity, 'moderate');
    assert.strictEqual(easier.sessions.evening.overallIntensity, 'low');
    assert.strictEqual(easier.totalDurationMinutes, 19);
    assert.strictEqual(easier.totalCaloriesBurned, 108);
    assert.strictEqual(easier.weeklyFrequency, 4);
    assert.strictEqual(easier.progression, 'Add 5 minutes per week');

    const same = variants.Variant_2;
    assert.strictEqual(same.totalDurationMinutes, 26);
    assert.strictEqual(same.totalCaloriesBurned, 145);
    assert.strictEqual(same.sessions.morning.overallIntensity, 'high');

    const harder = variants.Variant_3;
    // walk 26 min / 130 kcal, squats round(7.8) = 8 min / 60 kcal
    assert.strictEqual(harder.totalDurationMinutes, 34);
    assert.strictEqual(harder.totalCaloriesBurned, 190);
    assert.strictEqual(harder.sessions.morning.overallIntensity, 'very_high');
  });

  it('does not mutate the base plan', () => {
    const plan = basePlan();
    expandExerciseVariants(plan, [{ name: 'Variant_1', scaleFactor: 1.3 }]);
    assert.deepStrictEqual(plan, basePlan());
  });
});
