/**
 * Safeguard - Rule checks
 *
 * Numeric threshold comparisons keyed by plan type. Every evaluated rule
 * yields a SafetyCheck; hard failures also yield a matching RiskFactor.
 */

import { INTENSITY_ORDER, type UserProfile } from '@/src/lib/plans/plans.types';
import type { SafeguardRules } from './safeguard.config';
import type {
  DietAssessmentSubject,
  ExerciseAssessmentSubject,
  AssessmentSubject,
  RiskFactor,
  SafetyCheck,
  SafetySignals,
} from './safeguard.types';

const HIGH_INTENSITY_INDEX = INTENSITY_ORDER.indexOf('high');

function percent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

export function runRuleChecks(
  subject: AssessmentSubject,
  profile: UserProfile,
  rules: SafeguardRules,
): SafetySignals {
  return subject.planType === 'diet'
    ? runDietRuleChecks(subject, rules)
    : runExerciseRuleChecks(subject, profile, rules);
}

export function runDietRuleChecks(
  subject: DietAssessmentSubject,
  rules: SafeguardRules,
): SafetySignals {
  const { diet } = rules;
  const safetyChecks: SafetyCheck[] = [];
  const riskFactors: RiskFactor[] = [];
  const total = subject.totalCalories;

  if (subject.mealType) {
    if (total > diet.maxSingleMealCalories) {
      safetyChecks.push({
        checkName: 'single_meal_calories',
        passed: false,
        message: `Single meal calorie too high (${total} > ${diet.maxSingleMealCalories})`,
        severity: 'low',
      });
    } else {
      safetyChecks.push({
        checkName: 'single_meal_calories',
        passed: true,
        message: `${subject.mealType} calories within single-meal limit`,
      });
    }
  } else if (total < diet.minDailyCalories) {
    safetyChecks.push({
      checkName: 'min_calories',
      passed: false,
      message: 'Daily calories too low',
      severity: 'high',
    });
    riskFactors.push({
      factor: 'extremely_low_calories',
      category: 'nutritional',
      severity: 'high',
      description: `Total calories ${total} is dangerously low`,
      recommendation: 'Consult a dietitian for safe calorie targets',
    });
  } else if (total > diet.maxDailyCalories) {
    safetyChecks.push({
      checkName: 'max_calories',
      passed: false,
      message: 'Daily calories too high',
      severity: 'moderate',
    });
  } else {
    safetyChecks.push({
      checkName: 'calories_range',
      passed: true,
      message: 'Calorie intake within acceptable range',
    });
  }

  const proteinRatio = subject.macroRatios?.proteinRatio;
  if (proteinRatio !== undefined) {
    if (proteinRatio < diet.minProteinRatio) {
      safetyChecks.push({
        checkName: 'min_protein_ratio',
        passed: false,
        message: 'Protein ratio too low (need adequate protein)',
        severity: 'moderate',
      });
      riskFactors.push({
        factor: 'low_protein',
        category: 'nutritional',
        severity: 'moderate',
        description: `Protein ratio ${percent(proteinRatio)} is below recommended minimum`,
        recommendation: 'Include more protein-rich foods',
      });
    } else {
      safetyChecks.push({
        checkName: 'min_protein_ratio',
        passed: true,
        message: `Protein ratio ${percent(proteinRatio)} is adequate`,
      });
    }
  }

  const fatRatio = subject.macroRatios?.fatRatio;
  if (fatRatio !== undefined) {
    if (fatRatio > diet.maxFatRatio) {
      safetyChecks.push({
        checkName: 'max_fat_ratio',
        passed: false,
        message: 'Fat ratio too high',
        severity: 'moderate',
      });
      riskFactors.push({
        factor: 'high_fat',
        category: 'nutritional',
        severity: 'moderate',
        description: `Fat ratio ${percent(fatRatio)} exceeds recommended maximum`,
        recommendation: 'Reduce high-fat foods',
      });
    } else {
      safetyChecks.push({
        checkName: 'max_fat_ratio',
        passed: true,
        message: `Fat ratio ${percent(fatRatio)} is within limits`,
      });
    }
  }

  return { riskFactors, safetyChecks };
}

export function runExerciseRuleChecks(
  subject: ExerciseAssessmentSubject,
  profile: UserProfile,
  rules: SafeguardRules,
): SafetySignals {
  const { exercise } = rules;
  const { plan } = subject;
  const safetyChecks: SafetyCheck[] = [];
  const riskFactors: RiskFactor[] = [];
  const level = profile.fitnessLevel;
  const entries = Object.values(plan.sessions).flatMap((s) => s.exercises);

  // Daily duration
  const duration = plan.totalDurationMinutes;
  const maxDuration =
    exercise.durationLimits[level] ?? exercise.defaultDurationLimit;
  if (duration > maxDuration) {
    const severity = level === 'advanced' ? 'moderate' : 'high';
    safetyChecks.push({
      checkName: 'daily_duration',
      passed: false,
      message: `Duration ${duration}min exceeds ${level} limit (${maxDuration}min)`,
      severity,
    });
    riskFactors.push({
      factor: 'excessive_duration',
      category: 'exercise',
      severity,
      description: `Total exercise time ${duration}min is excessive for ${level}`,
      recommendation: `Reduce daily duration to ${maxDuration}min or less`,
    });
  } else {
    safetyChecks.push({
      checkName: 'daily_duration',
      passed: true,
      message: `Duration ${duration}min is appropriate`,
    });
  }

  // Rest days
  const weeklyFrequency = plan.weeklyFrequency ?? exercise.defaultWeeklyFrequency;
  if (weeklyFrequency > exercise.maxWeeklySessions) {
    safetyChecks.push({
      checkName: 'rest_days',
      passed: false,
      message: 'Exercise every day without rest',
      severity: 'moderate',
    });
    riskFactors.push({
      factor: 'no_rest_days',
      category: 'exercise',
      severity: 'moderate',
      description: 'No rest days scheduled in weekly plan',
      recommendation: 'Include at least 1-2 rest days per week',
    });
  } else {
    safetyChecks.push({
      checkName: 'rest_days',
      passed: true,
      message: `${weeklyFrequency} sessions per week leaves room for rest`,
    });
  }

  // HIIT frequency
  if (entries.some((e) => e.exerciseType === 'hiit')) {
    if (weeklyFrequency > exercise.hiitMaxWeeklySessions) {
      safetyChecks.push({
        checkName: 'hiit_frequency',
        passed: false,
        message: 'HIIT sessions too frequent (need rest days)',
        severity: 'high',
      });
      riskFactors.push({
        factor: 'hiit_frequency',
        category: 'exercise',
        severity: 'high',
        description: 'HIIT sessions too frequent without adequate recovery',
        recommendation: 'Limit HIIT to 2-3 times per week with 48h rest',
      });
    } else {
      safetyChecks.push({
        checkName: 'hiit_frequency',
        passed: true,
        message: 'HIIT frequency allows recovery',
      });
    }
  }

  // Intensity vs fitness level
  if (exercise.highIntensityCautionLevels.includes(level)) {
    const intense = entries.filter(
      (e) => INTENSITY_ORDER.indexOf(e.intensity) >= HIGH_INTENSITY_INDEX,
    );
    if (intense.length > 0) {
      safetyChecks.push({
        checkName: 'high_intensity_for_level',
        passed: false,
        message: `High-intensity exercise planned for ${level} level`,
        severity: 'moderate',
      });
      riskFactors.push({
        factor: 'high_intensity_for_level',
        category: 'exercise',
        severity: 'moderate',
        description: `${intense.map((e) => e.name).join(', ')} at high intensity for ${level} level`,
        recommendation:
          'Replace high-intensity work with moderate alternatives until fitness improves',
      });
    } else {
      safetyChecks.push({
        checkName: 'high_intensity_for_level',
        passed: true,
        message: `Intensity suits ${level} level`,
      });
    }
  }

  return { riskFactors, safetyChecks };
}
