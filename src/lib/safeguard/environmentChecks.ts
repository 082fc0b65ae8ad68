/**
 * Safeguard - Environment checks
 *
 * Outdoor exercise is checked against heat, cold and slippery conditions.
 * Diet plans only get a passing hydration reminder in hot weather.
 */

import type { EnvironmentContext } from '@/src/lib/plans/plans.types';
import type { SafeguardRules } from './safeguard.config';
import type {
  AssessmentSubject,
  RiskFactor,
  SafetyCheck,
  SafetySignals,
} from './safeguard.types';

export function runEnvironmentChecks(
  subject: AssessmentSubject,
  environment: EnvironmentContext,
  rules: SafeguardRules,
): SafetySignals {
  const { environment: thresholds } = rules;
  const safetyChecks: SafetyCheck[] = [];
  const riskFactors: RiskFactor[] = [];

  const temperature =
    environment.weather?.temperatureC ?? thresholds.defaultTemperatureC;
  const condition = (
    environment.weather?.condition ?? thresholds.defaultCondition
  ).toLowerCase();

  if (subject.planType === 'exercise') {
    if (environment.location === 'indoor') return { riskFactors, safetyChecks };

    if (temperature > thresholds.heatThresholdC) {
      riskFactors.push({
        factor: 'high_temperature_exercise',
        category: 'environmental',
        severity: 'high',
        description: `High temperature (${temperature}°C) increases heat stress risk`,
        recommendation: 'Exercise indoors or in early morning/late evening',
      });
    } else if (temperature < thresholds.coldThresholdC) {
      riskFactors.push({
        factor: 'cold_temperature_exercise',
        category: 'environmental',
        severity: 'moderate',
        description: `Cold temperature (${temperature}°C) increases cardiovascular strain`,
        recommendation: 'Warm up thoroughly, dress in layers',
      });
    }

    if (thresholds.slipConditions.includes(condition)) {
      riskFactors.push({
        factor: 'inclement_weather',
        category: 'environmental',
        severity: 'moderate',
        description: `${condition} weather increases slip/fall risk`,
        recommendation: 'Move exercise indoors or choose safe surfaces',
      });
    }
    return { riskFactors, safetyChecks };
  }

  if (temperature > thresholds.hydrationThresholdC) {
    safetyChecks.push({
      checkName: 'hot_weather_hydration',
      passed: true,
      message: 'Consider increased fluid intake for hot weather',
    });
  }
  return { riskFactors, safetyChecks };
}
