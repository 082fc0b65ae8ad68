/**
 * Prompt for the semantic safety assessment.
 */

import type { AssessmentInput } from './safeguard.types';

function describeSubject(input: AssessmentInput): string {
  const { subject } = input;
  if (subject.planType === 'diet') {
    return JSON.stringify(
      {
        mealType: subject.mealType ?? 'full_day',
        totalCalories: subject.totalCalories,
        macroRatios: subject.macroRatios,
        items: subject.items.map((item) => ({
          name: item.name,
          quantity: item.quantity,
          unit: item.unit,
          totalCalories: item.totalCalories,
        })),
      },
      null,
      2,
    );
  }
  return JSON.stringify(subject.plan, null, 2);
}

export function buildSemanticAssessmentPrompt(input: AssessmentInput): string {
  const { profile, environment, retrievalContext, subject } = input;
  const conditions =
    profile.medicalConditions.length > 0
      ? profile.medicalConditions.join(', ')
      : 'none';

  const contextSection = retrievalContext?.trim()
    ? `\n## Domain context\n${retrievalContext.trim()}\n`
    : '';

  return `Analyze the following ${subject.planType} plan for safety issues.

## User profile
- Age: ${profile.age}
- Gender: ${profile.gender}
- Fitness level: ${profile.fitnessLevel}
- Conditions: ${conditions}
- Dietary restrictions: ${profile.dietaryRestrictions.join(', ') || 'none'}

## Environment
${JSON.stringify(environment)}
${contextSection}
## Plan
${describeSubject(input)}

## Task
Identify safety concerns that threshold checks might miss:
1. Hidden contraindications for the listed conditions
2. Unrealistic progression
3. Nutrient deficiencies
4. Overtraining signs
5. Environmental mismatches

Return JSON with "risk_factors" (factor, category, severity, description, recommendation)
and "safety_checks" (check_name, passed, message, severity). Severity is one of
low, moderate, high, very_high. Return empty arrays when there is nothing to report.`;
}
