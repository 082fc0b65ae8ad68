/**
 * Safeguard - Condition restriction checks
 *
 * Each declared medical condition is looked up in the restriction table for
 * the plan type. Plan text is scanned for the forbidden terms of every
 * restriction; a restriction with at least one hit becomes one high-severity
 * risk factor. Restrictions never add safety checks, so a match is counted
 * once by the scoring policies.
 */

import type { UserProfile } from '@/src/lib/plans/plans.types';
import { createTextMatcher, type TextMatcher } from './matchers';
import { extractTextAtoms } from './planContent';
import type { SafeguardRules } from './safeguard.config';
import type {
  AssessmentSubject,
  RiskFactor,
  SafetySignals,
} from './safeguard.types';

/**
 * "Heart Disease" / "heart-disease" -> "heart_disease"
 */
export function normalizeConditionKey(condition: string): string {
  return condition
    .trim()
    .toLowerCase()
    .replace(/[\s-]+/g, '_');
}

export function runConditionChecks(
  subject: AssessmentSubject,
  profile: UserProfile,
  rules: SafeguardRules,
  matcher: TextMatcher = createTextMatcher(rules.conditionMatchMode),
): SafetySignals {
  const riskFactors: RiskFactor[] = [];
  const conditions = [
    ...new Set(profile.medicalConditions.map(normalizeConditionKey)),
  ];
  if (conditions.length === 0) return { riskFactors, safetyChecks: [] };

  const atoms = extractTextAtoms(subject);

  for (const condition of conditions) {
    const restrictions =
      rules.conditionRestrictions[condition]?.[subject.planType] ?? [];

    for (const restriction of restrictions) {
      const matchedTerms = [
        ...new Set(
          matcher.findMatches(atoms, restriction.terms).map((m) => m.term),
        ),
      ];
      if (matchedTerms.length === 0) continue;

      const checkName = `${condition}_${restriction.key}`;
      const found = matchedTerms.join(', ');
      riskFactors.push(
        subject.planType === 'diet'
          ? {
              factor: checkName,
              category: 'medical',
              severity: 'high',
              description: `Plan contains ${restriction.description} for ${condition} (${found})`,
              recommendation: `Remove ${restriction.description} for ${condition} management`,
            }
          : {
              factor: checkName,
              category: 'medical',
              severity: 'high',
              description: `Exercise may violate ${condition} restriction: ${restriction.description} (${found})`,
              recommendation: `Modify plan to comply with ${condition} restriction: ${restriction.description}`,
            },
      );
    }
  }

  return { riskFactors, safetyChecks: [] };
}
