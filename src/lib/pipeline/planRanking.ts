import type { PlanCandidate } from './planPipeline.types';

/**
 * Order by assessment score (high first), then by id (low first).
 * Returns a new array; the input order does not matter.
 */
export function rankCandidates<T extends PlanCandidate>(candidates: readonly T[]): T[] {
  return [...candidates].sort(
    (a, b) => b.assessment.score - a.assessment.score || a.id - b.id,
  );
}

export function selectTopCandidates<T extends PlanCandidate>(
  ranked: readonly T[],
  topK: number,
): T[] {
  return ranked.slice(0, Math.max(0, topK));
}
