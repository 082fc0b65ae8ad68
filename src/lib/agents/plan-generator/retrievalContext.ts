import type { PlanType, UserProfile } from '@/src/lib/plans/plans.types';
import type { RetrievalContextProvider } from './planGenerator.types';

/**
 * Resolve the retrieval context for a generation call.
 *
 * A context threaded in from an earlier call is reused as-is. Otherwise it is
 * fetched once (only when the user has conditions to look up); a failed
 * lookup yields an empty context so the next call does not retry it.
 */
export async function resolveRetrievalContext(
  provider: RetrievalContextProvider | undefined,
  planType: PlanType,
  profile: UserProfile,
  threaded: string | undefined,
): Promise<string> {
  if (threaded !== undefined) return threaded;
  if (!provider || profile.medicalConditions.length === 0) return '';

  try {
    return await provider.fetchContext(planType, profile);
  } catch (error) {
    console.warn(
      `[PlanGenerator] Retrieval context lookup failed for ${planType}:`,
      error instanceof Error ? error.message : String(error),
    );
    return '';
  }
}
