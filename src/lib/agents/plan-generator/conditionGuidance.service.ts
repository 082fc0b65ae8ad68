/**
 * Condition Guidance Service
 *
 * Retrieval context for generation and assessment prompts: curated guidance
 * rows from `condition_guidance`, looked up by the user's medical conditions
 * and rendered as a markdown block.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { AppError } from '@/src/lib/errors/app-error';
import type { PlanType, UserProfile } from '@/src/lib/plans/plans.types';
import { normalizeConditionKey } from '@/src/lib/safeguard/conditionChecks';
import { createAdminClient } from '@/src/lib/supabase/admin';
import type { RetrievalContextProvider } from './planGenerator.types';

export const CONDITION_GUIDANCE_TABLE = 'condition_guidance';

const conditionGuidanceRowSchema = z.object({
  condition: z.string(),
  plan_type: z.enum(['diet', 'exercise', 'both']),
  guidance: z.string(),
  source: z.string().nullable().optional(),
});

export type ConditionGuidanceRow = z.infer<typeof conditionGuidanceRowSchema>;

export type ConditionGuidanceServiceOptions = {
  supabase?: SupabaseClient;
  /** Max rows per lookup (default 20) */
  limit?: number;
};

/**
 * Render guidance rows grouped by condition, in the order the conditions
 * were declared. Empty when there are no rows.
 */
export function formatConditionGuidance(
  conditions: string[],
  rows: ConditionGuidanceRow[],
): string {
  const sections: string[] = [];
  for (const condition of conditions) {
    const lines = rows
      .filter((row) => row.condition === condition)
      .map((row) => (row.source ? `- ${row.guidance} (${row.source})` : `- ${row.guidance}`));
    if (lines.length > 0) {
      sections.push(`### ${condition}\n${lines.join('\n')}`);
    }
  }
  return sections.join('\n\n');
}

export class ConditionGuidanceService implements RetrievalContextProvider {
  private readonly supabase: SupabaseClient;
  private readonly limit: number;

  constructor(options: ConditionGuidanceServiceOptions = {}) {
    this.supabase = options.supabase ?? createAdminClient();
    this.limit = options.limit ?? 20;
  }

  async fetchContext(planType: PlanType, profile: UserProfile): Promise<string> {
    const conditions = [
      ...new Set(profile.medicalConditions.map(normalizeConditionKey)),
    ];
    if (conditions.length === 0) return '';

    const { data, error } = await this.supabase
      .from(CONDITION_GUIDANCE_TABLE)
      .select('condition, plan_type, guidance, source')
      .in('condition', conditions)
      .in('plan_type', [planType, 'both'])
      .order('condition', { ascending: true })
      .limit(this.limit);

    if (error) {
      throw new AppError('DB_ERROR', 'Failed to load condition guidance', {
        table: CONDITION_GUIDANCE_TABLE,
        message: error.message,
      });
    }

    const rows: ConditionGuidanceRow[] = [];
    for (const raw of data ?? []) {
      const parsed = conditionGuidanceRowSchema.safeParse(raw);
      if (parsed.success) {
        rows.push(parsed.data);
      } else {
        console.warn('[ConditionGuidanceService] Skipping malformed guidance row');
      }
    }

    return formatConditionGuidance(conditions, rows);
  }
}
