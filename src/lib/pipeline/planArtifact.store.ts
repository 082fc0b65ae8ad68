/**
 * Plan Artifact Stores
 *
 * One write per pipeline run. A store returns where the artifact went; a
 * failed write throws AppError('PERSISTENCE_FAILED').
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type { SupabaseClient } from '@supabase/supabase-js';
import { AppError } from '@/src/lib/errors/app-error';
import type { PlanType } from '@/src/lib/plans/plans.types';
import { createAdminClient } from '@/src/lib/supabase/admin';
import type { PlanArtifact } from './planArtifact';

export type PlanArtifactMeta = {
  runId: string;
  planType: PlanType;
};

export interface PlanArtifactStore {
  save(artifact: PlanArtifact, meta: PlanArtifactMeta): Promise<string>;
}

/**
 * Pretty-printed JSON file; parent directories are created.
 */
export class FilePlanArtifactStore implements PlanArtifactStore {
  private readonly path: string;

  constructor(path: string) {
    this.path = resolve(path);
  }

  async save(artifact: PlanArtifact): Promise<string> {
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(this.path, JSON.stringify(artifact, null, 2) + '\n', 'utf-8');
    } catch (error) {
      throw new AppError(
        'PERSISTENCE_FAILED',
        `Could not write plan artifact to ${this.path}`,
        error,
      );
    }
    return this.path;
  }
}

/**
 * Row shape of `plan_generation_runs`
 */
export type PlanGenerationRunRow = {
  run_id: string;
  plan_type: PlanType;
  generated_at: string;
  plan_count: number;
  top_plan_ids: number[];
  artifact: PlanArtifact;
};

export const PLAN_GENERATION_RUNS_TABLE = 'plan_generation_runs';

export class SupabasePlanArtifactStore implements PlanArtifactStore {
  constructor(
    private readonly supabase: SupabaseClient = createAdminClient(),
    private readonly table: string = PLAN_GENERATION_RUNS_TABLE,
  ) {}

  async save(artifact: PlanArtifact, meta: PlanArtifactMeta): Promise<string> {
    const row: PlanGenerationRunRow = {
      run_id: meta.runId,
      plan_type: meta.planType,
      generated_at: artifact.generated_at,
      plan_count: artifact.all_plans.length,
      top_plan_ids: artifact.top_plans.map((plan) => plan.id),
      artifact,
    };

    const { error } = await this.supabase.from(this.table).insert(row);

    if (error) {
      console.error('[SupabasePlanArtifactStore] Insert failed:', error.message);
      throw new AppError(
        'PERSISTENCE_FAILED',
        `Could not store plan run ${meta.runId}`,
        { table: this.table, message: error.message },
      );
    }

    return `supabase:${this.table}/${meta.runId}`;
  }
}
