/**
 * Plan Pipeline Service
 *
 * Drives one generation cycle end-to-end:
 * generate B bases -> expand each into V variants -> assess every variant ->
 * rank -> select top K -> persist once.
 *
 * Failed generations and failed assessments are logged and skipped. Only
 * configuration errors propagate.
 */

import type { PlanRequest } from '@/src/lib/agents/plan-generator/planGenerator.types';
import { AppError, describeError } from '@/src/lib/errors/app-error';
import type { SafetyAssessment } from '@/src/lib/safeguard/safeguard.types';
import { withTimeout } from '@/src/lib/utils/timeout';
import { buildVariantConfigs } from '@/src/lib/variants/scaleFactors';
import { toPlanArtifact } from './planArtifact';
import type {
  CandidateDraft,
  PlanCandidate,
  PlanPipelineDeps,
  PlanPipelineDriver,
  PlanPipelineResult,
} from './planPipeline.types';
import { rankCandidates, selectTopCandidates } from './planRanking';

type GeneratedBase<TBase> = {
  baseId: number;
  base: TBase;
};

function isFatal(error: unknown): boolean {
  return error instanceof AppError && error.isFatal;
}

export async function runPlanPipeline<
  TRequest extends PlanRequest,
  TBase,
  TContent,
  TCandidate extends PlanCandidate,
>(
  driver: PlanPipelineDriver<TRequest, TBase, TContent, TCandidate>,
  request: TRequest,
  deps: PlanPipelineDeps<TRequest, TBase>,
): Promise<PlanPipelineResult<TCandidate>> {
  const { config, source, assessor, store, logger } = deps;
  const now = deps.now ?? (() => new Date());
  const tag = `[PlanPipeline:${driver.planType}]`;
  const startedAt = Date.now();

  // Fails fast on an invalid scale range, before any generation call
  const variants = buildVariantConfigs({
    variantCount: config.variantCount,
    minScale: config.minScale,
    maxScale: config.maxScale,
  });

  logger?.event('run_start', {
    basePlanCount: config.basePlanCount,
    variantCount: config.variantCount,
    scaleFactors: variants.map((v) => v.scaleFactor),
    topK: config.topK,
    scoringPolicy: config.scoringPolicy,
  });

  // Step 1: resolve the retrieval context once, then generate bases
  // sequentially with the context threaded into every call
  let retrievalContext: string | undefined;
  const prepareContext = source.prepareContext?.bind(source);
  if (prepareContext) {
    try {
      retrievalContext = await withTimeout(
        () => prepareContext(request),
        config.generationTimeoutMs,
        'Retrieval context',
      );
    } catch (error) {
      if (isFatal(error)) throw error;
      console.warn(`${tag} Retrieval context unavailable, continuing without it:`, describeError(error));
      retrievalContext = '';
    }
  }

  const bases: GeneratedBase<TBase>[] = [];

  for (let attempt = 0; attempt < config.basePlanCount; attempt++) {
    const label = `Base plan ${attempt + 1}/${config.basePlanCount}`;
    try {
      const threaded = retrievalContext;
      const result = await withTimeout(
        (signal) => source.generate(request, { attempt, retrievalContext: threaded, signal }),
        config.generationTimeoutMs,
        label,
      );
      if (result.retrievalContext !== undefined) {
        retrievalContext = result.retrievalContext;
      }
      if (result.base === null || !driver.isUsable(result.base)) {
        console.warn(`${tag} ${label}: no usable base candidate, skipping`);
        logger?.generationFailed(attempt, 'empty_or_invalid');
        continue;
      }
      bases.push({ baseId: attempt + 1, base: result.base });
    } catch (error) {
      if (isFatal(error)) throw error;
      console.warn(`${tag} ${label} failed, skipping:`, describeError(error));
      logger?.generationFailed(attempt, describeError(error));
    }
  }

  logger?.stage('generate', { before: config.basePlanCount, after: bases.length });

  // Steps 2-3: expand and flatten with ids in generation order
  const drafts: CandidateDraft<TContent>[] = [];
  for (const { baseId, base } of bases) {
    for (const { variant, content } of driver.expand(base, variants)) {
      drafts.push({ id: drafts.length + 1, baseId, variant, content });
    }
  }

  // Step 4: assess each candidate independently
  const candidates: TCandidate[] = [];
  const assessments: Record<number, SafetyAssessment> = {};

  for (const draft of drafts) {
    let assessment: SafetyAssessment;
    try {
      assessment = await assessor.assess({
        subject: driver.toSubject(request, draft.content),
        profile: request.profile,
        environment: request.environment,
        retrievalContext: retrievalContext || undefined,
      });
    } catch (error) {
      if (isFatal(error)) throw error;
      console.error(
        `${tag} Assessment of candidate ${draft.id} failed, dropping it:`,
        describeError(error),
      );
      logger?.event('assessment_failed', { id: draft.id, reason: describeError(error) });
      continue;
    }

    assessments[draft.id] = assessment;
    candidates.push(driver.toCandidate(request, draft, assessment));
    logger?.candidateAssessed({
      id: draft.id,
      variant: draft.variant.name,
      score: assessment.score,
      status: assessment.status,
      riskFactors: assessment.riskFactors.length,
    });
  }

  logger?.stage('assess', { before: drafts.length, after: candidates.length });

  // Steps 5-6: rank and select
  const topPlans = selectTopCandidates(rankCandidates(candidates), config.topK);
  const generatedAt = now().toISOString();

  console.log(
    `${tag} ${bases.length}/${config.basePlanCount} bases, ${candidates.length} candidates, top: ${
      topPlans.map((c) => `#${c.id}(${c.assessment.score})`).join(', ') || 'none'
    }`,
  );

  // Step 7: persist once
  const result: PlanPipelineResult<TCandidate> = {
    allPlans: candidates,
    topPlans,
    assessments,
    generatedAt,
    persisted: false,
  };

  if (store) {
    try {
      result.artifactLocation = await store.save(toPlanArtifact(result), {
        runId: logger?.runId ?? `run-${startedAt}`,
        planType: driver.planType,
      });
      result.persisted = true;
    } catch (error) {
      console.error(`${tag} Persisting the plan artifact failed:`, describeError(error));
    }
  }

  logger?.runSummary({
    basePlansRequested: config.basePlanCount,
    basePlansGenerated: bases.length,
    candidates: candidates.length,
    topPlanIds: topPlans.map((c) => c.id),
    persisted: result.persisted,
    durationMs: Date.now() - startedAt,
  });

  return result;
}
