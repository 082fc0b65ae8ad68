import { describe, it } from 'node:test';
import assert from 'node:assert';
import { GeminiDietCandidateSource } from '@/src/lib/agents/plan-generator/dietCandidateSource';
import type {
  CandidateSourceResult,
  DietCandidateSource,
  DietGenerationRequest,
  GenerationCall,
} from '@/src/lib/agents/plan-generator/planGenerator.types';
import type {
  GenerateJsonArgs,
  JsonModelClient,
} from '@/src/lib/ai/gemini/gemini.client';
import { AppError } from '@/src/lib/errors/app-error';
import type { BaseFoodItem } from '@/src/lib/plans/plans.types';
import type {
  AssessmentInput,
  SafetyAssessment,
} from '@/src/lib/safeguard/safeguard.types';
import { dietPipelineDriver } from './dietPipeline';
import type { PlanArtifact } from './planArtifact';
import type { PlanArtifactStore } from './planArtifact.store';
import { parsePlanPipelineConfig } from './planPipeline.config';
import { runPlanPipeline } from './planPipeline.service';
import type { PlanAssessor } from './planPipeline.types';

const GENERATED_AT = '2026-03-01T12:00:00.000Z';

const request: DietGenerationRequest = {
  profile: {
    age: 30,
    gender: 'male',
    heightCm: 180,
    weightKg: 80,
    medicalConditions: [],
    dietaryRestrictions: [],
    fitnessLevel: 'intermediate',
  },
  environment: {},
  requirement: {},
  mealType: 'breakfast',
  targetCalories: 400,
};

const oatmeal: BaseFoodItem[] = [
  { name: 'Oatmeal', quantity: 100, unit: 'gram', totalCalories: 400 },
];

type Step = (call: GenerationCall) => Promise<CandidateSourceResult<BaseFoodItem[]>>;

function scriptedSource(...steps: Step[]): DietCandidateSource & { calls: GenerationCall[] } {
  const calls: GenerationCall[] = [];
  return {
    calls,
    generate(_request, call) {
      calls.push(call);
      const step = steps[call.attempt];
      return step ? step(call) : Promise.resolve({ base: null });
    },
  };
}

const ok =
  (items: BaseFoodItem[], retrievalContext?: string): Step =>
  async () => ({ base: items, retrievalContext });

const fails =
  (error: Error): Step =>
  async () => {
    throw error;
  };

function assessment(score: number): SafetyAssessment {
  return {
    score,
    isSafe: score >= 60,
    status: score >= 80 ? 'passed' : score >= 60 ? 'warning' : 'failed',
    riskLevel: score >= 80 ? 'low' : 'high',
    riskFactors: [],
    safetyChecks: [],
    recommendations: [],
    warnings: [],
    assessedAt: GENERATED_AT,
  };
}

/** 100 at 400 kcal, 60 at 280 or 520 kcal */
function calorieAssessor(
  failFor: number[] = [],
): PlanAssessor & { inputs: AssessmentInput[] } {
  const inputs: AssessmentInput[] = [];
  return {
    inputs,
    async assess(input) {
      inputs.push(input);
      if (failFor.includes(inputs.length)) throw new Error('assessor crashed');
      const total = input.subject.planType === 'diet' ? input.subject.totalCalories : 0;
      return assessment(100 - Math.round(Math.abs(total - 400) / 3));
    },
  };
}

function memoryStore(): PlanArtifactStore & { saved: PlanArtifact[] } {
  const saved: PlanArtifact[] = [];
  return {
    saved,
    async save(artifact) {
      saved.push(artifact);
      return 'memory://plans.json';
    },
  };
}

const config = parsePlanPipelineConfig({
  basePlanCount: 2,
  variantCount: 3,
  minScale: 0.7,
  maxScale: 1.3,
  topK: 2,
  generationTimeoutMs: 50,
});

const now = () => new Date(GENERATED_AT);

describe('runPlanPipeline', () => {
  it('assesses only the variants of bases that were generated', async () => {
    const source = scriptedSource(fails(new Error('model offline')), ok(oatmeal));
    const assessor = calorieAssessor();
    const store = memoryStore();

    const result = await runPlanPipeline(dietPipelineDriver, request, {
      source,
      assessor,
      config,
      store,
      now,
    });

    assert.strictEqual(assessor.inputs.length, 3);
    assert.deepStrictEqual(
      result.allPlans.map((c) => [c.id, c.baseId, c.variant, c.totalCalories]),
      [
        [1, 2, 'Variant_1', 280],
        [2, 2, 'Variant_2', 400],
        [3, 2, 'Variant_3', 520],
      ],
    );
    assert.deepStrictEqual(
      result.topPlans.map((c) => c.id),
      [2, 1],
    );
    assert.deepStrictEqual(Object.keys(result.assessments), ['1', '2', '3']);
    assert.strictEqual(result.assessments[1].score, 60);
    assert.strictEqual(result.generatedAt, GENERATED_AT);
    assert.strictEqual(result.persisted, true);
    assert.strictEqual(result.artifactLocation, 'memory://plans.json');

    const [artifact] = store.saved;
    assert.deepStrictEqual(
      artifact.top_plans.map((p) => p.id),
      [2, 1],
    );
    assert.strictEqual(artifact.generated_at, GENERATED_AT);
  });

  it('threads the retrieval context into later calls and assessments', async () => {
    const source = scriptedSource(ok(oatmeal, 'Prefer whole grains'), ok(oatmeal));
    const assessor = calorieAssessor();

    await runPlanPipeline(dietPipelineDriver, request, {
      source,
      assessor,
      config,
      now,
    });

    assert.strictEqual(source.calls[0].retrievalContext, undefined);
    assert.strictEqual(source.calls[1].retrievalContext, 'Prefer whole grains');
    assert.ok(
      assessor.inputs.every((input) => input.retrievalContext === 'Prefer whole grains'),
    );
  });

  it('fetches the retrieval context once even when the first call fails', async () => {
    let fetches = 0;
    const prompts: string[] = [];
    const client: JsonModelClient = {
      async generateJson(args: GenerateJsonArgs) {
        prompts.push(args.prompt);
        if (prompts.length === 1) throw new Error('model offline');
        return JSON.stringify({ items: oatmeal });
      },
    };
    const source = new GeminiDietCandidateSource({
      client,
      retrieval: {
        async fetchContext() {
          fetches++;
          return 'Prefer whole grains';
        },
      },
    });
    const assessor = calorieAssessor();

    const result = await runPlanPipeline(
      dietPipelineDriver,
      { ...request, profile: { ...request.profile, medicalConditions: ['diabetes'] } },
      { source, assessor, config: { ...config, basePlanCount: 3 }, now },
    );

    assert.strictEqual(fetches, 1);
    assert.strictEqual(prompts.length, 3);
    assert.ok(prompts.every((prompt) => prompt.includes('Prefer whole grains')));
    assert.deepStrictEqual(
      [...new Set(result.allPlans.map((c) => c.baseId))],
      [2, 3],
    );
    assert.ok(
      assessor.inputs.every((input) => input.retrievalContext === 'Prefer whole grains'),
    );
  });

  it('continues without context when preparing it fails', async () => {
    const source = scriptedSource(ok(oatmeal), ok(oatmeal));
    const assessor = calorieAssessor();

    const result = await runPlanPipeline(dietPipelineDriver, request, {
      source: {
        prepareContext: async () => {
          throw new Error('lookup offline');
        },
        generate: (req, call) => source.generate(req, call),
      },
      assessor,
      config,
      now,
    });

    assert.deepStrictEqual(
      source.calls.map((call) => call.retrievalContext),
      ['', ''],
    );
    assert.strictEqual(result.allPlans.length, 6);
    assert.ok(assessor.inputs.every((input) => input.retrievalContext === undefined));
  });

  it('treats a timed-out generation as a failure and aborts it', async () => {
    let aborted = false;
    const hang: Step = (call) =>
      new Promise((_resolve, reject) => {
        call.signal.addEventListener('abort', () => {
          aborted = true;
          reject(new Error('aborted'));
        });
      });
    const source = scriptedSource(hang, ok(oatmeal));

    const result = await runPlanPipeline(dietPipelineDriver, request, {
      source,
      assessor: calorieAssessor(),
      config,
      now,
    });

    assert.strictEqual(aborted, true);
    assert.strictEqual(result.allPlans.length, 3);
  });

  it('skips null and empty bases', async () => {
    const source = scriptedSource(async () => ({ base: null }), ok([]));
    const store = memoryStore();

    const result = await runPlanPipeline(dietPipelineDriver, request, {
      source,
      assessor: calorieAssessor(),
      config,
      store,
      now,
    });

    assert.deepStrictEqual(result.allPlans, []);
    assert.deepStrictEqual(result.topPlans, []);
    assert.deepStrictEqual(result.assessments, {});
    assert.deepStrictEqual(store.saved, [
      { all_plans: [], top_plans: [], assessments: {}, generated_at: GENERATED_AT },
    ]);
  });

  it('drops a candidate whose assessment throws and keeps the rest', async () => {
    const result = await runPlanPipeline(dietPipelineDriver, request, {
      source: scriptedSource(ok(oatmeal)),
      assessor: calorieAssessor([2]),
      config,
      now,
    });

    assert.deepStrictEqual(
      result.allPlans.map((c) => c.id),
      [1, 3],
    );
  });

  it('reports a failed artifact write instead of throwing', async () => {
    const store: PlanArtifactStore = {
      async save() {
        throw new AppError('PERSISTENCE_FAILED', 'disk full');
      },
    };

    const result = await runPlanPipeline(dietPipelineDriver, request, {
      source: scriptedSource(ok(oatmeal)),
      assessor: calorieAssessor(),
      config,
      store,
      now,
    });

    assert.strictEqual(result.persisted, false);
    assert.strictEqual(result.artifactLocation, undefined);
    assert.strictEqual(result.allPlans.length, 3);
  });

  it('fails before generating when the scale range is invalid', async () => {
    const source = scriptedSource(ok(oatmeal));

    await assert.rejects(
      runPlanPipeline(dietPipelineDriver, request, {
        source,
        assessor: calorieAssessor(),
        config: { ...config, minScale: 1.5, maxScale: 1.2 },
        now,
      }),
      (error: unknown) =>
        error instanceof AppError && error.code === 'PIPELINE_CONFIG_INVALID',
    );
    assert.strictEqual(source.calls.length, 0);
  });

  it('propagates configuration errors raised during generation', async () => {
    await assert.rejects(
      runPlanPipeline(dietPipelineDriver, request, {
        source: scriptedSource(
          fails(new AppError('PIPELINE_CONFIG_INVALID', 'Unknown scoring policy')),
        ),
        assessor: calorieAssessor(),
        config,
        now,
      }),
      (error: unknown) =>
        error instanceof AppError && error.code === 'PIPELINE_CONFIG_INVALID',
    );
  });
});
