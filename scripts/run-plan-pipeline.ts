#!/usr/bin/env tsx
/**
 * Plan Pipeline Runner
 *
 * Generates base plans with Gemini, expands them into variants, assesses every
 * variant and writes the ranked artifact.
 *
 * Usage:
 *   npm run pipeline:run -- --type diet --meal lunch --input ./request.json
 *   npm run pipeline:run -- --type exercise --input ./request.json --store supabase
 *   npm run pipeline:run -- --type diet --input ./request.json --policy check_gate --out ./out.json
 *   npm run pipeline:run -- --type health --input ./request.json --min-score 70
 *   npm run pipeline:run -- --assess ./plan.json --policy weighted
 *
 * The request file holds { profile, environment?, requirement? }. A health
 * run does both plan types and keeps candidates scoring at least
 * minSafetyScore (--no-filter keeps all). --assess scores one finished plan
 * ({ profile, environment?, plan }) without generating anything.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { config } from 'dotenv';
import { ConditionGuidanceService } from '@/src/lib/agents/plan-generator/conditionGuidance.service';
import { GeminiDietCandidateSource } from '@/src/lib/agents/plan-generator/dietCandidateSource';
import { GeminiExerciseCandidateSource } from '@/src/lib/agents/plan-generator/exerciseCandidateSource';
import type { RetrievalContextProvider } from '@/src/lib/agents/plan-generator/planGenerator.types';
import { AppError, describeError } from '@/src/lib/errors/app-error';
import {
  mealTypeSchema,
  planRequestInputSchema,
  planTypeSchema,
} from '@/src/lib/plans/plans.schemas';
import type { MealType, PlanType } from '@/src/lib/plans/plans.types';
import { runDietPipeline } from '@/src/lib/pipeline/dietPipeline';
import { runExercisePipeline } from '@/src/lib/pipeline/exercisePipeline';
import {
  runHealthPipeline,
  type HealthPipelineResult,
} from '@/src/lib/pipeline/healthPipeline';
import {
  FilePlanArtifactStore,
  SupabasePlanArtifactStore,
  type PlanArtifactStore,
} from '@/src/lib/pipeline/planArtifact.store';
import {
  resolvePlanPipelineConfig,
  type PlanPipelineConfig,
} from '@/src/lib/pipeline/planPipeline.config';
import type {
  PlanCandidate,
  PlanPipelineResult,
} from '@/src/lib/pipeline/planPipeline.types';
import {
  createPlanPipelineRunLogger,
  type PlanPipelineRunLogger,
} from '@/src/lib/pipeline/planPipelineRunLogger';
import { parseAssessmentInput } from '@/src/lib/safeguard/assessmentInput';
import { GeminiSemanticAssessor } from '@/src/lib/safeguard/geminiSemanticAssessor';
import { getSafeguardRules } from '@/src/lib/safeguard/safeguard.config';
import {
  SafeguardAssessor,
  toAssessmentRecord,
} from '@/src/lib/safeguard/safeguardAssessor.service';
import type { SafetyAssessment } from '@/src/lib/safeguard/safeguard.types';
import { createScoringPolicy } from '@/src/lib/safeguard/scoringPolicies';

config({ path: path.join(process.cwd(), '.env.local') });

type CliArgs = {
  type?: string;
  input?: string;
  assess?: string;
  minScore?: string;
  filter: boolean;
  meal: string;
  out?: string;
  store: string;
  policy?: string;
  semantic: boolean;
};

function parseArgs(): CliArgs {
  const args = process.argv.slice(2);
  const parsed: CliArgs = {
    meal: 'breakfast',
    store: 'file',
    semantic: true,
    filter: true,
  };

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--type' && args[i + 1]) {
      parsed.type = args[++i];
    } else if (args[i] === '--input' && args[i + 1]) {
      parsed.input = args[++i];
    } else if (args[i] === '--meal' && args[i + 1]) {
      parsed.meal = args[++i];
    } else if (args[i] === '--out' && args[i + 1]) {
      parsed.out = args[++i];
    } else if (args[i] === '--store' && args[i + 1]) {
      parsed.store = args[++i];
    } else if (args[i] === '--policy' && args[i + 1]) {
      parsed.policy = args[++i];
    } else if (args[i] === '--assess' && args[i + 1]) {
      parsed.assess = args[++i];
    } else if (args[i] === '--min-score' && args[i + 1]) {
      parsed.minScore = args[++i];
    } else if (args[i] === '--no-filter') {
      parsed.filter = false;
    } else if (args[i] === '--no-semantic') {
      parsed.semantic = false;
    }
  }
  return parsed;
}

function usage(): never {
  console.error('Usage:');
  console.error(
    '  npm run pipeline:run -- --type diet|exercise|health --input <request.json> [--meal breakfast|lunch|dinner|snacks]',
  );
  console.error(
    '                          [--out <file>] [--store file|supabase] [--policy weighted|risk_factor_gate|check_gate] [--no-semantic]',
  );
  console.error(
    '                          [--min-score <0-100>] [--no-filter]   (health only)',
  );
  console.error(
    '  npm run pipeline:run -- --assess <plan.json> [--policy ...] [--no-semantic]',
  );
  process.exit(1);
}

function hasSupabaseEnv(): boolean {
  return Boolean(
    process.env.SUPABASE_URL && process.env.SUPABASE_SERVICE_ROLE_KEY,
  );
}

function readJsonFile(file: string): unknown {
  const resolvedPath = path.isAbsolute(file)
    ? file
    : path.resolve(process.cwd(), file);
  if (!fs.existsSync(resolvedPath)) {
    console.error('File not found:', resolvedPath);
    process.exit(1);
  }
  try {
    return JSON.parse(fs.readFileSync(resolvedPath, 'utf-8'));
  } catch (error) {
    throw new AppError('VALIDATION_ERROR', `${file} is not valid JSON`, error);
  }
}

function readRequestFile(file: string) {
  const parsed = planRequestInputSchema.safeParse(readJsonFile(file));
  if (!parsed.success) {
    throw new AppError('VALIDATION_ERROR', 'Invalid request file', {
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    });
  }
  return parsed.data;
}

function parseMinScore(raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 100) {
    throw new AppError('VALIDATION_ERROR', '--min-score must be between 0 and 100', {
      minScore: raw,
    });
  }
  return value;
}

function createStore(
  kind: string,
  planType: PlanType,
  pipelineConfig: PlanPipelineConfig,
  out?: string,
): PlanArtifactStore {
  if (kind === 'supabase') return new SupabasePlanArtifactStore();
  if (kind !== 'file') {
    console.error(`Unknown store "${kind}" (expected file or supabase)`);
    process.exit(1);
  }
  return new FilePlanArtifactStore(out ?? pipelineConfig.outputPaths[planType]);
}

function createAssessor(
  pipelineConfig: PlanPipelineConfig,
  semantic: boolean,
): SafeguardAssessor {
  const useSemantic = semantic && pipelineConfig.enableSemanticAssessment;
  return new SafeguardAssessor({
    policy: createScoringPolicy(pipelineConfig.scoringPolicy),
    rules: getSafeguardRules(),
    enableRuleChecks: pipelineConfig.enableRuleChecks,
    assessmentTimeoutMs: pipelineConfig.assessmentTimeoutMs,
    semanticAssessor: useSemantic ? new GeminiSemanticAssessor() : undefined,
  });
}

function printAssessment(assessment: SafetyAssessment): void {
  console.log(`\nScore: ${assessment.score}/100 [${assessment.status}]`);
  console.log(`Is safe: ${assessment.isSafe}`);
  console.log(`Risk level: ${assessment.riskLevel}`);
  if (assessment.riskFactors.length > 0) {
    console.log('\nRisk factors:');
    for (const rf of assessment.riskFactors) {
      console.log(`  - ${rf.factor}: ${rf.description}`);
    }
  }
  for (const recommendation of assessment.recommendations) {
    console.log(`  💡 ${recommendation}`);
  }
}

function printHealthResult(result: HealthPipelineResult): void {
  const { combinedAssessment } = result;
  for (const part of [result.diet, result.exercise]) {
    if (part) printResult(part);
  }
  console.log('\n' + '='.repeat(50));
  console.log(
    `🩺 Combined: ${combinedAssessment.overallScore}/100 over ${combinedAssessment.totalAssessed} candidates, ${
      combinedAssessment.isSafe ? 'safe' : 'not safe'
    } (${combinedAssessment.riskLevel} risk)`,
  );
  for (const recommendation of combinedAssessment.recommendations) {
    console.log(`   💡 ${recommendation}`);
  }
  console.log('='.repeat(50));
}

function printResult(result: PlanPipelineResult<PlanCandidate>): void {
  console.log('\n' + '='.repeat(50));
  console.log(
    `📊 ${result.allPlans.length} candidates, top ${result.topPlans.length}:`,
  );
  console.log('='.repeat(50));
  for (const plan of result.topPlans) {
    const { assessment } = plan;
    const detail =
      plan.planType === 'diet'
        ? `${plan.totalCalories} kcal (${plan.caloriesDeviation}% vs target)`
        : `${plan.plan.totalDurationMinutes} min (${plan.durationDeviation}% vs target)`;
    console.log(
      `#${plan.id} ${plan.variant} x${plan.scaleFactor} base ${plan.baseId}: score ${assessment.score} [${assessment.status}] ${detail}`,
    );
    for (const warning of assessment.warnings) {
      console.log(`   ⚠️  ${warning}`);
    }
  }
  console.log('='.repeat(50));
  if (result.persisted) {
    console.log(`✅ Artifact written to ${result.artifactLocation}`);
  } else {
    console.log('⚠️  Artifact was not persisted. Check the logs above.');
  }
}

async function assessOnly(file: string, args: CliArgs): Promise<boolean> {
  const input = parseAssessmentInput(readJsonFile(file));
  const pipelineConfig = resolvePlanPipelineConfig(
    args.policy ? { scoringPolicy: createScoringPolicy(args.policy).name } : {},
  );
  const assessment = await createAssessor(pipelineConfig, args.semantic).assess(
    input,
  );

  console.log(`\n=== Safety Assessment (${input.subject.planType}) ===`);
  printAssessment(assessment);
  if (args.out) {
    fs.mkdirSync(path.dirname(path.resolve(args.out)), { recursive: true });
    fs.writeFileSync(
      args.out,
      JSON.stringify(toAssessmentRecord(assessment), null, 2),
      'utf-8',
    );
    console.log(`✅ Assessment written to ${args.out}`);
  }
  return true;
}

async function main(): Promise<boolean> {
  const args = parseArgs();
  if (args.assess) return assessOnly(args.assess, args);

  const isHealth = args.type === 'health';
  const planType = planTypeSchema.safeParse(args.type);
  if ((!isHealth && !planType.success) || !args.input) usage();
  const meal = mealTypeSchema.safeParse(args.meal);
  if (!meal.success) usage();

  const request = readRequestFile(args.input);
  const pipelineConfig = resolvePlanPipelineConfig(
    args.policy ? { scoringPolicy: createScoringPolicy(args.policy).name } : {},
  );

  const retrieval: RetrievalContextProvider | undefined = hasSupabaseEnv()
    ? new ConditionGuidanceService()
    : undefined;
  const sourceOptions = {
    retrieval,
    temperature: pipelineConfig.generationTemperature,
  };
  const assessor = createAssessor(pipelineConfig, args.semantic);
  const mealType: MealType = meal.data;

  const depsFor = (type: PlanType) => {
    const logger = createPlanPipelineRunLogger({ planType: type });
    return {
      assessor,
      config: pipelineConfig,
      // --out names a single artifact, so a health run uses the configured paths
      store: createStore(args.store, type, pipelineConfig, isHealth ? undefined : args.out),
      logger,
    };
  };

  let persisted: boolean;
  const loggers: PlanPipelineRunLogger[] = [];

  if (isHealth) {
    const dietDeps = depsFor('diet');
    const exerciseDeps = depsFor('exercise');
    loggers.push(dietDeps.logger, exerciseDeps.logger);
    const minScore = args.filter
      ? parseMinScore(args.minScore, pipelineConfig.minSafetyScore)
      : undefined;
    const result = await runHealthPipeline(
      { ...request, mealType },
      {
        diet: { ...dietDeps, source: new GeminiDietCandidateSource(sourceOptions) },
        exercise: {
          ...exerciseDeps,
          source: new GeminiExerciseCandidateSource(sourceOptions),
        },
      },
      { minScore },
    );
    printHealthResult(result);
    persisted = Boolean(result.diet?.persisted && result.exercise?.persisted);
  } else if (planType.success && planType.data === 'diet') {
    const deps = depsFor('diet');
    loggers.push(deps.logger);
    const result = await runDietPipeline(
      { ...request, mealType },
      { ...deps, source: new GeminiDietCandidateSource(sourceOptions) },
    );
    printResult(result);
    persisted = result.persisted;
  } else {
    const deps = depsFor('exercise');
    loggers.push(deps.logger);
    const result = await runExercisePipeline(request, {
      ...deps,
      source: new GeminiExerciseCandidateSource(sourceOptions),
    });
    printResult(result);
    persisted = result.persisted;
  }

  for (const logger of loggers) {
    const { logFileRelativePath } = logger.getDebugMeta();
    if (logFileRelativePath) {
      console.log(`📝 Run log: ${logFileRelativePath}`);
    }
  }
  return persisted;
}

main()
  .then((persisted) => {
    process.exit(persisted ? 0 : 1);
  })
  .catch((error) => {
    console.error('\n💥 Fatal error:', describeError(error));
    const issues = error instanceof AppError ? error.details?.issues : undefined;
    if (Array.isArray(issues)) {
      for (const issue of issues) console.error(`   ${String(issue)}`);
    }
    process.exit(1);
  });
