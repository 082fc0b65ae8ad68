/**
 * Gemini Exercise Candidate Source
 *
 * Produces one base exercise plan per call, cycling through the strategies
 * for the user's goal.
 */

import { zodToJsonSchema } from 'zod-to-json-schema';
import {
  getGeminiClient,
  type JsonModelClient,
} from '@/src/lib/ai/gemini/gemini.client';
import { parseModelJson } from '@/src/lib/ai/gemini/modelJson';
import { AppError } from '@/src/lib/errors/app-error';
import type { ExercisePlan } from '@/src/lib/plans/plans.types';
import { buildExerciseGenerationPrompt } from './planGenerator.prompts';
import { exerciseGenerationResponseSchema } from './planGenerator.schemas';
import type {
  CandidateSourceResult,
  ExerciseCandidateSource,
  ExerciseGenerationRequest,
  GenerationCall,
  RetrievalContextProvider,
} from './planGenerator.types';
import { resolveRetrievalContext } from './retrievalContext';

export type GeminiExerciseCandidateSourceOptions = {
  client?: JsonModelClient;
  retrieval?: RetrievalContextProvider;
  temperature?: number;
};

/**
 * Validate model output as an exercise plan. A list answer uses its first
 * element; a missing id becomes `fallbackId`.
 */
export function parseExerciseGenerationOutput(
  raw: string,
  fallbackId: number,
): ExercisePlan | null {
  if (!raw.trim()) {
    console.warn(
      `[ExerciseCandidateSource] Model returned an empty response for candidate ${fallbackId}`,
    );
    return null;
  }

  const data = parseModelJson(raw);
  if (data === undefined) return null;

  const candidate: unknown = Array.isArray(data) ? data[0] : data;
  const parsed = exerciseGenerationResponseSchema.safeParse(candidate);
  if (!parsed.success) {
    console.warn(
      '[ExerciseCandidateSource] Output does not match the plan schema:',
      parsed.error.issues
        .slice(0, 3)
        .map((i) => `${i.path.join('.')}: ${i.message}`)
        .join('; '),
    );
    return null;
  }

  const { id, ...plan } = parsed.data;
  return { ...plan, id: id ?? fallbackId };
}

export class GeminiExerciseCandidateSource implements ExerciseCandidateSource {
  private readonly client: JsonModelClient;
  private readonly retrieval?: RetrievalContextProvider;
  private readonly temperature: number;

  constructor(options: GeminiExerciseCandidateSourceOptions = {}) {
    this.client = options.client ?? getGeminiClient();
    this.retrieval = options.retrieval;
    this.temperature = options.temperature ?? 0.7;
  }

  prepareContext(request: ExerciseGenerationRequest): Promise<string> {
    return resolveRetrievalContext(
      this.retrieval,
      'exercise',
      request.profile,
      undefined,
    );
  }

  async generate(
    request: ExerciseGenerationRequest,
    call: GenerationCall,
  ): Promise<CandidateSourceResult<ExercisePlan>> {
    const retrievalContext = await resolveRetrievalContext(
      this.retrieval,
      'exercise',
      request.profile,
      call.retrievalContext,
    );

    const jsonSchema = zodToJsonSchema(exerciseGenerationResponseSchema, {
      name: 'ExerciseBasePlan',
      target: 'openApi3',
    });

    let raw: string;
    try {
      raw = await this.client.generateJson({
        prompt: buildExerciseGenerationPrompt(request, call.attempt, retrievalContext),
        jsonSchema,
        temperature: this.temperature,
        purpose: 'generate',
        abortSignal: call.signal,
      });
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new AppError(
        'GENERATION_FAILED',
        'Exercise base plan generation failed',
        error,
      );
    }

    return {
      base: parseExerciseGenerationOutput(raw, call.attempt + 1),
      retrievalContext,
    };
  }
}
