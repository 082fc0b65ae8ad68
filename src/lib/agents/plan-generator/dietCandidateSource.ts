/**
 * Gemini Diet Candidate Source
 *
 * Produces the base food items for one meal. Empty, non-JSON or
 * schema-invalid output is reported as `base: null`; the pipeline treats
 * that as a failed generation and moves on.
 */

import { zodToJsonSchema } from 'zod-to-json-schema';
import {
  getGeminiClient,
  type JsonModelClient,
} from '@/src/lib/ai/gemini/gemini.client';
import { parseModelJson } from '@/src/lib/ai/gemini/modelJson';
import { AppError } from '@/src/lib/errors/app-error';
import type { BaseFoodItem } from '@/src/lib/plans/plans.types';
import { buildDietGenerationPrompt } from './planGenerator.prompts';
import { dietGenerationResponseSchema } from './planGenerator.schemas';
import type {
  CandidateSourceResult,
  DietCandidateSource,
  DietGenerationRequest,
  GenerationCall,
  RetrievalContextProvider,
} from './planGenerator.types';
import { resolveRetrievalContext } from './retrievalContext';

export type GeminiDietCandidateSourceOptions = {
  client?: JsonModelClient;
  retrieval?: RetrievalContextProvider;
  temperature?: number;
};

/**
 * Older generator output is a bare array of items
 */
function toResponseShape(data: unknown): unknown {
  return Array.isArray(data) ? { items: data } : data;
}

export function parseDietGenerationOutput(raw: string): BaseFoodItem[] | null {
  if (!raw.trim()) {
    console.warn('[DietCandidateSource] Model returned an empty response');
    return null;
  }

  const data = parseModelJson(raw);
  if (data === undefined) return null;

  const parsed = dietGenerationResponseSchema.safeParse(toResponseShape(data));
  if (!parsed.success) {
    console.warn(
      '[DietCandidateSource] Output does not match the item schema:',
      parsed.error.issues
        .slice(0, 3)
        .map((i) => `${i.path.join('.')}: ${i.message}`)
        .join('; '),
    );
    return null;
  }
  return parsed.data.items;
}

export class GeminiDietCandidateSource implements DietCandidateSource {
  private readonly client: JsonModelClient;
  private readonly retrieval?: RetrievalContextProvider;
  private readonly temperature: number;

  constructor(options: GeminiDietCandidateSourceOptions = {}) {
    this.client = options.client ?? getGeminiClient();
    this.retrieval = options.retrieval;
    this.temperature = options.temperature ?? 0.7;
  }

  prepareContext(request: DietGenerationRequest): Promise<string> {
    return resolveRetrievalContext(
      this.retrieval,
      'diet',
      request.profile,
      undefined,
    );
  }

  async generate(
    request: DietGenerationRequest,
    call: GenerationCall,
  ): Promise<CandidateSourceResult<BaseFoodItem[]>> {
    const retrievalContext = await resolveRetrievalContext(
      this.retrieval,
      'diet',
      request.profile,
      call.retrievalContext,
    );

    const jsonSchema = zodToJsonSchema(dietGenerationResponseSchema, {
      name: 'DietBasePlan',
      target: 'openApi3',
    });

    let raw: string;
    try {
      raw = await this.client.generateJson({
        prompt: buildDietGenerationPrompt(request, retrievalContext),
        jsonSchema,
        temperature: this.temperature,
        purpose: 'generate',
        abortSignal: call.signal,
      });
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new AppError(
        'GENERATION_FAILED',
        'Diet base plan generation failed',
        error,
      );
    }

    return { base: parseDietGenerationOutput(raw), retrievalContext };
  }
}
