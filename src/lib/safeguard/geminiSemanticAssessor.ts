/**
 * Semantic assessor backed by Gemini structured output.
 *
 * Returns the raw model JSON; validation happens in the assessor so a bad
 * answer degrades to "no signals" instead of failing the assessment.
 */

import { zodToJsonSchema } from 'zod-to-json-schema';
import {
  getGeminiClient,
  type JsonModelClient,
} from '@/src/lib/ai/gemini/gemini.client';
import { AppError } from '@/src/lib/errors/app-error';
import { buildSemanticAssessmentPrompt } from './safeguard.prompts';
import type { AssessmentInput, SemanticAssessor } from './safeguard.types';
import { semanticAssessmentResponseSchema } from './semanticAssessment';

export class GeminiSemanticAssessor implements SemanticAssessor {
  constructor(
    private readonly client: JsonModelClient = getGeminiClient(),
    private readonly temperature = 0.3,
  ) {}

  async assess(input: AssessmentInput, signal: AbortSignal): Promise<unknown> {
    const jsonSchema = zodToJsonSchema(semanticAssessmentResponseSchema, {
      name: 'SafetyAssessment',
      target: 'openApi3',
    });

    try {
      return await this.client.generateJson({
        prompt: buildSemanticAssessmentPrompt(input),
        jsonSchema,
        temperature: this.temperature,
        purpose: 'assess',
        abortSignal: signal,
      });
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new AppError(
        'ASSESSMENT_SOURCE_FAILED',
        'Semantic assessment call failed',
        error,
      );
    }
  }
}
