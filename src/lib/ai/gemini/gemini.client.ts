/**
 * Gemini Client - Wrapper for Google Gemini API
 *
 * All models are configured via .env.local. No model names are hardcoded in call sites.
 *
 * Environment variables (all optional except GEMINI_API_KEY):
 *   GEMINI_API_KEY           - Required. API key from https://aistudio.google.com/app/apikey
 *   GEMINI_MODEL             - Default model for all purposes (fallback when purpose-specific is unset)
 *   GEMINI_MODEL_GENERATE    - Base plan generation (diet items, exercise plans)
 *   GEMINI_MODEL_ASSESS      - Semantic safety assessment
 *   GEMINI_MAX_OUTPUT_TOKENS - Max tokens per response (default 2048)
 *
 * Example .env.local:
 *   GEMINI_API_KEY=your-key
 *   GEMINI_MODEL=gemini-2.0-flash
 *   GEMINI_MODEL_ASSESS=gemini-2.0-flash
 */

import { GoogleGenAI } from '@google/genai';
import { AppError } from '@/src/lib/errors/app-error';

/**
 * Model selection policy (each maps to an env var)
 */
export type ModelPurpose = 'generate' | 'assess';

export type GenerateJsonArgs = {
  prompt: string;
  jsonSchema: object;
  /** Temperature for generation (0.0-1.0, default: 0.4) */
  temperature?: number;
  purpose?: ModelPurpose;
  /** Override max output tokens (default from env) */
  maxOutputTokens?: number;
  /** Aborts the request (e.g. on a pipeline timeout) */
  abortSignal?: AbortSignal;
};

/**
 * JSON generation capability. Candidate sources and the semantic assessor
 * depend on this instead of the concrete client.
 */
export interface JsonModelClient {
  generateJson(args: GenerateJsonArgs): Promise<string>;
}

const MAX_RETRIES = 3;
const BASE_DELAY_MS = 2000;

function isRateLimitMessage(message: string): boolean {
  return (
    message.includes('429') ||
    message.includes('RESOURCE_EXHAUSTED') ||
    message.includes('quota') ||
    message.includes('rate limit') ||
    message.includes('RPM')
  );
}

export class GeminiClient implements JsonModelClient {
  private ai: GoogleGenAI;
  private model: string;
  private maxOutputTokens: number;

  constructor() {
    const apiKey = process.env.GEMINI_API_KEY;
    if (!apiKey) {
      throw new AppError(
        'AGENT_ERROR',
        'GEMINI_API_KEY environment variable is required. ' +
          'Please set it in your .env.local file.',
      );
    }

    this.ai = new GoogleGenAI({ apiKey });
    this.model = process.env.GEMINI_MODEL ?? 'gemini-2.0-flash';
    this.maxOutputTokens = parseInt(
      process.env.GEMINI_MAX_OUTPUT_TOKENS ?? '2048',
      10,
    );
  }

  /**
   * Get model name for a purpose. Uses env: GEMINI_MODEL_<PURPOSE> or GEMINI_MODEL.
   */
  getModelName(purpose: ModelPurpose = 'generate'): string {
    switch (purpose) {
      case 'generate':
        return process.env.GEMINI_MODEL_GENERATE ?? this.model;
      case 'assess':
        return process.env.GEMINI_MODEL_ASSESS ?? this.model;
      default:
        return this.model;
    }
  }

  /**
   * Generate JSON content from a prompt with schema validation
   *
   * Rate-limited calls are retried with exponential backoff (2s, 4s, 8s).
   *
   * @returns Raw JSON string from the model
   *
   * @example
   * ```ts
   * const json = await getGeminiClient().generateJson({
   *   prompt: 'Generate a lunch for a 35 year old beginner',
   *   jsonSchema: getDietCandidateJsonSchemaForGemini(),
   *   purpose: 'generate',
   * });
   * ```
   */
  async generateJson(args: GenerateJsonArgs): Promise<string> {
    const {
      prompt,
      jsonSchema,
      temperature = 0.4,
      purpose = 'generate',
      maxOutputTokens: maxTokensOverride,
      abortSignal,
    } = args;

    const modelName = this.getModelName(purpose);
    const maxTokens = maxTokensOverride ?? this.maxOutputTokens;
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= MAX_RETRIES; attempt++) {
      try {
        const response = await this.ai.models.generateContent({
          model: modelName,
          contents: prompt,
          config: {
            responseMimeType: 'application/json',
            responseJsonSchema: jsonSchema,
            temperature,
            maxOutputTokens: maxTokens,
            abortSignal,
          },
        });

        const text = response.text;
        if (!text) {
          throw new Error('Empty response from Gemini API');
        }

        return text;
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        const errorMessage = lastError.message;
        const isRateLimit = isRateLimitMessage(errorMessage);

        if (isRateLimit && attempt < MAX_RETRIES && !abortSignal?.aborted) {
          const delayMs = BASE_DELAY_MS * Math.pow(2, attempt);
          console.warn(
            `[GeminiClient] generateJson rate limit (attempt ${attempt + 1}/${MAX_RETRIES + 1}), retrying in ${delayMs}ms...`,
          );
          await new Promise((resolve) => setTimeout(resolve, delayMs));
          continue;
        }

        if (!isRateLimit) {
          console.error('[GeminiClient] generateJson error:', errorMessage);
          throw new AppError(
            'AGENT_ERROR',
            `Gemini API error: ${errorMessage}. ` +
              'Check your API key and model configuration.',
            lastError,
          );
        }

        const retryMatch =
          errorMessage.match(/retry.*?(\d+)\s*s/i) ||
          errorMessage.match(/(\d+)\s*second/i);
        const retrySeconds = retryMatch ? parseInt(retryMatch[1], 10) : null;
        const retryInfo = retrySeconds
          ? ` Please retry in ${retrySeconds} seconds.`
          : ' Please wait a moment and try again.';

        throw new AppError(
          'RATE_LIMIT',
          `Gemini API quota exceeded (rate limit).${retryInfo}`,
          lastError,
        );
      }
    }

    throw lastError || new Error('Unknown error from Gemini API');
  }
}

let clientInstance: GeminiClient | null = null;

/**
 * Get or create the Gemini client instance
 *
 * @returns Singleton GeminiClient instance
 */
export function getGeminiClient(): GeminiClient {
  if (!clientInstance) {
    clientInstance = new GeminiClient();
  }
  return clientInstance;
}
