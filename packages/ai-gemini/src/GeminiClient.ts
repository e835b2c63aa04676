import OpenAI from 'openai';
import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import {
  MalformedUpstreamResponseError,
  normalizeQuestion,
  type AiClient,
  type GenerateQuestionsInput,
  type TriviaQuestion
} from '@trivia-quest/core';
import { parseQuestionBatch } from './parse';
import { buildQuestionPrompt } from './prompt';
import { QuestionBatchSchema } from './schema';

export const GEMINI_OPENAI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/openai/';
export const DEFAULT_GEMINI_MODEL = 'gemini-2.5-flash';

export interface GeminiClientLogger {
  debug(message: string, context?: Record<string, unknown>): void;
}

export interface GeminiClientConfig {
  apiKey?: string;
  client?: OpenAI;
  model?: string;
  baseUrl?: string;
  temperature?: number;
  timeoutMs?: number;
  logger?: GeminiClientLogger;
}

/**
 * Talks to Gemini through its OpenAI-compatible Chat Completions endpoint.
 * The SDK's built-in retries are switched off; see RetryingAiClient.
 */
export class GeminiClient implements AiClient {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly temperature: number;
  private readonly logger?: GeminiClientLogger;

  constructor(config: GeminiClientConfig = {}) {
    if (!config.client && !config.apiKey) {
      throw new Error('GEMINI_API_KEY is required to instantiate GeminiClient');
    }

    this.client =
      config.client ??
      new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseUrl ?? GEMINI_OPENAI_BASE_URL,
        timeout: config.timeoutMs,
        maxRetries: 0
      });
    this.model = config.model ?? DEFAULT_GEMINI_MODEL;
    this.temperature = config.temperature ?? 0.7;
    this.logger = config.logger;
  }

  async generateQuestions(input: GenerateQuestionsInput): Promise<TriviaQuestion[]> {
    const payload: ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      temperature: this.temperature,
      messages: buildQuestionPrompt(input),
      response_format: {
        type: 'json_schema',
        json_schema: {
          name: QuestionBatchSchema.name,
          schema: QuestionBatchSchema.schema,
          strict: QuestionBatchSchema.strict
        }
      }
    };

    const completion = await this.client.chat.completions.create(payload);
    this.logger?.debug('Gemini completion received', {
      responseId: completion.id,
      model: completion.model,
      finishReason: completion.choices[0]?.finish_reason
    });

    return parseQuestionBatch(this.extractText(completion)).map(normalizeQuestion);
  }

  private extractText(completion: ChatCompletion): string {
    const [choice] = completion.choices;
    const message = choice?.message;
    if (message?.refusal) {
      throw new MalformedUpstreamResponseError(`Gemini refused to answer: ${message.refusal}`);
    }
    if (!message?.content) {
      throw new MalformedUpstreamResponseError('Gemini response missing message content');
    }
    return message.content;
  }
}

/** Client errors other than timeouts, conflicts and rate limits won't improve on retry. */
export function isRetryableGeminiError(error: unknown): boolean {
  if (error instanceof OpenAI.APIError && typeof error.status === 'number') {
    const status = error.status;
    if (status >= 400 && status < 500) {
      return status === 408 || status === 409 || status === 429;
    }
  }
  return true;
}
