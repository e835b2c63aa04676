import {
  UpstreamError,
  type AiClient,
  type GenerateQuestionsInput,
  type TriviaQuestion
} from '@trivia-quest/core';

export interface RetryLogger {
  warn(message: string, context?: Record<string, unknown>): void;
}

export interface RetryingAiClientOptions {
  maxAttempts?: number;
  delayMs?: number;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown) => void;
  logger?: RetryLogger;
}

export class RetryingAiClient implements AiClient {
  private readonly maxAttempts: number;
  private readonly delayMs: number;
  private readonly isRetryable: (error: unknown) => boolean;

  constructor(
    private readonly inner: AiClient,
    private readonly options: RetryingAiClientOptions = {}
  ) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.delayMs = Math.max(0, options.delayMs ?? 1000);
    this.isRetryable = options.isRetryable ?? (() => true);
  }

  async generateQuestions(input: GenerateQuestionsInput): Promise<TriviaQuestion[]> {
    let lastError: unknown;
    let attempts = 0;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      attempts = attempt;
      try {
        return await this.inner.generateQuestions(input);
      } catch (error) {
        lastError = error;
        const retryable = this.isRetryable(error);
        this.options.logger?.warn('Question generation attempt failed', {
          attempt,
          maxAttempts: this.maxAttempts,
          retryable,
          category: input.category,
          error: error instanceof Error ? error.message : String(error)
        });
        if (!retryable || attempt === this.maxAttempts) {
          break;
        }
        this.options.onRetry?.(attempt, error);
        if (this.delayMs > 0) {
          await sleep(this.delayMs);
        }
      }
    }

    throw new UpstreamError(
      `Failed to generate questions after ${attempts} attempt(s)`,
      { cause: lastError }
    );
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
