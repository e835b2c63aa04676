import { describe, expect, it, vi } from 'vitest';
import { UpstreamError, type AiClient, type TriviaQuestion } from '@trivia-quest/core';
import { RetryingAiClient } from '@trivia-quest/ai-gemini';

const question: TriviaQuestion = {
  question: 'What planet is known as the Red Planet?',
  options: ['Earth', 'Mars', 'Jupiter', 'Venus'],
  correctAnswer: 'Mars'
};

const input = { category: 'Science', count: 1 };

describe('RetryingAiClient', () => {
  it('returns the first successful attempt', async () => {
    const generateQuestions = vi
      .fn<Parameters<AiClient['generateQuestions']>, ReturnType<AiClient['generateQuestions']>>()
      .mockRejectedValueOnce(new Error('timeout'))
      .mockRejectedValueOnce(new Error('bad json'))
      .mockResolvedValueOnce([question]);
    const onRetry = vi.fn();
    const client = new RetryingAiClient({ generateQuestions }, { delayMs: 0, onRetry });

    await expect(client.generateQuestions(input)).resolves.toEqual([question]);
    expect(generateQuestions).toHaveBeenCalledTimes(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenNthCalledWith(1, 1, new Error('timeout'));
  });

  it('gives up after maxAttempts and keeps the last error as cause', async () => {
    const last = new Error('still failing');
    const generateQuestions = vi
      .fn<Parameters<AiClient['generateQuestions']>, ReturnType<AiClient['generateQuestions']>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(last);
    const warn = vi.fn();
    const client = new RetryingAiClient(
      { generateQuestions },
      { maxAttempts: 2, delayMs: 0, logger: { warn } }
    );

    const error = await client.generateQuestions(input).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toMatchObject({ message: 'Failed to generate questions after 2 attempt(s)', cause: last });
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenLastCalledWith('Question generation attempt failed', {
      attempt: 2,
      maxAttempts: 2,
      retryable: true,
      category: 'Science',
      error: 'still failing'
    });
  });

  it('stops at once on an error that is not retryable', async () => {
    const generateQuestions = vi
      .fn<Parameters<AiClient['generateQuestions']>, ReturnType<AiClient['generateQuestions']>>()
      .mockRejectedValue(new Error('API key not valid'));
    const client = new RetryingAiClient(
      { generateQuestions },
      { delayMs: 0, isRetryable: () => false }
    );

    await expect(client.generateQuestions(input)).rejects.toThrow(
      'Failed to generate questions after 1 attempt(s)'
    );
    expect(generateQuestions).toHaveBeenCalledTimes(1);
  });

  it('waits between attempts', async () => {
    vi.useFakeTimers();
    try {
      const generateQuestions = vi
        .fn<Parameters<AiClient['generateQuestions']>, ReturnType<AiClient['generateQuestions']>>()
        .mockRejectedValueOnce(new Error('timeout'))
        .mockResolvedValueOnce([question]);
      const client = new RetryingAiClient({ generateQuestions }, { delayMs: 1000 });

      const pending = client.generateQuestions(input);
      await vi.advanceTimersByTimeAsync(999);
      expect(generateQuestions).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      await expect(pending).resolves.toEqual([question]);
      expect(generateQuestions).toHaveBeenCalledTimes(2);
    } finally {
      vi.useRealTimers();
    }
  });
});
