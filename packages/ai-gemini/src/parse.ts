import { z } from 'zod';
import { MalformedUpstreamResponseError, type RawQuestion } from '@trivia-quest/core';

const FENCE_PATTERN = /```(?:json)?\s*\n?([\s\S]*?)\n?\s*```/;

const RawQuestionSchema = z
  .object({
    question: z.string(),
    options: z.array(z.string()).length(4),
    correctAnswer: z.string().optional(),
    correct_answer: z.string().optional()
  })
  .passthrough()
  .transform((value, ctx): RawQuestion => {
    const correctAnswer = value.correctAnswer ?? value.correct_answer;
    if (correctAnswer === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'correctAnswer is required' });
      return z.NEVER;
    }
    return { question: value.question, options: value.options, correctAnswer };
  });

const QuestionBatchSchema = z.union([
  z.array(RawQuestionSchema),
  z.object({ questions: z.array(RawQuestionSchema) }).transform(value => value.questions)
]);

export function stripCodeFence(text: string): string {
  const match = FENCE_PATTERN.exec(text);
  return (match ? match[1] : text).trim();
}

/**
 * Reads a batch of questions out of model output. Accepts a bare array or an
 * object with a `questions` array, optionally wrapped in a Markdown fence.
 * A single invalid item rejects the whole batch.
 */
export function parseQuestionBatch(text: string): RawQuestion[] {
  const body = stripCodeFence(text);
  if (!body) {
    throw new MalformedUpstreamResponseError('Upstream response is empty');
  }

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new MalformedUpstreamResponseError('Upstream response is not valid JSON', { cause: error });
  }

  const parsed = QuestionBatchSchema.safeParse(json);
  if (!parsed.success) {
    throw new MalformedUpstreamResponseError(
      `Upstream response has an unexpected shape: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`,
      { cause: parsed.error }
    );
  }

  if (parsed.data.length === 0) {
    throw new MalformedUpstreamResponseError('Upstream response contains no questions');
  }
  return parsed.data;
}
