import { z } from 'zod';

export const MAX_BATCH_SIZE = 10;

export const QuestionRequestSchema = z.object(
  {
    category: z
      .string({
        required_error: 'category is required',
        invalid_type_error: 'category must be a string'
      })
      .trim()
      .min(1, 'category must not be empty')
  },
  {
    required_error: 'Request body must be a JSON object',
    invalid_type_error: 'Request body must be a JSON object'
  }
);

export type QuestionRequest = z.infer<typeof QuestionRequestSchema>;

export const QuestionBatchRequestSchema = QuestionRequestSchema.extend({
  count: z
    .number({ invalid_type_error: 'count must be a number' })
    .int('count must be an integer')
    .min(1, 'count must be at least 1')
    .max(MAX_BATCH_SIZE, `count must be at most ${MAX_BATCH_SIZE}`)
    .default(MAX_BATCH_SIZE)
});

export type QuestionBatchRequest = z.infer<typeof QuestionBatchRequestSchema>;

/** Question as produced by an upstream generator, before normalization. */
export interface RawQuestion {
  question: string;
  options: string[];
  correctAnswer: string;
}

/** A question whose correctAnswer is exactly one of its options. */
export interface TriviaQuestion {
  question: string;
  options: string[];
  correctAnswer: string;
}

export interface QuestionResponse {
  question: string;
  options: string[];
  correct_answer: string;
}

export interface QuestionBatchResponse {
  questions: QuestionResponse[];
}

export function toQuestionResponse(question: TriviaQuestion): QuestionResponse {
  return {
    question: question.question,
    options: [...question.options],
    correct_answer: question.correctAnswer
  };
}
