import type { z, ZodTypeAny } from 'zod';
import { InvalidRequestError, UpstreamError } from '../domain/errors';
import {
  QuestionBatchRequestSchema,
  QuestionRequestSchema,
  toQuestionResponse,
  type QuestionBatchResponse,
  type QuestionResponse,
  type TriviaQuestion
} from '../domain/models';
import { assertValidQuestion } from '../domain/question';
import type { AiClient, GenerateQuestionsInput } from '../ports/AiClient';

export interface QuestionServiceLogger {
  debug(message: string, context?: Record<string, unknown>): void;
}

export class QuestionService {
  constructor(
    private readonly ai: AiClient,
    private readonly logger?: QuestionServiceLogger
  ) {}

  async getQuestion(body: unknown): Promise<QuestionResponse> {
    const { category } = parseRequest(QuestionRequestSchema, body);
    const [first] = await this.generate({ category, count: 1 });
    return toQuestionResponse(first);
  }

  async getQuestions(body: unknown): Promise<QuestionBatchResponse> {
    const { category, count } = parseRequest(QuestionBatchRequestSchema, body);
    const questions = await this.generate({ category, count });
    return { questions: questions.slice(0, count).map(toQuestionResponse) };
  }

  private async generate(input: GenerateQuestionsInput): Promise<TriviaQuestion[]> {
    let questions: TriviaQuestion[];
    try {
      questions = await this.ai.generateQuestions(input);
    } catch (error) {
      if (error instanceof UpstreamError) {
        throw error;
      }
      throw new UpstreamError('Failed to generate a question', { cause: error });
    }

    if (questions.length === 0) {
      throw new UpstreamError('Upstream returned no questions');
    }
    questions.forEach(assertValidQuestion);

    this.logger?.debug('Generated trivia questions', {
      category: input.category,
      requested: input.count,
      received: questions.length
    });
    return questions;
  }
}

function parseRequest<S extends ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const parsed = schema.safeParse(body);
  if (parsed.success) {
    return parsed.data;
  }

  const [issue] = parsed.error.issues;
  const field = issue?.path.length ? issue.path.join('.') : undefined;
  throw new InvalidRequestError(issue?.message ?? 'Invalid request', field);
}
