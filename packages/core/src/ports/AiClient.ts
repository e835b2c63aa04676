import type { TriviaQuestion } from '../domain/models';

export interface GenerateQuestionsInput {
  category: string;
  count: number;
}

export interface AiClient {
  generateQuestions(input: GenerateQuestionsInput): Promise<TriviaQuestion[]>;
}
