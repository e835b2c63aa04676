import { createHash } from 'node:crypto';
import type { AiClient, GenerateQuestionsInput, TriviaQuestion } from '@trivia-quest/core';

interface MockTopic {
  subject: string;
  correct: string;
  distractors: [string, string, string];
}

const TOPICS: MockTopic[] = [
  {
    subject: 'the capital city of France',
    correct: 'Paris',
    distractors: ['Lyon', 'Marseille', 'Nice']
  },
  {
    subject: 'the chemical symbol for water',
    correct: 'H2O',
    distractors: ['CO2', 'O2', 'NaCl']
  },
  {
    subject: 'the largest planet in our solar system',
    correct: 'Jupiter',
    distractors: ['Saturn', 'Earth', 'Neptune']
  },
  {
    subject: 'the painter of the Mona Lisa',
    correct: 'Leonardo da Vinci',
    distractors: ['Michelangelo', 'Raphael', 'Vincent van Gogh']
  },
  {
    subject: 'the process by which plants make food using sunlight',
    correct: 'Photosynthesis',
    distractors: ['Transpiration', 'Respiration', 'Germination']
  },
  {
    subject: 'the longest river in South America',
    correct: 'Amazon',
    distractors: ['Orinoco', 'Paraná', 'Magdalena']
  },
  {
    subject: 'the author of "Pride and Prejudice"',
    correct: 'Jane Austen',
    distractors: ['Charlotte Brontë', 'Mary Shelley', 'George Eliot']
  },
  {
    subject: 'the hardest natural mineral',
    correct: 'Diamond',
    distractors: ['Quartz', 'Topaz', 'Corundum']
  },
  {
    subject: 'the number of players per side on a football pitch',
    correct: '11',
    distractors: ['9', '10', '12']
  },
  {
    subject: 'the smallest prime number',
    correct: '2',
    distractors: ['1', '3', '5']
  }
];

export interface GeminiMockClientOptions {
  seed?: string;
}

/**
 * Deterministic stand-in for GeminiClient: same category, count and seed give the same questions.
 * Topics are drawn without repeats, so a batch only repeats once it outgrows the topic list.
 */
export class GeminiMockClient implements AiClient {
  private readonly seed: string;

  constructor(options: GeminiMockClientOptions = {}) {
    this.seed = options.seed ?? 'trivia-quest';
  }

  async generateQuestions(input: GenerateQuestionsInput): Promise<TriviaQuestion[]> {
    const order = this.topicOrder(input.category);
    return Array.from({ length: input.count }, (_, index) =>
      this.buildQuestion(input.category, index, TOPICS[order[index % order.length]])
    );
  }

  private topicOrder(category: string): number[] {
    const rank = TOPICS.map((_, index) => this.hash(`${category}:topic:${index}`));
    return TOPICS.map((_, index) => index).sort((a, b) => rank[a].localeCompare(rank[b]));
  }

  private buildQuestion(category: string, index: number, topic: MockTopic): TriviaQuestion {
    const correctIndex = parseInt(this.hash(`${category}:${index}`).slice(0, 2), 16) % 4;

    const options = [...topic.distractors];
    options.splice(correctIndex, 0, topic.correct);

    return {
      question: `[MOCK] In the category of ${category}, what is ${topic.subject}?`,
      options,
      correctAnswer: topic.correct
    };
  }

  private hash(value: string): string {
    return createHash('sha256').update(`${value}:${this.seed}`).digest('hex');
  }
}
