import { describe, expect, it } from 'vitest';
import { assertValidQuestion } from '@trivia-quest/core';
import { GeminiMockClient } from '@trivia-quest/ai-gemini';

describe('GeminiMockClient', () => {
  it('returns the requested number of well-formed questions', async () => {
    const client = new GeminiMockClient({ seed: 'test-seed' });

    const questions = await client.generateQuestions({ category: 'Science', count: 3 });

    expect(questions).toHaveLength(3);
    for (const question of questions) {
      expect(question.question.startsWith('[MOCK] In the category of Science, what is ')).toBe(true);
      expect(question.options).toHaveLength(4);
      expect(() => assertValidQuestion(question)).not.toThrow();
    }
  });

  it('is deterministic for the same seed and category', async () => {
    const first = await new GeminiMockClient({ seed: 'test-seed' }).generateQuestions({
      category: 'History',
      count: 2
    });
    const second = await new GeminiMockClient({ seed: 'test-seed' }).generateQuestions({
      category: 'History',
      count: 2
    });

    expect(second).toEqual(first);
  });

  it('does not repeat topics within a full batch', async () => {
    const questions = await new GeminiMockClient({ seed: 'test-seed' }).generateQuestions({
      category: 'Geography',
      count: 10
    });

    expect(new Set(questions.map(question => question.question)).size).toBe(10);
    expect(new Set(questions.map(question => question.correctAnswer)).size).toBe(10);
  });
});
