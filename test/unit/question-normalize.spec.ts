import { describe, expect, it } from 'vitest';
import {
  MalformedUpstreamResponseError,
  assertValidQuestion,
  normalizeQuestion
} from '@trivia-quest/core';

describe('normalizeQuestion', () => {
  it('trims text and keeps an exact answer', () => {
    const result = normalizeQuestion({
      question: '  What planet is known as the Red Planet? ',
      options: [' Earth', 'Mars ', 'Jupiter', 'Venus'],
      correctAnswer: ' Mars'
    });

    expect(result).toEqual({
      question: 'What planet is known as the Red Planet?',
      options: ['Earth', 'Mars', 'Jupiter', 'Venus'],
      correctAnswer: 'Mars'
    });
  });

  it('resolves the answer case-insensitively to the option text', () => {
    const result = normalizeQuestion({
      question: 'Which gas do plants absorb?',
      options: ['Oxygen', 'Carbon dioxide', 'Nitrogen', 'Helium'],
      correctAnswer: 'carbon DIOXIDE'
    });

    expect(result.correctAnswer).toBe('Carbon dioxide');
  });

  it('accepts a shortened answer when exactly one option contains it', () => {
    const result = normalizeQuestion({
      question: 'Which planet has the Great Red Spot?',
      options: ['Jupiter (gas giant)', 'Mars', 'Venus', 'Mercury'],
      correctAnswer: 'Jupiter'
    });

    expect(result.correctAnswer).toBe('Jupiter (gas giant)');
  });

  it('rejects an answer that matches several options by containment', () => {
    expect(() =>
      normalizeQuestion({
        question: 'Which one?',
        options: ['Red apple', 'Green apple', 'Banana', 'Cherry'],
        correctAnswer: 'apple'
      })
    ).toThrow('Generated answer "apple" matches several options for "Which one?"');
  });

  it('rejects an answer that is not among the options', () => {
    expect(() =>
      normalizeQuestion({
        question: 'What planet is known as the Red Planet?',
        options: ['Earth', 'Mars', 'Jupiter', 'Venus'],
        correctAnswer: 'Pluto'
      })
    ).toThrow(MalformedUpstreamResponseError);
  });

  it('rejects duplicate options', () => {
    expect(() =>
      normalizeQuestion({
        question: 'Pick one',
        options: ['Mars', 'mars', 'Earth', 'Venus'],
        correctAnswer: 'Earth'
      })
    ).toThrow('Generated options must be distinct for "Pick one"');
  });

  it('rejects empty question text and empty options', () => {
    expect(() =>
      normalizeQuestion({ question: '   ', options: ['A', 'B'], correctAnswer: 'A' })
    ).toThrow('Generated question text is empty');
    expect(() =>
      normalizeQuestion({ question: 'Q?', options: ['A', ' '], correctAnswer: 'A' })
    ).toThrow('Generated options are incomplete for "Q?"');
  });
});

describe('assertValidQuestion', () => {
  it('passes when the answer appears exactly once', () => {
    expect(() =>
      assertValidQuestion({ question: 'Q?', options: ['A', 'B'], correctAnswer: 'B' })
    ).not.toThrow();
  });

  it('fails when the answer is missing or duplicated', () => {
    expect(() =>
      assertValidQuestion({ question: 'Q?', options: ['A', 'B'], correctAnswer: 'C' })
    ).toThrow(MalformedUpstreamResponseError);
    expect(() =>
      assertValidQuestion({ question: 'Q?', options: ['A', 'A'], correctAnswer: 'A' })
    ).toThrow('Question "Q?" must have exactly one correct option');
    expect(() =>
      assertValidQuestion({ question: 'Q?', options: [], correctAnswer: 'A' })
    ).toThrow(MalformedUpstreamResponseError);
  });
});
