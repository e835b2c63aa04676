import { MalformedUpstreamResponseError } from './errors';
import type { RawQuestion, TriviaQuestion } from './models';

export function normalizeQuestion(raw: RawQuestion): TriviaQuestion {
  const question = raw.question.trim();
  if (!question) {
    throw new MalformedUpstreamResponseError('Generated question text is empty');
  }

  const options = raw.options.map(option => option.trim());
  if (options.length === 0 || options.some(option => option === '')) {
    throw new MalformedUpstreamResponseError(`Generated options are incomplete for "${question}"`);
  }

  const seen = new Set(options.map(option => option.toLowerCase()));
  if (seen.size !== options.length) {
    throw new MalformedUpstreamResponseError(`Generated options must be distinct for "${question}"`);
  }

  return {
    question,
    options,
    correctAnswer: resolveCorrectAnswer(raw.correctAnswer, options, question)
  };
}

/**
 * Maps the generator's answer onto one of the options. Models sometimes echo a
 * shortened form ("Mars" for "Mars (the Red Planet)"), so containment is
 * accepted when it singles out one option.
 */
function resolveCorrectAnswer(answer: string, options: string[], question: string): string {
  const needle = answer.trim().toLowerCase();
  if (!needle) {
    throw new MalformedUpstreamResponseError(`Generated answer is empty for "${question}"`);
  }

  const exact = options.find(option => option.toLowerCase() === needle);
  if (exact !== undefined) {
    return exact;
  }

  const partial = options.filter(option => option.toLowerCase().includes(needle));
  if (partial.length === 1) {
    return partial[0];
  }

  throw new MalformedUpstreamResponseError(
    partial.length === 0
      ? `Generated answer "${answer.trim()}" is not one of the options for "${question}"`
      : `Generated answer "${answer.trim()}" matches several options for "${question}"`
  );
}

export function assertValidQuestion(question: TriviaQuestion): void {
  const matches = question.options.filter(option => option === question.correctAnswer);
  if (question.options.length === 0 || matches.length !== 1) {
    throw new MalformedUpstreamResponseError(
      `Question "${question.question}" must have exactly one correct option`
    );
  }
}
