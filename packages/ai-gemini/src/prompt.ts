import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { GenerateQuestionsInput } from '@trivia-quest/core';

export function buildQuestionPrompt(input: GenerateQuestionsInput): ChatCompletionMessageParam[] {
  const plural = input.count === 1 ? 'question' : 'questions';
  const instructions = [
    'You are a fun and engaging trivia game host.',
    `Write ${input.count} multiple-choice trivia ${plural} for the requested category.`,
    'Each question has exactly four distinct, plausible options and a single definitive correct answer.',
    'The value of "correctAnswer" MUST exactly match one of the strings in "options", without leading or trailing whitespace.',
    'Return JSON only: an object with a "questions" array of {"question", "options", "correctAnswer"} objects, with no surrounding text or markdown.'
  ];

  if (input.category.trim().toLowerCase() === 'brain teasers') {
    instructions.push('For this category, make each question a riddle or short puzzle.');
  }

  return [
    { role: 'system', content: instructions.join(' ') },
    { role: 'user', content: `Category: ${JSON.stringify(input.category)}` }
  ];
}
