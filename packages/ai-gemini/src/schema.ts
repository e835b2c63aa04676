export const QuestionBatchSchema = {
  name: 'trivia_questions',
  strict: true,
  schema: {
    type: 'object',
    additionalProperties: false,
    properties: {
      questions: {
        type: 'array',
        items: {
          type: 'object',
          additionalProperties: false,
          properties: {
            question: { type: 'string' },
            options: { type: 'array', items: { type: 'string' } },
            correctAnswer: { type: 'string' }
          },
          required: ['question', 'options', 'correctAnswer']
        }
      }
    },
    required: ['questions']
  }
} as const;
