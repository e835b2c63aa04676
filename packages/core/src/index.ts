export * from './domain/errors';
export * from './domain/models';
export * from './domain/question';
export * from './app/QuestionService';
export * from './ports/AiClient';
