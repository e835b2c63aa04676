export * from './GeminiClient';
export * from './GeminiMockClient';
export * from './RetryingAiClient';
export * from './parse';
export * from './prompt';
export * from './schema';
