import 'dotenv/config';
import { Logger } from '@aws-lambda-powertools/logger';
import { startLocalServer } from './local-server';

const logger = new Logger({ serviceName: process.env.APP_NAME ?? 'trivia-quest' });

startLocalServer(Number.parseInt(process.env.PORT ?? '5000', 10)).catch(error => {
  logger.error('Failed to start trivia-quest', {
    error: error instanceof Error ? error.message : String(error)
  });
  process.exitCode = 1;
});
