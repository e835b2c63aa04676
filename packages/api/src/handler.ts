import type {
  APIGatewayProxyEventV2,
  APIGatewayProxyStructuredResultV2,
  Context
} from 'aws-lambda';
import { Logger } from '@aws-lambda-powertools/logger';
import { Metrics, MetricUnit } from '@aws-lambda-powertools/metrics';
import { Tracer } from '@aws-lambda-powertools/tracer';
import {
  ConfigurationError,
  InvalidRequestError,
  QuestionService,
  UpstreamError,
  type AiClient,
  type GenerateQuestionsInput
} from '@trivia-quest/core';
import {
  GeminiClient,
  GeminiMockClient,
  RetryingAiClient,
  isRetryableGeminiError
} from '@trivia-quest/ai-gemini';
import { loadConfig, type AppConfig } from './env';
import packageJson from '../../../package.json';

const logger = new Logger({ serviceName: process.env.APP_NAME ?? 'trivia-quest' });
const metrics = new Metrics({ namespace: process.env.APP_NAME ?? 'trivia-quest' });
const tracer = new Tracer({ serviceName: process.env.APP_NAME ?? 'trivia-quest' });

export interface AppContext {
  questions: Pick<QuestionService, 'getQuestion' | 'getQuestions'>;
  stage: string;
  corsOrigin?: string;
}

type HttpResult = APIGatewayProxyStructuredResultV2;

let appContextPromise: Promise<AppContext> | undefined;
let appContextFactory: () => Promise<AppContext> = bootstrap;

class InstrumentedAiClient implements AiClient {
  constructor(private readonly inner: AiClient) {}

  async generateQuestions(input: GenerateQuestionsInput) {
    try {
      const result = await this.inner.generateQuestions(input);
      metrics.addMetric('question_generated', MetricUnit.Count, result.length);
      return result;
    } catch (error) {
      metrics.addMetric('ai_call_error', MetricUnit.Count, 1);
      throw error;
    }
  }
}

async function bootstrap(): Promise<AppContext> {
  const config = await loadConfig();
  logger.setPersistentLogAttributes({ stage: config.stage, app: config.appName });
  metrics.setDefaultDimensions({ app: config.appName, stage: config.stage });

  const ai = new InstrumentedAiClient(createAiClient(config));
  const questions = new QuestionService(ai, {
    debug: (message, context) => (context ? logger.debug(message, context) : logger.debug(message))
  });

  return { questions, stage: config.stage, corsOrigin: config.corsOrigin };
}

function createAiClient(config: AppConfig): AiClient {
  if (config.mockGemini) {
    logger.warn('MOCK_GEMINI enabled; Gemini API calls are disabled.');
    return new GeminiMockClient({ seed: config.gemini.mockSeed });
  }

  const gemini = new GeminiClient({
    apiKey: config.gemini.apiKey,
    model: config.gemini.model,
    baseUrl: config.gemini.baseUrl,
    temperature: config.gemini.temperature,
    timeoutMs: config.gemini.timeoutMs,
    logger: {
      debug: (message, context) => (context ? logger.debug(message, context) : logger.debug(message))
    }
  });

  return new RetryingAiClient(gemini, {
    maxAttempts: config.gemini.maxAttempts,
    delayMs: config.gemini.retryDelayMs,
    isRetryable: isRetryableGeminiError,
    onRetry: () => metrics.addMetric('ai_retry', MetricUnit.Count, 1),
    logger: {
      warn: (message, context) => (context ? logger.warn(message, context) : logger.warn(message))
    }
  });
}

async function getAppContext(): Promise<AppContext> {
  if (!appContextPromise) {
    appContextPromise = appContextFactory().catch(error => {
      appContextPromise = undefined;
      throw error;
    });
  }
  return appContextPromise;
}

const version = packageJson.version;

const ROUTES: Record<string, string> = {
  '/api/question': 'POST',
  '/api/questions': 'POST',
  '/healthz': 'GET'
};

async function baseHandler(event: APIGatewayProxyEventV2, context: Context): Promise<HttpResult> {
  const correlationId = getCorrelationId(event);
  logger.appendKeys({ requestId: context.awsRequestId, correlationId });

  const method = event.requestContext.http.method.toUpperCase();
  const path = normalizePath(event.rawPath);
  const options: ResponseOptions = { correlationId };

  let app: AppContext;
  try {
    app = await getAppContext();
  } catch (error) {
    // No app context yet: CORS comes straight from the environment.
    options.corsOrigin = process.env.CORS_ORIGIN || undefined;
    if (method === 'OPTIONS') {
      logger.warn('Answering preflight without an app context', { error: serializeError(error) });
      return json(204, undefined, options);
    }
    return errorResponse(error, options);
  }
  options.corsOrigin = app.corsOrigin;

  try {
    const respond = (statusCode: number, body?: unknown) => json(statusCode, body, options);

    if (method === 'OPTIONS') {
      return respond(204);
    }

    const allowed = ROUTES[path];
    if (!allowed) {
      return respond(404, { error: 'Not Found' });
    }
    if (allowed !== method) {
      return json(405, { error: 'Method Not Allowed' }, { ...options, headers: { allow: allowed } });
    }

    if (path === '/healthz') {
      return respond(200, { ok: true, version, stage: app.stage });
    }

    const body = parseJsonBody(event);
    if (path === '/api/questions') {
      return respond(200, await app.questions.getQuestions(body));
    }

    const question = await app.questions.getQuestion(body);
    logger.info('Served trivia question', { optionCount: question.options.length });
    return respond(200, question);
  } catch (error) {
    return errorResponse(error, options);
  }
}

function errorResponse(error: unknown, options: ResponseOptions): HttpResult {
  if (error instanceof InvalidRequestError) {
    metrics.addMetric('question_request_invalid', MetricUnit.Count, 1);
    logger.info('Rejecting invalid request', { reason: error.message, field: error.field });
    const body = error.field ? { error: error.message, field: error.field } : { error: error.message };
    return json(error.statusCode, body, options);
  }

  if (error instanceof UpstreamError) {
    logger.error('Question generation failed', { error: serializeError(error) });
    return json(error.statusCode, { error: 'Failed to generate a question' }, options);
  }

  if (error instanceof ConfigurationError) {
    logger.error('Service is misconfigured', { error: serializeError(error) });
    return json(error.statusCode, { error: error.message }, options);
  }

  logger.error('Unhandled error in question handler', { error: serializeError(error) });
  return json(500, { error: 'Internal Server Error' }, options);
}

function parseJsonBody(event: APIGatewayProxyEventV2): unknown {
  const raw = event.isBase64Encoded
    ? Buffer.from(event.body ?? '', 'base64').toString('utf8')
    : event.body ?? '';

  if (!raw.trim()) {
    throw new InvalidRequestError('Request body is required');
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new InvalidRequestError('Request body must be valid JSON');
  }
}

interface ResponseOptions {
  correlationId: string;
  corsOrigin?: string;
  headers?: Record<string, string>;
}

function json(statusCode: number, body: unknown, options: ResponseOptions): HttpResult {
  const headers: Record<string, string> = {
    'content-type': 'application/json',
    'x-correlation-id': options.correlationId,
    ...options.headers
  };
  if (options.corsOrigin) {
    headers['access-control-allow-origin'] = options.corsOrigin;
    headers['access-control-allow-methods'] = 'GET,POST,OPTIONS';
    headers['access-control-allow-headers'] = 'content-type,x-correlation-id';
    headers.vary = 'Origin';
  }

  return body === undefined
    ? { statusCode, headers }
    : { statusCode, headers, body: JSON.stringify(body) };
}

function normalizePath(rawPath: string | undefined): string {
  const path = (rawPath ?? '/').toLowerCase();
  return path.length > 1 ? path.replace(/\/+$/, '') : path;
}

function getCorrelationId(event: APIGatewayProxyEventV2): string {
  return (
    event.headers?.['x-correlation-id'] ??
    event.headers?.['x-request-id'] ??
    event.requestContext.requestId ??
    `corr-${Date.now()}`
  );
}

function serializeError(error: unknown): Record<string, unknown> {
  const base: Record<string, unknown> = { message: 'Unknown error' };
  if (error instanceof Error) {
    base.message = error.message;
    base.name = error.name;
    base.stack = error.stack;
    if (error.cause !== undefined) {
      base.cause = error.cause instanceof Error ? serializeError(error.cause) : error.cause;
    }
  }
  return base;
}

let coldStart = true;

const instrumentedHandler = async (
  event: APIGatewayProxyEventV2,
  context: Context
): Promise<HttpResult> => {
  logger.addContext(context);
  logger.logEventIfEnabled(event);
  const handlerName = process.env._HANDLER ?? 'handler';

  if (coldStart) {
    metrics.captureColdStartMetric();
  }

  try {
    if (!tracer.isTracingEnabled()) {
      return await baseHandler(event, context);
    }
    const result = await tracer.provider.captureAsyncFunc(`## ${handlerName}`, async () => {
      tracer.annotateColdStart();
      tracer.addServiceNameAnnotation();
      return baseHandler(event, context);
    });
    return result as HttpResult;
  } finally {
    metrics.publishStoredMetrics();
    logger.resetKeys();
    coldStart = false;
  }
};

export const handler = instrumentedHandler;

/** Replaces how the app context is built; without a factory the default bootstrap is restored. */
export function __setAppContextFactory(factory?: () => Promise<AppContext> | AppContext): void {
  appContextPromise = undefined;
  appContextFactory = factory ? async () => Promise.resolve(factory()) : bootstrap;
}
