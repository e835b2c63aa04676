import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { randomUUID } from 'node:crypto';
import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import { Logger } from '@aws-lambda-powertools/logger';
import { loadConfig } from './env';
import { handler } from './handler';

const logger = new Logger({ serviceName: process.env.APP_NAME ?? 'trivia-quest' });

/** Runs the Lambda handler behind a plain Node HTTP server for local development. */
export function createLocalServer(): Server {
  return createServer((req, res) => {
    serve(req, res).catch(error => {
      logger.error('Local server failed to answer request', {
        error: error instanceof Error ? error.message : String(error)
      });
      if (!res.headersSent) {
        res.writeHead(500, { 'content-type': 'application/json' });
      }
      res.end(JSON.stringify({ error: 'Internal Server Error' }));
    });
  });
}

async function serve(req: IncomingMessage, res: ServerResponse): Promise<void> {
  const body = await readBody(req);
  const requestId = randomUUID();
  const result = await handler(toEvent(req, body, requestId), toContext(requestId));

  res.writeHead(result.statusCode ?? 200, normalizeHeaders(result.headers));
  res.end(result.body ?? '');
}

function toEvent(req: IncomingMessage, body: string, requestId: string): APIGatewayProxyEventV2 {
  const url = new URL(req.url ?? '/', 'http://localhost');
  const method = (req.method ?? 'GET').toUpperCase();
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(req.headers)) {
    if (value !== undefined) {
      headers[name] = Array.isArray(value) ? value.join(',') : value;
    }
  }

  return {
    version: '2.0',
    routeKey: '$default',
    rawPath: url.pathname,
    rawQueryString: url.search.replace(/^\?/, ''),
    headers,
    requestContext: {
      accountId: 'local',
      apiId: 'local',
      domainName: url.hostname,
      domainPrefix: 'local',
      http: {
        method,
        path: url.pathname,
        protocol: `HTTP/${req.httpVersion}`,
        sourceIp: req.socket.remoteAddress ?? '127.0.0.1',
        userAgent: headers['user-agent'] ?? ''
      },
      requestId,
      routeKey: '$default',
      stage: '$default',
      time: new Date().toISOString(),
      timeEpoch: Date.now()
    },
    body: body || undefined,
    isBase64Encoded: false
  };
}

function toContext(requestId: string): Context {
  return {
    callbackWaitsForEmptyEventLoop: false,
    functionName: 'trivia-quest-local',
    functionVersion: '$LATEST',
    invokedFunctionArn: 'arn:aws:lambda:local:000000000000:function:trivia-quest-local',
    memoryLimitInMB: '128',
    awsRequestId: requestId,
    logGroupName: 'local',
    logStreamName: 'local',
    getRemainingTimeInMillis: () => 30_000,
    done: () => undefined,
    fail: () => undefined,
    succeed: () => undefined
  };
}

function normalizeHeaders(
  headers: Record<string, boolean | number | string> | undefined
): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers ?? {})) {
    normalized[name] = String(value);
  }
  return normalized;
}

async function readBody(req: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf8');
}

export async function startLocalServer(port: number): Promise<Server> {
  // Fail at startup, not on the first request, when the key is missing.
  const config = await loadConfig();
  const server = createLocalServer();

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, () => {
      server.off('error', reject);
      resolve();
    });
  });
  logger.info('trivia-quest listening', { port, stage: config.stage, mockGemini: config.mockGemini });
  return server;
}
