import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import { ConfigurationError } from '@trivia-quest/core';
import { DEFAULT_GEMINI_MODEL, GEMINI_OPENAI_BASE_URL } from '@trivia-quest/ai-gemini';

export interface GeminiConfig {
  readonly apiKey: string;
  readonly model: string;
  readonly baseUrl: string;
  readonly temperature: number;
  readonly timeoutMs: number;
  readonly maxAttempts: number;
  readonly retryDelayMs: number;
  readonly mockSeed: string;
}

export interface AppConfig {
  readonly appName: string;
  readonly stage: string;
  readonly mockGemini: boolean;
  readonly corsOrigin?: string;
  readonly gemini: GeminiConfig;
}

const secretsClient = new SecretsManagerClient({});
let cachedConfig: Promise<AppConfig> | undefined;

/**
 * Reads the environment once per process. The result is frozen; later calls
 * return the same object until clearConfigCache().
 */
export function loadConfig(): Promise<AppConfig> {
  if (!cachedConfig) {
    cachedConfig = readConfig().catch(error => {
      cachedConfig = undefined;
      throw error;
    });
  }
  return cachedConfig;
}

async function readConfig(): Promise<AppConfig> {
  const mockGemini = parseBoolean('MOCK_GEMINI', false);

  const gemini: GeminiConfig = Object.freeze({
    apiKey: await resolveApiKey(mockGemini),
    model: process.env.GEMINI_MODEL || DEFAULT_GEMINI_MODEL,
    baseUrl: process.env.GEMINI_BASE_URL || GEMINI_OPENAI_BASE_URL,
    temperature: parseNumber('GEMINI_TEMPERATURE', 0.7, { min: 0, max: 2 }),
    timeoutMs: parseNumber('GEMINI_TIMEOUT_MS', 30_000, { min: 1, integer: true }),
    maxAttempts: parseNumber('GEMINI_MAX_ATTEMPTS', 3, { min: 1, integer: true }),
    retryDelayMs: parseNumber('GEMINI_RETRY_DELAY_MS', 1000, { min: 0, integer: true }),
    mockSeed: process.env.GEMINI_MOCK_SEED || 'trivia-quest'
  });

  return Object.freeze({
    appName: process.env.APP_NAME || 'trivia-quest',
    stage: process.env.STAGE || 'dev',
    mockGemini,
    corsOrigin: process.env.CORS_ORIGIN || undefined,
    gemini
  });
}

async function resolveApiKey(mockGemini: boolean): Promise<string> {
  const fromEnv = process.env.GEMINI_API_KEY?.trim();
  if (fromEnv) {
    return fromEnv;
  }

  const secretId = process.env.GEMINI_API_KEY_SECRET_ID;
  if (secretId) {
    return getSecret(secretId);
  }

  if (mockGemini) {
    return 'mock-gemini-key';
  }

  throw new ConfigurationError(
    'GEMINI_API_KEY environment variable is required (or set GEMINI_API_KEY_SECRET_ID, or MOCK_GEMINI=true)'
  );
}

async function getSecret(secretId: string): Promise<string> {
  const command = new GetSecretValueCommand({ SecretId: secretId });
  const response = await secretsClient.send(command);
  const secret = response.SecretString ?? Buffer.from(response.SecretBinary ?? '').toString('utf8');
  if (!secret.trim()) {
    throw new ConfigurationError(`Secret ${secretId} has no value`);
  }
  return secret.trim();
}

export function clearConfigCache(): void {
  cachedConfig = undefined;
}

function parseBoolean(name: string, fallback: boolean): boolean {
  const value = process.env[name];
  if (!value) {
    return fallback;
  }
  return value.trim().toLowerCase() === 'true';
}

function parseNumber(
  name: string,
  fallback: number,
  bounds: { min?: number; max?: number; integer?: boolean } = {}
): number {
  const value = process.env[name];
  if (!value || value.trim() === '') {
    return fallback;
  }

  const parsed = Number(value);
  const invalid =
    !Number.isFinite(parsed) ||
    (bounds.integer && !Number.isInteger(parsed)) ||
    (bounds.min !== undefined && parsed < bounds.min) ||
    (bounds.max !== undefined && parsed > bounds.max);
  if (invalid) {
    throw new ConfigurationError(`${name} must be a valid number, got "${value}"`);
  }
  return parsed;
}
