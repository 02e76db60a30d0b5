import { parseWebhookUrl } from './webhook/client.js';

export const DEFAULT_WEBHOOK_TIMEOUT_MS = 15_000;
export const DEFAULT_WEBHOOK_MAX_CONCURRENT = 1;

type ParseResult = {
  config: CourierConfig;
  warnings: string[];
  infos: string[];
};

export type CourierConfig = {
  webhookUrl: string;
  username?: string;
  avatarUrl?: string;
  tts: boolean;
  wait: boolean;
  maxConcurrent: number;
  timeoutMs: number;
  logLevel: string;
};

const LOG_LEVELS = new Set(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

function parseBoolean(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: boolean,
): boolean {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return defaultValue;
  const normalized = raw.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true') return true;
  if (normalized === '0' || normalized === 'false') return false;
  throw new Error(`${name} must be "0"/"1" or "true"/"false", got "${raw}"`);
}

function parseNumber(env: NodeJS.ProcessEnv, name: string, defaultValue: number): number {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return defaultValue;
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    throw new Error(`${name} must be a number, got "${raw}"`);
  }
  if (!Number.isInteger(n)) {
    throw new Error(`${name} must be an integer, got "${n}"`);
  }
  return n;
}

function parseNonNegativeInt(env: NodeJS.ProcessEnv, name: string, defaultValue: number): number {
  const n = parseNumber(env, name, defaultValue);
  if (n < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${n}"`);
  }
  return n;
}

function parsePositiveInt(env: NodeJS.ProcessEnv, name: string, defaultValue: number): number {
  const n = parseNumber(env, name, defaultValue);
  if (n <= 0) {
    throw new Error(`${name} must be a positive integer, got "${n}"`);
  }
  return n;
}

function parseTrimmedString(
  env: NodeJS.ProcessEnv,
  name: string,
): string | undefined {
  const raw = env[name];
  if (raw == null) return undefined;
  const trimmed = raw.trim();
  return trimmed || undefined;
}

export function parseConfig(env: NodeJS.ProcessEnv): ParseResult {
  const warnings: string[] = [];
  const infos: string[] = [];

  const webhookUrl = parseTrimmedString(env, 'WEBHOOK_URL');
  if (!webhookUrl) {
    throw new Error('Missing WEBHOOK_URL');
  }
  try {
    parseWebhookUrl(webhookUrl);
  } catch (err) {
    throw new Error(`WEBHOOK_URL is invalid: ${err instanceof Error ? err.message : String(err)}`);
  }

  const username = parseTrimmedString(env, 'WEBHOOK_USERNAME');
  const avatarUrl = parseTrimmedString(env, 'WEBHOOK_AVATAR_URL');
  if (avatarUrl && !/^https?:\/\//i.test(avatarUrl)) {
    warnings.push(`WEBHOOK_AVATAR_URL does not look like an http(s) URL: "${avatarUrl}"`);
  }

  const tts = parseBoolean(env, 'WEBHOOK_TTS', false);
  const wait = parseBoolean(env, 'WEBHOOK_WAIT', true);
  const maxConcurrent = parseNonNegativeInt(env, 'WEBHOOK_MAX_CONCURRENT', DEFAULT_WEBHOOK_MAX_CONCURRENT);
  if (maxConcurrent === 0) {
    infos.push('WEBHOOK_MAX_CONCURRENT=0: requests are not concurrency-limited');
  }
  const timeoutMs = parsePositiveInt(env, 'WEBHOOK_TIMEOUT_MS', DEFAULT_WEBHOOK_TIMEOUT_MS);

  const logLevelRaw = parseTrimmedString(env, 'LOG_LEVEL')?.toLowerCase() ?? 'info';
  let logLevel = logLevelRaw;
  if (!LOG_LEVELS.has(logLevelRaw)) {
    warnings.push(`LOG_LEVEL "${logLevelRaw}" is not a known level; using "info"`);
    logLevel = 'info';
  }

  return {
    config: {
      webhookUrl,
      username,
      avatarUrl,
      tts,
      wait,
      maxConcurrent,
      timeoutMs,
      logLevel,
    },
    warnings,
    infos,
  };
}
