export type IdStrategy = 'counter' | 'random';

export type Config = {
  geminiApiKey?: string;
  geminiModel: string;
  // OpenAI-compatible surface of the Gemini API
  geminiBaseUrl: string;
  host: string;
  port: number;
  corsOrigins: string[] | '*';
  maxUploadBytes: number;
  idStrategy: IdStrategy;
};

export const DEFAULT_GEMINI_MODEL = 'gemini-1.5-flash';
export const DEFAULT_GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/openai/';

function resolveIdStrategy(raw: string | undefined): IdStrategy {
  switch (raw) {
    case 'random':
      return 'random';
    case undefined:
    case 'counter':
      return 'counter';
    default:
      return 'counter';
  }
}

function resolveCorsOrigins(raw: string | undefined): Config['corsOrigins'] {
  if (raw === undefined || raw.trim() === '' || raw.trim() === '*') return '*';
  return raw
    .split(',')
    .map((o) => o.trim())
    .filter((o) => o.length > 0);
}

function toPositiveInt(raw: string | undefined, fallback: number): number {
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) return fallback;
  return parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    geminiApiKey: env.GOOGLE_GEMINI_API_KEY,
    geminiModel: env.GEMINI_MODEL ?? DEFAULT_GEMINI_MODEL,
    geminiBaseUrl: env.GEMINI_BASE_URL ?? DEFAULT_GEMINI_BASE_URL,
    host: env.HOST ?? '0.0.0.0',
    port: toPositiveInt(env.PORT, 8000),
    corsOrigins: resolveCorsOrigins(env.CORS_ORIGINS),
    maxUploadBytes: toPositiveInt(env.MAX_UPLOAD_BYTES, 10 * 1024 * 1024),
    idStrategy: resolveIdStrategy(env.ID_STRATEGY)
  };
}

// Centralized config with sensible defaults; all values can be overridden via env.
export const config: Config = loadConfig();
