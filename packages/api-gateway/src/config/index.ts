export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

function requireEnv(env: Env, key: string): string {
  const val = env[key];
  if (!val) throw new ConfigError(`Missing required environment variable: ${key}`);
  return val;
}

function optionalEnv(env: Env, key: string, defaultValue = ""): string {
  const val = env[key];
  return val === undefined || val.trim() === "" ? defaultValue : val.trim();
}

function intEnv(env: Env, key: string, defaultValue: number, min: number): number {
  const raw = optionalEnv(env, key, String(defaultValue));
  if (!/^-?\d+$/.test(raw)) throw new ConfigError(`${key} must be an integer, got "${raw}"`);
  const value = parseInt(raw, 10);
  if (value < min) throw new ConfigError(`${key} must be >= ${min}, got ${value}`);
  return value;
}

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

function boolEnv(env: Env, key: string, defaultValue: boolean): boolean {
  const raw = optionalEnv(env, key).toLowerCase();
  if (!raw) return defaultValue;
  if (TRUE_VALUES.has(raw)) return true;
  if (FALSE_VALUES.has(raw)) return false;
  throw new ConfigError(`${key} must be one of 1/true/yes/on or 0/false/no/off, got "${raw}"`);
}

const ENVIRONMENTS = ["development", "staging", "production"] as const;
const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

function oneOf<T extends string>(key: string, raw: string, allowed: readonly T[]): T {
  const match = allowed.find((value) => value === raw);
  if (!match) throw new ConfigError(`${key} must be one of ${allowed.join(", ")}, got "${raw}"`);
  return match;
}

export interface Config {
  readonly env: (typeof ENVIRONMENTS)[number];
  readonly port: number;
  readonly host: string;
  readonly logLevel: (typeof LOG_LEVELS)[number];

  // Translation provider (OpenAI-compatible)
  readonly llmApiKey: string;
  readonly llmModel: string;
  readonly llmBaseUrl: string;
  readonly providerTimeoutMs: number;
  readonly providerMaxRetries: number;

  // Durable cache; ":memory:" for a throwaway one
  readonly cacheDbPath: string;

  readonly historyEnabled: boolean;
  readonly historyLimit: number;

  // Rate limiting (in-memory, per user id or IP)
  readonly rateLimitMax: number;
  readonly rateLimitWindowMs: number;
}

export function loadConfig(env: Env = process.env): Config {
  const nodeEnv = oneOf("NODE_ENV", optionalEnv(env, "NODE_ENV", "development"), ENVIRONMENTS);

  return Object.freeze({
    env: nodeEnv,
    port: intEnv(env, "PORT", 3001, 0),
    host: optionalEnv(env, "HOST", "0.0.0.0"),
    logLevel: oneOf("LOG_LEVEL", optionalEnv(env, "LOG_LEVEL", "info").toLowerCase(), LOG_LEVELS),

    // The key may be left out outside production; /health/ready reports it
    llmApiKey: nodeEnv === "production" ? requireEnv(env, "LLM_API_KEY") : optionalEnv(env, "LLM_API_KEY"),
    llmModel: optionalEnv(env, "LLM_MODEL", "gpt-4o-mini"),
    llmBaseUrl: optionalEnv(env, "LLM_BASE_URL", "https://api.openai.com/v1").replace(/\/+$/, ""),
    providerTimeoutMs: intEnv(env, "PROVIDER_TIMEOUT_MS", 30_000, 1),
    providerMaxRetries: intEnv(env, "PROVIDER_MAX_RETRIES", 2, 0),

    cacheDbPath: optionalEnv(env, "TRANSLATION_CACHE_DB_PATH", "data/translation_cache.sqlite3"),

    historyEnabled: boolEnv(env, "HISTORY_ENABLED", true),
    historyLimit: intEnv(env, "DEFAULT_HISTORY_LIMIT", 10, 1),

    rateLimitMax: intEnv(env, "RATE_LIMIT_MAX", 30, 1),
    rateLimitWindowMs: intEnv(env, "RATE_LIMIT_WINDOW_MS", 60_000, 1),
  });
}

let _config: Config | null = null;

export function getConfig(): Config {
  if (!_config) throw new Error("Config not initialized. Call initConfig() first.");
  return _config;
}

export function initConfig(env: Env = process.env): Config {
  _config = loadConfig(env);
  return _config;
}
