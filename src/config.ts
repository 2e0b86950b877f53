import { ConfigError } from './errors';

export type LlmProvider = 'groq' | 'anthropic';

export interface LlmConfig {
  provider: LlmProvider;
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
}

export interface SearchConfig {
  apiKey?: string;
  numResults: number;
  timeoutMs: number;
}

export interface AppConfig {
  port: number;
  llm: LlmConfig;
  search: SearchConfig;
  sheets: { credentialsFile: string };
  upload: { maxFileSizeBytes: number };
  session: { ttlMs: number };
}

const DEFAULT_MODELS: Record<LlmProvider, string> = {
  groq: 'llama-3.1-8b-instant',
  anthropic: 'claude-3-5-sonnet-20241022',
};

interface NumberRule {
  integer?: boolean;
  positive?: boolean;
}

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number, rule: NumberRule = {}): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  const valid =
    Number.isFinite(value) &&
    (rule.positive ? value > 0 : value >= 0) &&
    (!rule.integer || Number.isInteger(value));
  if (!valid) {
    const kind = `${rule.positive ? 'positive' : 'non-negative'} ${rule.integer ? 'integer' : 'number'}`;
    throw new ConfigError(`${name} must be a ${kind}, got "${raw}"`);
  }
  return value;
}

function readProvider(env: NodeJS.ProcessEnv): LlmProvider {
  const raw = (env.LLM_PROVIDER || 'groq').trim().toLowerCase();
  if (raw === 'groq' || raw === 'anthropic') return raw;
  throw new ConfigError(`LLM_PROVIDER must be "groq" or "anthropic", got "${raw}"`);
}

/**
 * Builds the application configuration from environment variables.
 * Call `dotenv.config()` before this when a .env file should be honoured.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const provider = readProvider(env);
  const keyName = provider === 'groq' ? 'GROQ_API_KEY' : 'ANTHROPIC_API_KEY';
  const apiKey = env[keyName];
  if (!apiKey) {
    throw new ConfigError(`${keyName} not found in environment variables`);
  }
  const modelName = provider === 'groq' ? env.GROQ_MODEL : env.ANTHROPIC_MODEL;

  return {
    port: readNumber(env, 'PORT', 5001, { integer: true }),
    llm: {
      provider,
      apiKey,
      model: modelName || DEFAULT_MODELS[provider],
      temperature: readNumber(env, 'LLM_TEMPERATURE', 0.7),
      maxTokens: readNumber(env, 'LLM_MAX_TOKENS', 1024, { integer: true, positive: true }),
    },
    search: {
      apiKey: env.SERPAPI_KEY || undefined,
      numResults: readNumber(env, 'SEARCH_NUM_RESULTS', 3, { integer: true, positive: true }),
      timeoutMs: readNumber(env, 'SEARCH_TIMEOUT_MS', 10000, { positive: true }),
    },
    sheets: {
      credentialsFile: env.GCP_SERVICE_ACCOUNT_FILE || 'secrets/gcp_service_account.json',
    },
    upload: {
      maxFileSizeBytes: readNumber(env, 'MAX_UPLOAD_MB', 10, { positive: true }) * 1024 * 1024,
    },
    session: {
      ttlMs: readNumber(env, 'SESSION_TTL_MINUTES', 60, { positive: true }) * 60 * 1000,
    },
  };
}
