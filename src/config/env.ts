import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseInt(val, 10) : fallback;
}

function optionalFloat(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseFloat(val) : fallback;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 3000),
  logLevel: optional('LOG_LEVEL', 'info'),
  projectRoot,

  // ───── Reasoning providers ─────
  openai: {
    apiKey: optional('OPENAI_API_KEY', ''),
    model: optional('OPENAI_MODEL', 'gpt-4o-mini'),
    maxTokens: optionalInt('OPENAI_MAX_TOKENS', 1024),
    temperature: optionalFloat('OPENAI_TEMPERATURE', 0),
    timeoutMs: optionalInt('OPENAI_TIMEOUT_MS', 30000),
  },

  anthropic: {
    apiKey: optional('ANTHROPIC_API_KEY', ''),
    model: optional('ANTHROPIC_MODEL', 'claude-3-5-haiku-latest'),
    maxTokens: optionalInt('ANTHROPIC_MAX_TOKENS', 1024),
    temperature: optionalFloat('ANTHROPIC_TEMPERATURE', 0),
    timeoutMs: optionalInt('ANTHROPIC_TIMEOUT_MS', 30000),
  },

  llm: {
    primaryProvider: optional('LLM_PRIMARY_PROVIDER', 'openai'),
    secondaryProvider: optional('LLM_SECONDARY_PROVIDER', ''),
  },

  // Empty URL means the in-memory session store
  redis: {
    url: optional('REDIS_URL', ''),
    keyPrefix: optional('REDIS_KEY_PREFIX', 'str:'),
  },

  // ───── Routing ─────
  router: {
    highUrgencyThreshold: optionalFloat('ROUTER_HIGH_URGENCY_THRESHOLD', 0.75),
    standardThreshold: optionalFloat('ROUTER_STANDARD_THRESHOLD', 0.6),
    maxTransitions: optionalInt('ROUTER_MAX_TRANSITIONS', 5),
  },

  stages: {
    maxAttempts: optionalInt('STAGE_MAX_ATTEMPTS', 3),
    backoffMs: optionalInt('STAGE_BACKOFF_MS', 250),
  },

  knowledge: {
    dir: optional('KNOWLEDGE_DIR', path.join(projectRoot, 'knowledge')),
    topK: optionalInt('KNOWLEDGE_TOP_K', 3),
  },

  customers: {
    dataPath: optional('CUSTOMER_DATA_PATH', path.join(projectRoot, 'data', 'customers.json')),
  },

  observability: {
    enableMetrics: optionalBool('ENABLE_METRICS', true),
  },
} as const;
