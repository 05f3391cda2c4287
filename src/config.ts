import 'dotenv/config';

function env(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function envInt(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be an integer, got: ${value}`);
  }
  return parsed;
}

function envFloat(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return parsed;
}

function envBool(key: string, defaultValue: boolean): boolean {
  const value = process.env[key]?.trim().toLowerCase();
  if (value === undefined || value === '') return defaultValue;
  if (['1', 'true', 'yes', 'on'].includes(value)) return true;
  if (['0', 'false', 'no', 'off'].includes(value)) return false;
  throw new Error(`Environment variable ${key} must be a boolean, got: ${value}`);
}

function envChoice<T extends string>(key: string, choices: readonly T[], defaultValue: T): T {
  const value = process.env[key];
  if (value === undefined || value === '') return defaultValue;
  const match = choices.find((choice) => choice === value.trim().toLowerCase());
  if (!match) {
    throw new Error(`Environment variable ${key} must be one of ${choices.join(', ')}, got: ${value}`);
  }
  return match;
}

export const LLM_PROVIDERS = ['anthropic', 'gemini'] as const;
export type LLMProviderName = (typeof LLM_PROVIDERS)[number];

export const GENERATION_MODES = ['queue', 'inline'] as const;
export type GenerationMode = (typeof GENERATION_MODES)[number];

export const config = {
  database: {
    url: env('DATABASE_URL', './data/persona-press.db'),
  },

  apiKeys: {
    anthropic: env('ANTHROPIC_API_KEY', ''),
    gemini: env('GEMINI_API_KEY', ''),
  },

  server: {
    port: envInt('PORT', 3010),
    host: env('HOST', '0.0.0.0'),
    nodeEnv: env('NODE_ENV', 'development'),
  },

  admin: {
    authRequired: envBool('ADMIN_AUTH_REQUIRED', false),
    username: env('ADMIN_USERNAME', 'admin'),
    password: env('ADMIN_PASSWORD', 'changeme'),
    jwtSecret: env('JWT_SECRET', 'persona-press-dev-secret-change-in-production'),
    jwtExpiresIn: env('JWT_EXPIRES_IN', '7d'),
  },

  publicIds: {
    secret: env('PUBLIC_ID_SECRET', 'persona-press-dev-secret-public-ids'),
  },

  ai: {
    provider: envChoice('LLM_PROVIDER', LLM_PROVIDERS, 'anthropic'),
    claude: {
      model: env('CLAUDE_MODEL', 'claude-3-5-sonnet-20241022'),
      fastModel: env('CLAUDE_FAST_MODEL', 'claude-3-5-sonnet-20241022'),
    },
    gemini: {
      model: env('GEMINI_MODEL', 'gemini-2.0-flash'),
      fastModel: env('GEMINI_FAST_MODEL', 'gemini-2.0-flash'),
    },
    maxRetries: envInt('LLM_MAX_RETRIES', 2),
    retryBaseDelayMs: envInt('LLM_RETRY_BASE_DELAY_MS', 1000),
    timeoutMs: envInt('LLM_TIMEOUT_MS', 60_000),
    fastTimeoutMs: envInt('LLM_FAST_TIMEOUT_MS', 30_000),
    fastMaxTokens: envInt('FAST_MAX_TOKENS', 650),
    circuitFailureThreshold: envInt('LLM_CIRCUIT_FAILURE_THRESHOLD', 3),
    circuitCoolOffSeconds: envFloat('LLM_CIRCUIT_COOL_OFF_SECONDS', 30),
    requestsPerMinute: envInt('LLM_REQUESTS_PER_MINUTE', 30),
  },

  generation: {
    mode: envChoice('GENERATION_MODE', GENERATION_MODES, 'queue'),
    maxConcurrentJobs: envInt('MAX_CONCURRENT_JOBS', 3),
    sweepCron: env('GENERATION_SWEEP_CRON', '* * * * *'),
    syncFallback: envBool('QUEUE_SYNC_FALLBACK', true),
  },

  rateLimit: {
    generatePerMinute: envInt('RATE_LIMIT_GENERATE_PER_MINUTE', 10),
    engagePerMinute: envInt('RATE_LIMIT_ENGAGE_PER_MINUTE', 60),
  },
} as const;

export function validateConfig(): void {
  const warnings: string[] = [];
  const errors: string[] = [];

  const providerKey = config.ai.provider === 'anthropic' ? config.apiKeys.anthropic : config.apiKeys.gemini;
  const providerKeyName = config.ai.provider === 'anthropic' ? 'ANTHROPIC_API_KEY' : 'GEMINI_API_KEY';

  if (!providerKey) {
    warnings.push(`${providerKeyName} is not set; ${config.ai.provider} generation calls will fail`);
  }

  if (config.admin.authRequired && config.admin.password === 'changeme') {
    warnings.push('ADMIN_PASSWORD is set to default "changeme"; change in production');
  }
  if (config.admin.jwtSecret.includes('dev-secret')) {
    warnings.push('JWT_SECRET is using development default; change in production');
  }
  if (config.publicIds.secret.includes('dev-secret')) {
    warnings.push('PUBLIC_ID_SECRET is using development default; share links are predictable');
  }
  if (config.generation.maxConcurrentJobs < 1) {
    errors.push('MAX_CONCURRENT_JOBS must be at least 1');
  }

  if (config.server.nodeEnv === 'production') {
    if (config.admin.authRequired && config.admin.password === 'changeme') {
      errors.push('ADMIN_PASSWORD must be changed in production');
    }
    if (config.admin.jwtSecret.includes('dev-secret')) {
      errors.push('JWT_SECRET must be changed in production');
    }
    if (!providerKey) {
      errors.push(`${providerKeyName} is required in production`);
    }
  }

  for (const warning of warnings) {
    console.warn(`[config] WARNING: ${warning}`);
  }

  if (errors.length > 0) {
    throw new Error(`Configuration errors:\n${errors.map((e) => `  - ${e}`).join('\n')}`);
  }
}
