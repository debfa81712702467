// Environment configuration for the turn orchestrator API
// Load all engine credentials and orchestration limits from environment variables

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    console.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 8123),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV: process.env.NODE_ENV || 'development',
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
  CORS_ORIGINS: strEnv(process.env.CORS_ORIGINS, 'http://localhost:3000,http://127.0.0.1:3000')
    .split(',')
    .map(origin => origin.trim())
    .filter(Boolean),

  // Completion engine
  COMPLETION_PROVIDER: strEnv(process.env.COMPLETION_PROVIDER, 'anthropic').toLowerCase(),
  MODEL: strEnv(process.env.MODEL),
  MAX_TOKENS: parsePositiveInt(process.env.MAX_TOKENS, 8192, 'MAX_TOKENS'),
  SYSTEM_PROMPT: strEnv(process.env.SYSTEM_PROMPT),

  // Anthropic
  ANTHROPIC_API_KEY: strEnv(process.env.ANTHROPIC_API_KEY),

  // OpenAI-compatible endpoints
  OPENAI_API_KEY: strEnv(process.env.OPENAI_API_KEY),
  OPENAI_BASE_URL: strEnv(process.env.OPENAI_BASE_URL),

  // Turn orchestration
  // MAX_HISTORY_LENGTH is validated by the history manager at startup, so a bad
  // value is passed through rather than silently replaced.
  MAX_HISTORY_LENGTH: process.env.MAX_HISTORY_LENGTH
    ? parseInt(process.env.MAX_HISTORY_LENGTH, 10)
    : 100,
  TOOL_TIMEOUT_MS: parsePositiveInt(process.env.TOOL_TIMEOUT_MS, 30000, 'TOOL_TIMEOUT_MS'),
  MAX_CONCURRENT_TOOLS: Math.max(1, parsePositiveInt(process.env.MAX_CONCURRENT_TOOLS, 4, 'MAX_CONCURRENT_TOOLS')),
  STREAM_BUFFER_SIZE: Math.max(1, parsePositiveInt(process.env.STREAM_BUFFER_SIZE, 16, 'STREAM_BUFFER_SIZE')),
  MAX_MESSAGE_LENGTH: parsePositiveInt(process.env.MAX_MESSAGE_LENGTH, 10000, 'MAX_MESSAGE_LENGTH'),

  // Metrics
  METRICS_EXPORT_DIR: strEnv(process.env.METRICS_EXPORT_DIR, './logs'),

  // Guards
  AUTH_ENFORCEMENT_ENABLED: process.env.AUTH_ENFORCEMENT_ENABLED === 'true',
  RATE_LIMITING_ENABLED: process.env.RATE_LIMITING_ENABLED === 'true',
  RATE_LIMIT_WINDOW_MS: parsePositiveInt(process.env.RATE_LIMIT_WINDOW_MS, 60000, 'RATE_LIMIT_WINDOW_MS'),
  RATE_LIMIT_TURNS_PER_WINDOW: parsePositiveInt(
    process.env.RATE_LIMIT_TURNS_PER_WINDOW,
    20,
    'RATE_LIMIT_TURNS_PER_WINDOW',
  ),
};

export function isProviderConfigured(provider: string): boolean {
  switch (provider) {
    case 'anthropic':
      return !!env.ANTHROPIC_API_KEY;
    case 'openai':
      return !!env.OPENAI_API_KEY;
    default:
      return false;
  }
}

export function listConfiguredProviders(): string[] {
  const providers = ['anthropic', 'openai'];
  return providers.filter(isProviderConfigured);
}

// Log configuration on startup (redact secrets)
export function logConfiguration() {
  const configured = listConfiguredProviders();
  console.log('Turn orchestrator configuration:');
  console.log(`  Environment: ${env.NODE_ENV}`);
  console.log(`  Server: ${env.HOST}:${env.PORT}`);
  console.log(`  CORS origins: ${env.CORS_ORIGINS.join(', ') || 'none'}`);
  console.log(`  Completion provider: ${env.COMPLETION_PROVIDER}${env.MODEL ? ` (${env.MODEL})` : ''}`);
  console.log(`  Configured providers: ${configured.join(', ') || 'none'}`);
  console.log(`  Max history length: ${env.MAX_HISTORY_LENGTH}`);
  console.log(`  Tool timeout ms: ${env.TOOL_TIMEOUT_MS}`);
  console.log(`  Max concurrent tools: ${env.MAX_CONCURRENT_TOOLS}`);
  console.log(`  Stream buffer size: ${env.STREAM_BUFFER_SIZE}`);
  console.log(`  Auth enforcement enabled: ${env.AUTH_ENFORCEMENT_ENABLED}`);
  console.log(`  Rate limiting enabled: ${env.RATE_LIMITING_ENABLED}`);
  if (env.RATE_LIMITING_ENABLED) {
    console.log(`  Rate limit window ms: ${env.RATE_LIMIT_WINDOW_MS}`);
    console.log(`  Turns max per window: ${env.RATE_LIMIT_TURNS_PER_WINDOW}`);
  }
}
