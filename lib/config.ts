// Centralized runtime configuration for the crt.sh client, backoff policy and batch pacing.
// Values are read from env with sane defaults and can be overridden in tests.

function envInt(name: string, fallback: number): number {
  const v = process.env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

export const CONFIG = {
  CRTSH_URL: process.env.CRTSH_URL || 'https://crt.sh/',
  USER_AGENT: process.env.CRTSH_USER_AGENT || 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36',

  CONNECT_TIMEOUT_MS: envInt('CONNECT_TIMEOUT_MS', 10_000),
  DEFAULT_TIMEOUT_S: envInt('DEFAULT_TIMEOUT_S', 60),
  DEFAULT_RETRIES: envInt('DEFAULT_RETRIES', 3),

  BACKOFF: {
    TIMEOUT_MS: envInt('BACKOFF_TIMEOUT_MS', 5000),
    CONNECTION_MS: envInt('BACKOFF_CONNECTION_MS', 5000),
    RATE_LIMIT_MS: envInt('BACKOFF_RATE_LIMIT_MS', 10_000),
    MALFORMED_MS: envInt('BACKOFF_MALFORMED_MS', 2000),
    UNEXPECTED_MS: envInt('BACKOFF_UNEXPECTED_MS', 3000),
  },

  BATCH: {
    RETRIES: envInt('BATCH_RETRIES', 2),
    PACING_MS: envInt('BATCH_PACING_MS', 2000),
    CONCURRENCY: envInt('BATCH_CONCURRENCY', 1),
  },

  PROXY_TEST: {
    DOMAIN: process.env.PROXY_TEST_DOMAIN || 'google.com',
    TIMEOUT_S: envInt('PROXY_TEST_TIMEOUT_S', 30),
    PACING_MS: envInt('PROXY_TEST_PACING_MS', 1000),
  },

  LOG_LEVEL: process.env.LOG_LEVEL || 'warn',
};

export default CONFIG;
