import dotenv from 'dotenv';

dotenv.config({ quiet: true });

// Parse Redis URL or use individual components
const parseRedisConfig = (): { url: string } | { host: string; port: number; password?: string } => {
  const redisUrl = process.env.REDIS_URL;
  if (redisUrl) {
    return { url: redisUrl };
  }
  return {
    host: process.env.REDIS_HOST || 'localhost',
    port: parseInt(process.env.REDIS_PORT || '6379', 10),
    password: process.env.REDIS_PASSWORD,
  };
};

export const config = {
  port: parseInt(process.env.PORT || '3010', 10),
  nodeEnv: process.env.NODE_ENV || 'development',

  // SQLite database file (":memory:" for throwaway databases)
  database: {
    path: process.env.DATABASE_PATH || './data/webhooks.db',
  },

  // Redis for the dispatch scheduler queue
  redis: parseRedisConfig(),

  // Webhook delivery settings
  webhook: {
    maxAttempts: parseInt(process.env.WEBHOOK_MAX_ATTEMPTS || '5', 10),
    timeoutSeconds: parseInt(process.env.WEBHOOK_TIMEOUT_SECONDS || '10', 10),
    batchLimit: parseInt(process.env.WEBHOOK_BATCH_LIMIT || '100', 10),
    concurrency: parseInt(process.env.WEBHOOK_DISPATCH_CONCURRENCY || '1', 10),
    // Extra time a claimed event stays invisible to other runs beyond the HTTP timeout
    leaseMarginSeconds: parseInt(process.env.WEBHOOK_LEASE_MARGIN_SECONDS || '30', 10),
    headerPrefix: process.env.WEBHOOK_HEADER_PREFIX || 'X-Webhook',
  },

  // Periodic dispatch
  scheduler: {
    enabled: process.env.WEBHOOK_SCHEDULER_ENABLED !== 'false',
    intervalMs: parseInt(process.env.WEBHOOK_DISPATCH_INTERVAL_MS || '60000', 10),
  },
};
