import { Router } from 'express';
import { config } from '../config/index.js';
import { checkDatabaseConnection } from '../config/database.js';
import { checkRedisConnection } from '../queue/redis.js';

type CheckResult = 'ok' | 'error';

const router = Router();

router.get('/', (req, res) => {
  res.json({
    status: 'healthy',
    service: 'payment-webhook-dispatcher',
    timestamp: new Date().toISOString(),
  });
});

router.get('/ready', async (req, res) => {
  const checks: Record<string, CheckResult> = {
    database: checkDatabaseConnection() ? 'ok' : 'error',
  };

  // The queue only matters when this process schedules dispatch runs
  if (config.scheduler.enabled) {
    checks.queue = (await checkRedisConnection()) ? 'ok' : 'error';
  }

  const ready = Object.values(checks).every((result) => result === 'ok');

  res.status(ready ? 200 : 503).json({
    status: ready ? 'ready' : 'not_ready',
    checks,
  });
});

export default router;
