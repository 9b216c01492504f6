import app from './app.js';
import { config } from './config/index.js';
import { closeDatabase, initializeDatabase } from './config/database.js';
import {
  startDispatchWorker,
  startDispatchScheduler,
  stopDispatchScheduler,
} from './queue/dispatch-scheduler.js';
import { closeRedisConnection } from './queue/redis.js';

initializeDatabase();

// Start workers
if (config.scheduler.enabled) {
  startDispatchWorker();
  startDispatchScheduler();
}

const server = app.listen(config.port, () => {
  console.log(`Payment webhook dispatcher running on port ${config.port}`);
  console.log(`Environment: ${config.nodeEnv}`);
  console.log(`Scheduler: ${config.scheduler.enabled ? `every ${config.scheduler.intervalMs}ms` : 'disabled'}`);
});

// Graceful shutdown
async function shutdown(signal: string) {
  console.log(`${signal} received, shutting down gracefully`);

  // Stop accepting new connections
  server.close(async () => {
    console.log('HTTP server closed');

    try {
      if (config.scheduler.enabled) {
        await stopDispatchScheduler();
        await closeRedisConnection();
      }
      closeDatabase();
      console.log('All connections closed');
    } catch (error) {
      console.error('Error during shutdown:', error);
    }

    process.exit(0);
  });
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
