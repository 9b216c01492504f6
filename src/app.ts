import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { config } from './config/index.js';
import { InputError } from './errors.js';
import healthRoutes from './routes/health.js';
import clientRoutes from './routes/clients.js';
import webhookEventRoutes from './routes/webhook-events.js';

const app = express();

// Middleware
app.use(helmet());
app.use(cors());
if (config.nodeEnv !== 'test') {
  app.use(morgan(config.nodeEnv === 'production' ? 'combined' : 'dev'));
}
app.use(express.json());

// Routes
app.use('/health', healthRoutes);
app.use('/api/v1/clients', clientRoutes);
app.use('/api/v1/webhook-events', webhookEventRoutes);

// Error handler
app.use((err: Error, req: express.Request, res: express.Response, next: express.NextFunction) => {
  // Malformed JSON bodies and other caller mistakes
  if (err instanceof InputError || err instanceof SyntaxError) {
    return res.status(400).json({ error: err.message });
  }

  console.error('Unhandled error:', err);
  res.status(500).json({
    error: 'Internal server error',
    message: config.nodeEnv === 'development' ? err.message : undefined,
  });
});

export default app;
