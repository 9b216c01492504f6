import { Router, Request, Response } from 'express';
import { config } from '../config/index.js';
import { InputError } from '../errors.js';
import { getWebhookEventService } from '../services/webhook-events.js';
import { DispatchRunner } from '../services/dispatch-runner.js';
import { verifySignature } from '../services/signing.js';
import { parsePaymentSnapshot } from '../types/payment.js';
import { WEBHOOK_EVENT_TYPES, WebhookEvent, isWebhookEventType } from '../types/webhook.js';

const router = Router();

let dispatchRunner: DispatchRunner | null = null;

function getRunner(): DispatchRunner {
  if (!dispatchRunner) {
    dispatchRunner = new DispatchRunner();
  }
  return dispatchRunner;
}

/**
 * Set the runner used by the dispatch route (for testing)
 */
export function setRouteDispatchRunner(runner: DispatchRunner | null): void {
  dispatchRunner = runner;
}

function toResponse(event: WebhookEvent) {
  return {
    id: event.id,
    clientId: event.clientId,
    paymentId: event.paymentId,
    eventType: event.eventType,
    status: event.status,
    attempts: event.attempts,
    maxAttempts: event.maxAttempts,
    nextAttemptAt: event.nextAttemptAt?.toISOString() ?? null,
    lastError: event.lastError,
    lastResponseCode: event.lastResponseCode,
    deliveredAt: event.deliveredAt?.toISOString() ?? null,
    createdAt: event.createdAt.toISOString(),
    updatedAt: event.updatedAt.toISOString(),
    payload: event.payload,
  };
}

function optionalPositiveInt(value: unknown, fallback: number): number | null {
  if (value === undefined) {
    return fallback;
  }
  return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : null;
}

/**
 * POST /api/v1/webhook-events
 * Record a payment change as a webhook event
 */
router.post('/', async (req: Request, res: Response) => {
  const { eventType, payment } = req.body ?? {};

  if (!eventType || !payment) {
    return res.status(400).json({
      error: 'Missing required fields',
      required: ['eventType', 'payment'],
    });
  }

  if (!isWebhookEventType(eventType)) {
    return res.status(400).json({
      error: 'Invalid event type',
      validEvents: WEBHOOK_EVENT_TYPES,
    });
  }

  try {
    const snapshot = parsePaymentSnapshot(payment);
    const event = await getWebhookEventService().createEvent(snapshot, eventType);

    if (!event) {
      return res.status(202).json({
        created: false,
        reason: 'Client webhooks are not enabled or no URL is configured',
      });
    }

    res.status(201).json({ created: true, event: toResponse(event) });
  } catch (error) {
    if (error instanceof InputError) {
      return res.status(400).json({ error: error.message });
    }
    console.error('[WebhookEventRoutes] Failed to create event:', error);
    res.status(500).json({ error: 'Failed to create webhook event' });
  }
});

/**
 * GET /api/v1/webhook-events?paymentId=...
 * List events for a payment
 */
router.get('/', async (req: Request, res: Response) => {
  const { paymentId } = req.query;

  if (typeof paymentId !== 'string' || paymentId === '') {
    return res.status(400).json({ error: 'paymentId query parameter is required' });
  }

  try {
    const events = await getWebhookEventService().getEventsForPayment(paymentId);
    res.json({ paymentId, events: events.map(toResponse) });
  } catch (error) {
    console.error('[WebhookEventRoutes] Failed to list events:', error);
    res.status(500).json({ error: 'Failed to list webhook events' });
  }
});

/**
 * GET /api/v1/webhook-events/stats
 * Event counts by delivery status
 */
router.get('/stats', async (req: Request, res: Response) => {
  try {
    const byStatus = await getWebhookEventService().getEventStats();
    res.json({ byStatus });
  } catch (error) {
    console.error('[WebhookEventRoutes] Failed to get stats:', error);
    res.status(500).json({ error: 'Failed to get webhook event stats' });
  }
});

/**
 * POST /api/v1/webhook-events/dispatch
 * Run one dispatch batch now
 */
router.post('/dispatch', async (req: Request, res: Response) => {
  const limit = optionalPositiveInt(req.body?.limit, config.webhook.batchLimit);
  const timeoutSeconds = optionalPositiveInt(req.body?.timeoutSeconds, config.webhook.timeoutSeconds);

  if (limit === null || timeoutSeconds === null) {
    return res.status(400).json({ error: 'limit and timeoutSeconds must be positive integers' });
  }

  try {
    const summary = await getRunner().runOnce(limit, timeoutSeconds);
    res.json(summary);
  } catch (error) {
    console.error('[WebhookEventRoutes] Dispatch run failed:', error);
    res.status(500).json({ error: 'Dispatch run failed' });
  }
});

/**
 * POST /api/v1/webhook-events/verify-signature
 * Check a signature the way a receiving client should
 */
router.post('/verify-signature', (req: Request, res: Response) => {
  const { secret, timestamp, payload, signature } = req.body ?? {};

  if (typeof timestamp !== 'string' || payload === undefined) {
    return res.status(400).json({
      error: 'Missing required fields',
      required: ['secret', 'timestamp', 'payload', 'signature'],
    });
  }

  res.json({ valid: verifySignature(secret, timestamp, payload, signature) });
});

/**
 * GET /api/v1/webhook-events/:id
 * Get an event by ID
 */
router.get('/:id', async (req: Request, res: Response) => {
  try {
    const event = await getWebhookEventService().getEvent(req.params.id);

    if (!event) {
      return res.status(404).json({ error: 'Webhook event not found' });
    }

    res.json(toResponse(event));
  } catch (error) {
    console.error('[WebhookEventRoutes] Failed to get event:', error);
    res.status(500).json({ error: 'Failed to get webhook event' });
  }
});

export default router;
