import { Router, Request, Response } from 'express';
import { getClientWebhookService } from '../services/client-webhooks.js';
import { ClientWebhookSettings } from '../types/payment.js';

const router = Router();

// The signing secret is only ever returned when it is created
function toResponse(settings: ClientWebhookSettings) {
  return {
    clientId: settings.clientId,
    webhookEnabled: settings.webhookEnabled,
    webhookUrl: settings.webhookUrl,
    hasSecret: settings.webhookSecret !== null,
    createdAt: settings.createdAt.toISOString(),
    updatedAt: settings.updatedAt.toISOString(),
  };
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * PUT /api/v1/clients/:clientId/webhook
 * Configure a client's webhook endpoint
 */
router.put('/:clientId/webhook', async (req: Request, res: Response) => {
  const { url, enabled } = req.body ?? {};

  if (typeof url !== 'string' || url === '') {
    return res.status(400).json({
      error: 'Missing required fields',
      required: ['url'],
    });
  }

  if (!isHttpUrl(url)) {
    return res.status(400).json({ error: 'Invalid webhook URL' });
  }

  if (enabled !== undefined && typeof enabled !== 'boolean') {
    return res.status(400).json({ error: 'enabled must be a boolean' });
  }

  try {
    const { settings, newSecret } = await getClientWebhookService().configureEndpoint(req.params.clientId, {
      url,
      enabled,
    });

    res.json({
      ...toResponse(settings),
      ...(newSecret !== null && { secret: newSecret }),
    });
  } catch (error) {
    console.error('[ClientRoutes] Failed to configure webhook:', error);
    res.status(500).json({ error: 'Failed to configure webhook' });
  }
});

/**
 * GET /api/v1/clients/:clientId/webhook
 * Get a client's webhook settings
 */
router.get('/:clientId/webhook', async (req: Request, res: Response) => {
  try {
    const settings = await getClientWebhookService().getSettings(req.params.clientId);

    if (!settings) {
      return res.status(404).json({ error: 'Client not found' });
    }

    res.json(toResponse(settings));
  } catch (error) {
    console.error('[ClientRoutes] Failed to get webhook settings:', error);
    res.status(500).json({ error: 'Failed to get webhook settings' });
  }
});

/**
 * POST /api/v1/clients/:clientId/webhook/rotate-secret
 * Replace the signing secret
 */
router.post('/:clientId/webhook/rotate-secret', async (req: Request, res: Response) => {
  try {
    const settings = await getClientWebhookService().rotateSecret(req.params.clientId);

    if (!settings || settings.webhookSecret === null) {
      return res.status(404).json({ error: 'Client not found' });
    }

    res.json({ ...toResponse(settings), secret: settings.webhookSecret });
  } catch (error) {
    console.error('[ClientRoutes] Failed to rotate secret:', error);
    res.status(500).json({ error: 'Failed to rotate webhook secret' });
  }
});

/**
 * POST /api/v1/clients/:clientId/webhook/disable
 * Stop creating webhook events for a client
 */
router.post('/:clientId/webhook/disable', async (req: Request, res: Response) => {
  try {
    const settings = await getClientWebhookService().disable(req.params.clientId);

    if (!settings) {
      return res.status(404).json({ error: 'Client not found' });
    }

    res.json(toResponse(settings));
  } catch (error) {
    console.error('[ClientRoutes] Failed to disable webhooks:', error);
    res.status(500).json({ error: 'Failed to disable webhooks' });
  }
});

/**
 * POST /api/v1/clients/:clientId/webhook/test
 * Signed sample delivery for checking a receiver's verification
 */
router.post('/:clientId/webhook/test', async (req: Request, res: Response) => {
  try {
    const result = await getClientWebhookService().buildTestWebhook(req.params.clientId);

    switch (result.kind) {
      case 'not_found':
        return res.status(404).json({ error: 'Client not found' });
      case 'no_secret':
        return res.status(400).json({ error: 'Webhook secret not configured' });
      case 'ready':
        return res.json({
          success: true,
          url: result.url,
          headers: result.headers,
          payload: result.payload,
          body: result.body,
          message: 'Send this body with these headers to test your webhook endpoint',
        });
    }
  } catch (error) {
    console.error('[ClientRoutes] Failed to build test webhook:', error);
    res.status(500).json({ error: 'Test generation failed' });
  }
});

export default router;
