import { randomUUID } from 'crypto';
import { config } from '../config/index.js';
import { ClientRepository, getClientRepository } from '../repositories/index.js';
import { ClientWebhookSettings } from '../types/payment.js';
import { JsonObject } from '../types/webhook.js';
import { canonicalJson, signPayload } from './signing.js';
import { buildWebhookHeaders, webhookHeaderNames } from './webhook-dispatcher.js';

/**
 * Generate a random secret for HMAC signing
 */
export function generateSecret(): string {
  return randomUUID().replace(/-/g, '') + randomUUID().replace(/-/g, '');
}

export interface WebhookEndpointUpdate {
  url: string;
  enabled?: boolean;
}

export interface ClientWebhookServiceOptions {
  headerPrefix?: string;
  now?: () => Date;
}

/**
 * A signed sample delivery a client can replay against its receiver.
 * Nothing is stored for it.
 */
export type TestWebhook =
  | {
      kind: 'ready';
      url: string | null;
      headers: Record<string, string>;
      payload: JsonObject;
      body: string;
    }
  | { kind: 'not_found' }
  | { kind: 'no_secret' };

/**
 * ClientWebhookService - manages where and how a client receives webhooks
 */
export class ClientWebhookService {
  private repository: ClientRepository;
  private headerPrefix: string;
  private now: () => Date;

  constructor(repository?: ClientRepository, options: ClientWebhookServiceOptions = {}) {
    this.repository = repository ?? getClientRepository();
    this.headerPrefix = options.headerPrefix ?? config.webhook.headerPrefix;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Get a client's webhook settings
   */
  async getSettings(clientId: string): Promise<ClientWebhookSettings | null> {
    return this.repository.findById(clientId);
  }

  /**
   * Point a client's webhooks at a URL. A signing secret is generated the first time.
   */
  async configureEndpoint(
    clientId: string,
    update: WebhookEndpointUpdate
  ): Promise<{ settings: ClientWebhookSettings; newSecret: string | null }> {
    const existing = await this.repository.findById(clientId);
    const newSecret = existing?.webhookSecret ? null : generateSecret();

    const settings = await this.repository.upsert(clientId, {
      webhookUrl: update.url,
      webhookEnabled: update.enabled ?? true,
      ...(newSecret !== null && { webhookSecret: newSecret }),
    });

    console.log(`[ClientWebhooks] Configured webhook endpoint for client ${clientId}`);
    return { settings, newSecret };
  }

  /**
   * Replace a client's signing secret
   */
  async rotateSecret(clientId: string): Promise<ClientWebhookSettings | null> {
    const existing = await this.repository.findById(clientId);
    if (!existing) {
      return null;
    }

    const settings = await this.repository.upsert(clientId, { webhookSecret: generateSecret() });
    console.log(`[ClientWebhooks] Rotated webhook secret for client ${clientId}`);
    return settings;
  }

  /**
   * Stop creating events for a client without forgetting its endpoint
   */
  async disable(clientId: string): Promise<ClientWebhookSettings | null> {
    const existing = await this.repository.findById(clientId);
    if (!existing) {
      return null;
    }
    return this.repository.upsert(clientId, { webhookEnabled: false });
  }

  /**
   * Sign a `test` event with the client's secret, using the same headers as real deliveries
   */
  async buildTestWebhook(clientId: string): Promise<TestWebhook> {
    const settings = await this.repository.findById(clientId);
    if (!settings) {
      return { kind: 'not_found' };
    }
    if (!settings.webhookSecret) {
      return { kind: 'no_secret' };
    }

    const timestamp = this.now().toISOString();
    const payload: JsonObject = {
      event_type: 'test',
      data: {
        timestamp,
        message: 'This is a test webhook',
      },
    };

    const headers = buildWebhookHeaders(this.headerPrefix, {
      eventType: 'test',
      eventId: `test-${randomUUID()}`,
      timestamp,
    });
    headers[webhookHeaderNames(this.headerPrefix).signature] = signPayload(
      settings.webhookSecret,
      timestamp,
      payload
    );

    console.log(`[ClientWebhooks] Built test webhook for client ${clientId}`);
    return { kind: 'ready', url: settings.webhookUrl, headers, payload, body: canonicalJson(payload) };
  }
}

// Default service instance
let clientWebhookServiceInstance: ClientWebhookService | null = null;

export function getClientWebhookService(): ClientWebhookService {
  if (!clientWebhookServiceInstance) {
    clientWebhookServiceInstance = new ClientWebhookService();
  }
  return clientWebhookServiceInstance;
}

export function setClientWebhookService(service: ClientWebhookService): void {
  clientWebhookServiceInstance = service;
}

export function clearClientWebhookService(): void {
  clientWebhookServiceInstance = null;
}
