import { config } from '../config/index.js';
import { errorMessage } from '../errors.js';
import {
  ClientRepository,
  WebhookEventRepository,
  getClientRepository,
  getWebhookEventRepository,
} from '../repositories/index.js';
import { DispatchOutcome, WebhookEvent } from '../types/webhook.js';
import { LogContext, formatLogContext } from '../utils/log-context.js';
import { isDeliverable } from './delivery-policy.js';
import { canonicalJson, signPayload } from './signing.js';
import { WebhookClient, WebhookTransport } from './webhook-client.js';

const MAX_BODY_IN_ERROR = 200;

export interface WebhookDispatcherOptions {
  headerPrefix?: string;
  leaseMarginSeconds?: number;
  userAgent?: string;
  now?: () => Date;
}

export const DEFAULT_USER_AGENT = 'payment-webhook-dispatcher/1.0';

/**
 * Header names for a prefix such as "X-Webhook"
 */
export function webhookHeaderNames(prefix: string) {
  return {
    event: `${prefix}-Event`,
    timestamp: `${prefix}-Timestamp`,
    eventId: `${prefix}-Event-Id`,
    signature: `${prefix}-Signature`,
  };
}

/**
 * Unsigned delivery headers; the signature header is added once the payload is signed
 */
export function buildWebhookHeaders(
  prefix: string,
  fields: { eventType: string; eventId: string; timestamp: string; userAgent?: string }
): Record<string, string> {
  const names = webhookHeaderNames(prefix);
  return {
    'Content-Type': 'application/json',
    'User-Agent': fields.userAgent ?? DEFAULT_USER_AGENT,
    [names.event]: fields.eventType,
    [names.timestamp]: fields.timestamp,
    [names.eventId]: fields.eventId,
  };
}

/**
 * WebhookDispatcher - delivers one event per call and records the outcome.
 *
 * Before any HTTP call the event is claimed in the store, so two overlapping
 * runs never both send the same attempt. Every failure after the claim is
 * recorded as a failed attempt; nothing is thrown to the caller.
 */
export class WebhookDispatcher {
  private eventRepository: WebhookEventRepository;
  private clientRepository: ClientRepository;
  private transport: WebhookTransport;
  private headerPrefix: string;
  private leaseMarginSeconds: number;
  private userAgent: string;
  private now: () => Date;

  constructor(
    eventRepository?: WebhookEventRepository,
    clientRepository?: ClientRepository,
    transport?: WebhookTransport,
    options: WebhookDispatcherOptions = {}
  ) {
    this.eventRepository = eventRepository ?? getWebhookEventRepository();
    this.clientRepository = clientRepository ?? getClientRepository();
    this.transport = transport ?? new WebhookClient();
    this.headerPrefix = options.headerPrefix ?? config.webhook.headerPrefix;
    this.leaseMarginSeconds = options.leaseMarginSeconds ?? config.webhook.leaseMarginSeconds;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Deliver an event. Resolves to true only when the client acknowledged it.
   */
  async dispatch(
    event: WebhookEvent,
    timeoutSeconds: number = config.webhook.timeoutSeconds,
    context: LogContext = {}
  ): Promise<boolean> {
    return (await this.dispatchEvent(event, timeoutSeconds, context)) === 'delivered';
  }

  /**
   * Deliver an event and report how the attempt ended:
   * - delivered: the client answered 2xx
   * - failed: a failed attempt was recorded
   * - skipped: nothing was recorded (not eligible, claimed elsewhere, store unavailable)
   */
  async dispatchEvent(
    event: WebhookEvent,
    timeoutSeconds: number = config.webhook.timeoutSeconds,
    context: LogContext = {}
  ): Promise<DispatchOutcome> {
    const ctx: LogContext = { ...context, eventId: event.id, clientId: event.clientId };

    if (!isDeliverable(event, this.now())) {
      console.log(`[WebhookDispatcher] Event no longer deliverable, skipping${formatLogContext(ctx)}`);
      return 'skipped';
    }

    let claimed: WebhookEvent | null;
    try {
      const now = this.now();
      const leaseUntil = new Date(now.getTime() + (timeoutSeconds + this.leaseMarginSeconds) * 1000);
      claimed = await this.eventRepository.claim(event, leaseUntil, now);
    } catch (error) {
      console.error(`[WebhookDispatcher] Could not claim event: ${errorMessage(error)}${formatLogContext(ctx)}`);
      return 'skipped';
    }

    if (!claimed) {
      console.log(`[WebhookDispatcher] Event claimed by another run, skipping${formatLogContext(ctx)}`);
      return 'skipped';
    }

    try {
      return await this.attempt(claimed, timeoutSeconds, ctx);
    } catch (error) {
      const message = `Unexpected error: ${errorMessage(error).slice(0, MAX_BODY_IN_ERROR)}`;
      try {
        return await this.recordFailure(claimed, message, null, ctx);
      } catch (recordError) {
        console.error(
          `[WebhookDispatcher] Could not record failed attempt: ${errorMessage(recordError)}` +
            formatLogContext(ctx)
        );
        return 'skipped';
      }
    }
  }

  private async attempt(
    event: WebhookEvent,
    timeoutSeconds: number,
    ctx: LogContext
  ): Promise<DispatchOutcome> {
    const client = await this.clientRepository.findById(event.clientId);
    if (!client || !client.webhookUrl) {
      return this.recordFailure(event, 'Client webhook URL not configured', null, ctx);
    }

    const names = webhookHeaderNames(this.headerPrefix);
    const timestamp = this.now().toISOString();
    const headers = buildWebhookHeaders(this.headerPrefix, {
      eventType: event.eventType,
      eventId: event.id,
      timestamp,
      userAgent: this.userAgent,
    });

    // A secret that is set but unusable fails the attempt; we never fall back to unsigned
    if (client.webhookSecret !== null) {
      try {
        headers[names.signature] = signPayload(client.webhookSecret, timestamp, event.payload);
      } catch (error) {
        return this.recordFailure(event, `Failed to sign payload: ${errorMessage(error)}`, null, ctx);
      }
    }

    console.log(
      `[WebhookDispatcher] Delivering ${event.eventType} to ${client.webhookUrl} ` +
        `(attempt ${event.attempts + 1}/${event.maxAttempts})${formatLogContext(ctx)}`
    );

    const response = await this.transport.post({
      url: client.webhookUrl,
      headers,
      body: canonicalJson(event.payload),
      timeoutSeconds,
    });

    switch (response.kind) {
      case 'response':
        if (response.statusCode >= 200 && response.statusCode < 300) {
          return this.recordDelivered(event, response.statusCode, ctx);
        }
        return this.recordFailure(
          event,
          `HTTP ${response.statusCode}: ${response.body.slice(0, MAX_BODY_IN_ERROR)}`,
          response.statusCode,
          ctx
        );
      case 'timeout':
      case 'connection_error':
      case 'request_error':
        return this.recordFailure(event, response.message, null, ctx);
    }
  }

  private async recordDelivered(
    event: WebhookEvent,
    responseCode: number,
    ctx: LogContext
  ): Promise<DispatchOutcome> {
    const updated = await this.eventRepository.markDelivered(event, responseCode, this.now());
    if (!updated) {
      console.warn(`[WebhookDispatcher] Delivered but state changed concurrently${formatLogContext(ctx)}`);
      return 'skipped';
    }
    console.log(`[WebhookDispatcher] Delivered (${responseCode})${formatLogContext(ctx)}`);
    return 'delivered';
  }

  private async recordFailure(
    event: WebhookEvent,
    message: string,
    responseCode: number | null,
    ctx: LogContext
  ): Promise<DispatchOutcome> {
    const updated = await this.eventRepository.markFailed(event, message, responseCode, this.now());
    if (!updated) {
      console.warn(`[WebhookDispatcher] Failure not recorded, state changed concurrently${formatLogContext(ctx)}`);
      return 'skipped';
    }

    if (updated.status === 'failed') {
      console.error(
        `[WebhookDispatcher] Giving up after ${updated.attempts} attempts: ${message}${formatLogContext(ctx)}`
      );
    } else {
      console.warn(
        `[WebhookDispatcher] Attempt ${updated.attempts} failed: ${message}; ` +
          `retry at ${updated.nextAttemptAt?.toISOString()}${formatLogContext(ctx)}`
      );
    }
    return 'failed';
  }
}
