import { randomUUID } from 'crypto';
import { config } from '../config/index.js';
import { errorMessage } from '../errors.js';
import {
  ClientRepository,
  WebhookEventRepository,
  getClientRepository,
  getWebhookEventRepository,
} from '../repositories/index.js';
import { PaymentSnapshot, PaymentStatus } from '../types/payment.js';
import {
  WebhookEvent,
  WebhookEventPayload,
  WebhookEventStatus,
  WebhookEventType,
} from '../types/webhook.js';
import { formatLogContext } from '../utils/log-context.js';

/**
 * Event emitted when a payment moves into a status.
 * Statuses missing here do not notify clients.
 */
export const STATUS_EVENT_TYPES: Partial<Record<PaymentStatus, WebhookEventType>> = {
  pending: 'payment.pending',
  approved: 'payment.approved',
  completed: 'payment.completed',
  failed: 'payment.failed',
  rejected: 'payment.rejected',
  cancelled: 'payment.cancelled',
};

/**
 * Result of asking for an event on behalf of the payment domain.
 * Only `created` means a delivery is queued; every other kind is a normal outcome
 * the caller logs and moves on from.
 */
export type EventEmission =
  | { kind: 'created'; event: WebhookEvent }
  | { kind: 'not_configured' }
  | { kind: 'no_event'; status: PaymentStatus }
  | { kind: 'error'; error: string };

export interface WebhookEventServiceOptions {
  maxAttempts?: number;
  now?: () => Date;
}

/**
 * Snapshot the public payment fields into a payload
 */
export function buildEventPayload(
  payment: PaymentSnapshot,
  eventType: WebhookEventType,
  now: Date
): WebhookEventPayload {
  return {
    event_type: eventType,
    payment: {
      id: payment.id,
      client_id: payment.clientId,
      amount: payment.amount,
      currency: payment.currency,
      fiat_amount: payment.fiatAmount,
      fiat_currency: payment.fiatCurrency,
      crypto_amount: payment.cryptoAmount,
      crypto_currency: payment.cryptoCurrency,
      status: payment.status,
      payment_method: payment.paymentMethod,
      transaction_id: payment.transactionId,
      description: payment.description,
      created_at: payment.createdAt ? payment.createdAt.toISOString() : null,
      updated_at: payment.updatedAt ? payment.updatedAt.toISOString() : null,
    },
    timestamp: now.toISOString(),
  };
}

/**
 * WebhookEventService - turns payment changes into stored webhook events.
 * The only code path that inserts events.
 */
export class WebhookEventService {
  private eventRepository: WebhookEventRepository;
  private clientRepository: ClientRepository;
  private maxAttempts: number;
  private now: () => Date;

  constructor(
    eventRepository?: WebhookEventRepository,
    clientRepository?: ClientRepository,
    options: WebhookEventServiceOptions = {}
  ) {
    this.eventRepository = eventRepository ?? getWebhookEventRepository();
    this.clientRepository = clientRepository ?? getClientRepository();
    this.maxAttempts = options.maxAttempts ?? config.webhook.maxAttempts;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Create an event for a payment change.
   * Resolves to null when the owning client does not receive webhooks.
   */
  async createEvent(
    payment: PaymentSnapshot | null,
    eventType: WebhookEventType
  ): Promise<WebhookEvent | null> {
    if (!payment || !payment.clientId) {
      return null;
    }

    const client = await this.clientRepository.findById(payment.clientId);
    if (!client) {
      return null;
    }
    if (!client.webhookEnabled) {
      return null;
    }
    if (!client.webhookUrl || client.webhookUrl.trim() === '') {
      return null;
    }

    const now = this.now();
    const event = await this.eventRepository.create(
      {
        id: randomUUID(),
        clientId: payment.clientId,
        paymentId: payment.id,
        eventType,
        maxAttempts: this.maxAttempts,
        payload: buildEventPayload(payment, eventType, now),
      },
      now
    );

    console.log(
      `[WebhookEvents] Created ${eventType} event ${event.id}` +
        formatLogContext({ paymentId: payment.id, clientId: payment.clientId })
    );
    return event;
  }

  /**
   * Create an event without ever failing the caller
   */
  async emitPaymentEvent(payment: PaymentSnapshot, eventType: WebhookEventType): Promise<EventEmission> {
    try {
      const event = await this.createEvent(payment, eventType);
      return event ? { kind: 'created', event } : { kind: 'not_configured' };
    } catch (error) {
      const message = errorMessage(error);
      console.error(
        `[WebhookEvents] Failed to create ${eventType} event: ${message}` +
          formatLogContext({ paymentId: payment.id, clientId: payment.clientId })
      );
      return { kind: 'error', error: message };
    }
  }

  /**
   * Emit the event matching the payment's new status
   */
  async emitForStatusChange(payment: PaymentSnapshot): Promise<EventEmission> {
    const eventType = STATUS_EVENT_TYPES[payment.status];
    if (!eventType) {
      return { kind: 'no_event', status: payment.status };
    }
    return this.emitPaymentEvent(payment, eventType);
  }

  /**
   * Get an event by ID
   */
  async getEvent(eventId: string): Promise<WebhookEvent | null> {
    return this.eventRepository.findById(eventId);
  }

  /**
   * Get all events for a payment
   */
  async getEventsForPayment(paymentId: string): Promise<WebhookEvent[]> {
    return this.eventRepository.findByPaymentId(paymentId);
  }

  /**
   * Get event counts by delivery status
   */
  async getEventStats(): Promise<Record<WebhookEventStatus, number>> {
    return this.eventRepository.countByStatus();
  }
}

// Default service instance
let webhookEventServiceInstance: WebhookEventService | null = null;

/**
 * Get the default webhook event service instance
 */
export function getWebhookEventService(): WebhookEventService {
  if (!webhookEventServiceInstance) {
    webhookEventServiceInstance = new WebhookEventService();
  }
  return webhookEventServiceInstance;
}

/**
 * Set custom webhook event service (for testing)
 */
export function setWebhookEventService(service: WebhookEventService): void {
  webhookEventServiceInstance = service;
}

/**
 * Clear webhook event service singleton (for testing)
 */
export function clearWebhookEventService(): void {
  webhookEventServiceInstance = null;
}
