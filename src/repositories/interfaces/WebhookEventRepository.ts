/**
 * Webhook Event Repository Interface
 * Durable record of every webhook event and its delivery state
 */

import { WebhookEvent, WebhookEventStatus } from '../../types/webhook.js';

export type NewWebhookEvent = Pick<
  WebhookEvent,
  'id' | 'clientId' | 'paymentId' | 'eventType' | 'maxAttempts' | 'payload'
>;

/**
 * State transitions are conditional on the `status` and `attempts` the caller
 * read. When another dispatch run changed the row first, the update is not
 * applied and the method resolves to null.
 */
export interface WebhookEventRepository {
  /**
   * Insert a new pending event, eligible at `now`
   */
  create(event: NewWebhookEvent, now: Date): Promise<WebhookEvent>;

  /**
   * Find an event by ID
   */
  findById(id: string): Promise<WebhookEvent | null>;

  /**
   * Find all events for a payment, oldest first
   */
  findByPaymentId(paymentId: string): Promise<WebhookEvent[]>;

  /**
   * Events eligible for an attempt at `now`, oldest first.
   * A stored event that cannot be read is marked failed and left out.
   */
  dueEvents(limit: number, now: Date): Promise<WebhookEvent[]>;

  /**
   * Take an eligible event for one delivery attempt by moving its
   * next attempt time to `leaseUntil`. Only one contender can win.
   */
  claim(event: WebhookEvent, leaseUntil: Date, now: Date): Promise<WebhookEvent | null>;

  /**
   * Record a successful delivery
   */
  markDelivered(event: WebhookEvent, responseCode: number, now: Date): Promise<WebhookEvent | null>;

  /**
   * Record a failed attempt and schedule the retry, or fail the event for good
   */
  markFailed(
    event: WebhookEvent,
    errorMessage: string,
    responseCode: number | null,
    now: Date
  ): Promise<WebhookEvent | null>;

  /**
   * Count events by status
   */
  countByStatus(): Promise<Record<WebhookEventStatus, number>>;
}
