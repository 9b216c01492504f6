/**
 * SQLite implementation of WebhookEventRepository
 */

import type Database from 'better-sqlite3';
import { InputError, errorMessage } from '../../errors.js';
import { NewWebhookEvent, WebhookEventRepository } from '../interfaces/WebhookEventRepository.js';
import { MAX_ERROR_LENGTH, applyDelivered, applyFailure } from '../../services/delivery-policy.js';
import {
  WebhookEvent,
  WebhookEventPayload,
  WebhookEventStatus,
  WEBHOOK_EVENT_STATUSES,
  isWebhookEventPayload,
  parseWebhookEventStatus,
  parseWebhookEventType,
} from '../../types/webhook.js';

interface WebhookEventRow {
  id: string;
  client_id: string;
  payment_id: string;
  event_type: string;
  status: string;
  attempts: number;
  max_attempts: number;
  next_attempt_at: string | null;
  payload: string;
  last_error: string | null;
  last_response_code: number | null;
  delivered_at: string | null;
  created_at: string;
  updated_at: string;
}

interface TransitionParams {
  id: string;
  expectedAttempts: number;
  attempts: number;
  status: WebhookEventStatus;
  nextAttemptAt: string | null;
  lastError: string | null;
  lastResponseCode: number | null;
  deliveredAt: string | null;
  updatedAt: string;
}

const toIso = (date: Date | null): string | null => (date ? date.toISOString() : null);
const fromIso = (value: string | null): Date | null => (value ? new Date(value) : null);

function parsePayload(raw: string, eventId: string): WebhookEventPayload {
  const parsed: unknown = JSON.parse(raw);
  if (!isWebhookEventPayload(parsed)) {
    throw new InputError(`Stored payload of webhook event ${eventId} is malformed`);
  }
  return parsed;
}

/**
 * Convert a database row to a domain event
 */
function toDomainEvent(row: WebhookEventRow): WebhookEvent {
  return {
    id: row.id,
    clientId: row.client_id,
    paymentId: row.payment_id,
    eventType: parseWebhookEventType(row.event_type),
    status: parseWebhookEventStatus(row.status),
    attempts: row.attempts,
    maxAttempts: row.max_attempts,
    nextAttemptAt: fromIso(row.next_attempt_at),
    payload: parsePayload(row.payload, row.id),
    lastError: row.last_error,
    lastResponseCode: row.last_response_code,
    deliveredAt: fromIso(row.delivered_at),
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export class SqliteWebhookEventRepository implements WebhookEventRepository {
  constructor(private db: Database.Database) {}

  async create(event: NewWebhookEvent, now: Date): Promise<WebhookEvent> {
    const timestamp = now.toISOString();
    this.db
      .prepare(
        `INSERT INTO webhook_events (
           id, client_id, payment_id, event_type, status, attempts, max_attempts,
           next_attempt_at, payload, created_at, updated_at
         ) VALUES (
           @id, @clientId, @paymentId, @eventType, 'pending', 0, @maxAttempts,
           @nextAttemptAt, @payload, @createdAt, @updatedAt
         )`
      )
      .run({
        id: event.id,
        clientId: event.clientId,
        paymentId: event.paymentId,
        eventType: event.eventType,
        maxAttempts: event.maxAttempts,
        nextAttemptAt: timestamp,
        payload: JSON.stringify(event.payload),
        createdAt: timestamp,
        updatedAt: timestamp,
      });

    return {
      ...event,
      status: 'pending',
      attempts: 0,
      nextAttemptAt: now,
      lastError: null,
      lastResponseCode: null,
      deliveredAt: null,
      createdAt: now,
      updatedAt: now,
    };
  }

  async findById(id: string): Promise<WebhookEvent | null> {
    const row = this.db
      .prepare<[string], WebhookEventRow>('SELECT * FROM webhook_events WHERE id = ?')
      .get(id);
    return row ? toDomainEvent(row) : null;
  }

  async findByPaymentId(paymentId: string): Promise<WebhookEvent[]> {
    const rows = this.db
      .prepare<[string], WebhookEventRow>(
        'SELECT * FROM webhook_events WHERE payment_id = ? ORDER BY created_at ASC, id ASC'
      )
      .all(paymentId);
    return rows.map(toDomainEvent);
  }

  async dueEvents(limit: number, now: Date): Promise<WebhookEvent[]> {
    const rows = this.db
      .prepare<{ now: string; limit: number }, WebhookEventRow>(
        `SELECT * FROM webhook_events
          WHERE status = 'pending'
            AND attempts < max_attempts
            AND (next_attempt_at IS NULL OR next_attempt_at <= @now)
          ORDER BY created_at ASC, id ASC
          LIMIT @limit`
      )
      .all({ now: now.toISOString(), limit });

    const events: WebhookEvent[] = [];
    for (const row of rows) {
      try {
        events.push(toDomainEvent(row));
      } catch (error) {
        this.failUnreadable(row, errorMessage(error), now);
      }
    }
    return events;
  }

  async claim(event: WebhookEvent, leaseUntil: Date, now: Date): Promise<WebhookEvent | null> {
    const result = this.db
      .prepare<{ id: string; attempts: number; leaseUntil: string; now: string }>(
        `UPDATE webhook_events
            SET next_attempt_at = @leaseUntil, updated_at = @now
          WHERE id = @id
            AND status = 'pending'
            AND attempts = @attempts
            AND attempts < max_attempts
            AND (next_attempt_at IS NULL OR next_attempt_at <= @now)`
      )
      .run({
        id: event.id,
        attempts: event.attempts,
        leaseUntil: leaseUntil.toISOString(),
        now: now.toISOString(),
      });

    if (result.changes !== 1) {
      return null;
    }
    return { ...event, nextAttemptAt: leaseUntil, updatedAt: now };
  }

  async markDelivered(
    event: WebhookEvent,
    responseCode: number,
    now: Date
  ): Promise<WebhookEvent | null> {
    return this.transition(event, applyDelivered(event, responseCode, now));
  }

  async markFailed(
    event: WebhookEvent,
    errorMessage: string,
    responseCode: number | null,
    now: Date
  ): Promise<WebhookEvent | null> {
    return this.transition(event, applyFailure(event, errorMessage, responseCode, now));
  }

  async countByStatus(): Promise<Record<WebhookEventStatus, number>> {
    const rows = this.db
      .prepare<[], { status: string; count: number }>(
        'SELECT status, COUNT(*) AS count FROM webhook_events GROUP BY status'
      )
      .all();

    const counts: Record<WebhookEventStatus, number> = { pending: 0, delivered: 0, failed: 0 };
    for (const row of rows) {
      const status = WEBHOOK_EVENT_STATUSES.find((s) => s === row.status);
      if (status) {
        counts[status] = row.count;
      }
    }
    return counts;
  }

  /**
   * A stored row that no longer decodes can never be delivered.
   * Fail it for good so it stops heading every batch.
   */
  private failUnreadable(row: WebhookEventRow, reason: string, now: Date): void {
    console.error(`[WebhookEventRepository] Event ${row.id} is unreadable, marking failed: ${reason}`);
    this.db
      .prepare<{ id: string; attempts: number; lastError: string; now: string }>(
        `UPDATE webhook_events
            SET status = 'failed',
                next_attempt_at = NULL,
                last_error = @lastError,
                updated_at = @now
          WHERE id = @id
            AND status = 'pending'
            AND attempts = @attempts`
      )
      .run({
        id: row.id,
        attempts: row.attempts,
        lastError: `Unreadable event: ${reason}`.slice(0, MAX_ERROR_LENGTH),
        now: now.toISOString(),
      });
  }

  /**
   * Write the next state, guarded on the status and attempt count read at selection time
   */
  private transition(current: WebhookEvent, next: WebhookEvent): WebhookEvent | null {
    const result = this.db
      .prepare<TransitionParams>(
        `UPDATE webhook_events
            SET status = @status,
                attempts = @attempts,
                next_attempt_at = @nextAttemptAt,
                last_error = @lastError,
                last_response_code = @lastResponseCode,
                delivered_at = @deliveredAt,
                updated_at = @updatedAt
          WHERE id = @id
            AND status = 'pending'
            AND attempts = @expectedAttempts`
      )
      .run({
        id: current.id,
        expectedAttempts: current.attempts,
        attempts: next.attempts,
        status: next.status,
        nextAttemptAt: toIso(next.nextAttemptAt),
        lastError: next.lastError,
        lastResponseCode: next.lastResponseCode,
        deliveredAt: toIso(next.deliveredAt),
        updatedAt: next.updatedAt.toISOString(),
      });

    return result.changes === 1 ? next : null;
  }
}
