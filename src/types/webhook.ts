import { InputError } from '../errors.js';

/**
 * Webhook event types, in their wire form
 */
export const WEBHOOK_EVENT_TYPES = [
  'payment.created',
  'payment.pending',
  'payment.approved',
  'payment.completed',
  'payment.failed',
  'payment.rejected',
  'payment.cancelled',
] as const;

export type WebhookEventType = (typeof WEBHOOK_EVENT_TYPES)[number];

/**
 * Delivery status of a webhook event
 * pending -> delivered | failed; both are terminal
 */
export const WEBHOOK_EVENT_STATUSES = ['pending', 'delivered', 'failed'] as const;

export type WebhookEventStatus = (typeof WEBHOOK_EVENT_STATUSES)[number];

export function isWebhookEventType(value: unknown): value is WebhookEventType {
  return WEBHOOK_EVENT_TYPES.some((type) => type === value);
}

export function isWebhookEventStatus(value: unknown): value is WebhookEventStatus {
  return WEBHOOK_EVENT_STATUSES.some((status) => status === value);
}

export function parseWebhookEventType(value: unknown): WebhookEventType {
  if (!isWebhookEventType(value)) {
    throw new InputError(`Unknown webhook event type: ${String(value)}`);
  }
  return value;
}

export function parseWebhookEventStatus(value: unknown): WebhookEventStatus {
  if (!isWebhookEventStatus(value)) {
    throw new InputError(`Unknown webhook event status: ${String(value)}`);
  }
  return value;
}

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * Payment fields frozen into the payload at creation time
 */
export interface WebhookPaymentData extends JsonObject {
  id: string;
  client_id: string;
  amount: number | null;
  currency: string | null;
  fiat_amount: number | null;
  fiat_currency: string | null;
  crypto_amount: number | null;
  crypto_currency: string | null;
  status: string;
  payment_method: string | null;
  transaction_id: string | null;
  description: string | null;
  created_at: string | null;
  updated_at: string | null;
}

/**
 * Webhook payload sent to the client
 */
export interface WebhookEventPayload extends JsonObject {
  event_type: WebhookEventType;
  payment: WebhookPaymentData;
  timestamp: string; // ISO 8601
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Shape check for payloads read back from storage
 */
export function isWebhookEventPayload(value: unknown): value is WebhookEventPayload {
  return (
    isJsonObject(value) &&
    isWebhookEventType(value.event_type) &&
    typeof value.timestamp === 'string' &&
    isJsonObject(value.payment) &&
    typeof value.payment.id === 'string' &&
    typeof value.payment.client_id === 'string' &&
    typeof value.payment.status === 'string'
  );
}

/**
 * Stored webhook event, the unit of delivery
 */
export interface WebhookEvent {
  id: string;
  clientId: string;
  paymentId: string;
  eventType: WebhookEventType;
  status: WebhookEventStatus;
  attempts: number;
  maxAttempts: number;
  nextAttemptAt: Date | null;
  payload: WebhookEventPayload;
  lastError: string | null;
  lastResponseCode: number | null;
  deliveredAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Outcome of a single dispatch
 */
export type DispatchOutcome = 'delivered' | 'failed' | 'skipped';

/**
 * Counters for one batch run
 */
export interface DispatchSummary {
  processed: number;
  delivered: number;
  failed: number;
  skipped: number;
}
