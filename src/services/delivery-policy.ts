import { WebhookEvent } from '../types/webhook.js';

/**
 * Retry delays in minutes, indexed by the attempt count before the failure is
 * recorded. The last entry covers every later attempt. With the default five
 * attempts an event reaches its terminal state about five hours after creation.
 */
export const BACKOFF_SCHEDULE_MINUTES: readonly number[] = [1, 5, 15, 60, 240];

export const MAX_ERROR_LENGTH = 500;

/**
 * Check if an event may be attempted now
 */
export function isDeliverable(event: WebhookEvent, now: Date = new Date()): boolean {
  if (event.status !== 'pending') {
    return false;
  }
  if (event.attempts >= event.maxAttempts) {
    return false;
  }
  if (event.nextAttemptAt && event.nextAttemptAt.getTime() > now.getTime()) {
    return false;
  }
  return true;
}

/**
 * Delay before the next attempt, for an event that has made `attempts` attempts so far
 */
export function retryDelayMinutes(attempts: number): number {
  const index = Math.min(Math.max(attempts, 0), BACKOFF_SCHEDULE_MINUTES.length - 1);
  return BACKOFF_SCHEDULE_MINUTES[index];
}

export function calculateNextAttempt(attempts: number, now: Date = new Date()): Date {
  return new Date(now.getTime() + retryDelayMinutes(attempts) * 60 * 1000);
}

export function truncateError(message: string): string {
  return message.length > MAX_ERROR_LENGTH ? message.slice(0, MAX_ERROR_LENGTH) : message;
}

/**
 * State of an event after a successful delivery
 */
export function applyDelivered(event: WebhookEvent, responseCode: number, now: Date): WebhookEvent {
  return {
    ...event,
    status: 'delivered',
    deliveredAt: now,
    nextAttemptAt: null,
    lastResponseCode: responseCode,
    lastError: null,
    updatedAt: now,
  };
}

/**
 * State of an event after a failed attempt: one more attempt recorded, then
 * either terminal failure or the next slot from the backoff table
 */
export function applyFailure(
  event: WebhookEvent,
  errorMessage: string,
  responseCode: number | null,
  now: Date
): WebhookEvent {
  const attempts = event.attempts + 1;
  const exhausted = attempts >= event.maxAttempts;

  return {
    ...event,
    attempts,
    status: exhausted ? 'failed' : 'pending',
    nextAttemptAt: exhausted ? null : calculateNextAttempt(event.attempts, now),
    lastError: truncateError(errorMessage),
    lastResponseCode: responseCode,
    updatedAt: now,
  };
}
