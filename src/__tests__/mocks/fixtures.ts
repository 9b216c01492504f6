/**
 * Shared test data builders
 */

import { buildEventPayload } from '../../services/webhook-events.js';
import { PaymentSnapshot } from '../../types/payment.js';
import { WebhookEvent } from '../../types/webhook.js';

export const FIXED_NOW = new Date('2026-01-15T12:00:00.000Z');

export function makePayment(overrides: Partial<PaymentSnapshot> = {}): PaymentSnapshot {
  return {
    id: 'pay-1001',
    clientId: 'client-1',
    amount: 0.0015,
    currency: 'BTC',
    fiatAmount: 50,
    fiatCurrency: 'USD',
    cryptoAmount: 0.0015,
    cryptoCurrency: 'BTC',
    status: 'completed',
    paymentMethod: 'crypto',
    transactionId: 'tx-abc-123',
    description: 'Order #42',
    createdAt: new Date('2026-01-15T11:00:00.000Z'),
    updatedAt: new Date('2026-01-15T11:30:00.000Z'),
    ...overrides,
  };
}

export function makeEvent(overrides: Partial<WebhookEvent> = {}): WebhookEvent {
  const payment = makePayment();
  return {
    id: 'evt-1',
    clientId: payment.clientId,
    paymentId: payment.id,
    eventType: 'payment.completed',
    status: 'pending',
    attempts: 0,
    maxAttempts: 5,
    nextAttemptAt: FIXED_NOW,
    payload: buildEventPayload(payment, 'payment.completed', FIXED_NOW),
    lastError: null,
    lastResponseCode: null,
    deliveredAt: null,
    createdAt: FIXED_NOW,
    updatedAt: FIXED_NOW,
    ...overrides,
  };
}
