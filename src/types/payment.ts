/**
 * Payment and client types consumed from the payment domain.
 * This service never changes payments; it only snapshots them into events.
 */

import { InputError } from '../errors.js';

export const PAYMENT_STATUSES = [
  'pending',
  'approved',
  'completed',
  'failed',
  'rejected',
  'cancelled',
  'expired',
] as const;

export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

export function parsePaymentStatus(value: unknown): PaymentStatus {
  if (typeof value !== 'string') {
    throw new InputError(`Unknown payment status: ${String(value)}`);
  }
  const normalized = value.toLowerCase();
  const status = PAYMENT_STATUSES.find((s) => s === normalized);
  if (!status) {
    throw new InputError(`Unknown payment status: ${value}`);
  }
  return status;
}

/**
 * Read-only view of a payment at the moment it changed
 */
export interface PaymentSnapshot {
  id: string;
  clientId: string;
  amount: number | null;
  currency: string | null;
  fiatAmount: number | null;
  fiatCurrency: string | null;
  cryptoAmount: number | null;
  cryptoCurrency: string | null;
  status: PaymentStatus;
  paymentMethod: string | null;
  transactionId: string | null;
  description: string | null;
  createdAt: Date | null;
  updatedAt: Date | null;
}

function readString(source: Record<string, unknown>, key: string, required: boolean): string | null {
  const value = source[key];
  if (value === undefined || value === null) {
    if (required) {
      throw new InputError(`Missing payment field: ${key}`);
    }
    return null;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  if (typeof value !== 'string' || (required && value === '')) {
    throw new InputError(`Invalid payment field: ${key}`);
  }
  return value;
}

function readNumber(source: Record<string, unknown>, key: string): number | null {
  const value = source[key];
  if (value === undefined || value === null) {
    return null;
  }
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed)) {
    throw new InputError(`Invalid payment field: ${key}`);
  }
  return parsed;
}

function readDate(source: Record<string, unknown>, key: string): Date | null {
  const value = readString(source, key, false);
  if (value === null) {
    return null;
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new InputError(`Invalid payment field: ${key}`);
  }
  return date;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a payment snapshot arriving over HTTP (camelCase fields)
 */
export function parsePaymentSnapshot(input: unknown): PaymentSnapshot {
  if (!isRecord(input)) {
    throw new InputError('Payment must be an object');
  }

  const id = readString(input, 'id', true);
  const clientId = readString(input, 'clientId', true);
  if (id === null || clientId === null) {
    throw new InputError('Payment id and clientId are required');
  }

  return {
    id,
    clientId,
    amount: readNumber(input, 'amount'),
    currency: readString(input, 'currency', false),
    fiatAmount: readNumber(input, 'fiatAmount'),
    fiatCurrency: readString(input, 'fiatCurrency', false),
    cryptoAmount: readNumber(input, 'cryptoAmount'),
    cryptoCurrency: readString(input, 'cryptoCurrency', false),
    status: parsePaymentStatus(input.status),
    paymentMethod: readString(input, 'paymentMethod', false),
    transactionId: readString(input, 'transactionId', false),
    description: readString(input, 'description', false),
    createdAt: readDate(input, 'createdAt'),
    updatedAt: readDate(input, 'updatedAt'),
  };
}

/**
 * Webhook settings of the client that owns a payment
 */
export interface ClientWebhookSettings {
  clientId: string;
  webhookEnabled: boolean;
  webhookUrl: string | null;
  webhookSecret: string | null;
  createdAt: Date;
  updatedAt: Date;
}
