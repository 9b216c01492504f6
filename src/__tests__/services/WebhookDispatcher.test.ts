import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import { WebhookDispatcher, webhookHeaderNames } from '../../services/webhook-dispatcher';
import { canonicalJson, signPayload, verifySignature } from '../../services/signing';
import { MockClientRepository } from '../mocks/MockClientRepository';
import { MockWebhookEventRepository } from '../mocks/MockWebhookEventRepository';
import { MockWebhookTransport } from '../mocks/MockWebhookTransport';
import { FIXED_NOW, makeEvent } from '../mocks/fixtures';

const TIMESTAMP = '2026-01-15T12:00:00.000Z';

describe('WebhookDispatcher', () => {
  let eventRepository: MockWebhookEventRepository;
  let clientRepository: MockClientRepository;
  let transport: MockWebhookTransport;
  let dispatcher: WebhookDispatcher;

  beforeEach(async () => {
    jest.clearAllMocks();
    eventRepository = new MockWebhookEventRepository();
    clientRepository = new MockClientRepository();
    transport = new MockWebhookTransport();
    dispatcher = new WebhookDispatcher(eventRepository, clientRepository, transport, {
      headerPrefix: 'X-Webhook',
      leaseMarginSeconds: 30,
      now: () => FIXED_NOW,
    });

    await clientRepository.upsert('client-1', {
      webhookEnabled: true,
      webhookUrl: 'https://merchant.example/hooks',
      webhookSecret: 'test-secret',
    });
  });

  describe('webhookHeaderNames', () => {
    it('should derive header names from the prefix', () => {
      expect(webhookHeaderNames('X-Pay')).toEqual({
        event: 'X-Pay-Event',
        timestamp: 'X-Pay-Timestamp',
        eventId: 'X-Pay-Event-Id',
        signature: 'X-Pay-Signature',
      });
    });
  });

  describe('successful delivery', () => {
    it('should POST the signed canonical payload and mark the event delivered', async () => {
      const event = makeEvent();
      eventRepository.seed(event);

      const outcome = await dispatcher.dispatchEvent(event, 10);

      expect(outcome).toBe('delivered');
      expect(transport.requests).toHaveLength(1);

      const request = transport.requests[0];
      expect(request.url).toBe('https://merchant.example/hooks');
      expect(request.timeoutSeconds).toBe(10);
      expect(request.body).toBe(canonicalJson(event.payload));
      expect(request.headers).toEqual({
        'Content-Type': 'application/json',
        'User-Agent': 'payment-webhook-dispatcher/1.0',
        'X-Webhook-Event': 'payment.completed',
        'X-Webhook-Timestamp': TIMESTAMP,
        'X-Webhook-Event-Id': 'evt-1',
        'X-Webhook-Signature': signPayload('test-secret', TIMESTAMP, event.payload),
      });

      const stored = await eventRepository.findById('evt-1');
      expect(stored?.status).toBe('delivered');
      expect(stored?.deliveredAt).toEqual(FIXED_NOW);
      expect(stored?.lastResponseCode).toBe(200);
      expect(stored?.lastError).toBeNull();
      expect(stored?.nextAttemptAt).toBeNull();
    });

    it('should send a body the receiver can verify', async () => {
      const event = makeEvent();
      eventRepository.seed(event);

      await dispatcher.dispatchEvent(event, 10);

      const request = transport.requests[0];
      const received = JSON.parse(request.body);
      expect(
        verifySignature(
          'test-secret',
          request.headers['X-Webhook-Timestamp'],
          received,
          request.headers['X-Webhook-Signature']
        )
      ).toBe(true);
    });

    it('should treat any 2xx as delivered', async () => {
      const event = makeEvent();
      eventRepository.seed(event);
      transport.respondWith({ kind: 'response', statusCode: 204, body: '' });

      expect(await dispatcher.dispatchEvent(event, 10)).toBe('delivered');
      expect((await eventRepository.findById('evt-1'))?.lastResponseCode).toBe(204);
    });

    it('should omit the signature header when the client has no secret', async () => {
      await clientRepository.upsert('client-1', { webhookSecret: null });
      const event = makeEvent();
      eventRepository.seed(event);

      expect(await dispatcher.dispatchEvent(event, 10)).toBe('delivered');
      expect(transport.requests[0].headers).not.toHaveProperty('X-Webhook-Signature');
    });

    it('should use the configured header prefix', async () => {
      const prefixed = new WebhookDispatcher(eventRepository, clientRepository, transport, {
        headerPrefix: 'X-Pay',
        now: () => FIXED_NOW,
      });
      const event = makeEvent();
      eventRepository.seed(event);

      await prefixed.dispatchEvent(event, 10);

      expect(transport.requests[0].headers['X-Pay-Event-Id']).toBe('evt-1');
      expect(transport.requests[0].headers).toHaveProperty('X-Pay-Signature');
    });

    it('should hold a lease on the event while the request is in flight', async () => {
      const event = makeEvent();
      eventRepository.seed(event);
      let leasedUntil: Date | null = null;
      transport.respondWith(async () => {
        leasedUntil = (await eventRepository.findById('evt-1'))?.nextAttemptAt ?? null;
        return { kind: 'response', statusCode: 200, body: 'ok' };
      });

      await dispatcher.dispatchEvent(event, 10);

      expect(leasedUntil).toEqual(new Date('2026-01-15T12:00:40.000Z'));
    });
  });

  describe('failed attempts', () => {
    it('should schedule a retry after a non-2xx response', async () => {
      const event = makeEvent({ attempts: 1 });
      eventRepository.seed(event);
      transport.respondWith({ kind: 'response', statusCode: 503, body: 'Service Unavailable' });

      expect(await dispatcher.dispatchEvent(event, 10)).toBe('failed');

      const stored = await eventRepository.findById('evt-1');
      expect(stored?.status).toBe('pending');
      expect(stored?.attempts).toBe(2);
      expect(stored?.nextAttemptAt?.toISOString()).toBe('2026-01-15T12:05:00.000Z');
      expect(stored?.lastError).toBe('HTTP 503: Service Unavailable');
      expect(stored?.lastResponseCode).toBe(503);
    });

    it('should give up after the last attempt', async () => {
      const event = makeEvent({ attempts: 4 });
      eventRepository.seed(event);
      transport.respondWith({ kind: 'response', statusCode: 500, body: 'Internal Server Error' });

      expect(await dispatcher.dispatchEvent(event, 10)).toBe('failed');

      const stored = await eventRepository.findById('evt-1');
      expect(stored?.status).toBe('failed');
      expect(stored?.attempts).toBe(5);
      expect(stored?.nextAttemptAt).toBeNull();
      expect(stored?.lastError).toBe('HTTP 500: Internal Server Error');
      expect(stored?.lastResponseCode).toBe(500);
    });

    it('should keep only the start of a long response body', async () => {
      const event = makeEvent();
      eventRepository.seed(event);
      transport.respondWith({ kind: 'response', statusCode: 502, body: 'x'.repeat(300) });

      await dispatcher.dispatchEvent(event, 10);

      expect((await eventRepository.findById('evt-1'))?.lastError).toBe(`HTTP 502: ${'x'.repeat(200)}`);
    });

    it('should record transport errors without a response code', async () => {
      const event = makeEvent();
      eventRepository.seed(event);
      transport.respondWith({ kind: 'timeout', message: 'Request timeout after 10s' });

      expect(await dispatcher.dispatchEvent(event, 10)).toBe('failed');

      const stored = await eventRepository.findById('evt-1');
      expect(stored?.lastError).toBe('Request timeout after 10s');
      expect(stored?.lastResponseCode).toBeNull();
      expect(stored?.attempts).toBe(1);
    });

    it('should fail the attempt instead of sending unsigned when the secret is unusable', async () => {
      await clientRepository.upsert('client-1', { webhookSecret: '' });
      const event = makeEvent();
      eventRepository.seed(event);

      expect(await dispatcher.dispatchEvent(event, 10)).toBe('failed');
      expect(transport.requests).toHaveLength(0);

      const stored = await eventRepository.findById('evt-1');
      expect(stored?.lastError).toBe('Failed to sign payload: Webhook secret is required for signing');
      expect(stored?.attempts).toBe(1);
      expect(stored?.status).toBe('pending');
    });

    it('should fail the attempt when the client URL is gone', async () => {
      await clientRepository.upsert('client-1', { webhookUrl: null });
      const event = makeEvent();
      eventRepository.seed(event);

      expect(await dispatcher.dispatchEvent(event, 10)).toBe('failed');
      expect(transport.requests).toHaveLength(0);
      expect((await eventRepository.findById('evt-1'))?.lastError).toBe('Client webhook URL not configured');
    });

    it('should fail the attempt when the client no longer exists', async () => {
      const event = makeEvent({ clientId: 'client-gone' });
      eventRepository.seed(event);

      expect(await dispatcher.dispatchEvent(event, 10)).toBe('failed');
      expect((await eventRepository.findById('evt-1'))?.lastError).toBe('Client webhook URL not configured');
    });

    it('should record unexpected errors as a failed attempt', async () => {
      const event = makeEvent();
      eventRepository.seed(event);
      transport.respondWith(async () => {
        throw new Error('socket exploded');
      });

      expect(await dispatcher.dispatchEvent(event, 10)).toBe('failed');
      expect((await eventRepository.findById('evt-1'))?.lastError).toBe('Unexpected error: socket exploded');
    });
  });

  describe('skipped events', () => {
    it('should skip events that are no longer pending', async () => {
      const event = makeEvent({ status: 'delivered' });
      eventRepository.seed(event);

      expect(await dispatcher.dispatchEvent(event, 10)).toBe('skipped');
      expect(transport.requests).toHaveLength(0);
    });

    it('should skip events that are not due yet', async () => {
      const event = makeEvent({ nextAttemptAt: new Date('2026-01-15T12:01:00.000Z') });
      eventRepository.seed(event);

      expect(await dispatcher.dispatchEvent(event, 10)).toBe('skipped');
      expect(transport.requests).toHaveLength(0);
    });

    it('should skip an event another run already claimed', async () => {
      const event = makeEvent();
      eventRepository.seed(event);
      await eventRepository.claim(event, new Date('2026-01-15T12:00:40.000Z'), FIXED_NOW);

      expect(await dispatcher.dispatchEvent(event, 10)).toBe('skipped');
      expect(transport.requests).toHaveLength(0);
    });

    it('should skip when the store cannot be reached for the claim', async () => {
      const event = makeEvent();
      eventRepository.seed(event);
      jest.spyOn(eventRepository, 'claim').mockRejectedValue(new Error('database is locked'));

      expect(await dispatcher.dispatchEvent(event, 10)).toBe('skipped');
      expect(transport.requests).toHaveLength(0);
    });

    it('should skip when the failure cannot be recorded', async () => {
      const event = makeEvent();
      eventRepository.seed(event);
      transport.respondWith({ kind: 'response', statusCode: 500, body: 'oops' });
      jest.spyOn(eventRepository, 'markFailed').mockRejectedValue(new Error('database is locked'));

      expect(await dispatcher.dispatchEvent(event, 10)).toBe('skipped');
    });

    it('should skip when the event changed before the outcome was written', async () => {
      const event = makeEvent();
      eventRepository.seed(event);
      transport.respondWith(async () => {
        eventRepository.seed(makeEvent({ status: 'delivered' }));
        return { kind: 'response', statusCode: 200, body: 'ok' };
      });

      expect(await dispatcher.dispatchEvent(event, 10)).toBe('skipped');
    });
  });

  describe('dispatch', () => {
    it('should resolve to true only for delivered events', async () => {
      eventRepository.seed(makeEvent({ id: 'evt-ok' }));
      eventRepository.seed(makeEvent({ id: 'evt-bad' }));
      transport.respondWith(
        { kind: 'response', statusCode: 200, body: 'ok' },
        { kind: 'response', statusCode: 400, body: 'bad' }
      );

      expect(await dispatcher.dispatch(makeEvent({ id: 'evt-ok' }), 10)).toBe(true);
      expect(await dispatcher.dispatch(makeEvent({ id: 'evt-bad' }), 10)).toBe(false);
    });
  });
});
