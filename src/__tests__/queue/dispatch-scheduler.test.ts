import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { Queue, Worker } from 'bullmq';
import {
  enqueueDispatchRun,
  getDispatchQueue,
  processDispatchJob,
  setDispatchRunner,
  startDispatchScheduler,
  startDispatchWorker,
  stopDispatchScheduler,
} from '../../queue/dispatch-scheduler';
import { closeRedisConnection } from '../../queue/redis';
import { DispatchRunner } from '../../services/dispatch-runner';
import { WebhookDispatcher } from '../../services/webhook-dispatcher';
import { MockClientRepository } from '../mocks/MockClientRepository';
import { MockWebhookEventRepository } from '../mocks/MockWebhookEventRepository';
import { MockWebhookTransport } from '../mocks/MockWebhookTransport';
import { FIXED_NOW, makeEvent } from '../mocks/fixtures';

// Mock ioredis
jest.mock('ioredis', () => ({
  Redis: jest.fn(() => ({ on: jest.fn(), quit: jest.fn(async () => 'OK') })),
}));

// Mock bullmq Queue and Worker
jest.mock('bullmq', () => {
  const mockQueue = {
    add: jest.fn(async () => ({ id: 'job-123' })),
    close: jest.fn(async () => undefined),
  };
  const mockWorker = {
    on: jest.fn(),
    close: jest.fn(async () => undefined),
  };
  return {
    Queue: jest.fn(() => mockQueue),
    Worker: jest.fn(() => mockWorker),
  };
});

describe('Dispatch Scheduler', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  afterEach(async () => {
    await stopDispatchScheduler();
    await closeRedisConnection();
    setDispatchRunner(null);
  });

  describe('getDispatchQueue', () => {
    it('should create the queue once', () => {
      const queue1 = getDispatchQueue();
      const queue2 = getDispatchQueue();

      expect(queue1).toBe(queue2);
      expect(jest.mocked(Queue)).toHaveBeenCalledTimes(1);
      expect(jest.mocked(Queue)).toHaveBeenCalledWith(
        'webhook-dispatch',
        expect.objectContaining({
          defaultJobOptions: { removeOnComplete: 100, removeOnFail: 100 },
        })
      );
    });
  });

  describe('startDispatchWorker', () => {
    it('should create a single-concurrency worker with event handlers', () => {
      const worker = startDispatchWorker();

      expect(jest.mocked(Worker)).toHaveBeenCalledWith(
        'webhook-dispatch',
        processDispatchJob,
        expect.objectContaining({ concurrency: 1 })
      );
      expect(worker.on).toHaveBeenCalledWith('completed', expect.any(Function));
      expect(worker.on).toHaveBeenCalledWith('failed', expect.any(Function));
      expect(worker.on).toHaveBeenCalledWith('error', expect.any(Function));
    });

    it('should return the same worker on subsequent calls', () => {
      expect(startDispatchWorker()).toBe(startDispatchWorker());
      expect(jest.mocked(Worker)).toHaveBeenCalledTimes(1);
    });
  });

  describe('enqueueDispatchRun', () => {
    it('should queue a job keyed by the tick time', async () => {
      const jobId = await enqueueDispatchRun({ limit: 10, timeoutSeconds: 3 }, 1000);

      expect(jobId).toBe('job-123');
      expect(getDispatchQueue().add).toHaveBeenCalledWith(
        'dispatch-webhooks',
        { limit: 10, timeoutSeconds: 3 },
        { jobId: 'dispatch-1000' }
      );
    });
  });

  describe('startDispatchScheduler', () => {
    beforeEach(() => {
      jest.useFakeTimers();
      jest.setSystemTime(FIXED_NOW);
    });

    afterEach(async () => {
      await stopDispatchScheduler();
      jest.useRealTimers();
    });

    it('should queue a run immediately and then on every interval', () => {
      startDispatchScheduler(60000);
      const queue = getDispatchQueue();

      expect(queue.add).toHaveBeenCalledTimes(1);
      expect(queue.add).toHaveBeenCalledWith(
        'dispatch-webhooks',
        expect.any(Object),
        { jobId: `dispatch-${FIXED_NOW.getTime()}` }
      );

      jest.advanceTimersByTime(60000);
      expect(queue.add).toHaveBeenCalledTimes(2);
    });

    it('should not start multiple schedulers', () => {
      startDispatchScheduler(60000);
      startDispatchScheduler(60000);

      expect(getDispatchQueue().add).toHaveBeenCalledTimes(1);
    });

    it('should stop queuing runs once stopped', async () => {
      startDispatchScheduler(60000);
      const queue = getDispatchQueue();
      const worker = startDispatchWorker();

      await stopDispatchScheduler();
      jest.advanceTimersByTime(120000);

      expect(queue.add).toHaveBeenCalledTimes(1);
      expect(worker.close).toHaveBeenCalled();
      expect(queue.close).toHaveBeenCalled();
    });
  });

  describe('processDispatchJob', () => {
    it('should run one batch with the job settings', async () => {
      const eventRepository = new MockWebhookEventRepository();
      const clientRepository = new MockClientRepository();
      await clientRepository.upsert('client-1', {
        webhookEnabled: true,
        webhookUrl: 'https://merchant.example/hooks',
        webhookSecret: 'test-secret',
      });
      eventRepository.seed(makeEvent());
      const transport = new MockWebhookTransport();
      const dispatcher = new WebhookDispatcher(eventRepository, clientRepository, transport, {
        now: () => FIXED_NOW,
      });
      setDispatchRunner(new DispatchRunner(eventRepository, dispatcher, { now: () => FIXED_NOW }));

      const summary = await processDispatchJob({ id: 'job-7', data: { limit: 10, timeoutSeconds: 5 } });

      expect(summary).toEqual({ processed: 1, delivered: 1, failed: 0, skipped: 0 });
      expect(transport.requests[0].timeoutSeconds).toBe(5);
    });
  });
});
