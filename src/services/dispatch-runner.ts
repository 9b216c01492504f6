import { randomUUID } from 'crypto';
import { config } from '../config/index.js';
import { errorMessage } from '../errors.js';
import { WebhookEventRepository, getWebhookEventRepository } from '../repositories/index.js';
import { DispatchOutcome, DispatchSummary, WebhookEvent } from '../types/webhook.js';
import { LogContext, formatLogContext } from '../utils/log-context.js';
import { WebhookDispatcher } from './webhook-dispatcher.js';

export interface DispatchRunnerOptions {
  concurrency?: number;
  now?: () => Date;
}

/**
 * DispatchRunner - one dispatch cycle over a bounded batch of due events.
 * Per-event problems end up in the counters; only a failure to fetch the
 * batch rejects.
 */
export class DispatchRunner {
  private eventRepository: WebhookEventRepository;
  private dispatcher: WebhookDispatcher;
  private concurrency: number;
  private now: () => Date;

  constructor(
    eventRepository?: WebhookEventRepository,
    dispatcher?: WebhookDispatcher,
    options: DispatchRunnerOptions = {}
  ) {
    this.eventRepository = eventRepository ?? getWebhookEventRepository();
    this.dispatcher = dispatcher ?? new WebhookDispatcher(this.eventRepository);
    const concurrency = options.concurrency ?? config.webhook.concurrency;
    // A non-numeric setting parses to NaN, which would start no workers at all
    this.concurrency = Number.isInteger(concurrency) && concurrency >= 1 ? concurrency : 1;
    this.now = options.now ?? (() => new Date());
  }

  async runOnce(
    limit: number = config.webhook.batchLimit,
    timeoutSeconds: number = config.webhook.timeoutSeconds,
    context: LogContext = {}
  ): Promise<DispatchSummary> {
    const ctx: LogContext = { ...context, runId: context.runId ?? randomUUID() };
    const summary: DispatchSummary = { processed: 0, delivered: 0, failed: 0, skipped: 0 };

    const events = await this.eventRepository.dueEvents(limit, this.now());
    summary.processed = events.length;

    if (events.length === 0) {
      console.log(`[DispatchRunner] No due events${formatLogContext(ctx)}`);
      return summary;
    }

    console.log(`[DispatchRunner] Dispatching ${events.length} events${formatLogContext(ctx)}`);

    let next = 0;
    const work = async (): Promise<void> => {
      while (next < events.length) {
        const event = events[next++];
        const outcome = await this.dispatchOne(event, timeoutSeconds, ctx);
        summary[outcome]++;
      }
    };

    const workers = Math.min(this.concurrency, events.length);
    await Promise.all(Array.from({ length: workers }, () => work()));

    console.log(
      `[DispatchRunner] Run complete: processed=${summary.processed} delivered=${summary.delivered} ` +
        `failed=${summary.failed} skipped=${summary.skipped}${formatLogContext(ctx)}`
    );
    return summary;
  }

  private async dispatchOne(
    event: WebhookEvent,
    timeoutSeconds: number,
    ctx: LogContext
  ): Promise<DispatchOutcome> {
    try {
      return await this.dispatcher.dispatchEvent(event, timeoutSeconds, ctx);
    } catch (error) {
      console.error(
        `[DispatchRunner] Dispatch threw: ${errorMessage(error)}` +
          formatLogContext({ ...ctx, eventId: event.id })
      );
      return 'skipped';
    }
  }
}
