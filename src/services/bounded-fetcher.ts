import { setTimeout as delay } from 'node:timers/promises';
import { MailboxClient, MessageId, FetchOutcome, ErrorKind } from '../types/mailbox';
import { MailboxError } from '../types/errors';
import { RetryPolicy } from './retry-policy';
import { WorkerPool } from '../utils/worker-pool';
import pino from 'pino';

const logger = pino().child({ module: 'BoundedFetcher' });

export const DEFAULT_CONCURRENCY = 10;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface BoundedFetcherOptions {
  retryPolicy?: RetryPolicy;
  sleep?: Sleep;
}

export interface FetchBatchOptions {
  concurrency?: number;
  signal?: AbortSignal;
}

export interface FetchBatchResult {
  outcomes: Map<MessageId, FetchOutcome>;
  failedCount: number;
  /** Ids left out because the batch was cancelled before they settled. */
  omittedCount: number;
}

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

function toErrorKind(error: unknown): ErrorKind {
  return error instanceof MailboxError ? error.kind : 'malformed';
}

export class BoundedFetcher {
  private readonly client: MailboxClient;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep: Sleep;

  constructor(client: MailboxClient, options: BoundedFetcherOptions = {}) {
    this.client = client;
    this.retryPolicy = options.retryPolicy ?? new RetryPolicy();
    this.sleep = options.sleep ?? defaultSleep;
  }

  async fetchBatch(accountId: string, ids: MessageId[], options: FetchBatchOptions = {}): Promise<FetchBatchResult> {
    const { concurrency = DEFAULT_CONCURRENCY, signal } = options;
    const uniqueIds = [...new Set(ids)];
    const outcomes = new Map<MessageId, FetchOutcome>();
    let failedCount = 0;

    const pool = new WorkerPool(concurrency);

    await pool.run(
      uniqueIds,
      id => this.fetchOne(accountId, id, signal),
      (id, outcome) => {
        if (!outcome) return;
        outcomes.set(id, outcome);
        if (outcome.status === 'failed') failedCount++;
      },
      signal
    );

    const omittedCount = uniqueIds.length - outcomes.size;

    if (failedCount > 0) {
      logger.warn({ accountId, failedCount, total: uniqueIds.length }, 'Some messages could not be fetched');
    }
    if (omittedCount > 0) {
      logger.info({ accountId, omittedCount }, 'Batch cancelled before all messages were fetched');
    }

    return { outcomes, failedCount, omittedCount };
  }

  // Resolves to undefined when cancellation is observed between attempts
  private async fetchOne(accountId: string, id: MessageId, signal?: AbortSignal): Promise<FetchOutcome | undefined> {
    for (let attempt = 0; ; attempt++) {
      if (signal?.aborted) return undefined;

      try {
        const headers = await this.client.getMessageMetadata(accountId, id);
        return { status: 'ok', headers };
      } catch (error) {
        const kind = toErrorKind(error);
        const decision = this.retryPolicy.decide(attempt, kind);

        if (decision.type === 'give_up') {
          logger.warn({ messageId: id, kind, attempts: attempt + 1 }, 'Giving up on message');
          return { status: 'failed', kind };
        }

        logger.debug({ messageId: id, kind, afterMs: decision.afterMs, attempt: attempt + 1 }, 'Retrying message');

        try {
          await this.sleep(decision.afterMs, signal);
        } catch (sleepError) {
          if (signal?.aborted) return undefined;
          throw sleepError;
        }
      }
    }
  }
}
