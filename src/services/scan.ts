import crypto from 'crypto';
import { MailboxClient, MessageId } from '../types/mailbox';
import { ScanOptions, ScanReport, MessageSummary } from '../types/sender';
import { BoundedFetcher, DEFAULT_CONCURRENCY } from './bounded-fetcher';
import { parseHeaders } from './header-parser';
import { foldSummaries } from './sender-aggregator';
import { toScoredSender, compareScoredSenders } from './heuristic-scorer';
import pino from 'pino';

const logger = pino().child({ module: 'ScanService' });

export const DEFAULT_SCAN_OPTIONS: ScanOptions = {
  pageSize: 100,
  maxMessages: 2000,
  concurrency: DEFAULT_CONCURRENCY,
  includeIneligible: false
};

export class ScanService {
  private readonly mailbox: MailboxClient;
  private readonly fetcher: BoundedFetcher;

  constructor(mailbox: MailboxClient, fetcher?: BoundedFetcher) {
    this.mailbox = mailbox;
    this.fetcher = fetcher ?? new BoundedFetcher(mailbox);
  }

  async scan(accountId: string, options: Partial<ScanOptions> = {}, signal?: AbortSignal): Promise<ScanReport> {
    const settings: ScanOptions = { ...DEFAULT_SCAN_OPTIONS, ...options };
    const startedAt = new Date();

    logger.info({ accountId, maxMessages: settings.maxMessages, concurrency: settings.concurrency }, 'Starting scan');

    const ids = await this.listIds(accountId, settings, signal);
    const { outcomes, failedCount, omittedCount } = await this.fetcher.fetchBatch(accountId, ids, {
      concurrency: settings.concurrency,
      signal
    });

    // Walk the listing order so folding does not depend on completion order
    const summaries: MessageSummary[] = [];
    for (const id of ids) {
      const outcome = outcomes.get(id);
      if (outcome?.status === 'ok') {
        summaries.push(parseHeaders(id, outcome.headers));
      }
    }

    const scored = [...foldSummaries(summaries).values()]
      .map(toScoredSender)
      .filter(sender => settings.includeIneligible || sender.eligible)
      .sort(compareScoredSenders);

    if (failedCount > 0) {
      logger.warn(`${failedCount} of ${ids.length} messages could not be fetched`);
    }

    const report: ScanReport = {
      scanId: crypto.randomUUID(),
      accountId,
      startedAt: startedAt.toISOString(),
      completedAt: new Date().toISOString(),
      cancelled: signal?.aborted === true,
      totalMessages: ids.length,
      fetchedMessages: summaries.length,
      failedMessages: failedCount,
      omittedMessages: omittedCount,
      senders: scored
    };

    logger.info({
      accountId,
      scanId: report.scanId,
      totalMessages: report.totalMessages,
      senders: scored.length,
      duration: Date.now() - startedAt.getTime()
    }, 'Scan completed');

    return report;
  }

  private async listIds(accountId: string, settings: ScanOptions, signal?: AbortSignal): Promise<MessageId[]> {
    const ids = new Set<MessageId>();
    let pageToken: string | undefined;

    do {
      if (signal?.aborted) break;

      const page = await this.mailbox.listMessageIds(accountId, pageToken, {
        pageSize: Math.min(settings.pageSize, settings.maxMessages - ids.size),
        query: settings.query
      });

      for (const id of page.ids) {
        if (ids.size >= settings.maxMessages) break;
        ids.add(id);
      }

      pageToken = page.nextPageToken;
    } while (pageToken && ids.size < settings.maxMessages);

    logger.debug({ accountId, count: ids.size }, 'Listed message ids');
    return [...ids];
  }
}
