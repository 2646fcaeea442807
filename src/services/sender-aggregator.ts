import { MessageSummary, SenderRecord, UnsubscribeTarget } from '../types/sender';
import pino from 'pino';

const logger = pino().child({ module: 'SenderAggregator' });

interface SenderAccumulator {
  senderAddress: string;
  displayName?: string;
  messageIds: Set<string>;
  hasUnsubscribeHeader: boolean;
  oneClickEligible: boolean;
  unsubscribeTarget?: UnsubscribeTarget;
  matchedKeyword: boolean;
  latestSubject?: string;
  latestSentAt?: Date;
}

export class SenderAggregator {
  private readonly senders = new Map<string, SenderAccumulator>();
  private readonly seenMessageIds = new Set<string>();

  /** Folds one summary in. Returns false if its message id was already folded. */
  add(summary: MessageSummary): boolean {
    if (this.seenMessageIds.has(summary.messageId)) {
      logger.debug({ messageId: summary.messageId }, 'Ignoring message folded twice');
      return false;
    }
    this.seenMessageIds.add(summary.messageId);

    // Grouped on the address exactly as parsed; no further canonicalization
    let sender = this.senders.get(summary.senderAddress);
    if (!sender) {
      sender = {
        senderAddress: summary.senderAddress,
        messageIds: new Set(),
        hasUnsubscribeHeader: false,
        oneClickEligible: false,
        matchedKeyword: false
      };
      this.senders.set(summary.senderAddress, sender);
    }

    sender.messageIds.add(summary.messageId);
    sender.hasUnsubscribeHeader ||= summary.listUnsubscribe !== undefined;
    sender.oneClickEligible ||= summary.oneClick;
    sender.matchedKeyword ||= summary.matchedKeyword;
    sender.unsubscribeTarget ??= summary.listUnsubscribe;
    sender.displayName ??= summary.displayName;

    if (summary.subject !== undefined) {
      const newer = summary.sentAt !== undefined &&
        (sender.latestSentAt === undefined || summary.sentAt > sender.latestSentAt);

      if (newer) {
        sender.latestSubject = summary.subject;
        sender.latestSentAt = summary.sentAt;
      } else if (sender.latestSubject === undefined) {
        sender.latestSubject = summary.subject;
      }
    }

    return true;
  }

  get size(): number {
    return this.senders.size;
  }

  records(): Map<string, SenderRecord> {
    const records = new Map<string, SenderRecord>();

    for (const [address, sender] of this.senders) {
      records.set(address, {
        senderAddress: sender.senderAddress,
        displayName: sender.displayName,
        messageIds: [...sender.messageIds],
        messageCount: sender.messageIds.size,
        hasUnsubscribeHeader: sender.hasUnsubscribeHeader,
        oneClickEligible: sender.oneClickEligible,
        unsubscribeTarget: sender.unsubscribeTarget,
        matchedKeyword: sender.matchedKeyword,
        latestSubject: sender.latestSubject,
        latestSentAt: sender.latestSentAt?.toISOString()
      });
    }

    return records;
  }
}

export function foldSummaries(summaries: Iterable<MessageSummary>): Map<string, SenderRecord> {
  const aggregator = new SenderAggregator();
  for (const summary of summaries) {
    aggregator.add(summary);
  }
  return aggregator.records();
}
