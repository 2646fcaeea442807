import { MessageId } from './mailbox';

export type UnsubscribeTarget =
  | { kind: 'http'; url: string }
  | { kind: 'mailto'; address: string }
  | { kind: 'unsupported' };

export interface MessageSummary {
  messageId: MessageId;
  senderAddress: string;
  displayName?: string;
  subject?: string;
  sentAt?: Date;
  listUnsubscribe?: UnsubscribeTarget;
  oneClick: boolean;
  matchedKeyword: boolean;
}

export interface SenderRecord {
  senderAddress: string;
  displayName?: string;
  messageIds: MessageId[];
  messageCount: number;
  hasUnsubscribeHeader: boolean;
  oneClickEligible: boolean;
  unsubscribeTarget?: UnsubscribeTarget;
  matchedKeyword: boolean;
  latestSubject?: string;
  latestSentAt?: string;
}

export interface ScoredSender extends SenderRecord {
  score: number;
  eligible: boolean;
}

export type UserIntent = 'unsubscribe_if_possible' | 'block_only' | 'delete_only' | 'skip';

export type PlannedAction =
  | { type: 'unsubscribe_then_delete'; target: UnsubscribeTarget & { kind: 'http' } }
  | { type: 'block_then_delete' }
  | { type: 'delete_only' }
  | { type: 'skip' };

export interface ScanOptions {
  pageSize: number;
  maxMessages: number;
  concurrency: number;
  query?: string;
  includeIneligible: boolean;
}

export interface ScanReport {
  scanId: string;
  accountId: string;
  startedAt: string;
  completedAt: string;
  cancelled: boolean;
  totalMessages: number;
  fetchedMessages: number;
  failedMessages: number;
  omittedMessages: number;
  senders: ScoredSender[];
}

export interface CleanupResult {
  senderAddress: string;
  action: PlannedAction['type'];
  unsubscribed: boolean;
  blocked: boolean;
  messagesDeleted: number;
  failedDeletes: MessageId[];
  error?: string;
}
