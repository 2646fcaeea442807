import { UnsubscribeExecutor, FilterCreator, BatchDeleter } from '../types/mailbox';
import { ScoredSender, PlannedAction, CleanupResult } from '../types/sender';
import { isSafeUnsubscribeUrl } from './unsubscribe-client';
import pino from 'pino';

const logger = pino().child({ module: 'CleanupService' });

export interface CleanupCollaborators {
  unsubscriber: UnsubscribeExecutor;
  filters: FilterCreator;
  deleter: BatchDeleter;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

/**
 * Carries out planned actions one sender at a time. A failing step is
 * recorded on that sender's result and never stops the remaining senders.
 */
export class CleanupService {
  private readonly collaborators: CleanupCollaborators;

  constructor(collaborators: CleanupCollaborators) {
    this.collaborators = collaborators;
  }

  async execute(accountId: string, sender: ScoredSender, action: PlannedAction): Promise<CleanupResult> {
    const result: CleanupResult = {
      senderAddress: sender.senderAddress,
      action: action.type,
      unsubscribed: false,
      blocked: false,
      messagesDeleted: 0,
      failedDeletes: []
    };
    const errors: string[] = [];

    if (action.type === 'skip') {
      return result;
    }

    if (action.type === 'unsubscribe_then_delete') {
      result.unsubscribed = await this.unsubscribe(action.target.url, errors);
    }

    const shouldBlock = action.type === 'block_then_delete' ||
      (action.type === 'unsubscribe_then_delete' && !result.unsubscribed);

    if (shouldBlock) {
      try {
        await this.collaborators.filters.block(accountId, sender.senderAddress);
        result.blocked = true;
      } catch (error) {
        errors.push(`Filter creation failed: ${describe(error)}`);
      }
    }

    try {
      const deletion = await this.collaborators.deleter.delete(accountId, sender.messageIds);
      result.messagesDeleted = deletion.deleted;
      result.failedDeletes = deletion.failedIds;
      if (deletion.failedIds.length > 0) {
        errors.push(`${deletion.failedIds.length} messages could not be deleted`);
      }
    } catch (error) {
      result.failedDeletes = [...sender.messageIds];
      errors.push(`Deletion failed: ${describe(error)}`);
    }

    if (errors.length > 0) {
      result.error = errors.join('; ');
      logger.warn({ accountId, senderAddress: sender.senderAddress, error: result.error }, 'Cleanup finished with errors');
    } else {
      logger.info({ accountId, senderAddress: sender.senderAddress, action: action.type }, 'Cleanup completed');
    }

    return result;
  }

  async executeAll(
    accountId: string,
    plans: Array<{ sender: ScoredSender; action: PlannedAction }>
  ): Promise<CleanupResult[]> {
    const results: CleanupResult[] = [];
    for (const { sender, action } of plans) {
      results.push(await this.execute(accountId, sender, action));
    }
    return results;
  }

  private async unsubscribe(url: string, errors: string[]): Promise<boolean> {
    if (!isSafeUnsubscribeUrl(url)) {
      errors.push('Unsubscribe skipped: target is not HTTPS');
      return false;
    }

    try {
      await this.collaborators.unsubscriber.post(url);
      return true;
    } catch (error) {
      errors.push(`Unsubscribe failed: ${describe(error)}`);
      return false;
    }
  }
}
