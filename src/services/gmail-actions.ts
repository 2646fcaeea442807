import { gmail_v1 } from 'googleapis';
import { FilterCreator, BatchDeleter, BatchDeleteResult, TokenProvider, MessageId } from '../types/mailbox';
import { createGmailClient, toMailboxError } from './gmail-mailbox';
import pino from 'pino';

const logger = pino().child({ module: 'GmailActions' });

export const BATCH_DELETE_LIMIT = 1000; // Gmail API limit per batchDelete call

// Provider-side blocking and bulk deletion for a Gmail account
export class GmailActionsService implements FilterCreator, BatchDeleter {
  private readonly tokens: TokenProvider;

  constructor(tokens: TokenProvider) {
    this.tokens = tokens;
  }

  async block(accountId: string, senderAddress: string): Promise<string> {
    try {
      const gmail = await this.clientFor(accountId);
      const response = await gmail.users.settings.filters.create({
        userId: 'me',
        requestBody: {
          criteria: { from: senderAddress },
          action: { addLabelIds: ['TRASH'], removeLabelIds: ['INBOX'] }
        }
      });

      logger.info({ accountId, senderAddress }, 'Created block filter');
      return response.data.id ?? '';
    } catch (error) {
      logger.error({ accountId, senderAddress, err: error }, 'Failed to create filter');
      throw toMailboxError(error);
    }
  }

  async delete(accountId: string, ids: MessageId[]): Promise<BatchDeleteResult> {
    const gmail = await this.clientFor(accountId);
    let deleted = 0;
    const failedIds: MessageId[] = [];

    for (let i = 0; i < ids.length; i += BATCH_DELETE_LIMIT) {
      const chunk = ids.slice(i, i + BATCH_DELETE_LIMIT);
      try {
        await gmail.users.messages.batchDelete({
          userId: 'me',
          requestBody: { ids: chunk }
        });
        deleted += chunk.length;
        logger.info({ accountId, count: chunk.length }, 'Deleted messages');
      } catch (error) {
        logger.error({ accountId, count: chunk.length, err: error }, 'Batch delete failed');
        failedIds.push(...chunk);
      }
    }

    return { deleted, failedIds };
  }

  private async clientFor(accountId: string): Promise<gmail_v1.Gmail> {
    return createGmailClient(await this.tokens.getValidAccessToken(accountId));
  }
}
