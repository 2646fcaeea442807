import { OAuth2Client } from 'google-auth-library';
import { gmail_v1, google } from 'googleapis';
import {
  MailboxClient,
  TokenProvider,
  MessageId,
  RawHeaders,
  MessagePage,
  ListMessagesOptions,
  ErrorKind
} from '../types/mailbox';
import { AuthenticationError, MailboxError } from '../types/errors';
import pino from 'pino';

const logger = pino().child({ module: 'GmailMailbox' });

export const METADATA_HEADERS = [
  'From',
  'Subject',
  'Date',
  'List-Unsubscribe',
  'List-Unsubscribe-Post'
];

const RATE_LIMIT_REASONS = new Set(['rateLimitExceeded', 'userRateLimitExceeded']);

const NETWORK_ERROR_CODES = new Set([
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'EAI_AGAIN',
  'EPIPE'
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function statusOf(error: Record<string, unknown>): number | undefined {
  const response = error.response;
  if (isRecord(response) && typeof response.status === 'number') {
    return response.status;
  }
  if (typeof error.code === 'number') return error.code;
  if (typeof error.code === 'string' && /^\d{3}$/.test(error.code)) {
    return parseInt(error.code, 10);
  }
  return undefined;
}

function reasonsOf(error: Record<string, unknown>): string[] {
  const entries: unknown[] = Array.isArray(error.errors) ? error.errors : [];
  return entries.flatMap(entry =>
    isRecord(entry) && typeof entry.reason === 'string' ? [entry.reason] : []
  );
}

export function classifyGmailError(error: unknown): ErrorKind {
  if (error instanceof MailboxError) return error.kind;
  if (error instanceof AuthenticationError) return 'auth';
  if (!isRecord(error)) return 'malformed';

  const status = statusOf(error);
  if (status !== undefined) {
    if (status === 429) return 'rate_limited';
    if (status === 403 && reasonsOf(error).some(reason => RATE_LIMIT_REASONS.has(reason))) {
      return 'rate_limited';
    }
    if (status === 401 || status === 403) return 'auth';
    if (status === 404) return 'not_found';
    if (status === 408) return 'timeout';
    if (status >= 500) return 'service_unavailable';
    return 'malformed';
  }

  if (typeof error.code === 'string' && NETWORK_ERROR_CODES.has(error.code)) return 'timeout';
  if (error.name === 'AbortError' || error.name === 'TimeoutError') return 'timeout';

  return 'malformed';
}

export function toMailboxError(error: unknown): MailboxError {
  if (error instanceof MailboxError) return error;
  const message = error instanceof Error ? error.message : 'Unknown error';
  return new MailboxError(classifyGmailError(error), message);
}

export function createGmailClient(accessToken: string): gmail_v1.Gmail {
  const auth = new OAuth2Client();
  auth.setCredentials({ access_token: accessToken });
  // RetryPolicy owns retries; the transport must surface every failure once
  return google.gmail({ version: 'v1', auth, retry: false });
}

export function toRawHeaders(headers: gmail_v1.Schema$MessagePartHeader[]): RawHeaders {
  const raw: RawHeaders = {};

  headers.forEach(header => {
    if (!header.name || header.value === null || header.value === undefined) return;

    const name = header.name.toLowerCase();
    const existing = raw[name];
    if (existing === undefined) {
      raw[name] = header.value;
    } else {
      raw[name] = [...(Array.isArray(existing) ? existing : [existing]), header.value];
    }
  });

  return raw;
}

export class GmailMailboxClient implements MailboxClient {
  private readonly tokens: TokenProvider;

  constructor(tokens: TokenProvider) {
    this.tokens = tokens;
  }

  async listMessageIds(accountId: string, pageToken: string | undefined, options: ListMessagesOptions): Promise<MessagePage> {
    try {
      const gmail = await this.clientFor(accountId);
      const response = await gmail.users.messages.list({
        userId: 'me',
        maxResults: options.pageSize,
        pageToken,
        q: options.query,
        includeSpamTrash: false
      });

      const ids = (response.data.messages ?? []).flatMap(message => (message.id ? [message.id] : []));
      return { ids, nextPageToken: response.data.nextPageToken ?? undefined };
    } catch (error) {
      logger.error({ accountId, err: error }, 'Failed to list messages');
      throw toMailboxError(error);
    }
  }

  async getMessageMetadata(accountId: string, id: MessageId): Promise<RawHeaders> {
    try {
      const gmail = await this.clientFor(accountId);
      const response = await gmail.users.messages.get({
        userId: 'me',
        id,
        format: 'metadata',
        metadataHeaders: METADATA_HEADERS
      });

      return toRawHeaders(response.data.payload?.headers ?? []);
    } catch (error) {
      throw toMailboxError(error);
    }
  }

  private async clientFor(accountId: string): Promise<gmail_v1.Gmail> {
    return createGmailClient(await this.tokens.getValidAccessToken(accountId));
  }
}
