// Mailbox-facing types shared by the fetch pipeline and its collaborators

export type MessageId = string;

export interface RawHeaders {
  [name: string]: string | string[] | undefined;
}

export type TransientErrorKind = 'rate_limited' | 'service_unavailable' | 'timeout';
export type PermanentErrorKind = 'auth' | 'not_found' | 'malformed';
export type ErrorKind = TransientErrorKind | PermanentErrorKind;

export type FetchOutcome =
  | { status: 'ok'; headers: RawHeaders }
  | { status: 'failed'; kind: ErrorKind };

export interface ListMessagesOptions {
  pageSize: number;
  query?: string;
}

export interface MessagePage {
  ids: MessageId[];
  nextPageToken?: string;
}

export interface TokenProvider {
  getValidAccessToken(accountId: string): Promise<string>;
}

export interface MailboxClient {
  listMessageIds(accountId: string, pageToken: string | undefined, options: ListMessagesOptions): Promise<MessagePage>;
  /** Rejects with a MailboxError carrying the failure kind. */
  getMessageMetadata(accountId: string, id: MessageId): Promise<RawHeaders>;
}

export interface UnsubscribeExecutor {
  /** HTTPS only. */
  post(url: string): Promise<void>;
}

export interface FilterCreator {
  block(accountId: string, senderAddress: string): Promise<string>;
}

export interface BatchDeleteResult {
  deleted: number;
  failedIds: MessageId[];
}

export interface BatchDeleter {
  delete(accountId: string, ids: MessageId[]): Promise<BatchDeleteResult>;
}
