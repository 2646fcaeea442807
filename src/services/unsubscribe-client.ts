import { UnsubscribeExecutor } from '../types/mailbox';
import { ValidationError, ExternalServiceError } from '../types/errors';
import pino from 'pino';

const logger = pino().child({ module: 'UnsubscribeClient' });

const REQUEST_TIMEOUT_MS = 10_000;

export function isSafeUnsubscribeUrl(url: string): boolean {
  try {
    return new URL(url).protocol === 'https:';
  } catch {
    return false;
  }
}

// RFC 8058 one-click unsubscribe: a form-encoded POST to the advertised URL
export class HttpUnsubscribeClient implements UnsubscribeExecutor {
  async post(url: string): Promise<void> {
    if (!isSafeUnsubscribeUrl(url)) {
      throw new ValidationError('Only HTTPS unsubscribe URLs are allowed', { url });
    }

    const response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: 'List-Unsubscribe=One-Click',
      redirect: 'follow',
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS)
    });

    if (!response.ok) {
      logger.warn({ url, status: response.status }, 'Unsubscribe request rejected');
      throw new ExternalServiceError('unsubscribe', `HTTP ${response.status}`);
    }

    logger.info({ url }, 'Unsubscribed via one-click POST');
  }
}
