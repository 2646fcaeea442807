import { MessageId, RawHeaders } from '../types/mailbox';
import { MessageSummary, UnsubscribeTarget } from '../types/sender';
import { parseEmailDate } from '../utils/email-date';
import { parseFromHeader, localPart, UNKNOWN_SENDER } from '../utils/email-address';

export const SENDER_KEYWORDS = [
  'newsletter',
  'noreply',
  'no-reply',
  'notification',
  'promo',
  'marketing',
  'news',
  'info',
  'updates'
] as const;

export const ONE_CLICK_POST_VALUE = 'List-Unsubscribe=One-Click';

// Lower rank wins
const TARGET_RANK: Record<string, number> = {
  'https:': 0,
  'http:': 1,
  'mailto:': 2
};

/** First value of a header, looked up case-insensitively. */
export function getHeader(raw: RawHeaders, name: string): string | undefined {
  return getHeaderValues(raw, name)[0];
}

export function getHeaderValues(raw: RawHeaders, name: string): string[] {
  const wanted = name.toLowerCase();
  const values: string[] = [];

  for (const [key, value] of Object.entries(raw)) {
    if (key.toLowerCase() !== wanted || value === undefined) continue;
    values.push(...(Array.isArray(value) ? value : [value]));
  }

  return values;
}

function toTarget(candidate: string): { rank: number; target: UnsubscribeTarget } | undefined {
  try {
    const url = new URL(candidate);
    const rank = TARGET_RANK[url.protocol];
    if (rank === undefined) return undefined;

    if (url.protocol === 'mailto:') {
      const address = decodeURIComponent(url.pathname).trim();
      return address ? { rank, target: { kind: 'mailto', address } } : undefined;
    }

    return { rank, target: { kind: 'http', url: candidate } };
  } catch {
    // unparsable URL or escape sequence
    return undefined;
  }
}

/**
 * Picks one target from a List-Unsubscribe value: https, then http, then
 * mailto. A present header with nothing usable yields `unsupported`.
 */
export function selectUnsubscribeTarget(values: string[]): UnsubscribeTarget | undefined {
  const joined = values.join(',').trim();
  if (!joined) return undefined;

  const bracketed = [...joined.matchAll(/<([^>]*)>/g)].map(match => match[1].trim());
  const candidates = bracketed.length > 0
    ? bracketed
    : joined.split(',').map(part => part.trim());

  let best: { rank: number; target: UnsubscribeTarget } | undefined;
  for (const candidate of candidates) {
    const resolved = toTarget(candidate);
    if (resolved && (!best || resolved.rank < best.rank)) {
      best = resolved;
    }
  }

  return best ? best.target : { kind: 'unsupported' };
}

export function matchesSenderKeyword(senderAddress: string): boolean {
  const local = localPart(senderAddress).toLowerCase();
  return SENDER_KEYWORDS.some(keyword => local.includes(keyword));
}

/**
 * Builds a MessageSummary from raw headers. Never throws: a field that cannot
 * be read falls back to its default and the summary is still produced.
 */
export function parseHeaders(messageId: MessageId, raw: RawHeaders): MessageSummary {
  const from = parseFromHeader(getHeader(raw, 'from'));
  const senderAddress = from?.address ?? UNKNOWN_SENDER;

  const subject = getHeader(raw, 'subject')?.trim() || undefined;
  const sentAt = parseEmailDate(getHeader(raw, 'date'));

  const listUnsubscribe = selectUnsubscribeTarget(getHeaderValues(raw, 'list-unsubscribe'));
  const postValue = getHeader(raw, 'list-unsubscribe-post')?.trim();
  const oneClick = postValue === ONE_CLICK_POST_VALUE && listUnsubscribe?.kind === 'http';

  return {
    messageId,
    senderAddress,
    displayName: from?.displayName,
    subject,
    sentAt,
    listUnsubscribe,
    oneClick,
    matchedKeyword: matchesSenderKeyword(senderAddress)
  };
}
