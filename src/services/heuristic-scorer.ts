import { SenderRecord, ScoredSender } from '../types/sender';

export const SCORE_WEIGHTS = {
  unsubscribeHeader: 0.5,
  keyword: 0.3,
  moreThanFive: 0.2,
  moreThanTwenty: 0.3,
  subject: 0.1
} as const;

export const ELIGIBILITY_THRESHOLD = 0.6;

const SUBJECT_MARKERS = ['unsubscribe', 'newsletter'];

/**
 * Additive newsletter-likelihood score. Both volume tiers apply to senders
 * with more than 20 messages. Not clamped above.
 */
export function scoreSender(record: SenderRecord): number {
  let score = 0;

  if (record.hasUnsubscribeHeader) score += SCORE_WEIGHTS.unsubscribeHeader;
  if (record.matchedKeyword) score += SCORE_WEIGHTS.keyword;
  if (record.messageCount > 5) score += SCORE_WEIGHTS.moreThanFive;
  if (record.messageCount > 20) score += SCORE_WEIGHTS.moreThanTwenty;

  const subject = record.latestSubject?.toLowerCase();
  if (subject && SUBJECT_MARKERS.some(marker => subject.includes(marker))) {
    score += SCORE_WEIGHTS.subject;
  }

  // Weights are tenths; rounding drops float noise like 1.4000000000000001
  return Math.round(score * 100) / 100;
}

export function isEligible(score: number, record: SenderRecord): boolean {
  return score >= ELIGIBILITY_THRESHOLD || record.hasUnsubscribeHeader;
}

export function toScoredSender(record: SenderRecord): ScoredSender {
  const score = scoreSender(record);
  return { ...record, score, eligible: isEligible(score, record) };
}

// Descending score, then descending message count, then address
export function compareScoredSenders(a: ScoredSender, b: ScoredSender): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.messageCount !== b.messageCount) return b.messageCount - a.messageCount;
  if (a.senderAddress < b.senderAddress) return -1;
  if (a.senderAddress > b.senderAddress) return 1;
  return 0;
}
