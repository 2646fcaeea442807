import { ErrorKind, TransientErrorKind } from '../types/mailbox';

export type RetryDecision =
  | { type: 'retry'; afterMs: number }
  | { type: 'give_up' };

export interface RetryPolicyConfig {
  maxRetries: number;
  baseDelayMs: number;
}

const TRANSIENT_KINDS: ReadonlySet<ErrorKind> = new Set<TransientErrorKind>([
  'rate_limited',
  'service_unavailable',
  'timeout'
]);

export function isTransient(kind: ErrorKind): kind is TransientErrorKind {
  return TRANSIENT_KINDS.has(kind);
}

/**
 * Decides whether a failed metadata fetch is worth another attempt.
 *
 * Backoff is exponential without jitter: attempt 0, 1, 2 wait 100, 200, 400 ms
 * with the defaults, and a fourth failure gives up. Permanent kinds give up
 * immediately. The caller performs the wait.
 */
export class RetryPolicy {
  private readonly config: RetryPolicyConfig;

  constructor(config?: Partial<RetryPolicyConfig>) {
    this.config = {
      maxRetries: 3,
      baseDelayMs: 100,
      ...config
    };
  }

  decide(attempt: number, kind: ErrorKind): RetryDecision {
    if (!isTransient(kind) || attempt >= this.config.maxRetries) {
      return { type: 'give_up' };
    }

    return { type: 'retry', afterMs: this.config.baseDelayMs * 2 ** attempt };
  }
}
