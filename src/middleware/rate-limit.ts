import rateLimit, { RateLimitOptions } from '@fastify/rate-limit';
import { FastifyInstance } from 'fastify';

function limitExceeded(message: string) {
  return () => ({
    error: 'RateLimitExceeded',
    message,
    code: 'RATE_LIMIT_EXCEEDED',
    statusCode: 429
  });
}

// Per-route limits, applied through each route's `config.rateLimit`
export const rateLimits = {
  // OAuth endpoints - strict limits
  oauth: {
    max: 5,
    timeWindow: '15 minutes',
    errorResponseBuilder: limitExceeded('Too many OAuth attempts. Please try again later.')
  },
  // Scans hit the mailbox API hard - moderate limits
  scan: {
    max: 10,
    timeWindow: '1 hour',
    errorResponseBuilder: limitExceeded('Too many scan requests. Please try again later.')
  },
  // Cleanup executes destructive actions
  execute: {
    max: 20,
    timeWindow: '1 hour',
    errorResponseBuilder: limitExceeded('Too many cleanup requests. Please try again later.')
  }
} satisfies Record<string, RateLimitOptions>;

export const setupRateLimit = async (fastify: FastifyInstance) => {
  await fastify.register(rateLimit, {
    global: false, // Only routes that declare a limit
  });
};
