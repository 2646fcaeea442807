import { FastifyRequest, FastifyReply } from 'fastify';
import type { AuthenticatedRequest } from '../types/fastify';
import { AuthenticatedAccount } from '../types/auth';
import { AuthenticationError } from '../types/errors';

export function isAuthenticatedRequest(request: FastifyRequest): request is AuthenticatedRequest {
  const user: unknown = request.user;
  return !!user &&
         typeof user === 'object' &&
         'accountId' in user &&
         typeof user.accountId === 'string';
}

export function getAuthenticatedAccount(request: FastifyRequest): AuthenticatedAccount {
  if (!isAuthenticatedRequest(request)) {
    throw new AuthenticationError('Request is not authenticated');
  }
  return request.user;
}

// JWT authentication hook
export async function authenticate(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | void> {
  try {
    await request.jwtVerify();
  } catch {
    return reply.status(401).send(new AuthenticationError('Unauthorized').toAPIError());
  }
}
