import { FastifyRequest, FastifyReply } from 'fastify';
import '@fastify/jwt';
import { AuthenticatedAccount } from './auth';

declare module 'fastify' {
  interface FastifyInstance {
    authenticate: (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | void>;
  }
}

declare module '@fastify/jwt' {
  interface FastifyJWT {
    payload: AuthenticatedAccount;
    user: AuthenticatedAccount;
  }
}

// Authenticated request helper type
export interface AuthenticatedRequest extends FastifyRequest {
  user: AuthenticatedAccount;
}
