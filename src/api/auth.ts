import { FastifyPluginAsync } from 'fastify';
import { GoogleOAuthService } from '../auth/google-oauth';
import { AccountStore } from '../db/accounts';
import { schemas } from '../utils/validation';
import { getAuthenticatedAccount } from '../utils/auth';
import { AuthorizationError, NotFoundError, ValidationError, handleError } from '../types/errors';
import { AccountSummary } from '../types/auth';
import { rateLimits } from '../middleware/rate-limit';
import pino from 'pino';

const logger = pino().child({ module: 'AuthRoutes' });

export interface AuthRoutesOptions {
  googleOAuth?: GoogleOAuthService;
  accountStore?: AccountStore;
}

export const authRoutes: FastifyPluginAsync<AuthRoutesOptions> = async (fastify, options) => {
  const googleOAuth = options.googleOAuth ?? new GoogleOAuthService();
  const accounts = options.accountStore ?? new AccountStore();

  // Gmail OAuth initiation
  fastify.get('/gmail', { config: { rateLimit: rateLimits.oauth } }, async (_request, reply) => {
    try {
      const { url, state } = await googleOAuth.generateAuthUrl();

      logger.info({ state }, 'Gmail OAuth initiated');

      return reply.redirect(url);
    } catch (error) {
      logger.error({ err: error }, 'Gmail OAuth initiation failed');
      const apiError = handleError(error);
      return reply.status(apiError.statusCode).send(apiError);
    }
  });

  // Gmail OAuth callback
  fastify.get('/gmail/callback', { config: { rateLimit: rateLimits.oauth } }, async (request, reply) => {
    try {
      const queryResult = schemas.oauthCallback.safeParse(request.query);
      if (!queryResult.success) {
        throw new ValidationError('Invalid callback parameters', queryResult.error.errors);
      }
      const query = queryResult.data;

      if (query.error) {
        logger.warn({ error: query.error, description: query.error_description }, 'Gmail OAuth error');
        throw new ValidationError('OAuth authorization failed', query.error_description || query.error);
      }

      if (!query.code) {
        throw new ValidationError('Missing authorization code');
      }

      const accountId = await googleOAuth.connectAccount(query.code, query.state);
      const token = fastify.jwt.sign({ accountId });

      return { success: true, accountId, token };
    } catch (error) {
      logger.error({ err: error }, 'Gmail OAuth callback failed');
      const apiError = handleError(error);
      return reply.status(apiError.statusCode).send(apiError);
    }
  });

  // Get connected accounts
  fastify.get('/accounts', {
    preHandler: [fastify.authenticate]
  }, async (request, reply) => {
    try {
      getAuthenticatedAccount(request);

      const stored = await accounts.list();
      const summaries: AccountSummary[] = stored.map(account => ({
        accountId: account.accountId,
        addedAt: account.addedAt,
        lastScannedAt: account.lastScannedAt
      }));

      return { accounts: summaries };
    } catch (error) {
      logger.error({ err: error }, 'Failed to fetch accounts');
      const apiError = handleError(error);
      return reply.status(apiError.statusCode).send(apiError);
    }
  });

  // Disconnect account
  fastify.delete('/accounts/:accountId', {
    preHandler: [fastify.authenticate]
  }, async (request, reply) => {
    try {
      const user = getAuthenticatedAccount(request);

      const paramsResult = schemas.accountId.safeParse(request.params);
      if (!paramsResult.success) {
        throw new ValidationError('Invalid account ID', paramsResult.error.errors);
      }
      const { accountId } = paramsResult.data;

      if (accountId !== user.accountId) {
        throw new AuthorizationError('Accounts can only disconnect themselves');
      }

      const removed = await googleOAuth.disconnectAccount(accountId);
      if (!removed) {
        throw new NotFoundError('Account');
      }

      logger.info({ accountId }, 'Account disconnected');

      return { success: true, message: 'Account disconnected successfully' };
    } catch (error) {
      logger.error({ err: error }, 'Failed to disconnect account');
      const apiError = handleError(error);
      return reply.status(apiError.statusCode).send(apiError);
    }
  });
};
