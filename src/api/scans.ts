import { FastifyPluginAsync } from 'fastify';
import { GoogleOAuthService } from '../auth/google-oauth';
import { AccountStore } from '../db/accounts';
import { ScanStore } from '../db/scans';
import { ScanService } from '../services/scan';
import { CleanupService } from '../services/cleanup';
import { GmailMailboxClient } from '../services/gmail-mailbox';
import { GmailActionsService } from '../services/gmail-actions';
import { HttpUnsubscribeClient } from '../services/unsubscribe-client';
import { planAction } from '../services/action-planner';
import { scanRequestSchema, scanParamsSchema, selectionRequestSchema, SelectionRequest } from '../schemas/scan';
import { AuthorizationError, NotFoundError, ValidationError, handleError } from '../types/errors';
import { PlannedAction, ScanReport, ScoredSender } from '../types/sender';
import { getAuthenticatedAccount } from '../utils/auth';
import { getScanDefaults } from '../utils/validation';
import { rateLimits } from '../middleware/rate-limit';
import pino from 'pino';

const logger = pino().child({ module: 'ScanRoutes' });

export interface ScanRoutesOptions {
  // Shared with the auth routes so a disconnect drops the cached token here too
  googleOAuth?: GoogleOAuthService;
  scanService?: ScanService;
  cleanupService?: CleanupService;
  scanStore?: ScanStore;
  accountStore?: AccountStore;
}

interface SenderPlan {
  sender: ScoredSender;
  action: PlannedAction;
}

function planSelections(report: ScanReport, request: SelectionRequest): SenderPlan[] {
  const senders = new Map(report.senders.map(sender => [sender.senderAddress, sender]));
  const unknown = request.selections
    .map(selection => selection.senderAddress)
    .filter(address => !senders.has(address));

  if (unknown.length > 0) {
    throw new ValidationError('Unknown senders for this scan', { senders: unknown });
  }

  return request.selections.flatMap(selection => {
    const sender = senders.get(selection.senderAddress);
    return sender ? [{ sender, action: planAction(sender, selection.intent) }] : [];
  });
}

export const scanRoutes: FastifyPluginAsync<ScanRoutesOptions> = async (fastify, options) => {
  const defaults = getScanDefaults();
  // Shared by the Gmail collaborators, created only when one of them is needed
  let googleOAuth = options.googleOAuth;
  const tokens = () => (googleOAuth ??= new GoogleOAuthService());

  const scanService = options.scanService ?? new ScanService(new GmailMailboxClient(tokens()));
  const cleanupService = options.cleanupService ?? (() => {
    const actions = new GmailActionsService(tokens());
    return new CleanupService({
      unsubscriber: new HttpUnsubscribeClient(),
      filters: actions,
      deleter: actions
    });
  })();
  const scanStore = options.scanStore ?? new ScanStore(defaults.SCAN_TTL_SECONDS);
  const accountStore = options.accountStore ?? new AccountStore();

  const loadReport = async (scanId: string, accountId: string): Promise<ScanReport> => {
    const report = await scanStore.find(scanId);
    if (!report) {
      throw new NotFoundError('Scan');
    }
    if (report.accountId !== accountId) {
      throw new AuthorizationError('Scan belongs to another account');
    }
    return report;
  };

  // Scan the authenticated account's mailbox
  fastify.post('/', {
    preHandler: [fastify.authenticate],
    config: { rateLimit: rateLimits.scan }
  }, async (request, reply) => {
    const controller = new AbortController();
    // A client that disconnects mid-scan cancels the remaining fetches
    const onClose = () => {
      if (!reply.raw.writableFinished) controller.abort();
    };
    reply.raw.on('close', onClose);

    try {
      const { accountId } = getAuthenticatedAccount(request);

      const bodyResult = scanRequestSchema.safeParse(request.body ?? {});
      if (!bodyResult.success) {
        throw new ValidationError('Invalid request body', bodyResult.error.errors);
      }
      const body = bodyResult.data;

      const report = await scanService.scan(accountId, {
        pageSize: body.pageSize ?? defaults.SCAN_PAGE_SIZE,
        maxMessages: body.maxMessages ?? defaults.SCAN_MAX_MESSAGES,
        concurrency: body.concurrency ?? defaults.FETCH_CONCURRENCY,
        query: body.query,
        includeIneligible: body.includeIneligible
      }, controller.signal);

      if (!(await scanStore.save(report))) {
        logger.warn({ scanId: report.scanId }, 'Scan report could not be stored');
      }
      await accountStore.markScanned(accountId, new Date(report.completedAt));

      return reply.status(201).send(report);
    } catch (error) {
      logger.error({ err: error }, 'Scan failed');
      const apiError = handleError(error);
      return reply.status(apiError.statusCode).send(apiError);
    } finally {
      reply.raw.off('close', onClose);
    }
  });

  // Fetch a stored scan report
  fastify.get('/:scanId', {
    preHandler: [fastify.authenticate]
  }, async (request, reply) => {
    try {
      const { accountId } = getAuthenticatedAccount(request);

      const paramsResult = scanParamsSchema.safeParse(request.params);
      if (!paramsResult.success) {
        throw new ValidationError('Invalid scan ID', paramsResult.error.errors);
      }

      return await loadReport(paramsResult.data.scanId, accountId);
    } catch (error) {
      logger.error({ err: error }, 'Failed to fetch scan');
      const apiError = handleError(error);
      return reply.status(apiError.statusCode).send(apiError);
    }
  });

  // Preview the actions for the selected senders
  fastify.post('/:scanId/plan', {
    preHandler: [fastify.authenticate]
  }, async (request, reply) => {
    try {
      const { accountId } = getAuthenticatedAccount(request);

      const paramsResult = scanParamsSchema.safeParse(request.params);
      if (!paramsResult.success) {
        throw new ValidationError('Invalid scan ID', paramsResult.error.errors);
      }
      const bodyResult = selectionRequestSchema.safeParse(request.body);
      if (!bodyResult.success) {
        throw new ValidationError('Invalid request body', bodyResult.error.errors);
      }

      const report = await loadReport(paramsResult.data.scanId, accountId);
      const plans = planSelections(report, bodyResult.data);

      return {
        scanId: report.scanId,
        actions: plans.map(({ sender, action }) => ({
          senderAddress: sender.senderAddress,
          messageCount: sender.messageCount,
          action
        }))
      };
    } catch (error) {
      logger.error({ err: error }, 'Failed to plan actions');
      const apiError = handleError(error);
      return reply.status(apiError.statusCode).send(apiError);
    }
  });

  // Plan and carry out the actions for the selected senders
  fastify.post('/:scanId/execute', {
    preHandler: [fastify.authenticate],
    config: { rateLimit: rateLimits.execute }
  }, async (request, reply) => {
    try {
      const { accountId } = getAuthenticatedAccount(request);

      const paramsResult = scanParamsSchema.safeParse(request.params);
      if (!paramsResult.success) {
        throw new ValidationError('Invalid scan ID', paramsResult.error.errors);
      }
      const bodyResult = selectionRequestSchema.safeParse(request.body);
      if (!bodyResult.success) {
        throw new ValidationError('Invalid request body', bodyResult.error.errors);
      }

      const report = await loadReport(paramsResult.data.scanId, accountId);
      const plans = planSelections(report, bodyResult.data);
      const results = await cleanupService.executeAll(accountId, plans);

      logger.info({
        accountId,
        scanId: report.scanId,
        senders: results.length,
        failures: results.filter(result => result.error).length
      }, 'Cleanup executed');

      return { scanId: report.scanId, results };
    } catch (error) {
      logger.error({ err: error }, 'Failed to execute actions');
      const apiError = handleError(error);
      return reply.status(apiError.statusCode).send(apiError);
    }
  });
};
