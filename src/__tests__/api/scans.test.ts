import Fastify, { FastifyInstance } from 'fastify';
import jwt from '@fastify/jwt';
import { scanRoutes } from '../../api/scans';
import { authenticate } from '../../utils/auth';
import { setupRateLimit } from '../../middleware/rate-limit';
import { ScanService } from '../../services/scan';
import { BoundedFetcher } from '../../services/bounded-fetcher';
import { CleanupService } from '../../services/cleanup';
import { ScanStore } from '../../db/scans';
import { AccountStore } from '../../db/accounts';
import { MailboxClient, MessagePage, RawHeaders } from '../../types/mailbox';
import { ScanReport } from '../../types/sender';
import { MemoryRedis } from '../fixtures/memory-redis';
import { testHeaders } from '../fixtures/test-headers';

const messages: Record<string, RawHeaders> = {
  n1: testHeaders.newsletter,
  p1: testHeaders.mailtoOnly,
  a1: testHeaders.personal
};

// Single-page mailbox served from the fixtures
const mailbox: MailboxClient = {
  async listMessageIds(): Promise<MessagePage> {
    return { ids: Object.keys(messages) };
  },
  async getMessageMetadata(_accountId: string, id: string): Promise<RawHeaders> {
    return messages[id];
  }
};

describe('Scan API Routes', () => {
  let app: FastifyInstance;
  let redis: MemoryRedis;
  let accounts: AccountStore;
  let token: string;
  const unsubscriber = { post: jest.fn() };
  const filters = { block: jest.fn() };
  const deleter = { delete: jest.fn() };

  beforeEach(async () => {
    redis = new MemoryRedis();
    accounts = new AccountStore(redis);
    await accounts.save({
      accountId: 'user@example.com',
      accessToken: 'encrypted-placeholder',
      addedAt: '2024-01-01T00:00:00.000Z'
    });

    unsubscriber.post.mockResolvedValue(undefined);
    filters.block.mockResolvedValue('filter-1');
    deleter.delete.mockImplementation(async (_accountId: string, ids: string[]) => ({ deleted: ids.length, failedIds: [] }));

    app = Fastify();
    await app.register(jwt, { secret: 'test-secret' });
    app.decorate('authenticate', authenticate);
    await setupRateLimit(app);
    await app.register(scanRoutes, {
      prefix: '/api/scans',
      scanService: new ScanService(mailbox, new BoundedFetcher(mailbox, { sleep: async () => undefined })),
      cleanupService: new CleanupService({ unsubscriber, filters, deleter }),
      scanStore: new ScanStore(3600, redis),
      accountStore: accounts
    });
    await app.ready();

    token = app.jwt.sign({ accountId: 'user@example.com' });
  });

  afterEach(async () => {
    await app.close();
    jest.clearAllMocks();
  });

  const authHeaders = (accountId = 'user@example.com') => ({
    authorization: `Bearer ${accountId === 'user@example.com' ? token : app.jwt.sign({ accountId })}`
  });

  async function runScan(): Promise<ScanReport> {
    const response = await app.inject({
      method: 'POST',
      url: '/api/scans',
      headers: authHeaders(),
      payload: {}
    });
    return response.json();
  }

  describe('POST /api/scans', () => {
    it('should require authentication', async () => {
      const response = await app.inject({ method: 'POST', url: '/api/scans', payload: {} });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toMatchObject({ code: 'AUTHENTICATION_ERROR' });
    });

    it('should scan the mailbox and store the report', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/scans',
        headers: authHeaders(),
        payload: {}
      });

      expect(response.statusCode).toBe(201);
      const report: ScanReport = response.json();
      expect(report.accountId).toBe('user@example.com');
      expect(report.totalMessages).toBe(3);
      expect(report.senders.map(sender => sender.senderAddress))
        .toEqual(['newsletter@example.com', 'promo@shop.test']);

      expect(await redis.get(`scan:${report.scanId}`)).toEqual(report);
      expect(redis.ttls.get(`scan:${report.scanId}`)).toBe(3600);
      expect((await accounts.find('user@example.com'))?.lastScannedAt).toBe(report.completedAt);
    });

    it('should include ineligible senders on request', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/scans',
        headers: authHeaders(),
        payload: { includeIneligible: true }
      });

      const report: ScanReport = response.json();
      expect(report.senders).toHaveLength(3);
      expect(report.senders[2]).toMatchObject({ senderAddress: 'alice@friends.test', eligible: false });
    });

    it('should validate scan options', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/scans',
        headers: authHeaders(),
        payload: { concurrency: 0 }
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ code: 'VALIDATION_ERROR', message: 'Invalid request body' });
    });
  });

  describe('GET /api/scans/:scanId', () => {
    it('should return a stored report', async () => {
      const report = await runScan();

      const response = await app.inject({
        method: 'GET',
        url: `/api/scans/${report.scanId}`,
        headers: authHeaders()
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual(report);
    });

    it('should return 404 for an unknown scan', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/scans/00000000-0000-4000-8000-000000000000',
        headers: authHeaders()
      });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toMatchObject({ message: 'Scan not found' });
    });

    it('should reject a malformed scan id', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/scans/not-a-uuid', headers: authHeaders() });

      expect(response.statusCode).toBe(400);
    });

    it('should not show a scan to another account', async () => {
      const report = await runScan();

      const response = await app.inject({
        method: 'GET',
        url: `/api/scans/${report.scanId}`,
        headers: authHeaders('other@example.com')
      });

      expect(response.statusCode).toBe(403);
    });
  });

  describe('POST /api/scans/:scanId/plan', () => {
    it('should plan an action per selected sender', async () => {
      const report = await runScan();

      const response = await app.inject({
        method: 'POST',
        url: `/api/scans/${report.scanId}/plan`,
        headers: authHeaders(),
        payload: {
          selections: [
            { senderAddress: 'Newsletter@Example.com', intent: 'unsubscribe_if_possible' },
            { senderAddress: 'promo@shop.test', intent: 'unsubscribe_if_possible' }
          ]
        }
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        scanId: report.scanId,
        actions: [
          {
            senderAddress: 'newsletter@example.com',
            messageCount: 1,
            action: {
              type: 'unsubscribe_then_delete',
              target: { kind: 'http', url: 'https://example.com/unsub?id=42' }
            }
          },
          {
            senderAddress: 'promo@shop.test',
            messageCount: 1,
            action: { type: 'block_then_delete' }
          }
        ]
      });
      expect(deleter.delete).not.toHaveBeenCalled();
    });

    it('should reject senders that are not in the scan', async () => {
      const report = await runScan();

      const response = await app.inject({
        method: 'POST',
        url: `/api/scans/${report.scanId}/plan`,
        headers: authHeaders(),
        payload: { selections: [{ senderAddress: 'nobody@example.com', intent: 'delete_only' }] }
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({
        message: 'Unknown senders for this scan',
        details: { senders: ['nobody@example.com'] }
      });
    });

    it('should reject an unknown intent', async () => {
      const report = await runScan();

      const response = await app.inject({
        method: 'POST',
        url: `/api/scans/${report.scanId}/plan`,
        headers: authHeaders(),
        payload: { selections: [{ senderAddress: 'promo@shop.test', intent: 'archive' }] }
      });

      expect(response.statusCode).toBe(400);
    });
  });

  describe('POST /api/scans/:scanId/execute', () => {
    it('should carry out the planned actions', async () => {
      const report = await runScan();

      const response = await app.inject({
        method: 'POST',
        url: `/api/scans/${report.scanId}/execute`,
        headers: authHeaders(),
        payload: {
          selections: [
            { senderAddress: 'newsletter@example.com', intent: 'unsubscribe_if_possible' },
            { senderAddress: 'promo@shop.test', intent: 'block_only' }
          ]
        }
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        scanId: report.scanId,
        results: [
          {
            senderAddress: 'newsletter@example.com',
            action: 'unsubscribe_then_delete',
            unsubscribed: true,
            blocked: false,
            messagesDeleted: 1,
            failedDeletes: []
          },
          {
            senderAddress: 'promo@shop.test',
            action: 'block_then_delete',
            unsubscribed: false,
            blocked: true,
            messagesDeleted: 1,
            failedDeletes: []
          }
        ]
      });
      expect(unsubscriber.post).toHaveBeenCalledWith('https://example.com/unsub?id=42');
      expect(filters.block).toHaveBeenCalledWith('user@example.com', 'promo@shop.test');
      expect(deleter.delete).toHaveBeenCalledWith('user@example.com', ['n1']);
    });

    it('should require at least one selection', async () => {
      const report = await runScan();

      const response = await app.inject({
        method: 'POST',
        url: `/api/scans/${report.scanId}/execute`,
        headers: authHeaders(),
        payload: { selections: [] }
      });

      expect(response.statusCode).toBe(400);
      expect(deleter.delete).not.toHaveBeenCalled();
    });
  });
});
