const mockList = jest.fn();
const mockSetCredentials = jest.fn();
const mockRevokeToken = jest.fn();

jest.mock('googleapis', () => ({
  google: {
    gmail: jest.fn(() => ({
      users: { messages: { list: mockList, get: jest.fn() } }
    })),
    oauth2: jest.fn(),
  },
}));

jest.mock('google-auth-library', () => ({
  OAuth2Client: jest.fn().mockImplementation(() => ({
    setCredentials: mockSetCredentials,
    revokeToken: mockRevokeToken,
  })),
}));

import Fastify, { FastifyInstance } from 'fastify';
import jwt from '@fastify/jwt';
import { authRoutes } from '../../api/auth';
import { scanRoutes } from '../../api/scans';
import { GoogleOAuthService } from '../../auth/google-oauth';
import { AccountStore } from '../../db/accounts';
import { ScanStore } from '../../db/scans';
import { authenticate } from '../../utils/auth';
import { setupRateLimit } from '../../middleware/rate-limit';
import { MemoryRedis } from '../fixtures/memory-redis';

const HOUR_MS = 60 * 60 * 1000;

describe('Account lifecycle across routes', () => {
  let app: FastifyInstance;
  let accounts: AccountStore;
  let token: string;

  beforeEach(async () => {
    process.env.GOOGLE_CLIENT_ID = 'test-client-id';
    process.env.GOOGLE_CLIENT_SECRET = 'test-client-secret';
    process.env.ENCRYPTION_KEY = 'test-encryption-key-32-characters';

    const redis = new MemoryRedis();
    accounts = new AccountStore(redis);
    const googleOAuth = new GoogleOAuthService(redis, accounts);

    await accounts.save({
      accountId: 'user@example.com',
      accessToken: googleOAuth.encryptToken('stored-access-token'),
      expiresAt: new Date(Date.now() + HOUR_MS).toISOString(),
      addedAt: '2024-01-01T00:00:00.000Z'
    });

    mockList.mockResolvedValue({ data: { messages: [] } });
    mockRevokeToken.mockResolvedValue({});

    app = Fastify();
    await app.register(jwt, { secret: 'test-secret' });
    app.decorate('authenticate', authenticate);
    await setupRateLimit(app);
    await app.register(authRoutes, { prefix: '/auth', googleOAuth, accountStore: accounts });
    await app.register(scanRoutes, {
      prefix: '/api/scans',
      googleOAuth,
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

  const scan = () => app.inject({
    method: 'POST',
    url: '/api/scans',
    headers: { authorization: `Bearer ${token}` },
    payload: {}
  });

  it('should stop scanning with a token revoked by a disconnect', async () => {
    const first = await scan();
    expect(first.statusCode).toBe(201);
    expect(mockSetCredentials).toHaveBeenCalledWith({ access_token: 'stored-access-token' });

    const disconnect = await app.inject({
      method: 'DELETE',
      url: '/auth/accounts/user@example.com',
      headers: { authorization: `Bearer ${token}` }
    });
    expect(disconnect.statusCode).toBe(200);
    expect(mockRevokeToken).toHaveBeenCalledWith('stored-access-token');

    const second = await scan();

    expect(second.statusCode).toBe(401);
    expect(second.json()).toMatchObject({ code: 'MAILBOX_ERROR', details: { kind: 'auth' } });
    expect(mockList).toHaveBeenCalledTimes(1);
  });

  it('should list the accounts from the injected store', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/auth/accounts',
      headers: { authorization: `Bearer ${token}` }
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      accounts: [{ accountId: 'user@example.com', addedAt: '2024-01-01T00:00:00.000Z' }]
    });
  });
});
