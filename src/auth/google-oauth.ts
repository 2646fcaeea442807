import { OAuth2Client } from 'google-auth-library';
import { google } from 'googleapis';
import { OAuthTokens, OAuthState, StoredAccount } from '../types/auth';
import { TokenProvider } from '../types/mailbox';
import { AuthenticationError, ValidationError } from '../types/errors';
import { RedisService, RedisStore } from '../db/redis';
import { AccountStore } from '../db/accounts';
import pino from 'pino';
import crypto from 'crypto';

const logger = pino().child({ module: 'GoogleOAuth' });

export const GMAIL_SCOPES = [
  'https://mail.google.com/', // batchDelete needs the full scope
  'https://www.googleapis.com/auth/gmail.settings.basic',
  'https://www.googleapis.com/auth/userinfo.email'
];

// Refresh this long before Google's stated expiry
const EXPIRY_SKEW_MS = 60_000;
const STATE_TTL_SECONDS = 600;

interface CachedToken {
  accessToken: string;
  expiresAt?: number;
}

export class GoogleOAuthService implements TokenProvider {
  private readonly redisService: RedisStore;
  private readonly accounts: AccountStore;
  private readonly tokenCache = new Map<string, CachedToken>();
  // One lookup or refresh per account at a time; concurrent callers share it
  private readonly pendingTokens = new Map<string, Promise<string>>();

  constructor(redisService: RedisStore = RedisService.getInstance(), accounts?: AccountStore) {
    this.redisService = redisService;
    this.accounts = accounts ?? new AccountStore(redisService);
  }

  private getRedirectUri(): string {
    return process.env.GOOGLE_REDIRECT_URI ?? `http://localhost:${process.env.PORT ?? '3000'}/auth/gmail/callback`;
  }

  private createClient(): OAuth2Client {
    return new OAuth2Client(
      process.env.GOOGLE_CLIENT_ID,
      process.env.GOOGLE_CLIENT_SECRET,
      this.getRedirectUri()
    );
  }

  async generateAuthUrl(redirectUrl?: string): Promise<{ url: string; state: string }> {
    const state: OAuthState = {
      provider: 'gmail',
      redirectUrl,
      timestamp: Date.now(),
    };

    const stateString = crypto.randomBytes(32).toString('hex');

    await this.redisService.set(`oauth_state:${stateString}`, state, STATE_TTL_SECONDS);

    const url = this.createClient().generateAuthUrl({
      access_type: 'offline',
      scope: GMAIL_SCOPES,
      state: stateString,
      prompt: 'consent', // Force refresh token
    });

    logger.info({ state: stateString }, 'Generated Gmail OAuth URL');

    return { url, state: stateString };
  }

  async handleCallback(code: string, state: string): Promise<{ tokens: OAuthTokens; email: string }> {
    const storedState = await this.redisService.get<OAuthState>(`oauth_state:${state}`);
    if (!storedState || storedState.provider !== 'gmail') {
      throw new ValidationError('Invalid or expired OAuth state');
    }

    await this.redisService.delete(`oauth_state:${state}`);

    const client = this.createClient();
    const { tokens } = await client.getToken(code);

    if (!tokens.access_token) {
      throw new AuthenticationError('No access token received');
    }

    client.setCredentials(tokens);
    const oauth2 = google.oauth2({ version: 'v2', auth: client });
    const userInfo = await oauth2.userinfo.get();

    if (!userInfo.data.email) {
      throw new ValidationError('Email not provided by OAuth provider');
    }

    logger.info({ email: userInfo.data.email, hasRefreshToken: !!tokens.refresh_token }, 'Gmail OAuth callback successful');

    return {
      tokens: {
        accessToken: tokens.access_token,
        refreshToken: tokens.refresh_token ?? undefined,
        expiresAt: tokens.expiry_date ? new Date(tokens.expiry_date) : undefined,
        scope: tokens.scope ?? undefined,
      },
      email: userInfo.data.email.toLowerCase()
    };
  }

  /** Completes the OAuth flow and stores the account. Returns its id. */
  async connectAccount(code: string, state: string): Promise<string> {
    const { tokens, email } = await this.handleCallback(code, state);
    const existing = await this.accounts.find(email);

    await this.accounts.save({
      ...this.toStoredTokens(email, tokens, existing?.refreshToken),
      addedAt: existing?.addedAt ?? new Date().toISOString(),
      lastScannedAt: existing?.lastScannedAt
    });
    this.tokenCache.delete(email);

    logger.info({ accountId: email }, 'Account connected');
    return email;
  }

  async disconnectAccount(accountId: string): Promise<boolean> {
    const account = await this.accounts.find(accountId);
    if (!account) return false;

    try {
      await this.revokeToken(this.decryptToken(account.accessToken));
    } catch (error) {
      logger.warn({ accountId, err: error }, 'Failed to revoke token');
    }

    this.tokenCache.delete(accountId);
    this.pendingTokens.delete(accountId);
    return this.accounts.remove(accountId);
  }

  async getValidAccessToken(accountId: string): Promise<string> {
    const cached = this.tokenCache.get(accountId);
    if (cached && !this.isExpiring(cached.expiresAt)) {
      return cached.accessToken;
    }

    const pending = this.pendingTokens.get(accountId);
    if (pending) return pending;

    const loading = this.loadAccessToken(accountId).finally(() => {
      if (this.pendingTokens.get(accountId) === loading) {
        this.pendingTokens.delete(accountId);
      }
    });
    this.pendingTokens.set(accountId, loading);
    return loading;
  }

  private async loadAccessToken(accountId: string): Promise<string> {
    const account = await this.accounts.find(accountId);
    if (!account) {
      throw new AuthenticationError(`Account ${accountId} is not connected`);
    }

    const expiresAt = account.expiresAt ? Date.parse(account.expiresAt) : undefined;
    if (!this.isExpiring(expiresAt)) {
      const accessToken = this.decryptToken(account.accessToken);
      this.tokenCache.set(accountId, { accessToken, expiresAt });
      return accessToken;
    }

    if (!account.refreshToken) {
      throw new AuthenticationError(`Access token for ${accountId} expired and no refresh token is stored`);
    }

    const refreshed = await this.refreshTokens(this.decryptToken(account.refreshToken));
    await this.accounts.save({
      ...account,
      ...this.toStoredTokens(accountId, refreshed, account.refreshToken)
    });
    this.tokenCache.set(accountId, { accessToken: refreshed.accessToken, expiresAt: refreshed.expiresAt?.getTime() });

    logger.debug({ accountId }, 'Refreshed access token');
    return refreshed.accessToken;
  }

  async refreshTokens(refreshToken: string): Promise<OAuthTokens> {
    const client = this.createClient();
    client.setCredentials({ refresh_token: refreshToken });

    try {
      const { credentials } = await client.refreshAccessToken();
      if (!credentials.access_token) {
        throw new Error('No access token in refresh response');
      }

      return {
        accessToken: credentials.access_token,
        refreshToken: credentials.refresh_token || refreshToken, // Keep old refresh token if no new one
        expiresAt: credentials.expiry_date ? new Date(credentials.expiry_date) : undefined,
        scope: credentials.scope ?? undefined,
      };
    } catch (error) {
      logger.error({ err: error }, 'Failed to refresh Gmail token');
      throw new AuthenticationError('Failed to refresh access token');
    }
  }

  async revokeToken(accessToken: string): Promise<void> {
    await this.createClient().revokeToken(accessToken);
    logger.info('Gmail token revoked successfully');
  }

  // Encrypt tokens for storage using AES-256-CBC with unique salt
  encryptToken(token: string): string {
    const algorithm = 'aes-256-cbc';
    const salt = crypto.randomBytes(16);
    const key = crypto.scryptSync(this.encryptionKey(), salt, 32);
    const iv = crypto.randomBytes(16);

    const cipher = crypto.createCipheriv(algorithm, key, iv);
    let encrypted = cipher.update(token, 'utf8', 'hex');
    encrypted += cipher.final('hex');

    return salt.toString('hex') + ':' + iv.toString('hex') + ':' + encrypted;
  }

  decryptToken(encryptedToken: string): string {
    const algorithm = 'aes-256-cbc';

    const parts = encryptedToken.split(':');
    if (parts.length !== 3) {
      throw new Error('Invalid encrypted token format');
    }

    const salt = Buffer.from(parts[0], 'hex');
    const iv = Buffer.from(parts[1], 'hex');
    const encrypted = parts[2];

    const key = crypto.scryptSync(this.encryptionKey(), salt, 32);
    const decipher = crypto.createDecipheriv(algorithm, key, iv);

    let decrypted = decipher.update(encrypted, 'hex', 'utf8');
    decrypted += decipher.final('utf8');

    return decrypted;
  }

  private encryptionKey(): string {
    const key = process.env.ENCRYPTION_KEY;
    if (!key) {
      throw new Error('ENCRYPTION_KEY is not configured');
    }
    return key;
  }

  private isExpiring(expiresAt: number | undefined): boolean {
    return expiresAt !== undefined && expiresAt - Date.now() <= EXPIRY_SKEW_MS;
  }

  private toStoredTokens(
    accountId: string,
    tokens: OAuthTokens,
    previousRefreshToken?: string
  ): Omit<StoredAccount, 'addedAt' | 'lastScannedAt'> {
    return {
      accountId,
      accessToken: this.encryptToken(tokens.accessToken),
      refreshToken: tokens.refreshToken ? this.encryptToken(tokens.refreshToken) : previousRefreshToken,
      expiresAt: tokens.expiresAt?.toISOString(),
      scope: tokens.scope,
    };
  }
}
