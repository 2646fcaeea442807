import { RedisService, RedisStore } from './redis';
import { StoredAccount } from '../types/auth';

const ACCOUNTS_KEY = 'accounts';
const accountKey = (accountId: string) => `account:${accountId}`;

// Connected mailbox accounts, keyed by email address
export class AccountStore {
  private readonly redis: RedisStore;

  constructor(redis: RedisStore = RedisService.getInstance()) {
    this.redis = redis;
  }

  async save(account: StoredAccount): Promise<void> {
    const stored = await this.redis.set(accountKey(account.accountId), account);
    if (!stored) {
      throw new Error(`Failed to store account ${account.accountId}`);
    }
    await this.redis.addToSet(ACCOUNTS_KEY, account.accountId);
  }

  async find(accountId: string): Promise<StoredAccount | null> {
    return this.redis.get<StoredAccount>(accountKey(accountId));
  }

  async list(): Promise<StoredAccount[]> {
    const ids = await this.redis.setMembers(ACCOUNTS_KEY);
    const accounts = await Promise.all(ids.map(id => this.find(id)));
    return accounts
      .filter((account): account is StoredAccount => account !== null)
      .sort((a, b) => a.accountId.localeCompare(b.accountId));
  }

  async remove(accountId: string): Promise<boolean> {
    const removed = await this.redis.delete(accountKey(accountId));
    await this.redis.removeFromSet(ACCOUNTS_KEY, accountId);
    return removed;
  }

  async markScanned(accountId: string, scannedAt: Date): Promise<void> {
    const account = await this.find(accountId);
    if (!account) return;
    await this.save({ ...account, lastScannedAt: scannedAt.toISOString() });
  }
}
