import { RedisService, RedisStore } from './redis';
import { ScanReport } from '../types/sender';

const scanKey = (scanId: string) => `scan:${scanId}`;

export class ScanStore {
  private readonly redis: RedisStore;
  private readonly ttlSeconds: number;

  constructor(ttlSeconds: number, redis: RedisStore = RedisService.getInstance()) {
    this.redis = redis;
    this.ttlSeconds = ttlSeconds;
  }

  async save(report: ScanReport): Promise<boolean> {
    return this.redis.set(scanKey(report.scanId), report, this.ttlSeconds);
  }

  async find(scanId: string): Promise<ScanReport | null> {
    return this.redis.get<ScanReport>(scanKey(scanId));
  }
}
