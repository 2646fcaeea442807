import Redis from 'ioredis';
import pino from 'pino';

const logger = pino().child({ module: 'RedisService' });

// The key-value operations the stores rely on
export type RedisStore = Pick<RedisService, 'get' | 'set' | 'delete' | 'addToSet' | 'removeFromSet' | 'setMembers'>;

export class RedisService {
  private static instance: RedisService;
  public client: Redis;

  constructor() {
    this.client = new Redis(process.env.REDIS_URL ?? 'redis://localhost:6379', {
      enableReadyCheck: false,
      maxRetriesPerRequest: 3,
      lazyConnect: true,
    });

    this.client.on('connect', () => {
      logger.info('✅ Connected to Redis');
    });

    this.client.on('error', (err) => {
      logger.error({ err }, '❌ Redis connection error');
    });

    this.client.on('ready', () => {
      logger.info('🔄 Redis is ready');
    });
  }

  static getInstance(): RedisService {
    if (!RedisService.instance) {
      RedisService.instance = new RedisService();
    }
    return RedisService.instance;
  }

  async connect(): Promise<void> {
    try {
      await this.client.connect();
    } catch (error) {
      logger.error({ err: error }, 'Failed to connect to Redis');
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    try {
      await this.client.quit();
      logger.info('📴 Disconnected from Redis');
    } catch (error) {
      logger.error({ err: error }, '❌ Error disconnecting from Redis');
      throw error;
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      const result = await this.client.ping();
      return result === 'PONG';
    } catch (error) {
      logger.error({ err: error }, 'Redis health check failed');
      return false;
    }
  }

  // Cache utilities
  async get<T>(key: string): Promise<T | null> {
    try {
      const value = await this.client.get(key);
      return value ? JSON.parse(value) : null;
    } catch (error) {
      logger.error({ err: error }, `Error getting key ${key}`);
      return null;
    }
  }

  async set<T>(key: string, value: T, ttl?: number): Promise<boolean> {
    try {
      const serialized = JSON.stringify(value);
      if (ttl) {
        await this.client.setex(key, ttl, serialized);
      } else {
        await this.client.set(key, serialized);
      }
      return true;
    } catch (error) {
      logger.error({ err: error }, `Error setting key ${key}`);
      return false;
    }
  }

  async delete(key: string): Promise<boolean> {
    try {
      const result = await this.client.del(key);
      return result > 0;
    } catch (error) {
      logger.error({ err: error }, `Error deleting key ${key}`);
      return false;
    }
  }

  // Set utilities
  async addToSet(key: string, member: string): Promise<void> {
    await this.client.sadd(key, member);
  }

  async removeFromSet(key: string, member: string): Promise<void> {
    await this.client.srem(key, member);
  }

  async setMembers(key: string): Promise<string[]> {
    return this.client.smembers(key);
  }
}
