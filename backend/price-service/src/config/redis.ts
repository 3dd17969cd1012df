import { createClient } from 'redis';
import { config } from '@/config/env';
import type { CacheStore } from '@/types/cache';
import { getLogger } from '@/utils/logger';

const logger = getLogger('redis');

type RedisClient = ReturnType<typeof createClient>;

export class RedisService implements CacheStore {
  private static instance: RedisService;
  private client: RedisClient;
  private connected: boolean = false;

  constructor(redisUrl: string) {
    this.client = createClient({
      url: redisUrl,
      // 断线期间命令直接失败，由调用方降级（查库、限流放行）
      disableOfflineQueue: true,
      socket: {
        connectTimeout: 5000,
        reconnectStrategy: (retries) => Math.min(retries * 100, 3000),
      },
    });

    this.setupEventHandlers();
  }

  public static getInstance(): RedisService {
    if (!RedisService.instance) {
      RedisService.instance = new RedisService(config.redisUrl);
    }
    return RedisService.instance;
  }

  private setupEventHandlers(): void {
    this.client.on('ready', () => {
      logger.info('Redis client ready');
      this.connected = true;
    });

    this.client.on('error', (err: Error) => {
      logger.error('Redis client error:', err);
      this.connected = false;
    });

    this.client.on('end', () => {
      logger.info('Redis client disconnected');
      this.connected = false;
    });

    this.client.on('reconnecting', () => {
      logger.info('Redis client reconnecting...');
    });
  }

  /**
   * 连接 Redis；传入 timeoutMs 时超时即失败，重连在后台继续
   */
  public async connect(timeoutMs?: number): Promise<void> {
    if (this.client.isOpen) return;

    const connecting = this.client.connect().then(() => undefined);
    let timer: NodeJS.Timeout | undefined;

    try {
      if (timeoutMs === undefined) {
        await connecting;
        return;
      }
      const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error(`Redis connection timed out after ${timeoutMs}ms`)), timeoutMs);
      });
      // 超时后 connecting 仍可能在后台结束
      connecting.catch((error: unknown) => logger.debug('Background Redis connect ended:', error));
      await Promise.race([connecting, timeout]);
    } catch (error) {
      logger.error('Failed to connect to Redis:', error);
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  public async disconnect(): Promise<void> {
    try {
      if (this.client.isReady) {
        await this.client.quit();
      } else if (this.client.isOpen) {
        // 仍在重连中，QUIT 无法发送
        await this.client.disconnect();
      }
    } catch (error) {
      logger.error('Failed to disconnect from Redis:', error);
      throw error;
    }
  }

  public isConnected(): boolean {
    return this.connected && this.client.isReady;
  }

  public async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    try {
      if (ttlSeconds) {
        await this.client.setEx(key, ttlSeconds, value);
      } else {
        await this.client.set(key, value);
      }
    } catch (error) {
      logger.error('Redis SET error:', { key, error });
      throw error;
    }
  }

  public async get(key: string): Promise<string | null> {
    try {
      return await this.client.get(key);
    } catch (error) {
      logger.error('Redis GET error:', { key, error });
      throw error;
    }
  }

  public async del(keys: string | string[]): Promise<number> {
    if (Array.isArray(keys) && keys.length === 0) return 0;
    try {
      return await this.client.del(keys);
    } catch (error) {
      logger.error('Redis DEL error:', { keys, error });
      throw error;
    }
  }

  public async keys(pattern: string): Promise<string[]> {
    try {
      const found: string[] = [];
      for await (const key of this.client.scanIterator({ MATCH: pattern, COUNT: 100 })) {
        found.push(key);
      }
      return found;
    } catch (error) {
      logger.error('Redis SCAN error:', { pattern, error });
      throw error;
    }
  }

  public async incr(key: string): Promise<number> {
    try {
      return await this.client.incr(key);
    } catch (error) {
      logger.error('Redis INCR error:', { key, error });
      throw error;
    }
  }

  public async expire(key: string, seconds: number): Promise<boolean> {
    try {
      return await this.client.expire(key, seconds);
    } catch (error) {
      logger.error('Redis EXPIRE error:', { key, seconds, error });
      throw error;
    }
  }

  public async ttl(key: string): Promise<number> {
    try {
      return await this.client.ttl(key);
    } catch (error) {
      logger.error('Redis TTL error:', { key, error });
      throw error;
    }
  }

  public async dbSize(): Promise<number> {
    return this.client.dbSize();
  }

  public async healthCheck(): Promise<boolean> {
    if (!this.client.isReady) return false;
    try {
      const result = await this.client.ping();
      return result === 'PONG';
    } catch (error) {
      logger.error('Redis health check failed:', error);
      return false;
    }
  }
}

export const redis = RedisService.getInstance();
