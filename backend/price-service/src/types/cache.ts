/**
 * 缓存存储的最小接口，RedisService 实现它；测试中用内存实现替代
 */
export interface CacheStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  del(keys: string | string[]): Promise<number>;
  keys(pattern: string): Promise<string[]>;
  incr(key: string): Promise<number>;
  expire(key: string, seconds: number): Promise<boolean>;
  ttl(key: string): Promise<number>;
  dbSize(): Promise<number>;
  healthCheck(): Promise<boolean>;
}
