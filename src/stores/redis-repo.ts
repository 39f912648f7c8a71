/**
 * warden-jwt - Redis Revocation Repository
 */

import type { RevocationRepo } from '../types';

/**
 * Subset of the ioredis client used by the repository.
 */
export interface RedisClient {
  exists(...keys: string[]): Promise<number>;
  set(key: string, value: string, ...args: (string | number)[]): Promise<string | null>;
  del(...keys: string[]): Promise<number>;
  ping(): Promise<string>;
}

export interface RedisRevocationRepoOptions {
  /** Redis client instance (ioredis) */
  client: RedisClient;
  /** Key prefix for all entries */
  keyPrefix?: string;
  /**
   * Entry lifetime in seconds. Set it to the longest token TTL in use so
   * revoked ids expire along with the tokens they refer to.
   */
  entryTtl?: number;
}

/**
 * Redis-based revocation repository.
 * Requires ioredis (or a compatible client) supplied by the host.
 *
 * @example
 * ```typescript
 * import Redis from 'ioredis';
 *
 * const blacklist = new RedisRevocationRepo({ client: new Redis(), entryTtl: 3600 });
 * ```
 */
export class RedisRevocationRepo implements RevocationRepo {
  private redis: RedisClient;
  private keyPrefix: string;
  private entryTtl?: number;

  constructor(options: RedisRevocationRepoOptions) {
    this.redis = options.client;
    this.keyPrefix = options.keyPrefix ?? 'warden:revoked:';
    this.entryTtl = options.entryTtl;
  }

  private entryKey(key: string): string {
    return `${this.keyPrefix}${key}`;
  }

  async exists(key: string): Promise<boolean> {
    return (await this.redis.exists(this.entryKey(key))) > 0;
  }

  async insert(key: string): Promise<void> {
    if (this.entryTtl !== undefined) {
      await this.redis.set(this.entryKey(key), '1', 'EX', this.entryTtl);
    } else {
      await this.redis.set(this.entryKey(key), '1');
    }
  }

  async delete(key: string): Promise<void> {
    await this.redis.del(this.entryKey(key));
  }

  /**
   * Check Redis connection health
   */
  async healthCheck(): Promise<boolean> {
    try {
      const result = await this.redis.ping();
      return result === 'PONG';
    } catch {
      return false;
    }
  }
}
