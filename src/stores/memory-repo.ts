/**
 * warden-jwt - In-Memory Revocation Repository
 */

import type { RevocationRepo } from '../types';

/**
 * `Set` backed repository.
 *
 * Intended for development, tests and single-process deployments: entries
 * live in process memory and are lost on restart. Use the Redis or
 * PostgreSQL repository when several processes verify tokens.
 */
export class InMemoryRevocationRepo implements RevocationRepo {
  private keys: Set<string>;

  constructor(initial: Iterable<string> = []) {
    this.keys = new Set(initial);
  }

  exists(key: string): boolean {
    return this.keys.has(key);
  }

  insert(key: string): void {
    this.keys.add(key);
  }

  delete(key: string): void {
    this.keys.delete(key);
  }

  /** Number of stored keys. */
  size(): number {
    return this.keys.size;
  }

  /** Drop every key. Mostly useful in tests. */
  clear(): void {
    this.keys.clear();
  }
}
