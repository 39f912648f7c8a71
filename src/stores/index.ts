/**
 * warden-jwt - Revocation Repositories
 *
 * Implement {@link RevocationRepo} to back the blacklist or banlist with
 * any other store:
 *
 * ```typescript
 * import type { RevocationRepo } from 'warden-jwt';
 *
 * class MongoRevocationRepo implements RevocationRepo {
 *   async exists(key: string) { return (await this.collection.countDocuments({ key })) > 0; }
 *   async insert(key: string) { await this.collection.updateOne({ key }, { $set: { key } }, { upsert: true }); }
 *   async delete(key: string) { await this.collection.deleteOne({ key }); }
 * }
 * ```
 */

export type { RevocationRepo, RepoRef } from '../types';
export * from './repo';
export * from './memory-repo';
export * from './redis-repo';
export * from './postgres-repo';
