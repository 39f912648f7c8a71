/**
 * warden-jwt - Revocation Repository Helpers
 * Dispatch to a configured repository, rejecting when the store is disabled
 */

import { RepoRef, RevocationRepo, WardenError, WARDEN_ERRORS } from '../types';

function requireRepo(repo: RepoRef): RevocationRepo {
  if (repo === false) {
    throw new WardenError(WARDEN_ERRORS.REPO_DISABLED);
  }
  return repo;
}

/**
 * Whether `key` is present in `repo`.
 *
 * @throws {WardenError} `repo_disabled` when `repo` is `false`
 */
export async function repoExists(repo: RepoRef, key: string): Promise<boolean> {
  return requireRepo(repo).exists(key);
}

/**
 * Add `key` to `repo`. Inserting a present key is a no-op.
 *
 * @throws {WardenError} `repo_disabled` when `repo` is `false`
 */
export async function repoInsert(repo: RepoRef, key: string): Promise<void> {
  await requireRepo(repo).insert(key);
}

/**
 * Remove `key` from `repo`. Removing an absent key is a no-op.
 *
 * @throws {WardenError} `repo_disabled` when `repo` is `false`
 */
export async function repoDelete(repo: RepoRef, key: string): Promise<void> {
  await requireRepo(repo).delete(key);
}

/**
 * Structural check for values handed in through untyped configuration.
 */
export function isRevocationRepo(value: unknown): value is RevocationRepo {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'exists' in value && typeof value.exists === 'function' &&
    'insert' in value && typeof value.insert === 'function' &&
    'delete' in value && typeof value.delete === 'function'
  );
}
