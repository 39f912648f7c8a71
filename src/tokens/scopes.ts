/**
 * warden-jwt - Scope Authorization
 * Map request methods to actions and match `<permit>/<action>` scopes
 */

import type { AuthorizationResult, ScopeAction } from '../types';

const METHOD_ACTIONS: Readonly<Record<string, ScopeAction>> = Object.freeze({
  GET: 'read',
  HEAD: 'read',
  PUT: 'write',
  PATCH: 'write',
  POST: 'write',
  DELETE: 'delete',
});

/**
 * Action required by an HTTP method. Names are matched exactly, so
 * lower-case methods are not recognised.
 */
export function actionForMethod(method: string): ScopeAction | undefined {
  return Object.prototype.hasOwnProperty.call(METHOD_ACTIONS, method)
    ? METHOD_ACTIONS[method]
    : undefined;
}

/**
 * Candidate scopes for an action, one per permit, in permit order.
 */
export function requiredScopes(permits: readonly string[], action: ScopeAction): string[] {
  return permits.map((permit) => `${permit}/${action}`);
}

/**
 * First candidate present in `current`, or `false` when none is.
 */
export function hasScope(current: readonly string[], candidates: readonly string[]): string | false {
  const granted = new Set(current);
  return candidates.find((candidate) => granted.has(candidate)) ?? false;
}

/**
 * Decide whether a request with `method` is allowed for a token holding
 * `scopes`, given the resource's `permits`.
 *
 * @example
 * ```typescript
 * authorize('PATCH', ['user', 'admin'], ['admin/write']);
 * // { allowed: true, scope: 'admin/write', action: 'write' }
 * ```
 */
export function authorize(
  method: string,
  permits: readonly string[],
  scopes: readonly string[]
): AuthorizationResult {
  const action = actionForMethod(method);
  if (!action) {
    return { allowed: false, reason: 'unsupported_method', required: [] };
  }

  const required = requiredScopes(permits, action);
  const scope = hasScope(scopes, required);
  if (scope === false) {
    return { allowed: false, reason: 'missing_scope', required };
  }

  return { allowed: true, scope, action };
}
