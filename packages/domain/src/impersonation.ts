import { type User } from './user';

export type ImpersonationRequest = { kind: 'none' } | { kind: 'login'; login: string };

export const NO_IMPERSONATION: ImpersonationRequest = { kind: 'none' };

export function impersonate(login: string): ImpersonationRequest {
  return { kind: 'login', login };
}

export type ImpersonationDecision =
  | { outcome: 'allowed'; targetUserId: number; impersonated: boolean }
  | { outcome: 'not_authorized' }
  | { outcome: 'target_missing'; login: string };

/**
 * Decides whose identity a token request resolves to.
 * `target` is the user looked up for `request.login`; callers skip the lookup
 * for non-admin requesters since the answer is a refusal either way.
 */
export function authorizeImpersonation(
  requester: Pick<User, 'id' | 'admin'>,
  request: ImpersonationRequest,
  target: Pick<User, 'id'> | null,
): ImpersonationDecision {
  if (request.kind === 'none') {
    return { outcome: 'allowed', targetUserId: requester.id, impersonated: false };
  }
  if (!requester.admin) {
    return { outcome: 'not_authorized' };
  }
  if (!target) {
    return { outcome: 'target_missing', login: request.login };
  }
  return { outcome: 'allowed', targetUserId: target.id, impersonated: true };
}
