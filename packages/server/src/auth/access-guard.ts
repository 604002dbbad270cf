import { TaskApiError } from '../errors';
import type { Identity } from './identity-verifier';

export type AccessDecision = 'allow' | 'deny';

/**
 * The single authorization decision: a caller may only reach resources
 * filed under its own identity.
 */
export function authorize(caller: Identity, targetOwnerId: string): AccessDecision {
  return caller.userId === targetOwnerId ? 'allow' : 'deny';
}

/** Throws FORBIDDEN unless `authorize` allows the caller. */
export function assertOwner(caller: Identity, targetOwnerId: string): void {
  if (authorize(caller, targetOwnerId) === 'deny') {
    throw new TaskApiError('FORBIDDEN');
  }
}
