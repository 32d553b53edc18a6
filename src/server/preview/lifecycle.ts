import { InvalidStateError } from './errors.js';
import type { PreviewStatus } from './types.js';

/**
 * Allowed status transitions. Removal of the record is not a transition.
 */
export const TRANSITIONS: Readonly<Record<PreviewStatus, readonly PreviewStatus[]>> = {
  creating: ['active', 'failed', 'deleting'],
  active: ['extending', 'deleting'],
  extending: ['active', 'deleting'],
  deleting: ['deleting', 'failed'],
  failed: ['deleting'],
};

export function canTransition(from: PreviewStatus, to: PreviewStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: PreviewStatus, to: PreviewStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidStateError(`Cannot move preview from '${from}' to '${to}'`);
  }
}
