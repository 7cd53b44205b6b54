import { err, ok, type Result } from 'neverthrow';

import type { DisputeAction } from '../types.js';

export const DISPUTE_STATUSES = ['normal', 'disputed', 'resolved', 'charged_back'] as const;
export type DisputeStatus = (typeof DISPUTE_STATUSES)[number];

export interface InvalidDisputeTransition {
  action: DisputeAction;
  from: DisputeStatus;
}

// normal -> disputed -> resolved -> disputed ... ; disputed -> charged_back (terminal)
const TRANSITIONS: Record<DisputeAction, Partial<Record<DisputeStatus, DisputeStatus>>> = {
  chargeback: { disputed: 'charged_back' },
  dispute: { normal: 'disputed', resolved: 'disputed' },
  resolve: { disputed: 'resolved' },
};

/**
 * Next dispute status of a ledger entry, or the rejected transition.
 */
export function transitionDisputeStatus(
  from: DisputeStatus,
  action: DisputeAction
): Result<DisputeStatus, InvalidDisputeTransition> {
  const next = TRANSITIONS[action][from];
  return next ? ok(next) : err({ action, from });
}
