import { describe, expect, it } from 'vitest';

import type { DisputeAction } from '../../types.js';
import { DISPUTE_STATUSES, type DisputeStatus, transitionDisputeStatus } from '../dispute-status.js';

describe('transitionDisputeStatus', () => {
  const legal: [DisputeStatus, DisputeAction, DisputeStatus][] = [
    ['normal', 'dispute', 'disputed'],
    ['resolved', 'dispute', 'disputed'],
    ['disputed', 'resolve', 'resolved'],
    ['disputed', 'chargeback', 'charged_back'],
  ];

  it.each(legal)('should move %s --%s--> %s', (from, action, to) => {
    expect(transitionDisputeStatus(from, action)._unsafeUnwrap()).toBe(to);
  });

  it('should reject every other transition', () => {
    const actions: DisputeAction[] = ['dispute', 'resolve', 'chargeback'];
    const rejected: string[] = [];

    for (const from of DISPUTE_STATUSES) {
      for (const action of actions) {
        const result = transitionDisputeStatus(from, action);
        if (result.isErr()) {
          expect(result.error).toEqual({ action, from });
          rejected.push(`${from}:${action}`);
        }
      }
    }

    expect(rejected).toEqual([
      'normal:resolve',
      'normal:chargeback',
      'disputed:dispute',
      'resolved:resolve',
      'resolved:chargeback',
      'charged_back:dispute',
      'charged_back:resolve',
      'charged_back:chargeback',
    ]);
  });
});
