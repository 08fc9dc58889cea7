import type { DenialCode } from '@/core/types.js';

/**
 * Denial reasons returned to the API server. Clients and tests match on this
 * wording, so transports must pass it through unchanged.
 */
export const DENIAL_MESSAGES = {
  TASK_CLOSED: 'ApprovalTask has already reached its final state',
  NOT_AN_APPROVER: 'User does not exist in the approval list',
  UNAUTHORIZED_CHANGE: 'User can only update their own approval input',
} as const satisfies Partial<Record<DenialCode, string>>;

/** Prefix for denials caused by a decision value outside 'approve' / 'reject'. */
export const INVALID_INPUT_PREFIX = 'Invalid input change';
