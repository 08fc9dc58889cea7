/**
 * Decision Engine: decides whether a proposed ApprovalTask update is a
 * legitimate single-approver action.
 *
 * Pure and synchronous: the result depends only on the arguments, so it is
 * safe to call from any number of concurrent request handlers.
 */
import type { Decision, DenialCode, Requester, TaskState } from '@/core/types.js';
import { locateChange } from './change-locator.js';
import { checkEligibility } from './eligibility.js';
import { onlyRequesterChanged } from './isolation.js';
import { DENIAL_MESSAGES, INVALID_INPUT_PREFIX } from './messages.js';

const ALLOW: Decision = { allowed: true };

function deny(code: DenialCode, reason: string): Decision {
  return { allowed: false, code, reason, retryable: code === 'INVALID_INPUT' };
}

/** Evaluate an update from `oldTask` to `newTask` proposed by `requester`. */
export function decide(oldTask: TaskState, newTask: TaskState, requester: Requester): Decision {
  const eligibility = checkEligibility(oldTask, requester);
  if (!eligibility.eligible) {
    return deny(eligibility.code, DENIAL_MESSAGES[eligibility.code]);
  }

  const located = locateChange(oldTask.approvers, newTask.approvers, requester);
  if (!located.ok) {
    return deny('INVALID_INPUT', `${INVALID_INPUT_PREFIX}: ${located.error.message}`);
  }

  const site = located.value;
  if (site.kind === 'none') {
    return deny('UNAUTHORIZED_CHANGE', DENIAL_MESSAGES.UNAUTHORIZED_CHANGE);
  }

  if (!onlyRequesterChanged(oldTask.approvers, newTask.approvers, requester, site)) {
    return deny('UNAUTHORIZED_CHANGE', DENIAL_MESSAGES.UNAUTHORIZED_CHANGE);
  }

  return ALLOW;
}
