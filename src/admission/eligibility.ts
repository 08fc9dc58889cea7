/**
 * Eligibility: may the requester act on this task at all?
 * The closed-task rule takes priority over the approver-list rule.
 */
import type { ApproverEntry, GroupApprover, MemberEntry, Requester, TaskState } from '@/core/types.js';

export type EligibilityResult =
  | { readonly eligible: true }
  | { readonly eligible: false; readonly code: 'TASK_CLOSED' | 'NOT_AN_APPROVER' };

/**
 * A task is closed once it reached a terminal state or recorded exactly as
 * many responses as it requires.
 */
export function isTaskClosed(task: TaskState): boolean {
  if (task.state === 'approved' || task.state === 'rejected') return true;
  return task.approvalsReceived === task.approvalsRequired;
}

/** Find a member entry by name. First occurrence wins. */
export function findMember(
  members: readonly MemberEntry[],
  name: string,
): MemberEntry | undefined {
  return members.find((member) => member.name === name);
}

/**
 * A requester belongs to a group entry when the group name is one of their
 * groups, or when they are already listed among its members.
 */
export function isGroupMember(group: GroupApprover, requester: Requester): boolean {
  if (requester.groups.has(group.name)) return true;
  return findMember(group.members, requester.username) !== undefined;
}

function matchesApprover(approver: ApproverEntry, requester: Requester): boolean {
  switch (approver.type) {
    case 'User':
      return approver.name === requester.username;
    case 'Group':
      return isGroupMember(approver, requester);
  }
}

/** Decide whether the requester may act on the task, and if not, why. */
export function checkEligibility(task: TaskState, requester: Requester): EligibilityResult {
  if (isTaskClosed(task)) return { eligible: false, code: 'TASK_CLOSED' };

  // An empty approver list places no restriction on who may act.
  if (task.approvers.length === 0) return { eligible: true };

  if (task.approvers.some((approver) => matchesApprover(approver, requester))) {
    return { eligible: true };
  }
  return { eligible: false, code: 'NOT_AN_APPROVER' };
}

/** Boolean form of {@link checkEligibility}. */
export function isEligible(task: TaskState, requester: Requester): boolean {
  return checkEligibility(task, requester).eligible;
}
