/**
 * Builders for ApprovalTask test data, both as engine TaskStates and as
 * wire-format resources wrapped in AdmissionReviews.
 */
import type { ApprovalTaskResource, ApproverDetails } from '@/approval-task/types.js';
import type {
  GroupApprover,
  MemberEntry,
  Requester,
  TaskState,
  UserApprover,
} from '@/core/types.js';
import type { AdmissionReview } from '@/webhook/types.js';

// ─── Engine Types ───────────────────────────────────────────────

export function user(name: string, input = ''): UserApprover {
  return { type: 'User', name, input };
}

export function member(name: string, input = ''): MemberEntry {
  return { name, input };
}

export function group(name: string, members: MemberEntry[] = [], input = ''): GroupApprover {
  return { type: 'Group', name, input, members };
}

/** An open task (two approvals required, none received) with the given approvers. */
export function createTestTask(
  approvers: TaskState['approvers'],
  overrides?: Partial<Omit<TaskState, 'approvers'>>,
): TaskState {
  return {
    approvers,
    state: 'pending',
    approvalsReceived: 0,
    approvalsRequired: 2,
    ...overrides,
  };
}

export function requester(username: string, groups: string[] = []): Requester {
  return { username, groups: new Set(groups) };
}

// ─── Wire Format ────────────────────────────────────────────────

/** An ApprovalTask resource as the API server would send it. */
export function createTestResource(
  approvers: ApproverDetails[],
  overrides?: { numberOfApprovalsRequired?: number; responses?: number; state?: 'pending' | 'approved' | 'rejected' },
): ApprovalTaskResource {
  const responses = overrides?.responses ?? 0;
  return {
    apiVersion: 'openshift-pipelines.org/v1alpha1',
    kind: 'ApprovalTask',
    metadata: { name: 'deploy-approval', namespace: 'ci' },
    spec: {
      approvers,
      numberOfApprovalsRequired: overrides?.numberOfApprovalsRequired ?? 2,
    },
    status: {
      approvers: approvers.map((a) => a.name),
      approversResponse: Array.from({ length: responses }, (_, i) => ({
        name: `responder-${i}`,
        type: 'User',
        response: 'approved',
      })),
      state: overrides?.state ?? 'pending',
    },
  };
}

/** Wrap an old/new pair in an AdmissionReview for an UPDATE by `username`. */
export function createTestReview(params: {
  oldObject: unknown;
  object: unknown;
  username: string;
  groups?: string[];
  uid?: string;
  kind?: { group: string; version: string; kind: string };
}): AdmissionReview {
  return {
    apiVersion: 'admission.k8s.io/v1',
    kind: 'AdmissionReview',
    request: {
      uid: params.uid ?? 'req-1',
      kind: params.kind ?? {
        group: 'openshift-pipelines.org',
        version: 'v1alpha1',
        kind: 'ApprovalTask',
      },
      operation: 'UPDATE',
      name: 'deploy-approval',
      namespace: 'ci',
      userInfo: { username: params.username, groups: params.groups ?? [] },
      object: params.object,
      oldObject: params.oldObject,
    },
  };
}
