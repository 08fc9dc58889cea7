// ─── ApprovalTask Resource (openshift-pipelines.org/v1alpha1) ───
// Wire shape of the custom resource as the API server sends it.

export const APPROVAL_TASK_GROUP = 'openshift-pipelines.org';
export const APPROVAL_TASK_VERSION = 'v1alpha1';
export const APPROVAL_TASK_KIND = 'ApprovalTask';

export interface ApprovalTaskUser {
  name: string;
  input?: string | null;
}

export interface ApproverDetails {
  name: string;
  /** 'User' or 'Group'; absent, null or '' means 'User'. */
  type?: '' | 'User' | 'Group' | null;
  input?: string | null;
  /** Individual responses within a Group approver. */
  users?: ApprovalTaskUser[] | null;
}

export interface ApprovalTaskSpec {
  approvers?: ApproverDetails[] | null;
  numberOfApprovalsRequired?: number | null;
  description?: string | null;
}

export interface GroupMemberState {
  name: string;
  response?: string | null;
}

export interface ApproverState {
  name: string;
  type?: string | null;
  response?: string | null;
  group_members?: GroupMemberState[] | null;
}

export interface ApprovalTaskStatus {
  approvers?: string[] | null;
  approversResponse?: ApproverState[] | null;
  state?: '' | 'pending' | 'approved' | 'rejected' | null;
  startTime?: string | null;
}

export interface ApprovalTaskResource {
  apiVersion?: string | null;
  kind?: string | null;
  metadata?: Record<string, unknown> | null;
  spec?: ApprovalTaskSpec | null;
  status?: ApprovalTaskStatus | null;
}

export interface DecodeOptions {
  /** Reject bodies carrying fields the resource schema does not define. */
  disallowUnknownFields: boolean;
}
