// ─── Approver Entries ───────────────────────────────────────────
// Approvers are a tagged union on `type`. Only Group entries carry members.

export type ApproverType = 'User' | 'Group';

/** Accepted values for any decision field. */
export type ApprovalInput = 'approve' | 'reject';

/** An individual's decision recorded inside a Group approver entry. */
export interface MemberEntry {
  readonly name: string;
  /** Raw decision string: '', 'approve', 'reject', or whatever the client sent. */
  readonly input: string;
}

export interface UserApprover {
  readonly type: 'User';
  readonly name: string;
  readonly input: string;
}

export interface GroupApprover {
  readonly type: 'Group';
  /** Group name, matched against the requester's group memberships. */
  readonly name: string;
  /** Group-level decision. */
  readonly input: string;
  readonly members: readonly MemberEntry[];
}

export type ApproverEntry = UserApprover | GroupApprover;

// ─── Task State ─────────────────────────────────────────────────

export type TaskStatus = 'pending' | 'approved' | 'rejected';

/**
 * Snapshot of an ApprovalTask at one point in time.
 * Old and new approver lists are compared positionally by index.
 */
export interface TaskState {
  readonly approvers: readonly ApproverEntry[];
  readonly state: TaskStatus;
  readonly approvalsReceived: number;
  readonly approvalsRequired: number;
}

// ─── Requester ──────────────────────────────────────────────────

/** The authenticated actor proposing the update, as captured by the transport. */
export interface Requester {
  readonly username: string;
  readonly groups: ReadonlySet<string>;
}

// ─── Change Site ────────────────────────────────────────────────

/** Where, if anywhere, the requester's single decision change was found. */
export type ChangeSite =
  | { readonly kind: 'none' }
  | { readonly kind: 'user'; readonly index: number }
  | { readonly kind: 'group-input'; readonly index: number }
  | { readonly kind: 'member-added'; readonly index: number; readonly member: string }
  | { readonly kind: 'member-input'; readonly index: number; readonly member: string };

// ─── Decision ───────────────────────────────────────────────────

export type DenialCode =
  | 'TASK_CLOSED'
  | 'NOT_AN_APPROVER'
  | 'INVALID_INPUT'
  | 'UNAUTHORIZED_CHANGE';

export type Decision =
  | { readonly allowed: true }
  | {
      readonly allowed: false;
      readonly code: DenialCode;
      readonly reason: string;
      /** Only an invalid value can be fixed by resubmitting a corrected request. */
      readonly retryable: boolean;
    };
