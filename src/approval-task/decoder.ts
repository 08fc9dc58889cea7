/**
 * ApprovalTask decoder: validates a raw resource body and converts it into
 * the TaskState the Decision Engine evaluates.
 */
import { DecodeError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { ApproverEntry, TaskState, TaskStatus } from '@/core/types.js';
import { lenientApprovalTaskSchema, strictApprovalTaskSchema } from './schema.js';
import type {
  ApprovalTaskResource,
  ApprovalTaskStatus,
  ApproverDetails,
  DecodeOptions,
} from './types.js';

/** State of a task decoded from an absent body: nothing configured, nothing recorded. */
export const EMPTY_TASK_STATE: TaskState = {
  approvers: [],
  state: 'pending',
  approvalsReceived: 0,
  approvalsRequired: 0,
};

function toApproverEntry(details: ApproverDetails): ApproverEntry {
  const input = details.input ?? '';
  if (details.type === 'Group') {
    return {
      type: 'Group',
      name: details.name,
      input,
      members: (details.users ?? []).map((user) => ({ name: user.name, input: user.input ?? '' })),
    };
  }
  return { type: 'User', name: details.name, input };
}

function toTaskStatus(state: ApprovalTaskStatus['state']): TaskStatus {
  return state === 'approved' || state === 'rejected' ? state : 'pending';
}

/** Convert a validated resource into a TaskState. */
export function toTaskState(resource: ApprovalTaskResource): TaskState {
  return {
    approvers: (resource.spec?.approvers ?? []).map(toApproverEntry),
    state: toTaskStatus(resource.status?.state),
    approvalsReceived: resource.status?.approversResponse?.length ?? 0,
    approvalsRequired: resource.spec?.numberOfApprovalsRequired ?? 0,
  };
}

/**
 * Decode one side of an update. `null` and `undefined` bodies decode to
 * {@link EMPTY_TASK_STATE}.
 */
export function decodeApprovalTask(
  body: unknown,
  which: 'old' | 'new',
  options: DecodeOptions,
): Result<TaskState, DecodeError> {
  if (body === null || body === undefined) return ok(EMPTY_TASK_STATE);

  const schema = options.disallowUnknownFields
    ? strictApprovalTaskSchema
    : lenientApprovalTaskSchema;

  const validation = schema.safeParse(body);
  if (!validation.success) {
    const issues = validation.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const detail = issues
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join('; ');
    return err(new DecodeError(which, detail, issues));
  }

  return ok(toTaskState(validation.data));
}
