import { InvalidInputError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { ApprovalInput } from '@/core/types.js';

/** Type guard for the accepted decision values. Matching is case-sensitive. */
export function isApprovalInput(value: string): value is ApprovalInput {
  return value === 'approve' || value === 'reject';
}

/** Check that a new decision value is 'approve' or 'reject'. */
export function validateInputValue(value: string): Result<ApprovalInput, InvalidInputError> {
  if (isApprovalInput(value)) return ok(value);
  return err(new InvalidInputError(value));
}
