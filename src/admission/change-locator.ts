/**
 * Change Locator: finds the requester's single decision change between the
 * old and new approver lists.
 *
 * Entries are paired by index. The scan stops at the first User entry named
 * after the requester, whether or not it changed, so a requester who owns
 * several entries only ever has the first one inspected. Group entries the
 * requester belongs to are skipped when they hold no change of theirs.
 */
import type { InvalidInputError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { ApproverEntry, ChangeSite, Requester } from '@/core/types.js';
import { findMember, isGroupMember } from './eligibility.js';
import { validateInputValue } from './input-value.js';

const NO_CHANGE: ChangeSite = { kind: 'none' };

/** Accept `site` only if the value written there is a legal decision. */
function withValidInput(value: string, site: ChangeSite): Result<ChangeSite, InvalidInputError> {
  const validation = validateInputValue(value);
  if (!validation.ok) return err(validation.error);
  return ok(site);
}

/**
 * Locate the requester's change.
 *
 * Returns `{ kind: 'none' }` when nothing attributable to the requester
 * changed, and an error only when the requester's own change carries an
 * invalid value. Other approvers' values are never validated here.
 */
export function locateChange(
  oldApprovers: readonly ApproverEntry[],
  newApprovers: readonly ApproverEntry[],
  requester: Requester,
): Result<ChangeSite, InvalidInputError> {
  const { username } = requester;

  for (const [index, approver] of oldApprovers.entries()) {
    const updated = newApprovers[index];

    if (approver.type === 'User') {
      if (approver.name !== username) continue;
      // Entry is gone from the new list: nothing addressable at this index.
      if (updated === undefined) continue;
      if (updated.name !== approver.name || updated.input === approver.input) {
        return ok(NO_CHANGE);
      }
      return withValidInput(updated.input, { kind: 'user', index });
    }

    if (!isGroupMember(approver, requester) || updated === undefined) continue;

    if (approver.input !== updated.input) {
      return withValidInput(updated.input, { kind: 'group-input', index });
    }

    const before = findMember(approver.members, username);
    const after = updated.type === 'Group' ? findMember(updated.members, username) : undefined;

    if (before === undefined && after !== undefined) {
      return withValidInput(after.input, { kind: 'member-added', index, member: username });
    }

    if (before !== undefined && after !== undefined && before.input !== after.input) {
      return withValidInput(after.input, { kind: 'member-input', index, member: username });
    }
  }

  return ok(NO_CHANGE);
}
