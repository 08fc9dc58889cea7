/**
 * Isolation Check: verifies that the located change is the only decision
 * value that moved between the old and new approver lists.
 */
import type {
  ApproverEntry,
  ChangeSite,
  GroupApprover,
  MemberEntry,
  Requester,
} from '@/core/types.js';
import { isGroupMember } from './eligibility.js';

function isSiteAt(site: ChangeSite, kind: ChangeSite['kind'], index: number): boolean {
  return site.kind === kind && 'index' in site && site.index === index;
}

/** Inputs per member name, in list order. A name listed twice keeps both entries. */
function inputsByName(members: readonly MemberEntry[]): Map<string, string[]> {
  const inputs = new Map<string, string[]>();
  for (const { name, input } of members) {
    const existing = inputs.get(name);
    if (existing) {
      existing.push(input);
    } else {
      inputs.set(name, [input]);
    }
  }
  return inputs;
}

function membersUnchanged(
  before: GroupApprover,
  after: GroupApprover,
  index: number,
  requester: Requester,
  site: ChangeSite,
): boolean {
  const oldInputs = inputsByName(before.members);
  const newInputs = inputsByName(after.members);

  // Members still present keep every entry's input. The requester's located
  // edit is their first entry, the one the change locator reads.
  for (const [name, oldList] of oldInputs) {
    const newList = newInputs.get(name);
    if (newList === undefined) continue;
    if (newList.length !== oldList.length) return false;

    const ownEdit = name === requester.username && isSiteAt(site, 'member-input', index);
    for (const [position, oldInput] of oldList.entries()) {
      if (ownEdit && position === 0) continue;
      if (newList[position] !== oldInput) return false;
    }
  }

  // The only name that may appear is the requester adding themselves, once.
  for (const [name, newList] of newInputs) {
    if (oldInputs.has(name)) continue;
    if (name !== requester.username || newList.length !== 1) return false;
    if (!isGroupMember(before, requester)) return false;
    if (!isSiteAt(site, 'member-added', index)) return false;
  }

  return true;
}

/**
 * True when every decision value except the one at `site` is unchanged.
 *
 * The approver list must keep its length, and every entry its name and type:
 * the requester may record a decision, not reshape who decides.
 */
export function onlyRequesterChanged(
  oldApprovers: readonly ApproverEntry[],
  newApprovers: readonly ApproverEntry[],
  requester: Requester,
  site: ChangeSite,
): boolean {
  if (oldApprovers.length !== newApprovers.length) return false;

  for (const [index, before] of oldApprovers.entries()) {
    const after = newApprovers[index];
    if (after === undefined || after.name !== before.name) return false;

    if (before.type === 'User') {
      if (after.type !== 'User') return false;
      if (before.input !== after.input && !isSiteAt(site, 'user', index)) return false;
      continue;
    }

    if (after.type !== 'Group') return false;

    if (before.input !== after.input) {
      if (!isGroupMember(before, requester) || !isSiteAt(site, 'group-input', index)) return false;
    }

    if (!membersUnchanged(before, after, index, requester, site)) return false;
  }

  return true;
}
