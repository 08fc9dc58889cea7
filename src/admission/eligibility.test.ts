import { describe, it, expect } from 'vitest';
import {
  createTestTask,
  group,
  member,
  requester,
  user,
} from '@/testing/fixtures/approval-task.js';
import { checkEligibility, isEligible, isGroupMember, isTaskClosed } from './eligibility.js';

describe('isTaskClosed', () => {
  it('is open while pending and below the threshold', () => {
    expect(isTaskClosed(createTestTask([], { approvalsReceived: 1, approvalsRequired: 2 }))).toBe(
      false,
    );
  });

  it.each(['approved', 'rejected'] as const)('is closed once %s', (state) => {
    expect(isTaskClosed(createTestTask([], { state }))).toBe(true);
  });

  it('is closed when received responses equal the required count', () => {
    expect(isTaskClosed(createTestTask([], { approvalsReceived: 1, approvalsRequired: 1 }))).toBe(
      true,
    );
  });

  it('only closes on an exact match of the threshold', () => {
    expect(isTaskClosed(createTestTask([], { approvalsReceived: 3, approvalsRequired: 2 }))).toBe(
      false,
    );
  });
});

describe('isGroupMember', () => {
  it('matches by group name', () => {
    expect(isGroupMember(group('qa'), requester('carol', ['qa']))).toBe(true);
  });

  it('matches by listed member', () => {
    expect(isGroupMember(group('qa', [member('carol')]), requester('carol'))).toBe(true);
  });

  it('does not match an outsider', () => {
    expect(isGroupMember(group('qa', [member('carol')]), requester('dave', ['dev']))).toBe(false);
  });
});

describe('checkEligibility', () => {
  it('accepts a named user approver', () => {
    const task = createTestTask([user('alice'), user('bob')]);

    expect(checkEligibility(task, requester('bob'))).toEqual({ eligible: true });
  });

  it('accepts a member of a group approver through their groups', () => {
    const task = createTestTask([user('alice'), group('qa')]);

    expect(checkEligibility(task, requester('carol', ['qa']))).toEqual({ eligible: true });
  });

  it('accepts a user listed in a group approver', () => {
    const task = createTestTask([group('qa', [member('carol')])]);

    expect(checkEligibility(task, requester('carol'))).toEqual({ eligible: true });
  });

  it('rejects someone not on the approver list', () => {
    const task = createTestTask([user('alice'), group('qa', [member('carol')])]);

    expect(checkEligibility(task, requester('bob', ['dev']))).toEqual({
      eligible: false,
      code: 'NOT_AN_APPROVER',
    });
  });

  it('does not treat a user entry name as a group', () => {
    const task = createTestTask([user('qa')]);

    expect(isEligible(task, requester('carol', ['qa']))).toBe(false);
  });

  it('leaves a task with no approvers open to anyone', () => {
    expect(isEligible(createTestTask([]), requester('anyone'))).toBe(true);
  });

  it('reports a closed task before checking the approver list', () => {
    const task = createTestTask([user('alice')], { state: 'approved' });

    expect(checkEligibility(task, requester('mallory'))).toEqual({
      eligible: false,
      code: 'TASK_CLOSED',
    });
  });
});
