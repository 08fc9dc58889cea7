/**
 * Zod schemas for ApprovalTask bodies.
 * Built per strictness mode: strict schemas reject unknown fields at every
 * level, lenient ones drop them. Every field may be absent or null, as the
 * API server serializes unset fields either way.
 */
import { z } from 'zod';
import type { ApprovalTaskResource } from './types.js';

function objectSchema<T extends z.ZodRawShape>(shape: T, strict: boolean) {
  const schema = z.object(shape);
  return strict ? schema.strict() : schema;
}

function buildApprovalTaskSchema(strict: boolean): z.ZodType<ApprovalTaskResource, z.ZodTypeDef, unknown> {
  const userSchema = objectSchema(
    {
      name: z.string(),
      input: z.string().nullish(),
    },
    strict,
  );

  const approverSchema = objectSchema(
    {
      name: z.string(),
      type: z.enum(['', 'User', 'Group']).nullish(),
      input: z.string().nullish(),
      users: z.array(userSchema).nullish(),
    },
    strict,
  );

  const specSchema = objectSchema(
    {
      approvers: z.array(approverSchema).nullish(),
      numberOfApprovalsRequired: z.number().int().nonnegative().nullish(),
      description: z.string().nullish(),
    },
    strict,
  );

  const groupMemberStateSchema = objectSchema(
    {
      name: z.string(),
      response: z.string().nullish(),
    },
    strict,
  );

  const approverStateSchema = objectSchema(
    {
      name: z.string(),
      type: z.string().nullish(),
      response: z.string().nullish(),
      group_members: z.array(groupMemberStateSchema).nullish(),
    },
    strict,
  );

  const statusSchema = objectSchema(
    {
      approvers: z.array(z.string()).nullish(),
      approversResponse: z.array(approverStateSchema).nullish(),
      state: z.enum(['', 'pending', 'approved', 'rejected']).nullish(),
      startTime: z.string().nullish(),
    },
    strict,
  );

  return objectSchema(
    {
      apiVersion: z.string().nullish(),
      kind: z.string().nullish(),
      metadata: z.record(z.unknown()).nullish(),
      spec: specSchema.nullish(),
      status: statusSchema.nullish(),
    },
    strict,
  );
}

/** Rejects fields outside the resource definition. */
export const strictApprovalTaskSchema = buildApprovalTaskSchema(true);

/** Drops fields outside the resource definition. */
export const lenientApprovalTaskSchema = buildApprovalTaskSchema(false);
