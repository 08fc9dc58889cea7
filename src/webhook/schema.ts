/**
 * Zod schemas for the admission.k8s.io/v1 AdmissionReview envelope.
 * Only the fields the webhook reads are declared; the rest pass through.
 */
import { z } from 'zod';

export const groupVersionKindSchema = z.object({
  group: z.string(),
  version: z.string(),
  kind: z.string(),
});

export const userInfoSchema = z
  .object({
    username: z.string().optional(),
    uid: z.string().optional(),
    groups: z.array(z.string()).optional(),
  })
  .passthrough();

export const admissionRequestSchema = z
  .object({
    uid: z.string().min(1),
    kind: groupVersionKindSchema,
    operation: z.string().optional(),
    name: z.string().optional(),
    namespace: z.string().optional(),
    userInfo: userInfoSchema,
    // Resource bodies are decoded separately so a bad body becomes a denial, not a 400.
    object: z.unknown().optional(),
    oldObject: z.unknown().optional(),
    dryRun: z.boolean().optional(),
  })
  .passthrough();

export const admissionReviewSchema = z
  .object({
    apiVersion: z.string(),
    kind: z.literal('AdmissionReview'),
    request: admissionRequestSchema,
  })
  .passthrough();
