import type { z } from 'zod';
import type {
  admissionRequestSchema,
  admissionReviewSchema,
  groupVersionKindSchema,
} from './schema.js';

export const ADMISSION_API_VERSION = 'admission.k8s.io/v1';

// ─── Inbound ────────────────────────────────────────────────────

export type GroupVersionKind = z.infer<typeof groupVersionKindSchema>;
export type AdmissionRequest = z.infer<typeof admissionRequestSchema>;
export type AdmissionReview = z.infer<typeof admissionReviewSchema>;

// ─── Outbound ───────────────────────────────────────────────────

/** Subset of metav1.Status carried on a denied response. */
export interface AdmissionStatus {
  status: 'Failure';
  message: string;
  reason: 'BadRequest' | 'Forbidden';
  code: 400 | 403;
}

export interface AdmissionResponse {
  uid: string;
  allowed: boolean;
  status?: AdmissionStatus;
}

export interface AdmissionReviewResponse {
  apiVersion: typeof ADMISSION_API_VERSION;
  kind: 'AdmissionReview';
  response: AdmissionResponse;
}
