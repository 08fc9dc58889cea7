import type { Logger } from '@/observability/logger.js';
import type { AdmissionController } from '@/webhook/admission-controller.js';

// ─── API Error Envelope ──────────────────────────────────────────

export interface ApiErrorResponse {
  success: false;
  error: ApiError;
}

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

// ─── Route Dependencies (DI) ───────────────────────────────────

/** Dependencies injected into all route plugins via Fastify register options. */
export interface RouteDependencies {
  admissionController: AdmissionController;
  /** Path the API server posts AdmissionReviews to. */
  webhookPath: string;
  logger: Logger;
}
