/**
 * AdmissionController: the transport side of the webhook.
 *
 * Decodes the old and new ApprovalTask bodies from an AdmissionRequest,
 * runs the Decision Engine once, and translates the Decision into an
 * AdmissionResponse. Decode failures are denied before the engine runs.
 */
import { decide } from '@/admission/decision-engine.js';
import { decodeApprovalTask } from '@/approval-task/decoder.js';
import {
  APPROVAL_TASK_GROUP,
  APPROVAL_TASK_KIND,
  APPROVAL_TASK_VERSION,
} from '@/approval-task/types.js';
import type { Requester } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type {
  AdmissionRequest,
  AdmissionResponse,
  AdmissionReview,
  AdmissionReviewResponse,
} from './types.js';
import { ADMISSION_API_VERSION } from './types.js';

// ─── Types ──────────────────────────────────────────────────────

export interface AdmissionControllerOptions {
  logger: Logger;
  /** Deny bodies carrying fields the ApprovalTask schema does not define. */
  disallowUnknownFields: boolean;
}

export interface AdmissionController {
  /** Evaluate a single admission request. Never throws. */
  admit(request: AdmissionRequest): AdmissionResponse;

  /** Evaluate a full AdmissionReview and wrap the response in one. */
  review(review: AdmissionReview): AdmissionReviewResponse;
}

// ─── Helpers ────────────────────────────────────────────────────

function isApprovalTaskKind(request: AdmissionRequest): boolean {
  const { group, version, kind } = request.kind;
  return (
    group === APPROVAL_TASK_GROUP &&
    version === APPROVAL_TASK_VERSION &&
    kind === APPROVAL_TASK_KIND
  );
}

function toRequester(request: AdmissionRequest): Requester {
  return {
    username: request.userInfo.username ?? '',
    groups: new Set(request.userInfo.groups ?? []),
  };
}

function badRequest(uid: string, message: string): AdmissionResponse {
  return {
    uid,
    allowed: false,
    status: { status: 'Failure', message, reason: 'BadRequest', code: 400 },
  };
}

function forbidden(uid: string, message: string): AdmissionResponse {
  return {
    uid,
    allowed: false,
    status: { status: 'Failure', message, reason: 'Forbidden', code: 403 },
  };
}

// ─── Factory ────────────────────────────────────────────────────

/** Create an AdmissionController for ApprovalTask updates. */
export function createAdmissionController(options: AdmissionControllerOptions): AdmissionController {
  const { logger, disallowUnknownFields } = options;

  function admit(request: AdmissionRequest): AdmissionResponse {
    const { uid } = request;

    if (!isApprovalTaskKind(request)) {
      logger.error('Unhandled kind', {
        component: 'admission-controller',
        uid,
        group: request.kind.group,
        version: request.kind.version,
        kind: request.kind.kind,
      });
    }

    const oldTask = decodeApprovalTask(request.oldObject, 'old', { disallowUnknownFields });
    if (!oldTask.ok) {
      logger.warn('Rejected undecodable old object', {
        component: 'admission-controller',
        uid,
        error: oldTask.error.message,
      });
      return badRequest(uid, oldTask.error.message);
    }

    const newTask = decodeApprovalTask(request.object, 'new', { disallowUnknownFields });
    if (!newTask.ok) {
      logger.warn('Rejected undecodable new object', {
        component: 'admission-controller',
        uid,
        error: newTask.error.message,
      });
      return badRequest(uid, newTask.error.message);
    }

    const requester = toRequester(request);
    const decision = decide(oldTask.value, newTask.value, requester);

    if (decision.allowed) {
      logger.info('ApprovalTask update admitted', {
        component: 'admission-controller',
        uid,
        name: request.name,
        namespace: request.namespace,
        username: requester.username,
      });
      return { uid, allowed: true };
    }

    logger.warn('ApprovalTask update denied', {
      component: 'admission-controller',
      uid,
      name: request.name,
      namespace: request.namespace,
      username: requester.username,
      code: decision.code,
      reason: decision.reason,
      retryable: decision.retryable,
    });
    return forbidden(uid, decision.reason);
  }

  return {
    admit,

    review(review: AdmissionReview): AdmissionReviewResponse {
      return {
        apiVersion: ADMISSION_API_VERSION,
        kind: 'AdmissionReview',
        response: admit(review.request),
      };
    },
  };
}
