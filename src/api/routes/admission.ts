/**
 * Admission route: receives AdmissionReviews from the API server.
 */
import type { FastifyInstance } from 'fastify';
import { ValidationError } from '@/core/errors.js';
import { admissionReviewSchema } from '@/webhook/schema.js';
import type { RouteDependencies } from '../types.js';

// ─── Route Plugin ───────────────────────────────────────────────

/** Register the ApprovalTask validation endpoint at the configured path. */
export async function admissionRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): Promise<void> {
  const { admissionController, webhookPath } = deps;

  // POST <webhookPath>; an envelope without a request has no uid to answer, so it is a plain 400
  fastify.post(webhookPath, async (request, reply) => {
    const parsed = admissionReviewSchema.safeParse(request.body);
    if (!parsed.success) {
      throw new ValidationError(
        'Body is not an AdmissionReview',
        parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
      );
    }
    return reply.status(200).send(admissionController.review(parsed.data));
  });
}
