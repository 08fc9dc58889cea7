/**
 * Global Fastify error handler and response helpers.
 * Maps AdmissionError subclasses and ZodError to structured error envelopes
 * and logs through the logger the server was built with.
 */
import type { FastifyInstance, FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { AdmissionError } from '@/core/errors.js';
import type { Logger } from '@/observability/logger.js';
import type { ApiErrorResponse } from './types.js';

// ─── Response Helpers ───────────────────────────────────────────

/** Send an error response wrapped in the error envelope. */
export async function sendError(
  reply: FastifyReply,
  code: string,
  message: string,
  statusCode = 500,
  details?: Record<string, unknown>,
): Promise<void> {
  const body: ApiErrorResponse = {
    success: false,
    error: { code, message, ...(details && { details }) },
  };
  await reply.status(statusCode).send(body);
}

// ─── Global Handlers ────────────────────────────────────────────

/** Register the global Fastify error and not-found handlers, logging through `logger`. */
export function registerErrorHandler(fastify: FastifyInstance, logger: Logger): void {
  fastify.setNotFoundHandler(async (request, reply) => {
    await sendError(reply, 'NOT_FOUND', `Route ${request.method} ${request.url} not found`, 404);
  });

  fastify.setErrorHandler(async (error, request, reply) => {
    // Zod validation errors
    if (error instanceof ZodError) {
      const details: Record<string, unknown> = {
        issues: error.issues.map((i) => ({
          path: i.path.join('.'),
          message: i.message,
        })),
      };
      await sendError(reply, 'VALIDATION_ERROR', 'Request validation failed', 400, details);
      return;
    }

    // AdmissionError hierarchy: use the error's own statusCode and code
    if (error instanceof AdmissionError) {
      logger.warn('Request failed with AdmissionError', {
        component: 'error-handler',
        method: request.method,
        url: request.url,
        code: error.code,
        statusCode: error.statusCode,
        message: error.message,
      });
      await sendError(reply, error.code, error.message, error.statusCode, error.context);
      return;
    }

    // Fastify built-in errors (e.g., JSON parse failures, body too large)
    if (typeof error.statusCode === 'number' && error.statusCode < 500) {
      await sendError(reply, 'REQUEST_ERROR', error.message, error.statusCode);
      return;
    }

    logger.error('Unhandled error in request', {
      component: 'error-handler',
      method: request.method,
      url: request.url,
      error: error.message,
      stack: error.stack,
    });
    await sendError(reply, 'INTERNAL_ERROR', 'An unexpected error occurred', 500);
  });
}
