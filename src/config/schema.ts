/**
 * Zod schema for the webhook server configuration.
 * Values arrive as strings from the environment, so numbers and booleans
 * are coerced.
 */
import { z } from 'zod';

const booleanFlagSchema = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((value) => value === true || value === 'true' || value === '1');

export const webhookConfigSchema = z.object({
  host: z.string().min(1).default('0.0.0.0'),
  port: z.coerce.number().int().min(1).max(65_535).default(8443),
  webhookPath: z
    .string()
    .regex(/^\/[A-Za-z0-9/_-]*$/, 'Webhook path must start with "/"')
    .default('/approvaltask-validation'),
  disallowUnknownFields: booleanFlagSchema.default(true),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});
