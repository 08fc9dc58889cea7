import type { z } from 'zod';
import type { webhookConfigSchema } from './schema.js';

// ─── Webhook Configuration ──────────────────────────────────────

/** Fully resolved server configuration, after defaults are applied. */
export type WebhookConfig = z.output<typeof webhookConfigSchema>;
