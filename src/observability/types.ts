// ─── Logging ────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogContext {
  /** Admission request uid, when the entry concerns one request. */
  uid?: string;
  component: string;
  [key: string]: unknown;
}
