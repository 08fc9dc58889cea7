/**
 * Configuration loader: reads the webhook configuration from a JSON file
 * or the environment, resolves `${VAR}` placeholders, and validates with Zod.
 */
import { readFile } from 'node:fs/promises';

import { AdmissionError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

import { webhookConfigSchema } from './schema.js';
import type { WebhookConfig } from './types.js';

// ─── Errors ─────────────────────────────────────────────────────

/**
 * Error returned when configuration loading or validation fails.
 */
export class ConfigError extends AdmissionError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'CONFIG_ERROR',
      statusCode: 400,
      context,
    });
    this.name = 'ConfigError';
  }
}

// ─── Environment Variable Resolution ────────────────────────────

const ENV_VAR_PATTERN = /^\$\{([A-Z_][A-Z0-9_]*)\}$/;

/**
 * Recursively replaces strings of the exact form `${VAR_NAME}` with the
 * value of that environment variable.
 *
 * @throws ConfigError if a referenced environment variable is not defined
 */
export function resolveEnvVars(obj: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof obj === 'string') {
    const varName = ENV_VAR_PATTERN.exec(obj)?.[1];
    if (varName === undefined) return obj;
    const value = env[varName];
    if (value === undefined) {
      throw new ConfigError(`Environment variable "${varName}" is not defined`, {
        variableName: varName,
        pattern: obj,
      });
    }
    return value;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVars(item, env));
  }

  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVars(value, env);
    }
    return result;
  }

  return obj;
}

// ─── Validation ─────────────────────────────────────────────────

function validate(raw: unknown, source: string): Result<WebhookConfig, ConfigError> {
  const validation = webhookConfigSchema.safeParse(raw);
  if (!validation.success) {
    const issues = validation.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return err(new ConfigError('Configuration validation failed', { source, issues }));
  }
  return ok(validation.data);
}

// ─── Loaders ────────────────────────────────────────────────────

/**
 * Build the configuration from environment variables:
 * HOST, PORT, WEBHOOK_PATH, DISALLOW_UNKNOWN_FIELDS and LOG_LEVEL.
 * Unset variables fall back to the schema defaults.
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): Result<WebhookConfig, ConfigError> {
  return validate(
    {
      host: env['HOST'],
      port: env['PORT'],
      webhookPath: env['WEBHOOK_PATH'],
      disallowUnknownFields: env['DISALLOW_UNKNOWN_FIELDS'],
      logLevel: env['LOG_LEVEL'],
    },
    'environment',
  );
}

/**
 * Load and validate a JSON configuration file.
 *
 * 1. Reads the file from disk
 * 2. Parses the JSON content
 * 3. Resolves environment variable placeholders
 * 4. Validates against the Zod schema
 */
export async function loadConfigFile(
  filePath: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<Result<WebhookConfig, ConfigError>> {
  let fileContent: string;
  try {
    fileContent = await readFile(filePath, 'utf-8');
  } catch (error) {
    const errorCode = error instanceof Error && 'code' in error ? error.code : undefined;
    if (errorCode === 'ENOENT') {
      return err(
        new ConfigError(`Configuration file not found: ${filePath}`, {
          filePath,
          errorCode,
        }),
      );
    }
    return err(
      new ConfigError(`Failed to read configuration file: ${filePath}`, {
        filePath,
        errorCode,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContent);
  } catch {
    return err(new ConfigError('Invalid JSON in configuration file', { filePath }));
  }

  let resolved: unknown;
  try {
    resolved = resolveEnvVars(parsed, env);
  } catch (error) {
    if (error instanceof ConfigError) return err(error);
    return err(
      new ConfigError('Failed to resolve environment variables', {
        filePath,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  return validate(resolved, filePath);
}

/** Load from CONFIG_PATH when it is set, otherwise from the environment. */
export async function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
): Promise<Result<WebhookConfig, ConfigError>> {
  const configPath = env['CONFIG_PATH'];
  if (configPath) return loadConfigFile(configPath, env);
  return loadConfigFromEnv(env);
}
