import { readFile } from 'node:fs/promises';

import { beforeEach, describe, expect, it, vi } from 'vitest';

import {
  ConfigError,
  loadConfig,
  loadConfigFile,
  loadConfigFromEnv,
  resolveEnvVars,
} from './loader.js';

vi.mock('node:fs/promises', () => ({
  readFile: vi.fn(),
}));

const mockedReadFile = vi.mocked(readFile);

function enoent(): Error {
  return Object.assign(new Error('ENOENT: no such file or directory'), { code: 'ENOENT' });
}

describe('resolveEnvVars', () => {
  it('replaces exact ${VAR} placeholders recursively', () => {
    const env = { WEBHOOK_PORT: '9443', WEBHOOK_HOST: '127.0.0.1' };

    const resolved = resolveEnvVars(
      { port: '${WEBHOOK_PORT}', nested: { hosts: ['${WEBHOOK_HOST}', 'literal'] }, flag: true },
      env,
    );

    expect(resolved).toEqual({ port: '9443', nested: { hosts: ['127.0.0.1', 'literal'] }, flag: true });
  });

  it('leaves strings that only contain a placeholder untouched', () => {
    expect(resolveEnvVars('prefix-${WEBHOOK_PORT}', {})).toBe('prefix-${WEBHOOK_PORT}');
  });

  it('throws ConfigError for an undefined variable', () => {
    expect(() => resolveEnvVars({ port: '${MISSING_PORT}' }, {})).toThrow(ConfigError);
    expect(() => resolveEnvVars({ port: '${MISSING_PORT}' }, {})).toThrow(
      'Environment variable "MISSING_PORT" is not defined',
    );
  });
});

describe('loadConfigFromEnv', () => {
  it('applies defaults when nothing is set', () => {
    const result = loadConfigFromEnv({});

    expect(result).toEqual({
      ok: true,
      value: {
        host: '0.0.0.0',
        port: 8443,
        webhookPath: '/approvaltask-validation',
        disallowUnknownFields: true,
        logLevel: 'info',
      },
    });
  });

  it('coerces numbers and flags from strings', () => {
    const result = loadConfigFromEnv({
      HOST: '127.0.0.1',
      PORT: '9443',
      WEBHOOK_PATH: '/validate',
      DISALLOW_UNKNOWN_FIELDS: 'false',
      LOG_LEVEL: 'debug',
    });

    expect(result).toEqual({
      ok: true,
      value: {
        host: '127.0.0.1',
        port: 9443,
        webhookPath: '/validate',
        disallowUnknownFields: false,
        logLevel: 'debug',
      },
    });
  });

  it('returns a ConfigError listing invalid fields', () => {
    const result = loadConfigFromEnv({ PORT: '70000', DISALLOW_UNKNOWN_FIELDS: 'maybe' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ConfigError);
    expect(result.error.message).toBe('Configuration validation failed');
    const issues = result.error.context?.['issues'];
    expect(Array.isArray(issues) && issues.map((i: { path: string }) => i.path)).toEqual([
      'port',
      'disallowUnknownFields',
    ]);
  });
});

describe('loadConfigFile', () => {
  beforeEach(() => {
    mockedReadFile.mockReset();
  });

  it('loads, resolves and validates a JSON file', async () => {
    mockedReadFile.mockResolvedValue(
      JSON.stringify({ port: '${WEBHOOK_PORT}', webhookPath: '/validate', disallowUnknownFields: false }),
    );

    const result = await loadConfigFile('/etc/webhook/config.json', { WEBHOOK_PORT: '9443' });

    expect(result).toEqual({
      ok: true,
      value: {
        host: '0.0.0.0',
        port: 9443,
        webhookPath: '/validate',
        disallowUnknownFields: false,
        logLevel: 'info',
      },
    });
  });

  it('reports a missing file', async () => {
    mockedReadFile.mockRejectedValue(enoent());

    const result = await loadConfigFile('/missing.json', {});

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Configuration file not found: /missing.json');
  });

  it('reports invalid JSON', async () => {
    mockedReadFile.mockResolvedValue('{ port: 1 ');

    const result = await loadConfigFile('/bad.json', {});

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Invalid JSON in configuration file');
  });

  it('reports an undefined placeholder variable', async () => {
    mockedReadFile.mockResolvedValue(JSON.stringify({ host: '${WEBHOOK_HOST}' }));

    const result = await loadConfigFile('/config.json', {});

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Environment variable "WEBHOOK_HOST" is not defined');
  });

  it('rejects a webhook path without a leading slash', async () => {
    mockedReadFile.mockResolvedValue(JSON.stringify({ webhookPath: 'validate' }));

    const result = await loadConfigFile('/config.json', {});

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.context?.['issues']).toEqual([
      { path: 'webhookPath', message: 'Webhook path must start with "/"' },
    ]);
  });
});

describe('loadConfig', () => {
  beforeEach(() => {
    mockedReadFile.mockReset();
  });

  it('reads the file named by CONFIG_PATH', async () => {
    mockedReadFile.mockResolvedValue(JSON.stringify({ port: 10250 }));

    const result = await loadConfig({ CONFIG_PATH: '/etc/webhook/config.json', PORT: '1' });

    expect(mockedReadFile).toHaveBeenCalledWith('/etc/webhook/config.json', 'utf-8');
    expect(result.ok && result.value.port).toBe(10250);
  });

  it('falls back to the environment without CONFIG_PATH', async () => {
    const result = await loadConfig({ PORT: '9443' });

    expect(mockedReadFile).not.toHaveBeenCalled();
    expect(result.ok && result.value.port).toBe(9443);
  });
});
