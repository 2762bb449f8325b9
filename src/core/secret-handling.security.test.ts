/**
 * Credential handling across the plugin: the auth token reaches the
 * Authorization header and nothing else, and hostile config keys are
 * refused before they can reach the decoder.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SentryReleasePlugin } from '../plugins/sentry/handler.js';
import { executeHook } from './hook-executor.js';
import { configureLogging, createLogger, resetLogging, type LogEntry } from './logger.js';
import { checkConfigShape } from './schema-validator.js';
import { startFakeSentryServer, type FakeSentryServer } from '../testing/fake-sentry-server.js';
import {
  createTestRawConfig,
  createTestReleaseEventWithChanges,
  fixedClock,
} from '../testing/factories.js';

const TOKEN = 'test-token-do-not-log';

describe('auth token handling', () => {
  let server: FakeSentryServer;
  let entries: LogEntry[];

  beforeEach(async () => {
    server = await startFakeSentryServer();
    entries = [];
    configureLogging({ level: 'debug', sink: (entry) => entries.push(entry) });
  });

  afterEach(async () => {
    resetLogging();
    await server.close();
  });

  it('never writes the token to logs, even on failures', async () => {
    server.respond('POST', '/api/0/organizations/test-org/releases/', 500, {
      detail: 'Internal Error',
    });
    const plugin = new SentryReleasePlugin({ env: {}, clock: fixedClock() });
    const config = createTestRawConfig({ auth_token: TOKEN, url: server.url });

    await executeHook(plugin, {
      hook: 'pre-publish',
      config,
      context: createTestReleaseEventWithChanges(),
      dryRun: false,
    });
    await executeHook(plugin, {
      hook: 'post-publish',
      config,
      context: createTestReleaseEventWithChanges(),
      dryRun: false,
    });
    await plugin.validate(config);

    expect(entries.length).toBeGreaterThan(0);
    for (const entry of entries) {
      expect(JSON.stringify(entry)).not.toContain(TOKEN);
    }
  });

  it('sends the token only in the Authorization header', async () => {
    server.respond('GET', '/api/0/organizations/test-org/', 200, { id: '1', slug: 'test-org' });
    const plugin = new SentryReleasePlugin({ env: {} });

    await plugin.validate(createTestRawConfig({ auth_token: TOKEN, url: server.url }));

    const [request] = server.requests;
    expect(request.headers['authorization']).toBe(`Bearer ${TOKEN}`);
    expect(request.path).not.toContain(TOKEN);
  });

  it('drops deny-listed meta keys', () => {
    createLogger('security').info('config loaded', {
      auth_token: TOKEN,
      authorization: `Bearer ${TOKEN}`,
      org: 'test-org',
    });

    expect(entries).toHaveLength(1);
    expect(entries[0].org).toBe('test-org');
    expect(entries[0].meta).toBeUndefined();
  });
});

describe('hostile config keys', () => {
  it('refuses prototype pollution keys at any depth', () => {
    const raw: Record<string, unknown> = JSON.parse(
      '{"org":"o","deploy":{"__proto__":{"polluted":true}},"constructor":{}}',
    );

    expect(checkConfigShape(raw)).toEqual([
      { field: 'deploy.__proto__', message: 'deploy.__proto__ is a reserved key and is not allowed' },
      { field: 'constructor', message: 'constructor is a reserved key and is not allowed' },
    ]);
  });

  it('reports them through validate', async () => {
    const plugin = new SentryReleasePlugin({
      env: {},
      clientFactory: () => {
        throw new Error('no remote check expected to succeed');
      },
    });
    const raw: Record<string, unknown> = JSON.parse(
      '{"auth_token":"test-token","org":"o","project":"p","__proto__":{"finalize":false}}',
    );

    const response = await plugin.validate(raw);

    expect(response.valid).toBe(false);
    expect(response.errors[0]).toEqual({
      field: '__proto__',
      message: '__proto__ is a reserved key and is not allowed',
    });
  });
});
