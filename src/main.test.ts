/**
 * Tests for main() entry point.
 *
 * main() is a thin wiring layer that configures logging, parses args,
 * creates real CliDeps and calls runCommand. runCommand is mocked so
 * nothing touches the network or the real process streams.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { main, createProductionDeps, LOG_LEVEL_ENV } from './main.js';
import { SentryReleasePlugin } from './plugins/sentry/handler.js';
import { loadConfigFile, loadReleaseEvent } from './core/config-loader.js';
import { configureLogging, resetLogging } from './core/logger.js';

vi.mock('./cli.js', async () => {
  const actual = await vi.importActual<typeof import('./cli.js')>('./cli.js');
  return {
    ...actual,
    runCommand: vi.fn().mockResolvedValue(0),
  };
});

vi.mock('./core/logger.js', async () => {
  const actual = await vi.importActual<typeof import('./core/logger.js')>('./core/logger.js');
  return {
    ...actual,
    configureLogging: vi.fn(),
  };
});

import { runCommand } from './cli.js';

describe('main', () => {
  afterEach(() => {
    vi.clearAllMocks();
    resetLogging();
  });

  it('parses argv and returns the exit code of runCommand', async () => {
    const code = await main(['node', 'release-tracker', 'validate', '--config', 'sentry.toml'], {});

    expect(runCommand).toHaveBeenCalledWith(
      expect.objectContaining({
        command: 'validate',
        options: { config: 'sentry.toml' },
      }),
      expect.any(Object),
    );
    expect(code).toBe(0);
  });

  it('returns non-zero exit code on failure', async () => {
    vi.mocked(runCommand).mockResolvedValueOnce(1);
    const code = await main(['node', 'release-tracker', 'bogus'], {});
    expect(code).toBe(1);
  });

  it('sets the log level from the environment', async () => {
    await main(['node', 'release-tracker', 'info'], { [LOG_LEVEL_ENV]: 'DEBUG' });
    expect(configureLogging).toHaveBeenCalledWith({ level: 'debug' });
  });

  it('ignores an unknown log level', async () => {
    await main(['node', 'release-tracker', 'info'], { [LOG_LEVEL_ENV]: 'verbose' });
    expect(configureLogging).not.toHaveBeenCalled();
  });
});

describe('createProductionDeps', () => {
  it('wires the Sentry plugin and the file loaders', () => {
    const deps = createProductionDeps({});

    expect(deps.plugin).toBeInstanceOf(SentryReleasePlugin);
    expect(deps.loadConfig).toBe(loadConfigFile);
    expect(deps.loadEvent).toBe(loadReleaseEvent);
  });
});
