#!/usr/bin/env node
/**
 * Production entry point for release-tracker.
 *
 * Wires real dependencies (filesystem loaders, process streams, the
 * Sentry-backed plugin) into CliDeps and dispatches to the CLI.
 *
 * Usage:
 *   node dist/main.js info
 *   node dist/main.js validate --config sentry.toml
 *   node dist/main.js execute pre-publish --config sentry.toml --event event.json
 */

import { parseArgs, runCommand, type CliDeps } from './cli.js';
import { loadConfigFile, loadReleaseEvent } from './core/config-loader.js';
import { configureLogging, createLogger, parseLogLevel } from './core/logger.js';
import { SentryReleasePlugin } from './plugins/sentry/handler.js';
import type { Env } from './types/config.js';

/** Environment variable selecting the log level (debug, info, warn, error). */
export const LOG_LEVEL_ENV = 'RELEASE_TRACKER_LOG_LEVEL';

export function createProductionDeps(env: Env): CliDeps {
  return {
    stdout: (msg) => process.stdout.write(msg + '\n'),
    stderr: (msg) => process.stderr.write(msg),
    plugin: new SentryReleasePlugin({ env }),
    loadConfig: loadConfigFile,
    loadEvent: loadReleaseEvent,
  };
}

/**
 * Parse argv, configure logging from the environment and run the
 * command. Resolves to the process exit code.
 */
export async function main(argv: string[] = process.argv, env: Env = process.env): Promise<number> {
  const level = parseLogLevel(env[LOG_LEVEL_ENV]);
  if (level !== undefined) {
    configureLogging({ level });
  }

  return runCommand(parseArgs(argv), createProductionDeps(env));
}

// ---------------------------------------------------------------------------
// Entry point: run when executed directly
// ---------------------------------------------------------------------------

/* c8 ignore next 6 */
main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    createLogger('main').error('fatal error', { error });
    process.exitCode = 1;
  },
);
