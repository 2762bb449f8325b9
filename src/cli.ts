/**
 * release-tracker CLI.
 *
 * Drives the release plugin contract from a shell:
 *   - `info`      Print plugin metadata.
 *   - `validate`  Validate a config file.
 *   - `execute`   Run one hook against a config file and a release event.
 *
 * Every command prints its JSON response on stdout; logs go to stderr.
 * Exit codes: 0 success, 1 failed or invalid result, 2 usage error.
 *
 * All external dependencies are injected via {@link CliDeps} for testability.
 * The real `main()` wires production dependencies and calls `runCommand()`.
 */

import { VERSION } from './version.js';
import type { ReleasePlugin } from './core/plugin-handler.js';
import { executeHook } from './core/hook-executor.js';
import { errorMessage, isReleaseError } from './core/release-error.js';
import type { RawConfig } from './types/protocol.js';
import type { ReleaseEvent } from './types/release.js';

// ---------------------------------------------------------------------------
// CLI dependency injection
// ---------------------------------------------------------------------------

/** Injectable dependencies for CLI commands. */
export interface CliDeps {
  /** Write to stdout. */
  stdout: (msg: string) => void;
  /** Write to stderr. */
  stderr: (msg: string) => void;
  plugin: ReleasePlugin;
  /** Read a config file into a raw map. */
  loadConfig: (path: string) => RawConfig;
  /** Read and check a release event file. */
  loadEvent: (path: string) => ReleaseEvent;
  /** Overall deadline for `execute`, in milliseconds. */
  hookTimeoutMs?: number;
}

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const ExitCode = {
  OK: 0,
  FAILED: 1,
  USAGE: 2,
} as const;

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

/** Flags that take the next argument as their value. */
const VALUE_FLAGS: ReadonlySet<string> = new Set(['config', 'event']);

/** Parsed CLI arguments. */
export interface ParsedArgs {
  command: string;
  subcommand: string;
  flags: Record<string, boolean>;
  options: Record<string, string>;
  /** Usage problems found while parsing. */
  errors: string[];
}

/**
 * Parse process.argv into a command, optional subcommand, boolean flags
 * and valued options.
 *
 * Expects argv in the form: [node, script, command?, subcommand?, ...flags]
 * `--config <file>` and `--event <file>` also accept `--config=<file>`.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const parsed: ParsedArgs = { command: '', subcommand: '', flags: {}, options: {}, errors: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    if (arg.startsWith('--')) {
      const body = arg.slice(2);
      const eq = body.indexOf('=');
      const name = eq === -1 ? body : body.slice(0, eq);

      if (!VALUE_FLAGS.has(name)) {
        parsed.flags[name] = true;
        continue;
      }
      const value = eq === -1 ? args[++i] : body.slice(eq + 1);
      if (value === undefined || value === '' || (eq === -1 && value.startsWith('--'))) {
        parsed.errors.push(`Option --${name} requires a value`);
        if (value?.startsWith('--')) i--;
        continue;
      }
      parsed.options[name] = value;
    } else if (!parsed.command) {
      parsed.command = arg;
    } else if (!parsed.subcommand) {
      parsed.subcommand = arg;
    } else {
      parsed.errors.push(`Unexpected argument: "${arg}"`);
    }
  }

  return parsed;
}

// ---------------------------------------------------------------------------
// Command dispatch
// ---------------------------------------------------------------------------

export const USAGE = `Usage: release-tracker <command>

Commands:
  info                                   Print plugin metadata
  validate --config <file>               Validate a config file
  execute <hook> --config <file> --event <file> [--dry-run]
                                         Run a hook (pre-publish, post-publish, on-error)

Options:
  --version    Show version number
  --help       Show this help message
  --dry-run    Report what would be done without calling Sentry

Config files are TOML, or JSON when the name ends in .json.
Release events are JSON.`;

/**
 * Dispatch parsed arguments to the matching command.
 *
 * @returns Process exit code (see {@link ExitCode}).
 */
export async function runCommand(args: ParsedArgs, deps: CliDeps): Promise<number> {
  if (args.flags['version']) {
    deps.stdout(VERSION);
    return ExitCode.OK;
  }

  if (args.command === '' || args.flags['help']) {
    deps.stdout(USAGE);
    return ExitCode.OK;
  }

  if (args.errors.length > 0) {
    return usageError(deps, args.errors.join('\n'));
  }

  switch (args.command) {
    case 'info':
      return info(deps);
    case 'validate':
      return validate(args, deps);
    case 'execute':
      return execute(args, deps);
    default:
      return usageError(deps, `Unknown command: "${args.command}"`);
  }
}

function usageError(deps: CliDeps, message: string): number {
  deps.stderr(`${message}\n`);
  deps.stderr(USAGE);
  return ExitCode.USAGE;
}

function printJson(deps: CliDeps, value: unknown): void {
  deps.stdout(JSON.stringify(value, null, 2));
}

/** Report a file that could not be loaded; the message names the file. */
function loadFailure(deps: CliDeps, error: unknown): number {
  const code = isReleaseError(error) ? `${error.code}: ` : '';
  deps.stderr(`${code}${errorMessage(error)}\n`);
  return ExitCode.FAILED;
}

// ---------------------------------------------------------------------------
// info
// ---------------------------------------------------------------------------

export function info(deps: CliDeps): number {
  printJson(deps, deps.plugin.getInfo());
  return ExitCode.OK;
}

// ---------------------------------------------------------------------------
// validate
// ---------------------------------------------------------------------------

export async function validate(args: ParsedArgs, deps: CliDeps): Promise<number> {
  const configPath = args.options['config'];
  if (configPath === undefined) {
    return usageError(deps, 'validate requires --config <file>');
  }

  let config: RawConfig;
  try {
    config = deps.loadConfig(configPath);
  } catch (error: unknown) {
    return loadFailure(deps, error);
  }

  const response = await deps.plugin.validate(config);
  printJson(deps, response);
  return response.valid ? ExitCode.OK : ExitCode.FAILED;
}

// ---------------------------------------------------------------------------
// execute
// ---------------------------------------------------------------------------

export async function execute(args: ParsedArgs, deps: CliDeps): Promise<number> {
  const hook = args.subcommand;
  if (hook === '') {
    return usageError(deps, 'execute requires a hook name');
  }
  const configPath = args.options['config'];
  const eventPath = args.options['event'];
  if (configPath === undefined || eventPath === undefined) {
    return usageError(deps, 'execute requires --config <file> and --event <file>');
  }

  let config: RawConfig;
  let context: ReleaseEvent;
  try {
    config = deps.loadConfig(configPath);
    context = deps.loadEvent(eventPath);
  } catch (error: unknown) {
    return loadFailure(deps, error);
  }

  const options = deps.hookTimeoutMs !== undefined ? { timeoutMs: deps.hookTimeoutMs } : {};
  const response = await executeHook(
    deps.plugin,
    { hook, config, context, dryRun: args.flags['dry-run'] === true },
    options,
  );
  printJson(deps, response);
  return response.success ? ExitCode.OK : ExitCode.FAILED;
}
