/**
 * File loaders for the CLI: plugin configuration (TOML or JSON) and
 * release events (JSON).
 *
 * The config loader returns the raw map the plugin contract takes;
 * decoding and defaults stay in `parseConfig`. Release events are
 * checked against RELEASE_EVENT_JSON_SCHEMA.
 */

import { parse as parseTOML } from 'smol-toml';
import { existsSync, readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { isRecord } from '../types/config.js';
import type { RawConfig } from '../types/protocol.js';
import type { ReleaseEvent } from '../types/release.js';
import { ErrorCode } from '../types/errors.js';
import { ReleaseError, ValidationError, errorMessage } from './release-error.js';
import { parseReleaseEvent } from './schema-validator.js';

// ---------------------------------------------------------------------------
// loadConfigFile()
// ---------------------------------------------------------------------------

/**
 * Load a plugin config map from `path`.
 *
 * `.json` files are read as JSON, anything else as TOML. An empty file
 * yields an empty map.
 *
 * @throws ValidationError (field `config`) when the file is missing,
 *   does not parse, or is not a table/object at the top level.
 */
export function loadConfigFile(path: string): RawConfig {
  if (!existsSync(path)) {
    throw new ValidationError('config', `Config file not found: ${path}`);
  }

  const content = readFileSync(path, 'utf-8');
  if (content.trim().length === 0) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = extname(path).toLowerCase() === '.json' ? JSON.parse(content) : parseTOML(content);
  } catch (error: unknown) {
    throw new ValidationError(
      'config',
      `Failed to parse config file ${path}: ${errorMessage(error)}`,
    );
  }

  if (!isRecord(parsed)) {
    throw new ValidationError('config', `Config file ${path} must contain an object`);
  }
  return parsed;
}

// ---------------------------------------------------------------------------
// loadReleaseEvent()
// ---------------------------------------------------------------------------

/**
 * Load a release event from a JSON file.
 *
 * @throws ReleaseError with code INVALID_EVENT when the file is missing,
 *   is not JSON, or does not match the release event shape.
 */
export function loadReleaseEvent(path: string): ReleaseEvent {
  if (!existsSync(path)) {
    throw new ReleaseError({
      code: ErrorCode.INVALID_EVENT,
      message: `Release event file not found: ${path}`,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error: unknown) {
    throw new ReleaseError({
      code: ErrorCode.INVALID_EVENT,
      message: `Failed to parse release event ${path}: ${errorMessage(error)}`,
      cause: error,
    });
  }

  return parseReleaseEvent(parsed);
}
