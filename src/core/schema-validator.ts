/**
 * Shape checks for untyped input using ajv.
 *
 * - `checkConfigShape` reports wrong-typed config keys as field errors
 *   (used by validate(); execute() decodes leniently instead).
 * - `parseReleaseEvent` turns parsed JSON into a typed ReleaseEvent or
 *   throws INVALID_EVENT.
 *
 * Both schemas are compiled once at module load.
 */

import _Ajv, { type ErrorObject } from 'ajv';
// ajv ESM interop: default export is the constructor
const Ajv = _Ajv.default ?? _Ajv;

import { CONFIG_JSON_SCHEMA, RELEASE_EVENT_JSON_SCHEMA } from '../types/config-schema.js';
import type { FieldError, RawConfig } from '../types/protocol.js';
import type { ReleaseEvent } from '../types/release.js';
import { ErrorCode } from '../types/errors.js';
import { ReleaseError } from './release-error.js';

// ---------------------------------------------------------------------------
// Compiled validators
// ---------------------------------------------------------------------------

const ajv = new Ajv({ allErrors: true, strict: false });
const validateConfig = ajv.compile(CONFIG_JSON_SCHEMA);
const validateEvent = ajv.compile<ReleaseEvent>(RELEASE_EVENT_JSON_SCHEMA);

const POLLUTION_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

// ---------------------------------------------------------------------------
// Error formatting
// ---------------------------------------------------------------------------

/** `/commits/auto` → `commits.auto`; array indices stay numeric. */
function pointerToField(pointer: string): string {
  return pointer.split('/').filter(Boolean).join('.');
}

function toFieldError(err: ErrorObject): FieldError {
  const base = pointerToField(err.instancePath);

  if (err.keyword === 'required') {
    const missing: unknown = err.params['missingProperty'];
    const name = typeof missing === 'string' ? missing : '';
    const field = base ? `${base}.${name}` : name;
    return { field, message: `${field} is required` };
  }

  const field = base || '(root)';
  return { field, message: `${field} ${err.message ?? 'is invalid'}` };
}

function collectPollutionKeys(value: unknown, path: string): FieldError[] {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return [];
  }

  const errors: FieldError[] = [];
  for (const [key, nested] of Object.entries(value)) {
    const field = path ? `${path}.${key}` : key;
    if (POLLUTION_KEYS.has(key)) {
      errors.push({ field, message: `${field} is a reserved key and is not allowed` });
    }
    errors.push(...collectPollutionKeys(nested, field));
  }
  return errors;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Field errors for known keys whose values have the wrong type. */
export function checkConfigShape(raw: RawConfig): FieldError[] {
  const pollution = collectPollutionKeys(raw, '');
  if (pollution.length > 0) {
    return pollution;
  }

  if (validateConfig(raw)) {
    return [];
  }
  return (validateConfig.errors ?? []).map(toFieldError);
}

/**
 * Validate parsed JSON as a release event.
 *
 * @throws ReleaseError with code INVALID_EVENT listing every problem.
 */
export function parseReleaseEvent(value: unknown): ReleaseEvent {
  if (validateEvent(value)) {
    return value;
  }

  const problems = (validateEvent.errors ?? []).map((err) => toFieldError(err).message);
  throw new ReleaseError({
    code: ErrorCode.INVALID_EVENT,
    message: `Invalid release event: ${problems.join('; ')}`,
  });
}
