/**
 * ReleaseError: structured error classes for the release plugin.
 *
 * Components throw a ReleaseError subclass to say what kind of failure
 * happened. The hook executor discriminates ReleaseError from other
 * throws: ReleaseError → its own message and code, anything else →
 * generic PLUGIN_ERROR.
 *
 * - TemplateError: bad version_format, raised before any network call.
 * - TransportError: connection failure, timeout or abort.
 * - RemoteApiError: non-2xx response, carries status and server detail.
 * - ValidationError: configuration or event deficiency, field-scoped.
 */

import type { ErrorCodeValue, ErrorPayload } from '../types/errors.js';
import { ERROR_RETRIABLE_DEFAULTS, ErrorCode } from '../types/errors.js';

// ---------------------------------------------------------------------------
// Brand symbol (module-private, not exported)
// ---------------------------------------------------------------------------

/**
 * Brands ReleaseError instances so the guard also recognizes errors
 * created by another copy of this module.
 */
const RELEASE_ERROR_BRAND = Symbol.for('release-tracker.ReleaseError');

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ReleaseErrorOptions {
  /** Machine-readable error code. */
  code: ErrorCodeValue;
  /** Human-readable explanation. */
  message: string;
  /** Defaults to ERROR_RETRIABLE_DEFAULTS for the code. */
  retriable?: boolean;
  /** Configuration key that caused the error. */
  field?: string;
  /** Underlying error. */
  cause?: unknown;
}

// ---------------------------------------------------------------------------
// ReleaseError base class
// ---------------------------------------------------------------------------

export class ReleaseError extends Error {
  readonly code: ErrorCodeValue;
  readonly retriable: boolean;
  readonly field?: string;

  /** @internal */
  readonly [RELEASE_ERROR_BRAND] = true as const;

  constructor(options: ReleaseErrorOptions) {
    super(options.message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ReleaseError';
    this.code = options.code;
    this.retriable = options.retriable ?? ERROR_RETRIABLE_DEFAULTS[options.code];

    if (options.field !== undefined) {
      this.field = options.field;
    }
  }

  /** Serializable form without stack or cause. */
  toErrorPayload(): ErrorPayload {
    const payload: ErrorPayload = {
      code: this.code,
      message: this.message,
      retriable: this.retriable,
    };

    if (this.field !== undefined) {
      payload.field = this.field;
    }

    return payload;
  }
}

// ---------------------------------------------------------------------------
// Subclasses
// ---------------------------------------------------------------------------

export class TemplateError extends ReleaseError {
  constructor(message: string, cause?: unknown) {
    super({ code: ErrorCode.TEMPLATE_ERROR, message, field: 'version_format', cause });
    this.name = 'TemplateError';
  }
}

export class TransportError extends ReleaseError {
  constructor(message: string, cause?: unknown) {
    super({ code: ErrorCode.TRANSPORT_ERROR, message, cause });
    this.name = 'TransportError';
  }
}

export class RemoteApiError extends ReleaseError {
  /** HTTP status code of the response. */
  readonly status: number;
  /** Server-provided `detail`, or the raw body when there was none. */
  readonly detail: string;

  constructor(status: number, detail: string) {
    super({ code: ErrorCode.REMOTE_API_ERROR, message: `API error: ${detail} (status ${status})` });
    this.name = 'RemoteApiError';
    this.status = status;
    this.detail = detail;
  }

  override toErrorPayload(): ErrorPayload {
    return { ...super.toErrorPayload(), status: this.status };
  }
}

export class ValidationError extends ReleaseError {
  constructor(field: string, message: string) {
    super({ code: ErrorCode.VALIDATION_ERROR, message, field });
    this.name = 'ValidationError';
  }
}

// ---------------------------------------------------------------------------
// Type guard
// ---------------------------------------------------------------------------

/**
 * Type guard for ReleaseError instances, including ones from another
 * module instance (checked through the brand symbol).
 */
export function isReleaseError(value: unknown): value is ReleaseError {
  if (value instanceof ReleaseError) {
    return true;
  }

  return (
    typeof value === 'object' &&
    value !== null &&
    RELEASE_ERROR_BRAND in value &&
    value[RELEASE_ERROR_BRAND] === true
  );
}

/** Message of any thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
