/**
 * Error codes and the wire shape of a structured error.
 *
 * Every failure the plugin reports to the host carries one of these
 * codes. `ReleaseError` (core/release-error.ts) is the throwable form.
 */

// ---------------------------------------------------------------------------
// ErrorCode
// ---------------------------------------------------------------------------

export const ErrorCode = {
  /** The version_format template failed to parse or render. */
  TEMPLATE_ERROR: 'TEMPLATE_ERROR',
  /** Connection failure, timeout or cancellation of a remote call. */
  TRANSPORT_ERROR: 'TRANSPORT_ERROR',
  /** The tracker answered with a non-2xx status. */
  REMOTE_API_ERROR: 'REMOTE_API_ERROR',
  /** A configuration value is missing or has the wrong type. */
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  /** A release event does not match the expected shape. */
  INVALID_EVENT: 'INVALID_EVENT',
  /** A hook did not finish before its deadline. */
  HOOK_TIMEOUT: 'HOOK_TIMEOUT',
  /** Anything else thrown while running a hook. */
  PLUGIN_ERROR: 'PLUGIN_ERROR',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

// ---------------------------------------------------------------------------
// ErrorPayload
// ---------------------------------------------------------------------------

/** Serializable error description attached to a failed response. */
export interface ErrorPayload {
  code: ErrorCodeValue;
  message: string;
  retriable: boolean;
  /** Configuration key the error relates to. */
  field?: string;
  /** HTTP status for REMOTE_API_ERROR. */
  status?: number;
}

// ---------------------------------------------------------------------------
// Retriable defaults
// ---------------------------------------------------------------------------

/**
 * Whether the same invocation might succeed if the host runs it again.
 * The plugin itself never retries.
 */
export const ERROR_RETRIABLE_DEFAULTS: Readonly<Record<ErrorCodeValue, boolean>> = {
  TEMPLATE_ERROR: false,
  TRANSPORT_ERROR: true,
  REMOTE_API_ERROR: false,
  VALIDATION_ERROR: false,
  INVALID_EVENT: false,
  HOOK_TIMEOUT: true,
  PLUGIN_ERROR: false,
};
