/**
 * Hook execution with error discrimination.
 *
 * Wraps `plugin.execute` with:
 * - An overall deadline that aborts in-flight remote calls (→ HOOK_TIMEOUT)
 * - ReleaseError discrimination (→ structured error response)
 * - Generic error catch-all (→ PLUGIN_ERROR)
 *
 * The host always gets an ExecuteResponse back; nothing thrown by the
 * plugin escapes.
 */

import type { ExecuteRequest, ExecuteResponse } from '../types/protocol.js';
import { ErrorCode, ERROR_RETRIABLE_DEFAULTS, type ErrorPayload } from '../types/errors.js';
import type { ReleasePlugin } from './plugin-handler.js';
import { isReleaseError } from './release-error.js';
import { createLogger, type Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** Options controlling hook execution. */
export interface HookExecutionOptions {
  /** Maximum time in milliseconds before HOOK_TIMEOUT. Default 120_000. */
  timeoutMs: number;
  logger?: Logger;
}

/** Default hook execution options. */
export const DEFAULT_HOOK_OPTIONS: Readonly<HookExecutionOptions> = {
  timeoutMs: 120_000,
};

// ---------------------------------------------------------------------------
// Deadline helper
// ---------------------------------------------------------------------------

class DeadlineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DeadlineError';
  }
}

/**
 * Race `run` against a deadline. On expiry the signal handed to `run`
 * is aborted and the returned promise rejects with DeadlineError.
 */
async function withDeadline<T>(
  run: (signal: AbortSignal) => Promise<T>,
  ms: number,
  label: string,
  external?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();
  const onExternalAbort = (): void => controller.abort(external?.reason);
  if (external?.aborted) {
    controller.abort(external.reason);
  } else {
    external?.addEventListener('abort', onExternalAbort, { once: true });
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const error = new DeadlineError(`Hook "${label}" did not complete within ${ms}ms`);
      reject(error);
      controller.abort(error);
    }, ms);
  });

  try {
    return await Promise.race([run(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
    external?.removeEventListener('abort', onExternalAbort);
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Execute one hook with full error discrimination.
 *
 * Flow:
 * 1. Call plugin.execute under the deadline with a linked AbortSignal
 * 2. If it returns: pass the response through
 * 3. If the deadline passes: HOOK_TIMEOUT
 * 4. If a ReleaseError is thrown: its message and payload
 * 5. If anything else is thrown: PLUGIN_ERROR
 */
export async function executeHook(
  plugin: ReleasePlugin,
  request: ExecuteRequest,
  options?: Partial<HookExecutionOptions>,
  signal?: AbortSignal,
): Promise<ExecuteResponse> {
  const opts: HookExecutionOptions = { ...DEFAULT_HOOK_OPTIONS, ...options };
  const logger = (opts.logger ?? createLogger('hook-executor')).withContext({
    hook: request.hook,
    version: request.context.version,
  });
  const started = Date.now();

  try {
    const response = await withDeadline(
      (linked) => plugin.execute(request, linked),
      opts.timeoutMs,
      request.hook,
      signal,
    );
    logger.info('hook finished', { ok: response.success, duration_ms: Date.now() - started });
    return response;
  } catch (error: unknown) {
    const duration_ms = Date.now() - started;

    if (error instanceof DeadlineError) {
      logger.error('hook timed out', { ok: false, error_code: ErrorCode.HOOK_TIMEOUT, duration_ms });
      return failure({
        code: ErrorCode.HOOK_TIMEOUT,
        message: error.message,
        retriable: ERROR_RETRIABLE_DEFAULTS[ErrorCode.HOOK_TIMEOUT],
      });
    }

    if (isReleaseError(error)) {
      logger.error('hook failed', { ok: false, error_code: error.code, duration_ms, error });
      return failure(error.toErrorPayload());
    }

    logger.error('hook raised an unexpected error', {
      ok: false,
      error_code: ErrorCode.PLUGIN_ERROR,
      duration_ms,
      error,
    });
    return failure({
      code: ErrorCode.PLUGIN_ERROR,
      message: 'Plugin encountered an internal error',
      retriable: ERROR_RETRIABLE_DEFAULTS[ErrorCode.PLUGIN_ERROR],
    });
  }
}

function failure(payload: ErrorPayload): ExecuteResponse {
  return { success: false, error: payload.message, errorPayload: payload, outputs: {} };
}
