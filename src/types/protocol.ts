/**
 * Host ↔ plugin contract types.
 *
 * The host calls `getInfo()` once, `validate()` when configuration
 * changes, and `execute()` at each lifecycle hook of a release.
 */

import type { ReleaseEvent } from './release.js';
import type { ErrorPayload } from './errors.js';

// ---------------------------------------------------------------------------
// Hooks
// ---------------------------------------------------------------------------

export const Hook = {
  PRE_PUBLISH: 'pre-publish',
  POST_PUBLISH: 'post-publish',
  ON_ERROR: 'on-error',
} as const;

export type HookName = (typeof Hook)[keyof typeof Hook];

const HOOK_NAMES: ReadonlySet<string> = new Set<string>(Object.values(Hook));

export function isHookName(value: string): value is HookName {
  return HOOK_NAMES.has(value);
}

// ---------------------------------------------------------------------------
// PluginInfo
// ---------------------------------------------------------------------------

export interface PluginInfo {
  name: string;
  version: string;
  description: string;
  author: string;
  hooks: HookName[];
}

// ---------------------------------------------------------------------------
// Execute
// ---------------------------------------------------------------------------

/** Raw configuration map as the host hands it over. */
export type RawConfig = Record<string, unknown>;

export interface ExecuteRequest {
  /** Hook being run. Hosts may send hooks this plugin does not know. */
  hook: string;
  config: RawConfig;
  context: ReleaseEvent;
  dryRun: boolean;
}

/** Outcome of one best-effort post-publish action. */
export interface StepOutcome {
  name: 'set_commits' | 'create_deploy' | 'finalize';
  ok: boolean;
  detail: string;
}

export interface ExecuteResponse {
  success: boolean;
  /** Human-readable summary. */
  message?: string;
  /** Set when `success` is false. */
  error?: string;
  /** Structured form of `error`. */
  errorPayload?: ErrorPayload;
  /** Named values for downstream consumers. */
  outputs: Record<string, unknown>;
  /** Per-action outcomes of post-publish, in execution order. */
  steps?: StepOutcome[];
}

// ---------------------------------------------------------------------------
// Validate
// ---------------------------------------------------------------------------

export interface FieldError {
  field: string;
  message: string;
}

export interface ValidateResponse {
  valid: boolean;
  errors: FieldError[];
}
