/**
 * Plugin contract between a release host and a release plugin.
 *
 * Lifecycle: `getInfo` once → `validate` whenever configuration
 * changes → `execute` at each hook of a release.
 *
 * - `getInfo` describes the plugin and the hooks it handles.
 * - `execute` runs one hook. Expected failures come back as
 *   `success: false`; `executeHook` turns anything thrown into the same.
 * - `validate` checks a raw configuration map, including a remote
 *   credentials check where the plugin has one.
 */

import type {
  ExecuteRequest,
  ExecuteResponse,
  PluginInfo,
  RawConfig,
  ValidateResponse,
} from '../types/protocol.js';

export interface ReleasePlugin {
  getInfo(): PluginInfo;
  execute(request: ExecuteRequest, signal?: AbortSignal): Promise<ExecuteResponse>;
  validate(config: RawConfig, signal?: AbortSignal): Promise<ValidateResponse>;
}
