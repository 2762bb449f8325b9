/**
 * release-tracker: Sentry release tracking behind a release plugin
 * contract.
 */

export { VERSION } from './version.js';

export * from './types/index.js';

export type { ReleasePlugin } from './core/plugin-handler.js';
export {
  SentryReleasePlugin,
  sentryClientFactory,
  type SentryPluginDeps,
} from './plugins/sentry/handler.js';
export {
  ReleaseOrchestrator,
  type CreateOrFetchResult,
  type ReleaseOrchestratorOptions,
  type ReleaseState,
} from './core/release-orchestrator.js';
export { executeHook, DEFAULT_HOOK_OPTIONS, type HookExecutionOptions } from './core/hook-executor.js';
export { SentryClient, type SentryClientOptions } from './core/tracker/sentry-client.js';
export type {
  CommitRecord,
  CreateDeployInput,
  CreateReleaseInput,
  Organization,
  RemoteDeploy,
  RemoteProject,
  RemoteRelease,
  TrackerClient,
  TrackerClientFactory,
  TrackerConnection,
} from './core/tracker/tracker-client.js';
export { extractCommits } from './core/commit-extractor.js';
export { formatVersion, parseVersionTemplate, shortSha } from './core/version-format.js';
export { checkConfigShape, parseReleaseEvent } from './core/schema-validator.js';
export { loadConfigFile, loadReleaseEvent } from './core/config-loader.js';
export {
  ReleaseError,
  TemplateError,
  TransportError,
  RemoteApiError,
  ValidationError,
  isReleaseError,
} from './core/release-error.js';
export {
  createLogger,
  configureLogging,
  resetLogging,
  type Logger,
  type LogLevel,
  type LogEntry,
  type LogSink,
} from './core/logger.js';
