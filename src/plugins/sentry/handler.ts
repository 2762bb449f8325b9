/**
 * SentryReleasePlugin: release tracking for Sentry.
 *
 * Implements the release plugin contract. `execute` decodes the raw
 * config and dispatches the hook to the ReleaseOrchestrator; `validate`
 * runs the local checks and then confirms the credentials by fetching
 * the organization.
 *
 * Dependencies are injected through the constructor so tests can swap
 * the tracker client, environment and clock.
 */

import type { ReleasePlugin } from '../../core/plugin-handler.js';
import { ReleaseOrchestrator } from '../../core/release-orchestrator.js';
import { SentryClient } from '../../core/tracker/sentry-client.js';
import type { TrackerClientFactory } from '../../core/tracker/tracker-client.js';
import { parseVersionTemplate } from '../../core/version-format.js';
import { checkConfigShape } from '../../core/schema-validator.js';
import { errorMessage, isReleaseError } from '../../core/release-error.js';
import { createLogger, type Logger } from '../../core/logger.js';
import { systemClock, type Clock } from '../../core/timestamp.js';
import { ErrorCode } from '../../types/errors.js';
import { getProjects, parseConfig, type Env } from '../../types/config.js';
import {
  Hook,
  isHookName,
  type ExecuteRequest,
  type ExecuteResponse,
  type FieldError,
  type PluginInfo,
  type RawConfig,
  type ValidateResponse,
} from '../../types/protocol.js';
import { VERSION } from '../../version.js';

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

export interface SentryPluginDeps {
  /** Builds the tracker client for live runs and the credentials check. */
  clientFactory?: TrackerClientFactory;
  /** Environment consulted for `SENTRY_*` fallbacks. Defaults to process.env. */
  env?: Env;
  clock?: Clock;
  logger?: Logger;
}

/** Default factory: a SentryClient over HTTP(S). */
export const sentryClientFactory: TrackerClientFactory = (connection) =>
  new SentryClient(connection);

// ---------------------------------------------------------------------------
// SentryReleasePlugin
// ---------------------------------------------------------------------------

export class SentryReleasePlugin implements ReleasePlugin {
  private readonly clientFactory: TrackerClientFactory;
  private readonly env: Env;
  private readonly logger: Logger;
  private readonly orchestrator: ReleaseOrchestrator;

  constructor(deps: SentryPluginDeps = {}) {
    this.clientFactory = deps.clientFactory ?? sentryClientFactory;
    this.env = deps.env ?? process.env;
    this.logger = deps.logger ?? createLogger('sentry-plugin');
    this.orchestrator = new ReleaseOrchestrator({
      clientFactory: this.clientFactory,
      clock: deps.clock ?? systemClock,
      logger: this.logger.child('orchestrator'),
    });
  }

  getInfo(): PluginInfo {
    return {
      name: 'sentry',
      version: VERSION,
      description: 'Sentry release tracking, deploy notifications, and commit association',
      author: 'release-tracker contributors',
      hooks: [Hook.PRE_PUBLISH, Hook.POST_PUBLISH, Hook.ON_ERROR],
    };
  }

  async execute(request: ExecuteRequest, signal?: AbortSignal): Promise<ExecuteResponse> {
    const config = parseConfig(request.config, this.env);
    this.logger.debug('executing hook', {
      hook: request.hook,
      version: request.context.version,
      dry_run: request.dryRun,
    });

    const hook = request.hook;
    if (!isHookName(hook)) {
      return { success: true, message: `Hook ${hook} not implemented`, outputs: {} };
    }

    switch (hook) {
      case Hook.PRE_PUBLISH:
        return this.orchestrator.prePublish(config, request.context, request.dryRun, signal);
      case Hook.POST_PUBLISH:
        return this.orchestrator.postPublish(config, request.context, request.dryRun, signal);
      case Hook.ON_ERROR:
        return this.orchestrator.onError(request.context);
    }
  }

  async validate(raw: RawConfig, signal?: AbortSignal): Promise<ValidateResponse> {
    const config = parseConfig(raw, this.env);

    if (config.authToken === '') {
      return {
        valid: false,
        errors: [{ field: 'auth_token', message: 'Sentry auth token is required' }],
      };
    }

    const errors: FieldError[] = checkConfigShape(raw);

    if (config.org === '') {
      errors.push({ field: 'org', message: 'Sentry organization is required' });
    }

    if (getProjects(config).length === 0) {
      errors.push({ field: 'project', message: 'At least one project is required' });
    }

    try {
      parseVersionTemplate(config.versionFormat);
    } catch (error: unknown) {
      errors.push({
        field: 'version_format',
        message: `Invalid version format template: ${errorMessage(error)}`,
      });
    }

    if (config.org !== '') {
      const remoteError = await this.checkCredentials(config.url, config.authToken, config.org, signal);
      if (remoteError !== undefined) {
        errors.push(remoteError);
      }
    }

    return { valid: errors.length === 0, errors };
  }

  /** Fetch the organization; a failure becomes a field error. */
  private async checkCredentials(
    url: string,
    authToken: string,
    org: string,
    signal?: AbortSignal,
  ): Promise<FieldError | undefined> {
    try {
      const client = this.clientFactory({ url, authToken, org });
      await client.getOrganization(signal);
      return undefined;
    } catch (error: unknown) {
      if (isReleaseError(error) && error.code === ErrorCode.VALIDATION_ERROR) {
        return { field: error.field ?? 'url', message: error.message };
      }
      this.logger.warn('credentials check failed', { org, error });
      return {
        field: 'auth_token',
        message: `Failed to authenticate with Sentry: ${errorMessage(error)}`,
      };
    }
  }
}
