/**
 * Runs the remote operations of one release lifecycle phase.
 *
 * Each phase renders the version once and reuses it for every call.
 * Pre-publish creates the release (falling back to fetching an existing
 * one); post-publish runs its actions as independent best-effort steps
 * whose failures are reported as warnings; on-error makes no calls.
 *
 * The tracker client is built only for live runs, so dry runs never
 * touch the network.
 */

import { getProjects, type PluginConfig } from '../types/config.js';
import type { ReleaseEvent } from '../types/release.js';
import type { ExecuteResponse, StepOutcome } from '../types/protocol.js';
import type {
  RemoteRelease,
  TrackerClient,
  TrackerClientFactory,
  CreateReleaseInput,
} from './tracker/tracker-client.js';
import { formatVersion } from './version-format.js';
import { extractCommits } from './commit-extractor.js';
import { errorMessage, isReleaseError } from './release-error.js';
import { createLogger, type Logger } from './logger.js';
import { formatTimestamp, systemClock, type Clock } from './timestamp.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Whether pre-publish made a new release or found one already there. */
export type ReleaseState = 'created' | 'already_existed';

export interface CreateOrFetchResult {
  state: ReleaseState;
  release: RemoteRelease;
}

export interface ReleaseOrchestratorOptions {
  clientFactory: TrackerClientFactory;
  clock?: Clock;
  logger?: Logger;
}

export const NO_ACTIONS_MESSAGE = 'No actions taken';
export const ON_ERROR_MESSAGE = 'Release failure noted (no Sentry action taken)';

// ---------------------------------------------------------------------------
// ReleaseOrchestrator
// ---------------------------------------------------------------------------

export class ReleaseOrchestrator {
  private readonly clientFactory: TrackerClientFactory;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: ReleaseOrchestratorOptions) {
    this.clientFactory = options.clientFactory;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('orchestrator');
  }

  async prePublish(
    config: PluginConfig,
    event: ReleaseEvent,
    dryRun: boolean,
    signal?: AbortSignal,
  ): Promise<ExecuteResponse> {
    const rendered = renderVersion(config, event);
    if (!rendered.ok) {
      return rendered.response;
    }
    const version = rendered.version;
    const projects = getProjects(config);
    const log = this.logger.withContext({ hook: 'pre-publish', version, org: config.org });

    if (dryRun) {
      return {
        success: true,
        message: `Would create Sentry release '${version}' for projects: ${projects.join(', ')}`,
        outputs: { version, projects },
      };
    }

    const input: CreateReleaseInput = {
      version,
      projects,
      dateStarted: formatTimestamp(this.clock()),
    };
    if (event.commitSha !== '') {
      input.ref = event.commitSha;
    }
    if (config.releaseUrl !== undefined) {
      input.url = config.releaseUrl;
    }

    let result: CreateOrFetchResult;
    try {
      result = await this.createOrFetchRelease(this.connect(config), input, log, signal);
    } catch (error: unknown) {
      log.error('release could not be created or fetched', { error });
      const response: ExecuteResponse = {
        success: false,
        error: `Failed to create release: ${errorMessage(error)}`,
        outputs: {},
      };
      if (isReleaseError(error)) {
        response.errorPayload = error.toErrorPayload();
      }
      return response;
    }

    const { release, state } = result;
    log.info('release ready', { state, ok: true });
    return {
      success: true,
      message:
        state === 'created'
          ? `Created Sentry release: ${release.version}`
          : `Sentry release already exists: ${release.version}`,
      outputs: {
        version: release.version,
        release_url: release.url ?? '',
        date_created: release.dateCreated ?? '',
        release_state: state,
      },
    };
  }

  /**
   * Create the release; on any create failure fetch it by version
   * instead. Rejects with the create error when the fetch fails too.
   */
  async createOrFetchRelease(
    client: TrackerClient,
    input: CreateReleaseInput,
    log: Logger = this.logger,
    signal?: AbortSignal,
  ): Promise<CreateOrFetchResult> {
    try {
      return { state: 'created', release: await client.createRelease(input, signal) };
    } catch (createError: unknown) {
      log.warn('create release failed, fetching existing release', { error: createError });
      try {
        return { state: 'already_existed', release: await client.getRelease(input.version, signal) };
      } catch (getError: unknown) {
        log.debug('fetching existing release failed', { error: getError });
        throw createError;
      }
    }
  }

  async postPublish(
    config: PluginConfig,
    event: ReleaseEvent,
    dryRun: boolean,
    signal?: AbortSignal,
  ): Promise<ExecuteResponse> {
    const rendered = renderVersion(config, event);
    if (!rendered.ok) {
      return rendered.response;
    }
    const version = rendered.version;
    const log = this.logger.withContext({ hook: 'post-publish', version, org: config.org });

    if (dryRun) {
      const messages: string[] = [];
      if (config.setCommits) {
        const count = extractCommits(config, event, this.clock).length;
        messages.push(`Would associate ${count} commits with release`);
      }
      if (config.createDeploy) {
        messages.push(`Would create deploy for environment: ${config.deploy.environment}`);
      }
      if (config.finalize) {
        messages.push('Would finalize release');
      }
      return {
        success: true,
        message: messages.length > 0 ? messages.join('; ') : NO_ACTIONS_MESSAGE,
        outputs: { version },
      };
    }

    const steps =
      config.setCommits || config.createDeploy || config.finalize
        ? await this.runSteps(this.lazyConnect(config), config, event, version, log, signal)
        : [];

    return {
      success: true,
      message: steps.length > 0 ? steps.map((step) => step.detail).join('; ') : NO_ACTIONS_MESSAGE,
      outputs: { version, steps },
      steps,
    };
  }

  /** Acknowledge a failed release. No remote calls. */
  onError(event: ReleaseEvent): ExecuteResponse {
    this.logger.info('release failure noted', { hook: 'on-error', version: event.version });
    return { success: true, message: ON_ERROR_MESSAGE, outputs: {} };
  }

  /**
   * Each step fetches the client through `client()`, so an unusable
   * connection surfaces as that step's warning.
   */
  private async runSteps(
    client: () => TrackerClient,
    config: PluginConfig,
    event: ReleaseEvent,
    version: string,
    log: Logger,
    signal?: AbortSignal,
  ): Promise<StepOutcome[]> {
    const steps: StepOutcome[] = [];

    if (config.setCommits) {
      const commits = extractCommits(config, event, this.clock);
      if (commits.length > 0) {
        steps.push(
          await runStep('set_commits', 'set commits', log, async () => {
            await client().setCommits(version, commits, signal);
            return `Associated ${commits.length} commits`;
          }),
        );
      } else {
        log.debug('no commits to associate');
      }
    }

    if (config.createDeploy) {
      steps.push(
        await runStep('create_deploy', 'create deploy', log, async () => {
          const now = formatTimestamp(this.clock());
          const deploy = await client().createDeploy(
            version,
            { ...config.deploy, dateStarted: now, dateFinished: now },
            signal,
          );
          return `Created deploy: ${deploy.environment}`;
        }),
      );
    }

    if (config.finalize) {
      steps.push(
        await runStep('finalize', 'finalize release', log, async () => {
          await client().finalizeRelease(version, formatTimestamp(this.clock()), signal);
          return 'Finalized release';
        }),
      );
    }

    return steps;
  }

  private connect(config: PluginConfig): TrackerClient {
    return this.clientFactory({ url: config.url, authToken: config.authToken, org: config.org });
  }

  /** Builds the client on first use and reuses it afterwards. */
  private lazyConnect(config: PluginConfig): () => TrackerClient {
    let client: TrackerClient | undefined;
    return () => {
      if (client === undefined) {
        client = this.connect(config);
      }
      return client;
    };
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

type RenderResult = { ok: true; version: string } | { ok: false; response: ExecuteResponse };

function renderVersion(config: PluginConfig, event: ReleaseEvent): RenderResult {
  try {
    return { ok: true, version: formatVersion(config.versionFormat, event) };
  } catch (error: unknown) {
    if (!isReleaseError(error)) {
      throw error;
    }
    return {
      ok: false,
      response: {
        success: false,
        error: `Failed to format version: ${error.message}`,
        errorPayload: error.toErrorPayload(),
        outputs: {},
      },
    };
  }
}

/** Run one post-publish action; a failure becomes a warning outcome. */
async function runStep(
  name: StepOutcome['name'],
  label: string,
  log: Logger,
  action: () => Promise<string>,
): Promise<StepOutcome> {
  const started = Date.now();
  try {
    const detail = await action();
    log.info(`${label} done`, { ok: true, duration_ms: Date.now() - started });
    return { name, ok: true, detail };
  } catch (error: unknown) {
    log.warn(`${label} failed`, {
      ok: false,
      duration_ms: Date.now() - started,
      error_code: isReleaseError(error) ? error.code : undefined,
      error,
    });
    return { name, ok: false, detail: `Warning: Failed to ${label}: ${errorMessage(error)}` };
  }
}
