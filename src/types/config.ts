/**
 * Plugin configuration types and the typed decoder for the raw map the
 * host supplies.
 *
 * Precedence for every scalar: a config value of the right type, then
 * the matching environment variable (where one exists), then the
 * default. Values of the wrong type are ignored here; `validate()`
 * reports them through CONFIG_JSON_SCHEMA.
 */

import type { RawConfig } from './protocol.js';

// ---------------------------------------------------------------------------
// Config section types
// ---------------------------------------------------------------------------

/** `commits` section. */
export interface CommitsConfig {
  auto: boolean;
  /** Repository identifier sent with every commit. Empty → "unknown". */
  repository: string;
}

/** `deploy` section. */
export interface DeployConfig {
  environment: string;
  name?: string;
}

/** `sourcemaps` section. Parsed and carried, no behavior attached. */
export interface SourcemapsConfig {
  path: string;
  urlPrefix: string;
  include: string[];
  exclude: string[];
}

// ---------------------------------------------------------------------------
// Top-level config
// ---------------------------------------------------------------------------

export interface PluginConfig {
  authToken: string;
  org: string;
  project: string;
  projects: string[];
  url: string;
  /** Optional link stored on the created release. */
  releaseUrl?: string;
  versionFormat: string;
  environment: string;
  setCommits: boolean;
  commits: CommitsConfig;
  createDeploy: boolean;
  deploy: DeployConfig;
  uploadSourcemaps: boolean;
  sourcemaps: SourcemapsConfig;
  finalize: boolean;
}

// ---------------------------------------------------------------------------
// Defaults and environment variables
// ---------------------------------------------------------------------------

export const DEFAULT_URL = 'https://sentry.io';
export const DEFAULT_VERSION_FORMAT = '{{.Version}}';
export const DEFAULT_ENVIRONMENT = 'production';

export const ENV_VARS = {
  AUTH_TOKEN: 'SENTRY_AUTH_TOKEN',
  ORG: 'SENTRY_ORG',
  PROJECT: 'SENTRY_PROJECT',
  URL: 'SENTRY_URL',
} as const;

/** Environment variables visible to the decoder. */
export type Env = Readonly<Record<string, string | undefined>>;

// ---------------------------------------------------------------------------
// ConfigReader
// ---------------------------------------------------------------------------

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads typed values out of an untyped config map with per-field
 * defaults and environment-variable fallback.
 */
export class ConfigReader {
  constructor(
    private readonly raw: RawConfig,
    private readonly env: Env = {},
  ) {}

  /**
   * Non-empty string at `key`, else the non-empty `envVar` value, else
   * `fallback`. Pass `''` as `envVar` for keys without one.
   */
  getString(key: string, envVar: string, fallback: string): string {
    const value = this.raw[key];
    if (typeof value === 'string' && value !== '') {
      return value;
    }
    if (envVar !== '') {
      const fromEnv = this.env[envVar];
      if (fromEnv !== undefined && fromEnv !== '') {
        return fromEnv;
      }
    }
    return fallback;
  }

  getOptionalString(key: string): string | undefined {
    const value = this.getString(key, '', '');
    return value === '' ? undefined : value;
  }

  getBool(key: string, fallback: boolean): boolean {
    const value = this.raw[key];
    return typeof value === 'boolean' ? value : fallback;
  }

  /** String entries of the array at `key`; other entries are skipped. */
  getStringArray(key: string): string[] {
    const value = this.raw[key];
    if (!Array.isArray(value)) {
      return [];
    }
    return value.filter((entry): entry is string => typeof entry === 'string');
  }

  /** Reader over the nested map at `key` (empty when absent). */
  section(key: string): ConfigReader {
    const value = this.raw[key];
    return new ConfigReader(isRecord(value) ? value : {}, this.env);
  }
}

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

/** Decode a raw config map into a fully defaulted PluginConfig. */
export function parseConfig(raw: RawConfig, env: Env = {}): PluginConfig {
  const reader = new ConfigReader(raw, env);

  const environment = reader.getString('environment', '', DEFAULT_ENVIRONMENT);

  const commitsReader = reader.section('commits');
  const commits: CommitsConfig = {
    auto: commitsReader.getBool('auto', true),
    repository: commitsReader.getString('repository', '', ''),
  };

  const deployReader = reader.section('deploy');
  const deploy: DeployConfig = {
    environment: deployReader.getString('environment', '', environment),
  };
  const deployName = deployReader.getOptionalString('name');
  if (deployName !== undefined) {
    deploy.name = deployName;
  }

  const smReader = reader.section('sourcemaps');
  const sourcemaps: SourcemapsConfig = {
    path: smReader.getString('path', '', './dist'),
    urlPrefix: smReader.getString('url_prefix', '', '~/'),
    include: smReader.getStringArray('include'),
    exclude: smReader.getStringArray('exclude'),
  };

  const config: PluginConfig = {
    authToken: reader.getString('auth_token', ENV_VARS.AUTH_TOKEN, ''),
    org: reader.getString('org', ENV_VARS.ORG, ''),
    project: reader.getString('project', ENV_VARS.PROJECT, ''),
    projects: reader.getStringArray('projects'),
    url: reader.getString('url', ENV_VARS.URL, DEFAULT_URL),
    versionFormat: reader.getString('version_format', '', DEFAULT_VERSION_FORMAT),
    environment,
    setCommits: reader.getBool('set_commits', true),
    commits,
    createDeploy: reader.getBool('create_deploy', true),
    deploy,
    uploadSourcemaps: reader.getBool('upload_sourcemaps', false),
    sourcemaps,
    finalize: reader.getBool('finalize', true),
  };

  const releaseUrl = reader.getOptionalString('release_url');
  if (releaseUrl !== undefined) {
    config.releaseUrl = releaseUrl;
  }

  return config;
}

// ---------------------------------------------------------------------------
// getProjects()
// ---------------------------------------------------------------------------

/**
 * Effective project list: `projects` in order without duplicates, with
 * the singular `project` appended when it is set and not already listed.
 */
export function getProjects(config: Pick<PluginConfig, 'project' | 'projects'>): string[] {
  const projects = [...new Set(config.projects)];
  if (config.project !== '' && !projects.includes(config.project)) {
    projects.push(config.project);
  }
  return projects;
}
