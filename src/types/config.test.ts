import { describe, it, expect } from 'vitest';
import {
  ConfigReader,
  parseConfig,
  getProjects,
  isRecord,
  DEFAULT_URL,
  DEFAULT_VERSION_FORMAT,
  DEFAULT_ENVIRONMENT,
} from './config.js';

// ---------------------------------------------------------------------------
// ConfigReader
// ---------------------------------------------------------------------------

describe('ConfigReader', () => {
  describe('getString', () => {
    it('prefers a non-empty config value', () => {
      const reader = new ConfigReader({ org: 'acme' }, { SENTRY_ORG: 'from-env' });
      expect(reader.getString('org', 'SENTRY_ORG', 'fallback')).toBe('acme');
    });

    it('falls back to the environment variable', () => {
      const reader = new ConfigReader({}, { SENTRY_ORG: 'from-env' });
      expect(reader.getString('org', 'SENTRY_ORG', 'fallback')).toBe('from-env');
    });

    it('treats an empty config value as unset', () => {
      const reader = new ConfigReader({ org: '' }, { SENTRY_ORG: 'from-env' });
      expect(reader.getString('org', 'SENTRY_ORG', 'fallback')).toBe('from-env');
    });

    it('ignores empty environment values', () => {
      const reader = new ConfigReader({}, { SENTRY_ORG: '' });
      expect(reader.getString('org', 'SENTRY_ORG', 'fallback')).toBe('fallback');
    });

    it('ignores values of the wrong type', () => {
      const reader = new ConfigReader({ org: 42 });
      expect(reader.getString('org', '', 'fallback')).toBe('fallback');
    });

    it('does not consult the environment when no variable is named', () => {
      const reader = new ConfigReader({}, { '': 'odd' });
      expect(reader.getString('org', '', 'fallback')).toBe('fallback');
    });
  });

  describe('getBool', () => {
    it('reads booleans including false', () => {
      const reader = new ConfigReader({ a: false, b: true });
      expect(reader.getBool('a', true)).toBe(false);
      expect(reader.getBool('b', false)).toBe(true);
    });

    it('uses the fallback for missing or non-boolean values', () => {
      const reader = new ConfigReader({ a: 'false' });
      expect(reader.getBool('a', true)).toBe(true);
      expect(reader.getBool('missing', false)).toBe(false);
    });
  });

  describe('getStringArray', () => {
    it('keeps only string entries', () => {
      const reader = new ConfigReader({ list: ['a', 1, 'b', null] });
      expect(reader.getStringArray('list')).toEqual(['a', 'b']);
    });

    it('returns an empty list for non-arrays', () => {
      expect(new ConfigReader({ list: 'a' }).getStringArray('list')).toEqual([]);
    });
  });

  describe('section', () => {
    it('reads nested maps and treats other values as empty', () => {
      const reader = new ConfigReader({ deploy: { name: 'blue' }, other: ['x'] });
      expect(reader.section('deploy').getString('name', '', '')).toBe('blue');
      expect(reader.section('other').getString('name', '', 'none')).toBe('none');
      expect(reader.section('missing').getString('name', '', 'none')).toBe('none');
    });
  });
});

describe('isRecord', () => {
  it('accepts plain objects only', () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord('x')).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// parseConfig
// ---------------------------------------------------------------------------

describe('parseConfig', () => {
  it('applies defaults to an empty map', () => {
    expect(parseConfig({})).toEqual({
      authToken: '',
      org: '',
      project: '',
      projects: [],
      url: DEFAULT_URL,
      versionFormat: DEFAULT_VERSION_FORMAT,
      environment: DEFAULT_ENVIRONMENT,
      setCommits: true,
      commits: { auto: true, repository: '' },
      createDeploy: true,
      deploy: { environment: 'production' },
      uploadSourcemaps: false,
      sourcemaps: { path: './dist', urlPrefix: '~/', include: [], exclude: [] },
      finalize: true,
    });
  });

  it('reads every field', () => {
    const config = parseConfig({
      auth_token: 'test-token',
      org: 'acme',
      project: 'api',
      projects: ['frontend', 'backend'],
      url: 'https://sentry.example.com',
      release_url: 'https://example.com/releases/1.2.3',
      version_format: 'v{{.Version}}',
      environment: 'staging',
      set_commits: false,
      commits: { auto: false, repository: 'acme/api' },
      create_deploy: false,
      deploy: { environment: 'canary', name: 'Canary deploy' },
      upload_sourcemaps: true,
      sourcemaps: { path: './build', url_prefix: '~/static', include: ['*.js'], exclude: ['x'] },
      finalize: false,
    });

    expect(config).toEqual({
      authToken: 'test-token',
      org: 'acme',
      project: 'api',
      projects: ['frontend', 'backend'],
      url: 'https://sentry.example.com',
      releaseUrl: 'https://example.com/releases/1.2.3',
      versionFormat: 'v{{.Version}}',
      environment: 'staging',
      setCommits: false,
      commits: { auto: false, repository: 'acme/api' },
      createDeploy: false,
      deploy: { environment: 'canary', name: 'Canary deploy' },
      uploadSourcemaps: true,
      sourcemaps: {
        path: './build',
        urlPrefix: '~/static',
        include: ['*.js'],
        exclude: ['x'],
      },
      finalize: false,
    });
  });

  it('defaults the deploy environment to the top-level environment', () => {
    expect(parseConfig({ environment: 'staging' }).deploy).toEqual({ environment: 'staging' });
    expect(parseConfig({ environment: 'staging', deploy: { name: 'x' } }).deploy).toEqual({
      environment: 'staging',
      name: 'x',
    });
  });

  it('fills credentials and url from the environment', () => {
    const config = parseConfig(
      {},
      {
        SENTRY_AUTH_TOKEN: 'env-token',
        SENTRY_ORG: 'env-org',
        SENTRY_PROJECT: 'env-project',
        SENTRY_URL: 'https://self-hosted.example.com',
      },
    );

    expect(config.authToken).toBe('env-token');
    expect(config.org).toBe('env-org');
    expect(config.project).toBe('env-project');
    expect(config.url).toBe('https://self-hosted.example.com');
  });
});

// ---------------------------------------------------------------------------
// getProjects
// ---------------------------------------------------------------------------

describe('getProjects', () => {
  it('returns the single project', () => {
    expect(getProjects({ project: 'api', projects: [] })).toEqual(['api']);
  });

  it('returns the project list', () => {
    expect(getProjects({ project: '', projects: ['frontend', 'backend'] })).toEqual([
      'frontend',
      'backend',
    ]);
  });

  it('appends the singular project last', () => {
    expect(getProjects({ project: 'api', projects: ['frontend', 'backend'] })).toEqual([
      'frontend',
      'backend',
      'api',
    ]);
  });

  it('does not duplicate a project already listed', () => {
    expect(getProjects({ project: 'frontend', projects: ['frontend', 'backend'] })).toEqual([
      'frontend',
      'backend',
    ]);
  });

  it('drops duplicates inside the list, keeping first occurrence order', () => {
    expect(getProjects({ project: '', projects: ['b', 'a', 'b'] })).toEqual(['b', 'a']);
  });

  it('returns an empty list when nothing is configured', () => {
    expect(getProjects({ project: '', projects: [] })).toEqual([]);
  });
});
