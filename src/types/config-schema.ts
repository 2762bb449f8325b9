/**
 * Runtime JSON Schemas for the raw configuration map and for release
 * events read from disk.
 *
 * Kept as plain objects so they can be fed directly to
 * `new Ajv().compile(...)`. Unknown keys are allowed in both: hosts pass
 * their own settings alongside the plugin's.
 */

const stringList = { type: 'array', items: { type: 'string' } } as const;

export const CONFIG_JSON_SCHEMA = {
  $id: 'release-tracker/config.json',
  type: 'object' as const,
  properties: {
    auth_token: { type: 'string' },
    org: { type: 'string' },
    project: { type: 'string' },
    projects: stringList,
    url: { type: 'string' },
    release_url: { type: 'string' },
    version_format: { type: 'string' },
    environment: { type: 'string' },
    set_commits: { type: 'boolean' },
    commits: {
      type: 'object',
      properties: {
        auto: { type: 'boolean' },
        repository: { type: 'string' },
      },
    },
    create_deploy: { type: 'boolean' },
    deploy: {
      type: 'object',
      properties: {
        environment: { type: 'string' },
        name: { type: 'string' },
      },
    },
    upload_sourcemaps: { type: 'boolean' },
    sourcemaps: {
      type: 'object',
      properties: {
        path: { type: 'string' },
        url_prefix: { type: 'string' },
        include: stringList,
        exclude: stringList,
      },
    },
    finalize: { type: 'boolean' },
  },
};

const commitSchema = {
  type: 'object',
  required: ['hash', 'description'],
  properties: {
    hash: { type: 'string' },
    description: { type: 'string' },
    type: { type: 'string' },
    scope: { type: 'string' },
    author: {
      type: 'object',
      properties: {
        name: { type: 'string' },
        email: { type: 'string' },
      },
    },
  },
} as const;

const commitList = { type: 'array', items: { $ref: '#/$defs/commit' } } as const;

export const RELEASE_EVENT_JSON_SCHEMA = {
  $id: 'release-tracker/release-event.json',
  type: 'object' as const,
  required: ['version', 'tagName', 'commitSha', 'branch'],
  $defs: {
    commit: commitSchema,
  },
  properties: {
    version: { type: 'string' },
    tagName: { type: 'string' },
    commitSha: { type: 'string' },
    branch: { type: 'string' },
    changes: {
      type: ['object', 'null'],
      properties: {
        features: commitList,
        fixes: commitList,
        breaking: commitList,
        other: commitList,
      },
    },
  },
};
