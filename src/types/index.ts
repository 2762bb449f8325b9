export {
  Hook,
  isHookName,
  type HookName,
  type PluginInfo,
  type RawConfig,
  type ExecuteRequest,
  type ExecuteResponse,
  type StepOutcome,
  type FieldError,
  type ValidateResponse,
} from './protocol.js';

export {
  ErrorCode,
  type ErrorCodeValue,
  type ErrorPayload,
  ERROR_RETRIABLE_DEFAULTS,
} from './errors.js';

export {
  CHANGE_CATEGORIES,
  type ChangeCategory,
  type ChangeSet,
  type CommitAuthor,
  type ConventionalCommit,
  type ReleaseEvent,
} from './release.js';

export {
  ConfigReader,
  DEFAULT_ENVIRONMENT,
  DEFAULT_URL,
  DEFAULT_VERSION_FORMAT,
  ENV_VARS,
  getProjects,
  parseConfig,
  type CommitsConfig,
  type DeployConfig,
  type Env,
  type PluginConfig,
  type SourcemapsConfig,
} from './config.js';

export { CONFIG_JSON_SCHEMA, RELEASE_EVENT_JSON_SCHEMA } from './config-schema.js';
