/**
 * release-relay library entry point.
 *
 * The CLI is built on these modules; pipelines written in TypeScript can use
 * them directly with their own ReleaseRepository or VersionControl.
 */

export * from './lib/types.js';
export { bumpVersion, parseVersion, formatVersion, MalformedVersionError } from './lib/version-policy.js';
export { resolveBumpDirective } from './lib/label-resolver.js';
export {
  INITIAL_VERSION,
  SEMVER_LABELS,
  CURRENT_VERSION_FILE,
  NEW_VERSION_FILE,
} from './lib/settings.js';

export { GitHubClient, prNumberFromCommitMessage } from './file/github-client.js';
export type { GitHubClientOptions } from './file/github-client.js';
export { GitCli, buildGitEnvironment, repoCloneUrl } from './file/git.js';
export type { GitIdentity } from './file/git.js';
export { SubmoduleUpdater, SUBMODULE_STAGES } from './file/submodule-updater.js';
export type {
  SubmoduleStage,
  SubmoduleUpdatePlan,
  SubmoduleUpdateRequest,
  SubmoduleUpdateResult,
} from './file/submodule-updater.js';
export { publishRelease } from './file/release.js';
export type { PublishOptions, PublishResult } from './file/release.js';
export { determineDirective } from './file/bump.js';
export type { DirectiveRequest, DirectiveResolution } from './file/bump.js';
export { readVersionFile, writeVersionFile } from './file/version-files.js';
export { loadConfig, resolveConfig } from './file/config.js';
export type { RelayConfig, ConfigOverrides } from './file/config.js';

export {
  CLIError,
  ValidationError,
  ConfigError,
  RepositoryAccessError,
  AssetNotFoundError,
  UploadError,
  SubmoduleStageError,
} from './cli/lib/errors.js';
