/**
 * Global settings and defaults.
 *
 * Compile-time constants. Runtime configuration lives in file/config.ts and
 * falls back to these values.
 */

// =============================================================================
// Versions
// =============================================================================

/** Version reported when the repository has no release yet. */
export const INITIAL_VERSION = 'v0.0.0';

/** Maps PR labels to bump directives. Order of the PR's labels decides ties. */
export const SEMVER_LABELS = {
  'semver:major': 'major',
  'semver:minor': 'minor',
  'semver:patch': 'patch',
} as const;

// =============================================================================
// Pipeline Handoff Files
// =============================================================================

export const CURRENT_VERSION_FILE = 'current_version.txt';
export const NEW_VERSION_FILE = 'new_version.txt';

// =============================================================================
// GitHub
// =============================================================================

export const GITHUB_HOST = 'github.com';
export const GITHUB_UPLOADS_URL = 'https://uploads.github.com';

export const DEFAULT_BASE_BRANCH = 'master';
export const DEFAULT_ASSET_PATH = 'release.tar.gz';
export const ASSET_CONTENT_TYPE = 'application/gzip';

/** Label attached to every submodule update PR. */
export const SUBMODULE_PR_LABEL = 'semver:patch';

// =============================================================================
// Git
// =============================================================================

export const DEFAULT_GIT_USER_NAME = 'Release Relay';
export const DEFAULT_GIT_USER_EMAIL = 'release-relay@users.noreply.github.com';

/** Sentinel recorded when a submodule has no commit checked out yet. */
export const INITIAL_COMMIT_SENTINEL = 'initial';

// =============================================================================
// Config
// =============================================================================

export const CONFIG_FILE = '.release-relay.yml';
