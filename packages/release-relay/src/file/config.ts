/**
 * Configuration resolution.
 *
 * Sources, highest precedence first:
 * 1. CLI options
 * 2. Environment (GITHUB_TOKEN, RELEASE_RELAY_OWNER, RELEASE_RELAY_REPO)
 * 3. Config file (.release-relay.yml in the working directory, or --config)
 * 4. Defaults from lib/settings.ts
 *
 * Missing required values raise ConfigError before any network or git work.
 */

import { readFile } from 'node:fs/promises';
import { isAbsolute, join } from 'node:path';

import { parse as parseYaml } from 'yaml';

import { ConfigError } from '../cli/lib/errors.js';
import { RelayFileConfigSchema, type RelayFileConfig } from '../lib/schemas.js';
import {
  CONFIG_FILE,
  DEFAULT_ASSET_PATH,
  DEFAULT_BASE_BRANCH,
  DEFAULT_GIT_USER_EMAIL,
  DEFAULT_GIT_USER_NAME,
} from '../lib/settings.js';
import type { GitIdentity } from './git.js';

export interface RelayConfig {
  owner: string;
  /** Repository being released */
  repo: string;
  token: string;
  parentRepo?: string;
  submodulePath?: string;
  baseBranch: string;
  assetPath: string;
  git: GitIdentity;
}

/**
 * Values supplied on the command line. Undefined means "not given".
 */
export interface ConfigOverrides {
  owner?: string;
  repo?: string;
  token?: string;
  parentRepo?: string;
  submodulePath?: string;
  baseBranch?: string;
  assetPath?: string;
  /** Explicit config file path; a missing explicit file is an error */
  configFile?: string;
}

type Env = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Read and validate a config file.
 *
 * @param required - When false, a missing file yields null instead of an error
 * @throws ConfigError if the file is unreadable, not YAML, or fails validation
 */
export async function readConfigFile(
  path: string,
  required: boolean,
): Promise<RelayFileConfig | null> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (!required && error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw new ConfigError(`Cannot read config file ${path}`);
  }

  let data: unknown;
  try {
    data = parseYaml(content);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid YAML in ${path}: ${detail}`);
  }
  if (data === null || data === undefined) {
    return {};
  }

  const result = RelayFileConfigSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config file ${path}: ${issues}`);
  }
  return result.data;
}

/**
 * Merge the sources into a validated RelayConfig.
 *
 * @throws ConfigError if token, owner or repo is missing
 */
export function resolveConfig(
  overrides: ConfigOverrides,
  env: Env,
  file: RelayFileConfig | null,
): RelayConfig {
  const token = nonEmpty(overrides.token) ?? nonEmpty(env.GITHUB_TOKEN);
  if (!token) {
    throw new ConfigError(
      'GitHub token must be provided either via --token or GITHUB_TOKEN environment variable',
    );
  }
  const owner = nonEmpty(overrides.owner) ?? nonEmpty(env.RELEASE_RELAY_OWNER) ?? file?.owner;
  if (!owner) {
    throw new ConfigError('Repository owner is required (--owner or RELEASE_RELAY_OWNER)');
  }
  const repo = nonEmpty(overrides.repo) ?? nonEmpty(env.RELEASE_RELAY_REPO) ?? file?.repo;
  if (!repo) {
    throw new ConfigError('Repository name is required (--repo or RELEASE_RELAY_REPO)');
  }

  return {
    owner,
    repo,
    token,
    parentRepo: nonEmpty(overrides.parentRepo) ?? file?.parent_repo,
    submodulePath: nonEmpty(overrides.submodulePath) ?? file?.submodule_path,
    baseBranch: nonEmpty(overrides.baseBranch) ?? file?.base_branch ?? DEFAULT_BASE_BRANCH,
    assetPath: nonEmpty(overrides.assetPath) ?? file?.asset_path ?? DEFAULT_ASSET_PATH,
    git: {
      name: file?.git?.name ?? DEFAULT_GIT_USER_NAME,
      email: file?.git?.email ?? DEFAULT_GIT_USER_EMAIL,
    },
  };
}

/**
 * Load configuration for a run rooted at `cwd`.
 */
export async function loadConfig(
  cwd: string,
  overrides: ConfigOverrides,
  env: Env = process.env,
): Promise<RelayConfig> {
  const explicit = nonEmpty(overrides.configFile);
  const path = explicit
    ? isAbsolute(explicit)
      ? explicit
      : join(cwd, explicit)
    : join(cwd, CONFIG_FILE);
  const file = await readConfigFile(path, explicit !== undefined);
  return resolveConfig(overrides, env, file);
}

/**
 * Require the parent repository and submodule path for update-submodule.
 */
export function requireSubmoduleTarget(config: RelayConfig): {
  parentRepo: string;
  submodulePath: string;
} {
  const { parentRepo, submodulePath } = config;
  if (!parentRepo || !submodulePath) {
    throw new ConfigError('parent-repo and submodule-path are required for update-submodule');
  }
  return { parentRepo, submodulePath };
}

/**
 * Parse a PR number from an option or environment value.
 *
 * @returns The number, or null for empty or invalid values
 */
export function parsePrNumber(value: string | undefined): number | null {
  const trimmed = value?.trim();
  if (!trimmed || !/^\d+$/.test(trimmed)) {
    return null;
  }
  const parsed = parseInt(trimmed, 10);
  return parsed > 0 ? parsed : null;
}
