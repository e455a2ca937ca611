/**
 * Git subprocess collaborator.
 *
 * GitCli implements VersionControl by running git with execFile (no shell).
 * Authentication and identity are scoped to the processes this class starts:
 * they are passed through GIT_CONFIG_* environment variables, so nothing is
 * written to the user's global git config or credential store.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

import { DEFAULT_GIT_USER_EMAIL, DEFAULT_GIT_USER_NAME, GITHUB_HOST } from '../lib/settings.js';
import type { OperationLogger, VersionControl } from '../lib/types.js';
import { noopLogger } from '../lib/types.js';

const execFileAsync = promisify(execFile);

/**
 * Maximum buffer size for git command output.
 * Clone and fetch progress on large repositories can exceed execFile's 1MB default.
 */
const GIT_MAX_BUFFER = 50 * 1024 * 1024; // 50MB

export interface GitIdentity {
  name: string;
  email: string;
}

export interface GitEnvironmentOptions {
  /** Token used for HTTPS access to the GitHub host */
  token?: string;
  identity?: Partial<GitIdentity>;
  host?: string;
}

/**
 * Build the per-process git configuration for a run.
 *
 * Uses GIT_CONFIG_COUNT / GIT_CONFIG_KEY_n / GIT_CONFIG_VALUE_n (git 2.31+),
 * which git applies as if passed with `-c` to every command, including the
 * nested fetches done by `git submodule`.
 */
export function buildGitEnvironment(options: GitEnvironmentOptions = {}): Record<string, string> {
  const host = options.host ?? GITHUB_HOST;
  const entries: [string, string][] = [
    ['user.name', options.identity?.name ?? DEFAULT_GIT_USER_NAME],
    ['user.email', options.identity?.email ?? DEFAULT_GIT_USER_EMAIL],
    [`url.https://${host}/.insteadOf`, `git@${host}:`],
  ];
  if (options.token) {
    const basic = Buffer.from(`x-access-token:${options.token}`).toString('base64');
    entries.push([`http.https://${host}/.extraheader`, `AUTHORIZATION: basic ${basic}`]);
  }

  const env: Record<string, string> = {
    GIT_TERMINAL_PROMPT: '0',
    GIT_CONFIG_COUNT: String(entries.length),
  };
  entries.forEach(([key, value], i) => {
    env[`GIT_CONFIG_KEY_${i}`] = key;
    env[`GIT_CONFIG_VALUE_${i}`] = value;
  });
  return env;
}

/**
 * HTTPS clone URL for a repository on the GitHub host.
 */
export function repoCloneUrl(owner: string, repo: string, host: string = GITHUB_HOST): string {
  return `https://${host}/${owner}/${repo}.git`;
}

export class GitCli implements VersionControl {
  private readonly env: NodeJS.ProcessEnv;
  private readonly logger: OperationLogger;

  constructor(options: GitEnvironmentOptions & { logger?: OperationLogger } = {}) {
    this.env = { ...process.env, ...buildGitEnvironment(options) };
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Execute a git command in `cwd` and return trimmed stdout.
   */
  async git(cwd: string, ...args: string[]): Promise<string> {
    this.logger.debug(`git ${args.join(' ')} (in ${cwd})`);
    const { stdout } = await execFileAsync('git', args, {
      cwd,
      env: this.env,
      maxBuffer: GIT_MAX_BUFFER,
    });
    return stdout.trim();
  }

  async clone(url: string, dir: string): Promise<void> {
    await this.git(process.cwd(), 'clone', url, dir);
  }

  async submoduleInit(repoDir: string, path: string): Promise<void> {
    await this.git(repoDir, 'submodule', 'init', '--', path);
  }

  async submoduleUpdate(repoDir: string, path: string): Promise<void> {
    await this.git(repoDir, 'submodule', 'update', '--init', '--', path);
  }

  async submoduleAdd(repoDir: string, url: string, path: string): Promise<void> {
    await this.git(repoDir, 'submodule', 'add', url, path);
  }

  async createBranch(repoDir: string, branch: string): Promise<void> {
    await this.git(repoDir, 'checkout', '-b', branch);
  }

  async fetch(repoDir: string, remote: string): Promise<void> {
    await this.git(repoDir, 'fetch', remote);
  }

  async checkout(repoDir: string, ref: string): Promise<void> {
    await this.git(repoDir, 'checkout', ref);
  }

  async headCommit(repoDir: string): Promise<string> {
    return this.git(repoDir, 'rev-parse', 'HEAD');
  }

  async add(repoDir: string, path: string): Promise<void> {
    await this.git(repoDir, 'add', path);
  }

  async commit(repoDir: string, message: string): Promise<void> {
    await this.git(repoDir, 'commit', '-m', message);
  }

  async push(repoDir: string, remote: string, branch: string): Promise<void> {
    await this.git(repoDir, 'push', remote, branch);
  }
}
