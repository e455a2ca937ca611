/**
 * Shared types for release-relay.
 *
 * The collaborator interfaces here (ReleaseRepository, PullRequestHost,
 * VersionControl) are what the core workflow depends on. The GitHub and git
 * implementations live in file/; tests provide in-process fakes.
 */

// =============================================================================
// Versions and Directives
// =============================================================================

/**
 * A release version string: `vMAJOR.MINOR.PATCH` or
 * `vMAJOR.MINOR.PATCH-YYYYMMDDHHMMSS`.
 */
export type Version = string;

export const BUMP_DIRECTIVES = ['major', 'minor', 'patch', 'timestamp'] as const;

/**
 * Kind of increment applied by bumpVersion(). `timestamp` is the fallback.
 */
export type BumpDirective = (typeof BUMP_DIRECTIVES)[number];

/**
 * A label attached to a pull request, as returned by the hosting platform.
 */
export interface PullRequestLabel {
  name: string;
}

/**
 * Ordered labels of a pull request at a point in time.
 */
export type PullRequestLabelSet = readonly PullRequestLabel[];

/**
 * Parsed numeric core of a version. Components are unbounded.
 */
export interface VersionParts {
  major: bigint;
  minor: bigint;
  patch: bigint;
}

// =============================================================================
// Outcomes
// =============================================================================

/**
 * Result of a step whose failure is classified at the call site.
 *
 * - ok: the step succeeded
 * - recoverable: the step failed but the run continues (best-effort steps,
 *   lookups with a fallback)
 * - fatal: the step failed and the run must end with a non-zero exit
 */
export type Outcome<T> =
  | { status: 'ok'; value: T }
  | { status: 'recoverable'; error: Error }
  | { status: 'fatal'; error: Error };

/**
 * Run an async step and capture its failure as an Outcome of the given severity.
 */
export async function attempt<T>(
  step: () => Promise<T>,
  onFailure: 'recoverable' | 'fatal',
): Promise<Outcome<T>> {
  try {
    return { status: 'ok', value: await step() };
  } catch (error) {
    return { status: onFailure, error: toError(error) };
  }
}

/**
 * Normalize an unknown thrown value to an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// =============================================================================
// Hosting Platform Collaborators
// =============================================================================

/**
 * Handle for a release created on the hosting platform.
 */
export interface ReleaseRecord {
  id: number;
  tagName: string;
  htmlUrl?: string;
}

/**
 * Release-side operations on the repository being released.
 */
export interface ReleaseRepository {
  /** Tag of the most recent release, or `v0.0.0` when none exists. */
  latestVersion(): Promise<Version>;
  pullRequestLabels(prNumber: number): Promise<PullRequestLabelSet>;
  /** PR number that introduced a merge commit, or null when it cannot be found. */
  findPullRequestForCommit(commitSha: string): Promise<number | null>;
  createRelease(version: Version, isDraft: boolean): Promise<ReleaseRecord>;
  uploadAsset(release: ReleaseRecord, filePath: string, fileName: string): Promise<void>;
}

export interface NewPullRequest {
  title: string;
  body: string;
  head: string;
  base: string;
}

export interface MergeRequest {
  method: 'merge' | 'squash' | 'rebase';
  title: string;
  message: string;
}

/**
 * Pull request operations on another repository of the same owner.
 */
export interface PullRequestHost {
  createPullRequest(repo: string, pr: NewPullRequest): Promise<number>;
  addLabels(repo: string, prNumber: number, labels: string[]): Promise<void>;
  mergePullRequest(repo: string, prNumber: number, merge: MergeRequest): Promise<void>;
}

// =============================================================================
// Version Control Collaborator
// =============================================================================

/**
 * The git operations the submodule workflow runs. Every method takes the
 * directory it operates in; nothing relies on process.cwd().
 */
export interface VersionControl {
  clone(url: string, dir: string): Promise<void>;
  submoduleInit(repoDir: string, path: string): Promise<void>;
  submoduleUpdate(repoDir: string, path: string): Promise<void>;
  submoduleAdd(repoDir: string, url: string, path: string): Promise<void>;
  createBranch(repoDir: string, branch: string): Promise<void>;
  fetch(repoDir: string, remote: string): Promise<void>;
  checkout(repoDir: string, ref: string): Promise<void>;
  headCommit(repoDir: string): Promise<string>;
  add(repoDir: string, path: string): Promise<void>;
  commit(repoDir: string, message: string): Promise<void>;
  push(repoDir: string, remote: string, branch: string): Promise<void>;
}

// =============================================================================
// Logging
// =============================================================================

/**
 * Logger interface for core operations.
 *
 * Core logic (file/, lib/) reports through this instead of printing.
 * CLI commands create one via `OutputManager.logger(spinner)`.
 */
export interface OperationLogger {
  /** Key milestones, drives the spinner in CLI context */
  progress: (message: string) => void;
  /** Operational detail (shown with --verbose or --debug) */
  info: (message: string) => void;
  /** Non-fatal warnings */
  warn: (message: string) => void;
  /** Internal state for troubleshooting (shown with --debug only) */
  debug: (message: string) => void;
}

// eslint-disable-next-line @typescript-eslint/no-empty-function
const noop = () => {};
export const noopLogger: OperationLogger = {
  progress: noop,
  info: noop,
  warn: noop,
  debug: noop,
};
