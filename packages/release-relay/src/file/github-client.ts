/**
 * GitHub REST operations used by the release pipeline.
 *
 * One client covers both collaborator roles:
 * - ReleaseRepository for the repository being released (`owner/repo`)
 * - PullRequestHost for parent repositories of the same owner
 *
 * Requests go through Octokit with token auth. Failures are mapped to the
 * CLI error types so callers can decide what is fatal.
 */

import { readFile, stat } from 'node:fs/promises';

import { Octokit } from '@octokit/rest';

import {
  AssetNotFoundError,
  RepositoryAccessError,
  UploadError,
  httpStatusOf,
} from '../cli/lib/errors.js';
import { UploadedAssetResponse } from '../lib/schemas.js';
import {
  ASSET_CONTENT_TYPE,
  GITHUB_UPLOADS_URL,
  INITIAL_VERSION,
} from '../lib/settings.js';
import type {
  MergeRequest,
  NewPullRequest,
  OperationLogger,
  PullRequestHost,
  PullRequestLabelSet,
  ReleaseRecord,
  ReleaseRepository,
  Version,
} from '../lib/types.js';
import { noopLogger, toError } from '../lib/types.js';

/**
 * Patterns tried, in order, against a merge commit message to find its PR.
 */
export const MERGE_COMMIT_PR_PATTERNS: readonly RegExp[] = [
  /Merge pull request #(\d+)/,
  /Pull request #(\d+)/,
  /#(\d+) from/,
  /PR-(\d+)/,
];

/**
 * Find a PR number in a merge commit message.
 *
 * @returns The PR number, or null if no known pattern matches
 */
export function prNumberFromCommitMessage(message: string): number | null {
  for (const pattern of MERGE_COMMIT_PR_PATTERNS) {
    const match = pattern.exec(message);
    if (match?.[1]) {
      return parseInt(match[1], 10);
    }
  }
  return null;
}

export interface GitHubClientOptions {
  owner: string;
  /** Repository being released */
  repo: string;
  token: string;
  logger?: OperationLogger;
  userAgent?: string;
  /** API base URL (default: https://api.github.com) */
  baseUrl?: string;
  /** Asset upload base URL (default: https://uploads.github.com) */
  uploadsUrl?: string;
  /** Fetch implementation handed to Octokit (tests inject a fake) */
  fetch?: typeof fetch;
}

export class GitHubClient implements ReleaseRepository, PullRequestHost {
  readonly owner: string;
  readonly repo: string;
  private readonly octokit: Octokit;
  private readonly logger: OperationLogger;
  private readonly uploadsUrl: string;

  constructor(options: GitHubClientOptions) {
    this.owner = options.owner;
    this.repo = options.repo;
    this.logger = options.logger ?? noopLogger;
    this.uploadsUrl = options.uploadsUrl ?? GITHUB_UPLOADS_URL;

    const logger = this.logger;
    this.octokit = new Octokit({
      auth: options.token,
      userAgent: options.userAgent ?? 'release-relay',
      ...(options.baseUrl ? { baseUrl: options.baseUrl } : {}),
      ...(options.fetch ? { request: { fetch: options.fetch } } : {}),
      log: {
        debug: (message: string) => {
          logger.debug(message);
        },
        info: (message: string) => {
          logger.debug(message);
        },
        warn: (message: string) => {
          logger.warn(message);
        },
        error: (message: string) => {
          logger.debug(message);
        },
      },
    });
  }

  private get repoRef(): string {
    return `${this.owner}/${this.repo}`;
  }

  private accessError(action: string, error: unknown): RepositoryAccessError {
    return new RepositoryAccessError(`${action}: ${toError(error).message}`, httpStatusOf(error));
  }

  // ===========================================================================
  // ReleaseRepository
  // ===========================================================================

  async latestVersion(): Promise<Version> {
    try {
      const { data } = await this.octokit.request('GET /repos/{owner}/{repo}/releases/latest', {
        owner: this.owner,
        repo: this.repo,
      });
      return data.tag_name;
    } catch (error) {
      if (httpStatusOf(error) === 404) {
        this.logger.info(`No release found for ${this.repoRef}, using ${INITIAL_VERSION}`);
        return INITIAL_VERSION;
      }
      throw this.accessError(`Failed to fetch latest release of ${this.repoRef}`, error);
    }
  }

  async pullRequestLabels(prNumber: number): Promise<PullRequestLabelSet> {
    try {
      const { data } = await this.octokit.request('GET /repos/{owner}/{repo}/pulls/{pull_number}', {
        owner: this.owner,
        repo: this.repo,
        pull_number: prNumber,
        state: 'all',
      });
      return data.labels.map((label) => ({ name: label.name }));
    } catch (error) {
      throw this.accessError(`Failed to fetch PR #${prNumber} of ${this.repoRef}`, error);
    }
  }

  async findPullRequestForCommit(commitSha: string): Promise<number | null> {
    try {
      const { data: pulls } = await this.octokit.request(
        'GET /repos/{owner}/{repo}/commits/{commit_sha}/pulls',
        { owner: this.owner, repo: this.repo, commit_sha: commitSha },
      );
      const first = pulls[0];
      if (first) {
        this.logger.debug(`Found PR #${first.number} for ${commitSha} from pulls API`);
        return first.number;
      }

      const { data: commit } = await this.octokit.request('GET /repos/{owner}/{repo}/commits/{ref}', {
        owner: this.owner,
        repo: this.repo,
        ref: commitSha,
      });
      const prNumber = prNumberFromCommitMessage(commit.commit.message);
      if (prNumber !== null) {
        this.logger.debug(`Found PR #${prNumber} for ${commitSha} from commit message`);
        return prNumber;
      }
    } catch (error) {
      this.logger.warn(`Error looking up PR for commit ${commitSha}: ${toError(error).message}`);
      return null;
    }
    this.logger.warn(`Could not find PR number for commit ${commitSha}`);
    return null;
  }

  async createRelease(version: Version, isDraft: boolean): Promise<ReleaseRecord> {
    try {
      const { data } = await this.octokit.request('POST /repos/{owner}/{repo}/releases', {
        owner: this.owner,
        repo: this.repo,
        tag_name: version,
        name: `Release ${version}`,
        body: `Release version ${version}`,
        draft: isDraft,
        prerelease: false,
      });
      return { id: data.id, tagName: data.tag_name, htmlUrl: data.html_url };
    } catch (error) {
      throw this.accessError(`Failed to create release ${version} in ${this.repoRef}`, error);
    }
  }

  async uploadAsset(release: ReleaseRecord, filePath: string, fileName: string): Promise<void> {
    const isFile = await stat(filePath).then(
      (stats) => stats.isFile(),
      () => false,
    );
    if (!isFile) {
      throw new AssetNotFoundError(filePath);
    }
    const content = await readFile(filePath);

    this.logger.info(`Uploading ${filePath} to release ${release.id} as ${fileName}`);
    let status: number;
    let data: unknown;
    try {
      const route = `POST ${this.uploadsUrl}/repos/{owner}/{repo}/releases/{release_id}/assets{?name}`;
      const response = await this.octokit.request(route, {
        owner: this.owner,
        repo: this.repo,
        release_id: release.id,
        name: fileName,
        data: content,
        headers: {
          'content-type': ASSET_CONTENT_TYPE,
          'content-length': content.length,
        },
      });
      status = response.status;
      data = response.data;
    } catch (error) {
      throw new UploadError(
        `Failed to upload ${fileName} to release ${release.id}: ${toError(error).message}`,
        httpStatusOf(error),
      );
    }

    if (status !== 201) {
      throw new UploadError(`Unexpected response uploading ${fileName}`, status);
    }
    const asset = UploadedAssetResponse.safeParse(data);
    if (asset.success && asset.data.browser_download_url) {
      this.logger.info(`Asset uploaded: ${asset.data.browser_download_url}`);
    }
  }

  // ===========================================================================
  // PullRequestHost
  // ===========================================================================

  async createPullRequest(repo: string, pr: NewPullRequest): Promise<number> {
    try {
      const { data } = await this.octokit.request('POST /repos/{owner}/{repo}/pulls', {
        owner: this.owner,
        repo,
        title: pr.title,
        body: pr.body,
        head: pr.head,
        base: pr.base,
      });
      return data.number;
    } catch (error) {
      throw this.accessError(`Failed to create PR in ${this.owner}/${repo}`, error);
    }
  }

  async addLabels(repo: string, prNumber: number, labels: string[]): Promise<void> {
    try {
      await this.octokit.request('POST /repos/{owner}/{repo}/issues/{issue_number}/labels', {
        owner: this.owner,
        repo,
        issue_number: prNumber,
        labels,
      });
    } catch (error) {
      throw this.accessError(`Failed to label PR #${prNumber} in ${this.owner}/${repo}`, error);
    }
  }

  async mergePullRequest(repo: string, prNumber: number, merge: MergeRequest): Promise<void> {
    try {
      await this.octokit.request('PUT /repos/{owner}/{repo}/pulls/{pull_number}/merge', {
        owner: this.owner,
        repo,
        pull_number: prNumber,
        merge_method: merge.method,
        commit_title: merge.title,
        commit_message: merge.message,
      });
    } catch (error) {
      throw this.accessError(`Failed to merge PR #${prNumber} in ${this.owner}/${repo}`, error);
    }
  }
}
