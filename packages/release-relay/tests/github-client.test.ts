/**
 * Tests for github-client.ts.
 *
 * Octokit runs for real; its fetch is replaced by an in-process router, so
 * no request leaves the test process.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { GitHubClient, prNumberFromCommitMessage } from '../src/file/github-client.js';
import {
  AssetNotFoundError,
  RepositoryAccessError,
  UploadError,
} from '../src/cli/lib/errors.js';
import {
  TEST_TOKEN,
  fakeGitHub,
  jsonResponse,
  recordingLogger,
  type RouteHandler,
} from './test-helpers.js';

function createClient(routes: Record<string, RouteHandler>) {
  const github = fakeGitHub(routes);
  const logger = recordingLogger();
  const client = new GitHubClient({
    owner: 'acme',
    repo: 'widget',
    token: TEST_TOKEN,
    logger,
    fetch: github.fetch,
  });
  return { client, requests: github.requests, logger };
}

// =============================================================================
// prNumberFromCommitMessage
// =============================================================================

describe('prNumberFromCommitMessage', () => {
  it('reads the default merge commit message', () => {
    expect(prNumberFromCommitMessage('Merge pull request #42 from acme/feature')).toBe(42);
  });

  it('reads the other known forms', () => {
    expect(prNumberFromCommitMessage('Pull request #7: tidy up')).toBe(7);
    expect(prNumberFromCommitMessage('Merged #15 from fork')).toBe(15);
    expect(prNumberFromCommitMessage('PR-300 release prep')).toBe(300);
  });

  it('returns null for messages without a PR reference', () => {
    expect(prNumberFromCommitMessage('fix: handle empty input (#)')).toBeNull();
    expect(prNumberFromCommitMessage('')).toBeNull();
  });
});

// =============================================================================
// ReleaseRepository
// =============================================================================

describe('GitHubClient.latestVersion', () => {
  it('returns the tag of the latest release', async () => {
    const { client, requests } = createClient({
      'GET /repos/acme/widget/releases/latest': () => jsonResponse(200, { tag_name: 'v1.4.2' }),
    });

    await expect(client.latestVersion()).resolves.toBe('v1.4.2');
    expect(requests[0]?.headers.get('authorization')).toBe(`token ${TEST_TOKEN}`);
  });

  it('returns v0.0.0 when the repository has no release', async () => {
    const { client } = createClient({});

    await expect(client.latestVersion()).resolves.toBe('v0.0.0');
  });

  it('raises RepositoryAccessError for other failures', async () => {
    const { client } = createClient({
      'GET /repos/acme/widget/releases/latest': () => jsonResponse(401, { message: 'Bad credentials' }),
    });

    const error = await client.latestVersion().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RepositoryAccessError);
    if (error instanceof RepositoryAccessError) {
      expect(error.status).toBe(401);
      expect(error.exitCode).toBe(1);
      expect(error.message).toMatch(/^Failed to fetch latest release of acme\/widget: /);
    }
  });
});

describe('GitHubClient.pullRequestLabels', () => {
  it('returns label names in order', async () => {
    const { client, requests } = createClient({
      'GET /repos/acme/widget/pulls/42': () =>
        jsonResponse(200, {
          number: 42,
          labels: [
            { id: 1, name: 'bug' },
            { id: 2, name: 'semver:minor' },
          ],
        }),
    });

    await expect(client.pullRequestLabels(42)).resolves.toEqual([
      { name: 'bug' },
      { name: 'semver:minor' },
    ]);
    expect(requests[0]?.query.get('state')).toBe('all');
  });

  it('raises RepositoryAccessError for a missing PR', async () => {
    const { client } = createClient({});

    await expect(client.pullRequestLabels(9)).rejects.toBeInstanceOf(RepositoryAccessError);
  });
});

describe('GitHubClient.findPullRequestForCommit', () => {
  it('uses the commit pulls endpoint first', async () => {
    const { client, requests } = createClient({
      'GET /repos/acme/widget/commits/abc123/pulls': () => jsonResponse(200, [{ number: 17 }]),
    });

    await expect(client.findPullRequestForCommit('abc123')).resolves.toBe(17);
    expect(requests).toHaveLength(1);
  });

  it('falls back to the commit message', async () => {
    const { client } = createClient({
      'GET /repos/acme/widget/commits/abc123/pulls': () => jsonResponse(200, []),
      'GET /repos/acme/widget/commits/abc123': () =>
        jsonResponse(200, {
          sha: 'abc123',
          commit: { message: 'Merge pull request #42 from acme/feature\n\nAdd widgets' },
        }),
    });

    await expect(client.findPullRequestForCommit('abc123')).resolves.toBe(42);
  });

  it('returns null with a warning when nothing matches', async () => {
    const { client, logger } = createClient({
      'GET /repos/acme/widget/commits/abc123/pulls': () => jsonResponse(200, []),
      'GET /repos/acme/widget/commits/abc123': () =>
        jsonResponse(200, { sha: 'abc123', commit: { message: 'chore: direct push' } }),
    });

    await expect(client.findPullRequestForCommit('abc123')).resolves.toBeNull();
    expect(logger.warn).toHaveBeenCalledWith('Could not find PR number for commit abc123');
  });

  it('returns null when the lookup fails', async () => {
    const { client, logger } = createClient({});

    await expect(client.findPullRequestForCommit('abc123')).resolves.toBeNull();
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});

describe('GitHubClient.createRelease', () => {
  it('creates a release named after the version', async () => {
    const { client, requests } = createClient({
      'POST /repos/acme/widget/releases': () =>
        jsonResponse(201, {
          id: 555,
          tag_name: 'v1.1.0',
          html_url: 'https://github.com/acme/widget/releases/tag/v1.1.0',
        }),
    });

    const release = await client.createRelease('v1.1.0', true);

    expect(release).toEqual({
      id: 555,
      tagName: 'v1.1.0',
      htmlUrl: 'https://github.com/acme/widget/releases/tag/v1.1.0',
    });
    expect(requests[0]?.body).toEqual({
      tag_name: 'v1.1.0',
      name: 'Release v1.1.0',
      body: 'Release version v1.1.0',
      draft: true,
      prerelease: false,
    });
  });

  it('raises RepositoryAccessError when the tag already exists', async () => {
    const { client } = createClient({
      'POST /repos/acme/widget/releases': () =>
        jsonResponse(422, { message: 'Validation Failed' }),
    });

    const error = await client.createRelease('v1.1.0', false).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RepositoryAccessError);
    if (error instanceof RepositoryAccessError) {
      expect(error.status).toBe(422);
    }
  });
});

describe('GitHubClient.uploadAsset', () => {
  let tempDir: string;
  let assetPath: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'release-relay-upload-test-'));
    assetPath = join(tempDir, 'release.tar.gz');
    await writeFile(assetPath, 'archive');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  const release = { id: 555, tagName: 'v1.1.0' };

  it('uploads the file to the uploads host', async () => {
    const { client, requests } = createClient({
      'POST /repos/acme/widget/releases/555/assets': () =>
        jsonResponse(201, { id: 9, browser_download_url: 'https://example.test/release.tar.gz' }),
    });

    await client.uploadAsset(release, assetPath, 'release.tar.gz');

    const request = requests[0];
    expect(request?.url).toBe(
      'https://uploads.github.com/repos/acme/widget/releases/555/assets?name=release.tar.gz',
    );
    expect(request?.headers.get('content-type')).toBe('application/gzip');
  });

  it('raises AssetNotFoundError without calling the API', async () => {
    const { client, requests } = createClient({});
    const missing = join(tempDir, 'missing.tar.gz');

    const error = await client.uploadAsset(release, missing, 'missing.tar.gz').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AssetNotFoundError);
    if (error instanceof AssetNotFoundError) {
      expect(error.message).toBe(`Release asset file not found: ${missing}`);
    }
    expect(requests).toHaveLength(0);
  });

  it('raises AssetNotFoundError for a directory', async () => {
    const { client, requests } = createClient({});

    const error = await client.uploadAsset(release, tempDir, 'release.tar.gz').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AssetNotFoundError);
    expect(requests).toHaveLength(0);
  });

  it('raises UploadError for a non-201 success status', async () => {
    const { client } = createClient({
      'POST /repos/acme/widget/releases/555/assets': () => jsonResponse(200, { id: 9 }),
    });

    const error = await client.uploadAsset(release, assetPath, 'release.tar.gz').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UploadError);
    if (error instanceof UploadError) {
      expect(error.message).toBe('Unexpected response uploading release.tar.gz (HTTP 200)');
    }
  });

  it('raises UploadError when the platform rejects the upload', async () => {
    const { client } = createClient({
      'POST /repos/acme/widget/releases/555/assets': () =>
        jsonResponse(422, { message: 'Validation Failed' }),
    });

    const error = await client.uploadAsset(release, assetPath, 'release.tar.gz').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UploadError);
    if (error instanceof UploadError) {
      expect(error.status).toBe(422);
    }
  });
});

// =============================================================================
// PullRequestHost
// =============================================================================

describe('GitHubClient pull request operations', () => {
  it('creates a PR in another repository of the same owner', async () => {
    const { client, requests } = createClient({
      'POST /repos/acme/platform/pulls': () => jsonResponse(201, { number: 31 }),
    });

    const prNumber = await client.createPullRequest('platform', {
      title: 'Update widget submodule to v1.1.0',
      body: 'body',
      head: 'update-widget-v1.1.0',
      base: 'master',
    });

    expect(prNumber).toBe(31);
    expect(requests[0]?.body).toEqual({
      title: 'Update widget submodule to v1.1.0',
      body: 'body',
      head: 'update-widget-v1.1.0',
      base: 'master',
    });
  });

  it('adds labels through the issues endpoint', async () => {
    const { client, requests } = createClient({
      'POST /repos/acme/platform/issues/31/labels': () =>
        jsonResponse(200, [{ id: 3, name: 'semver:patch' }]),
    });

    await client.addLabels('platform', 31, ['semver:patch']);

    expect(requests[0]?.body).toEqual({ labels: ['semver:patch'] });
  });

  it('merges with the given method and messages', async () => {
    const { client, requests } = createClient({
      'PUT /repos/acme/platform/pulls/31/merge': () =>
        jsonResponse(200, { merged: true, sha: 'def456' }),
    });

    await client.mergePullRequest('platform', 31, {
      method: 'merge',
      title: 'chore: update widget submodule to v1.1.0 (#31)',
      message: 'details',
    });

    expect(requests[0]?.body).toEqual({
      merge_method: 'merge',
      commit_title: 'chore: update widget submodule to v1.1.0 (#31)',
      commit_message: 'details',
    });
  });

  it('raises RepositoryAccessError when the PR cannot be merged', async () => {
    const { client } = createClient({
      'PUT /repos/acme/platform/pulls/31/merge': () =>
        jsonResponse(405, { message: 'Pull Request is not mergeable' }),
    });

    const error = await client
      .mergePullRequest('platform', 31, { method: 'merge', title: 't', message: 'm' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RepositoryAccessError);
    if (error instanceof RepositoryAccessError) {
      expect(error.status).toBe(405);
    }
  });
});
