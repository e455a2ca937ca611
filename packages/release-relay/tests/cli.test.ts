/**
 * Tests for the CLI program and its command handlers.
 *
 * Each test runs in a temp working directory. Octokit picks up the stubbed
 * global fetch, so GitHub calls are answered in process.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { InvalidArgumentError } from 'commander';

import { createProgram } from '../src/cli/cli.js';
import { resolveDraft } from '../src/cli/commands/create-release.js';
import { AssetNotFoundError, ConfigError, ValidationError } from '../src/cli/lib/errors.js';
import { parseBooleanFlag } from '../src/cli/lib/option-utils.js';
import { readVersionFile } from '../src/file/version-files.js';
import { CURRENT_VERSION_FILE, NEW_VERSION_FILE } from '../src/lib/settings.js';
import { TEST_TOKEN, fakeGitHub, jsonResponse, type RouteHandler } from './test-helpers.js';

const GLOBAL_ARGS = ['node', 'release-relay', '--owner', 'acme', '--repo', 'widget', '--color', 'never'];

let tempDir: string;
let log: MockInstance<typeof console.log>;

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), 'release-relay-cli-test-'));
  vi.spyOn(process, 'cwd').mockReturnValue(tempDir);
  vi.stubEnv('GITHUB_TOKEN', TEST_TOKEN);
  vi.stubEnv('_PR_NUMBER', '');
  log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
  vi.unstubAllGlobals();
  await rm(tempDir, { recursive: true, force: true });
});

function stubGitHub(routes: Record<string, RouteHandler>) {
  const github = fakeGitHub(routes);
  vi.stubGlobal('fetch', github.fetch);
  return github;
}

async function run(...args: string[]): Promise<void> {
  await createProgram().parseAsync([...GLOBAL_ARGS, ...args]);
}

describe('createProgram', () => {
  it('registers the four pipeline commands', () => {
    const program = createProgram();

    expect(program.name()).toBe('release-relay');
    expect(program.commands.map((c) => c.name())).toEqual([
      'get-version',
      'bump-version',
      'create-release',
      'update-submodule',
    ]);
  });
});

describe('option parsing', () => {
  it('resolveDraft defaults to draft and publishes with --prod', () => {
    expect(resolveDraft({})).toBe(true);
    expect(resolveDraft({ draft: true })).toBe(true);
    expect(resolveDraft({ prod: true })).toBe(false);
    expect(() => resolveDraft({ draft: true, prod: true })).toThrow(ValidationError);
  });

  it('parseBooleanFlag accepts pipeline boolean spellings', () => {
    expect(parseBooleanFlag('true')).toBe(true);
    expect(parseBooleanFlag('Yes')).toBe(true);
    expect(parseBooleanFlag('1')).toBe(true);
    expect(parseBooleanFlag('false')).toBe(false);
    expect(parseBooleanFlag('n')).toBe(false);
    expect(parseBooleanFlag('0')).toBe(false);
    expect(() => parseBooleanFlag('maybe')).toThrow(InvalidArgumentError);
  });
});

describe('get-version', () => {
  it('writes the latest release to current_version.txt', async () => {
    stubGitHub({
      'GET /repos/acme/widget/releases/latest': () => jsonResponse(200, { tag_name: 'v1.4.2' }),
    });

    await run('get-version');

    await expect(readVersionFile(tempDir, CURRENT_VERSION_FILE)).resolves.toBe('v1.4.2');
  });

  it('fails without a token', async () => {
    vi.stubEnv('GITHUB_TOKEN', '');

    await expect(run('get-version')).rejects.toBeInstanceOf(ConfigError);
  });

  it('writes nothing with --dry-run', async () => {
    stubGitHub({
      'GET /repos/acme/widget/releases/latest': () => jsonResponse(200, { tag_name: 'v1.4.2' }),
    });

    await run('--dry-run', 'get-version');

    expect(log).toHaveBeenCalledWith('[DRY-RUN] Would write v1.4.2 to current_version.txt');
    await expect(readVersionFile(tempDir, CURRENT_VERSION_FILE)).resolves.toBeNull();
  });
});

describe('bump-version', () => {
  it('prefers current_version.txt and takes the PR from _PR_NUMBER', async () => {
    await writeFile(join(tempDir, CURRENT_VERSION_FILE), 'v1.0.0');
    vi.stubEnv('_PR_NUMBER', '5');
    const github = stubGitHub({
      'GET /repos/acme/widget/pulls/5': () =>
        jsonResponse(200, { number: 5, labels: [{ name: 'semver:minor' }] }),
    });

    await run('bump-version', '--current-version', 'v9.9.9');

    expect(github.requests.map((r) => r.path)).toEqual(['/repos/acme/widget/pulls/5']);
    await expect(readVersionFile(tempDir, NEW_VERSION_FILE)).resolves.toBe('v1.1.0');
    expect(log).toHaveBeenCalledWith(
      '✓ New version v1.1.0 (from v1.0.0) written to new_version.txt',
    );
  });

  it('uses --current-version and --version-type without a PR', async () => {
    const github = stubGitHub({});

    await run('bump-version', '--current-version', 'v2.3.4', '--version-type', 'major');

    expect(github.requests).toEqual([]);
    await expect(readVersionFile(tempDir, NEW_VERSION_FILE)).resolves.toBe('v3.0.0');
  });

  it('accepts an explicit false for --is-merge', async () => {
    stubGitHub({});

    await run(
      'bump-version',
      '--current-version',
      'v1.0.0',
      '--version-type',
      'minor',
      '--is-merge',
      'false',
    );

    await expect(readVersionFile(tempDir, NEW_VERSION_FILE)).resolves.toBe('v1.1.0');
  });

  it('bumps patch for a merge commit without a PR', async () => {
    stubGitHub({
      'GET /repos/acme/widget/commits/deadbeef/pulls': () => jsonResponse(200, []),
      'GET /repos/acme/widget/commits/deadbeef': () =>
        jsonResponse(200, { sha: 'deadbeef', commit: { message: 'chore: direct push' } }),
    });

    await run(
      'bump-version',
      '--current-version',
      'v1.2.3',
      '--version-type',
      'deadbeef',
      '--is-merge',
      'true',
    );

    await expect(readVersionFile(tempDir, NEW_VERSION_FILE)).resolves.toBe('v1.2.4');
  });

  it('requires a current version', async () => {
    stubGitHub({});

    await expect(run('bump-version', '--version-type', 'patch')).rejects.toBeInstanceOf(
      ValidationError,
    );
  });

  it('writes nothing with --dry-run', async () => {
    await writeFile(join(tempDir, CURRENT_VERSION_FILE), 'v1.0.0');
    stubGitHub({});

    await run('--dry-run', 'bump-version', '--version-type', 'minor');

    expect(log).toHaveBeenCalledWith('[DRY-RUN] Would write v1.1.0 to new_version.txt');
    await expect(readVersionFile(tempDir, NEW_VERSION_FILE)).resolves.toBeNull();
  });
});

describe('create-release', () => {
  const releaseRoute = (id: number): Record<string, RouteHandler> => ({
    'POST /repos/acme/widget/releases': () => jsonResponse(201, { id, tag_name: 'v1.1.0' }),
  });

  it('rejects --draft with --prod before loading config', async () => {
    vi.stubEnv('GITHUB_TOKEN', '');

    await expect(run('create-release', '--draft', '--prod')).rejects.toBeInstanceOf(
      ValidationError,
    );
  });

  it('reports the release id, then fails when the asset is missing', async () => {
    await writeFile(join(tempDir, NEW_VERSION_FILE), 'v1.1.0');
    const github = stubGitHub(releaseRoute(555));

    const error = await run('create-release', '--current-version', 'v0.0.1').catch(
      (e: unknown) => e,
    );

    expect(github.requests[0]?.body).toEqual({
      tag_name: 'v1.1.0',
      name: 'Release v1.1.0',
      body: 'Release version v1.1.0',
      draft: true,
      prerelease: false,
    });
    expect(log).toHaveBeenCalledWith('✓ Created release v1.1.0 with ID: 555');
    expect(error).toBeInstanceOf(AssetNotFoundError);
    if (error instanceof AssetNotFoundError) {
      expect(error.filePath).toBe(join(tempDir, 'release.tar.gz'));
    }
  });

  it('publishes without an asset using --prod --skip-asset', async () => {
    await writeFile(join(tempDir, NEW_VERSION_FILE), 'v1.1.0');
    const github = stubGitHub(releaseRoute(556));

    await run('create-release', '--prod', '--skip-asset');

    expect(github.requests).toHaveLength(1);
    expect(github.requests[0]?.body).toMatchObject({ draft: false });
    expect(log).toHaveBeenCalledWith('✓ Created release v1.1.0 with ID: 556');
  });

  it('creates nothing with --dry-run', async () => {
    await writeFile(join(tempDir, NEW_VERSION_FILE), 'v1.1.0');
    const github = stubGitHub(releaseRoute(557));

    await run('--dry-run', 'create-release');

    expect(github.requests).toEqual([]);
    expect(log).toHaveBeenCalledWith('[DRY-RUN] Would create draft release v1.1.0');
  });
});

describe('update-submodule', () => {
  it('does nothing outside merge builds', async () => {
    const github = stubGitHub({});

    await run('update-submodule', '--parent-repo', 'platform', '--submodule-path', 'libs/widget');

    expect(log).toHaveBeenCalledWith('• Skipping submodule update as this is not a merge operation');
    expect(github.requests).toEqual([]);
  });

  it('treats --is-merge false as not a merge build', async () => {
    stubGitHub({});

    await run(
      'update-submodule',
      '--parent-repo',
      'platform',
      '--submodule-path',
      'libs/widget',
      '--is-merge',
      'false',
    );

    expect(log).toHaveBeenCalledWith('• Skipping submodule update as this is not a merge operation');
  });

  it('requires the parent repo and submodule path for merge builds', async () => {
    await writeFile(join(tempDir, NEW_VERSION_FILE), 'v1.1.0');
    stubGitHub({});

    await expect(run('update-submodule', '--is-merge')).rejects.toBeInstanceOf(ConfigError);
  });
});
