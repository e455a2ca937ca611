/**
 * `release-relay create-release` - Publish a GitHub release.
 *
 * Uses the version from new_version.txt (or --current-version). Releases are
 * drafts unless --prod is given. The asset is uploaded unless --skip-asset.
 */

import { resolve } from 'node:path';

import { Command } from 'commander';

import { BaseCommand } from '../lib/base-command.js';
import { ValidationError } from '../lib/errors.js';
import { publishRelease } from '../../file/release.js';
import { readVersionFile } from '../../file/version-files.js';
import { NEW_VERSION_FILE } from '../../lib/settings.js';

interface CreateReleaseOptions {
  currentVersion?: string;
  draft?: boolean;
  prod?: boolean;
  skipAsset?: boolean;
  asset?: string;
}

/**
 * Releases default to draft; --prod publishes.
 */
export function resolveDraft(options: Pick<CreateReleaseOptions, 'draft' | 'prod'>): boolean {
  if (options.draft && options.prod) {
    throw new ValidationError('--draft and --prod cannot be used together');
  }
  return !options.prod;
}

class CreateReleaseHandler extends BaseCommand {
  async run(options: CreateReleaseOptions): Promise<void> {
    const isDraft = resolveDraft(options);
    const config = await this.loadConfig({ assetPath: options.asset });

    const fromFile = await readVersionFile(this.ctx.cwd, NEW_VERSION_FILE);
    if (fromFile === null) {
      this.output.info(`${NEW_VERSION_FILE} not found, using --current-version`);
    }
    const version = fromFile ?? options.currentVersion?.trim();
    if (!version) {
      throw new ValidationError(
        `release version is required: write ${NEW_VERSION_FILE} or pass --current-version`,
      );
    }

    const skipAsset = options.skipAsset ?? false;
    if (
      this.checkDryRun(`Would create ${isDraft ? 'draft ' : ''}release ${version}`, {
        version,
        isDraft,
        asset: skipAsset ? null : config.assetPath,
      })
    ) {
      return;
    }

    const { release, asset } = await this.execute(async (logger) => {
      const client = this.createGitHubClient(config, logger);
      return publishRelease(client, {
        version,
        isDraft,
        skipAsset,
        assetPath: resolve(this.ctx.cwd, config.assetPath),
        logger,
      });
    }, 'Failed to create release');

    const assetStatus = asset === null ? 'skipped' : asset.status;
    this.output.data({ releaseId: release.id, version, isDraft, asset: assetStatus }, () => {
      this.output.success(`Created release ${version} with ID: ${release.id}`);
      if (asset?.status === 'ok') {
        this.output.success(`Uploaded ${config.assetPath}`);
      }
    });

    if (asset !== null && asset.status !== 'ok') {
      throw asset.error;
    }
  }
}

export const createReleaseCommand = new Command('create-release')
  .description('Create a GitHub release for the new version')
  .option('-c, --current-version <version>', 'Release version (if new_version.txt is absent)')
  .option('-d, --draft', 'Create a draft release (default)')
  .option('-r, --prod', 'Create a published (non-draft) release')
  .option('-s, --skip-asset', 'Skip uploading the release asset')
  .option('--asset <path>', 'Asset file to upload (default: release.tar.gz)')
  .action(async (options: CreateReleaseOptions, command: Command) => {
    const handler = new CreateReleaseHandler(command);
    await handler.run(options);
  });
