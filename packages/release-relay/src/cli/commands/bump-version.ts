/**
 * `release-relay bump-version` - Compute the next version.
 *
 * Reads the current version from current_version.txt (or --current-version),
 * decides the bump directive from PR labels or --version-type, and writes
 * the result to new_version.txt.
 */

import { Command } from 'commander';

import { BaseCommand } from '../lib/base-command.js';
import { ValidationError } from '../lib/errors.js';
import { parseBooleanFlag } from '../lib/option-utils.js';
import { determineDirective } from '../../file/bump.js';
import { parsePrNumber } from '../../file/config.js';
import { readVersionFile, writeVersionFile } from '../../file/version-files.js';
import { bumpVersion } from '../../lib/version-policy.js';
import { CURRENT_VERSION_FILE, NEW_VERSION_FILE } from '../../lib/settings.js';

interface BumpVersionOptions {
  currentVersion?: string;
  versionType?: string;
  prNumber?: string;
  isMerge?: boolean;
}

class BumpVersionHandler extends BaseCommand {
  async run(options: BumpVersionOptions): Promise<void> {
    const config = await this.loadConfig();

    const fromFile = await readVersionFile(this.ctx.cwd, CURRENT_VERSION_FILE);
    if (fromFile === null) {
      this.output.info(`${CURRENT_VERSION_FILE} not found, using --current-version`);
    }
    const currentVersion = fromFile ?? options.currentVersion?.trim();
    if (!currentVersion) {
      throw new ValidationError(
        `current version is required: write ${CURRENT_VERSION_FILE} or pass --current-version`,
      );
    }

    const prNumber = parsePrNumber(options.prNumber) ?? parsePrNumber(process.env._PR_NUMBER);
    const isMerge = options.isMerge ?? false;

    const { newVersion, resolution } = await this.execute(async (logger) => {
      const client = this.createGitHubClient(config, logger);
      const resolution = await determineDirective(
        { versionType: options.versionType, prNumber, isMerge },
        client,
        logger,
      );
      logger.info(`Using version type: ${resolution.directive} (${resolution.source})`);
      const newVersion = bumpVersion(currentVersion, resolution.directive, { logger });
      return { newVersion, resolution };
    }, 'Failed to bump version');

    const result = {
      currentVersion,
      newVersion,
      directive: resolution.directive,
      source: resolution.source,
      prNumber: resolution.prNumber,
    };

    if (this.checkDryRun(`Would write ${newVersion} to ${NEW_VERSION_FILE}`, result)) {
      return;
    }
    await writeVersionFile(this.ctx.cwd, NEW_VERSION_FILE, newVersion);

    this.output.data(result, () => {
      this.output.success(
        `New version ${newVersion} (from ${currentVersion}) written to ${NEW_VERSION_FILE}`,
      );
    });
  }
}

export const bumpVersionCommand = new Command('bump-version')
  .description('Compute the next version and write it to new_version.txt')
  .option('-c, --current-version <version>', 'Current version (if current_version.txt is absent)')
  .option('-v, --version-type <type>', 'Bump type: major, minor, patch or timestamp')
  .option('-p, --pr-number <number>', 'PR whose semver:* labels decide the bump type')
  .option(
    '-i, --is-merge [bool]',
    'Merge build: --version-type carries the merge commit SHA',
    parseBooleanFlag,
  )
  .action(async (options: BumpVersionOptions, command: Command) => {
    const handler = new BumpVersionHandler(command);
    await handler.run(options);
  });
