/**
 * `release-relay get-version` - Fetch the latest released version.
 *
 * Writes the version to current_version.txt for the next pipeline step.
 */

import { Command } from 'commander';

import { BaseCommand } from '../lib/base-command.js';
import { writeVersionFile } from '../../file/version-files.js';
import { CURRENT_VERSION_FILE } from '../../lib/settings.js';

class GetVersionHandler extends BaseCommand {
  async run(): Promise<void> {
    const config = await this.loadConfig();

    const version = await this.execute(async (logger) => {
      const client = this.createGitHubClient(config, logger);
      logger.progress(`Fetching latest release of ${config.owner}/${config.repo}`);
      return client.latestVersion();
    }, 'Failed to get latest version');

    if (this.checkDryRun(`Would write ${version} to ${CURRENT_VERSION_FILE}`, { version })) {
      return;
    }
    const path = await writeVersionFile(this.ctx.cwd, CURRENT_VERSION_FILE, version);

    this.output.data({ version, file: path }, () => {
      this.output.success(`Latest version ${version} written to ${CURRENT_VERSION_FILE}`);
    });
  }
}

export const getVersionCommand = new Command('get-version')
  .description('Fetch the latest release version and write it to current_version.txt')
  .action(async (_options, command: Command) => {
    const handler = new GetVersionHandler(command);
    await handler.run();
  });
