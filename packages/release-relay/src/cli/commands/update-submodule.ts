/**
 * `release-relay update-submodule` - Propagate the new version to a parent repo.
 *
 * Only runs for merge builds (--is-merge). Opens a PR in the parent
 * repository moving the submodule to the new version, then tries to label
 * and merge it.
 */

import { Command } from 'commander';

import { BaseCommand } from '../lib/base-command.js';
import { ValidationError } from '../lib/errors.js';
import { parseBooleanFlag } from '../lib/option-utils.js';
import { requireSubmoduleTarget } from '../../file/config.js';
import { GitCli } from '../../file/git.js';
import { SubmoduleUpdater, submoduleBranchName } from '../../file/submodule-updater.js';
import { readVersionFile } from '../../file/version-files.js';
import { NEW_VERSION_FILE } from '../../lib/settings.js';

interface UpdateSubmoduleOptions {
  parentRepo?: string;
  submodulePath?: string;
  currentVersion?: string;
  isMerge?: boolean;
  baseBranch?: string;
  workDir?: string;
}

class UpdateSubmoduleHandler extends BaseCommand {
  async run(options: UpdateSubmoduleOptions): Promise<void> {
    const config = await this.loadConfig({
      parentRepo: options.parentRepo,
      submodulePath: options.submodulePath,
      baseBranch: options.baseBranch,
    });

    if (!options.isMerge) {
      this.output.notice('Skipping submodule update as this is not a merge operation');
      return;
    }

    const fromFile = await readVersionFile(this.ctx.cwd, NEW_VERSION_FILE);
    const version = fromFile ?? options.currentVersion?.trim();
    if (!version) {
      throw new ValidationError(
        `version is required: write ${NEW_VERSION_FILE} or pass --current-version`,
      );
    }
    const { parentRepo, submodulePath } = requireSubmoduleTarget(config);

    if (
      this.checkDryRun(`Would open PR updating ${parentRepo}:${submodulePath} to ${version}`, {
        parentRepo,
        submodulePath,
        version,
        branch: submoduleBranchName(config.repo, version),
        base: config.baseBranch,
      })
    ) {
      return;
    }

    const result = await this.execute(async (logger) => {
      const updater = new SubmoduleUpdater({
        owner: config.owner,
        repoName: config.repo,
        vcs: new GitCli({ token: config.token, identity: config.git, logger }),
        pullRequests: this.createGitHubClient(config, logger),
        baseBranch: config.baseBranch,
        logger,
      });
      return updater.update({ parentRepo, submodulePath, version, workDir: options.workDir });
    }, 'Failed to update submodule');

    this.output.data(
      {
        prNumber: result.prNumber,
        branch: result.plan.branchName,
        oldCommit: result.plan.oldCommit,
        newCommit: result.plan.newCommit,
        labeled: result.label.status === 'ok',
        merged: result.merge.status === 'ok',
      },
      () => {
        this.output.success(`Created PR #${result.prNumber} for submodule update`);
        if (result.merge.status === 'ok') {
          this.output.success(`Merged PR #${result.prNumber}`);
        }
      },
    );
  }
}

export const updateSubmoduleCommand = new Command('update-submodule')
  .description('Open (and try to merge) a PR moving a parent repo submodule to the new version')
  .option('--parent-repo <name>', 'Parent repository name (same owner)')
  .option('-m, --submodule-path <path>', 'Submodule path inside the parent repository')
  .option('-c, --current-version <version>', 'Version (if new_version.txt is absent)')
  .option('-i, --is-merge [bool]', 'Run the update (merge builds only)', parseBooleanFlag)
  .option('--base-branch <branch>', 'Base branch for the PR (default: master)')
  .option('--work-dir <dir>', 'Clone into this new directory instead of a temp dir')
  .action(async (options: UpdateSubmoduleOptions, command: Command) => {
    const handler = new UpdateSubmoduleHandler(command);
    await handler.run(options);
  });
