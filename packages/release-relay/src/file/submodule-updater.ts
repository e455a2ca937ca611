/**
 * Submodule propagation workflow.
 *
 * Advances a submodule in a parent repository to a released version and
 * lands the change through a pull request:
 *
 *   cloned → path-ensured → submodule-prepared → branched → version-pinned
 *     → committed → pushed → pr-created → (label) → (merge)
 *
 * The stages up to pr-created run in order and any failure aborts the run
 * with a SubmoduleStageError. Nothing is rolled back: the clone and a pushed
 * branch may be left behind. Labeling and merging are best-effort; their
 * failures are reported as recoverable outcomes and the PR number is still
 * returned.
 */

import { access, mkdir, mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

import { SubmoduleStageError } from '../cli/lib/errors.js';
import {
  DEFAULT_BASE_BRANCH,
  INITIAL_COMMIT_SENTINEL,
  SUBMODULE_PR_LABEL,
} from '../lib/settings.js';
import type {
  MergeRequest,
  NewPullRequest,
  OperationLogger,
  Outcome,
  PullRequestHost,
  Version,
  VersionControl,
} from '../lib/types.js';
import { attempt, noopLogger, toError } from '../lib/types.js';
import { repoCloneUrl } from './git.js';

// =============================================================================
// Stages and Plan
// =============================================================================

export const SUBMODULE_STAGES = [
  'cloned',
  'path-ensured',
  'submodule-prepared',
  'branched',
  'version-pinned',
  'committed',
  'pushed',
  'pr-created',
] as const;

export type SubmoduleStage = (typeof SUBMODULE_STAGES)[number];

/**
 * State of a single update run. Each stage returns a new plan with the
 * fields it produced; `stages` lists the stages completed so far.
 */
export interface SubmoduleUpdatePlan {
  owner: string;
  repoName: string;
  parentRepo: string;
  submodulePath: string;
  version: Version;
  branchName: string;
  baseBranch: string;
  /** Root of the parent repository clone */
  workDir: string;
  /** Submodule commit before the update, or `initial` for a new submodule */
  oldCommit: string | null;
  newCommit: string | null;
  prNumber: number | null;
  stages: SubmoduleStage[];
}

// =============================================================================
// Naming
// =============================================================================

export function submoduleBranchName(repoName: string, version: Version): string {
  return `update-${repoName}-${version}`;
}

export function submoduleCommitMessage(repoName: string, version: Version): string {
  return `chore: update ${repoName} submodule to ${version}`;
}

export function submodulePullRequest(plan: SubmoduleUpdatePlan): NewPullRequest {
  return {
    title: `Update ${plan.repoName} submodule to ${plan.version}`,
    body:
      `This PR updates the ${plan.repoName} submodule from commit ` +
      `\`${plan.oldCommit}\` to \`${plan.newCommit}\`\n\nVersion: ${plan.version}`,
    head: plan.branchName,
    base: plan.baseBranch,
  };
}

export function submoduleMergeRequest(plan: SubmoduleUpdatePlan, prNumber: number): MergeRequest {
  return {
    method: 'merge',
    title: `${submoduleCommitMessage(plan.repoName, plan.version)} (#${prNumber})`,
    message:
      `Update ${plan.repoName} submodule from commit ` +
      `\`${plan.oldCommit}\` to \`${plan.newCommit}\`\n\nVersion: ${plan.version}`,
  };
}

// =============================================================================
// Updater
// =============================================================================

export interface SubmoduleUpdaterOptions {
  owner: string;
  /** Name of the repository being released (the submodule's source) */
  repoName: string;
  vcs: VersionControl;
  pullRequests: PullRequestHost;
  baseBranch?: string;
  label?: string;
  /** Builds clone URLs (default: https://github.com/{owner}/{repo}.git) */
  cloneUrl?: (owner: string, repo: string) => string;
  logger?: OperationLogger;
}

export interface SubmoduleUpdateRequest {
  parentRepo: string;
  submodulePath: string;
  version: Version;
  /**
   * Directory to clone into. Must not exist yet. When omitted, a fresh
   * temporary directory is created.
   */
  workDir?: string;
}

export interface SubmoduleUpdateResult {
  prNumber: number;
  plan: SubmoduleUpdatePlan;
  label: Outcome<void>;
  merge: Outcome<void>;
}

interface StageStep {
  stage: SubmoduleStage;
  run: (plan: SubmoduleUpdatePlan) => Promise<SubmoduleUpdatePlan>;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export class SubmoduleUpdater {
  private readonly vcs: VersionControl;
  private readonly pullRequests: PullRequestHost;
  private readonly logger: OperationLogger;
  private readonly cloneUrl: (owner: string, repo: string) => string;

  constructor(private readonly options: SubmoduleUpdaterOptions) {
    this.vcs = options.vcs;
    this.pullRequests = options.pullRequests;
    this.logger = options.logger ?? noopLogger;
    this.cloneUrl = options.cloneUrl ?? ((owner, repo) => repoCloneUrl(owner, repo));
  }

  /**
   * The ordered fatal stages. Each consumes the plan produced by the previous one.
   */
  private steps(request: SubmoduleUpdateRequest): StageStep[] {
    return [
      { stage: 'cloned', run: (plan) => this.clone(plan, request.workDir) },
      { stage: 'path-ensured', run: (plan) => this.ensurePath(plan) },
      { stage: 'submodule-prepared', run: (plan) => this.prepareSubmodule(plan) },
      { stage: 'branched', run: (plan) => this.branch(plan) },
      { stage: 'version-pinned', run: (plan) => this.pinVersion(plan) },
      { stage: 'committed', run: (plan) => this.commit(plan) },
      { stage: 'pushed', run: (plan) => this.push(plan) },
      { stage: 'pr-created', run: (plan) => this.openPullRequest(plan) },
    ];
  }

  createPlan(request: SubmoduleUpdateRequest): SubmoduleUpdatePlan {
    const { owner, repoName } = this.options;
    return {
      owner,
      repoName,
      parentRepo: request.parentRepo,
      submodulePath: request.submodulePath,
      version: request.version,
      branchName: submoduleBranchName(repoName, request.version),
      baseBranch: this.options.baseBranch ?? DEFAULT_BASE_BRANCH,
      workDir: request.workDir ?? '',
      oldCommit: null,
      newCommit: null,
      prNumber: null,
      stages: [],
    };
  }

  /**
   * Run the full workflow.
   *
   * @throws SubmoduleStageError if any stage up to PR creation fails
   */
  async update(request: SubmoduleUpdateRequest): Promise<SubmoduleUpdateResult> {
    this.logger.info(
      `Updating submodule: repo=${request.parentRepo}, path=${request.submodulePath}, version=${request.version}`,
    );

    let plan = this.createPlan(request);
    for (const { stage, run } of this.steps(request)) {
      try {
        plan = await run(plan);
      } catch (error) {
        throw new SubmoduleStageError(stage, toError(error));
      }
      plan = { ...plan, stages: [...plan.stages, stage] };
      this.logger.debug(`Stage complete: ${stage}`);
    }

    const prNumber = plan.prNumber;
    if (prNumber === null) {
      throw new SubmoduleStageError('pr-created', new Error('No pull request number returned'));
    }

    const label = await this.labelPullRequest(plan, prNumber);
    const merge = await this.mergePullRequest(plan, prNumber);
    return { prNumber, plan, label, merge };
  }

  // ---------------------------------------------------------------------------
  // Fatal stages
  // ---------------------------------------------------------------------------

  private async clone(
    plan: SubmoduleUpdatePlan,
    workDir: string | undefined,
  ): Promise<SubmoduleUpdatePlan> {
    const target =
      workDir ?? join(await mkdtemp(join(tmpdir(), 'release-relay-')), plan.parentRepo);
    const url = this.cloneUrl(plan.owner, plan.parentRepo);
    this.logger.progress(`Cloning ${plan.owner}/${plan.parentRepo}`);
    this.logger.info(`Cloning parent repo from ${url} into ${target}`);
    await this.vcs.clone(url, target);
    return { ...plan, workDir: target };
  }

  private async ensurePath(plan: SubmoduleUpdatePlan): Promise<SubmoduleUpdatePlan> {
    const submoduleDir = join(plan.workDir, plan.submodulePath);
    if (!(await pathExists(submoduleDir))) {
      this.logger.info(`Creating directory structure for ${plan.submodulePath}`);
      await mkdir(dirname(submoduleDir), { recursive: true });
    }
    return plan;
  }

  private async prepareSubmodule(plan: SubmoduleUpdatePlan): Promise<SubmoduleUpdatePlan> {
    this.logger.progress(`Preparing submodule ${plan.submodulePath}`);
    await this.vcs.submoduleInit(plan.workDir, plan.submodulePath);
    await this.vcs.submoduleUpdate(plan.workDir, plan.submodulePath);

    if (!(await pathExists(join(plan.workDir, plan.submodulePath, '.git')))) {
      const url = this.cloneUrl(plan.owner, plan.repoName);
      this.logger.info(`Adding new submodule at ${plan.submodulePath} from ${url}`);
      await this.vcs.submoduleAdd(plan.workDir, url, plan.submodulePath);
    }
    return plan;
  }

  private async branch(plan: SubmoduleUpdatePlan): Promise<SubmoduleUpdatePlan> {
    this.logger.info(`Creating branch: ${plan.branchName}`);
    await this.vcs.createBranch(plan.workDir, plan.branchName);
    return plan;
  }

  private async pinVersion(plan: SubmoduleUpdatePlan): Promise<SubmoduleUpdatePlan> {
    const submoduleDir = join(plan.workDir, plan.submodulePath);
    this.logger.progress(`Checking out ${plan.version} in ${plan.submodulePath}`);

    let oldCommit: string;
    try {
      oldCommit = await this.vcs.headCommit(submoduleDir);
    } catch {
      this.logger.info('No previous commit found (new submodule)');
      oldCommit = INITIAL_COMMIT_SENTINEL;
    }

    await this.vcs.fetch(submoduleDir, 'origin');
    await this.vcs.checkout(submoduleDir, plan.version);
    const newCommit = await this.vcs.headCommit(submoduleDir);
    this.logger.info(`Submodule commit: ${oldCommit} → ${newCommit}`);
    return { ...plan, oldCommit, newCommit };
  }

  private async commit(plan: SubmoduleUpdatePlan): Promise<SubmoduleUpdatePlan> {
    await this.vcs.add(plan.workDir, plan.submodulePath);
    await this.vcs.commit(plan.workDir, submoduleCommitMessage(plan.repoName, plan.version));
    return plan;
  }

  private async push(plan: SubmoduleUpdatePlan): Promise<SubmoduleUpdatePlan> {
    this.logger.progress(`Pushing ${plan.branchName}`);
    await this.vcs.push(plan.workDir, 'origin', plan.branchName);
    return plan;
  }

  private async openPullRequest(plan: SubmoduleUpdatePlan): Promise<SubmoduleUpdatePlan> {
    this.logger.progress(`Opening pull request in ${plan.owner}/${plan.parentRepo}`);
    const prNumber = await this.pullRequests.createPullRequest(
      plan.parentRepo,
      submodulePullRequest(plan),
    );
    this.logger.info(`Created PR #${prNumber}`);
    return { ...plan, prNumber };
  }

  // ---------------------------------------------------------------------------
  // Best-effort steps
  // ---------------------------------------------------------------------------

  private async labelPullRequest(
    plan: SubmoduleUpdatePlan,
    prNumber: number,
  ): Promise<Outcome<void>> {
    const label = this.options.label ?? SUBMODULE_PR_LABEL;
    const outcome = await attempt(
      () => this.pullRequests.addLabels(plan.parentRepo, prNumber, [label]),
      'recoverable',
    );
    if (outcome.status === 'ok') {
      this.logger.info(`Added ${label} label to PR #${prNumber}`);
    } else {
      this.logger.warn(`Failed to add label to PR #${prNumber}: ${outcome.error.message}`);
    }
    return outcome;
  }

  private async mergePullRequest(
    plan: SubmoduleUpdatePlan,
    prNumber: number,
  ): Promise<Outcome<void>> {
    this.logger.progress(`Merging PR #${prNumber}`);
    const outcome = await attempt(
      () =>
        this.pullRequests.mergePullRequest(
          plan.parentRepo,
          prNumber,
          submoduleMergeRequest(plan, prNumber),
        ),
      'recoverable',
    );
    if (outcome.status === 'ok') {
      this.logger.info(`Merged PR #${prNumber}`);
    } else {
      this.logger.warn(
        `Failed to merge PR #${prNumber}, left open for manual merge: ${outcome.error.message}`,
      );
    }
    return outcome;
  }
}
