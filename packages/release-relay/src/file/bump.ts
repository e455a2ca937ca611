/**
 * Bump directive resolution for a pipeline run.
 *
 * The directive comes from the labels of the PR that triggered the run when
 * one is known, otherwise from the value the pipeline passed explicitly.
 */

import { resolveBumpDirective } from '../lib/label-resolver.js';
import type { OperationLogger, ReleaseRepository } from '../lib/types.js';
import { attempt, noopLogger } from '../lib/types.js';

/** Directive for merge runs whose PR or labels cannot be resolved. */
const MERGE_FALLBACK_DIRECTIVE = 'patch';

export interface DirectiveRequest {
  /** Explicit directive. In merge runs without a PR number, the merge commit SHA. */
  versionType?: string;
  prNumber: number | null;
  isMerge: boolean;
}

export interface DirectiveResolution {
  /** Directive to pass to bumpVersion(); may be an unrecognized value */
  directive: string;
  prNumber: number | null;
  source: 'labels' | 'explicit' | 'default';
}

/**
 * Decide the bump directive.
 *
 * 1. In a merge run with no PR number, `versionType` is treated as the merge
 *    commit SHA and its PR is looked up. The fallback for that run is `patch`.
 * 2. With a PR number, the PR's labels decide. If the labels cannot be
 *    fetched, the explicit directive is used when there is one; without one
 *    the failure is fatal.
 * 3. With nothing to go on, the directive is `timestamp`.
 */
export async function determineDirective(
  request: DirectiveRequest,
  repository: ReleaseRepository,
  logger: OperationLogger = noopLogger,
): Promise<DirectiveResolution> {
  let prNumber = request.prNumber;
  let fallback = request.versionType?.trim() || undefined;

  if (request.isMerge && prNumber === null && fallback) {
    const commitSha = fallback;
    fallback = MERGE_FALLBACK_DIRECTIVE;
    logger.info(`Looking up PR number from merge commit: ${commitSha}`);
    prNumber = await repository.findPullRequestForCommit(commitSha);
  }

  const lookup = prNumber;
  if (lookup !== null) {
    const labels = await attempt(
      () => repository.pullRequestLabels(lookup),
      fallback ? 'recoverable' : 'fatal',
    );
    switch (labels.status) {
      case 'ok': {
        const directive = resolveBumpDirective(labels.value);
        logger.info(
          `PR #${prNumber} labels: [${labels.value.map((l) => l.name).join(', ')}] → ${directive}`,
        );
        return { directive, prNumber, source: 'labels' };
      }
      case 'recoverable':
        logger.warn(
          `Error getting PR info: ${labels.error.message}; falling back to provided version type`,
        );
        break;
      case 'fatal':
        throw labels.error;
    }
  }

  if (fallback) {
    return { directive: fallback, prNumber, source: 'explicit' };
  }
  return { directive: 'timestamp', prNumber, source: 'default' };
}
