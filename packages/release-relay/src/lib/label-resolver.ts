/**
 * Maps pull request labels to a bump directive.
 */

import type { BumpDirective, PullRequestLabelSet } from './types.js';
import { SEMVER_LABELS } from './settings.js';

function isSemverLabel(name: string): name is keyof typeof SEMVER_LABELS {
  return Object.hasOwn(SEMVER_LABELS, name);
}

/**
 * Resolve the bump directive for a PR. The first `semver:*` label in the
 * PR's label order wins; with none, the result is `timestamp`.
 *
 * @example resolveBumpDirective([{ name: 'semver:minor' }, { name: 'semver:major' }]) → 'minor'
 */
export function resolveBumpDirective(labels: PullRequestLabelSet): BumpDirective {
  for (const label of labels) {
    if (isSemverLabel(label.name)) {
      return SEMVER_LABELS[label.name];
    }
  }
  return 'timestamp';
}
