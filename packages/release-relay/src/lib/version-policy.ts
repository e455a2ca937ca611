/**
 * Version bump policy.
 *
 * Computes the next release version from the current one and a bump
 * directive. Pure apart from the clock, which callers may inject.
 */

import type { BumpDirective, OperationLogger, Version, VersionParts } from './types.js';
import { BUMP_DIRECTIVES, noopLogger } from './types.js';
import { formatVersionTimestamp, nowDate } from '../utils/time-utils.js';

/**
 * Thrown by parseVersion() when the numeric core is not MAJOR.MINOR.PATCH.
 * bumpVersion() recovers from it; it never reaches the CLI.
 */
export class MalformedVersionError extends Error {
  constructor(public readonly input: string) {
    super(`Malformed version: '${input}' (expected MAJOR.MINOR.PATCH)`);
    this.name = 'MalformedVersionError';
  }
}

const TIMESTAMP_SUFFIX_RE = /-\d{14}$/;
const NUMERIC_CORE_RE = /^(\d+)\.(\d+)\.(\d+)$/;

export function isBumpDirective(value: string): value is BumpDirective {
  return (BUMP_DIRECTIVES as readonly string[]).includes(value);
}

/**
 * Remove the leading `v` (one or more) from a version.
 */
export function stripPrefix(version: string): string {
  return version.replace(/^v+/, '');
}

/**
 * Remove a trailing `-YYYYMMDDHHMMSS` suffix, if any.
 */
export function stripTimestamp(version: string): string {
  return version.replace(TIMESTAMP_SUFFIX_RE, '');
}

/**
 * Parse the numeric core of a version. Accepts an optional leading `v` and
 * ignores everything from the first `-` on.
 *
 * @throws MalformedVersionError if the core is not three non-negative integers
 */
export function parseVersion(version: string): VersionParts {
  const core = stripPrefix(version.trim()).split('-')[0] ?? '';
  const match = NUMERIC_CORE_RE.exec(core);
  if (!match) {
    throw new MalformedVersionError(version);
  }
  return {
    major: BigInt(match[1] ?? '0'),
    minor: BigInt(match[2] ?? '0'),
    patch: BigInt(match[3] ?? '0'),
  };
}

export function formatVersion(parts: VersionParts, timestamp?: string): Version {
  const core = `v${parts.major}.${parts.minor}.${parts.patch}`;
  return timestamp ? `${core}-${timestamp}` : core;
}

export interface BumpOptions {
  /** Clock used for timestamp suffixes (default: now) */
  now?: Date;
  logger?: OperationLogger;
}

/**
 * Compute the next version.
 *
 * - Empty directive or `timestamp`: keep the numeric core as-is and replace
 *   the timestamp suffix with the current time.
 * - `major` / `minor` / `patch`: increment that component and reset the
 *   lower ones. The timestamp suffix is dropped.
 * - Any other directive is treated as `patch`.
 * - An unparseable current version yields `v0.0.0-{timestamp}`.
 *
 * @example bumpVersion('v1.2.3-20240101000000', 'patch') → 'v1.2.4'
 */
export function bumpVersion(
  current: Version,
  directive: string | undefined,
  options: BumpOptions = {},
): Version {
  const logger = options.logger ?? noopLogger;
  const now = options.now ?? nowDate();
  const requested = directive?.trim() ?? '';

  logger.debug(`Bumping version: current=${current}, type=${requested || '(none)'}`);

  if (requested === '' || requested === 'timestamp') {
    const core = stripTimestamp(stripPrefix(current.trim())) || '0.0.0';
    return `v${core}-${formatVersionTimestamp(now)}`;
  }

  let parts: VersionParts;
  try {
    parts = parseVersion(current);
  } catch (error) {
    if (!(error instanceof MalformedVersionError)) {
      throw error;
    }
    logger.warn(`${error.message}; falling back to v0.0.0 with timestamp`);
    return formatVersion({ major: 0n, minor: 0n, patch: 0n }, formatVersionTimestamp(now));
  }

  let kind: BumpDirective;
  if (isBumpDirective(requested)) {
    kind = requested;
  } else {
    logger.warn(`Unknown bump type '${requested}', performing patch bump`);
    kind = 'patch';
  }

  switch (kind) {
    case 'major':
      return formatVersion({ major: parts.major + 1n, minor: 0n, patch: 0n });
    case 'minor':
      return formatVersion({ major: parts.major, minor: parts.minor + 1n, patch: 0n });
    case 'patch':
    case 'timestamp':
      return formatVersion({ ...parts, patch: parts.patch + 1n });
  }
}
