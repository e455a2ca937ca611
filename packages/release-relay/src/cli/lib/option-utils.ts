/**
 * Value parsers for CLI options.
 */

import { InvalidArgumentError } from 'commander';

const TRUE_VALUES = new Set(['yes', 'true', 't', 'y', '1']);
const FALSE_VALUES = new Set(['no', 'false', 'f', 'n', '0']);

/**
 * Parse the value of an optional boolean flag such as `--is-merge false`.
 * Pipelines pass these from variables, so yes/no, true/false and 1/0 are all accepted.
 * A bare flag never reaches this parser; Commander sets it to true.
 */
export function parseBooleanFlag(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) {
    return true;
  }
  if (FALSE_VALUES.has(normalized)) {
    return false;
  }
  throw new InvalidArgumentError('Boolean value expected.');
}
