/**
 * Command context and global options management.
 */

import type { Command } from 'commander';

import type { ConfigOverrides } from '../../file/config.js';

/**
 * Output format options.
 */
export type OutputFormat = 'text' | 'json';

/**
 * Color output options.
 */
export type ColorOption = 'auto' | 'always' | 'never';

/**
 * Global command context extracted from Commander options.
 */
export interface CommandContext {
  dryRun: boolean;
  verbose: boolean;
  quiet: boolean;
  json: boolean;
  color: ColorOption;
  debug: boolean;
  /** Directory holding the pipeline handoff files */
  cwd: string;
  /** Repository settings given as global options */
  overrides: ConfigOverrides;
}

function stringOption(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function colorOption(value: unknown): ColorOption {
  return value === 'always' || value === 'never' ? value : 'auto';
}

/**
 * Extract command context from a Commander command.
 * Handles inheritance of global options through the command hierarchy.
 */
export function getCommandContext(command: Command): CommandContext {
  const opts: Record<string, unknown> = command.optsWithGlobals();

  return {
    dryRun: opts.dryRun === true,
    verbose: opts.verbose === true,
    quiet: opts.quiet === true,
    json: opts.json === true,
    color: colorOption(opts.color),
    debug: opts.debug === true,
    cwd: process.cwd(),
    overrides: {
      owner: stringOption(opts.owner),
      repo: stringOption(opts.repo),
      token: stringOption(opts.token),
      configFile: stringOption(opts.config),
    },
  };
}

/**
 * Determine if output should be colorized based on options and environment.
 */
export function shouldColorize(colorOption: ColorOption): boolean {
  // NO_COLOR takes precedence (unless --color=always explicitly set)
  if (process.env.NO_COLOR && colorOption !== 'always') {
    return false;
  }
  if (colorOption === 'always') {
    return true;
  }
  if (colorOption === 'never') {
    return false;
  }
  return process.stdout.isTTY ?? false;
}
