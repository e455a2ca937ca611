/**
 * Base command class for CLI handlers.
 */

import type { Command } from 'commander';

import type { CommandContext } from './context.js';
import { getCommandContext } from './context.js';
import { OutputManager, type Spinner } from './output.js';
import { CLIError } from './errors.js';
import { VERSION } from './version.js';
import { loadConfig, type ConfigOverrides, type RelayConfig } from '../../file/config.js';
import { GitHubClient } from '../../file/github-client.js';
import type { OperationLogger } from '../../lib/types.js';

/**
 * Base class for all CLI command handlers.
 * Provides common functionality for context, output, config and error handling.
 */
export abstract class BaseCommand {
  protected ctx: CommandContext;
  protected output: OutputManager;

  constructor(command: Command) {
    this.ctx = getCommandContext(command);
    this.output = new OutputManager(this.ctx);
  }

  /**
   * Resolve configuration from global options, the command's own options,
   * environment and config file.
   */
  protected async loadConfig(overrides: ConfigOverrides = {}): Promise<RelayConfig> {
    const config = await loadConfig(this.ctx.cwd, { ...this.ctx.overrides, ...overrides });
    this.output.debug(`Repository: ${config.owner}/${config.repo}`);
    return config;
  }

  protected createGitHubClient(config: RelayConfig, logger: OperationLogger): GitHubClient {
    return new GitHubClient({
      owner: config.owner,
      repo: config.repo,
      token: config.token,
      userAgent: `release-relay/${VERSION}`,
      logger,
    });
  }

  /**
   * Execute an async action with error handling and a progress spinner.
   * CLI errors pass through unchanged; anything else is wrapped in a CLIError
   * with the original error as `cause`.
   */
  protected async execute<T>(
    action: (logger: OperationLogger) => Promise<T>,
    errorMessage: string,
  ): Promise<T> {
    const spinner: Spinner = this.output.spinner(errorMessage);
    try {
      return await action(this.output.logger(spinner));
    } catch (error) {
      if (error instanceof CLIError) {
        throw error;
      }
      const originalError = error instanceof Error ? error : undefined;
      const detail = originalError?.message;
      const fullMessage =
        detail && detail !== errorMessage ? `${errorMessage}: ${detail}` : errorMessage;
      const wrapped = new CLIError(fullMessage);
      if (originalError) {
        wrapped.cause = originalError;
      }
      throw wrapped;
    } finally {
      spinner.stop();
    }
  }

  /**
   * Check if dry-run mode is enabled and log the action.
   * Returns true if in dry-run mode (caller should skip the actual action).
   */
  protected checkDryRun(message: string, details?: object): boolean {
    if (this.ctx.dryRun) {
      this.output.dryRun(message, details);
      return true;
    }
    return false;
  }

  /**
   * Abstract method that subclasses must implement.
   * Signature varies by command (positional args + options object).
   */
  abstract run(...args: unknown[]): Promise<void>;
}
