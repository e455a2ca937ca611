/**
 * CLI program setup using Commander.js
 */

import { Command } from 'commander';

import { VERSION } from './lib/version.js';
import {
  configureColoredHelp,
  createColoredHelpConfig,
  getColorOptionFromArgv,
} from './lib/output.js';
import { getVersionCommand } from './commands/get-version.js';
import { bumpVersionCommand } from './commands/bump-version.js';
import { createReleaseCommand } from './commands/create-release.js';
import { updateSubmoduleCommand } from './commands/update-submodule.js';
import { CLIError } from './lib/errors.js';

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command()
    .name('release-relay')
    .description('Versioning, GitHub releases and submodule propagation for CI pipelines')
    .version(VERSION, '--version', 'Show version number')
    .helpOption('--help', 'Display help for command')
    .showHelpAfterError('(add --help for additional information)');

  configureColoredHelp(program);

  // Global options
  program
    .option('--owner <owner>', 'Repository owner (env: RELEASE_RELAY_OWNER)')
    .option('--repo <repo>', 'Repository being released (env: RELEASE_RELAY_REPO)')
    .option('--token <token>', 'GitHub token (env: GITHUB_TOKEN)')
    .option('--config <path>', 'Config file (default: .release-relay.yml)')
    .option('--dry-run', 'Show what would be done without making changes')
    .option('--verbose', 'Enable verbose output')
    .option('--quiet', 'Suppress non-essential output')
    .option('--json', 'Output as JSON')
    .option('--color <when>', 'Colorize output: auto, always, never', 'auto')
    .option('--debug', 'Show debug output');

  program.commandsGroup('Versioning:');
  program.addCommand(getVersionCommand);
  program.addCommand(bumpVersionCommand);

  program.commandsGroup('Publishing:');
  program.addCommand(createReleaseCommand);
  program.addCommand(updateSubmoduleCommand);

  // addCommand() does not inherit the parent's configureHelp settings.
  const helpConfig = createColoredHelpConfig(getColorOptionFromArgv());
  for (const cmd of program.commands) {
    cmd.configureHelp(helpConfig);
  }

  return program;
}

function isJsonMode(): boolean {
  return process.argv.includes('--json');
}

/**
 * Output error in the appropriate format (JSON or text).
 */
function outputError(message: string, error?: Error): void {
  if (isJsonMode()) {
    const errorObj: { error: string; type?: string; details?: string } = { error: message };
    if (error instanceof CLIError) {
      errorObj.type = error.name;
    }
    if (error?.cause instanceof Error && error.cause.message !== message) {
      errorObj.details = error.cause.message;
    }
    console.error(JSON.stringify(errorObj));
  } else {
    console.error(`Error: ${message}`);
  }
}

/**
 * Run the CLI. This is the main entry point.
 */
export async function runCli(argv: string[] = process.argv): Promise<void> {
  process.on('SIGINT', () => {
    console.error('\nInterrupted');
    process.exit(130); // 128 + SIGINT(2)
  });

  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CLIError) {
      outputError(error.message, error);
      process.exit(error.exitCode);
    }
    const message = error instanceof Error ? error.message : String(error);
    outputError(message, error instanceof Error ? error : undefined);
    process.exit(1);
  }
}
