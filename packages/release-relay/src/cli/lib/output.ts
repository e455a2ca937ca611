/**
 * Terminal and JSON output for the CLI.
 *
 * Core modules never print; they report through an OperationLogger that
 * this manager creates. Results go to stdout, diagnostics to stderr.
 */

import pc from 'picocolors';
import type { Command } from 'commander';

import type { CommandContext, ColorOption } from './context.js';
import { shouldColorize } from './context.js';
import type { OperationLogger } from '../../lib/types.js';

const ICONS = {
  SUCCESS: '✓', // U+2713
  WARN: '⚠', // U+26A0
  NOTICE: '•', // U+2022
} as const;

const COLOR_OPTIONS: readonly ColorOption[] = ['auto', 'always', 'never'];

function isColorOption(value: string | undefined): value is ColorOption {
  return COLOR_OPTIONS.some((option) => option === value);
}

/**
 * Read `--color` from raw argv. Help is rendered before Commander has
 * parsed options, so the value is needed earlier.
 */
export function getColorOptionFromArgv(argv: string[] = process.argv): ColorOption {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const value = arg?.startsWith('--color=')
      ? arg.slice('--color='.length)
      : arg === '--color'
        ? argv[i + 1]
        : undefined;
    if (isColorOption(value)) {
      return value;
    }
  }
  return 'auto';
}

const MAX_HELP_WIDTH = 88;

export function createColoredHelpConfig(colorOption: ColorOption = 'auto') {
  const colors = pc.createColors(shouldColorize(colorOption));
  return {
    helpWidth: Math.min(MAX_HELP_WIDTH, process.stdout.columns ?? 80),
    styleTitle: (str: string) => colors.bold(colors.cyan(str)),
    styleCommandText: (str: string) => colors.green(str),
    styleOptionText: (str: string) => colors.yellow(str),
    showGlobalOptions: true,
  };
}

export function configureColoredHelp(program: Command): Command {
  return program.configureHelp(createColoredHelpConfig(getColorOptionFromArgv()));
}

export interface Spinner {
  message(msg: string): void;
  stop(): void;
}

const noopSpinner: Spinner = {
  message: () => undefined,
  stop: () => undefined,
};

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

export class OutputManager {
  private readonly ctx: CommandContext;
  private readonly colors: ReturnType<typeof pc.createColors>;

  constructor(ctx: CommandContext) {
    this.ctx = ctx;
    this.colors = pc.createColors(shouldColorize(ctx.color));
  }

  /** Print a command result: JSON in --json mode, otherwise via the formatter. */
  data<T>(data: T, textFormatter: (data: T) => void): void {
    if (this.ctx.json) {
      console.log(JSON.stringify(data, null, 2));
    } else {
      textFormatter(data);
    }
  }

  success(message: string): void {
    if (!this.ctx.json && !this.ctx.quiet) {
      console.log(this.colors.green(`${ICONS.SUCCESS} ${message}`));
    }
  }

  notice(message: string): void {
    if (!this.ctx.json && !this.ctx.quiet) {
      console.log(this.colors.blue(`${ICONS.NOTICE} ${message}`));
    }
  }

  /** Progress detail; shown with --verbose or --debug. */
  info(message: string): void {
    if (!this.ctx.json && (this.ctx.verbose || this.ctx.debug)) {
      console.error(this.colors.dim(message));
    }
  }

  warn(message: string): void {
    if (this.ctx.json) {
      console.error(JSON.stringify({ warning: message }));
    } else if (!this.ctx.quiet) {
      console.error(this.colors.yellow(`${ICONS.WARN} ${message}`));
    }
  }

  debug(message: string): void {
    if (this.ctx.debug && !this.ctx.json) {
      console.error(this.colors.dim(`[debug] ${message}`));
    }
  }

  dryRun(message: string, details?: object): void {
    if (this.ctx.json) {
      console.log(JSON.stringify({ dryRun: true, action: message, ...details }));
      return;
    }
    console.log(this.colors.yellow(`[DRY-RUN] ${message}`));
    if (details && (this.ctx.verbose || this.ctx.debug)) {
      console.log(this.colors.dim(JSON.stringify(details, null, 2)));
    }
  }

  /**
   * Spinner on stderr. CI logs are not a TTY, so there it is a no-op, as in
   * --json and --quiet mode.
   */
  spinner(message: string): Spinner {
    if (this.ctx.json || this.ctx.quiet || !process.stderr.isTTY) {
      return noopSpinner;
    }

    let frame = 0;
    let current = message;
    const render = () => {
      const glyph = SPINNER_FRAMES[frame % SPINNER_FRAMES.length] ?? '';
      process.stderr.write(`\r${this.colors.blue(glyph)} ${current}`);
      frame++;
    };
    render();
    const timer = setInterval(render, 80);

    return {
      message: (msg) => {
        current = msg;
      },
      stop: () => {
        clearInterval(timer);
        process.stderr.write(`\r${' '.repeat(current.length + 3)}\r`);
      },
    };
  }

  /**
   * OperationLogger for core code. Progress drives the spinner and is also
   * written as info, so it survives in CI logs.
   */
  logger(spinner: Spinner): OperationLogger {
    return {
      progress: (msg) => {
        spinner.message(msg);
        this.info(msg);
      },
      info: (msg) => this.info(msg),
      warn: (msg) => this.warn(msg),
      debug: (msg) => this.debug(msg),
    };
  }
}
