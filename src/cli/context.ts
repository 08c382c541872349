/**
 * Shared plumbing for CLI commands: where output goes, how the integration
 * is loaded, and how each command's action reports results and failures.
 */

import { Command, InvalidArgumentError } from 'commander';
import { ChalkInstance } from 'chalk';
import {
  YouTrackIntegration,
  createYouTrackIntegrationFromConfig,
} from '../index.js';
import {
  LogLevel,
  createConsoleObservability,
  createNoopObservability,
} from '../observability/index.js';

/**
 * Options accepted before any sub-command.
 */
export type GlobalOptions = {
  /** Path of the TOML configuration file */
  config?: string;
  /** Debug logging to stderr */
  verbose?: boolean;
};

export interface CliContext {
  loadIntegration(options: GlobalOptions): Promise<YouTrackIntegration>;
  stdout(text: string): void;
  stderr(text: string): void;
  setExitCode(code: number): void;
  /** Colour output. Default: true */
  colors?: boolean;
}

/**
 * A command body: returns the lines to print.
 */
export type CommandAction<T> = (
  integration: YouTrackIntegration,
  options: T,
  style: ChalkInstance
) => Promise<string | string[]>;

export type ActionRunner = <T>(
  action: CommandAction<T>
) => (options: T, command: Command) => Promise<void>;

/**
 * Wraps command bodies with integration loading, output and error reporting.
 */
export function createRunner(context: CliContext, style: ChalkInstance): ActionRunner {
  return <T>(action: CommandAction<T>) =>
    async (options: T, command: Command): Promise<void> => {
      try {
        const integration = await context.loadIntegration(
          command.optsWithGlobals<GlobalOptions>()
        );
        const output = await action(integration, options, style);

        for (const line of typeof output === 'string' ? [output] : output) {
          context.stdout(`${line}\n`);
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        context.stderr(`${style.red('Error:')} ${message}\n`);
        context.setExitCode(1);
      }
    };
}

/**
 * Loads the integration from the TOML file, logging to stderr when verbose.
 */
export async function loadIntegrationFromConfig(
  options: GlobalOptions
): Promise<YouTrackIntegration> {
  const observability = options.verbose
    ? createConsoleObservability(LogLevel.DEBUG, 'stderr')
    : createNoopObservability();

  return createYouTrackIntegrationFromConfig(options.config, { observability });
}

/**
 * Option parser for whole numbers.
 */
export function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return Number.parseInt(value, 10);
}
